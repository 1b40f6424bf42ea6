/**
 * Package version reported by `--version`. Kept equal to package.json.
 */
export const VERSION = '1.0.0';
