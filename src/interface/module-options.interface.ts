/**
 * Parameter types the tool writes. Both are plain text to consumers once
 * read with decryption.
 */
export type StoredParameterType = 'String' | 'SecureString';

/**
 * Configuration options for the SshUsersModule.
 *
 * @example
 * ```typescript
 * {
 *   awsRegions: ['us-east-1', 'us-west-2'],
 *   usersParameterName: '/ssh/users',
 *   sshKeyPrefix: '/ssh/public_keys',
 * }
 * ```
 */
export interface ModuleOptions {
  /**
   * AWS regions holding a copy of the parameters. Every operation runs
   * against each region in this order.
   *
   * @example ['us-east-1', 'us-east-2']
   */
  awsRegions: string[];

  /**
   * Name of the parameter holding the comma delimited user list.
   *
   * @example '/ssh/users'
   */
  usersParameterName: string;

  /**
   * Prefix of the per-user SSH public key parameters.
   * The key of `jane.doe` lives at `<sshKeyPrefix>/jane.doe`.
   *
   * @example '/ssh/public_keys'
   */
  sshKeyPrefix: string;

  /**
   * Type used when writing parameters.
   *
   * @default 'SecureString'
   */
  parameterType?: StoredParameterType;

  /**
   * Maximum attempts per AWS call, including the first one. Retries use the
   * SDK's standard backoff.
   *
   * @default 3
   */
  maxAttempts?: number;
}

/**
 * Module options after validation, with every default applied.
 */
export type ResolvedModuleOptions = Required<ModuleOptions>;
