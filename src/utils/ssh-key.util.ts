import { ValidationError } from '../errors/ssh-users.errors';

export interface ParsedSshKey {
  type: string;
  body: string;
  comment: string;
}

/**
 * OpenSSH public key lines, `<type> <base64 body> <comment>`.
 */
export class SshKeyUtil {
  private static readonly typePattern =
    /^(ssh-[a-z0-9-]+|ecdsa-sha2-[a-z0-9-]+|sk-[a-z0-9@.-]+)$/;

  private static readonly bodyPattern = /^[A-Za-z0-9+/]+={0,3}$/;

  /**
   * @throws ValidationError when the line is not a three field public key
   */
  static parse(line: string): ParsedSshKey {
    const fields = line.trim().split(/\s+/);
    if (fields.length !== 3) {
      throw new ValidationError(
        'Invalid SSH key format. Expected "<type> <key> <comment>", e.g. "ssh-ed25519 AAAA... jane.doe".',
        [`Expected 3 fields, got ${fields[0] === '' ? 0 : fields.length}`],
      );
    }

    const [type, body, comment] = fields;
    const issues: string[] = [];
    if (!this.typePattern.test(type)) {
      issues.push(`Unsupported key type '${type}'`);
    }
    if (!this.bodyPattern.test(body)) {
      issues.push('Key body is not base64');
    }
    if (issues.length > 0) {
      throw new ValidationError(`Invalid SSH key format: ${issues.join('; ')}.`, issues);
    }

    return { type, body, comment };
  }

  static format(key: ParsedSshKey): string {
    return `${key.type} ${key.body} ${key.comment}`;
  }
}
