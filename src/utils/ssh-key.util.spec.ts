import { SshKeyUtil } from './ssh-key.util';
import { ValidationError } from '../errors/ssh-users.errors';

describe('SshKeyUtil', () => {
  describe('parse', () => {
    it('should split a public key line into its fields', () => {
      expect(SshKeyUtil.parse('ssh-ed25519 AAAAC3NzaC1lZDI1NTE5AAAAITestKey jane.doe')).toEqual({
        type: 'ssh-ed25519',
        body: 'AAAAC3NzaC1lZDI1NTE5AAAAITestKey',
        comment: 'jane.doe',
      });
    });

    it('should accept ecdsa and security key types', () => {
      expect(SshKeyUtil.parse('ecdsa-sha2-nistp256 AAAAE2VjZHNh= ops').type).toBe(
        'ecdsa-sha2-nistp256',
      );
      expect(SshKeyUtil.parse('sk-ssh-ed25519@openssh.com AAAAGnNr ops').type).toBe(
        'sk-ssh-ed25519@openssh.com',
      );
    });

    it('should collapse surrounding and repeated whitespace', () => {
      const key = SshKeyUtil.parse('  ssh-rsa  AAAAB3NzaC1yc2E=\tjane.doe \n');

      expect(SshKeyUtil.format(key)).toBe('ssh-rsa AAAAB3NzaC1yc2E= jane.doe');
    });

    it('should require three fields', () => {
      expect(() => SshKeyUtil.parse('ssh-ed25519 AAAAC3NzaC1lZDI1NTE5')).toThrow(
        'Invalid SSH key format. Expected "<type> <key> <comment>", e.g. "ssh-ed25519 AAAA... jane.doe".',
      );
    });

    it('should count no fields for an empty line', () => {
      let thrown: unknown;
      try {
        SshKeyUtil.parse('   ');
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(ValidationError);
      expect(thrown).toHaveProperty('issues', ['Expected 3 fields, got 0']);
    });

    it('should reject unknown key types and non-base64 bodies', () => {
      let thrown: unknown;
      try {
        SshKeyUtil.parse('rsa not*base64 jane.doe');
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toHaveProperty(
        'message',
        "Invalid SSH key format: Unsupported key type 'rsa'; Key body is not base64.",
      );
      expect(thrown).toHaveProperty('issues', [
        "Unsupported key type 'rsa'",
        'Key body is not base64',
      ]);
    });
  });
});
