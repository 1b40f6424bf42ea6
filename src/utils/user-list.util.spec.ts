import { USERNAME_ERROR_MSG, UserListUtil } from './user-list.util';
import { ValidationError } from '../errors/ssh-users.errors';

describe('UserListUtil', () => {
  describe('normalize', () => {
    it('should trim and lowercase', () => {
      expect(UserListUtil.normalize('  Jane.Doe ')).toBe('jane.doe');
    });
  });

  describe('isValid', () => {
    it.each(['jane.doe', 'a', '_svc', 'deploy-bot', 'user1', 'a'.repeat(32), ' Jane.Doe '])(
      'should accept %p',
      (username) => {
        expect(UserListUtil.isValid(username)).toBe(true);
      },
    );

    it.each(['', '   ', 'bad,name', '-dash', '.hidden', 'jane doe', 'jane@host', 'a'.repeat(33)])(
      'should reject %p',
      (username) => {
        expect(UserListUtil.isValid(username)).toBe(false);
      },
    );
  });

  describe('validate', () => {
    it('should normalize and collapse duplicates', () => {
      expect(UserListUtil.validate(['Bob', 'alice', ' bob '])).toEqual(
        new Set(['alice', 'bob']),
      );
    });

    it('should list every invalid username', () => {
      let thrown: unknown;
      try {
        UserListUtil.validate(['alice', '', 'bad,name']);
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(ValidationError);
      expect(thrown).toHaveProperty(
        'message',
        `Invalid username(s) "", "bad,name". ${USERNAME_ERROR_MSG}`,
      );
      expect(thrown).toHaveProperty('issues', [
        'Invalid username ""',
        'Invalid username "bad,name"',
      ]);
    });
  });

  describe('validateOne', () => {
    it('should return the normalized username', () => {
      expect(UserListUtil.validateOne('John.Roe')).toBe('john.roe');
    });

    it('should throw for an invalid username', () => {
      expect(() => UserListUtil.validateOne('john roe')).toThrow(ValidationError);
    });
  });

  describe('parse', () => {
    it('should trim entries and drop blanks and duplicates', () => {
      expect(UserListUtil.parse(' alice , bob,,alice ')).toEqual(new Set(['alice', 'bob']));
    });

    it('should parse an empty value as an empty set', () => {
      expect(UserListUtil.parse('').size).toBe(0);
    });

    it('should keep the case of stored entries', () => {
      expect(UserListUtil.parse('Alice')).toEqual(new Set(['Alice']));
    });
  });

  describe('isClean', () => {
    it.each(['alice,bob', 'bob,alice', 'jane.doe'])('should accept %p', (value) => {
      expect(UserListUtil.isClean(value)).toBe(true);
    });

    it.each(['', 'alice,,bob', 'alice, bob', ' alice', 'alice,alice', 'alice,'])(
      'should reject %p',
      (value) => {
        expect(UserListUtil.isClean(value)).toBe(false);
      },
    );
  });

  describe('parseSource', () => {
    it('should read newline and comma separated entries and skip comments', () => {
      const text = 'alice\n# operators\nbob, carol # on call\r\n\n';

      expect(UserListUtil.parseSource(text)).toEqual(['alice', 'bob', 'carol']);
    });
  });

  describe('serialize', () => {
    it('should sort and join without spaces', () => {
      expect(UserListUtil.serialize(new Set(['carol', 'alice', 'bob']))).toBe('alice,bob,carol');
    });

    it('should sort by code unit', () => {
      expect(UserListUtil.serialize(['b', '_svc', 'a.b', 'a-b', '1'])).toBe('1,_svc,a-b,a.b,b');
    });

    it('should serialize an empty set as an empty string', () => {
      expect(UserListUtil.serialize([])).toBe('');
    });

    it('should produce a value that parses back to the same set', () => {
      const users = new Set(['jane.doe', 'john.roe', '_deploy']);

      expect(UserListUtil.parse(UserListUtil.serialize(users))).toEqual(users);
    });
  });

  describe('diff', () => {
    it('should report added and removed users', () => {
      expect(
        UserListUtil.diff(new Set(['alice', 'carol']), new Set(['alice', 'bob'])),
      ).toEqual({ added: ['carol'], removed: ['bob'], changed: true });
    });

    it('should report no change for equal sets in any order', () => {
      expect(
        UserListUtil.diff(new Set(['bob', 'alice']), new Set(['alice', 'bob'])),
      ).toEqual({ added: [], removed: [], changed: false });
    });
  });
});
