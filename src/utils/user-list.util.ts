import { USER_LIST_DELIMITER } from '../constants';
import { ValidationError } from '../errors/ssh-users.errors';

export const USERNAME_ERROR_MSG =
  'Usernames must be 1 to 32 characters long, start with a letter, a number or "_", ' +
  'and can only consist of letters, numbers, and the characters ".-_".';

export interface UserListDiff {
  /** In the desired set but not stored, sorted. */
  added: string[];
  /** Stored but not in the desired set, sorted. */
  removed: string[];
  changed: boolean;
}

/**
 * Codec for the stored user list and the username rules.
 *
 * The stored value is the sorted usernames joined by `,` with no spaces.
 * Valid usernames never contain the delimiter, so no escaping is needed.
 */
export class UserListUtil {
  private static readonly usernamePattern = /^[a-z0-9_][a-z0-9._-]{0,31}$/;

  /**
   * Normalizes a username: surrounding whitespace removed, lowercased.
   */
  static normalize(username: string): string {
    return username.trim().toLowerCase();
  }

  static isValid(username: string): boolean {
    return this.usernamePattern.test(this.normalize(username));
  }

  /**
   * Validates and normalizes a collection of usernames.
   *
   * @returns The normalized usernames as a set
   * @throws ValidationError listing every invalid entry
   */
  static validate(usernames: Iterable<string>): Set<string> {
    const users = new Set<string>();
    const invalid: string[] = [];

    for (const username of usernames) {
      if (this.isValid(username)) {
        users.add(this.normalize(username));
      } else {
        invalid.push(username);
      }
    }

    if (invalid.length > 0) {
      const listed = invalid.map((username) => `"${username}"`).join(', ');
      throw new ValidationError(
        `Invalid username(s) ${listed}. ${USERNAME_ERROR_MSG}`,
        invalid.map((username) => `Invalid username "${username}"`),
      );
    }

    return users;
  }

  /**
   * Validates and normalizes a single username.
   *
   * @throws ValidationError if the username is invalid
   */
  static validateOne(username: string): string {
    const [normalized] = this.validate([username]);
    return normalized;
  }

  /**
   * Parses a stored parameter value into a set of usernames.
   * Entries are trimmed; empty entries and duplicates are dropped.
   */
  static parse(value: string): Set<string> {
    return new Set(
      value
        .split(USER_LIST_DELIMITER)
        .map((entry) => entry.trim())
        .filter(Boolean),
    );
  }

  /**
   * Whether a stored value is in serialized form apart from entry order:
   * no empty entries, no surrounding whitespace, no duplicates.
   */
  static isClean(value: string): boolean {
    const entries = value.split(USER_LIST_DELIMITER);
    return (
      entries.every((entry) => entry !== '' && entry === entry.trim()) &&
      new Set(entries).size === entries.length
    );
  }

  /**
   * Reads usernames from a local source such as a file.
   * Entries are separated by newlines or commas and `#` starts a comment.
   * The entries are returned as written, for validation by the caller.
   */
  static parseSource(text: string): string[] {
    return text
      .split(/\r?\n/)
      .map((line) => line.replace(/#.*$/, ''))
      .flatMap((line) => line.split(USER_LIST_DELIMITER))
      .map((entry) => entry.trim())
      .filter(Boolean);
  }

  static serialize(users: Iterable<string>): string {
    return this.sorted(users).join(USER_LIST_DELIMITER);
  }

  static sorted(users: Iterable<string>): string[] {
    return [...users].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }

  static diff(desired: ReadonlySet<string>, current: ReadonlySet<string>): UserListDiff {
    const added = this.sorted([...desired].filter((user) => !current.has(user)));
    const removed = this.sorted([...current].filter((user) => !desired.has(user)));
    return { added, removed, changed: added.length > 0 || removed.length > 0 };
  }
}
