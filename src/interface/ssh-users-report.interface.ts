import { ParameterStoreError } from '../errors/ssh-users.errors';

/**
 * Outcome of one read-compare-write of the user list.
 *
 * - `created`: the parameter was absent and has been written
 * - `updated`: the parameter has been overwritten
 * - `deleted`: the desired list was empty and the parameter has been removed
 * - `unchanged`: stored and desired sets were equal, nothing was written
 */
export type SyncStatus = 'created' | 'updated' | 'deleted' | 'unchanged';

export interface RegionSyncResult {
  region: string;
  parameterName: string;
  status: SyncStatus;
  /** Usernames written that were not stored before, sorted. */
  added: string[];
  /** Usernames stored before that are no longer present, sorted. */
  removed: string[];
  /** The user list after the operation, sorted. */
  users: string[];
}

export interface RegionFailure {
  region: string;
  error: ParameterStoreError;
}

/**
 * Per-region results of an operation. The operation succeeded when
 * `failures` is empty.
 */
export interface RegionReport<T> {
  results: T[];
  failures: RegionFailure[];
}

export interface SyncReport extends RegionReport<RegionSyncResult> {
  parameterName: string;
}

/**
 * What happened to an operator's SSH key parameter in one region.
 *
 * - `stored`: the key has been written
 * - `kept`: a key already existed and overwrite was not requested
 * - `deleted`: the key parameter has been removed
 * - `absent`: removal was requested but no key was stored
 * - `untouched`: the key was not part of the operation
 */
export type SshKeyStatus = 'stored' | 'kept' | 'deleted' | 'absent' | 'untouched';

export interface RegionOperatorResult {
  region: string;
  username: string;
  sshKey: SshKeyStatus;
  userList: RegionSyncResult;
}

export interface OperatorReport extends RegionReport<RegionOperatorResult> {
  username: string;
}

export interface RegionOperatorStatus {
  region: string;
  username: string;
  /** The stored public key, or null when the user has none. */
  sshKey: string | null;
  /** Whether the user list parameter exists in the region. */
  userListExists: boolean;
  /** Whether the username is in the user list. */
  listed: boolean;
}

export interface RegionUserList {
  region: string;
  parameterName: string;
  exists: boolean;
  users: string[];
}
