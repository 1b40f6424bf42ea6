import { Inject, Injectable, Logger } from '@nestjs/common';
import { SSH_USERS_OPTIONS } from './constants';
import {
  AccessDeniedError,
  NotFoundError,
  ParameterAlreadyExistsError,
  ParameterStoreError,
  ValidationError,
} from './errors/ssh-users.errors';
import {
  OperatorReport,
  RegionFailure,
  RegionOperatorResult,
  RegionOperatorStatus,
  RegionReport,
  RegionUserList,
  ResolvedModuleOptions,
  SshKeyStatus,
  SyncReport,
} from './interface';
import {
  ParameterStoreClientService,
  UserListSynchronizerService,
} from './services';
import { ParamStoreUtil } from './utils/param-store.util';
import { SshKeyUtil } from './utils/ssh-key.util';
import { UserListUtil } from './utils/user-list.util';

export interface SynchronizeOptions {
  /** Parameter to synchronize. Defaults to the configured user list. */
  parameterName?: string;
  /** Accept an empty desired list, which deletes the parameter. */
  allowEmpty?: boolean;
}

export interface AddUserOptions {
  /** Defaults to the comment field of the SSH key. */
  username?: string;
  /** Replace a stored SSH key. */
  overwrite?: boolean;
}

export interface RemoveUserOptions {
  /** Also delete the user's SSH key parameter. */
  full?: boolean;
}

/**
 * Service managing the SSH users stored in AWS Systems Manager Parameter Store.
 *
 * Every operation runs against each configured region in turn. Input is
 * validated before the first AWS call. A region failing with a
 * ParameterStoreError is reported in `failures` and the remaining regions
 * still run, except for AccessDeniedError which aborts the operation.
 *
 * @example
 * ```typescript
 * constructor(private readonly sshUsers: SshUsersService) {}
 *
 * async grantAccess() {
 *   const report = await this.sshUsers.synchronize(['jane.doe', 'john.roe']);
 *   if (report.failures.length > 0) {
 *     // at least one region was not updated
 *   }
 * }
 * ```
 */
@Injectable()
export class SshUsersService {
  private readonly logger = new Logger(SshUsersService.name);

  constructor(
    @Inject(SSH_USERS_OPTIONS) private readonly config: ResolvedModuleOptions,
    private readonly store: ParameterStoreClientService,
    private readonly synchronizer: UserListSynchronizerService,
  ) {}

  /**
   * Make the stored user list equal to `desiredUsers` in every region.
   *
   * @param desiredUsers - Usernames; normalized to lowercase, duplicates collapse
   * @returns Per-region results, with one write per region that differed
   * @throws ValidationError before any AWS call if a username is invalid or
   *         the list is empty without `allowEmpty`
   * @throws AccessDeniedError if AWS rejects the credentials in any region
   */
  async synchronize(
    desiredUsers: Iterable<string>,
    options: SynchronizeOptions = {},
  ): Promise<SyncReport> {
    const parameterName = options.parameterName ?? this.config.usersParameterName;
    const nameIssue = ParamStoreUtil.checkParameterName(parameterName, 'Parameter name');
    if (nameIssue) {
      throw new ValidationError(nameIssue, [nameIssue]);
    }

    const desired = UserListUtil.validate(desiredUsers);
    if (desired.size === 0 && !options.allowEmpty) {
      const issue = 'No usernames provided';
      throw new ValidationError(
        `${issue}. Allow an empty list explicitly to remove every user.`,
        [issue],
      );
    }

    this.logger.debug(
      `Synchronizing '${parameterName}' to: ${UserListUtil.serialize(desired) || '(empty)'}`,
    );

    const report = await this.inEachRegion(async (region) => {
      const result = await this.synchronizer.synchronize(region, parameterName, desired);
      if (result.status === 'unchanged') {
        this.logger.log(`User list is already up to date in region '${region}'.`);
      } else {
        this.logger.log(
          `Successfully ${result.status} user list in region '${region}'` +
            ` (added: ${result.added.join(', ') || 'none'}; removed: ${result.removed.join(', ') || 'none'}).`,
        );
      }
      return result;
    });

    return { parameterName, ...report };
  }

  /**
   * Read the user list in every region.
   */
  async listUsers(): Promise<RegionReport<RegionUserList>> {
    return this.inEachRegion((region) =>
      this.synchronizer.read(region, this.config.usersParameterName),
    );
  }

  /**
   * Store an operator's SSH key and add them to the user list in every region.
   *
   * An existing key is kept unless `overwrite` is set; that is reported as
   * `kept`, not as a failure.
   */
  async addUser(sshKey: string, options: AddUserOptions = {}): Promise<OperatorReport> {
    const key = SshKeyUtil.parse(sshKey);
    if (options.username === undefined) {
      this.logger.debug('Using SSH key comment as username.');
    }
    const username = UserListUtil.validateOne(options.username ?? key.comment);
    const keyParameterName = this.sshKeyParameterName(username);
    const value = SshKeyUtil.format(key);

    const report = await this.inEachRegion(async (region): Promise<RegionOperatorResult> => {
      let sshKeyStatus: SshKeyStatus = 'stored';
      this.logger.debug(
        `Adding SSH key to Parameter Store in '${region}' with key '${keyParameterName}'.`,
      );
      try {
        await this.store.putParameter(region, keyParameterName, value, {
          overwrite: options.overwrite ?? false,
        });
        this.logger.log(
          `Successfully added "${username}"'s SSH key to the Parameter Store in '${region}'.`,
        );
      } catch (error) {
        if (!(error instanceof ParameterAlreadyExistsError)) throw error;
        this.logger.warn(
          `SSH key for "${username}" already exists in the Parameter Store for region '${region}'. ` +
            'Use the overwrite option to replace it.',
        );
        sshKeyStatus = 'kept';
      }

      const userList = await this.synchronizer.reconcile(
        region,
        this.config.usersParameterName,
        (current) => {
          if (current.has(username)) {
            this.logger.warn(
              `User "${username}" is already in the user list in region '${region}'.`,
            );
          }
          return new Set([...current, username]);
        },
      );
      if (userList.status !== 'unchanged') {
        this.logger.log(`Successfully added "${username}" to the user list in region '${region}'.`);
      }

      return { region, username, sshKey: sshKeyStatus, userList };
    });

    return { username, ...report };
  }

  /**
   * Remove an operator from the user list in every region, and with `full`
   * also delete their SSH key.
   */
  async removeUser(username: string, options: RemoveUserOptions = {}): Promise<OperatorReport> {
    const normalized = UserListUtil.validateOne(username);
    const keyParameterName = this.sshKeyParameterName(normalized);

    const report = await this.inEachRegion(async (region): Promise<RegionOperatorResult> => {
      let sshKeyStatus: SshKeyStatus = 'untouched';
      if (options.full) {
        try {
          await this.store.deleteParameter(region, keyParameterName);
          this.logger.log(
            `Successfully removed SSH key for user "${normalized}" in region '${region}'.`,
          );
          sshKeyStatus = 'deleted';
        } catch (error) {
          if (!(error instanceof NotFoundError)) throw error;
          this.logger.warn(
            `User "${normalized}" does not have an SSH key stored in the Parameter Store of region '${region}'.`,
          );
          sshKeyStatus = 'absent';
        }
      }

      const userList = await this.synchronizer.reconcile(
        region,
        this.config.usersParameterName,
        (current) => {
          if (!current.has(normalized)) {
            this.logger.warn(
              `User "${normalized}" is not in the user list in region '${region}'.`,
            );
          }
          const next = new Set(current);
          next.delete(normalized);
          return next;
        },
      );
      if (userList.status !== 'unchanged') {
        this.logger.log(
          `Successfully removed "${normalized}" from the user list in region '${region}'.`,
        );
      }

      return { region, username: normalized, sshKey: sshKeyStatus, userList };
    });

    return { username: normalized, ...report };
  }

  /**
   * Report an operator's SSH key and user list membership in every region.
   */
  async checkUser(username: string): Promise<RegionReport<RegionOperatorStatus>> {
    const normalized = UserListUtil.validateOne(username);
    const keyParameterName = this.sshKeyParameterName(normalized);

    return this.inEachRegion(async (region): Promise<RegionOperatorStatus> => {
      let sshKey: string | null = null;
      try {
        sshKey = await this.store.getParameter(region, keyParameterName);
      } catch (error) {
        if (!(error instanceof NotFoundError)) throw error;
      }

      const userList = await this.synchronizer.read(region, this.config.usersParameterName);
      return {
        region,
        username: normalized,
        sshKey,
        userListExists: userList.exists,
        listed: userList.users.includes(normalized),
      };
    });
  }

  /**
   * Name of the parameter holding a user's SSH public key.
   */
  sshKeyParameterName(username: string): string {
    return `${this.config.sshKeyPrefix}/${username}`;
  }

  private async inEachRegion<T>(task: (region: string) => Promise<T>): Promise<RegionReport<T>> {
    const results: T[] = [];
    const failures: RegionFailure[] = [];

    for (const region of this.config.awsRegions) {
      try {
        results.push(await task(region));
      } catch (error) {
        if (error instanceof AccessDeniedError || !(error instanceof ParameterStoreError)) {
          throw error;
        }
        this.logger.error(error.message);
        failures.push({ region, error });
      }
    }

    return { results, failures };
  }
}
