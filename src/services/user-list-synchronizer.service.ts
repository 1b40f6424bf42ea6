import { Injectable, Logger } from '@nestjs/common';
import { NotFoundError } from '../errors/ssh-users.errors';
import { RegionSyncResult, RegionUserList, SyncStatus } from '../interface';
import { UserListUtil } from '../utils/user-list.util';
import { ParameterStoreClientService } from './parameter-store-client.service';

/**
 * Maps the stored user set to the desired one.
 */
export type UserListChange = (current: ReadonlySet<string>) => Set<string>;

/**
 * Read-compare-write of the user list parameter in a single region.
 *
 * A write happens only when the stored set differs from the desired set
 * or the stored value has blank, padded or duplicate entries, so running
 * the same change twice writes once. Entry order alone never causes a write. An empty desired set
 * deletes the parameter, since Parameter Store cannot hold an empty value.
 */
@Injectable()
export class UserListSynchronizerService {
  private readonly logger = new Logger(UserListSynchronizerService.name);

  constructor(private readonly store: ParameterStoreClientService) {}

  /**
   * Reads the user list. A missing parameter reads as an empty list.
   */
  async read(region: string, parameterName: string): Promise<RegionUserList> {
    const { list } = await this.load(region, parameterName);
    return list;
  }

  /**
   * Makes the stored list equal to `desired`. The usernames must already be
   * validated and normalized.
   */
  async synchronize(
    region: string,
    parameterName: string,
    desired: ReadonlySet<string>,
  ): Promise<RegionSyncResult> {
    return this.reconcile(region, parameterName, () => new Set(desired));
  }

  /**
   * Applies `change` to the stored list and writes the result if it differs.
   */
  async reconcile(
    region: string,
    parameterName: string,
    change: UserListChange,
  ): Promise<RegionSyncResult> {
    const { list: current, clean } = await this.load(region, parameterName);
    const currentUsers = new Set(current.users);
    const desired = change(currentUsers);
    const { added, removed, changed } = UserListUtil.diff(desired, currentUsers);
    const users = UserListUtil.sorted(desired);

    let status: SyncStatus = 'unchanged';
    if (!changed && clean) {
      this.logger.debug(
        `User list '${parameterName}' in region '${region}' is already up to date.`,
      );
    } else if (desired.size === 0) {
      this.logger.warn(
        `No users left, deleting the user list parameter from region '${region}'.`,
      );
      await this.store.deleteParameter(region, parameterName);
      status = 'deleted';
    } else {
      if (!changed) {
        this.logger.warn(
          `Rewriting malformed user list '${parameterName}' in region '${region}'.`,
        );
      }
      const value = UserListUtil.serialize(desired);
      this.logger.debug(`New user list value: "${value}".`);
      await this.store.putParameter(region, parameterName, value, {
        overwrite: true,
      });
      status = current.exists ? 'updated' : 'created';
    }

    return { region, parameterName, status, added, removed, users };
  }

  /**
   * Reads the user list along with whether the stored value is clean.
   * An absent parameter counts as clean.
   */
  private async load(
    region: string,
    parameterName: string,
  ): Promise<{ list: RegionUserList; clean: boolean }> {
    try {
      const value = await this.store.getParameter(region, parameterName);
      const users = UserListUtil.sorted(UserListUtil.parse(value));
      this.logger.debug(
        `Current users in region '${region}': ${users.join(', ') || '(none)'}`,
      );
      return {
        list: { region, parameterName, exists: true, users },
        clean: UserListUtil.isClean(value),
      };
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.logger.warn(
          `The user list parameter '${parameterName}' does not exist in region '${region}'.`,
        );
        return { list: { region, parameterName, exists: false, users: [] }, clean: true };
      }
      throw error;
    }
  }
}
