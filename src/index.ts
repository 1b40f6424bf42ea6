import { SshUsersService } from './ssh-users.service';
import { SshUsersModule } from './ssh-users.module';
import { SSH_USERS_OPTIONS, USER_LIST_DELIMITER } from './constants';
import { loadOptionsFromEnv, resolveModuleOptions, sshUsersConfig } from './config/configuration';
import { ParameterStoreClientService, UserListSynchronizerService } from './services';
import { UserListUtil } from './utils/user-list.util';
import { SshKeyUtil } from './utils/ssh-key.util';

export * from './errors/ssh-users.errors';
export * from './interface';
export { AddUserOptions, RemoveUserOptions, SynchronizeOptions } from './ssh-users.service';
export { ParameterStore, PutParameterOptions } from './services';

export {
  SSH_USERS_OPTIONS,
  USER_LIST_DELIMITER,
  SshUsersService,
  SshUsersModule,
  ParameterStoreClientService,
  UserListSynchronizerService,
  UserListUtil,
  SshKeyUtil,
  loadOptionsFromEnv,
  resolveModuleOptions,
  sshUsersConfig,
};
