/**
 * Barrel export for injectable services.
 *
 * - ParameterStoreClientService: Talks to AWS Systems Manager Parameter Store
 * - UserListSynchronizerService: Read-compare-write of the user list in one region
 */
export {
  ParameterStore,
  ParameterStoreClientService,
  PutParameterOptions,
} from './parameter-store-client.service';
export {
  UserListChange,
  UserListSynchronizerService,
} from './user-list-synchronizer.service';
