import { DynamicModule, ForwardReference, Type } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

/**
 * Async configuration options for SshUsersModule.
 *
 * Allows configuration of the module using NestJS ConfigService,
 * which is useful for environment-based or dynamic configuration.
 *
 * The ConfigService should provide values for the following keys:
 * - `ssh-users.awsRegions`: AWS regions (string[] or comma delimited string)
 * - `ssh-users.usersParameterName`: user list parameter name (string)
 * - `ssh-users.sshKeyPrefix`: SSH key parameter prefix (string)
 * - `ssh-users.parameterType`: 'String' or 'SecureString' (optional)
 * - `ssh-users.maxAttempts`: SDK attempt limit (number, optional)
 *
 * @example
 * ```typescript
 * @Module({
 *   imports: [
 *     SshUsersModule.registerAsync({
 *       import: ConfigModule.forRoot({ load: [sshUsersConfig] }),
 *       useClass: ConfigService,
 *     }),
 *   ],
 * })
 * export class AppModule {}
 * ```
 */
export interface ModuleAsyncOptions {
  /**
   * The module exporting the ConfigService, typically
   * `ConfigModule.forRoot(...)`.
   */
  import: Type | DynamicModule | Promise<DynamicModule> | ForwardReference;

  /**
   * The ConfigService class to use for retrieving configuration values.
   */
  useClass: Type<ConfigService>;
}
