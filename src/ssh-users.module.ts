import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  AWS_REGIONS,
  MAX_ATTEMPTS,
  PARAMETER_TYPE,
  SSH_KEY_PREFIX,
  SSH_USERS_OPTIONS,
  USERS_PARAMETER_NAME,
} from './constants';
import {
  ModuleAsyncOptions,
  ModuleOptions,
  ResolvedModuleOptions,
} from './interface';
import { SshUsersService } from './ssh-users.service';
import {
  ParameterStoreClientService,
  UserListSynchronizerService,
} from './services';
import { ParamStoreUtil } from './utils/param-store.util';

/**
 * Global NestJS module managing SSH users in AWS SSM Parameter Store.
 *
 * Options are validated when the module is instantiated, so a bad region
 * or parameter name fails application startup instead of the first call.
 *
 * @example
 * Static registration:
 * ```typescript
 * @Module({
 *   imports: [
 *     SshUsersModule.register({
 *       awsRegions: ['us-east-1'],
 *       usersParameterName: '/ssh/users',
 *       sshKeyPrefix: '/ssh/public_keys',
 *     }),
 *   ],
 * })
 * export class AppModule {}
 * ```
 *
 * @example
 * Async registration with ConfigService:
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
@Global()
@Module({})
export class SshUsersModule {
  /**
   * Register the module with static configuration.
   *
   * @param moduleOptions - Configuration options; unset optional values take defaults
   */
  public static register(moduleOptions: ModuleOptions): DynamicModule {
    return {
      module: SshUsersModule,
      providers: [
        ...this.createServiceProviders(),
        {
          provide: SSH_USERS_OPTIONS,
          useFactory: (): ResolvedModuleOptions =>
            ParamStoreUtil.validateOptions(moduleOptions),
        },
      ],
      exports: [SshUsersService],
    };
  }

  /**
   * Register the module with async configuration using ConfigService.
   *
   * @param moduleAsyncOptions - Module exporting the ConfigService, and its class
   *
   * @example
   * ```typescript
   * // In your environment:
   * // SSH_USERS_AWS_REGIONS=us-east-1,us-west-2
   * // SSH_USERS_PARAMETER_NAME=/ssh/users
   *
   * SshUsersModule.registerAsync({
   *   import: ConfigModule.forRoot({ load: [sshUsersConfig] }),
   *   useClass: ConfigService,
   * })
   * ```
   */
  public static registerAsync(
    moduleAsyncOptions: ModuleAsyncOptions,
  ): DynamicModule {
    return {
      module: SshUsersModule,
      imports: [moduleAsyncOptions.import],
      providers: [
        ...this.createServiceProviders(),
        ...this.createAsyncProviders(moduleAsyncOptions),
      ],
      exports: [SshUsersService],
    };
  }

  private static createServiceProviders(): Provider[] {
    return [
      SshUsersService,
      ParameterStoreClientService,
      UserListSynchronizerService,
    ];
  }

  private static createAsyncProviders(
    moduleAsyncOptions: ModuleAsyncOptions,
  ): Provider[] {
    return [
      {
        provide: SSH_USERS_OPTIONS,
        useFactory: (configService: ConfigService): ResolvedModuleOptions => {
          return ParamStoreUtil.validateOptions({
            awsRegions: ParamStoreUtil.parseList(configService.get(AWS_REGIONS)),
            usersParameterName:
              ParamStoreUtil.parseString(configService.get(USERS_PARAMETER_NAME)) ?? '',
            sshKeyPrefix:
              ParamStoreUtil.parseString(configService.get(SSH_KEY_PREFIX)) ?? '',
            parameterType: ParamStoreUtil.parseParameterType(
              configService.get(PARAMETER_TYPE),
            ),
            maxAttempts: ParamStoreUtil.parseInteger(
              configService.get(MAX_ATTEMPTS),
            ),
          });
        },
        inject: [moduleAsyncOptions.useClass],
      },
    ];
  }
}
