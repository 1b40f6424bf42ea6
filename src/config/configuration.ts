import { registerAs } from '@nestjs/config';
import {
  DEFAULT_AWS_REGIONS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_PARAMETER_TYPE,
  DEFAULT_SSH_KEY_PREFIX,
  DEFAULT_USERS_PARAMETER_NAME,
  SSH_USERS_CONFIG_NAMESPACE,
} from '../constants';
import { ModuleOptions, ResolvedModuleOptions } from '../interface';
import { ParamStoreUtil } from '../utils/param-store.util';

/**
 * Environment variables read by {@link loadOptionsFromEnv}.
 */
export const ENV_VARIABLES = {
  awsRegions: 'SSH_USERS_AWS_REGIONS',
  usersParameterName: 'SSH_USERS_PARAMETER_NAME',
  sshKeyPrefix: 'SSH_USERS_SSH_KEY_PREFIX',
  parameterType: 'SSH_USERS_PARAMETER_TYPE',
  maxAttempts: 'SSH_USERS_MAX_ATTEMPTS',
} as const;

/**
 * Options read from the environment, with defaults for anything unset.
 * Values are not validated here.
 */
export function loadOptionsFromEnv(env: NodeJS.ProcessEnv): ModuleOptions {
  const awsRegions = ParamStoreUtil.parseList(env[ENV_VARIABLES.awsRegions]);
  return {
    awsRegions: awsRegions.length > 0 ? awsRegions : [...DEFAULT_AWS_REGIONS],
    usersParameterName:
      ParamStoreUtil.parseString(env[ENV_VARIABLES.usersParameterName]) ??
      DEFAULT_USERS_PARAMETER_NAME,
    sshKeyPrefix:
      ParamStoreUtil.parseString(env[ENV_VARIABLES.sshKeyPrefix]) ?? DEFAULT_SSH_KEY_PREFIX,
    parameterType:
      ParamStoreUtil.parseParameterType(env[ENV_VARIABLES.parameterType]) ??
      DEFAULT_PARAMETER_TYPE,
    maxAttempts:
      ParamStoreUtil.parseInteger(env[ENV_VARIABLES.maxAttempts]) ?? DEFAULT_MAX_ATTEMPTS,
  };
}

/**
 * Overlays explicitly given options on the environment and validates the
 * result. Undefined overrides fall through to the environment.
 *
 * @throws ValidationError if the combined options are invalid
 */
export function resolveModuleOptions(
  overrides: Partial<ModuleOptions> = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedModuleOptions {
  const options = loadOptionsFromEnv(env);
  return ParamStoreUtil.validateOptions({
    awsRegions: overrides.awsRegions ?? options.awsRegions,
    usersParameterName: overrides.usersParameterName ?? options.usersParameterName,
    sshKeyPrefix: overrides.sshKeyPrefix ?? options.sshKeyPrefix,
    parameterType: overrides.parameterType ?? options.parameterType,
    maxAttempts: overrides.maxAttempts ?? options.maxAttempts,
  });
}

/**
 * Configuration factory for `ConfigModule.forRoot({ load: [sshUsersConfig] })`.
 * Registers the options under the `ssh-users` namespace.
 */
export const sshUsersConfig = registerAs(SSH_USERS_CONFIG_NAMESPACE, () => ({
  ...loadOptionsFromEnv(process.env),
}));
