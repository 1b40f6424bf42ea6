/**
 * Dependency injection token for the resolved module options.
 * Used internally to inject the configuration into the services.
 */
export const SSH_USERS_OPTIONS = 'SSH_USERS_OPTIONS';

/**
 * Namespace under which the configuration factory registers its values.
 */
export const SSH_USERS_CONFIG_NAMESPACE = 'ssh-users';

/**
 * Configuration key for the AWS regions in ConfigService.
 * Expected value: array of region strings, or a comma delimited string
 * (e.g., 'us-east-1,us-west-2')
 */
export const AWS_REGIONS = 'ssh-users.awsRegions';

/**
 * Configuration key for the user list parameter name in ConfigService.
 * Expected value: Parameter Store name (e.g., '/ssh/users')
 */
export const USERS_PARAMETER_NAME = 'ssh-users.usersParameterName';

/**
 * Configuration key for the SSH public key prefix in ConfigService.
 * Expected value: Parameter Store path (e.g., '/ssh/public_keys')
 */
export const SSH_KEY_PREFIX = 'ssh-users.sshKeyPrefix';

/**
 * Configuration key for the stored parameter type in ConfigService.
 * Expected value: 'String' or 'SecureString'
 */
export const PARAMETER_TYPE = 'ssh-users.parameterType';

/**
 * Configuration key for the SDK attempt limit in ConfigService.
 * Expected value: integer between 1 and 10
 */
export const MAX_ATTEMPTS = 'ssh-users.maxAttempts';

export const DEFAULT_AWS_REGIONS = [
  'us-east-1',
  'us-east-2',
  'us-west-1',
  'us-west-2',
];
export const DEFAULT_USERS_PARAMETER_NAME = '/ssh/users';
export const DEFAULT_SSH_KEY_PREFIX = '/ssh/public_keys';
export const DEFAULT_PARAMETER_TYPE = 'SecureString';
export const DEFAULT_MAX_ATTEMPTS = 3;

/**
 * Delimiter of the stored user list. Consumers split the parameter value on it.
 */
export const USER_LIST_DELIMITER = ',';
