import {
  AccessDeniedError,
  NotFoundError,
  ParameterAlreadyExistsError,
  ParameterStoreError,
  StoreErrorContext,
  TransientStoreError,
  ValidationError,
} from '../errors/ssh-users.errors';
import {
  ModuleOptions,
  ResolvedModuleOptions,
  StoredParameterType,
} from '../interface';
import { DEFAULT_MAX_ATTEMPTS, DEFAULT_PARAMETER_TYPE } from '../constants';

/**
 * Utility class for AWS SSM Parameter Store operations.
 * Provides configuration parsing, validation and error classification.
 */
export class ParamStoreUtil {
  /** Characters AWS accepts in Parameter Store names. */
  private static readonly validNamePattern = /^[a-zA-Z0-9._/-]+$/;

  private static readonly regionPattern = /^[a-z]{2}(-[a-z]+)+-\d+$/;

  private static readonly accessDeniedNames = [
    'AccessDeniedException',
    'UnrecognizedClientException',
    'InvalidSignatureException',
    'ExpiredTokenException',
    'CredentialsProviderError',
  ];

  private static readonly transientNames = [
    'ThrottlingException',
    'TooManyUpdates',
    'InternalServerError',
    'ServiceUnavailable',
    'RequestTimeout',
    'TimeoutError',
  ];

  private static readonly networkCodes = [
    'ENOTFOUND',
    'ETIMEDOUT',
    'ECONNRESET',
    'ECONNREFUSED',
    'EAI_AGAIN',
  ];

  /**
   * Parse a configuration value as a list of strings.
   * Accepts arrays and comma delimited strings; blank entries are dropped.
   *
   * @example
   * ```typescript
   * ParamStoreUtil.parseList('us-east-1, us-west-2'); // ['us-east-1', 'us-west-2']
   * ParamStoreUtil.parseList(undefined); // []
   * ```
   */
  static parseList(value: unknown): string[] {
    const entries = Array.isArray(value)
      ? value.map((entry) => String(entry))
      : typeof value === 'string'
        ? value.split(',')
        : [];
    return entries.map((entry) => entry.trim()).filter(Boolean);
  }

  /**
   * Parse a configuration value as an integer.
   * Returns undefined for absent or blank values so callers can fall back
   * to a default; anything else that is not an integer is returned as NaN.
   */
  static parseInteger(value: unknown): number | undefined {
    if (typeof value === 'number') return value;
    if (typeof value !== 'string' || value.trim() === '') return undefined;
    return /^-?\d+$/.test(value.trim()) ? Number(value.trim()) : NaN;
  }

  /**
   * Parse a configuration value as a string, treating blanks as absent.
   */
  static parseString(value: unknown): string | undefined {
    if (typeof value !== 'string' || value.trim() === '') return undefined;
    return value.trim();
  }

  /**
   * Parse a configuration value as a parameter type.
   *
   * @throws ValidationError if the value is neither 'String' nor 'SecureString'
   */
  static parseParameterType(value: unknown): StoredParameterType | undefined {
    const parsed = this.parseString(value);
    if (parsed === undefined) return undefined;
    if (parsed === 'String' || parsed === 'SecureString') return parsed;
    const issue = `Parameter type must be 'String' or 'SecureString'. Received: '${parsed}'`;
    throw new ValidationError(`Invalid configuration: ${issue}`, [issue]);
  }

  /**
   * Validates a Parameter Store name.
   *
   * @returns A description of the problem, or null when the name is valid
   */
  static checkParameterName(name: string, label: string): string | null {
    if (!name || name.trim() === '') {
      return `${label} is required. Please provide a valid name (e.g., /ssh/users)`;
    }
    if (!this.validNamePattern.test(name)) {
      return `${label} may only contain letters, numbers and the characters "._-/". Received: '${name}'`;
    }
    if (name.includes('/') && !name.startsWith('/')) {
      return `${label} must start with '/' when it contains '/'. Received: '${name}'`;
    }
    return null;
  }

  /**
   * Validates the module options and fills in defaults.
   *
   * @returns The options with defaults applied and the key prefix normalized
   * @throws ValidationError listing every problem found
   */
  static validateOptions(options: ModuleOptions): ResolvedModuleOptions {
    const issues: string[] = [];

    if (!options.awsRegions || options.awsRegions.length === 0) {
      issues.push(
        'At least one AWS region is required. Please provide a valid AWS region (e.g., us-east-1)',
      );
    }
    for (const region of options.awsRegions ?? []) {
      if (!this.regionPattern.test(region)) {
        issues.push(`Invalid AWS region '${region}'`);
      }
    }

    const sshKeyPrefix = (options.sshKeyPrefix ?? '').replace(/\/+$/, '');
    const nameIssues = [
      this.checkParameterName(options.usersParameterName, 'User list parameter name'),
      this.checkParameterName(sshKeyPrefix, 'SSH key prefix'),
    ];
    for (const issue of nameIssues) {
      if (issue) issues.push(issue);
    }

    const parameterType: StoredParameterType =
      options.parameterType ?? DEFAULT_PARAMETER_TYPE;

    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1 || maxAttempts > 10) {
      issues.push(
        `Max attempts must be an integer between 1 and 10. Received: '${maxAttempts}'`,
      );
    }

    if (issues.length > 0) {
      throw new ValidationError(
        `Invalid configuration: ${issues.join('; ')}`,
        issues,
      );
    }

    return {
      awsRegions: [...options.awsRegions],
      usersParameterName: options.usersParameterName,
      sshKeyPrefix,
      parameterType,
      maxAttempts,
    };
  }

  /**
   * Builds a detailed error message based on the error type.
   * Provides context-specific guidance for common AWS SSM errors.
   *
   * @param error - The caught error object
   * @param context - Operation, region and parameter being accessed
   * @returns Formatted error message with context and remediation guidance
   */
  static buildErrorMessage(error: unknown, context: StoreErrorContext): string {
    const verb = {
      GetParameter: 'read',
      PutParameter: 'write',
      DeleteParameter: 'delete',
    }[context.operation];
    const baseMessage = `Failed to ${verb} parameter '${context.parameterName}' in region '${context.region}'`;
    const name = this.errorField(error, 'name');
    const code = this.errorField(error, 'code');
    const message = this.errorField(error, 'message');

    if (name === 'ParameterNotFound') {
      return `${baseMessage} - Parameter not found. Error: ${message}`;
    }

    if (name === 'ParameterAlreadyExists') {
      return (
        `${baseMessage} - Parameter already exists. ` +
        `Overwrite it explicitly to replace the stored value. ` +
        `Error: ${message}`
      );
    }

    if (message?.includes('Missing credentials')) {
      return (
        `${baseMessage} - Missing AWS credentials. ` +
        `Configure credentials via environment variables, AWS credentials file, or IAM role. ` +
        `Error: ${message}`
      );
    }

    if (name && this.accessDeniedNames.includes(name)) {
      return (
        `${baseMessage} - Access Denied. ` +
        `Ensure the IAM role/user has 'ssm:${context.operation}' permission for the parameter. ` +
        `Error: ${message}`
      );
    }

    if (name === 'ThrottlingException' || name === 'TooManyUpdates') {
      return (
        `${baseMessage} - Request throttled. ` +
        `AWS SSM API rate limit exceeded and retries were exhausted. ` +
        `Error: ${message}`
      );
    }

    if (code && this.networkCodes.includes(code)) {
      return (
        `${baseMessage} - Network error (${code}). ` +
        `Unable to reach AWS SSM service. Check network connectivity and AWS service status. ` +
        `Error: ${message}`
      );
    }

    // Generic error message for unknown error types
    return `${baseMessage} - ${message || 'Unknown error occurred'}`;
  }

  /**
   * Maps an AWS SDK error to the matching ParameterStoreError subclass.
   */
  static toStoreError(
    error: unknown,
    context: StoreErrorContext,
  ): ParameterStoreError {
    if (error instanceof ParameterStoreError) return error;

    const message = this.buildErrorMessage(error, context);
    const name = this.errorField(error, 'name');
    const code = this.errorField(error, 'code');

    if (name === 'ParameterNotFound') {
      return new NotFoundError(message, context, error);
    }
    if (name === 'ParameterAlreadyExists') {
      return new ParameterAlreadyExistsError(message, context, error);
    }
    if (
      (name && this.accessDeniedNames.includes(name)) ||
      this.errorField(error, 'message')?.includes('Missing credentials')
    ) {
      return new AccessDeniedError(message, context, error);
    }
    if (
      (name && this.transientNames.includes(name)) ||
      (code && this.networkCodes.includes(code)) ||
      this.errorField(error, '$fault') === 'server'
    ) {
      return new TransientStoreError(message, context, error);
    }
    return new ParameterStoreError(message, context, error);
  }

  private static errorField(error: unknown, field: string): string | undefined {
    if (typeof error !== 'object' || error === null) {
      return field === 'message' && error !== undefined ? String(error) : undefined;
    }
    const value: unknown = Reflect.get(error, field);
    return typeof value === 'string' ? value : undefined;
  }
}
