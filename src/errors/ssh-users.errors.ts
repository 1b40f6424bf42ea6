/**
 * Parameter Store API operations the tool performs. The names match the
 * IAM actions (`ssm:<operation>`).
 */
export type StoreOperation = 'GetParameter' | 'PutParameter' | 'DeleteParameter';

export interface StoreErrorContext {
  operation: StoreOperation;
  region: string;
  parameterName: string;
}

/**
 * Malformed input or configuration. Always raised before any call to AWS.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Failure of a Parameter Store call that none of the subclasses describes.
 */
export class ParameterStoreError extends Error {
  readonly operation: StoreOperation;
  readonly region: string;
  readonly parameterName: string;

  constructor(message: string, context: StoreErrorContext, cause?: unknown) {
    super(message, { cause });
    this.name = 'ParameterStoreError';
    this.operation = context.operation;
    this.region = context.region;
    this.parameterName = context.parameterName;
  }
}

/** The parameter does not exist. */
export class NotFoundError extends ParameterStoreError {
  constructor(message: string, context: StoreErrorContext, cause?: unknown) {
    super(message, context, cause);
    this.name = 'NotFoundError';
  }
}

/** A put without overwrite hit an existing parameter. */
export class ParameterAlreadyExistsError extends ParameterStoreError {
  constructor(message: string, context: StoreErrorContext, cause?: unknown) {
    super(message, context, cause);
    this.name = 'ParameterAlreadyExistsError';
  }
}

/** Missing, expired or insufficient credentials. Fatal for the invocation. */
export class AccessDeniedError extends ParameterStoreError {
  constructor(message: string, context: StoreErrorContext, cause?: unknown) {
    super(message, context, cause);
    this.name = 'AccessDeniedError';
  }
}

/**
 * Throttling, service or network failure that outlasted the SDK's retries.
 */
export class TransientStoreError extends ParameterStoreError {
  constructor(message: string, context: StoreErrorContext, cause?: unknown) {
    super(message, context, cause);
    this.name = 'TransientStoreError';
  }
}
