import {
  NotFoundError,
  ParameterAlreadyExistsError,
  ParameterStoreError,
  StoreErrorContext,
  StoreOperation,
} from '../../errors/ssh-users.errors';
import {
  ParameterStore,
  PutParameterOptions,
} from '../parameter-store-client.service';

export interface RecordedCall {
  operation: StoreOperation;
  region: string;
  name: string;
  value?: string;
}

type StoreErrorClass = new (
  message: string,
  context: StoreErrorContext,
) => ParameterStoreError;

/**
 * In-process stand-in for ParameterStoreClientService. Records every call
 * and raises the same error classes as the real client.
 */
export class InMemoryParameterStore implements ParameterStore {
  readonly calls: RecordedCall[] = [];
  private readonly values = new Map<string, string>();
  private readonly failures = new Map<string, StoreErrorClass>();
  private version = 0;

  seed(region: string, name: string, value: string): this {
    this.values.set(this.key(region, name), value);
    return this;
  }

  value(region: string, name: string): string | undefined {
    return this.values.get(this.key(region, name));
  }

  /** Makes every `operation` in `region` fail with `errorClass`. */
  failOn(operation: StoreOperation, region: string, errorClass: StoreErrorClass): this {
    this.failures.set(`${operation}:${region}`, errorClass);
    return this;
  }

  /** Puts and deletes, optionally limited to one region. */
  writes(region?: string): RecordedCall[] {
    return this.calls.filter(
      (call) =>
        call.operation !== 'GetParameter' && (region === undefined || call.region === region),
    );
  }

  async getParameter(region: string, name: string): Promise<string> {
    const context = this.record({ operation: 'GetParameter', region, name });
    const value = this.values.get(this.key(region, name));
    if (value === undefined) {
      throw new NotFoundError(`Parameter '${name}' not found`, context);
    }
    return value;
  }

  async putParameter(
    region: string,
    name: string,
    value: string,
    options: PutParameterOptions,
  ): Promise<number | undefined> {
    const context = this.record({ operation: 'PutParameter', region, name, value });
    if (!options.overwrite && this.values.has(this.key(region, name))) {
      throw new ParameterAlreadyExistsError(`Parameter '${name}' already exists`, context);
    }
    this.values.set(this.key(region, name), value);
    return ++this.version;
  }

  async deleteParameter(region: string, name: string): Promise<void> {
    const context = this.record({ operation: 'DeleteParameter', region, name });
    if (!this.values.delete(this.key(region, name))) {
      throw new NotFoundError(`Parameter '${name}' not found`, context);
    }
  }

  private record(call: RecordedCall): StoreErrorContext {
    this.calls.push(call);
    const context = {
      operation: call.operation,
      region: call.region,
      parameterName: call.name,
    };
    const errorClass = this.failures.get(`${call.operation}:${call.region}`);
    if (errorClass) {
      throw new errorClass(`Simulated ${call.operation} failure`, context);
    }
    return context;
  }

  private key(region: string, name: string): string {
    return `${region}:${name}`;
  }
}
