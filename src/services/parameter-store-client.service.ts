import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import {
  DeleteParameterCommand,
  GetParameterCommand,
  PutParameterCommand,
  SSMClient,
} from '@aws-sdk/client-ssm';
import { SSH_USERS_OPTIONS } from '../constants';
import { StoreErrorContext } from '../errors/ssh-users.errors';
import { ResolvedModuleOptions } from '../interface';
import { ParamStoreUtil } from '../utils/param-store.util';

export interface PutParameterOptions {
  overwrite: boolean;
}

/**
 * The calls the tool makes against a Parameter Store. Errors are always
 * ParameterStoreError subclasses.
 */
export interface ParameterStore {
  /**
   * @throws NotFoundError if the parameter does not exist
   */
  getParameter(region: string, name: string): Promise<string>;

  /**
   * @returns The new parameter version
   * @throws ParameterAlreadyExistsError if it exists and overwrite is false
   */
  putParameter(
    region: string,
    name: string,
    value: string,
    options: PutParameterOptions,
  ): Promise<number | undefined>;

  /**
   * @throws NotFoundError if the parameter does not exist
   */
  deleteParameter(region: string, name: string): Promise<void>;
}

/**
 * Injectable service talking to AWS Systems Manager Parameter Store.
 *
 * This service handles the communication with AWS SSM, including:
 * - One SSM client per region, created on first use
 * - Decryption of SecureString parameters on read
 * - Bounded retries through the SDK's `maxAttempts`
 * - Mapping of SDK errors to the ParameterStoreError hierarchy
 * - Releasing the clients when the module is destroyed
 *
 * @example
 * ```typescript
 * constructor(private readonly client: ParameterStoreClientService) {}
 *
 * async readUsers() {
 *   return this.client.getParameter('us-east-1', '/ssh/users');
 * }
 * ```
 */
@Injectable()
export class ParameterStoreClientService implements ParameterStore, OnModuleDestroy {
  private readonly logger = new Logger(ParameterStoreClientService.name);
  private readonly clients = new Map<string, SSMClient>();

  constructor(
    @Inject(SSH_USERS_OPTIONS) private readonly options: ResolvedModuleOptions,
  ) {}

  async getParameter(region: string, name: string): Promise<string> {
    const value = await this.execute(
      { operation: 'GetParameter', region, parameterName: name },
      async (client) => {
        const result = await client.send(
          new GetParameterCommand({ Name: name, WithDecryption: true }),
        );
        return result.Parameter?.Value ?? '';
      },
    );
    this.logger.debug(`Read parameter '${name}' in region '${region}'`);
    return value;
  }

  async putParameter(
    region: string,
    name: string,
    value: string,
    options: PutParameterOptions,
  ): Promise<number | undefined> {
    // The response only carries the version and tier; the version is
    // returned for logging.
    const version = await this.execute(
      { operation: 'PutParameter', region, parameterName: name },
      async (client) => {
        const result = await client.send(
          new PutParameterCommand({
            Name: name,
            Value: value,
            Type: this.options.parameterType,
            Overwrite: options.overwrite,
          }),
        );
        return result.Version;
      },
    );
    this.logger.debug(
      `Wrote parameter '${name}' in region '${region}' (version ${version ?? 'unknown'})`,
    );
    return version;
  }

  async deleteParameter(region: string, name: string): Promise<void> {
    await this.execute(
      { operation: 'DeleteParameter', region, parameterName: name },
      async (client) => {
        await client.send(new DeleteParameterCommand({ Name: name }));
      },
    );
    this.logger.debug(`Deleted parameter '${name}' in region '${region}'`);
  }

  onModuleDestroy(): void {
    for (const client of this.clients.values()) {
      client.destroy();
    }
    this.clients.clear();
  }

  private async execute<T>(
    context: StoreErrorContext,
    call: (client: SSMClient) => Promise<T>,
  ): Promise<T> {
    try {
      return await call(this.clientFor(context.region));
    } catch (error) {
      const storeError = ParamStoreUtil.toStoreError(error, context);
      if (error instanceof Error) {
        this.logger.debug(
          `Error details (ssm:${context.operation}): ${error.stack}`,
        );
      }
      throw storeError;
    }
  }

  private clientFor(region: string): SSMClient {
    let client = this.clients.get(region);
    if (!client) {
      client = new SSMClient({
        region,
        maxAttempts: this.options.maxAttempts,
      });
      this.clients.set(region, client);
    }
    return client;
  }
}
