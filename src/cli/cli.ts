import { readFile } from 'fs/promises';
import { INestApplicationContext, Logger, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Command, CommanderError } from 'commander';
import { resolveModuleOptions } from '../config/configuration';
import { USER_LIST_DELIMITER } from '../constants';
import { ModuleOptions, RegionReport, ResolvedModuleOptions } from '../interface';
import { SshUsersModule } from '../ssh-users.module';
import { SshUsersService } from '../ssh-users.service';
import { ParamStoreUtil } from '../utils/param-store.util';
import { UserListUtil } from '../utils/user-list.util';
import { VERSION } from '../version';

export const CLI_NAME = 'ssh-user-sync';

export type GlobalOptions = {
  debug?: boolean;
  regions?: string;
  usersParameter?: string;
  sshKeyPrefix?: string;
  parameterType?: string;
  maxAttempts?: string;
};

export interface SyncCommandOptions {
  file?: string;
  allowEmpty?: boolean;
}

export interface AddCommandOptions {
  username?: string;
  overwrite?: boolean;
}

export interface RemoveCommandOptions {
  full?: boolean;
}

/**
 * Creates the Nest application context the commands run in.
 */
export type ContextFactory = (
  options: ResolvedModuleOptions,
  debug: boolean,
) => Promise<INestApplicationContext>;

export interface CliOutput {
  writeOut(str: string): void;
  writeErr(str: string): void;
}

export interface RunOptions {
  createContext?: ContextFactory;
  output?: CliOutput;
  env?: NodeJS.ProcessEnv;
}

const LOG_LEVELS: LogLevel[] = ['log', 'warn', 'error'];
const DEBUG_LOG_LEVELS: LogLevel[] = ['log', 'warn', 'error', 'debug', 'verbose'];

export const createApplicationContext: ContextFactory = async (options, debug) => {
  // Nest's own startup messages are noise for a CLI; levels are raised
  // once the context exists.
  const app = await NestFactory.createApplicationContext(
    SshUsersModule.register(options),
    { logger: ['warn', 'error'], abortOnError: false },
  );
  app.useLogger(debug ? DEBUG_LOG_LEVELS : LOG_LEVELS);
  return app;
};

function toOverrides(globals: GlobalOptions): Partial<ModuleOptions> {
  return {
    awsRegions:
      globals.regions === undefined ? undefined : ParamStoreUtil.parseList(globals.regions),
    usersParameterName: globals.usersParameter,
    sshKeyPrefix: globals.sshKeyPrefix,
    parameterType: ParamStoreUtil.parseParameterType(globals.parameterType),
    maxAttempts: ParamStoreUtil.parseInteger(globals.maxAttempts),
  };
}

/**
 * Parses `argv` (including the node and script entries) and runs the
 * selected command.
 *
 * @returns The process exit code: 0 on success, 1 on any failure
 */
export async function run(argv: string[], runOptions: RunOptions = {}): Promise<number> {
  const createContext = runOptions.createContext ?? createApplicationContext;
  const output: CliOutput = runOptions.output ?? {
    writeOut: (str) => process.stdout.write(str),
    writeErr: (str) => process.stderr.write(str),
  };
  const env = runOptions.env ?? process.env;
  const logger = new Logger(CLI_NAME);
  let exitCode = 0;

  const reportFailures = <T>(report: RegionReport<T>, action: string): boolean => {
    if (report.failures.length === 0) return true;
    const regions = report.failures.map((failure) => failure.region).join(', ');
    logger.error(`Unable to ${action} in region(s): ${regions}.`);
    return false;
  };

  const withService = async (
    command: Command,
    action: (service: SshUsersService) => Promise<boolean>,
  ): Promise<void> => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    let app: INestApplicationContext | undefined;
    try {
      const options = resolveModuleOptions(toOverrides(globals), env);
      app = await createContext(options, globals.debug ?? false);
      logger.debug(`Resolved options: ${JSON.stringify(options)}`);
      exitCode = (await action(app.get(SshUsersService))) ? 0 : 1;
    } catch (error) {
      logger.error(error instanceof Error ? error.message : String(error));
      exitCode = 1;
    } finally {
      await app?.close();
    }
  };

  const program = new Command();
  program
    .name(CLI_NAME)
    .description('Manage the SSH users stored in AWS Systems Manager Parameter Store.')
    .version(VERSION)
    .exitOverride()
    .configureOutput({ writeOut: output.writeOut, writeErr: output.writeErr })
    .option('--debug', 'Enable debug messages.')
    .option(
      '--regions <regions>',
      'Comma delimited list of AWS regions to use. [default: us-east-1,us-east-2,us-west-1,us-west-2]',
    )
    .option(
      '--users-parameter <name>',
      'The Parameter Store key holding the list of SSH users. [default: /ssh/users]',
    )
    .option(
      '--ssh-key-prefix <prefix>',
      'The prefix of the SSH key parameters. [default: /ssh/public_keys]',
    )
    .option('--parameter-type <type>', 'String or SecureString. [default: SecureString]')
    .option('--max-attempts <n>', 'Attempts per AWS call, including retries. [default: 3]');

  program
    .command('sync')
    .description('Make the stored user list equal to the given usernames.')
    .argument('[usernames...]', 'Usernames to grant SSH access.')
    .option('-f, --file <path>', 'Read usernames from a file, one per line or comma delimited.')
    .option('--allow-empty', 'Accept an empty list, deleting the user list parameter.')
    .action(async (usernames: string[], options: SyncCommandOptions, command: Command) => {
      await withService(command, async (service) => {
        const desired = [...usernames];
        if (options.file) {
          desired.push(...UserListUtil.parseSource(await readFile(options.file, 'utf8')));
        }
        const report = await service.synchronize(desired, {
          allowEmpty: options.allowEmpty ?? false,
        });
        return reportFailures(report, 'synchronize the user list');
      });
    });

  program
    .command('show')
    .description('Print the stored user list of each region.')
    .action(async (_options: object, command: Command) => {
      await withService(command, async (service) => {
        const report = await service.listUsers();
        for (const list of report.results) {
          const users = list.exists
            ? list.users.join(USER_LIST_DELIMITER) || '(empty)'
            : '(not set)';
          output.writeOut(`${list.region}: ${users}\n`);
        }
        return reportFailures(report, 'read the user list');
      });
    });

  program
    .command('add')
    .description("Store a user's SSH key and add them to the user list.")
    .argument(
      '<sshKey>',
      'An SSH key in the format "ssh-ed25519 <SSH key> <comment>". Without --username the comment is the username.',
    )
    .option('-u, --username <username>', 'The username to store the key under.')
    .option('--overwrite', "Overwrite the user's SSH key if one already exists.")
    .action(async (sshKey: string, options: AddCommandOptions, command: Command) => {
      await withService(command, async (service) => {
        const report = await service.addUser(sshKey, options);
        return reportFailures(report, `add "${report.username}"`);
      });
    });

  program
    .command('remove')
    .description('Remove a user from the user list.')
    .argument('<username>', 'The username to remove.')
    .option('--full', "Also remove the user's SSH key.")
    .action(async (username: string, options: RemoveCommandOptions, command: Command) => {
      await withService(command, async (service) => {
        const report = await service.removeUser(username, options);
        return reportFailures(report, `remove "${report.username}"`);
      });
    });

  program
    .command('check')
    .description("Show a user's SSH key and user list membership in each region.")
    .argument('<username>', 'The username to look up.')
    .action(async (username: string, _options: object, command: Command) => {
      await withService(command, async (service) => {
        const report = await service.checkUser(username);
        for (const status of report.results) {
          const listed = status.listed ? 'listed' : 'not listed';
          const key = status.sshKey === null ? 'no SSH key' : `SSH key ${status.sshKey}`;
          output.writeOut(`${status.region}: ${status.username} ${listed}, ${key}\n`);
        }
        return reportFailures(report, `check "${username}"`);
      });
    });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }
  return exitCode;
}
