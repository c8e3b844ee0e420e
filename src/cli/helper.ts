/**
 * The credential helper command.
 *
 * Git runs `pass-credential-helper <action>` with the request on stdin.
 * Only `get` is implemented; for `store` and `erase` the helper exits with
 * status 1 and git carries on.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as os from 'os';

import { version as pkgVersion } from '../../package.json';
import { APP_NAME, SKIP_ENV_VAR } from '../constants';
import { handleError } from '../errors/handler';
import { getCredentials } from '../helper/get-credentials';
import { loadMapping } from '../mapping/loader';
import type { Environment } from '../mapping/loader';
import { parseRequest } from '../protocol/request';
import { PassStore } from '../store/pass';
import type { SecretStore } from '../store/pass';
import { logger, LogLevel } from '../utils/logger';
import { readStdin } from '../utils/stdin';

export interface HelperOptions {
  mapping?: string;
  logging?: boolean;
}

export interface HelperIO {
  readInput(): Promise<string>;
  writeOutput(text: string): void;
  env: Environment;
  homeDir: string;
  store: SecretStore;
}

export function defaultIO(): HelperIO {
  return {
    readInput: () => readStdin(),
    writeOutput: (text) => {
      process.stdout.write(text);
    },
    env: process.env,
    homeDir: os.homedir(),
    store: new PassStore(),
  };
}

/**
 * Run one helper invocation and return the process exit code.
 */
export async function runHelper(
  action: string,
  options: HelperOptions,
  io: HelperIO = defaultIO(),
): Promise<number> {
  if (options.logging) {
    logger.setLevel(LogLevel.DEBUG);
  }

  if (io.env[SKIP_ENV_VAR] !== undefined) {
    logger.info('Skipping processing as requested via environment variable');
    return 1;
  }

  try {
    const request = parseRequest(await io.readInput());
    logger.debug(`Received action ${action} with request fields: ${Object.keys(request).join(', ')}`);

    const mapping = await loadMapping({ file: options.mapping, env: io.env, homeDir: io.homeDir });

    if (action !== 'get') {
      logger.info(`Action ${action} is currently not supported`);
      return 1;
    }

    const response = await getCredentials(request, mapping, {
      store: io.store,
      env: io.env,
      homeDir: io.homeDir,
    });
    io.writeOutput(response);
    return 0;
  } catch (error) {
    handleError(error, logger.isDebugEnabled());
    return 1;
  }
}

export function createHelperProgram(io?: HelperIO): Command {
  const program = new Command(APP_NAME);

  program
    .description(
      chalk.blue.bold('Git credential helper using pass as the data source') +
      '\n\nMaps credential requests to pass entries through glob patterns in a mapping file.'
    )
    .version(pkgVersion, '-v, --version', 'Display version')
    .argument('<action>', 'Action to perform as specified in the git credential API')
    .option('-m, --mapping <file>', 'Mapping file to use instead of the one in the XDG config locations')
    .option('-l, --logging', 'Print debug messages on stderr. Might include sensitive information')
    .action(async (action: string, options: HelperOptions) => {
      process.exitCode = await runHelper(action, options, io);
    });

  return program;
}
