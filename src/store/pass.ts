/**
 * pass (the standard unix password manager) as the secret store.
 *
 * Security:
 * - Uses execFile (not exec) so entry names never reach a shell
 * - 10-second timeout so a hanging gpg-agent prompt does not block git forever
 * - Entry contents are only held in memory, never logged
 */

import { execFile } from 'child_process';
import * as fs from 'fs-extra';
import * as path from 'path';
import { TextDecoder } from 'util';

import { DEFAULT_ENCODING, PASS_BIN_ENV_VAR } from '../constants';
import { AppError, ErrorCode } from '../errors/types';
import type { EnvironmentMap } from './target';

const DEFAULT_BIN = 'pass';
const TIMEOUT_MS = 10_000;

export interface SecretStore {
  /** Raw content of an entry. Rejects if the entry cannot be read. */
  show(target: string, env: EnvironmentMap): Promise<Buffer>;
}

function getPassBin(env: EnvironmentMap): string {
  return env[PASS_BIN_ENV_VAR]?.trim() || DEFAULT_BIN;
}

export class PassStore implements SecretStore {
  show(target: string, env: EnvironmentMap): Promise<Buffer> {
    const bin = getPassBin(env);
    return new Promise((resolve, reject) => {
      execFile(
        bin,
        ['show', target],
        { encoding: 'buffer', env, timeout: TIMEOUT_MS },
        (error, stdout, stderr) => {
          if (error) {
            const msg = stderr.toString('utf-8').trim() || error.message;
            reject(new AppError(
              `Unable to retrieve entry ${target} from pass: ${msg}`,
              ErrorCode.STORE_FAILED,
              { target, exitCode: typeof error.code === 'number' ? error.code : undefined },
            ));
            return;
          }
          resolve(stdout);
        },
      );
    });
  }
}

/**
 * Make sure `<storeDir>/<target>.gpg` exists and is a regular file before
 * pass is asked for it.
 */
export async function checkPasswordFile(storeDir: string, target: string): Promise<string> {
  const file = path.join(storeDir, `${target}.gpg`);

  if (!(await fs.pathExists(file))) {
    throw new AppError(
      `Password file '${file}' does not exist`,
      ErrorCode.ENTRY_NOT_FOUND,
      { path: file, target },
    );
  }

  const stats = await fs.stat(file);
  if (!stats.isFile()) {
    throw new AppError(
      `Password file '${file}' is not a file`,
      ErrorCode.ENTRY_NOT_A_FILE,
      { path: file, target },
    );
  }
  return file;
}

/**
 * Decode entry bytes and split them into lines.
 *
 * Bytes that are invalid in the encoding are an error, never replaced.
 */
export function decodeEntry(content: Uint8Array, encoding: string = DEFAULT_ENCODING, target?: string): string[] {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding, { fatal: true });
  } catch {
    throw new AppError(
      `Unsupported encoding '${encoding}'`,
      ErrorCode.INVALID_ENCODING,
      { encoding },
    );
  }

  let text: string;
  try {
    text = decoder.decode(content);
  } catch {
    const entry = target === undefined ? 'Entry' : `Entry ${target}`;
    throw new AppError(
      `${entry} is not valid ${decoder.encoding}`,
      ErrorCode.INVALID_ENCODING,
      { encoding, target },
    );
  }

  const lines = text.split(/\r\n|\r|\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}
