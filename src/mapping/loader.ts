/**
 * Locate and read the mapping file.
 *
 * An explicit --mapping file wins. Otherwise the first existing
 * `pass-credential-helper` directory among the XDG config locations
 * ($XDG_CONFIG_HOME, then each of $XDG_CONFIG_DIRS) must hold the file.
 */

import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';

import { APP_NAME, MAPPING_FILE_NAME } from '../constants';
import { toAppError } from '../errors/handler';
import { AppError, ErrorCode } from '../errors/types';
import { logger } from '../utils/logger';
import type { MappingConfig } from './config';
import { parseMapping } from './ini';

export type Environment = Readonly<Record<string, string | undefined>>;

export function xdgConfigHome(env: Environment, homeDir: string): string {
  return env.XDG_CONFIG_HOME || path.join(homeDir, '.config');
}

export function xdgConfigDirs(env: Environment, homeDir: string): string[] {
  const system = (env.XDG_CONFIG_DIRS || '/etc/xdg').split(':').filter((dir) => dir.length > 0);
  return [xdgConfigHome(env, homeDir), ...system];
}

/** Path the mapping file is expected at when none exists yet. */
export function defaultMappingFile(env: Environment, homeDir: string): string {
  return path.join(xdgConfigHome(env, homeDir), APP_NAME, MAPPING_FILE_NAME);
}

/**
 * First existing application config directory, or null.
 */
export async function findConfigDir(env: Environment, homeDir: string): Promise<string | null> {
  for (const base of xdgConfigDirs(env, homeDir)) {
    const candidate = path.join(base, APP_NAME);
    if (await fs.pathExists(candidate)) {
      return candidate;
    }
  }
  return null;
}

async function readMappingFile(file: string): Promise<MappingConfig> {
  if (!(await fs.pathExists(file))) {
    throw new AppError(`Mapping file ${file} does not exist`, ErrorCode.MAPPING_NOT_FOUND, { path: file });
  }

  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (error) {
    throw new AppError(toAppError(error).message, ErrorCode.MAPPING_NOT_FOUND, { path: file });
  }
  return parseMapping(text, file);
}

export interface LoadMappingOptions {
  file?: string;
  env?: Environment;
  homeDir?: string;
}

export async function loadMapping(options: LoadMappingOptions = {}): Promise<MappingConfig> {
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? os.homedir();

  if (options.file) {
    logger.debug(`Parsing mapping file from command line: ${options.file}`);
    return readMappingFile(options.file);
  }

  const configDir = await findConfigDir(env, homeDir);
  if (configDir === null) {
    const expectedFile = defaultMappingFile(env, homeDir);
    throw new AppError(
      `No mapping configured so far at any XDG config location. Please create ${expectedFile}`,
      ErrorCode.MAPPING_NOT_FOUND,
      { expectedFile },
    );
  }

  const file = path.join(configDir, MAPPING_FILE_NAME);
  logger.debug(`Parsing mapping file ${file}`);
  return readMappingFile(file);
}
