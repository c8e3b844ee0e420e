/**
 * Resolution of the pass entry and the environment `pass` runs in.
 */

import * as path from 'path';

import { DEFAULT_PASSWORD_STORE_DIR, PASSWORD_STORE_DIR_ENV_VAR } from '../constants';
import { AppError, ErrorCode } from '../errors/types';
import type { MappingSection } from '../mapping/config';
import type { Environment } from '../mapping/loader';
import type { CredentialRequest } from '../protocol/request';

export type EnvironmentMap = Record<string, string | undefined>;

export interface PassEnvironment {
  env: EnvironmentMap;
  passwordStoreDir: string;
}

/**
 * Fill the section's `target` template with request fields.
 *
 * `${host}` is always replaced; `${path}`, `${username}` and `${protocol}`
 * only when the request carries that field, otherwise the placeholder stays.
 */
export function definePassTarget(section: MappingSection, request: CredentialRequest): string {
  const template = section.get('target');
  if (template === undefined) {
    throw new AppError(
      `Section [${section.name}] has no target`,
      ErrorCode.MISSING_TARGET,
      { section: section.name },
    );
  }

  let target = template.split('${host}').join(request.host ?? '${host}');
  for (const field of ['path', 'username', 'protocol']) {
    const value = request[field];
    if (value !== undefined) {
      target = target.split(`\${${field}}`).join(value);
    }
  }
  return target;
}

export function expandHome(dir: string, homeDir: string): string {
  if (dir === '~') {
    return homeDir;
  }
  if (dir.startsWith('~/')) {
    return path.join(homeDir, dir.substring(2));
  }
  return dir;
}

/**
 * Environment for the pass call.
 *
 * A non-empty `password_store_dir` of the section (with `~` expanded)
 * overrides PASSWORD_STORE_DIR in a copy of the ambient environment.
 * Otherwise the ambient value, or its absence, is passed on as is and
 * `passwordStoreDir` reports the directory pass will use: the ambient
 * value if non-empty, else `~/.password-store`.
 */
export function computePassEnvironment(
  section: MappingSection,
  ambientEnv: Environment,
  homeDir: string,
): PassEnvironment {
  const env: EnvironmentMap = { ...ambientEnv };

  const configured = section.get('password_store_dir');
  if (configured) {
    const passwordStoreDir = expandHome(configured, homeDir);
    env[PASSWORD_STORE_DIR_ENV_VAR] = passwordStoreDir;
    return { env, passwordStoreDir };
  }

  const ambient = ambientEnv[PASSWORD_STORE_DIR_ENV_VAR];
  return {
    env,
    passwordStoreDir: expandHome(ambient || DEFAULT_PASSWORD_STORE_DIR, homeDir),
  };
}
