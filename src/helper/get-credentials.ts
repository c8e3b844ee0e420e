/**
 * Resolution of a `get` request against the mapping and the password store.
 *
 * request → header → section → extractors, target, environment
 *         → entry file check → pass show → decode → extract → response
 */

import * as os from 'os';

import { DEFAULT_ENCODING } from '../constants';
import { createExtractor } from '../extractors';
import type { MappingConfig } from '../mapping/config';
import type { Environment } from '../mapping/loader';
import { findMappingSectionWithProtocol, getRequestHeader } from '../mapping/matcher';
import { formatResponse } from '../protocol/request';
import type { CredentialRequest, ExtractedCredential } from '../protocol/request';
import { checkPasswordFile, decodeEntry } from '../store/pass';
import type { SecretStore } from '../store/pass';
import { computePassEnvironment, definePassTarget } from '../store/target';
import { logger } from '../utils/logger';

export interface GetCredentialsDeps {
  store: SecretStore;
  /** Ambient environment; copied, never modified. */
  env?: Environment;
  homeDir?: string;
  /** Whether to stat `<store>/<target>.gpg` before calling the store. */
  checkEntryFile?: boolean;
}

export interface CredentialResult {
  target: string;
  credential: ExtractedCredential;
  response: string;
}

export async function resolveCredentials(
  request: CredentialRequest,
  mapping: MappingConfig,
  deps: GetCredentialsDeps,
): Promise<CredentialResult> {
  const header = getRequestHeader(request);
  const section = findMappingSectionWithProtocol(mapping, header);

  // Built before the store is touched so configuration errors fail fast
  const passwordExtractor = createExtractor('password', section);
  const usernameExtractor = createExtractor('username', section);

  const target = definePassTarget(section, request);
  const { env, passwordStoreDir } = computePassEnvironment(
    section,
    deps.env ?? process.env,
    deps.homeDir ?? os.homedir(),
  );

  if (deps.checkEntryFile ?? true) {
    await checkPasswordFile(passwordStoreDir, target);
  }

  logger.debug(`Requesting entry "${target}" from pass`);
  const content = await deps.store.show(target, env);
  const lines = decodeEntry(content, section.get('encoding') ?? DEFAULT_ENCODING, target);

  const credential: ExtractedCredential = {
    password: passwordExtractor.getValue(target, lines),
    username: usernameExtractor.getValue(target, lines),
  };

  return { target, credential, response: formatResponse(credential, request) };
}

/**
 * Response text for a `get` request.
 */
export async function getCredentials(
  request: CredentialRequest,
  mapping: MappingConfig,
  deps: GetCredentialsDeps,
): Promise<string> {
  const { response } = await resolveCredentials(request, mapping, deps);
  return response;
}
