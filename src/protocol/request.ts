/**
 * Git credential protocol: request parsing and response formatting.
 *
 * Requests are `key=value` lines terminated by end of input. Only blank
 * lines are tolerated; anything else without a `=` is a protocol violation.
 */

import { AppError, ErrorCode } from '../errors/types';

/**
 * Every field git sent. `host`, `protocol`, `path` and `username` are
 * consulted; other keys are kept but ignored.
 */
export type CredentialRequest = Readonly<Partial<Record<string, string>>>;

export interface ExtractedCredential {
  password?: string;
  username?: string;
}

/**
 * Parse `key=value` lines of a credential request.
 */
export function parseRequest(input: string): CredentialRequest {
  const request: Record<string, string> = {};

  for (const line of input.split(/\r?\n/)) {
    if (!line.trim()) continue;

    const eqIndex = line.indexOf('=');
    if (eqIndex < 0) {
      throw new AppError(
        `expected 'key=value', got '${line.trim()}'`,
        ErrorCode.PROTOCOL_ERROR,
        { line: line.trim() },
      );
    }
    request[line.substring(0, eqIndex).trim()] = line.substring(eqIndex + 1).trim();
  }

  return request;
}

/**
 * Format the response lines for git.
 *
 * Empty values count as absent. The username is only returned when git did
 * not already send one.
 */
export function formatResponse(credential: ExtractedCredential, request: CredentialRequest): string {
  const lines: string[] = [];
  if (credential.password) {
    lines.push(`password=${credential.password}`);
  }
  if (request.username === undefined && credential.username) {
    lines.push(`username=${credential.username}`);
  }
  return lines.map((line) => `${line}\n`).join('');
}
