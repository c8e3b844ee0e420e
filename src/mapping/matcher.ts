/**
 * Selection of the mapping section that applies to a credential request.
 *
 * Section names are shell-style glob patterns matched against the request
 * header (`protocol://host/path`). Sections are tried in file order and the
 * first match wins.
 */

import { AppError, ErrorCode } from '../errors/types';
import type { CredentialRequest } from '../protocol/request';
import { logger } from '../utils/logger';
import type { MappingConfig, MappingSection } from './config';

const PROTOCOL_SEPARATOR = '://';

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * Translate a glob pattern into an anchored regular expression source.
 *
 * `*` also matches `/`, unlike path globs: a section `*.example.com*`
 * covers every repository path below the host.
 */
export function translateGlob(pattern: string): string {
  let result = '';
  let i = 0;
  const n = pattern.length;

  while (i < n) {
    const c = pattern[i];
    i++;
    if (c === '*') {
      // collapse runs of stars
      while (pattern[i] === '*') i++;
      result += '[\\s\\S]*';
    } else if (c === '?') {
      result += '[\\s\\S]';
    } else if (c === '[') {
      let j = i;
      if (pattern[j] === '!') j++;
      if (pattern[j] === ']') j++;
      while (j < n && pattern[j] !== ']') j++;
      if (j >= n) {
        result += '\\[';
      } else {
        let set = pattern.substring(i, j);
        i = j + 1;
        let negate = false;
        if (set.startsWith('!')) {
          negate = true;
          set = set.substring(1);
        }
        set = set.replace(/[\\\]^]/g, '\\$&');
        result += negate ? `[^${set}]` : `[${set}]`;
      }
    } else {
      result += escapeRegex(c);
    }
  }

  return `^${result}$`;
}

/**
 * Case-sensitive full-string glob match.
 */
export function fnmatch(name: string, pattern: string): boolean {
  let regex: RegExp;
  try {
    regex = new RegExp(translateGlob(pattern));
  } catch {
    // e.g. a reversed range such as [z-a]; compare literally
    return name === pattern;
  }
  return regex.test(name);
}

/**
 * Canonical header of a request: `[protocol://]host[/path]`.
 */
export function getRequestHeader(request: CredentialRequest): string {
  const host = request.host;
  if (host === undefined) {
    logger.error('host= entry missing in request. Cannot query without a host');
    throw new AppError('Request lacks host entry', ErrorCode.MISSING_HOST);
  }

  let header = host;
  if (request.path !== undefined) {
    header = `${header}/${request.path}`;
  }
  if (request.protocol !== undefined) {
    header = `${request.protocol}${PROTOCOL_SEPARATOR}${header}`;
  }
  return header;
}

export function stripProtocol(header: string): string {
  const index = header.indexOf(PROTOCOL_SEPARATOR);
  return index < 0 ? header : header.substring(index + PROTOCOL_SEPARATOR.length);
}

/**
 * Header without its path part, or null when it has no path.
 * `https://example.com/org/repo.git` → `https://example.com`
 */
export function stripPath(header: string): string | null {
  const protocolIndex = header.indexOf(PROTOCOL_SEPARATOR);
  const hostStart = protocolIndex < 0 ? 0 : protocolIndex + PROTOCOL_SEPARATOR.length;
  const slash = header.indexOf('/', hostStart);
  return slash < 0 ? null : header.substring(0, slash);
}

function headerCandidates(header: string): string[] {
  const candidates = [header, `${header}/`];
  const bareHost = stripPath(header);
  if (bareHost !== null) {
    candidates.push(bareHost);
  }
  return candidates;
}

export function sectionMatches(pattern: string, header: string): boolean {
  return headerCandidates(header).some((candidate) => fnmatch(candidate, pattern));
}

/**
 * First section, in file order, whose pattern matches the header.
 */
export function findMappingSection(mapping: MappingConfig, header: string): MappingSection {
  logger.debug(`Searching mapping to match against header "${header}"`);

  for (const name of mapping.sections()) {
    if (sectionMatches(name, header)) {
      logger.debug(`Section "${name}" matches requested header "${header}"`);
      return mapping.section(name);
    }
  }

  const known = mapping.sections();
  throw new AppError(
    `No mapping section in [${known.map((name) => `'${name}'`).join(', ')}] matches request ${header}`,
    ErrorCode.NO_MAPPING_SECTION,
    { header, sections: known },
  );
}

/**
 * Match the full header first; if nothing matches, retry once with the
 * protocol prefix removed. The passes are independent: the second one only
 * runs when the first found nothing.
 */
export function findMappingSectionWithProtocol(mapping: MappingConfig, header: string): MappingSection {
  try {
    return findMappingSection(mapping, header);
  } catch (error) {
    const withoutProtocol = stripProtocol(header);
    if (withoutProtocol === header || !(error instanceof AppError) || error.code !== ErrorCode.NO_MAPPING_SECTION) {
      throw error;
    }
    return findMappingSection(mapping, withoutProtocol);
  }
}
