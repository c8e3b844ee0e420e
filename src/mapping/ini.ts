/**
 * INI reader for mapping files.
 *
 * Understands the subset of INI that mapping files are written in:
 * - `[section]` headers, kept verbatim since they are glob patterns
 * - `key = value` and `key: value`, split on the first delimiter
 * - `#` and `;` comment lines, blank lines
 * - continuation lines indented deeper than their key, joined to the
 *   previous value with `\n`;
 *   blank lines between a value and its continuation stay in the value
 *
 * Keys are case-insensitive and stored lower-cased. There is no value
 * interpolation: `${host}` and `%` are ordinary characters.
 */

import { DEFAULT_SECTION } from '../constants';
import { AppError, ErrorCode } from '../errors/types';
import { MappingConfig } from './config';

const SECTION_PATTERN = /^\[(.+)\]/;

function parseError(source: string, lineNumber: number, message: string): AppError {
  return new AppError(
    `${source}, line ${lineNumber}: ${message}`,
    ErrorCode.MAPPING_PARSE_ERROR,
    { source, line: lineNumber },
  );
}

function findDelimiter(line: string): number {
  const equals = line.indexOf('=');
  const colon = line.indexOf(':');
  if (equals < 0) return colon;
  if (colon < 0) return equals;
  return Math.min(equals, colon);
}

export function parseMapping(text: string, source: string = '<string>'): MappingConfig {
  const sections: Array<[string, Map<string, string>]> = [];
  const defaults = new Map<string, string>();

  let current: Map<string, string> | null = null;
  let lastKey: string | null = null;
  let keyIndent = 0;
  let pendingBlankLines = 0;

  const lines = text.split(/\r\n|\r|\n/);
  lines.forEach((rawLine, index) => {
    const lineNumber = index + 1;
    const stripped = rawLine.trim();
    const indent = rawLine.length - rawLine.trimStart().length;

    if (!stripped) {
      if (lastKey !== null) pendingBlankLines++;
      return;
    }
    if (stripped.startsWith('#') || stripped.startsWith(';')) {
      return;
    }

    // Continuation of a multi-line value: indented deeper than its key
    if (current && lastKey !== null && indent > keyIndent) {
      const previous = current.get(lastKey) ?? '';
      const separator = '\n'.repeat(pendingBlankLines + 1);
      current.set(lastKey, previous ? `${previous}${separator}${stripped}` : stripped);
      pendingBlankLines = 0;
      return;
    }
    pendingBlankLines = 0;

    const header = SECTION_PATTERN.exec(stripped);
    if (header) {
      const name = header[1];
      if (name === DEFAULT_SECTION) {
        current = defaults;
      } else {
        if (sections.some(([existing]) => existing === name)) {
          throw parseError(source, lineNumber, `section [${name}] already exists`);
        }
        current = new Map<string, string>();
        sections.push([name, current]);
      }
      lastKey = null;
      return;
    }

    if (!current) {
      throw parseError(source, lineNumber, `option outside of any section: '${stripped}'`);
    }

    const delimiter = findDelimiter(stripped);
    if (delimiter <= 0) {
      throw parseError(source, lineNumber, `expected 'key = value', got '${stripped}'`);
    }

    const key = stripped.substring(0, delimiter).trim().toLowerCase();
    if (current.has(key)) {
      throw parseError(source, lineNumber, `option '${key}' already exists in this section`);
    }
    current.set(key, stripped.substring(delimiter + 1).trim());
    lastKey = key;
    keyIndent = indent;
  });

  return new MappingConfig(sections, defaults);
}
