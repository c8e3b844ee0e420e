/**
 * Extractor selection.
 *
 * The mapping section names the strategy for each value
 * (`password_extractor`, `username_extractor`); fresh instances are built
 * per lookup so no configuration leaks from one section to the next.
 */

import { AppError, ErrorCode } from '../errors/types';
import type { MappingSection } from '../mapping/config';
import { EntryNameExtractor } from './entry-name';
import { RegexSearchExtractor } from './regex-search';
import { SpecificLineExtractor } from './specific-line';
import { StaticValueExtractor } from './static-value';
import type { DataExtractor, ExtractorName } from './types';

export const DEFAULT_EXTRACTOR: ExtractorName = 'specific_line';

type ExtractorFactory = () => DataExtractor;

const PASSWORD_EXTRACTORS: ReadonlyMap<string, ExtractorFactory> = new Map<string, ExtractorFactory>([
  ['specific_line', () => new SpecificLineExtractor(0, 0, '_password')],
  ['regex_search', () => new RegexSearchExtractor('^password: +(.*)$', '_password')],
  ['entry_name', () => new EntryNameExtractor('_password')],
]);

const USERNAME_EXTRACTORS: ReadonlyMap<string, ExtractorFactory> = new Map<string, ExtractorFactory>([
  ['specific_line', () => new SpecificLineExtractor(1, 0, '_username')],
  ['regex_search', () => new RegexSearchExtractor('^username: +(.*)$', '_username')],
  ['entry_name', () => new EntryNameExtractor('_username')],
  ['static', () => new StaticValueExtractor()],
]);

export type ExtractorRole = 'password' | 'username';

function registryFor(role: ExtractorRole): ReadonlyMap<string, ExtractorFactory> {
  return role === 'password' ? PASSWORD_EXTRACTORS : USERNAME_EXTRACTORS;
}

/** Extractor names available for a role. */
export function extractorNames(role: ExtractorRole): string[] {
  return [...registryFor(role).keys()];
}

/**
 * Build the extractor a section selects for a role and configure it from
 * that section.
 */
export function createExtractor(role: ExtractorRole, section: MappingSection): DataExtractor {
  const key = `${role}_extractor`;
  const name = section.get(key) ?? DEFAULT_EXTRACTOR;

  const factory = registryFor(role).get(name);
  if (!factory) {
    throw new AppError(
      `${key} of type '${name}' does not exist`,
      ErrorCode.UNKNOWN_EXTRACTOR,
      { key, name, available: extractorNames(role) },
    );
  }

  const extractor = factory();
  extractor.configure(section);
  return extractor;
}
