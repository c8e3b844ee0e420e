/**
 * Extractor types.
 *
 * An extractor pulls one value (password or username) out of a decrypted
 * pass entry. Each extractor reads its options from the matched mapping
 * section, with option names carrying the extractor's suffix
 * (`line_password`, `regex_username`, ...) so that the password and the
 * username extractor can be configured from the same section.
 */

import type { MappingSection } from '../mapping/config';

export type ExtractorName = 'specific_line' | 'regex_search' | 'entry_name' | 'static';

export type OptionSuffix = '' | '_password' | '_username';

export interface DataExtractor {
  /** Read this extractor's options from the section, keeping defaults for missing keys. */
  configure(section: MappingSection): void;

  /** Extracted value, or undefined if the entry holds nothing applicable. */
  getValue(entryName: string, entryLines: readonly string[]): string | undefined;
}
