/**
 * Parsed mapping configuration.
 *
 * Sections keep the order of the file. Values of the DEFAULT section are
 * looked up explicitly as the second level of every section lookup.
 */

import { AppError, ErrorCode } from '../errors/types';

export type SectionValues = ReadonlyMap<string, string>;

export class MappingSection {
  constructor(
    readonly name: string,
    private readonly values: SectionValues,
    private readonly defaults: SectionValues,
  ) {}

  /** Section value, else DEFAULT value, else undefined. */
  get(key: string): string | undefined {
    return this.values.get(key) ?? this.defaults.get(key);
  }

  getInt(key: string, fallback: number): number {
    const raw = this.get(key);
    if (raw === undefined) {
      return fallback;
    }
    const trimmed = raw.trim();
    if (!/^[+-]?\d+$/.test(trimmed)) {
      throw new AppError(
        `Option ${key} in section [${this.name}] must be an integer, got '${raw}'`,
        ErrorCode.INVALID_INTEGER,
        { section: this.name, key, value: raw },
      );
    }
    return Number.parseInt(trimmed, 10);
  }
}

export class MappingConfig {
  constructor(
    private readonly entries: ReadonlyArray<readonly [string, SectionValues]>,
    private readonly defaults: SectionValues = new Map(),
  ) {}

  /** Section names in file order, without DEFAULT. */
  sections(): string[] {
    return this.entries.map(([name]) => name);
  }

  section(name: string): MappingSection {
    const entry = this.entries.find(([sectionName]) => sectionName === name);
    if (!entry) {
      throw new AppError(`No section named [${name}]`, ErrorCode.NO_MAPPING_SECTION, { section: name });
    }
    return new MappingSection(name, entry[1], this.defaults);
  }
}
