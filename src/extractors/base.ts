import type { MappingSection } from '../mapping/config';
import type { DataExtractor, OptionSuffix } from './types';

export abstract class BaseExtractor implements DataExtractor {
  constructor(protected readonly optionSuffix: OptionSuffix = '') {}

  /** Full option name for this extractor, e.g. `skip` → `skip_username`. */
  protected option(name: string): string {
    return `${name}${this.optionSuffix}`;
  }

  abstract configure(section: MappingSection): void;

  abstract getValue(entryName: string, entryLines: readonly string[]): string | undefined;
}

/**
 * Extractor that drops a fixed number of leading characters from the raw
 * value it finds.
 */
export abstract class SkippingExtractor extends BaseExtractor {
  constructor(
    protected prefixLength: number,
    optionSuffix: OptionSuffix = '',
  ) {
    super(optionSuffix);
  }

  configure(section: MappingSection): void {
    this.prefixLength = section.getInt(this.option('skip'), this.prefixLength);
  }

  protected abstract getRaw(entryName: string, entryLines: readonly string[]): string | undefined;

  getValue(entryName: string, entryLines: readonly string[]): string | undefined {
    const raw = this.getRaw(entryName, entryLines);
    return raw === undefined ? undefined : raw.slice(this.prefixLength);
  }
}
