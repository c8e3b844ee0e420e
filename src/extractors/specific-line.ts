import type { MappingSection } from '../mapping/config';
import { SkippingExtractor } from './base';
import type { OptionSuffix } from './types';

/**
 * Returns one line of the entry, counting from zero.
 *
 * Options: `line{suffix}`, `skip{suffix}`.
 */
export class SpecificLineExtractor extends SkippingExtractor {
  constructor(
    private line: number,
    prefixLength: number,
    optionSuffix: OptionSuffix = '',
  ) {
    super(prefixLength, optionSuffix);
  }

  configure(section: MappingSection): void {
    super.configure(section);
    this.line = section.getInt(this.option('line'), this.line);
  }

  protected getRaw(_entryName: string, entryLines: readonly string[]): string | undefined {
    if (entryLines.length > this.line) {
      return entryLines.at(this.line);
    }
    return undefined;
  }
}
