import type { MappingSection } from '../mapping/config';
import { BaseExtractor } from './base';

/**
 * Returns the section's `username` option as is. Only offered for
 * usernames.
 */
export class StaticValueExtractor extends BaseExtractor {
  private value: string | undefined;

  constructor(private readonly key: string = 'username') {
    super('');
  }

  configure(section: MappingSection): void {
    this.value = section.get(this.key);
  }

  getValue(): string | undefined {
    return this.value;
  }
}
