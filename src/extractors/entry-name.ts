import { BaseExtractor } from './base';

/**
 * Uses the last path segment of the entry name, e.g. the user name in
 * `git/example.com/alice`. The entry content is not looked at.
 */
export class EntryNameExtractor extends BaseExtractor {
  configure(): void {
    // no options
  }

  getValue(entryName: string): string | undefined {
    return entryName.substring(entryName.lastIndexOf('/') + 1);
  }
}
