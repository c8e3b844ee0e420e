import { SpecificLineExtractor } from './specific-line';
import { SkippingExtractor } from './base';
import { parseMapping } from '../mapping/ini';
import { ErrorCode } from '../errors/types';

const LINES = ['line 1', 'user: bar', 'more lines'];

class FirstLineExtractor extends SkippingExtractor {
  protected getRaw(_entryName: string, entryLines: readonly string[]): string | undefined {
    return entryLines[0];
  }
}

describe('SkippingExtractor', () => {
  it('drops the configured number of characters', () => {
    expect(new FirstLineExtractor(4).getValue('foo', ['testthis'])).toBe('this');
  });

  it('yields an empty string when skipping past the end', () => {
    expect(new FirstLineExtractor(8).getValue('foo', ['testthis'])).toBe('');
    expect(new FirstLineExtractor(10).getValue('foo', ['testthis'])).toBe('');
  });
});

describe('SpecificLineExtractor', () => {
  it('returns the selected line without the skipped prefix', () => {
    expect(new SpecificLineExtractor(1, 6).getValue('foo', LINES)).toBe('bar');
  });

  it('returns undefined for a line out of range', () => {
    expect(new SpecificLineExtractor(3, 6).getValue('foo', LINES)).toBeUndefined();
  });

  it('reads line and skip options with its suffix', () => {
    const section = parseMapping(`
[host]
line_username = 2
skip_username = 5
line_password = 0
`).section('host');

    const extractor = new SpecificLineExtractor(1, 0, '_username');
    extractor.configure(section);
    expect(extractor.getValue('foo', LINES)).toBe('lines');
  });

  it('keeps constructor defaults for missing options', () => {
    const section = parseMapping('[host]\nskip_password = 6\n').section('host');

    const extractor = new SpecificLineExtractor(1, 0, '_username');
    extractor.configure(section);
    expect(extractor.getValue('foo', LINES)).toBe('user: bar');
  });

  it('rejects non-integer options', () => {
    const section = parseMapping('[host]\nline_password = first\n').section('host');

    const extractor = new SpecificLineExtractor(0, 0, '_password');
    expect(() => extractor.configure(section)).toThrow(
      expect.objectContaining({
        code: ErrorCode.INVALID_INTEGER,
        message: "Option line_password in section [host] must be an integer, got 'first'",
      }),
    );
  });
});
