import { toAppError } from '../errors/handler';
import { AppError, ErrorCode } from '../errors/types';
import type { MappingSection } from '../mapping/config';
import { BaseExtractor } from './base';
import type { OptionSuffix } from './types';

/** Number of capture groups in a compiled expression. */
export function countCaptureGroups(regex: RegExp): number {
  // an empty alternative always matches, with every group unset
  const probe = new RegExp(`${regex.source}|`);
  const match = probe.exec('');
  return match ? match.length - 1 : 0;
}

/**
 * Compile a pattern that must contain exactly one capture group.
 *
 * The expression is sticky so that, like a line prefix match, it only
 * matches from the start of a line.
 */
export function buildMatcher(pattern: string): RegExp {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern, 'y');
  } catch (error) {
    const reason = toAppError(error).message;
    throw new AppError(
      `Provided regex "${pattern}" is invalid: ${reason}`,
      ErrorCode.INVALID_REGEX,
      { pattern },
    );
  }

  if (countCaptureGroups(regex) !== 1) {
    throw new AppError(
      `Provided regex "${pattern}" must contain a single capture group for the value to return.`,
      ErrorCode.INVALID_REGEX,
      { pattern },
    );
  }
  return regex;
}

/**
 * Returns the capture group of the first line matching the expression.
 *
 * Option: `regex{suffix}`.
 */
export class RegexSearchExtractor extends BaseExtractor {
  private regex: RegExp;

  constructor(
    private currentPattern: string,
    optionSuffix: OptionSuffix = '',
  ) {
    super(optionSuffix);
    this.regex = buildMatcher(currentPattern);
  }

  configure(section: MappingSection): void {
    const pattern = section.get(this.option('regex')) ?? this.currentPattern;
    this.regex = buildMatcher(pattern);
    this.currentPattern = pattern;
  }

  getValue(_entryName: string, entryLines: readonly string[]): string | undefined {
    for (const line of entryLines) {
      this.regex.lastIndex = 0;
      const match = this.regex.exec(line);
      if (match) {
        return match[1];
      }
    }
    return undefined;
  }
}
