/**
 * Barrel export for extractor types, strategies and selection.
 */

export type { DataExtractor, ExtractorName, OptionSuffix } from './types';

export { BaseExtractor, SkippingExtractor } from './base';
export { SpecificLineExtractor } from './specific-line';
export { RegexSearchExtractor, buildMatcher, countCaptureGroups } from './regex-search';
export { EntryNameExtractor } from './entry-name';
export { StaticValueExtractor } from './static-value';

export { createExtractor, extractorNames, DEFAULT_EXTRACTOR } from './factory';
export type { ExtractorRole } from './factory';
