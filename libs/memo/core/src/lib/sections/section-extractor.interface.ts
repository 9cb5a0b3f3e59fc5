import { Outline, SectionMap } from '@special-sits/shared/types';

/**
 * Recovers canonical title -> content from some representation of a memo.
 *
 * Implementations differ only in the input shape they read (flat text vs.
 * a rendered document's paragraph stream) and in how strictly they detect
 * headings; the SectionMap they return obeys the same contract, so callers
 * never need to know which one produced it.
 */
export interface SectionExtractor<TSource> {
  extract(source: TSource, outline: Outline): SectionMap;
}

/** Case- and whitespace-insensitive comparison key for titles */
export const titleKey = (title: string): string =>
  title.trim().replace(/\s+/g, ' ').toLowerCase();
