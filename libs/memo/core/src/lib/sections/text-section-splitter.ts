import { Injectable } from '@nestjs/common';
import { FALLBACK_SECTION_KEY, Outline, SectionMap } from '@special-sits/shared/types';
import { SectionExtractor, titleKey } from './section-extractor.interface';

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Splits normalized memo text into sections.
 *
 * A heading is any line that, ignoring surrounding whitespace, case and runs
 * of inner whitespace, equals one of the outline's titles. Headings may appear
 * in any order, optionally followed by a parenthetical annotation such as
 * "(if applicable)". A repeated heading overwrites the earlier section
 * (last match wins), so a table-of-contents preamble loses to the body.
 */
@Injectable()
export class TextSectionSplitter implements SectionExtractor<string> {
  extract(text: string, outline: Outline): SectionMap {
    const trimmed = text.trim();
    if (outline.titles.length === 0) {
      return { [FALLBACK_SECTION_KEY]: trimmed };
    }

    const matcher = this.buildMatcher(outline.titles);
    const matches = [...text.matchAll(matcher)];

    if (matches.length === 0) {
      return { [FALLBACK_SECTION_KEY]: trimmed };
    }

    const canonical = new Map(outline.titles.map((title) => [titleKey(title), title]));
    const sections: SectionMap = {};

    matches.forEach((match, index) => {
      const matchedTitle = match[1].trim();
      const start = (match.index ?? 0) + match[0].length;
      const next = matches[index + 1];
      const end = next ? next.index ?? text.length : text.length;

      const key = canonical.get(titleKey(matchedTitle)) ?? matchedTitle;
      // Re-assigning keeps the first-seen insertion position
      sections[key] = text.slice(start, end).trim();
    });

    return sections;
  }

  private buildMatcher(titles: string[]): RegExp {
    const alternatives = [...titles]
      .sort((a, b) => b.length - a.length)
      .map((title) => title.trim().split(/\s+/).map(escapeRegExp).join('[ \\t]+'));

    return new RegExp(`^[ \\t]*(${alternatives.join('|')})(?:[ \\t]*\\([^()\\n]*\\))?[ \\t]*$`, 'gim');
  }
}
