import { Injectable } from '@nestjs/common';
import { Outline, SectionMap } from '@special-sits/shared/types';
import { SectionExtractor } from './section-extractor.interface';

/** Separator between paragraphs inside a section's content */
export const PARAGRAPH_SEPARATOR = '\n\n';

/**
 * Rebuilds sections from a rendered document's paragraph stream.
 *
 * Stricter than TextSectionSplitter: a paragraph is a heading only when its
 * whole trimmed, lower-cased text equals a lower-cased outline title.
 * Paragraphs before the first heading are dropped and blank paragraphs are
 * skipped. A repeated heading overwrites the earlier section.
 */
@Injectable()
export class DocumentSectionExtractor implements SectionExtractor<readonly string[]> {
  extract(paragraphs: readonly string[], outline: Outline): SectionMap {
    const sections: SectionMap = {};
    if (outline.titles.length === 0) {
      return sections;
    }

    const headings = new Map(outline.titles.map((title) => [title.trim().toLowerCase(), title]));

    let currentHeading: string | null = null;
    let buffer: string[] = [];

    const flush = () => {
      if (currentHeading !== null) {
        sections[currentHeading] = buffer.join(PARAGRAPH_SEPARATOR).trim();
      }
    };

    for (const paragraph of paragraphs) {
      const text = paragraph.trim();
      if (!text) continue;

      const heading = headings.get(text.toLowerCase());
      if (heading !== undefined) {
        flush();
        currentHeading = heading;
        buffer = [];
      } else if (currentHeading !== null) {
        buffer.push(text);
      }
    }

    flush();
    return sections;
  }
}
