import { z } from 'zod';
import {
  SituationType,
  Outline,
  OutlineEntry,
  isSituationType,
} from '@special-sits/shared/types';
import { UnsupportedSituationError } from '../errors/memo-errors';
import templates from './outline-templates.json';

const templateSchema = z.object({
  requiresValuation: z.boolean(),
  sections: z
    .array(
      z.object({
        heading: z.string().min(1),
        hints: z.array(z.string()),
      })
    )
    .min(1),
});

const templatesSchema = z.record(z.string(), templateSchema);

/**
 * Parenthetical note after the title, e.g. "(if applicable)", or '' when none
 */
function annotationOf(heading: string): string {
  const open = heading.indexOf('(');
  return open === -1 ? '' : heading.slice(open).trim();
}

/**
 * Canonical title of a heading line: text before any parenthetical annotation.
 * "Buyback Analysis (if applicable)" -> "Buyback Analysis"
 */
export function toCanonicalTitle(heading: string): string {
  return heading.split('(')[0].trim();
}

function buildOutline(
  situationType: SituationType,
  template: z.infer<typeof templateSchema>
): Outline {
  const entries: OutlineEntry[] = template.sections.map((section) => ({
    heading: section.heading.trim(),
    title: toCanonicalTitle(section.heading),
    hints: section.hints.map((hint) => hint.trim()).filter(Boolean),
  }));

  const seen = new Set<string>();
  for (const { title } of entries) {
    const key = title.toLowerCase();
    if (seen.has(key)) {
      throw new Error(`Duplicate section title "${title}" in outline for ${situationType}`);
    }
    seen.add(key);
  }

  // The prompt shows canonical titles only; annotations become hint lines
  const structure = entries
    .map((entry) => {
      const annotation = annotationOf(entry.heading);
      const hints = annotation ? [annotation, ...entry.hints] : entry.hints;
      return [entry.title, ...hints.map((hint) => `  - ${hint}`)].join('\n');
    })
    .join('\n');

  return {
    situationType,
    entries,
    titles: entries.map((entry) => entry.title),
    requiresValuation: template.requiresValuation,
    structure,
  };
}

function loadOutlines(): ReadonlyMap<SituationType, Outline> {
  const parsed = templatesSchema.parse(templates);
  const outlines = new Map<SituationType, Outline>();

  for (const situationType of Object.values(SituationType)) {
    const template = parsed[situationType];
    if (!template) {
      throw new Error(`Missing outline template for ${situationType}`);
    }
    outlines.set(situationType, buildOutline(situationType, template));
  }

  return outlines;
}

// Built once at load; outlines are never mutated afterwards
const OUTLINES = loadOutlines();

export function getOutline(situationType: string): Outline {
  const outline = isSituationType(situationType) ? OUTLINES.get(situationType) : undefined;
  if (!outline) {
    throw new UnsupportedSituationError(situationType);
  }
  return outline;
}

export function listOutlines(): Outline[] {
  return [...OUTLINES.values()];
}

export function listSituationTypes(): SituationType[] {
  return [...OUTLINES.keys()];
}
