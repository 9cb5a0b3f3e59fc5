/**
 * Markdown Normalizer
 *
 * Turns chat-model markdown into the plain structured text the section
 * splitter reads: headings become bare lines, emphasis/code/links are
 * unwrapped, images and horizontal rules disappear, list dashes become "• ".
 *
 * Pass order matters; later patterns assume earlier ones already ran.
 */

type Pass = (text: string) => string;

const HORIZONTAL_RULE = /^[ \t]*(?:[-*][ \t]*){3,}$/gm;
const HEADING_MARKER = /^[ \t]*(?:#+[ \t]+)+/gm;
const BOLD = /\*\*(?!\s)([^\n]+?)(?<!\s)\*\*/g;
const ITALIC = /\*(?!\s)([^*\n]+?)(?<!\s)\*/g;
const FENCED_CODE = /```(?:[\w+-]*\n)?([\s\S]*?)```/g;
const INLINE_CODE = /`([^`\n]+)`/g;
const IMAGE = /!\[[^\]]*\]\([^)]*\)/g;
const LINK = /\[([^\]]+)\]\([^)]+\)/g;
const TRAILING_WHITESPACE = /[ \t]+$/gm;
const EXCESS_BLANK_LINES = /\n{3,}/g;
const LIST_MARKER = /^([ \t]*)[-*][ \t]+/gm;

const PASSES: Pass[] = [
  (text) => text.replace(HORIZONTAL_RULE, ''),
  (text) => text.replace(HEADING_MARKER, ''),
  (text) => text.replace(BOLD, '$1'),
  (text) => text.replace(ITALIC, '$1'),
  (text) => text.replace(FENCED_CODE, '$1'),
  (text) => text.replace(INLINE_CODE, '$1'),
  (text) => text.replace(IMAGE, ''),
  (text) => text.replace(LINK, '$1'),
  (text) => text.replace(TRAILING_WHITESPACE, ''),
  (text) => text.replace(EXCESS_BLANK_LINES, '\n\n'),
  (text) => text.replace(LIST_MARKER, '$1• '),
  (text) => text.trim(),
];

function runPasses(text: string): string {
  return PASSES.reduce((current, pass) => pass(current), text);
}

/**
 * Pure and total. The pass sequence repeats until the text stops changing,
 * so normalizeMarkdown(normalizeMarkdown(x)) === normalizeMarkdown(x).
 *
 * Terminates: every pass that changes the text either shortens it or turns a
 * "-"/"*" into "•" without lengthening it.
 */
export function normalizeMarkdown(text: string): string {
  let current = text.replace(/\r\n?/g, '\n');

  for (;;) {
    const next = runPasses(current);
    if (next === current) {
      return next;
    }
    current = next;
  }
}
