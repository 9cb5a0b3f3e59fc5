import { Injectable } from '@nestjs/common';
import JSZip from 'jszip';
import { XMLParser } from 'fast-xml-parser';

const DOCUMENT_PART = 'word/document.xml';

type XmlNode = Record<string, unknown>;

const isXmlNode = (value: unknown): value is XmlNode =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const childrenOf = (value: unknown): XmlNode[] =>
  Array.isArray(value) ? value.filter(isXmlNode) : [];

/**
 * Reads the body paragraphs of a .docx package in document order.
 *
 * Each paragraph's text is the concatenation of its runs' `w:t` text, with
 * `w:tab` read as a tab and `w:br`/`w:cr` as a newline. Paragraphs nested in
 * tables are included where they appear.
 */
@Injectable()
export class DocxParagraphReader {
  private readonly parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: true,
    parseTagValue: false,
    trimValues: false,
  });

  async readParagraphs(buffer: Buffer): Promise<string[]> {
    const zip = await JSZip.loadAsync(buffer);
    const part = zip.file(DOCUMENT_PART);
    if (!part) {
      throw new Error(`Not a Word document: ${DOCUMENT_PART} is missing`);
    }

    const xml = await part.async('string');
    const tree: unknown = this.parser.parse(xml);

    const paragraphs: string[] = [];
    this.collectParagraphs(childrenOf(tree), paragraphs);
    return paragraphs;
  }

  private collectParagraphs(nodes: XmlNode[], paragraphs: string[]): void {
    for (const node of nodes) {
      for (const [tag, value] of Object.entries(node)) {
        if (tag === 'w:p') {
          paragraphs.push(this.textOf(childrenOf(value)));
        } else if (tag !== '#text' && tag !== ':@') {
          this.collectParagraphs(childrenOf(value), paragraphs);
        }
      }
    }
  }

  private textOf(nodes: XmlNode[]): string {
    let text = '';
    for (const node of nodes) {
      for (const [tag, value] of Object.entries(node)) {
        switch (tag) {
          case 'w:t':
            text += childrenOf(value)
              .map((child) => child['#text'])
              .filter((part): part is string | number => typeof part === 'string' || typeof part === 'number')
              .join('');
            break;
          case 'w:tab':
            text += '\t';
            break;
          case 'w:br':
          case 'w:cr':
            text += '\n';
            break;
          case '#text':
          case ':@':
          case 'w:pPr':
          case 'w:rPr':
            break;
          default:
            text += this.textOf(childrenOf(value));
        }
      }
    }
    return text;
  }
}
