import { Injectable } from '@nestjs/common';
import { AlignmentType, Document, Packer, Paragraph, TextRun } from 'docx';
import { SectionMap } from '@special-sits/shared/types';

export const MEMO_FONT = 'Aptos Display';

// docx measures font sizes in half-points and spacing/margins in twips
const BODY_FONT_SIZE = 22; // 11pt
const TITLE_FONT_SIZE = 40; // 20pt
const HEADING_FONT_SIZE = 28; // 14pt
const BODY_SPACE_AFTER = 200; // 10pt
const BODY_LINE_SPACING = 360; // 1.5 lines
const PAGE_MARGIN = 1080; // 0.75in

export type MemoParagraph =
  | { kind: 'title'; text: string }
  | { kind: 'spacer' }
  | { kind: 'heading'; text: string }
  | { kind: 'body'; lines: string[] };

export const buildMemoTitle = (companyName: string, situationType: string): string =>
  `${companyName} – ${situationType} Investment Memo`;

@Injectable()
export class MemoDocumentRenderer {
  /**
   * Paragraph plan for a memo: title, spacer, then per section a heading,
   * one body paragraph per blank-line block and a trailing spacer.
   */
  layout(sections: SectionMap, companyName: string, situationType: string): MemoParagraph[] {
    const paragraphs: MemoParagraph[] = [
      { kind: 'title', text: buildMemoTitle(companyName, situationType) },
      { kind: 'spacer' },
    ];

    for (const [title, content] of Object.entries(sections)) {
      paragraphs.push({ kind: 'heading', text: title });
      for (const block of content.trim().split('\n\n')) {
        const text = block.trim();
        if (text) {
          paragraphs.push({ kind: 'body', lines: text.split('\n') });
        }
      }
      paragraphs.push({ kind: 'spacer' });
    }

    return paragraphs;
  }

  render(sections: SectionMap, companyName: string, situationType: string): Document {
    const children = this.layout(sections, companyName, situationType).map((paragraph) =>
      this.toDocxParagraph(paragraph)
    );

    return new Document({
      title: buildMemoTitle(companyName, situationType),
      styles: {
        default: {
          document: {
            run: { font: MEMO_FONT, size: BODY_FONT_SIZE },
          },
        },
      },
      sections: [
        {
          properties: {
            page: {
              margin: { top: PAGE_MARGIN, right: PAGE_MARGIN, bottom: PAGE_MARGIN, left: PAGE_MARGIN },
            },
          },
          children,
        },
      ],
    });
  }

  async renderToBuffer(sections: SectionMap, companyName: string, situationType: string): Promise<Buffer> {
    return Packer.toBuffer(this.render(sections, companyName, situationType));
  }

  private toDocxParagraph(paragraph: MemoParagraph): Paragraph {
    switch (paragraph.kind) {
      case 'title':
        return new Paragraph({
          alignment: AlignmentType.CENTER,
          children: [
            new TextRun({ text: paragraph.text, bold: true, font: MEMO_FONT, size: TITLE_FONT_SIZE }),
          ],
        });
      case 'spacer':
        return new Paragraph({});
      case 'heading':
        return new Paragraph({
          children: [new TextRun({ text: paragraph.text, bold: true, size: HEADING_FONT_SIZE })],
        });
      case 'body':
        return new Paragraph({
          spacing: { after: BODY_SPACE_AFTER, line: BODY_LINE_SPACING },
          // Single newlines inside a block become line breaks within the paragraph
          children: paragraph.lines.map(
            (line, index) => new TextRun({ text: line, break: index > 0 ? 1 : undefined })
          ),
        });
    }
  }
}
