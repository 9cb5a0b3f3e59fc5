import JSZip from 'jszip';

const W_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';

/** `<w:p>` holding one run of plain text */
export const textParagraph = (text: string): string =>
  `<w:p><w:r><w:t xml:space="preserve">${text}</w:t></w:r></w:p>`;

/**
 * Minimal .docx package whose body is the given paragraph XML. Only
 * word/document.xml is filled in; the readers here need nothing else.
 */
export async function buildDocxFixture(bodyXml: string[]): Promise<Buffer> {
  const zip = new JSZip();
  zip.file(
    'word/document.xml',
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
      `<w:document xmlns:w="${W_NS}"><w:body>${bodyXml.join('')}<w:sectPr/></w:body></w:document>`
  );
  return zip.generateAsync({ type: 'nodebuffer' });
}
