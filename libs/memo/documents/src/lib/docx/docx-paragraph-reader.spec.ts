import JSZip from 'jszip';
import { DocxParagraphReader } from './docx-paragraph-reader';
import { buildDocxFixture, textParagraph } from '../../test-utils/docx-fixture';

describe('DocxParagraphReader', () => {
  const reader = new DocxParagraphReader();

  it('should return paragraph texts in document order', async () => {
    const buffer = await buildDocxFixture([textParagraph('Deal Summary'), textParagraph('Cash offer.')]);

    await expect(reader.readParagraphs(buffer)).resolves.toEqual(['Deal Summary', 'Cash offer.']);
  });

  it('should concatenate runs and keep surrounding spaces', async () => {
    const buffer = await buildDocxFixture([
      '<w:p><w:r><w:rPr><w:b/></w:rPr><w:t>Net </w:t></w:r><w:r><w:t xml:space="preserve"> debt</w:t></w:r></w:p>',
    ]);

    await expect(reader.readParagraphs(buffer)).resolves.toEqual(['Net  debt']);
  });

  it('should read tabs and line breaks', async () => {
    const buffer = await buildDocxFixture([
      '<w:p><w:r><w:t>EV</w:t><w:tab/><w:t>10x</w:t></w:r><w:r><w:br/><w:t>second line</w:t></w:r></w:p>',
    ]);

    await expect(reader.readParagraphs(buffer)).resolves.toEqual(['EV\t10x\nsecond line']);
  });

  it('should decode XML entities and keep numeric text as text', async () => {
    const buffer = await buildDocxFixture([textParagraph('Mergers &amp; Acquisitions'), textParagraph('2025')]);

    await expect(reader.readParagraphs(buffer)).resolves.toEqual(['Mergers & Acquisitions', '2025']);
  });

  it('should return empty strings for empty paragraphs', async () => {
    const buffer = await buildDocxFixture(['<w:p/>', '<w:p><w:pPr><w:jc/></w:pPr></w:p>', textParagraph('x')]);

    await expect(reader.readParagraphs(buffer)).resolves.toEqual(['', '', 'x']);
  });

  it('should include paragraphs nested in tables', async () => {
    const buffer = await buildDocxFixture([
      textParagraph('before'),
      `<w:tbl><w:tr><w:tc>${textParagraph('cell')}</w:tc></w:tr></w:tbl>`,
      textParagraph('after'),
    ]);

    await expect(reader.readParagraphs(buffer)).resolves.toEqual(['before', 'cell', 'after']);
  });

  it('should read text inside hyperlinks', async () => {
    const buffer = await buildDocxFixture([
      '<w:p><w:r><w:t xml:space="preserve">See </w:t></w:r><w:hyperlink><w:r><w:t>filing</w:t></w:r></w:hyperlink></w:p>',
    ]);

    await expect(reader.readParagraphs(buffer)).resolves.toEqual(['See filing']);
  });

  it('should reject a zip without a document part', async () => {
    const zip = new JSZip();
    zip.file('readme.txt', 'not a word file');
    const buffer = await zip.generateAsync({ type: 'nodebuffer' });

    await expect(reader.readParagraphs(buffer)).rejects.toThrow('Not a Word document: word/document.xml is missing');
  });

  it('should reject bytes that are not a zip archive', async () => {
    await expect(reader.readParagraphs(Buffer.from('plain text'))).rejects.toThrow();
  });
});
