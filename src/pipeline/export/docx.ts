import { Document, HeadingLevel, Packer, Paragraph, TextRun } from 'docx';
import { ExportEncodingError, errorMessage } from '../errors';
import type { Transcript } from '../types';
import { DOCUMENT_TITLE, documentParagraphs, xmlSafe, type DocParagraph } from './shared';

function textRuns(text: string): TextRun[] {
  return xmlSafe(text)
    .split('\n')
    .map((line, i) => new TextRun(i === 0 ? { text: line } : { text: line, break: 1 }));
}

function toParagraph(p: DocParagraph): Paragraph {
  const children: TextRun[] = [];
  if (p.speaker) {
    children.push(new TextRun({ text: `${xmlSafe(p.speaker)}: `, bold: true }));
  }
  children.push(new TextRun({ text: `${p.range} `, color: '666666' }));
  children.push(...textRuns(p.text));
  return new Paragraph({ children, spacing: { after: 120 } });
}

/**
 * Word document, one paragraph per segment: bold speaker, [MM:SS - MM:SS], text.
 */
export async function renderDocx(transcript: Transcript): Promise<Buffer> {
  const doc = new Document({
    title: DOCUMENT_TITLE,
    sections: [
      {
        children: [
          new Paragraph({ text: DOCUMENT_TITLE, heading: HeadingLevel.TITLE }),
          ...documentParagraphs(transcript).map(toParagraph),
        ],
      },
    ],
  });
  try {
    return await Packer.toBuffer(doc);
  } catch (e) {
    throw new ExportEncodingError(`DOCX packaging failed: ${errorMessage(e)}`, { format: 'docx' });
  }
}
