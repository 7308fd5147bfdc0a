import { PDFDocument, StandardFonts, rgb, type PDFFont } from 'pdf-lib';
import { ExportEncodingError, errorMessage } from '../errors';
import type { Transcript } from '../types';
import { paginate, type Block, type PageBody } from './layout';
import { DOCUMENT_TITLE, documentParagraphs } from './shared';

// US Letter, one-inch margins
const PAGE_WIDTH = 612;
const PAGE_HEIGHT = 792;
const MARGIN = 72;
export const PDF_BODY: PageBody = { width: PAGE_WIDTH - 2 * MARGIN, height: PAGE_HEIGHT - 2 * MARGIN };

const TITLE_SIZE = 18;
const BODY_SIZE = 11;

/**
 * Replace characters the standard fonts cannot encode (WinAnsi) with '?'.
 */
export function substituteUnencodable(text: string, supported: ReadonlySet<number>): string {
  let out = '';
  for (const ch of text.replace(/\t/g, ' ')) {
    const cp = ch.codePointAt(0) ?? 0;
    out += ch === '\n' || supported.has(cp) ? ch : '?';
  }
  return out;
}

export function pdfBlocks(transcript: Transcript, clean: (text: string) => string): Block[] {
  const blocks: Block[] = [
    { runs: [{ text: DOCUMENT_TITLE, bold: true }], size: TITLE_SIZE, lineHeight: 24, spaceAfter: 12 },
  ];
  for (const p of documentParagraphs(transcript)) {
    blocks.push({
      runs: [
        ...(p.speaker ? [{ text: `${clean(p.speaker)}:`, bold: true }] : []),
        { text: p.range, bold: false },
        { text: clean(p.text), bold: false },
      ],
      size: BODY_SIZE,
      lineHeight: 14,
      spaceAfter: 8,
    });
  }
  return blocks;
}

/**
 * PDF with the same paragraphs as the Word export, flowed onto Letter pages.
 */
export async function renderPdf(transcript: Transcript): Promise<Buffer> {
  try {
    const pdf = await PDFDocument.create();
    pdf.setTitle(DOCUMENT_TITLE);
    const regular = await pdf.embedFont(StandardFonts.Helvetica);
    const bold = await pdf.embedFont(StandardFonts.HelveticaBold);
    const supported = new Set(regular.getCharacterSet());
    const font = (isBold: boolean): PDFFont => (isBold ? bold : regular);

    const blocks = pdfBlocks(transcript, (text) => substituteUnencodable(text, supported));
    const pages = paginate(blocks, PDF_BODY, (text, isBold, size) => font(isBold).widthOfTextAtSize(text, size));

    for (const lines of pages) {
      const page = pdf.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
      for (const line of lines) {
        const baseline = PAGE_HEIGHT - MARGIN - line.y - line.size;
        for (const piece of line.pieces) {
          page.drawText(piece.text, {
            x: MARGIN + piece.x,
            y: baseline,
            size: line.size,
            font: font(piece.bold),
            color: rgb(0, 0, 0),
          });
        }
      }
    }
    return Buffer.from(await pdf.save());
  } catch (e) {
    throw new ExportEncodingError(`PDF rendering failed: ${errorMessage(e)}`, { format: 'pdf' });
  }
}
