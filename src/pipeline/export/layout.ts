/**
 * Flow layout for paginated output: greedy word wrap, then page breaks
 * wherever the next paragraph would overrun the page body.
 */

export interface Run {
  text: string;
  bold: boolean;
}

export interface Block {
  runs: Run[];
  size: number;
  lineHeight: number;
  spaceAfter: number;
}

export interface Piece {
  x: number;
  text: string;
  bold: boolean;
}

export interface PlacedLine {
  /** Distance from the top of the page body to the top of the line */
  y: number;
  size: number;
  pieces: Piece[];
}

export type Page = PlacedLine[];

export interface PageBody {
  width: number;
  height: number;
}

export type Measure = (text: string, bold: boolean, size: number) => number;

interface Word {
  text: string;
  bold: boolean;
  /** Forced line break before this word */
  breakBefore: boolean;
}

function words(runs: Run[]): Word[] {
  const out: Word[] = [];
  let pendingBreak = false;
  for (const run of runs) {
    run.text.split('\n').forEach((line, li) => {
      if (li > 0) pendingBreak = true;
      for (const w of line.split(/[ \t]+/).filter(Boolean)) {
        out.push({ text: w, bold: run.bold, breakBefore: pendingBreak });
        pendingBreak = false;
      }
    });
  }
  return out;
}

// Split a word wider than the body into body-wide fragments
function hardBreak(word: string, bold: boolean, size: number, width: number, measure: Measure): string[] {
  const parts: string[] = [];
  let cur = '';
  for (const ch of Array.from(word)) {
    if (cur && measure(cur + ch, bold, size) > width) {
      parts.push(cur);
      cur = ch;
    } else {
      cur += ch;
    }
  }
  if (cur) parts.push(cur);
  return parts;
}

export function wrapRuns(runs: Run[], size: number, width: number, measure: Measure): Piece[][] {
  const lines: Piece[][] = [];
  let line: Piece[] = [];
  let x = 0;
  const flush = () => {
    lines.push(line);
    line = [];
    x = 0;
  };
  for (const w of words(runs)) {
    if (w.breakBefore && line.length) flush();
    const fragments =
      measure(w.text, w.bold, size) > width ? hardBreak(w.text, w.bold, size, width, measure) : [w.text];
    for (const text of fragments) {
      const wWidth = measure(text, w.bold, size);
      const space = line.length ? measure(' ', w.bold, size) : 0;
      if (line.length && x + space + wWidth > width) flush();
      const start = line.length ? x + measure(' ', w.bold, size) : 0;
      line.push({ x: start, text, bold: w.bold });
      x = start + wWidth;
    }
  }
  if (line.length || lines.length === 0) flush();
  return lines;
}

export function paginate(blocks: Block[], body: PageBody, measure: Measure): Page[] {
  const pages: Page[] = [[]];
  let cursor = 0;
  const newPage = () => {
    pages.push([]);
    cursor = 0;
  };
  for (const block of blocks) {
    const lines = wrapRuns(block.runs, block.size, body.width, measure);
    const height = lines.length * block.lineHeight;
    if (cursor > 0 && cursor + height > body.height) newPage();
    for (const pieces of lines) {
      // Only a paragraph taller than a whole page is split across pages
      if (cursor > 0 && cursor + block.lineHeight > body.height) newPage();
      pages[pages.length - 1].push({ y: cursor, size: block.size, pieces });
      cursor += block.lineHeight;
    }
    cursor += block.spaceAfter;
  }
  return pages;
}
