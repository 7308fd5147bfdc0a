import { describe, it, expect } from 'vitest';
import { paginate, wrapRuns, type Block, type Measure } from '../src/pipeline/export/layout';

// One unit per character
const measure: Measure = (text) => text.length;

function block(text: string, lineHeight = 10): Block {
  return { runs: [{ text, bold: false }], size: 10, lineHeight, spaceAfter: 0 };
}

describe('wrapRuns', () => {
  it('should wrap greedily on spaces', () => {
    expect(wrapRuns([{ text: 'aa bb cc', bold: false }], 10, 5, measure)).toEqual([
      [
        { x: 0, text: 'aa', bold: false },
        { x: 3, text: 'bb', bold: false },
      ],
      [{ x: 0, text: 'cc', bold: false }],
    ]);
  });

  it('should keep run styling per word', () => {
    const lines = wrapRuns(
      [
        { text: 'Alice:', bold: true },
        { text: 'hi', bold: false },
      ],
      10,
      100,
      measure
    );
    expect(lines).toEqual([
      [
        { x: 0, text: 'Alice:', bold: true },
        { x: 7, text: 'hi', bold: false },
      ],
    ]);
  });

  it('should break words wider than the line', () => {
    const lines = wrapRuns([{ text: 'abcdefgh', bold: false }], 10, 3, measure);
    expect(lines.map((l) => l.map((p) => p.text))).toEqual([['abc'], ['def'], ['gh']]);
  });

  it('should honour explicit newlines', () => {
    const lines = wrapRuns([{ text: 'a\nb', bold: false }], 10, 100, measure);
    expect(lines.map((l) => l.map((p) => p.text))).toEqual([['a'], ['b']]);
  });

  it('should return one empty line for empty input', () => {
    expect(wrapRuns([], 10, 100, measure)).toEqual([[]]);
  });
});

describe('paginate', () => {
  it('should start a new page when the next paragraph does not fit', () => {
    const pages = paginate(['a', 'b', 'c', 'd', 'e'].map((t) => block(t)), { width: 100, height: 25 }, measure);
    expect(pages.map((p) => p.map((l) => l.y))).toEqual([[0, 10], [0, 10], [0]]);
  });

  it('should split a paragraph taller than a page', () => {
    const pages = paginate([block('a\nb\nc\nd')], { width: 100, height: 25 }, measure);
    expect(pages.map((p) => p.map((l) => l.pieces[0].text))).toEqual([['a', 'b'], ['c', 'd']]);
  });
});
