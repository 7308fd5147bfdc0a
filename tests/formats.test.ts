import { describe, it, expect } from 'vitest';
import { parseFormats } from '../src/cli/formats';

describe('parseFormats', () => {
  it('should accept a comma separated list and drop repeats', () => {
    expect(parseFormats('SRT, pdf,srt,,txt')).toEqual(['srt', 'pdf', 'txt']);
  });

  it('should reject unknown formats', () => {
    expect(() => parseFormats('srt,rtf')).toThrow('Unknown export format "rtf"');
  });
});
