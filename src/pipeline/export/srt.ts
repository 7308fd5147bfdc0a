import { parseSrtTime, toSrtTime } from '../timecode';
import type { Transcript } from '../types';
import { exportEntries, labeled } from './shared';

/**
 * SubRip text. Every labeled cue carries its `Speaker: ` prefix, even when
 * the previous cue has the same speaker.
 */
export function composeSrt(transcript: Transcript): string {
  return exportEntries(transcript)
    .map(({ seg, text }, i) =>
      [String(i + 1), `${toSrtTime(seg.startSec)} --> ${toSrtTime(seg.endSec)}`, labeled(seg, text), '', ''].join('\n')
    )
    .join('');
}

export async function renderSrt(transcript: Transcript): Promise<Buffer> {
  return Buffer.from(composeSrt(transcript), 'utf8');
}

export interface SrtCue {
  index: number;
  startSec: number;
  endSec: number;
  /** Cue text as written, speaker prefix included */
  text: string;
}

export function parseSrt(input: string): SrtCue[] {
  const blocks = input
    .replace(/^\uFEFF/, '')
    .replace(/\r\n?/g, '\n')
    .split(/\n{2,}/)
    .map((b) => b.trim())
    .filter(Boolean);
  return blocks.map((block) => {
    const [indexLine, timeLine = '', ...textLines] = block.split('\n');
    const [start, end] = timeLine.split('-->');
    if (end === undefined) {
      throw new Error(`Malformed SRT cue: ${indexLine}`);
    }
    return {
      index: Number(indexLine),
      startSec: parseSrtTime(start),
      endSec: parseSrtTime(end),
      text: textLines.join('\n'),
    };
  });
}
