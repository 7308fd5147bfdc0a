import { toVttTime } from '../timecode';
import type { Transcript } from '../types';
import { exportEntries, labeled } from './shared';

function escapeCueText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** WebVTT without cue identifiers. */
export function composeVtt(transcript: Transcript): string {
  const cues = exportEntries(transcript).map(
    ({ seg, text }) =>
      `${toVttTime(seg.startSec)} --> ${toVttTime(seg.endSec)}\n${escapeCueText(labeled(seg, text))}\n\n`
  );
  return `WEBVTT\n\n${cues.join('')}`;
}

export async function renderVtt(transcript: Transcript): Promise<Buffer> {
  return Buffer.from(composeVtt(transcript), 'utf8');
}
