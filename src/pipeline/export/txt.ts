import type { Transcript } from '../types';
import { exportEntries, labeled } from './shared';

export function composeText(transcript: Transcript): string {
  const paragraphs = exportEntries(transcript).map(({ seg, text }) => labeled(seg, text));
  return paragraphs.length ? paragraphs.join('\n\n') + '\n' : '';
}

export async function renderText(transcript: Transcript): Promise<Buffer> {
  return Buffer.from(composeText(transcript), 'utf8');
}
