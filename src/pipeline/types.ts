export interface MediaRef {
  path: string;
  durationSec: number;
}

export interface Chunk {
  index: number;
  startSec: number;
  endSec: number;
}

/** A recognized span. Times are chunk-relative before merging, global after. */
export interface Segment {
  startSec: number;
  endSec: number;
  text: string;
  speaker?: string;
}

export type LocalSegment = Omit<Segment, 'speaker'>;

export type Transcript = Segment[];

export interface DiarizationInterval {
  speaker: string;
  startSec: number;
  endSec: number;
}

/** Raw label (e.g. SPEAKER_00) to display name. */
export type SpeakerMap = Record<string, string>;

export interface ChunkResult {
  chunk: Chunk;
  segments: LocalSegment[];
}

export interface UnrecognizedSpan {
  chunkIndex: number;
  startSec: number;
  endSec: number;
  reason: string;
}

export type Device = 'cpu' | 'cuda';

export interface DiarizationMeta {
  requested: boolean;
  device?: Device;
  turns: number;
  speakers: string[];
}

export type ChunkFailurePolicy = 'fail' | 'mark';

export type ExportFormat = 'srt' | 'vtt' | 'docx' | 'pdf' | 'txt';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['srt', 'vtt', 'docx', 'pdf', 'txt'];
