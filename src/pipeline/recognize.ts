import type { Chunk, LocalSegment } from './types';

export interface RecognitionRequest {
    chunk: Chunk;
    model: string;
    /** ISO-639-1 hint; undefined lets the engine detect it */
    language?: string;
    signal?: AbortSignal;
}

/**
 * Speech-to-text capability. Implementations return chunk-relative
 * segments in time order and throw RecognitionUnavailableError or
 * RecognitionTimeoutError; they never retry on their own.
 */
export interface Recognizer {
    readonly name: string;
    recognize(audio: Buffer, request: RecognitionRequest): Promise<LocalSegment[]>;
    /** Release sessions or handles acquired lazily by recognize(). */
    close?(): Promise<void>;
}

export function splitSentences(text: string): string[] {
    return text
        .trim()
        .split(/(?<=[.!?])\s+/)
        .map((s) => s.trim())
        .filter(Boolean);
}

/**
 * Engines that only return text get their chunk span divided evenly
 * between its sentences.
 */
export function sentenceSegments(text: string, spanSec: number): LocalSegment[] {
    const trimmed = text.trim();
    if (!trimmed || spanSec <= 0) return [];
    const sentences = splitSentences(trimmed);
    if (sentences.length <= 1) {
        return [{ startSec: 0, endSec: spanSec, text: trimmed }];
    }
    const per = spanSec / sentences.length;
    return sentences.map((s, i) => ({
        startSec: i * per,
        endSec: i === sentences.length - 1 ? spanSec : (i + 1) * per,
        text: s,
    }));
}

/**
 * Drop blank or zero-length segments and order by start.
 */
export function normalizeLocal(segments: LocalSegment[]): LocalSegment[] {
    return segments
        .map((s) => ({ startSec: Math.max(0, s.startSec), endSec: s.endSec, text: s.text.trim() }))
        .filter((s) => s.text.length > 0 && s.endSec > s.startSec)
        .sort((a, b) => a.startSec - b.startSec);
}
