import { EmptyRecognitionOutputError } from './errors';
import { debug } from './log';
import type { ChunkResult, Segment, Transcript } from './types';

export interface MergeOptions {
    /** Start-time window inside which same-text overlap segments count as one. */
    epsilonSec?: number;
}

export const DEFAULT_DEDUPE_EPSILON_SEC = 0.5;

// Float slack when testing "inside the overlap"
const BOUNDARY_SLACK = 1e-6;

interface Placed extends Segment {
    chunkIndex: number;
    order: number;
}

export function normalizeText(text: string): string {
    return text.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Rebase every chunk's segments onto media time and concatenate them.
 *
 * A segment lying wholly inside the span shared with the previous chunk is
 * dropped when an earlier chunk already produced the same text starting
 * within epsilonSec of it (first seen wins). Everything else is kept and
 * ordered by start, then chunk index, then position within the chunk.
 * Results may arrive in any order; they are keyed by chunk index.
 */
export function mergeChunks(results: ChunkResult[], opts: MergeOptions = {}): Transcript {
    const epsilon = opts.epsilonSec ?? DEFAULT_DEDUPE_EPSILON_SEC;
    const ordered = [...results].sort((a, b) => a.chunk.index - b.chunk.index);

    if (ordered.every((r) => r.segments.length === 0)) {
        throw new EmptyRecognitionOutputError(`No speech recognized in any of ${ordered.length} chunk(s)`);
    }

    const kept: Placed[] = [];
    const seen = new Set<string>();
    let prevEnd: number | null = null;
    let dropped = 0;

    for (const { chunk, segments } of ordered) {
        const overlapStart = chunk.startSec;
        segments.forEach((local, order) => {
            const seg: Placed = {
                startSec: local.startSec + chunk.startSec,
                endSec: local.endSec + chunk.startSec,
                text: local.text,
                chunkIndex: chunk.index,
                order,
            };
            const inOverlap =
                prevEnd !== null &&
                seg.startSec >= overlapStart - BOUNDARY_SLACK &&
                seg.endSec <= prevEnd + BOUNDARY_SLACK;
            if (inOverlap) {
                const norm = normalizeText(seg.text);
                const duplicate = kept.some(
                    (k) =>
                        k.chunkIndex < chunk.index &&
                        Math.abs(k.startSec - seg.startSec) < epsilon &&
                        normalizeText(k.text) === norm
                );
                if (duplicate) {
                    dropped++;
                    return;
                }
            }
            const key = `${seg.startSec}|${seg.endSec}|${seg.text}`;
            if (seen.has(key)) {
                dropped++;
                return;
            }
            seen.add(key);
            kept.push(seg);
        });
        prevEnd = prevEnd === null ? chunk.endSec : Math.max(prevEnd, chunk.endSec);
    }

    kept.sort((a, b) => a.startSec - b.startSec || a.chunkIndex - b.chunkIndex || a.order - b.order);
    debug('merge.done', { chunks: ordered.length, segments: kept.length, dropped });
    return kept.map(({ startSec, endSec, text }) => ({ startSec, endSec, text }));
}
