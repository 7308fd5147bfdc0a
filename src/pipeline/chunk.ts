import { InvalidChunkPolicyError, InvalidDurationError } from './errors';
import { debug } from './log';
import type { Chunk } from './types';

export interface ChunkOptions {
    chunkSec: number;
    overlapSec: number;
}

// Window ends this close to the media end are snapped onto it
const END_EPSILON_MS = 1e-3;

/**
 * Tile [0, durationSec] with windows of at most chunkSec seconds, each
 * starting overlapSec before the previous one ends.
 */
export function planChunks(durationSec: number, opts: ChunkOptions): Chunk[] {
    if (!Number.isFinite(durationSec) || durationSec <= 0) {
        throw new InvalidDurationError(`Media duration must be a positive number of seconds, got ${durationSec}`);
    }
    const { chunkSec, overlapSec } = opts;
    if (!Number.isFinite(chunkSec) || chunkSec <= 0) {
        throw new InvalidChunkPolicyError(`chunkSec must be positive, got ${chunkSec}`);
    }
    if (!Number.isFinite(overlapSec) || overlapSec < 0 || overlapSec >= chunkSec) {
        throw new InvalidChunkPolicyError(
            `overlapSec must be in [0, chunkSec), got overlapSec=${overlapSec} chunkSec=${chunkSec}`
        );
    }

    if (durationSec <= chunkSec) {
        return [{ index: 0, startSec: 0, endSec: durationSec }];
    }

    // Plan on whole milliseconds so every window spans exactly chunkMs or less
    // Never round a window up past chunkSec
    const chunkMs = Math.floor(chunkSec * 1000 + 1e-6);
    const stepMs = chunkMs - Math.round(overlapSec * 1000);
    if (stepMs <= 0) {
        throw new InvalidChunkPolicyError(
            `chunkSec and overlapSec must differ by at least 1ms, got overlapSec=${overlapSec} chunkSec=${chunkSec}`
        );
    }
    const durationMs = durationSec * 1000;
    const chunks: Chunk[] = [];
    for (let index = 0; ; index++) {
        const startMs = index * stepMs;
        const endMs = startMs + chunkMs;
        const last = endMs >= durationMs - END_EPSILON_MS;
        chunks.push({ index, startSec: startMs / 1000, endSec: last ? durationSec : endMs / 1000 });
        if (last) break;
    }
    debug('chunk.plan', { durationSec, chunkSec, overlapSec, count: chunks.length });
    return chunks;
}

/**
 * Window length, measured on whole milliseconds like the plan itself.
 */
export function chunkDuration(chunk: Chunk): number {
    return (Math.round(chunk.endSec * 1000) - Math.round(chunk.startSec * 1000)) / 1000;
}
