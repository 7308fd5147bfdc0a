import { execa } from 'execa';
import { chunkDuration } from './chunk';
import { ENV } from './env';
import { MediaProbeError, PipelineCancelledError, errorMessage } from './errors';
import { debug, info } from './log';
import type { Chunk, MediaRef } from './types';

export interface RunOptions {
    signal?: AbortSignal;
    timeoutMs?: number;
    env?: Record<string, string>;
}

/**
 * Thin seam over external binaries so adapters can be exercised without spawning them.
 */
export interface CommandRunner {
    text(file: string, args: string[], opts?: RunOptions): Promise<string>;
    buffer(file: string, args: string[], opts?: RunOptions): Promise<Buffer>;
}

export class CommandError extends Error {
    timedOut: boolean;
    canceled: boolean;
    exitCode?: number;
    stderr: string;

    constructor(message: string, init: { timedOut?: boolean; canceled?: boolean; exitCode?: number; stderr?: string }) {
        super(message);
        this.name = 'CommandError';
        this.timedOut = init.timedOut ?? false;
        this.canceled = init.canceled ?? false;
        this.exitCode = init.exitCode;
        this.stderr = init.stderr ?? '';
    }
}

function field(e: unknown, key: string): unknown {
    return typeof e === 'object' && e !== null && key in e ? Reflect.get(e, key) : undefined;
}

function toCommandError(file: string, e: unknown): CommandError {
    const exitCode = field(e, 'exitCode');
    const stderr = field(e, 'stderr');
    const shortMessage = field(e, 'shortMessage');
    return new CommandError(typeof shortMessage === 'string' ? shortMessage : `${file}: ${errorMessage(e)}`, {
        timedOut: field(e, 'timedOut') === true,
        canceled: field(e, 'isCanceled') === true,
        exitCode: typeof exitCode === 'number' ? exitCode : undefined,
        stderr: typeof stderr === 'string' ? stderr : '',
    });
}

export const execaRunner: CommandRunner = {
    async text(file, args, opts = {}) {
        try {
            const res = await execa(file, args, {
                signal: opts.signal,
                timeout: opts.timeoutMs,
                env: opts.env,
            });
            return res.stdout;
        } catch (e) {
            throw toCommandError(file, e);
        }
    },
    async buffer(file, args, opts = {}) {
        try {
            const res = await execa(file, args, {
                encoding: 'buffer',
                maxBuffer: 512 * 1024 * 1024,
                signal: opts.signal,
                timeout: opts.timeoutMs,
                env: opts.env,
            });
            return res.stdout;
        } catch (e) {
            throw toCommandError(file, e);
        }
    },
};

export interface MediaProbe {
    probe(mediaPath: string, signal?: AbortSignal): Promise<MediaRef>;
    /** Audio bytes for one chunk window. */
    extract(media: MediaRef, chunk: Chunk, signal?: AbortSignal): Promise<Buffer>;
}

export interface FfmpegProbeOptions {
    ffmpegBin?: string;
    ffprobeBin?: string;
    sampleRate?: number;
    runner?: CommandRunner;
}

/**
 * ffprobe for duration, ffmpeg for per-chunk 16 kHz mono PCM WAV piped to memory.
 */
export class FfmpegMediaProbe implements MediaProbe {
    private ffmpegBin: string;
    private ffprobeBin: string;
    private sampleRate: number;
    private runner: CommandRunner;

    constructor(opts: FfmpegProbeOptions = {}) {
        this.ffmpegBin = opts.ffmpegBin ?? ENV.ffmpegBin;
        this.ffprobeBin = opts.ffprobeBin ?? ENV.ffprobeBin;
        this.sampleRate = opts.sampleRate ?? 16000;
        this.runner = opts.runner ?? execaRunner;
    }

    async probe(mediaPath: string, signal?: AbortSignal): Promise<MediaRef> {
        let stdout: string;
        try {
            stdout = await this.runner.text(
                this.ffprobeBin,
                ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', mediaPath],
                { signal }
            );
        } catch (e) {
            if (e instanceof CommandError && e.canceled) throw new PipelineCancelledError(undefined, { mediaPath });
            throw new MediaProbeError(`ffprobe failed for ${mediaPath}: ${errorMessage(e)}`, { mediaPath });
        }
        const parsed = parseFloat(stdout);
        if (!Number.isFinite(parsed)) {
            throw new MediaProbeError(`ffprobe could not determine duration for ${mediaPath}. Raw output: ${stdout}`, {
                mediaPath,
            });
        }
        info('media.probe', { mediaPath, durationSec: parsed });
        return { path: mediaPath, durationSec: parsed };
    }

    async extract(media: MediaRef, chunk: Chunk, signal?: AbortSignal): Promise<Buffer> {
        const dur = chunkDuration(chunk);
        // Accurate seeking: -ss after -i
        const args = [
            '-loglevel', 'error',
            '-hide_banner',
            '-nostdin',
            '-i', media.path,
            '-ss', String(chunk.startSec),
            '-t', String(dur),
            '-vn',
            '-sn',
            '-ac', '1',
            '-ar', String(this.sampleRate),
            '-acodec', 'pcm_s16le',
            '-f', 'wav',
            'pipe:1',
        ];
        let bytes: Buffer;
        try {
            bytes = await this.runner.buffer(this.ffmpegBin, args, { signal });
        } catch (e) {
            if (e instanceof CommandError && e.canceled) throw new PipelineCancelledError(undefined, { chunkIndex: chunk.index });
            throw new MediaProbeError(`ffmpeg failed while extracting chunk: ${errorMessage(e)}`, {
                mediaPath: media.path,
                chunkIndex: chunk.index,
                startSec: chunk.startSec,
                endSec: chunk.endSec,
            });
        }
        if (bytes.length === 0) {
            throw new MediaProbeError('ffmpeg produced an empty chunk; the source has no samples in this range', {
                mediaPath: media.path,
                chunkIndex: chunk.index,
                startSec: chunk.startSec,
                endSec: chunk.endSec,
            });
        }
        debug('media.extract', { idx: chunk.index, bytes: bytes.length });
        return bytes;
    }
}
