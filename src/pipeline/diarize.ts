import path from 'path';
import { z } from 'zod';
import { DiarizationUnavailableError, PipelineCancelledError, errorMessage } from './errors';
import { debug, info } from './log';
import { CommandError, execaRunner, type CommandRunner } from './media';
import type { Device, DiarizationInterval } from './types';

export interface DiarizeRequest {
    device: Device;
    signal?: AbortSignal;
}

/**
 * Speaker diarization capability. Returns turns ordered by start; an empty
 * list means "no speaker information" and the caller skips alignment.
 */
export interface Diarizer {
    readonly name: string;
    diarize(mediaPath: string, request: DiarizeRequest): Promise<DiarizationInterval[]>;
    close?(): Promise<void>;
}

/**
 * Accelerator check, run once per job. Any failure means CPU.
 */
export async function probeDevice(opts: { forceCpu?: boolean; runner?: CommandRunner } = {}): Promise<Device> {
    if (opts.forceCpu) return 'cpu';
    const runner = opts.runner ?? execaRunner;
    try {
        const out = await runner.text('nvidia-smi', ['-L'], { timeoutMs: 5000 });
        return /\bGPU\b/.test(out) ? 'cuda' : 'cpu';
    } catch (e) {
        debug('diarize.device.cpu', { reason: errorMessage(e) });
        return 'cpu';
    }
}

const turnsSchema = z.array(
    z.object({
        speaker: z.union([z.string(), z.number()]).transform(String),
        start: z.number(),
        end: z.number(),
    })
);

export function parseTurns(stdout: string): DiarizationInterval[] {
    const turns = turnsSchema.parse(JSON.parse(stdout));
    return sortIntervals(
        turns
            .filter((t) => t.end > t.start)
            .map((t) => ({ speaker: t.speaker, startSec: t.start, endSec: t.end }))
    );
}

export function sortIntervals(intervals: DiarizationInterval[]): DiarizationInterval[] {
    return [...intervals].sort((a, b) => a.startSec - b.startSec || a.endSec - b.endSec);
}

export interface SmoothingOptions {
    minDurSec: number;
    maxGapSec: number;
}

/**
 * Join same-speaker turns separated by at most maxGapSec, and fold a blip
 * shorter than minDurSec into the surrounding speaker when it sits between
 * two of that speaker's turns.
 */
export function mergeShortAdjacent(
    intervals: DiarizationInterval[],
    opts: SmoothingOptions = { minDurSec: 0.6, maxGapSec: 0.4 }
): DiarizationInterval[] {
    const turns = sortIntervals(intervals);
    const out: DiarizationInterval[] = [];
    for (let i = 0; i < turns.length; i++) {
        const cur = turns[i];
        const prev = out[out.length - 1];
        if (prev && prev.speaker === cur.speaker && cur.startSec - prev.endSec <= opts.maxGapSec) {
            prev.endSec = Math.max(prev.endSec, cur.endSec);
            continue;
        }
        const next = turns[i + 1];
        const isBlip =
            prev !== undefined &&
            next !== undefined &&
            cur.endSec - cur.startSec < opts.minDurSec &&
            next.speaker === prev.speaker &&
            cur.startSec - prev.endSec <= opts.maxGapSec &&
            next.startSec - cur.endSec <= opts.maxGapSec;
        if (prev && isBlip) {
            prev.endSec = Math.max(prev.endSec, cur.endSec);
            continue;
        }
        out.push({ ...cur });
    }
    return out;
}

export interface ProcessDiarizerOptions {
    /** Local command printing JSON turns, e.g. "python3 scripts/diarize.py" */
    command?: string;
    /** Container image alternative to `command` */
    image?: string;
    dockerBin?: string;
    hfToken?: string;
    timeoutMs?: number;
    runner?: CommandRunner;
}

/**
 * Runs an external diarization program (pyannote or similar) that takes
 * `<media> --device <cpu|cuda>` and prints `[{speaker,start,end}]` on stdout.
 */
export class ProcessDiarizer implements Diarizer {
    readonly name = 'process';
    private runner: CommandRunner;

    constructor(private opts: ProcessDiarizerOptions) {
        this.runner = opts.runner ?? execaRunner;
    }

    get configured(): boolean {
        return Boolean(this.opts.command || this.opts.image);
    }

    private invocation(mediaPath: string, device: Device): [string, string[]] {
        const tail = [mediaPath, '--device', device];
        if (this.opts.command) {
            const [file, ...args] = this.opts.command.split(' ').filter(Boolean);
            return [file, [...args, ...tail]];
        }
        const dir = path.dirname(path.resolve(mediaPath));
        return [
            this.opts.dockerBin ?? 'docker',
            [
                'run', '--rm',
                ...(device === 'cuda' ? ['--gpus', 'all'] : []),
                ...(this.opts.hfToken ? ['-e', 'HF_TOKEN'] : []),
                '-v', `${dir}:${dir}`,
                this.opts.image ?? '',
                path.resolve(mediaPath), '--device', device,
            ],
        ];
    }

    async diarize(mediaPath: string, req: DiarizeRequest): Promise<DiarizationInterval[]> {
        if (!this.configured) {
            throw new DiarizationUnavailableError('No diarization command or image configured (DIARIZE_COMMAND / DIARIZE_IMAGE)', {
                mediaPath,
            });
        }
        const [file, args] = this.invocation(mediaPath, req.device);
        info('diarize.start', { mediaPath, device: req.device, runner: file });
        let stdout: string;
        try {
            stdout = await this.runner.text(file, args, {
                signal: req.signal,
                timeoutMs: this.opts.timeoutMs,
                env: this.opts.hfToken ? { HF_TOKEN: this.opts.hfToken } : undefined,
            });
        } catch (e) {
            if (e instanceof CommandError && e.canceled) throw new PipelineCancelledError('Diarization aborted', { mediaPath });
            throw new DiarizationUnavailableError(`Diarization process failed: ${errorMessage(e)}`, { mediaPath });
        }
        try {
            return parseTurns(stdout);
        } catch (e) {
            throw new DiarizationUnavailableError(`Diarization output unreadable: ${errorMessage(e)}`, { mediaPath });
        }
    }
}
