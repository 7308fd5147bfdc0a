import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import {
    PipelineCancelledError,
    RecognitionTimeoutError,
    RecognitionUnavailableError,
    errorMessage,
} from '../errors';
import { debug, info, warn } from '../log';
import { CommandError, execaRunner, type CommandRunner } from '../media';
import type { RecognitionRequest, Recognizer } from '../recognize';
import type { LocalSegment } from '../types';

const chunkOutputSchema = z.object({
    segments: z.array(
        z.object({
            startSec: z.number(),
            endSec: z.number(),
            text: z.string(),
        })
    ),
});

export interface WhisperXOptions {
    image: string;
    dockerBin?: string;
    /** Extra `docker run` args, e.g. device mappings */
    additionalArgs?: string[];
    timeoutMs?: number;
    runner?: CommandRunner;
}

/**
 * Runs a WhisperX container per chunk. The image takes `<in.wav> <out.json>`
 * (plus --model/--language) and writes `{segments:[{startSec,endSec,text}]}`.
 */
export class WhisperXRecognizer implements Recognizer {
    readonly name = 'whisperx';
    private workDir: string | null = null;
    private ready: Promise<void> | null = null;
    private runner: CommandRunner;
    private dockerBin: string;

    constructor(private opts: WhisperXOptions) {
        this.runner = opts.runner ?? execaRunner;
        this.dockerBin = opts.dockerBin ?? 'docker';
    }

    // Preflight: ensure image exists locally (avoid confusing pull errors for local tags)
    private async preflight(): Promise<void> {
        if (!this.opts.image) {
            throw new RecognitionUnavailableError('WHISPERX_IMAGE is required for the whisperx engine. Set it in your .env.');
        }
        try {
            await this.runner.text(this.dockerBin, ['image', 'inspect', this.opts.image]);
        } catch (e) {
            throw new RecognitionUnavailableError(
                `Docker image ${this.opts.image} not found locally. Build it first. (${errorMessage(e)})`
            );
        }
        this.workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'whisperx-'));
        info('recognize.whisperx.init', { image: this.opts.image, workDir: this.workDir });
    }

    private ensureReady(): Promise<void> {
        if (!this.ready) {
            this.ready = this.preflight().catch((e: unknown) => {
                this.ready = null;
                throw e;
            });
        }
        return this.ready;
    }

    async recognize(audio: Buffer, req: RecognitionRequest): Promise<LocalSegment[]> {
        await this.ensureReady();
        const workDir = this.workDir;
        if (!workDir) throw new RecognitionUnavailableError('WhisperX work directory missing');

        const { chunk } = req;
        const context = { chunkIndex: chunk.index, startSec: chunk.startSec, endSec: chunk.endSec };
        const stem = `chunk_${String(chunk.index).padStart(4, '0')}`;
        const inPath = path.join(workDir, `${stem}.wav`);
        const outPath = path.join(workDir, `${stem}.json`);
        await fs.writeFile(inPath, audio);

        const args = [
            'run', '--rm',
            ...(this.opts.additionalArgs ?? []),
            '-v', `${workDir}:${workDir}`,
            this.opts.image,
            inPath,
            outPath,
            '--model', req.model,
            ...(req.language ? ['--language', req.language] : []),
        ];
        try {
            await this.runner.text(this.dockerBin, args, { signal: req.signal, timeoutMs: this.opts.timeoutMs });
        } catch (e) {
            if (e instanceof CommandError) {
                if (e.canceled) throw new PipelineCancelledError('Recognition aborted', context);
                if (e.timedOut) throw new RecognitionTimeoutError(`WhisperX timed out after ${this.opts.timeoutMs}ms`, context);
                warn('recognize.whisperx.fail', { idx: chunk.index, exitCode: e.exitCode, stderrSnippet: e.stderr.slice(-400) });
            }
            throw new RecognitionUnavailableError(`WhisperX container failed: ${errorMessage(e)}`, context);
        } finally {
            await fs.remove(inPath);
        }

        try {
            const parsed = chunkOutputSchema.parse(await fs.readJson(outPath));
            debug('recognize.whisperx.done', { idx: chunk.index, segments: parsed.segments.length });
            return parsed.segments;
        } catch (e) {
            throw new RecognitionUnavailableError(`WhisperX output unreadable: ${errorMessage(e)}`, context);
        } finally {
            await fs.remove(outPath);
        }
    }

    async close(): Promise<void> {
        if (this.workDir) {
            await fs.remove(this.workDir);
            this.workDir = null;
        }
        this.ready = null;
    }
}
