import { ProcessDiarizer, type Diarizer } from '../diarize';
import { ENV, type AsrEngine } from '../env';
import { debug, warn } from '../log';
import { FfmpegMediaProbe, type MediaProbe } from '../media';
import type { Recognizer } from '../recognize';
import { errorMessage } from '../errors';
import { OpenAIRecognizer } from './openai';
import { WhisperXRecognizer } from './whisperx';

export interface Engines {
    probe: MediaProbe;
    recognizer: Recognizer;
    diarizer?: Diarizer;
}

export interface EngineConfig {
    asrEngine?: AsrEngine;
    /** Build a diarizer when one is configured */
    diarize?: boolean;
}

export function createRecognizer(engine: AsrEngine = ENV.asrEngine): Recognizer {
    const timeoutMs = ENV.asrTimeoutSec > 0 ? ENV.asrTimeoutSec * 1000 : undefined;
    if (engine === 'whisperx') {
        return new WhisperXRecognizer({
            image: ENV.whisperxImage,
            dockerBin: ENV.dockerBin,
            additionalArgs: ENV.dockerAdditionalArgs.split(' ').filter(Boolean),
            timeoutMs,
        });
    }
    return new OpenAIRecognizer({
        apiKey: ENV.openaiApiKey,
        baseURL: ENV.openaiBaseUrl || undefined,
        timeoutMs,
    });
}

export function createDiarizer(): Diarizer | undefined {
    const diarizer = new ProcessDiarizer({
        command: ENV.diarizeCommand || undefined,
        image: ENV.diarizeImage || undefined,
        dockerBin: ENV.dockerBin,
        hfToken: ENV.hfToken || undefined,
    });
    return diarizer.configured ? diarizer : undefined;
}

export async function closeEngines(engines: Engines): Promise<void> {
    const closing = [engines.recognizer.close?.(), engines.diarizer?.close?.()];
    for (const res of await Promise.allSettled(closing)) {
        if (res.status === 'rejected') warn('engines.close.fail', { error: errorMessage(res.reason) });
    }
}

/**
 * Scoped engine handles: constructed for one job, torn down when it ends.
 */
export async function withEngines<T>(config: EngineConfig, fn: (engines: Engines) => Promise<T>): Promise<T> {
    const engines: Engines = {
        probe: new FfmpegMediaProbe(),
        recognizer: createRecognizer(config.asrEngine),
        diarizer: config.diarize ? createDiarizer() : undefined,
    };
    debug('engines.open', { recognizer: engines.recognizer.name, diarizer: engines.diarizer?.name ?? null });
    try {
        return await fn(engines);
    } finally {
        await closeEngines(engines);
    }
}

export { OpenAIRecognizer, WhisperXRecognizer };
