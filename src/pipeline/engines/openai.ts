import OpenAI, { toFile } from 'openai';
import { z } from 'zod';
import {
    PipelineCancelledError,
    PipelineError,
    RecognitionTimeoutError,
    RecognitionUnavailableError,
    errorMessage,
} from '../errors';
import { debug } from '../log';
import { sentenceSegments, type RecognitionRequest, type Recognizer } from '../recognize';
import type { Chunk, LocalSegment } from '../types';

const verboseSchema = z.object({
    text: z.string(),
    segments: z
        .array(
            z.object({
                start: z.number(),
                end: z.number(),
                text: z.string(),
            })
        )
        .optional(),
});

const responseSchema = z.union([z.string(), verboseSchema]);

type ResponseFormat = 'verbose_json' | 'json';

export interface OpenAIRecognizerOptions {
    apiKey: string;
    baseURL?: string;
    timeoutMs?: number;
    /** Defaults to verbose_json for whisper models, json otherwise */
    responseFormat?: ResponseFormat;
}

function chunkContext(chunk: Chunk) {
    return { chunkIndex: chunk.index, startSec: chunk.startSec, endSec: chunk.endSec };
}

/**
 * Timed segments when the engine returned them, sentence-split text otherwise.
 */
export function segmentsFromResponse(raw: unknown, spanSec: number): LocalSegment[] {
    const parsed = responseSchema.parse(raw);
    if (typeof parsed === 'string') return sentenceSegments(parsed, spanSec);
    if (parsed.segments && parsed.segments.length > 0) {
        return parsed.segments.map((s) => ({ startSec: s.start, endSec: s.end, text: s.text }));
    }
    return sentenceSegments(parsed.text, spanSec);
}

export function mapOpenAIError(e: unknown, chunk: Chunk): PipelineError {
    const context = chunkContext(chunk);
    if (e instanceof OpenAI.APIUserAbortError) {
        return new PipelineCancelledError('Recognition aborted', context);
    }
    if (e instanceof OpenAI.APIConnectionTimeoutError) {
        return new RecognitionTimeoutError('Speech API request timed out', context);
    }
    if (e instanceof OpenAI.APIError) {
        const status = e.status ? ` (status ${e.status})` : '';
        return new RecognitionUnavailableError(`Speech API request failed${status}: ${e.message}`, {
            ...context,
            cause: e.message,
        });
    }
    return new RecognitionUnavailableError(`Speech API call failed: ${errorMessage(e)}`, context);
}

/**
 * OpenAI-compatible /audio/transcriptions client. The SDK client is created
 * on first use and dropped by close().
 */
export class OpenAIRecognizer implements Recognizer {
    readonly name = 'openai';
    private client: OpenAI | null = null;

    constructor(private opts: OpenAIRecognizerOptions) {}

    private ensureClient(chunk: Chunk): OpenAI {
        if (this.client) return this.client;
        if (!this.opts.apiKey) {
            throw new RecognitionUnavailableError('OpenAI API key not set (OPENAI_API_KEY)', chunkContext(chunk));
        }
        this.client = new OpenAI({
            apiKey: this.opts.apiKey,
            ...(this.opts.baseURL ? { baseURL: this.opts.baseURL } : {}),
            timeout: this.opts.timeoutMs,
            // Retries belong to the pipeline
            maxRetries: 0,
        });
        return this.client;
    }

    private async send(client: OpenAI, audio: Buffer, req: RecognitionRequest, format: ResponseFormat): Promise<unknown> {
        const file = await toFile(audio, `chunk_${String(req.chunk.index).padStart(4, '0')}.wav`, { type: 'audio/wav' });
        const language = req.language ? { language: req.language } : {};
        const options = { signal: req.signal };
        if (format === 'verbose_json') {
            return client.audio.transcriptions.create(
                { file, model: req.model, response_format: 'verbose_json', ...language },
                options
            );
        }
        return client.audio.transcriptions.create({ file, model: req.model, response_format: 'json', ...language }, options);
    }

    async recognize(audio: Buffer, req: RecognitionRequest): Promise<LocalSegment[]> {
        const client = this.ensureClient(req.chunk);
        const format = this.opts.responseFormat ?? (req.model.startsWith('whisper') ? 'verbose_json' : 'json');
        let raw: unknown;
        try {
            raw = await this.send(client, audio, req, format);
        } catch (e) {
            throw mapOpenAIError(e, req.chunk);
        }
        const span = req.chunk.endSec - req.chunk.startSec;
        try {
            const segments = segmentsFromResponse(raw, span);
            debug('recognize.openai.done', { idx: req.chunk.index, segments: segments.length, format });
            return segments;
        } catch (e) {
            throw new RecognitionUnavailableError(`Unexpected speech API response: ${errorMessage(e)}`, chunkContext(req.chunk));
        }
    }

    async close(): Promise<void> {
        this.client = null;
    }
}
