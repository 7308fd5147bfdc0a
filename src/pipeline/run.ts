import { assignSpeakers, listSpeakers } from './align';
import { planChunks } from './chunk';
import { mergeShortAdjacent, probeDevice, type Diarizer, type SmoothingOptions } from './diarize';
import { ENV } from './env';
import { PipelineCancelledError, PipelineError, errorMessage } from './errors';
import { info, startStep, warn } from './log';
import type { MediaProbe } from './media';
import { mergeChunks } from './merge';
import { WorkerPool } from './pool';
import { normalizeLocal, type Recognizer } from './recognize';
import { withRetry } from './retry';
import type {
  Chunk,
  ChunkFailurePolicy,
  ChunkResult,
  Device,
  DiarizationInterval,
  DiarizationMeta,
  MediaRef,
  Transcript,
  UnrecognizedSpan,
} from './types';

export interface RunPipelineOptions {
  chunkSec?: number;
  overlapSec?: number;
  dedupeEpsilonSec?: number;
  concurrency?: number;
  model?: string;
  language?: string;
  retries?: number;
  retryBaseMs?: number;
  /** 'fail' aborts the job on the first chunk error; 'mark' records the span and continues */
  onChunkFailure?: ChunkFailurePolicy;
  diarize?: boolean;
  forceCpu?: boolean;
  /** Turn smoothing before alignment; false disables it */
  smoothing?: SmoothingOptions | false;
  signal?: AbortSignal;
}

export interface PipelineDeps {
  probe: MediaProbe;
  recognizer: Recognizer;
  diarizer?: Diarizer;
  /** Accelerator probe, run once per job */
  detectDevice?: () => Promise<Device>;
}

export interface PipelineWarning {
  code: string;
  message: string;
}

export interface RunPipelineResult {
  transcript: Transcript;
  durationSec: number;
  warnings: PipelineWarning[];
  unrecognized: UnrecognizedSpan[];
  diarization: DiarizationMeta;
}

interface DiarizationOutcome {
  intervals: DiarizationInterval[];
  meta: DiarizationMeta;
  warning?: PipelineWarning;
}

function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(new PipelineCancelledError());
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new PipelineCancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (v) => {
        signal.removeEventListener('abort', onAbort);
        resolve(v);
      },
      (e: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(e);
      }
    );
  });
}

/**
 * Diarization never fails the job: any error becomes a warning and an
 * empty interval list.
 */
async function runDiarization(
  media: MediaRef,
  opts: RunPipelineOptions,
  deps: PipelineDeps,
  signal: AbortSignal
): Promise<DiarizationOutcome> {
  const meta: DiarizationMeta = { requested: Boolean(opts.diarize), turns: 0, speakers: [] };
  if (!opts.diarize) return { intervals: [], meta };
  if (!deps.diarizer) {
    const message = 'Diarization requested but no diarization engine is configured';
    warn('diarize.unavailable', { mediaPath: media.path });
    return { intervals: [], meta, warning: { code: 'diarization_unavailable', message } };
  }
  try {
    const detect = deps.detectDevice ?? (() => probeDevice({ forceCpu: opts.forceCpu ?? ENV.diarizeForceCpu }));
    let device = await detect();
    const timer = startStep('pipeline.diarize', { mediaPath: media.path, device });
    let intervals: DiarizationInterval[];
    try {
      intervals = await deps.diarizer.diarize(media.path, { device, signal });
    } catch (e) {
      if (device !== 'cuda' || e instanceof PipelineCancelledError || signal.aborted) throw e;
      // Accelerator listed but unusable: one more run on CPU
      warn('diarize.cuda.fail', { mediaPath: media.path, error: errorMessage(e) });
      device = 'cpu';
      intervals = await deps.diarizer.diarize(media.path, { device, signal });
    }
    meta.device = device;
    const smoothing = opts.smoothing ?? { minDurSec: 0.6, maxGapSec: 0.4 };
    if (smoothing) intervals = mergeShortAdjacent(intervals, smoothing);
    meta.turns = intervals.length;
    meta.speakers = [...new Set(intervals.map((d) => d.speaker))].sort();
    timer.end({ device, turns: meta.turns, speakers: meta.speakers });
    return { intervals, meta };
  } catch (e) {
    const message = `Diarization failed, transcript is unlabeled: ${errorMessage(e)}`;
    warn('diarize.fail', { mediaPath: media.path, error: errorMessage(e) });
    return { intervals: [], meta, warning: { code: 'diarization_unavailable', message } };
  }
}

/**
 * Probe → plan → recognize chunks on a bounded pool → merge → (diarize → align).
 * Diarization runs alongside recognition; alignment waits for both.
 */
export async function runPipeline(
  mediaPath: string,
  opts: RunPipelineOptions = {},
  deps: PipelineDeps
): Promise<RunPipelineResult> {
  const controller = new AbortController();
  const onOuterAbort = () => controller.abort();
  opts.signal?.addEventListener('abort', onOuterAbort, { once: true });
  if (opts.signal?.aborted) controller.abort();
  const signal = controller.signal;

  const policy = opts.onChunkFailure ?? ENV.onChunkFailure;
  const model = opts.model ?? ENV.asrModel;
  const language = opts.language ?? (ENV.asrLanguage || undefined);
  const retryConfig = {
    retries: opts.retries ?? ENV.transcribeRetries,
    baseDelayMs: opts.retryBaseMs ?? ENV.transcribeRetryBaseMs,
    maxDelayMs: 30000,
    jitter: true,
  };

  try {
    const media = await abortable(deps.probe.probe(mediaPath, signal), signal);
    const chunks = planChunks(media.durationSec, {
      chunkSec: opts.chunkSec ?? ENV.chunkSec,
      overlapSec: opts.overlapSec ?? ENV.overlapSec,
    });
    info('pipeline.start', {
      mediaPath,
      durationSec: media.durationSec,
      chunks: chunks.length,
      engine: deps.recognizer.name,
      model,
      policy,
      diarize: Boolean(opts.diarize),
    });

    const diarization = runDiarization(media, opts, deps, signal);

    const pool = new WorkerPool(opts.concurrency ?? ENV.asrConcurrency, signal);
    const timer = startStep('pipeline.recognize', { total: chunks.length, width: pool.width });
    const unrecognized: UnrecognizedSpan[] = [];
    const warnings: PipelineWarning[] = [];
    let firstFailure: unknown;
    let done = 0;

    const recognizeOne = async (chunk: Chunk): Promise<ChunkResult> => {
      try {
        const audio = await deps.probe.extract(media, chunk, signal);
        const segments = await withRetry(
          (attempt) => {
            if (attempt > 0) info('pipeline.chunk.retry', { idx: chunk.index, attempt });
            return deps.recognizer.recognize(audio, { chunk, model, language, signal });
          },
          retryConfig,
          signal
        );
        const result = { chunk, segments: normalizeLocal(segments) };
        info('pipeline.chunk.done', { idx: chunk.index, segments: result.segments.length });
        return result;
      } catch (e) {
        if (e instanceof PipelineCancelledError || signal.aborted || policy === 'fail') {
          if (firstFailure === undefined && !(e instanceof PipelineCancelledError)) firstFailure = e;
          // Fail fast: stop admitting queued chunks
          controller.abort();
          throw e;
        }
        const reason = errorMessage(e);
        warn('pipeline.chunk.unrecognized', { idx: chunk.index, startSec: chunk.startSec, endSec: chunk.endSec, error: reason });
        unrecognized.push({ chunkIndex: chunk.index, startSec: chunk.startSec, endSec: chunk.endSec, reason });
        warnings.push({
          code: e instanceof PipelineError ? e.code : 'recognition_unavailable',
          message: `Chunk ${chunk.index} (${chunk.startSec.toFixed(2)}-${chunk.endSec.toFixed(2)}s) unrecognized: ${reason}`,
        });
        return { chunk, segments: [] };
      } finally {
        done += 1;
        timer.eta(done, chunks.length);
      }
    };

    let results: ChunkResult[];
    try {
      results = await abortable(Promise.all(chunks.map((chunk) => pool.run(() => recognizeOne(chunk)))), signal);
    } catch (e) {
      // The chunk that failed first carries the context; cancellations after it are fallout
      if (opts.signal?.aborted) throw new PipelineCancelledError();
      if (firstFailure !== undefined) throw firstFailure;
      throw e;
    }
    timer.end();

    unrecognized.sort((a, b) => a.chunkIndex - b.chunkIndex);
    let transcript = mergeChunks(results, { epsilonSec: opts.dedupeEpsilonSec ?? ENV.dedupeEpsilonSec });

    const diar = await abortable(diarization, signal);
    if (diar.warning) warnings.push(diar.warning);
    if (diar.intervals.length > 0) {
      transcript = assignSpeakers(transcript, diar.intervals);
    }

    info('pipeline.complete', {
      mediaPath,
      segments: transcript.length,
      speakers: listSpeakers(transcript),
      unrecognized: unrecognized.length,
      warnings: warnings.length,
    });
    return {
      transcript,
      durationSec: media.durationSec,
      warnings,
      unrecognized,
      diarization: diar.meta,
    };
  } finally {
    opts.signal?.removeEventListener('abort', onOuterAbort);
    // Abandon whatever is still in flight (diarization after a recognition failure, late chunks)
    controller.abort();
  }
}
