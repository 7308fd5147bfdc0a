import { describe, it, expect, vi } from 'vitest';
import { ProcessDiarizer, type Diarizer } from '../src/pipeline/diarize';
import {
  DiarizationUnavailableError,
  EmptyRecognitionOutputError,
  PipelineCancelledError,
  RecognitionTimeoutError,
  RecognitionUnavailableError,
} from '../src/pipeline/errors';
import { CommandError, type CommandRunner, type MediaProbe } from '../src/pipeline/media';
import type { RecognitionRequest, Recognizer } from '../src/pipeline/recognize';
import { runPipeline, type PipelineDeps, type RunPipelineOptions } from '../src/pipeline/run';
import type { DiarizationInterval, LocalSegment } from '../src/pipeline/types';

const probe: MediaProbe = {
  probe: async (path) => ({ path, durationSec: 25 }),
  extract: async () => Buffer.from('RIFF'),
};

function recognizer(impl: (req: RecognitionRequest) => Promise<LocalSegment[]>): Recognizer & { calls: number[] } {
  const calls: number[] = [];
  return {
    name: 'fake',
    calls,
    recognize: async (_audio, req) => {
      calls.push(req.chunk.index);
      return impl(req);
    },
  };
}

const perChunk = recognizer(async (req) => [{ startSec: 0, endSec: 2, text: `chunk ${req.chunk.index}` }]);

function diarizer(impl: () => Promise<DiarizationInterval[]>): Diarizer {
  return { name: 'fake', diarize: impl };
}

// 25 s of media in three 10 s windows without overlap
const base: RunPipelineOptions = {
  chunkSec: 10,
  overlapSec: 0,
  concurrency: 2,
  retries: 0,
  onChunkFailure: 'fail',
};

function deps(overrides: Partial<PipelineDeps> = {}): PipelineDeps {
  return { probe, recognizer: perChunk, detectDevice: async () => 'cpu', ...overrides };
}

describe('runPipeline', () => {
  it('should recognize every chunk and merge onto media time', async () => {
    const result = await runPipeline('talk.wav', base, deps());
    expect(result.durationSec).toBe(25);
    expect(result.transcript).toEqual([
      { startSec: 0, endSec: 2, text: 'chunk 0' },
      { startSec: 10, endSec: 12, text: 'chunk 1' },
      { startSec: 20, endSec: 22, text: 'chunk 2' },
    ]);
    expect(result.warnings).toEqual([]);
    expect(result.unrecognized).toEqual([]);
    expect(result.diarization).toEqual({ requested: false, turns: 0, speakers: [] });
  });

  it('should label segments when diarization succeeds', async () => {
    const result = await runPipeline(
      'talk.wav',
      { ...base, diarize: true, smoothing: false },
      deps({
        diarizer: diarizer(async () => [
          { speaker: 'SPEAKER_00', startSec: 0, endSec: 15 },
          { speaker: 'SPEAKER_01', startSec: 15, endSec: 25 },
        ]),
      })
    );
    expect(result.transcript.map((s) => s.speaker)).toEqual(['SPEAKER_00', 'SPEAKER_00', 'SPEAKER_01']);
    expect(result.diarization).toEqual({
      requested: true,
      device: 'cpu',
      turns: 2,
      speakers: ['SPEAKER_00', 'SPEAKER_01'],
    });
  });

  it('should finish unlabeled with a warning when diarization fails', async () => {
    const result = await runPipeline(
      'talk.wav',
      { ...base, diarize: true },
      deps({
        diarizer: diarizer(async () => {
          throw new DiarizationUnavailableError('model missing');
        }),
      })
    );
    expect(result.transcript).toHaveLength(3);
    expect(result.transcript.every((s) => s.speaker === undefined)).toBe(true);
    expect(result.warnings).toEqual([
      { code: 'diarization_unavailable', message: 'Diarization failed, transcript is unlabeled: model missing' },
    ]);
  });

  it('should rerun diarization on cpu when the accelerator run fails', async () => {
    const text = vi.fn(async (_file: string, args: string[]) => {
      if (args.includes('--gpus')) throw new CommandError('could not select device driver', { exitCode: 125 });
      return JSON.stringify([{ speaker: 'A', start: 0, end: 25 }]);
    });
    const runner: CommandRunner = { text, buffer: vi.fn(async () => Buffer.alloc(0)) };
    const result = await runPipeline(
      'talk.wav',
      { ...base, diarize: true },
      deps({ diarizer: new ProcessDiarizer({ image: 'diarize:local', runner }), detectDevice: async () => 'cuda' })
    );
    expect(text).toHaveBeenCalledTimes(2);
    expect(text.mock.calls[1][1].slice(-2)).toEqual(['--device', 'cpu']);
    expect(text.mock.calls[1][1]).not.toContain('--gpus');
    expect(result.transcript.map((s) => s.speaker)).toEqual(['A', 'A', 'A']);
    expect(result.diarization.device).toBe('cpu');
    expect(result.warnings).toEqual([]);
  });

  it('should not rerun a failed cpu diarization', async () => {
    const diarize = vi.fn(async (): Promise<DiarizationInterval[]> => {
      throw new DiarizationUnavailableError('model missing');
    });
    const result = await runPipeline('talk.wav', { ...base, diarize: true }, deps({ diarizer: { name: 'fake', diarize } }));
    expect(diarize).toHaveBeenCalledTimes(1);
    expect(result.warnings.map((w) => w.code)).toEqual(['diarization_unavailable']);
  });

  it('should warn when diarization is requested without an engine', async () => {
    const result = await runPipeline('talk.wav', { ...base, diarize: true }, deps());
    expect(result.warnings.map((w) => w.code)).toEqual(['diarization_unavailable']);
    expect(result.diarization.requested).toBe(true);
  });

  it('should fail the job on the first chunk error by default', async () => {
    const failing = recognizer(async (req) => {
      if (req.chunk.index === 1) throw new RecognitionUnavailableError('engine down');
      return [{ startSec: 0, endSec: 1, text: 'ok' }];
    });
    await expect(
      runPipeline('talk.wav', { ...base, concurrency: 1 }, deps({ recognizer: failing }))
    ).rejects.toThrow('engine down');
    expect(failing.calls).toEqual([0, 1]);
  });

  it('should mark failed chunks and keep going when asked to', async () => {
    const failing = recognizer(async (req) => {
      if (req.chunk.index === 1) throw new RecognitionUnavailableError('engine down');
      return [{ startSec: 0, endSec: 1, text: `ok ${req.chunk.index}` }];
    });
    const result = await runPipeline('talk.wav', { ...base, onChunkFailure: 'mark' }, deps({ recognizer: failing }));
    expect(result.transcript.map((s) => s.text)).toEqual(['ok 0', 'ok 2']);
    expect(result.unrecognized).toEqual([{ chunkIndex: 1, startSec: 10, endSec: 20, reason: 'engine down' }]);
    expect(result.warnings).toEqual([
      { code: 'recognition_unavailable', message: 'Chunk 1 (10.00-20.00s) unrecognized: engine down' },
    ]);
  });

  it('should retry a chunk that timed out', async () => {
    const seen = new Set<number>();
    const flaky = recognizer(async (req) => {
      if (!seen.has(req.chunk.index)) {
        seen.add(req.chunk.index);
        throw new RecognitionTimeoutError('slow');
      }
      return [{ startSec: 0, endSec: 1, text: 'ok' }];
    });
    const result = await runPipeline('talk.wav', { ...base, retries: 1, retryBaseMs: 1 }, deps({ recognizer: flaky }));
    expect(result.transcript).toHaveLength(3);
    expect(flaky.calls).toHaveLength(6);
  });

  it('should raise when nothing was recognized', async () => {
    const silent = recognizer(async () => []);
    await expect(runPipeline('talk.wav', base, deps({ recognizer: silent }))).rejects.toBeInstanceOf(
      EmptyRecognitionOutputError
    );
  });

  it('should stop when cancelled', async () => {
    const controller = new AbortController();
    const cancelling = recognizer(async () => {
      controller.abort();
      throw new PipelineCancelledError();
    });
    await expect(
      runPipeline('talk.wav', { ...base, signal: controller.signal }, deps({ recognizer: cancelling }))
    ).rejects.toBeInstanceOf(PipelineCancelledError);
  });

  it('should not start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const extract = vi.fn(async () => Buffer.from('RIFF'));
    await expect(
      runPipeline('talk.wav', { ...base, signal: controller.signal }, deps({ probe: { ...probe, extract } }))
    ).rejects.toBeInstanceOf(PipelineCancelledError);
    expect(extract).not.toHaveBeenCalled();
  });
});
