import { describe, it, expect, vi } from 'vitest';
import { MediaProbeError, PipelineCancelledError } from '../src/pipeline/errors';
import { CommandError, FfmpegMediaProbe, type CommandRunner } from '../src/pipeline/media';

function probeWith(text: () => Promise<string>, buffer: () => Promise<Buffer>) {
  const runner: CommandRunner = { text: vi.fn(text), buffer: vi.fn(buffer) };
  const probe = new FfmpegMediaProbe({ ffmpegBin: 'ffmpeg', ffprobeBin: 'ffprobe', runner });
  return { probe, runner };
}

describe('FfmpegMediaProbe', () => {
  it('should read the duration from ffprobe', async () => {
    const { probe } = probeWith(async () => '125.5\n', async () => Buffer.alloc(0));
    await expect(probe.probe('talk.mp4')).resolves.toEqual({ path: 'talk.mp4', durationSec: 125.5 });
  });

  it('should reject output without a duration', async () => {
    const { probe } = probeWith(async () => 'N/A', async () => Buffer.alloc(0));
    await expect(probe.probe('talk.mp4')).rejects.toBeInstanceOf(MediaProbeError);
  });

  it('should wrap ffprobe failures', async () => {
    const { probe } = probeWith(
      async () => {
        throw new CommandError('exit 1', { exitCode: 1 });
      },
      async () => Buffer.alloc(0)
    );
    await expect(probe.probe('missing.mp4')).rejects.toThrow('ffprobe failed for missing.mp4');
  });

  it('should extract a chunk window as mono 16 kHz WAV', async () => {
    const { probe, runner } = probeWith(async () => '', async () => Buffer.from('RIFF'));
    const bytes = await probe.extract({ path: 'talk.mp4', durationSec: 125 }, { index: 1, startSec: 55, endSec: 115 });
    expect(bytes.toString()).toBe('RIFF');
    const buffer = vi.mocked(runner.buffer);
    const [file, args] = buffer.mock.calls[0];
    expect(file).toBe('ffmpeg');
    expect(args.slice(args.indexOf('-ss'), args.indexOf('-ss') + 4)).toEqual(['-ss', '55', '-t', '60']);
    expect(args.slice(args.indexOf('-ar'), args.indexOf('-ar') + 2)).toEqual(['-ar', '16000']);
    expect(args[args.length - 1]).toBe('pipe:1');
  });

  it('should reject an empty extraction', async () => {
    const { probe } = probeWith(async () => '', async () => Buffer.alloc(0));
    const err = await probe
      .extract({ path: 'talk.mp4', durationSec: 125 }, { index: 2, startSec: 110, endSec: 125 })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(MediaProbeError);
    expect(err instanceof MediaProbeError && err.context.chunkIndex).toBe(2);
  });

  it('should surface cancellation', async () => {
    const { probe } = probeWith(
      async () => '',
      async () => {
        throw new CommandError('aborted', { canceled: true });
      }
    );
    await expect(
      probe.extract({ path: 'talk.mp4', durationSec: 10 }, { index: 0, startSec: 0, endSec: 10 })
    ).rejects.toBeInstanceOf(PipelineCancelledError);
  });
});
