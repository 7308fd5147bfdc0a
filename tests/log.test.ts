import { afterEach, describe, it, expect, vi } from 'vitest';
import { error, info, setLogLevel, warn } from '../src/pipeline/log';

describe('log', () => {
  afterEach(() => {
    setLogLevel('error');
    vi.restoreAllMocks();
  });

  it('should drop events below the configured level', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogLevel('warn');
    info('pipeline.start');
    warn('retry.backoff', { attempt: 1 });
    expect(out).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(out.mock.calls[0][0]));
    expect(line).toMatchObject({ level: 'warn', msg: 'retry.backoff', attempt: 1 });
  });

  it('should emit errors as JSON lines', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogLevel('debug');
    error('transcribe.fail', { error: 'boom' });
    const line: unknown = JSON.parse(String(out.mock.calls[0][0]));
    expect(line).toMatchObject({ level: 'error', msg: 'transcribe.fail', error: 'boom' });
  });
});
