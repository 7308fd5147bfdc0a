import { describe, it, expect } from 'vitest';
import { parseSrtTime, toMillis, toShortRange, toShortTime, toSrtTime, toVttTime } from '../src/pipeline/timecode';

describe('timecode', () => {
  it('should format SRT and VTT clocks', () => {
    expect(toSrtTime(0)).toBe('00:00:00,000');
    expect(toSrtTime(30)).toBe('00:00:30,000');
    expect(toSrtTime(3723.456)).toBe('01:02:03,456');
    expect(toVttTime(3723.456)).toBe('01:02:03.456');
  });

  it('should round half up to whole milliseconds', () => {
    expect(toMillis(1.0005)).toBe(1001);
    expect(toMillis(1.0004)).toBe(1000);
    expect(toSrtTime(59.9996)).toBe('00:01:00,000');
  });

  it('should clamp negative and non-finite values to zero', () => {
    expect(toMillis(-3)).toBe(0);
    expect(toMillis(Number.NaN)).toBe(0);
    expect(toSrtTime(Number.POSITIVE_INFINITY)).toBe('00:00:00,000');
  });

  it('should keep counting minutes past the hour in short ranges', () => {
    expect(toShortTime(65)).toBe('01:05');
    expect(toShortTime(4503.9)).toBe('75:03');
    expect(toShortRange(30, 31)).toBe('[00:30 - 00:31]');
  });

  it('should parse either millisecond separator', () => {
    expect(parseSrtTime('01:02:03,456')).toBe(3723.456);
    expect(parseSrtTime(' 00:00:30.000 ')).toBe(30);
    expect(() => parseSrtTime('1:2:3')).toThrow('Invalid timecode');
  });
});
