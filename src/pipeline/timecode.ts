/**
 * Seconds <-> fixed-width timecode strings used by the export formats.
 */

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/**
 * Whole milliseconds, rounding half-up. The toFixed pass absorbs binary
 * representation noise such as 1.0005 * 1000 = 1000.4999999999999.
 */
export function toMillis(seconds: number): number {
  if (!Number.isFinite(seconds) || seconds <= 0) return 0;
  return Math.floor(Number((seconds * 1000).toFixed(6)) + 0.5);
}

function clock(seconds: number, separator: ',' | '.'): string {
  const total = toMillis(seconds);
  const ms = total % 1000;
  const s = Math.floor(total / 1000) % 60;
  const m = Math.floor(total / 60000) % 60;
  const h = Math.floor(total / 3600000);
  return `${pad(h)}:${pad(m)}:${pad(s)}${separator}${pad(ms, 3)}`;
}

/** `HH:MM:SS,mmm` */
export function toSrtTime(seconds: number): string {
  return clock(seconds, ',');
}

/** `HH:MM:SS.mmm` */
export function toVttTime(seconds: number): string {
  return clock(seconds, '.');
}

/** `MM:SS`; minutes keep counting past the hour (`75:03`). */
export function toShortTime(seconds: number): string {
  const total = Math.floor(toMillis(seconds) / 1000);
  return `${pad(Math.floor(total / 60))}:${pad(total % 60)}`;
}

export function toShortRange(startSec: number, endSec: number): string {
  return `[${toShortTime(startSec)} - ${toShortTime(endSec)}]`;
}

const SRT_TIME = /^(\d{2,}):(\d{2}):(\d{2})[,.](\d{3})$/;

export function parseSrtTime(value: string): number {
  const m = value.trim().match(SRT_TIME);
  if (!m) {
    throw new Error(`Invalid timecode: ${value}`);
  }
  const [, h, mm, ss, ms] = m;
  return (Number(h) * 3600000 + Number(mm) * 60000 + Number(ss) * 1000 + Number(ms)) / 1000;
}
