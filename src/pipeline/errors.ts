/**
 * Error classes for the transcription pipeline
 */

import type { ExportFormat } from './types';

export interface ErrorContext {
  chunkIndex?: number;
  startSec?: number;
  endSec?: number;
  format?: ExportFormat;
  mediaPath?: string;
  cause?: string;
}

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
  code: string;
  context: ErrorContext;

  constructor(message: string, code: string, context: ErrorContext = {}) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    const parts = [`${this.name}: ${this.message}`];
    const { chunkIndex, startSec, endSec, format, mediaPath } = this.context;
    if (chunkIndex !== undefined) {
      parts.push(`(chunk: ${chunkIndex})`);
    }
    if (startSec !== undefined && endSec !== undefined) {
      parts.push(`(span: ${startSec.toFixed(3)}-${endSec.toFixed(3)}s)`);
    }
    if (format) {
      parts.push(`(format: ${format})`);
    }
    if (mediaPath) {
      parts.push(`(media: ${mediaPath})`);
    }
    return parts.join(' ');
  }
}

/**
 * Media duration is zero, negative or not a number
 */
export class InvalidDurationError extends PipelineError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'invalid_duration', context);
    this.name = 'InvalidDurationError';
  }
}

/**
 * Chunk length / overlap combination cannot tile the media
 */
export class InvalidChunkPolicyError extends PipelineError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'invalid_chunk_policy', context);
    this.name = 'InvalidChunkPolicyError';
  }
}

/**
 * Duration probe or audio extraction failed
 */
export class MediaProbeError extends PipelineError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'media_probe_failed', context);
    this.name = 'MediaProbeError';
  }
}

/**
 * Speech-to-text engine or its transport failed
 */
export class RecognitionUnavailableError extends PipelineError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'recognition_unavailable', context);
    this.name = 'RecognitionUnavailableError';
  }
}

/**
 * Speech-to-text call exceeded its deadline
 */
export class RecognitionTimeoutError extends PipelineError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'recognition_timeout', context);
    this.name = 'RecognitionTimeoutError';
  }
}

/**
 * Every chunk came back without a single segment
 */
export class EmptyRecognitionOutputError extends PipelineError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'empty_recognition_output', context);
    this.name = 'EmptyRecognitionOutputError';
  }
}

export class DiarizationUnavailableError extends PipelineError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'diarization_unavailable', context);
    this.name = 'DiarizationUnavailableError';
  }
}

/**
 * Transcript text could not be encoded for the target format
 */
export class ExportEncodingError extends PipelineError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'export_encoding', context);
    this.name = 'ExportEncodingError';
  }
}

export class PipelineCancelledError extends PipelineError {
  constructor(message = 'Pipeline cancelled', context?: ErrorContext) {
    super(message, 'cancelled', context);
    this.name = 'PipelineCancelledError';
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof RecognitionUnavailableError || error instanceof RecognitionTimeoutError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
