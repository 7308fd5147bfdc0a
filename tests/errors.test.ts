import { describe, it, expect } from 'vitest';
import {
  DiarizationUnavailableError,
  EmptyRecognitionOutputError,
  ExportEncodingError,
  InvalidDurationError,
  PipelineCancelledError,
  PipelineError,
  RecognitionTimeoutError,
  RecognitionUnavailableError,
  errorMessage,
  isRetryable,
} from '../src/pipeline/errors';

describe('Error Classes', () => {
  it('should carry a code and context', () => {
    const error = new RecognitionUnavailableError('engine down', { chunkIndex: 2, startSec: 55, endSec: 115 });
    expect(error).toBeInstanceOf(PipelineError);
    expect(error.name).toBe('RecognitionUnavailableError');
    expect(error.code).toBe('recognition_unavailable');
    expect(error.toString()).toBe(
      'RecognitionUnavailableError: engine down (chunk: 2) (span: 55.000-115.000s)'
    );
  });

  it('should render format and media context', () => {
    const error = new ExportEncodingError('bad bytes', { format: 'pdf', mediaPath: 'a.wav' });
    expect(error.toString()).toBe('ExportEncodingError: bad bytes (format: pdf) (media: a.wav)');
  });

  it('should assign stable codes', () => {
    expect(new InvalidDurationError('x').code).toBe('invalid_duration');
    expect(new RecognitionTimeoutError('x').code).toBe('recognition_timeout');
    expect(new EmptyRecognitionOutputError('x').code).toBe('empty_recognition_output');
    expect(new DiarizationUnavailableError('x').code).toBe('diarization_unavailable');
    expect(new PipelineCancelledError().message).toBe('Pipeline cancelled');
  });

  it('should only retry recognition failures', () => {
    expect(isRetryable(new RecognitionUnavailableError('x'))).toBe(true);
    expect(isRetryable(new RecognitionTimeoutError('x'))).toBe(true);
    expect(isRetryable(new PipelineCancelledError())).toBe(false);
    expect(isRetryable(new Error('x'))).toBe(false);
  });

  it('should describe unknown throwables', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
