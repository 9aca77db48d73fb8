/**
 * Tests for error classes
 */

import { describe, it, expect } from 'vitest';
import {
  GoogleGenerativeAIAbortError,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError,
} from '@google/generative-ai';
import {
  AcquisitionError,
  ConfigError,
  describeExecError,
  FormatError,
  InferenceError,
  JobCancelledError,
  MuxError,
  NetworkError,
  PipelineError,
  RateLimitError,
  ServerError,
  TimeoutError,
  toInferenceError,
} from '../src/pipeline/errors';

describe('Error Classes', () => {
  describe('PipelineError', () => {
    it('should carry details', () => {
      const error = new PipelineError('Test error', { field: 'value' });
      expect(error.message).toBe('Test error');
      expect(error.name).toBe('PipelineError');
      expect(error.details).toEqual({ field: 'value' });
    });

    it('should name each job error', () => {
      expect(new ConfigError('x')).toBeInstanceOf(PipelineError);
      expect(new AcquisitionError('x').name).toBe('AcquisitionError');
      expect(new FormatError('x').name).toBe('FormatError');
      expect(new MuxError('x').name).toBe('MuxError');
      expect(new JobCancelledError().message).toBe('Job cancelled');
    });
  });

  describe('InferenceError', () => {
    it('should format toString with the status', () => {
      expect(new InferenceError('Bad', 400).toString()).toBe('Bad (status: 400)');
      expect(new InferenceError('Bad').toString()).toBe('Bad');
    });

    it('should not be a job error', () => {
      expect(new NetworkError('x')).toBeInstanceOf(InferenceError);
      expect(new NetworkError('x')).not.toBeInstanceOf(PipelineError);
      expect(new RateLimitError('x').statusCode).toBe(429);
    });
  });
});

describe('toInferenceError', () => {
  it('maps SDK fetch errors by status', () => {
    expect(toInferenceError(new GoogleGenerativeAIFetchError('slow', 429))).toBeInstanceOf(RateLimitError);

    const server = toInferenceError(new GoogleGenerativeAIFetchError('down', 503));
    expect(server).toBeInstanceOf(ServerError);
    expect(server.statusCode).toBe(503);

    const client = toInferenceError(new GoogleGenerativeAIFetchError('bad', 400));
    expect(client.name).toBe('InferenceError');
    expect(client.statusCode).toBe(400);
  });

  it('maps blocked responses to a plain inference error', () => {
    const mapped = toInferenceError(new GoogleGenerativeAIResponseError('blocked'));
    expect(mapped.name).toBe('InferenceError');
    expect(mapped.statusCode).toBeUndefined();
  });

  it('maps aborts and timeouts to TimeoutError', () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';
    expect(toInferenceError(abort)).toBeInstanceOf(TimeoutError);
    expect(toInferenceError(new Error('Request timed out'))).toBeInstanceOf(TimeoutError);
    expect(toInferenceError(new GoogleGenerativeAIAbortError('Request aborted'))).toBeInstanceOf(TimeoutError);
  });

  it('treats anything else as a network failure', () => {
    expect(toInferenceError(new Error('ECONNRESET'))).toBeInstanceOf(NetworkError);
    expect(toInferenceError('weird')).toBeInstanceOf(NetworkError);
  });

  it('passes inference errors through', () => {
    const e = new ServerError('down', 502);
    expect(toInferenceError(e)).toBe(e);
  });
});

describe('describeExecError', () => {
  it('reads execa rejection fields', () => {
    const failure = describeExecError({ shortMessage: 'Command failed', exitCode: 1, stderr: Buffer.from('boom') });
    expect(failure).toEqual({ message: 'Command failed', exitCode: 1, stderrTail: 'boom' });
  });

  it('keeps the tail of long stderr', () => {
    const failure = describeExecError({ stderr: 'x'.repeat(1000) + 'END' });
    expect(failure.stderrTail).toHaveLength(800);
    expect(failure.stderrTail.endsWith('END')).toBe(true);
  });

  it('handles non-objects', () => {
    expect(describeExecError('oops')).toEqual({ message: 'oops', stderrTail: '' });
  });
});
