/**
 * Error classes for the caption pipeline.
 *
 * Fatal job errors derive from {@link PipelineError}. Failures of the
 * inference service derive from {@link InferenceError}; those are recovered
 * locally by the stage that made the call and never end a job.
 */

import {
  GoogleGenerativeAIAbortError,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError,
} from '@google/generative-ai';

/**
 * Base class for errors that end a job
 */
export class PipelineError extends Error {
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.details = details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Invalid configuration (chunk duration, output format, concurrency...)
 */
export class ConfigError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Missing local file, failed download or undecodable media
 */
export class AcquisitionError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'AcquisitionError';
  }
}

/**
 * Unsupported caption format requested from the formatter
 */
export class FormatError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'FormatError';
  }
}

/**
 * The caller aborted the job
 */
export class JobCancelledError extends PipelineError {
  constructor(message = 'Job cancelled') {
    super(message);
    this.name = 'JobCancelledError';
  }
}

/**
 * ffmpeg could not add the subtitle stream
 */
export class MuxError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'MuxError';
  }
}

/**
 * Base class for inference service failures
 */
export class InferenceError extends Error {
  statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'InferenceError';
    this.statusCode = statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    return this.statusCode ? `${this.message} (status: ${this.statusCode})` : this.message;
  }
}

export class RateLimitError extends InferenceError {
  constructor(message: string, statusCode = 429) {
    super(message, statusCode);
    this.name = 'RateLimitError';
  }
}

export class ServerError extends InferenceError {
  constructor(message: string, statusCode?: number) {
    super(message, statusCode);
    this.name = 'ServerError';
  }
}

export class NetworkError extends InferenceError {
  constructor(message: string) {
    super(message);
    this.name = 'NetworkError';
  }
}

export class TimeoutError extends InferenceError {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Map whatever the SDK (or fetch underneath it) threw onto the inference error family
 */
export function toInferenceError(e: unknown): InferenceError {
  if (e instanceof InferenceError) return e;
  const message = errorMessage(e);
  // Blocked or empty candidates: asking again returns the same verdict
  if (e instanceof GoogleGenerativeAIResponseError) return new InferenceError(message);
  if (e instanceof GoogleGenerativeAIFetchError) {
    const status = e.status;
    if (status === 429) return new RateLimitError(message);
    if (status !== undefined && status >= 500) return new ServerError(message, status);
    return new InferenceError(message, status);
  }
  // The SDK aborts its own request when the timeout elapses
  if (e instanceof GoogleGenerativeAIAbortError) return new TimeoutError(message);
  if (e instanceof Error && (e.name === 'AbortError' || e.name === 'TimeoutError' || /timed? ?out/i.test(message))) {
    return new TimeoutError(message);
  }
  return new NetworkError(message);
}

export interface ExecFailure {
  message: string;
  exitCode?: number;
  stderrTail: string;
}

/**
 * Pull the useful bits out of an execa rejection without assuming its shape
 */
export function describeExecError(e: unknown): ExecFailure {
  if (typeof e !== 'object' || e === null) return { message: String(e), stderrTail: '' };
  const short = 'shortMessage' in e && typeof e.shortMessage === 'string' ? e.shortMessage : undefined;
  const raw = 'stderr' in e ? e.stderr : undefined;
  const stderr = typeof raw === 'string' ? raw : raw instanceof Uint8Array ? Buffer.from(raw).toString('utf8') : '';
  const exitCode = 'exitCode' in e && typeof e.exitCode === 'number' ? e.exitCode : undefined;
  return {
    message: short ?? errorMessage(e),
    exitCode,
    stderrTail: stderr.slice(-800),
  };
}
