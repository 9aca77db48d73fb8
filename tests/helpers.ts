import { resolvePipelineConfig } from '../src/pipeline/config';
import type { PipelineConfig } from '../src/pipeline/config';
import { NullDiagnosticSink } from '../src/pipeline/context';
import type { DiagnosticSink, JobContext } from '../src/pipeline/context';
import type { InferenceRequest, InferenceResult, InferenceService } from '../src/pipeline/inference';
import type { Window } from '../src/pipeline/types';

type Responder = (request: InferenceRequest) => InferenceResult | Promise<InferenceResult>;

/**
 * In-process inference service: answers from a responder and records every request.
 */
export class FakeInferenceService implements InferenceService {
  readonly model = 'fake-model';
  readonly requests: InferenceRequest[] = [];

  constructor(private readonly responder: Responder) {}

  async generate(request: InferenceRequest): Promise<InferenceResult> {
    this.requests.push(request);
    return this.responder(request);
  }

  labels(): string[] {
    return this.requests.map((r) => r.label ?? '');
  }
}

export class MemoryDiagnosticSink implements DiagnosticSink {
  readonly entries = new Map<string, unknown>();

  async write(name: string, data: unknown): Promise<void> {
    this.entries.set(name, data);
  }
}

export const ok = (text: string): InferenceResult => ({ ok: true, text });
export const fail = (reason = 'service unavailable'): InferenceResult => ({ ok: false, reason });

export function makeContext(
  service: InferenceService,
  overrides: Partial<PipelineConfig> = {},
  extra: { diagnostics?: DiagnosticSink; signal?: AbortSignal } = {}
): JobContext {
  return {
    jobId: 'test-job',
    service,
    diagnostics: extra.diagnostics ?? new NullDiagnosticSink(),
    config: resolvePipelineConfig({
      chunkSec: 30,
      concurrency: 1,
      gapThresholdSec: 1,
      silenceThresholdDb: -50,
      forceIncludeSec: 3,
      placeholderSec: 5,
      optimizeTiming: false,
      classifyGaps: false,
      ...overrides,
    }),
    signal: extra.signal,
  };
}

/** Window over `samples` at `sampleRate`, defaulting to silence. */
export function makeWindow(startSec: number, endSec: number, opts: { sampleRate?: number; fill?: number; index?: number } = {}): Window {
  const sampleRate = opts.sampleRate ?? 10;
  const samples = new Int16Array(Math.round((endSec - startSec) * sampleRate)).fill(opts.fill ?? 0);
  return { index: opts.index ?? 0, startSec, endSec, samples, sampleRate };
}
