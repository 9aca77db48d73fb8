import { z } from 'zod';
import { ENV } from './env';
import { ConfigError } from './errors';
import { CAPTION_FORMATS } from './types';
import type { CaptionFormat } from './types';

const PipelineConfigSchema = z.object({
  chunkSec: z.number().finite().positive(),
  sampleRate: z.number().int().positive(),
  concurrency: z.number().int().min(1),
  model: z.string().min(1),
  requestTimeoutSec: z.number().positive(),
  retries: z.number().int().min(0),
  retryBaseMs: z.number().min(0),
  gapThresholdSec: z.number().min(0),
  silenceThresholdDb: z.number(),
  forceIncludeSec: z.number().min(0),
  placeholderSec: z.number().finite().positive(),
  optimizeTiming: z.boolean(),
  classifyGaps: z.boolean(),
  format: z.enum(['srt', 'vtt']),
  subtitleLanguage: z.string().min(1),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export function defaultPipelineConfig(): PipelineConfig {
  return {
    chunkSec: ENV.chunkSec,
    sampleRate: ENV.sampleRate,
    concurrency: ENV.concurrency,
    model: ENV.geminiModel,
    requestTimeoutSec: ENV.requestTimeoutSec,
    retries: ENV.transcribeRetries,
    retryBaseMs: ENV.transcribeRetryBaseMs,
    gapThresholdSec: ENV.gapThresholdSec,
    silenceThresholdDb: ENV.silenceThresholdDb,
    forceIncludeSec: ENV.forceIncludeSec,
    placeholderSec: ENV.placeholderSec,
    optimizeTiming: ENV.optimizeTiming,
    classifyGaps: ENV.classifyGaps,
    format: 'srt',
    subtitleLanguage: ENV.subtitleLanguage,
  };
}

/**
 * Merge overrides over the environment defaults and validate the result.
 * Every problem is reported at once, before any work starts.
 */
export function resolvePipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  const defined = Object.fromEntries(Object.entries(overrides).filter(([, v]) => v !== undefined));
  const parsed = PipelineConfigSchema.safeParse({ ...defaultPipelineConfig(), ...defined });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

export function parseCaptionFormat(value: string): CaptionFormat {
  const v = value.trim().toLowerCase();
  const match = CAPTION_FORMATS.find((f) => f === v);
  if (!match) {
    throw new ConfigError(`Unsupported output format: ${value}. Use one of ${CAPTION_FORMATS.join(', ')}`);
  }
  return match;
}
