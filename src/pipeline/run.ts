import fs from "fs-extra";
import path from "path";
import { decodeAudio } from "./audio";
import { assemble, inspectCoverage } from "./assemble";
import { splitTrack, toManifest } from "./chunk";
import { resolvePipelineConfig } from "./config";
import type { PipelineConfig } from "./config";
import { FileDiagnosticSink, throwIfCancelled } from "./context";
import type { JobContext } from "./context";
import { ENV } from "./env";
import { AcquisitionError } from "./errors";
import {
  formatCaptions,
  readTranscriptJson,
  writeCaptions,
  writeTranscriptJson,
} from "./export";
import { fillGaps } from "./gaps";
import { GeminiInferenceService } from "./inference";
import type { InferenceService } from "./inference";
import { ingest, outputDirFor } from "./ingest";
import { embedSubtitles } from "./mux";
import { optimizeTiming } from "./optimize";
import { runPool } from "./pool";
import { DEFAULT_RETRY_CONFIG } from "./retry";
import { isPlaceholder } from "./segment";
import { transcribeWindow } from "./transcribe";
import type { AudioTrack, Segment, SourceMeta } from "./types";
import { debug, info, startStep, warn, withLogFile } from "./log";

/**
 * Chunk → transcribe and fill gaps per window (bounded parallelism) →
 * assemble → optional global timing pass, which waits for every window.
 */
export async function generateTranscript(track: AudioTrack, ctx: JobContext): Promise<Segment[]> {
  const { chunkSec, concurrency } = ctx.config;
  const windows = [...splitTrack(track, chunkSec)];
  await ctx.diagnostics.write("manifest", toManifest(track, chunkSec, windows));

  const timer = startStep("transcribe.windows", { jobId: ctx.jobId, total: windows.length, concurrency });
  let processed = 0;
  const perWindow = await runPool(
    windows,
    concurrency,
    async (window) => {
      const drafts = await transcribeWindow(window, ctx);
      const filled = await fillGaps(window, drafts, ctx);
      processed += 1;
      timer.eta(processed, windows.length);
      return filled;
    },
    ctx.signal
  );
  timer.end();

  const assembled = assemble(perWindow);
  const coverage = inspectCoverage(assembled, track.durationSec);
  debug("assemble.coverage", {
    jobId: ctx.jobId,
    holes: coverage.holes.length,
    overlaps: coverage.overlaps,
    placeholders: assembled.filter(isPlaceholder).length,
  });

  throwIfCancelled(ctx);
  const result = ctx.config.optimizeTiming ? await optimizeTiming(assembled, ctx) : assembled;
  throwIfCancelled(ctx);
  return result;
}

export interface CaptionResult {
  segments: Segment[];
  transcriptPath: string;
  captionPath: string;
}

export async function captionMedia(
  mediaPath: string,
  outputDir: string,
  source: SourceMeta,
  ctx: JobContext
): Promise<CaptionResult> {
  const track = await decodeAudio(mediaPath, ctx.config.sampleRate);
  const segments = await generateTranscript(track, ctx);
  const transcriptPath = await writeTranscriptJson(
    {
      source: { ...source, durationSec: track.durationSec },
      processing: {
        createdAt: new Date().toISOString(),
        model: ctx.service.model,
        chunkSec: ctx.config.chunkSec,
        optimized: ctx.config.optimizeTiming,
      },
      durationSec: track.durationSec,
      segments,
    },
    outputDir
  );
  const captionPath = await writeCaptions(segments, outputDir, ctx.config.format);
  return { segments, transcriptPath, captionPath };
}

export function createInferenceService(config: PipelineConfig): InferenceService {
  return new GeminiInferenceService({
    apiKey: ENV.geminiApiKey,
    model: config.model,
    timeoutMs: config.requestTimeoutSec * 1000,
    retry: { ...DEFAULT_RETRY_CONFIG, maxRetries: config.retries, initialDelay: config.retryBaseMs },
  });
}

export interface ProcessOptions {
  outputDir?: string;
  outputRoot?: string;
  config?: Partial<PipelineConfig>;
  /** Reuse captions.<format> already in the output directory */
  skipCaptions?: boolean;
  /** Stop after writing the caption file */
  skipEmbedding?: boolean;
  service?: InferenceService;
  signal?: AbortSignal;
}

export interface ProcessResult {
  video: string;
  captions: string;
  transcript?: string;
  videoWithCaptions?: string;
}

/**
 * SRT file to hand to the muxer. VTT jobs get an SRT rendering next to
 * their captions, from the segments in memory or the saved transcript.
 */
async function srtForEmbedding(
  outputDir: string,
  captionPath: string,
  segments: Segment[] | undefined
): Promise<string> {
  if (path.extname(captionPath).toLowerCase() === ".srt") return captionPath;
  let source = segments;
  if (!source) {
    const transcriptPath = path.join(outputDir, "transcript.json");
    if (await fs.pathExists(transcriptPath)) {
      source = (await readTranscriptJson(transcriptPath)).segments;
    }
  }
  if (!source) {
    warn("run.embed.vtt", { captionPath, note: "no transcript.json to render SRT from; embedding as-is" });
    return captionPath;
  }
  const srtPath = path.join(outputDir, "captions.srt");
  await fs.writeFile(srtPath, formatCaptions(source, "srt"), "utf8");
  info("run.embed.srt", { srtPath });
  return srtPath;
}

export async function processVideo(input: string, opts: ProcessOptions = {}): Promise<ProcessResult> {
  const config = resolvePipelineConfig(opts.config);
  const service = opts.skipCaptions ? undefined : opts.service ?? createInferenceService(config);

  const outputDir = path.resolve(opts.outputDir ?? outputDirFor(input, opts.outputRoot ?? ENV.outputRoot));
  const runLogPath = path.join(outputDir, `run-${Date.now()}.log`);
  const jobId = `${path.basename(outputDir)}-${Date.now()}`;

  return withLogFile(runLogPath, async () => {
    const startTs = Date.now();
    info("run.start", { jobId, input, outputDir, log: runLogPath, format: config.format });

    const ing = await ingest(input, { outputRoot: opts.outputRoot ?? ENV.outputRoot, outputDir });
    const result: ProcessResult = { video: ing.videoPath, captions: path.join(ing.outputDir, `captions.${config.format}`) };
    let segments: Segment[] | undefined;

    if (service) {
      const ctx: JobContext = {
        jobId,
        service,
        diagnostics: new FileDiagnosticSink(path.join(ing.outputDir, "diagnostics")),
        config,
        signal: opts.signal,
      };
      const captioned = await captionMedia(ing.videoPath, ing.outputDir, ing.source, ctx);
      segments = captioned.segments;
      result.captions = captioned.captionPath;
      result.transcript = captioned.transcriptPath;
    } else if (!(await fs.pathExists(result.captions))) {
      throw new AcquisitionError(
        `Caption file not found: ${result.captions}. Cannot skip caption generation.`
      );
    } else {
      info("run.captions.skip", { jobId, captions: result.captions });
    }

    if (!opts.skipEmbedding) {
      const srtPath = await srtForEmbedding(ing.outputDir, result.captions, segments);
      result.videoWithCaptions = await embedSubtitles(
        ing.videoPath,
        srtPath,
        path.join(ing.outputDir, "video_with_captions.mp4"),
        { language: config.subtitleLanguage }
      );
    }

    info("run.complete", { jobId, durationMs: Date.now() - startTs, ...result });
    return result;
  });
}
