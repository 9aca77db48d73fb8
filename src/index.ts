export type {
  AudioClip,
  AudioTrack,
  CaptionFormat,
  GapInterval,
  Segment,
  SegmentKind,
  SourceMeta,
  Transcript,
  TranscriptJson,
  Window,
} from './pipeline/types';
export { CAPTION_FORMATS, SEGMENT_KINDS } from './pipeline/types';
export {
  AcquisitionError,
  ConfigError,
  FormatError,
  InferenceError,
  JobCancelledError,
  MuxError,
  NetworkError,
  PipelineError,
  RateLimitError,
  ServerError,
  TimeoutError,
} from './pipeline/errors';
export type { PipelineConfig } from './pipeline/config';
export { defaultPipelineConfig, parseCaptionFormat, resolvePipelineConfig } from './pipeline/config';
export type { DiagnosticSink, JobContext } from './pipeline/context';
export { FileDiagnosticSink, NullDiagnosticSink } from './pipeline/context';
export type { InferenceRequest, InferenceResult, InferenceService } from './pipeline/inference';
export { extractJson, GeminiInferenceService } from './pipeline/inference';
export { decodeAudio, loudnessDbfs, trackFromSamples } from './pipeline/audio';
export { splitTrack, windowCount } from './pipeline/chunk';
export { transcribeWindow } from './pipeline/transcribe';
export { classifyGap, fillGaps, findGaps } from './pipeline/gaps';
export { assemble } from './pipeline/assemble';
export { reconcile } from './pipeline/reconcile';
export { optimizeTiming } from './pipeline/optimize';
export { formatCaptions, formatSrt, formatSrtTimestamp, formatVtt, formatVttTimestamp } from './pipeline/export';
export { embedSubtitles } from './pipeline/mux';
export { ingest } from './pipeline/ingest';
export type { ProcessOptions, ProcessResult } from './pipeline/run';
export { captionMedia, generateTranscript, processVideo } from './pipeline/run';
