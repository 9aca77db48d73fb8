export type ISO8601 = string;

export type SegmentKind = 'speech' | 'music' | 'sound' | 'silence';

export const SEGMENT_KINDS: readonly SegmentKind[] = ['speech', 'music', 'sound', 'silence'];

export type CaptionFormat = 'srt' | 'vtt';

export const CAPTION_FORMATS: readonly CaptionFormat[] = ['srt', 'vtt'];

/** Decoded mono 16-bit PCM for a whole media file. */
export interface AudioTrack {
  readonly samples: Int16Array;
  readonly sampleRate: number;
  readonly durationSec: number;
}

/** A slice of PCM sent to the inference service. */
export interface AudioClip {
  samples: Int16Array;
  sampleRate: number;
}

export interface Window {
  index: number;
  startSec: number;
  endSec: number;
  samples: Int16Array;
  sampleRate: number;
}

/** Times are absolute to the track origin once a segment leaves the transcription stage. */
export interface Segment {
  readonly text: string;
  readonly startSec: number;
  readonly endSec: number;
  readonly kind: SegmentKind;
}

export interface GapInterval {
  startSec: number;
  endSec: number;
}

export type Transcript = readonly Segment[];

export interface SourceMeta {
  input: string;
  kind: 'youtube' | 'local';
  videoId?: string;
  durationSec?: number;
}

export interface ProcessingConfig {
  createdAt: ISO8601;
  model: string;
  chunkSec: number;
  optimized: boolean;
}

/** Serialized form written to transcript.json. */
export interface TranscriptJson {
  source: SourceMeta;
  processing: ProcessingConfig;
  durationSec: number;
  segments: Segment[];
}
