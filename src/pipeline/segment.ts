import { SEGMENT_KINDS } from './types';
import type { Segment, SegmentKind } from './types';

export const UNAVAILABLE_PREFIX = '[Transcription unavailable';

export function parseKind(value: unknown): SegmentKind {
  if (typeof value !== 'string') return 'speech';
  const v = value.trim().toLowerCase();
  return SEGMENT_KINDS.find((k) => k === v) ?? 'speech';
}

/** Stable chronological order; ties keep their input order. */
export function sortByStart(segments: readonly Segment[]): Segment[] {
  return [...segments].sort((a, b) => a.startSec - b.startSec);
}

export function unavailableText(startSec: number, endSec: number): string {
  return `${UNAVAILABLE_PREFIX} ${startSec.toFixed(2)}s - ${endSec.toFixed(2)}s]`;
}

/**
 * Evenly spaced "unavailable" markers covering [startSec, endSec) with no
 * hole; the last piece is truncated to `endSec`.
 */
export function placeholderSegments(startSec: number, endSec: number, pieceSec: number): Segment[] {
  const duration = endSec - startSec;
  if (!(duration > 0)) return [];
  const count = Math.ceil(duration / pieceSec);
  const out: Segment[] = [];
  for (let i = 0; i < count; i++) {
    const s = startSec + i * pieceSec;
    const e = startSec + Math.min((i + 1) * pieceSec, duration);
    if (e <= s) break;
    out.push({ text: unavailableText(s, e), startSec: s, endSec: e, kind: 'speech' });
  }
  return out;
}

export function isPlaceholder(segment: Segment): boolean {
  return segment.text.startsWith(UNAVAILABLE_PREFIX);
}
