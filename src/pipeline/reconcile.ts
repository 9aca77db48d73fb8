import { z } from 'zod';
import { parseKind, sortByStart } from './segment';
import type { Segment, Transcript } from './types';

export type Reconciled<T, F> =
  | { accepted: true; value: T }
  | { accepted: false; value: F; issues: string[] };

/**
 * Accept `candidate` when it satisfies `schema`, otherwise keep `fallback`.
 * The one "repair or fall back" rule shared by gap classification and
 * timing optimization.
 */
export function acceptOr<S extends z.ZodTypeAny, F>(
  schema: S,
  candidate: unknown,
  fallback: F
): Reconciled<z.infer<S>, F> {
  const parsed = schema.safeParse(candidate);
  if (parsed.success) return { accepted: true, value: parsed.data };
  const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
  return { accepted: false, value: fallback, issues };
}

export const SegmentEntrySchema = z
  .object({
    text: z.string().min(1),
    start: z.number().finite().min(0),
    end: z.number().finite(),
    type: z.string(),
  })
  .refine((e) => e.end > e.start, { message: 'end must be after start' });

export type SegmentEntry = z.infer<typeof SegmentEntrySchema>;

export const TranscriptEntriesSchema = z.array(SegmentEntrySchema).nonempty();

export function toEntry(s: Segment): SegmentEntry {
  return { text: s.text, start: s.startSec, end: s.endSec, type: s.kind };
}

export function fromEntry(e: SegmentEntry): Segment {
  return { text: e.text, startSec: e.start, endSec: e.end, kind: parseKind(e.type) };
}

/**
 * A candidate transcript replaces the original only if it is a non-empty
 * array whose every element carries text, start, end and type. Otherwise the
 * original, sorted, is kept and the validation issues say why.
 */
export function reconcileTranscript(candidate: unknown, original: Transcript): Reconciled<Segment[], Segment[]> {
  const sorted = sortByStart(original);
  const r = acceptOr(TranscriptEntriesSchema, candidate, sorted);
  return r.accepted ? { accepted: true, value: sortByStart(r.value.map(fromEntry)) } : r;
}

export function reconcile(candidate: unknown, original: Transcript): Segment[] {
  return reconcileTranscript(candidate, original).value;
}
