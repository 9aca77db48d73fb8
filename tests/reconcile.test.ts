import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { acceptOr, reconcile, reconcileTranscript } from '../src/pipeline/reconcile';
import type { Segment } from '../src/pipeline/types';

const original: Segment[] = [
  { text: 'two', startSec: 5, endSec: 9, kind: 'speech' },
  { text: 'one', startSec: 0, endSec: 4, kind: 'music' },
];

describe('acceptOr', () => {
  const schema = z.object({ n: z.number() });

  it('returns the parsed candidate when valid', () => {
    expect(acceptOr(schema, { n: 1 }, 'fallback')).toEqual({ accepted: true, value: { n: 1 } });
  });

  it('returns the fallback with the validation issues otherwise', () => {
    const r = acceptOr(schema, { n: 'one' }, 'fallback');
    expect(r.accepted).toBe(false);
    expect(r.value).toBe('fallback');
    if (!r.accepted) expect(r.issues).toHaveLength(1);
  });
});

describe('reconcile', () => {
  it('adopts a well-formed candidate, sorted', () => {
    const candidate = [
      { text: 'two', start: 4.5, end: 9, type: 'speech' },
      { text: 'one', start: 0, end: 4.5, type: 'MUSIC' },
    ];
    expect(reconcile(candidate, original)).toEqual([
      { text: 'one', startSec: 0, endSec: 4.5, kind: 'music' },
      { text: 'two', startSec: 4.5, endSec: 9, kind: 'speech' },
    ]);
  });

  it('keeps the sorted original when an element lacks a field', () => {
    const candidate = [{ text: 'one', start: 0, end: 4 }];
    expect(reconcile(candidate, original).map((s) => s.text)).toEqual(['one', 'two']);
  });

  it('keeps the sorted original for an empty or non-array candidate', () => {
    expect(reconcile([], original).map((s) => s.text)).toEqual(['one', 'two']);
    expect(reconcile({ segments: [] }, original).map((s) => s.text)).toEqual(['one', 'two']);
    expect(reconcile(undefined, original).map((s) => s.text)).toEqual(['one', 'two']);
  });

  it('keeps the original when a candidate interval is empty', () => {
    const candidate = [{ text: 'one', start: 3, end: 3, type: 'speech' }];
    expect(reconcile(candidate, original)).toEqual([original[1], original[0]]);
  });
});

describe('reconcileTranscript', () => {
  it('reports acceptance without issues for a valid candidate', () => {
    const r = reconcileTranscript([{ text: 'a', start: 0, end: 1, type: 'speech' }], original);
    expect(r).toEqual({ accepted: true, value: [{ text: 'a', startSec: 0, endSec: 1, kind: 'speech' }] });
  });

  it('names the offending path and keeps the sorted original', () => {
    const r = reconcileTranscript([{ text: 'a', start: -1, end: 1, type: 'speech' }], original);
    expect(r.accepted).toBe(false);
    expect(r.value).toEqual([original[1], original[0]]);
    if (!r.accepted) {
      expect(r.issues).toHaveLength(1);
      expect(r.issues[0]).toMatch(/^0\.start: /);
    }
  });
});
