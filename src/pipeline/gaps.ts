import { z } from 'zod';
import { loudnessDbfs, sliceSamples } from './audio';
import type { JobContext } from './context';
import { extractJson } from './inference';
import { acceptOr } from './reconcile';
import { sortByStart } from './segment';
import type { GapInterval, Segment, SegmentKind, Window } from './types';
import { debug, warn } from './log';

const GapClassificationSchema = z.object({
    type: z
        .string()
        .transform((s) => s.trim().toLowerCase())
        .pipe(z.enum(['music', 'sound', 'silence'])),
    text: z.string().trim().min(1),
});

/**
 * Uncovered spans of `window` longer than `thresholdSec`, including the
 * stretch before the first segment and after the last one.
 */
export function findGaps(
    window: Pick<Window, 'startSec' | 'endSec'>,
    segments: readonly Segment[],
    thresholdSec: number
): GapInterval[] {
    const gaps: GapInterval[] = [];
    let cursor = window.startSec;
    for (const seg of sortByStart(segments)) {
        if (seg.startSec - cursor > thresholdSec) {
            gaps.push({ startSec: cursor, endSec: seg.startSec });
        }
        cursor = Math.max(cursor, seg.endSec);
    }
    if (window.endSec - cursor > thresholdSec) {
        gaps.push({ startSec: cursor, endSec: window.endSec });
    }
    return gaps;
}

export function heuristicGapSegment(gap: GapInterval, silent: boolean): Segment {
    const kind: SegmentKind = silent ? 'silence' : 'sound';
    return {
        text: silent ? '[Silence]' : '[Background sounds]',
        startSec: gap.startSec,
        endSec: gap.endSec,
        kind,
    };
}

function buildGapPrompt(gap: GapInterval): string {
    return `
Analyze this audio gap between ${gap.startSec.toFixed(2)}s and ${gap.endSec.toFixed(2)}s.

Determine if it contains:
1. Music or background score
2. Sound effects
3. Ambient noise
4. Meaningful silence

Only return a JSON object with:
- "type": one of "music", "sound", "silence"
- "text": description of what you hear, formatted as "[♪ Music description ♪]", "[Sound: sound description]", or "[Silence]"

Examples:
{"type": "music", "text": "[♪ Suspenseful music ♪]"}
{"type": "sound", "text": "[Sound: footsteps approaching]"}
{"type": "silence", "text": "[Tense silence]"}

If there's nothing meaningful, simply return {"type": "silence", "text": "[Silence]"}
`.trim();
}

/**
 * Decide what, if anything, fills one gap. Quiet short gaps are dropped;
 * everything else becomes a segment, described by the service when it
 * answers sensibly and by the loudness heuristic otherwise.
 */
export async function classifyGap(window: Window, gap: GapInterval, ctx: JobContext): Promise<Segment | null> {
    const opts = ctx.config;
    const samples = sliceSamples(window, gap.startSec - window.startSec, gap.endSec - window.startSec);
    const dbfs = loudnessDbfs(samples);
    const silent = dbfs < opts.silenceThresholdDb;
    const duration = gap.endSec - gap.startSec;

    if (silent && duration <= opts.forceIncludeSec) {
        debug('gaps.drop', { jobId: ctx.jobId, idx: window.index, startSec: gap.startSec, endSec: gap.endSec, dbfs });
        return null;
    }

    const fallback = heuristicGapSegment(gap, silent);
    if (!opts.classifyGaps) return fallback;

    const result = await ctx.service.generate({
        prompt: buildGapPrompt(gap),
        audio: { samples, sampleRate: window.sampleRate },
        json: true,
        signal: ctx.signal,
        label: `gap:${window.index}:${gap.startSec.toFixed(2)}`,
    });
    if (!result.ok) {
        warn('gaps.classify.fallback', { jobId: ctx.jobId, idx: window.index, startSec: gap.startSec, reason: result.reason });
        return fallback;
    }

    const r = acceptOr(GapClassificationSchema, extractJson(result.text), null);
    if (!r.accepted) {
        warn('gaps.classify.fallback', { jobId: ctx.jobId, idx: window.index, startSec: gap.startSec, issues: r.issues });
        return fallback;
    }
    return { text: r.value.text, startSec: gap.startSec, endSec: gap.endSec, kind: r.value.type };
}

/**
 * Draft segments of one window plus whatever its meaningful gaps turned
 * into, in chronological order.
 */
export async function fillGaps(window: Window, drafts: readonly Segment[], ctx: JobContext): Promise<Segment[]> {
    const gaps = findGaps(window, drafts, ctx.config.gapThresholdSec);
    const filled: Segment[] = [...drafts];
    for (const gap of gaps) {
        const seg = await classifyGap(window, gap, ctx);
        if (seg) filled.push(seg);
    }
    debug('gaps.window', { jobId: ctx.jobId, idx: window.index, gaps: gaps.length, added: filled.length - drafts.length });
    return sortByStart(filled);
}
