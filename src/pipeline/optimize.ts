import type { JobContext } from './context';
import { extractJson } from './inference';
import { reconcileTranscript, toEntry } from './reconcile';
import { sortByStart } from './segment';
import type { Segment, Transcript } from './types';
import { info, startStep, warn } from './log';

export function buildOptimizePrompt(segments: readonly Segment[]): string {
    const body = JSON.stringify(segments.map(toEntry), null, 2);
    return `
I have a set of caption segments for a video that need timing optimization.
The goal is to make the captions more readable and properly timed for viewers.

Here are the current segments:
${body}

Optimize the timing based on these rules:

1. Speech segments should align with natural speech patterns and sentence breaks
2. Music and sound segments should have appropriate durations (not too short)
3. Ensure gaps between captions are appropriate for readability
4. Maintain the original ordering and one output element per input element; adjust only start/end times
5. Don't change the content of the text, only the timing

Return the optimized segments as a JSON array of objects, each with all four fields: "text", "start", "end", "type".
`.trim();
}

/**
 * One global pass asking the service to retime the whole transcript. Any
 * failure or malformed answer leaves the sorted input as the result.
 */
export async function optimizeTiming(transcript: Transcript, ctx: JobContext): Promise<Segment[]> {
    const sorted = sortByStart(transcript);
    if (sorted.length === 0) return sorted;

    const timer = startStep('optimize', { jobId: ctx.jobId, segments: sorted.length });
    const result = await ctx.service.generate({
        prompt: buildOptimizePrompt(sorted),
        json: true,
        signal: ctx.signal,
        label: 'optimize',
    });
    if (!result.ok) {
        warn('optimize.fail', { jobId: ctx.jobId, reason: result.reason });
        timer.end({ applied: false });
        return sorted;
    }

    const candidate = extractJson(result.text);
    await ctx.diagnostics.write('optimize_response', { text: result.text });
    const r = reconcileTranscript(candidate, sorted);
    if (!r.accepted) {
        warn('optimize.rejected', { jobId: ctx.jobId, issues: r.issues.slice(0, 5) });
        timer.end({ applied: false });
        return r.value;
    }

    const optimized = r.value;
    info('optimize.applied', { jobId: ctx.jobId, before: sorted.length, after: optimized.length });
    timer.end({ applied: true });
    return optimized;
}
