import { z } from 'zod';
import type { JobContext } from './context';
import { extractJson } from './inference';
import { parseKind, placeholderSegments } from './segment';
import type { Segment, Window } from './types';
import { debug, info, warn } from './log';

// Used when an entry has a start but no end
const DEFAULT_ENTRY_SEC = 5.0;
const MISSING_TEXT = '[Transcription error]';

const optionalNumber = z.coerce.number().finite().optional().catch(undefined);

const ResponseEntrySchema = z.object({
    text: z.string().optional().catch(undefined),
    start: optionalNumber,
    end: optionalNumber,
    type: z.string().optional().catch(undefined),
});

export function buildTranscriptionPrompt(window: Window): string {
    const duration = window.endSec - window.startSec;
    return `
Please transcribe this audio for captioning TV shows, videocasts, or webnovels, with accurate timestamps.
This audio chunk starts at ${window.startSec.toFixed(2)} seconds in the original video and is ${duration.toFixed(2)} seconds long.

In addition to speech, also identify:
- Music: describe the style or mood, e.g. "[♪ Upbeat jazz music ♪]"
- Sound effects: describe important sounds, e.g. "[Sound: door slamming]"
- Ambient noise: significant background sounds, e.g. "[Crowd chattering]"
- Silence: only when contextually important, e.g. "[Tense silence]"

Keep each caption segment self-contained and split long sentences at natural breaks.

Return a JSON array where each element has:
1. "text": the transcribed text, including speech AND non-speech elements
2. "start": start time in seconds, relative to the start of this chunk
3. "end": end time in seconds, relative to the start of this chunk
4. "type": "speech", "music", "sound" or "silence"

Format:
[
    {"text": "This is the first segment", "start": 0.0, "end": 2.5, "type": "speech"},
    {"text": "[♪ Upbeat music ♪]", "start": 2.5, "end": 5.0, "type": "music"}
]

For audio content you can't understand clearly, use "[unintelligible]".
`.trim();
}

/**
 * Turn a raw service response into absolute-time segments for `window`.
 * An embedded array is mapped entry by entry; anything else becomes one
 * speech segment spanning the window.
 */
export function parseTranscriptionResponse(text: string, window: Window, placeholderSec: number): Segment[] {
    const duration = window.endSec - window.startSec;
    const data = extractJson(text);

    if (!Array.isArray(data)) {
        const body = text.trim();
        if (!body) return placeholderSegments(window.startSec, window.endSec, placeholderSec);
        warn('transcribe.window.unparsed', { idx: window.index, chars: body.length });
        return [{ text: body, startSec: window.startSec, endSec: window.endSec, kind: 'speech' }];
    }

    const segments: Segment[] = [];
    data.forEach((raw, i) => {
        const entry = ResponseEntrySchema.safeParse(raw);
        if (!entry.success) {
            warn('transcribe.entry.skip', { idx: window.index, entry: i, reason: 'not an object' });
            return;
        }
        const { text: entryText, start, end, type } = entry.data;
        const relStart = Math.max(0, start ?? 0);
        const relEnd = Math.min(duration, end ?? relStart + DEFAULT_ENTRY_SEC);
        if (relEnd <= relStart) {
            warn('transcribe.entry.skip', { idx: window.index, entry: i, start, end, reason: 'empty interval' });
            return;
        }
        segments.push({
            text: entryText?.trim() || MISSING_TEXT,
            startSec: window.startSec + relStart,
            endSec: window.startSec + relEnd,
            kind: parseKind(type),
        });
    });
    return segments;
}

/**
 * Transcribe one window. Service failures never escape: the window is
 * covered with "unavailable" placeholders instead.
 */
export async function transcribeWindow(window: Window, ctx: JobContext): Promise<Segment[]> {
    const { placeholderSec } = ctx.config;
    const label = `window:${window.index}`;
    info('transcribe.window.start', { jobId: ctx.jobId, idx: window.index, startSec: window.startSec, endSec: window.endSec });

    const result = await ctx.service.generate({
        prompt: buildTranscriptionPrompt(window),
        audio: { samples: window.samples, sampleRate: window.sampleRate },
        signal: ctx.signal,
        label,
    });

    if (!result.ok) {
        warn('transcribe.window.fail', { jobId: ctx.jobId, idx: window.index, reason: result.reason });
        await ctx.diagnostics.write(`window_${String(window.index).padStart(4, '0')}_error`, {
            startSec: window.startSec,
            endSec: window.endSec,
            reason: result.reason,
        });
        return placeholderSegments(window.startSec, window.endSec, placeholderSec);
    }

    await ctx.diagnostics.write(`window_${String(window.index).padStart(4, '0')}_response`, {
        startSec: window.startSec,
        endSec: window.endSec,
        text: result.text,
    });
    const segments = parseTranscriptionResponse(result.text, window, placeholderSec);
    debug('transcribe.window.done', { jobId: ctx.jobId, idx: window.index, segments: segments.length });
    return segments;
}
