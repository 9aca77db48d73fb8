import { GoogleGenerativeAI } from '@google/generative-ai';
import type { GenerationConfig, Part } from '@google/generative-ai';
import { encodeWav, WAV_MIME_TYPE } from './audio';
import { ConfigError, JobCancelledError, errorMessage, toInferenceError } from './errors';
import { DEFAULT_RETRY_CONFIG, withRetry } from './retry';
import type { RetryConfig } from './retry';
import type { AudioClip } from './types';
import { debug, warn } from './log';

export interface InferenceRequest {
    prompt: string;
    audio?: AudioClip;
    /** Ask the service for a JSON body instead of free-form text */
    json?: boolean;
    signal?: AbortSignal;
    /** Short tag used in logs, e.g. "window:3" */
    label?: string;
}

export type InferenceResult = { ok: true; text: string } | { ok: false; reason: string };

/**
 * The only capability the pipeline needs from the multimodal endpoint.
 * Implementations report service failures as `{ ok: false }` and throw only
 * {@link JobCancelledError} when the request's signal was aborted.
 */
export interface InferenceService {
    readonly model: string;
    generate(request: InferenceRequest): Promise<InferenceResult>;
}

export interface GeminiServiceOptions {
    apiKey: string;
    model: string;
    timeoutMs: number;
    retry?: RetryConfig;
    encode?: (clip: AudioClip) => Promise<Uint8Array>;
}

export class GeminiInferenceService implements InferenceService {
    readonly model: string;
    private readonly client: GoogleGenerativeAI;
    private readonly timeoutMs: number;
    private readonly retry: RetryConfig;
    private readonly encode: (clip: AudioClip) => Promise<Uint8Array>;

    constructor(opts: GeminiServiceOptions) {
        if (!opts.apiKey) {
            throw new ConfigError('GEMINI_API_KEY is required to reach the inference service. Set it in your .env.');
        }
        this.client = new GoogleGenerativeAI(opts.apiKey);
        this.model = opts.model;
        this.timeoutMs = opts.timeoutMs;
        this.retry = opts.retry ?? DEFAULT_RETRY_CONFIG;
        this.encode = opts.encode ?? encodeWav;
    }

    async generate(request: InferenceRequest): Promise<InferenceResult> {
        const { signal, label } = request;
        if (signal?.aborted) throw new JobCancelledError();

        const parts: Part[] = [];
        if (request.audio) {
            try {
                const bytes = await this.encode(request.audio);
                parts.push({ inlineData: { mimeType: WAV_MIME_TYPE, data: Buffer.from(bytes).toString('base64') } });
            } catch (e) {
                return { ok: false, reason: `audio encoding failed: ${errorMessage(e)}` };
            }
        }
        parts.push({ text: request.prompt });

        const generationConfig: GenerationConfig | undefined = request.json
            ? { responseMimeType: 'application/json' }
            : undefined;
        const model = this.client.getGenerativeModel({ model: this.model, generationConfig }, { timeout: this.timeoutMs });

        try {
            const text = await withRetry(
                async (attempt) => {
                    debug('inference.request', { label, model: this.model, attempt, audio: Boolean(request.audio) });
                    const result = await model.generateContent(
                        { contents: [{ role: 'user', parts }] },
                        { signal, timeout: this.timeoutMs }
                    );
                    return result.response.text();
                },
                this.retry,
                {
                    signal,
                    classify: toInferenceError,
                    onRetry: (attempt, error, delayMs) =>
                        warn('inference.retry', { label, attempt, delayMs: Math.round(delayMs), error: String(error) }),
                }
            );
            return { ok: true, text };
        } catch (e) {
            if (signal?.aborted || e instanceof JobCancelledError) throw new JobCancelledError();
            return { ok: false, reason: toInferenceError(e).toString() };
        }
    }
}

function tryParse(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

function between(text: string, open: string, close: string): string | undefined {
    const from = text.indexOf(open);
    const to = text.lastIndexOf(close);
    return from >= 0 && to > from ? text.slice(from, to + 1) : undefined;
}

/**
 * Best-effort recovery of a JSON value embedded in model output: fenced
 * blocks, the whole text, then the outermost array, then the outermost object.
 */
export function extractJson(text: string): unknown {
    const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
    const candidates = [fenced?.[1], text];
    for (const c of candidates) {
        if (c === undefined) continue;
        const body = c.trim();
        const parsed = tryParse(body) ?? parseSlice(body, '[', ']') ?? parseSlice(body, '{', '}');
        if (parsed !== undefined) return parsed;
    }
    return undefined;
}

function parseSlice(text: string, open: string, close: string): unknown {
    const slice = between(text, open, close);
    return slice === undefined ? undefined : tryParse(slice);
}
