import * as dotenv from 'dotenv';
dotenv.config();

function flag(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value === '') return fallback;
    return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

export const ENV = {
    geminiApiKey: process.env.GEMINI_API_KEY || process.env.GOOGLE_API_KEY || '',
    geminiModel: process.env.GEMINI_MODEL || 'gemini-2.0-flash-001',
    outputRoot: process.env.OUTPUT_ROOT || 'output',
    chunkSec: Number(process.env.CHUNK_SEC || 30),
    // Decoded track rate; windows and gap slices are cut from this buffer
    sampleRate: Number(process.env.SAMPLE_RATE || 16000),
    concurrency: Number(process.env.TRANSCRIBE_CONCURRENCY || 1),
    // Per-request timeout for the inference service (seconds)
    requestTimeoutSec: Number(process.env.REQUEST_TIMEOUT_SEC || 120),
    transcribeRetries: Number(process.env.TRANSCRIBE_RETRIES || 2),
    transcribeRetryBaseMs: Number(process.env.TRANSCRIBE_RETRY_BASE_MS || 1000),
    gapThresholdSec: Number(process.env.GAP_THRESHOLD_SEC || 1.0),
    silenceThresholdDb: Number(process.env.SILENCE_THRESHOLD_DB || -50),
    forceIncludeSec: Number(process.env.FORCE_INCLUDE_SEC || 3.0),
    placeholderSec: Number(process.env.PLACEHOLDER_SEC || 5),
    optimizeTiming: flag(process.env.OPTIMIZE_TIMING, true),
    classifyGaps: flag(process.env.CLASSIFY_GAPS, true),
    subtitleLanguage: process.env.SUBTITLE_LANGUAGE || 'eng',
    // Optional: override binary names/paths
    ffmpegBin: process.env.FFMPEG_BIN || 'ffmpeg',
    ytdlpBin: process.env.YTDLP_BIN || 'yt-dlp',
    // Optional: explicit python interpreter with yt_dlp installed for fallback (e.g. .venv/bin/python)
    ytdlpPythonBin: process.env.YTDLP_PYTHON_BIN || '.venv/bin/python',
    logLevel: process.env.LOG_LEVEL || 'info',
    logFormat: process.env.LOG_FORMAT || 'json',
    progressIntervalMs: Number(process.env.PROGRESS_INTERVAL_MS || 1500),
};
