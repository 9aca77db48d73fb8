import { execa } from 'execa';
import fs from 'fs-extra';
import { ENV } from './env';
import { AcquisitionError, describeExecError } from './errors';
import type { AudioClip, AudioTrack } from './types';
import { info } from './log';

// 16-bit full scale; loudness is reported relative to it (dBFS)
const FULL_SCALE = 32768;

export const WAV_MIME_TYPE = 'audio/wav';

export function trackFromSamples(samples: Int16Array, sampleRate: number): AudioTrack {
    return { samples, sampleRate, durationSec: samples.length / sampleRate };
}

/**
 * Decode any media file ffmpeg understands into mono 16-bit PCM held in memory.
 */
export async function decodeAudio(
    mediaPath: string,
    sampleRate: number = ENV.sampleRate
): Promise<AudioTrack> {
    if (!(await fs.pathExists(mediaPath))) {
        throw new AcquisitionError(`Media file not found: ${mediaPath}`);
    }
    let stdout: Buffer;
    try {
        const res = await execa(
            ENV.ffmpegBin,
            [
                '-loglevel',
                'error',
                '-hide_banner',
                '-nostdin',
                '-i',
                mediaPath,
                '-vn',
                '-sn',
                '-ac',
                '1',
                '-ar',
                String(sampleRate),
                '-f',
                's16le',
                '-acodec',
                'pcm_s16le',
                'pipe:1',
            ],
            { encoding: 'buffer', maxBuffer: 2 * 1024 * 1024 * 1024 }
        );
        stdout = res.stdout;
    } catch (e) {
        const f = describeExecError(e);
        throw new AcquisitionError(
            `ffmpeg could not decode audio from ${mediaPath}. Underlying error: ${f.message}`,
            { exitCode: f.exitCode, stderr: f.stderrTail }
        );
    }
    const track = trackFromSamples(pcmToSamples(stdout), sampleRate);
    info('audio.decode', { mediaPath, sampleRate, durationSec: track.durationSec });
    return track;
}

/** Copy little-endian s16 bytes into an aligned Int16Array, dropping a trailing odd byte. */
export function pcmToSamples(pcm: Uint8Array): Int16Array {
    const count = Math.floor(pcm.byteLength / 2);
    const view = new DataView(pcm.buffer, pcm.byteOffset, count * 2);
    const out = new Int16Array(count);
    for (let i = 0; i < count; i++) out[i] = view.getInt16(i * 2, true);
    return out;
}

/**
 * Sample-accurate view of [startSec, endSec) relative to the given clip, clamped to its bounds.
 */
export function sliceSamples(clip: AudioClip, startSec: number, endSec: number): Int16Array {
    const from = Math.max(0, Math.min(clip.samples.length, Math.round(startSec * clip.sampleRate)));
    const to = Math.max(from, Math.min(clip.samples.length, Math.round(endSec * clip.sampleRate)));
    return clip.samples.subarray(from, to);
}

/** RMS loudness in dBFS; -Infinity for empty or all-zero input. */
export function loudnessDbfs(samples: Int16Array): number {
    if (samples.length === 0) return -Infinity;
    let sumSquares = 0;
    for (let i = 0; i < samples.length; i++) {
        sumSquares += samples[i] * samples[i];
    }
    const rms = Math.sqrt(sumSquares / samples.length);
    if (rms === 0) return -Infinity;
    return 20 * Math.log10(rms / FULL_SCALE);
}

/**
 * Wrap raw PCM into a WAV container for upload.
 */
export async function encodeWav(clip: AudioClip): Promise<Buffer> {
    const pcm = Buffer.from(clip.samples.buffer, clip.samples.byteOffset, clip.samples.byteLength);
    try {
        const res = await execa(
            ENV.ffmpegBin,
            [
                '-loglevel',
                'error',
                '-hide_banner',
                '-f',
                's16le',
                '-ar',
                String(clip.sampleRate),
                '-ac',
                '1',
                '-i',
                'pipe:0',
                '-f',
                'wav',
                'pipe:1',
            ],
            { input: pcm, encoding: 'buffer' }
        );
        return res.stdout;
    } catch (e) {
        const f = describeExecError(e);
        throw new Error(`ffmpeg failed to encode ${clip.samples.length} samples as WAV: ${f.message}`);
    }
}
