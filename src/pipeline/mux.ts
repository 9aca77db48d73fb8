import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { ENV } from './env';
import { AcquisitionError, describeExecError, MuxError } from './errors';
import { info, warn } from './log';

export interface EmbedOptions {
    /** ISO 639-2 tag written on the subtitle stream */
    language?: string;
}

export function buildMuxArgs(videoPath: string, captionPath: string, outPath: string, language: string): string[] {
    return [
        '-y',
        '-loglevel',
        'error',
        '-nostdin',
        '-i',
        videoPath,
        '-i',
        captionPath,
        '-map',
        '0:v?',
        '-map',
        '0:a?',
        '-map',
        '1:0',
        '-c:v',
        'copy',
        '-c:a',
        'copy',
        '-c:s',
        'mov_text',
        '-metadata:s:s:0',
        `language=${language}`,
        outPath,
    ];
}

/**
 * Add the caption file as a toggleable soft-subtitle stream, copying the
 * existing audio and video streams untouched.
 */
export async function embedSubtitles(
    videoPath: string,
    captionPath: string,
    outPath: string,
    opts: EmbedOptions = {}
): Promise<string> {
    for (const p of [videoPath, captionPath]) {
        if (!(await fs.pathExists(p))) throw new AcquisitionError(`Input not found: ${p}`);
    }
    if (path.extname(captionPath).toLowerCase() !== '.srt') {
        warn('mux.format', { captionPath, note: 'only SRT input is guaranteed by the muxer' });
    }
    const language = opts.language ?? ENV.subtitleLanguage;
    await fs.ensureDir(path.dirname(outPath));
    try {
        await execa(ENV.ffmpegBin, buildMuxArgs(videoPath, captionPath, outPath, language));
    } catch (e) {
        const f = describeExecError(e);
        throw new MuxError(`Failed to add subtitles to ${videoPath}: ${f.message}`, {
            exitCode: f.exitCode,
            stderr: f.stderrTail,
        });
    }
    info('mux.done', { outPath, language });
    return outPath;
}
