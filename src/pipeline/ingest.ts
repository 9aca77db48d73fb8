import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { ENV } from './env';
import { AcquisitionError, describeExecError } from './errors';
import { extractYoutubeId, isYoutubeUrl } from './ids';
import type { SourceMeta } from './types';
import { info, warn } from './log';

export interface IngestOptions {
    outputRoot: string;
    /** Explicit output directory; derived from the input when absent */
    outputDir?: string;
}

export interface IngestResult {
    source: SourceMeta;
    outputDir: string;
    videoPath: string;
}

export function outputDirFor(input: string, outputRoot: string): string {
    if (isYoutubeUrl(input)) {
        return path.resolve(outputRoot, `youtube_${extractYoutubeId(input)}`);
    }
    return path.resolve(outputRoot, path.parse(input).name);
}

/**
 * Bring the media into the job's output directory: download a YouTube URL
 * with yt-dlp, or copy a local file there.
 */
export async function ingest(input: string, opts: IngestOptions): Promise<IngestResult> {
    const outputDir = path.resolve(opts.outputDir ?? outputDirFor(input, opts.outputRoot));
    await fs.ensureDir(outputDir);

    if (isYoutubeUrl(input)) {
        const videoId = extractYoutubeId(input);
        const videoPath = path.join(outputDir, 'video.mp4');
        await downloadVideo(input, videoPath);
        return { source: { input, kind: 'youtube', videoId }, outputDir, videoPath };
    }

    const sourcePath = path.resolve(input);
    if (!(await fs.pathExists(sourcePath))) {
        throw new AcquisitionError(`Video file not found: ${input}`);
    }
    const videoPath = path.join(outputDir, path.basename(sourcePath));
    if (videoPath !== sourcePath) {
        info('ingest.copy', { from: sourcePath, to: videoPath });
        await fs.copy(sourcePath, videoPath, { overwrite: true });
    }
    return { source: { input, kind: 'local' }, outputDir, videoPath };
}

async function downloadVideo(url: string, outPath: string): Promise<void> {
    const ytArgs = [
        '-f',
        'bestvideo[ext=mp4]+bestaudio[ext=m4a]/best[ext=mp4]/best',
        '--merge-output-format',
        'mp4',
        '--no-warnings',
        '-o',
        outPath,
        url,
    ];

    const candidates: Array<[string, string[]]> = [];
    // Primary configured binary
    candidates.push([ENV.ytdlpBin, ytArgs]);
    if (ENV.ytdlpBin !== 'yt-dlp') {
        candidates.push(['yt-dlp', ytArgs]);
    }
    // Preferred python interpreter if provided
    if (ENV.ytdlpPythonBin) {
        candidates.push([ENV.ytdlpPythonBin, ['-m', 'yt_dlp', ...ytArgs]]);
    }
    // System python fallback
    candidates.push(['python3', ['-m', 'yt_dlp', ...ytArgs]]);

    info('ingest.download.start', { url, outPath });
    const errors: string[] = [];
    const tried: string[] = [];
    for (const [cmd, args] of candidates) {
        tried.push(args[0] === '-m' ? `${cmd} -m yt_dlp` : cmd);
        try {
            await execa(cmd, args, { stdio: 'pipe' });
            if (await fs.pathExists(outPath)) {
                info('ingest.download.done', { url, outPath, via: cmd });
                return;
            }
            errors.push(`[${cmd}] exited cleanly but ${outPath} was not created`);
        } catch (e) {
            const f = describeExecError(e);
            warn('ingest.download.attempt.fail', { cmd, error: f.message });
            errors.push(`[${cmd}] ${f.stderrTail || f.message}`);
        }
    }
    throw new AcquisitionError(
        `All yt-dlp download attempts failed for ${url}. Tried: ${tried.join(', ')}\nErrors:\n${errors.join('\n---\n')}`
    );
}
