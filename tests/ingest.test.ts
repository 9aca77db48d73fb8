import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { AcquisitionError } from '../src/pipeline/errors';
import { extractYoutubeId, isYoutubeUrl } from '../src/pipeline/ids';
import { ingest, outputDirFor } from '../src/pipeline/ingest';

describe('YouTube URLs', () => {
  it('recognises watch and short links', () => {
    expect(isYoutubeUrl('https://www.youtube.com/watch?v=abc123')).toBe(true);
    expect(isYoutubeUrl('http://youtu.be/abc123')).toBe(true);
    expect(isYoutubeUrl('https://m.youtube.com/watch?v=abc123')).toBe(true);
  });

  it('rejects other inputs', () => {
    expect(isYoutubeUrl('/videos/clip.mp4')).toBe(false);
    expect(isYoutubeUrl('https://example.com/watch?v=abc123')).toBe(false);
    expect(isYoutubeUrl('ftp://youtube.com/watch?v=abc123')).toBe(false);
  });

  it('extracts the video id', () => {
    expect(extractYoutubeId('https://www.youtube.com/watch?v=abc123&t=42')).toBe('abc123');
    expect(extractYoutubeId('https://youtu.be/xyz789?si=share')).toBe('xyz789');
    expect(extractYoutubeId('https://www.youtube.com/feed')).toBe('video');
    expect(extractYoutubeId('not a url')).toBe('video');
  });
});

describe('outputDirFor', () => {
  it('names the directory after the source', () => {
    expect(outputDirFor('https://youtu.be/abc123', '/tmp/out')).toBe(path.resolve('/tmp/out/youtube_abc123'));
    expect(outputDirFor('/videos/clip.final.mp4', '/tmp/out')).toBe(path.resolve('/tmp/out/clip.final'));
  });
});

describe('ingest', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'captions-ingest-'));
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('copies a local file into its output directory', async () => {
    const source = path.join(root, 'in', 'clip.mp4');
    await fs.outputFile(source, 'not really a video');

    const result = await ingest(source, { outputRoot: path.join(root, 'out') });

    expect(result.outputDir).toBe(path.join(root, 'out', 'clip'));
    expect(result.videoPath).toBe(path.join(root, 'out', 'clip', 'clip.mp4'));
    expect(result.source).toEqual({ input: source, kind: 'local' });
    expect(await fs.readFile(result.videoPath, 'utf8')).toBe('not really a video');
  });

  it('leaves a file already in place alone', async () => {
    const dir = path.join(root, 'job');
    const source = path.join(dir, 'clip.mp4');
    await fs.outputFile(source, 'data');

    const result = await ingest(source, { outputRoot: root, outputDir: dir });

    expect(result.videoPath).toBe(source);
  });

  it('rejects a missing local file', async () => {
    await expect(ingest(path.join(root, 'missing.mp4'), { outputRoot: root })).rejects.toBeInstanceOf(
      AcquisitionError
    );
  });
});
