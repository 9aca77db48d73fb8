import { describe, it, expect } from 'vitest';
import { AcquisitionError } from '../src/pipeline/errors';
import { buildMuxArgs, embedSubtitles } from '../src/pipeline/mux';

describe('buildMuxArgs', () => {
  it('copies streams and adds a tagged text subtitle track', () => {
    expect(buildMuxArgs('in.mp4', 'captions.srt', 'out.mp4', 'fra')).toEqual([
      '-y',
      '-loglevel',
      'error',
      '-nostdin',
      '-i',
      'in.mp4',
      '-i',
      'captions.srt',
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
      'language=fra',
      'out.mp4',
    ]);
  });
});

describe('embedSubtitles', () => {
  it('rejects missing inputs before running ffmpeg', async () => {
    await expect(embedSubtitles('/nope/in.mp4', '/nope/captions.srt', '/nope/out.mp4')).rejects.toBeInstanceOf(
      AcquisitionError
    );
  });
});
