import { describe, it, expect } from 'vitest';
import { trackFromSamples } from '../src/pipeline/audio';
import { splitTrack, toManifest, windowCount } from '../src/pipeline/chunk';
import { ConfigError } from '../src/pipeline/errors';

describe('splitTrack', () => {
  it('cuts fixed windows with the remainder in the last one', () => {
    const track = trackFromSamples(new Int16Array(650), 10);
    const windows = [...splitTrack(track, 30)];

    expect(windows.map((w) => [w.index, w.startSec, w.endSec])).toEqual([
      [0, 0, 30],
      [1, 30, 60],
      [2, 60, 65],
    ]);
    expect(windows.map((w) => w.samples.length)).toEqual([300, 300, 50]);
    expect(windows[2].sampleRate).toBe(10);
  });

  it('yields no partial window when the duration is an exact multiple', () => {
    const track = trackFromSamples(new Int16Array(600), 10);
    expect([...splitTrack(track, 30)]).toHaveLength(2);
  });

  it('yields nothing for an empty track', () => {
    const track = trackFromSamples(new Int16Array(0), 16000);
    expect([...splitTrack(track, 30)]).toEqual([]);
  });

  it('keeps boundaries contiguous for fractional chunk sizes', () => {
    const track = trackFromSamples(new Int16Array(10), 10);
    const windows = [...splitTrack(track, 0.1)];

    expect(windows).toHaveLength(10);
    for (let i = 0; i < windows.length - 1; i++) {
      expect(windows[i].endSec).toBe(windows[i + 1].startSec);
    }
    expect(windows[9].endSec).toBe(1);
  });

  it('shares the track buffer instead of copying', () => {
    const samples = new Int16Array(600).fill(7);
    const [first] = splitTrack(trackFromSamples(samples, 10), 30);
    expect(first.samples.buffer).toBe(samples.buffer);
  });

  it('rejects non-positive chunk sizes', () => {
    const track = trackFromSamples(new Int16Array(100), 10);
    expect(() => [...splitTrack(track, 0)]).toThrow(ConfigError);
    expect(() => [...splitTrack(track, -5)]).toThrow(ConfigError);
    expect(() => [...splitTrack(track, Number.NaN)]).toThrow(ConfigError);
  });
});

describe('windowCount', () => {
  it('rounds partial windows up', () => {
    expect(windowCount(65, 30)).toBe(3);
    expect(windowCount(60, 30)).toBe(2);
    expect(windowCount(0, 30)).toBe(0);
  });
});

describe('toManifest', () => {
  it('lists window bounds without samples', () => {
    const track = trackFromSamples(new Int16Array(450), 10);
    const windows = [...splitTrack(track, 30)];
    expect(toManifest(track, 30, windows)).toEqual({
      durationSec: 45,
      chunkSec: 30,
      windows: [
        { index: 0, startSec: 0, endSec: 30 },
        { index: 1, startSec: 30, endSec: 45 },
      ],
    });
  });
});
