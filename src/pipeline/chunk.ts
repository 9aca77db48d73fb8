import { ConfigError } from './errors';
import type { AudioTrack, Window } from './types';

export interface WindowInfo {
    index: number;
    startSec: number;
    endSec: number;
}

export interface ChunkManifest {
    durationSec: number;
    chunkSec: number;
    windows: WindowInfo[];
}

export function assertChunkDuration(chunkSec: number): void {
    if (!Number.isFinite(chunkSec) || chunkSec <= 0) {
        throw new ConfigError(`Chunk duration must be a positive number of seconds, got ${chunkSec}`, {
            chunkSec,
        });
    }
}

/**
 * Partition the track into contiguous, non-overlapping windows of `chunkSec`
 * seconds. The last window holds the remainder. Lazy: samples are views into
 * the track buffer and are only cut when the consumer pulls the window.
 */
export function* splitTrack(track: AudioTrack, chunkSec: number): Generator<Window> {
    assertChunkDuration(chunkSec);
    // Starts are derived from the index, not accumulated, so boundaries never drift
    for (let index = 0; index * chunkSec < track.durationSec; index++) {
        const startSec = index * chunkSec;
        const endSec = Math.min(track.durationSec, (index + 1) * chunkSec);
        const from = Math.round(startSec * track.sampleRate);
        const to = Math.min(track.samples.length, Math.round(endSec * track.sampleRate));
        yield {
            index,
            startSec,
            endSec,
            samples: track.samples.subarray(from, to),
            sampleRate: track.sampleRate,
        };
    }
}

export function windowCount(durationSec: number, chunkSec: number): number {
    assertChunkDuration(chunkSec);
    return durationSec > 0 ? Math.ceil(durationSec / chunkSec) : 0;
}

export function toManifest(track: AudioTrack, chunkSec: number, windows: readonly Window[]): ChunkManifest {
    return {
        durationSec: track.durationSec,
        chunkSec,
        windows: windows.map((w) => ({ index: w.index, startSec: w.startSec, endSec: w.endSec })),
    };
}
