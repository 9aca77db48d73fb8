import { sortByStart } from './segment';
import type { Segment } from './types';
import { debug } from './log';

export interface CoverageReport {
    overlaps: number;
    holes: Array<{ startSec: number; endSec: number }>;
}

/**
 * Merge per-window segment lists into one chronological sequence. Windows
 * may finish in any order; the stable sort by start time restores a
 * deterministic result. Adjacent segments are never merged here.
 */
export function assemble(perWindow: ReadonlyArray<readonly Segment[]>): Segment[] {
    const all = perWindow.flat();
    const sorted = sortByStart(all);
    debug('assemble.done', { windows: perWindow.length, segments: sorted.length });
    return sorted;
}

/**
 * Describe where a sorted sequence overlaps itself or leaves time uncovered
 * between 0 and `durationSec`. Informational only.
 */
export function inspectCoverage(sorted: readonly Segment[], durationSec: number, toleranceSec = 1e-6): CoverageReport {
    const report: CoverageReport = { overlaps: 0, holes: [] };
    let cursor = 0;
    for (const seg of sorted) {
        if (seg.startSec - cursor > toleranceSec) {
            report.holes.push({ startSec: cursor, endSec: seg.startSec });
        } else if (cursor - seg.startSec > toleranceSec) {
            report.overlaps++;
        }
        cursor = Math.max(cursor, seg.endSec);
    }
    if (durationSec - cursor > toleranceSec) {
        report.holes.push({ startSec: cursor, endSec: durationSec });
    }
    return report;
}
