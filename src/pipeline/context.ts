import fs from 'fs-extra';
import path from 'path';
import type { PipelineConfig } from './config';
import { errorMessage, JobCancelledError } from './errors';
import type { InferenceService } from './inference';
import { warn } from './log';

/**
 * Write-once sink for raw service exchanges kept for post-hoc inspection.
 * Implementations must never reject.
 */
export interface DiagnosticSink {
    write(name: string, data: unknown): Promise<void>;
}

export class FileDiagnosticSink implements DiagnosticSink {
    constructor(readonly dir: string) {}

    async write(name: string, data: unknown): Promise<void> {
        const file = path.join(this.dir, `${name}.json`);
        try {
            await fs.ensureDir(this.dir);
            await fs.writeJson(file, data, { spaces: 2 });
        } catch (e) {
            warn('diagnostics.write.fail', { file, error: errorMessage(e) });
        }
    }
}

export class NullDiagnosticSink implements DiagnosticSink {
    async write(): Promise<void> {}
}

/**
 * Everything one caption job needs, passed explicitly so that several jobs
 * can run side by side in one process.
 */
export interface JobContext {
    jobId: string;
    service: InferenceService;
    diagnostics: DiagnosticSink;
    config: PipelineConfig;
    signal?: AbortSignal;
}

export function throwIfCancelled(ctx: Pick<JobContext, 'signal'>): void {
    if (ctx.signal?.aborted) throw new JobCancelledError();
}
