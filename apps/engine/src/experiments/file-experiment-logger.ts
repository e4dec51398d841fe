import fs from 'fs/promises';
import { ExperimentLogger, ExperimentRecord } from '@taskline/sdk';

const TAG = '[experiments]';

/**
 * Appends one JSON line per completed run. Writes are chained so lines never
 * interleave, and never awaited by the caller.
 */
export class FileExperimentLogger implements ExperimentLogger {
    private pending: Promise<void> = Promise.resolve();

    constructor(
        private readonly file: string,
        private readonly now: () => Date = () => new Date(),
    ) { }

    record(entry: ExperimentRecord): void {
        const line = JSON.stringify({ ...entry, recordedAt: this.now().toISOString() }) + '\n';
        this.pending = this.pending
            .then(() => fs.appendFile(this.file, line))
            .catch((err) => {
                console.error(`${TAG} failed to write record for task ${entry.taskId}:`, err);
            });
    }

    /** Resolves once every record handed in so far has been written (or failed). */
    flush(): Promise<void> {
        return this.pending;
    }
}
