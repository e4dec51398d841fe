import { Executor, success } from '@taskline/sdk';
import { TaskRegistry } from '../registry/task-registry';
import { PayloadStore } from '../storage/payload-store';

const TAG = '[cleanup]';

export interface CleanupOptions {
    retentionMs: number;
    payloadGraceMs: number;
    batchSize?: number;
    now?: () => Date;
}

export interface CleanupResult {
    deletedRecords: number;
    deletedPayloads: number;
}

/**
 * Deletes terminal records past retention, then stored payloads whose record
 * is gone. Safe to run twice: both passes only remove what is still there.
 */
export function createCleanupExecutor(
    registry: TaskRegistry,
    payloads: PayloadStore,
    options: CleanupOptions,
): Executor {
    const batchSize = options.batchSize ?? 500;
    const now = options.now ?? (() => new Date());

    return async () => {
        const startedAt = now();
        const result: CleanupResult = { deletedRecords: 0, deletedPayloads: 0 };

        const cutoff = new Date(startedAt.getTime() - options.retentionMs);
        for (;;) {
            const expired = await registry.listTerminalBefore(cutoff, batchSize);
            for (const record of expired) {
                if (await registry.delete(record.taskId)) result.deletedRecords++;
            }
            if (expired.length < batchSize) break;
        }

        const graceCutoff = startedAt.getTime() - options.payloadGraceMs;
        const candidates = (await payloads.list()).filter(p => p.createdAt.getTime() < graceCutoff);
        if (candidates.length > 0) {
            const live = await registry.existing(candidates.map(p => p.key));
            for (const payload of candidates) {
                if (live.has(payload.key)) continue;
                if (await payloads.delete(payload.key)) result.deletedPayloads++;
            }
        }

        console.log(`${TAG} removed ${result.deletedRecords} records, ${result.deletedPayloads} orphaned payloads`);
        return success(result);
    };
}
