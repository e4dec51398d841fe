import { JobQueue } from '../queue/job-queue';
import { JobProcessor } from './job-processor';
import { Worker } from './worker';

const TAG = '[pool]';

export interface WorkerPoolConfig {
    poolId: string;
    concurrency: number;
    checkBackpressure?: () => boolean;
    minIntervalMs?: number;
    maxIntervalMs?: number;
}

// Scaling out means more pools (processes) against the same queue; workers share nothing else.
export class WorkerPool {
    private readonly workers: Worker[];

    constructor(queue: JobQueue, processor: JobProcessor, config: WorkerPoolConfig) {
        this.workers = Array.from({ length: config.concurrency }, (_, i) => new Worker(queue, processor, {
            workerId: `${config.poolId}-${i + 1}`,
            checkBackpressure: config.checkBackpressure,
            minIntervalMs: config.minIntervalMs,
            maxIntervalMs: config.maxIntervalMs,
        }));
    }

    start(): void {
        console.log(`${TAG} starting ${this.workers.length} workers`);
        for (const worker of this.workers) worker.start();
    }

    async stop(): Promise<void> {
        await Promise.all(this.workers.map(w => w.stop()));
        console.log(`${TAG} all workers stopped`);
    }

    get size(): number {
        return this.workers.length;
    }

    get processedCount(): number {
        return this.workers.reduce((sum, w) => sum + w.processedCount, 0);
    }
}
