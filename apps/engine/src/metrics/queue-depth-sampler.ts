import { JobQueue } from '../queue/job-queue';
import { TaskMetrics } from './task-metrics';

const TAG = '[metrics]';

export class QueueDepthSampler {
    private intervalHandle: NodeJS.Timeout | null = null;

    constructor(
        private readonly queue: JobQueue,
        private readonly metrics: TaskMetrics,
        private readonly intervalMs: number = 15_000,
    ) { }

    start(): void {
        if (this.intervalHandle) return;
        void this.sample();
        this.intervalHandle = setInterval(() => {
            void this.sample();
        }, this.intervalMs);
        this.intervalHandle.unref();
    }

    stop(): void {
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
    }

    async sample(): Promise<number | null> {
        try {
            const depth = await this.queue.depth();
            this.metrics.queueDepth(depth);
            return depth;
        } catch (err) {
            console.error(`${TAG} queue depth sampling failed:`, err);
            return null;
        }
    }
}
