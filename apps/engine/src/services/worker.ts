import { JobQueue } from '../queue/job-queue';
import { JobProcessor } from './job-processor';

const TAG = '[worker]';

export interface WorkerConfig {
    workerId: string;
    checkBackpressure?: () => boolean;
    minIntervalMs?: number;
    maxIntervalMs?: number;
}

/**
 * One independent execution loop: dequeue, process, repeat.
 * Holds at most one lease; idles with a growing poll interval when the queue is empty.
 */
export class Worker {
    readonly workerId: string;
    private interval: number;
    private readonly minInterval: number;
    private readonly maxInterval: number;
    private running = false;
    private currentTimeout: NodeJS.Timeout | null = null;
    private inFlight: Promise<void> | null = null;
    private readonly checkBackpressure?: () => boolean;
    private processed = 0;

    constructor(
        private readonly queue: JobQueue,
        private readonly processor: JobProcessor,
        config: WorkerConfig,
    ) {
        this.workerId = config.workerId;
        this.minInterval = config.minIntervalMs ?? 100;
        this.maxInterval = config.maxIntervalMs ?? 500;
        this.interval = this.minInterval;
        this.checkBackpressure = config.checkBackpressure;
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} ${this.workerId} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} ${this.workerId} started`);
        this.schedule(0);
    }

    /** Stops polling and waits for the envelope in hand, if any, to settle. */
    async stop(): Promise<void> {
        this.running = false;
        if (this.currentTimeout) {
            clearTimeout(this.currentTimeout);
            this.currentTimeout = null;
        }
        if (this.inFlight) await this.inFlight;
        console.log(`${TAG} ${this.workerId} stopped (${this.processed} processed)`);
    }

    isRunning(): boolean {
        return this.running;
    }

    get processedCount(): number {
        return this.processed;
    }

    private schedule(delayMs: number): void {
        if (!this.running) return;
        this.currentTimeout = setTimeout(() => {
            this.currentTimeout = null;
            this.inFlight = this.poll().finally(() => {
                this.inFlight = null;
            });
        }, delayMs);
    }

    private async poll(): Promise<void> {
        if (!this.running) return;

        if (this.checkBackpressure && this.checkBackpressure()) {
            console.warn(`${TAG} ${this.workerId} backpressure detected, skipping poll`);
            this.schedule(1000);
            return;
        }

        let next = this.interval;
        try {
            const lease = await this.queue.dequeue();
            if (lease) {
                this.interval = this.minInterval;
                next = 0;
                try {
                    await this.processor.process(lease);
                } catch (err) {
                    // Unsettled lease: the envelope comes back after the visibility timeout.
                    console.error(`${TAG} ${this.workerId} task ${lease.envelope.taskId} error:`, err);
                }
                this.processed++;
            } else {
                // backoff: 100 -> 200 -> 400 -> 500ms cap
                this.interval = Math.min(this.interval * 2, this.maxInterval);
                next = this.interval;
            }
        } catch (err) {
            console.error(`${TAG} ${this.workerId} dequeue error:`, err);
            this.interval = this.maxInterval;
            next = this.interval;
        }

        this.schedule(next);
    }
}
