import { JobQueue, Lease } from '../queue/job-queue';
import { LeaseExpiredError } from '../errors/task.errors';

const TAG = '[lease]';

/**
 * Keeps leases alive while their envelopes execute by renewing them on an interval.
 * One timer per lease; a worker holds at most one lease at a time.
 */
export class LeaseKeeper {
    private timers = new Map<string, NodeJS.Timeout>();

    constructor(
        private readonly queue: JobQueue,
        private readonly intervalMs: number = 10_000,
    ) { }

    start(lease: Lease): void {
        if (this.timers.has(lease.id)) {
            console.warn(`${TAG} already renewing lease ${lease.id}`);
            return;
        }
        const timer = setInterval(() => {
            void this.renew(lease);
        }, this.intervalMs);
        timer.unref();
        this.timers.set(lease.id, timer);
    }

    stop(leaseId: string): void {
        const timer = this.timers.get(leaseId);
        if (timer) {
            clearInterval(timer);
            this.timers.delete(leaseId);
        }
    }

    stopAll(): void {
        for (const id of Array.from(this.timers.keys())) {
            this.stop(id);
        }
    }

    isRenewing(leaseId: string): boolean {
        return this.timers.has(leaseId);
    }

    private async renew(lease: Lease): Promise<void> {
        try {
            await this.queue.renew(lease);
        } catch (err) {
            if (err instanceof LeaseExpiredError) {
                // Another worker may already hold a redelivered copy.
                console.warn(`${TAG} lease ${lease.id} for task ${lease.envelope.taskId} expired, stopping renewal`);
                this.stop(lease.id);
                return;
            }
            console.error(`${TAG} failed to renew lease ${lease.id}:`, err);
        }
    }
}
