import { v4 as uuid } from 'uuid';
import { JobEnvelope } from '@taskline/sdk';
import { JobQueue, Lease } from './job-queue';
import { LeaseExpiredError } from '../errors/task.errors';

interface HeldLease {
    envelope: JobEnvelope;
    expiresAt: number;
}

interface DelayedEnvelope {
    envelope: JobEnvelope;
    readyAt: number;
}

/**
 * In-process queue with the same visibility-timeout semantics as RedisJobQueue.
 * Envelopes are copied on the way in and out so a worker never shares one with the queue.
 */
export class InMemoryJobQueue implements JobQueue {
    private ready: JobEnvelope[] = [];
    private delayed: DelayedEnvelope[] = [];
    private leases = new Map<string, HeldLease>();

    constructor(
        private readonly visibilityTimeoutMs: number = 30_000,
        private readonly now: () => number = Date.now,
    ) { }

    async enqueue(envelope: JobEnvelope, delayMs = 0): Promise<void> {
        this.push({ ...envelope }, delayMs);
    }

    async dequeue(): Promise<Lease | null> {
        this.promoteDelayed();
        this.reclaimExpired();

        const envelope = this.ready.shift();
        if (!envelope) return null;

        const lease: Lease = {
            id: uuid(),
            envelope: { ...envelope },
            expiresAt: this.now() + this.visibilityTimeoutMs,
        };
        this.leases.set(lease.id, { envelope, expiresAt: lease.expiresAt });
        return lease;
    }

    async ack(lease: Lease): Promise<void> {
        this.take(lease);
    }

    async nack(lease: Lease, delayMs: number): Promise<void> {
        const held = this.take(lease);
        this.push({ ...held.envelope, retryCount: held.envelope.retryCount + 1 }, delayMs);
    }

    async renew(lease: Lease): Promise<Lease> {
        const held = this.leases.get(lease.id);
        if (!held || held.expiresAt <= this.now()) {
            throw new LeaseExpiredError(lease.id);
        }
        held.expiresAt = this.now() + this.visibilityTimeoutMs;
        return { ...lease, expiresAt: held.expiresAt };
    }

    async depth(): Promise<number> {
        return this.ready.length + this.delayed.length + this.leases.size;
    }

    async ping(): Promise<void> { }

    private push(envelope: JobEnvelope, delayMs: number): void {
        if (delayMs > 0) {
            this.delayed.push({ envelope, readyAt: this.now() + delayMs });
        } else {
            this.ready.push(envelope);
        }
    }

    private take(lease: Lease): HeldLease {
        const held = this.leases.get(lease.id);
        if (!held || held.expiresAt <= this.now()) {
            throw new LeaseExpiredError(lease.id);
        }
        this.leases.delete(lease.id);
        return held;
    }

    private promoteDelayed(): void {
        const now = this.now();
        const due = this.delayed.filter(d => d.readyAt <= now);
        if (due.length === 0) return;
        this.delayed = this.delayed.filter(d => d.readyAt > now);
        due.sort((a, b) => a.readyAt - b.readyAt);
        this.ready.push(...due.map(d => d.envelope));
    }

    // Expired leases go back to the ready list as a redelivery.
    private reclaimExpired(): void {
        const now = this.now();
        for (const [id, held] of this.leases) {
            if (held.expiresAt <= now) {
                this.leases.delete(id);
                this.ready.push({ ...held.envelope, retryCount: held.envelope.retryCount + 1 });
            }
        }
    }
}
