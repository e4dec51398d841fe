import { JobEnvelope } from '@taskline/sdk';

/**
 * Claim on a delivered envelope. Valid until `expiresAt` (epoch ms); after
 * that the envelope is redelivered to another worker.
 */
export interface Lease {
    readonly id: string;
    readonly envelope: JobEnvelope;
    readonly expiresAt: number;
}

/**
 * At-least-once transport for job envelopes. No ordering across task ids.
 * ack/nack/renew throw LeaseExpiredError once the lease has been reclaimed.
 */
export interface JobQueue {
    enqueue(envelope: JobEnvelope, delayMs?: number): Promise<void>;
    /** Next ready envelope, or null when none is ready. Never blocks. */
    dequeue(): Promise<Lease | null>;
    ack(lease: Lease): Promise<void>;
    /** Requeues with `retryCount + 1`, visible again after `delayMs`. */
    nack(lease: Lease, delayMs: number): Promise<void>;
    renew(lease: Lease): Promise<Lease>;
    /** Ready + delayed + leased. */
    depth(): Promise<number>;
    ping(): Promise<void>;
}
