import { Redis } from 'ioredis';
import { v4 as uuid } from 'uuid';
import { JobEnvelope, decodeEnvelope, encodeEnvelope } from '@taskline/sdk';
import { JobQueue, Lease } from './job-queue';
import { LeaseExpiredError } from '../errors/task.errors';

// Stored entries are "<retryCount>|<envelope json>"; scripts bump the count without decoding the envelope.
const BUMP_RETRY = `
    local function bump(entry)
        local sep = string.find(entry, "|", 1, true)
        return tostring(tonumber(string.sub(entry, 1, sep - 1)) + 1) .. string.sub(entry, sep)
    end
`;

// Moves due delayed envelopes and expired leases back to ready, then leases the oldest ready envelope.
// KEYS: ready, delayed, leases, expiry  ARGV: now, leaseId, expiresAt
const DEQUEUE_SCRIPT = BUMP_RETRY + `
    local due = redis.call("zrangebyscore", KEYS[2], "-inf", ARGV[1])
    for _, env in ipairs(due) do
        redis.call("zrem", KEYS[2], env)
        redis.call("lpush", KEYS[1], env)
    end

    local expired = redis.call("zrangebyscore", KEYS[4], "-inf", ARGV[1])
    for _, id in ipairs(expired) do
        local env = redis.call("hget", KEYS[3], id)
        redis.call("zrem", KEYS[4], id)
        redis.call("hdel", KEYS[3], id)
        if env then
            redis.call("lpush", KEYS[1], bump(env))
        end
    end

    local env = redis.call("rpop", KEYS[1])
    if not env then
        return false
    end
    redis.call("hset", KEYS[3], ARGV[2], env)
    redis.call("zadd", KEYS[4], ARGV[3], ARGV[2])
    return env
`;

// KEYS: leases, expiry  ARGV: leaseId, now
const ACK_SCRIPT = `
    local exp = redis.call("zscore", KEYS[2], ARGV[1])
    if not exp or tonumber(exp) <= tonumber(ARGV[2]) then
        return 0
    end
    redis.call("zrem", KEYS[2], ARGV[1])
    redis.call("hdel", KEYS[1], ARGV[1])
    return 1
`;

// KEYS: leases, expiry, ready, delayed  ARGV: leaseId, now, readyAt
const NACK_SCRIPT = BUMP_RETRY + `
    local exp = redis.call("zscore", KEYS[2], ARGV[1])
    if not exp or tonumber(exp) <= tonumber(ARGV[2]) then
        return 0
    end
    local env = redis.call("hget", KEYS[1], ARGV[1])
    redis.call("zrem", KEYS[2], ARGV[1])
    redis.call("hdel", KEYS[1], ARGV[1])
    if not env then
        return 0
    end
    local requeued = bump(env)
    if tonumber(ARGV[3]) <= tonumber(ARGV[2]) then
        redis.call("lpush", KEYS[3], requeued)
    else
        redis.call("zadd", KEYS[4], ARGV[3], requeued)
    end
    return 1
`;

// KEYS: expiry  ARGV: leaseId, now, expiresAt
const RENEW_SCRIPT = `
    local exp = redis.call("zscore", KEYS[1], ARGV[1])
    if not exp or tonumber(exp) <= tonumber(ARGV[2]) then
        return 0
    end
    redis.call("zadd", KEYS[1], ARGV[3], ARGV[1])
    return 1
`;

function toEntry(envelope: JobEnvelope): string {
    return `${envelope.retryCount}|${encodeEnvelope(envelope)}`;
}

function fromEntry(entry: string): JobEnvelope {
    const sep = entry.indexOf('|');
    const retryCount = Number(entry.slice(0, sep));
    if (sep < 1 || !Number.isInteger(retryCount)) {
        throw new Error(`Malformed queue entry: ${entry.slice(0, 64)}`);
    }
    return { ...decodeEnvelope(entry.slice(sep + 1)), retryCount };
}

/**
 * Redis-backed queue. Every state change is a single Lua script, so a
 * lease can't be acked and reclaimed at the same time by two instances.
 */
export class RedisJobQueue implements JobQueue {
    private readonly keys: { ready: string; delayed: string; leases: string; expiry: string };

    constructor(
        private readonly redis: Redis,
        private readonly visibilityTimeoutMs: number = 30_000,
        prefix: string = 'taskline:queue',
    ) {
        this.keys = {
            ready: `${prefix}:ready`,
            delayed: `${prefix}:delayed`,
            leases: `${prefix}:leases`,
            expiry: `${prefix}:lease-expiry`,
        };
    }

    async enqueue(envelope: JobEnvelope, delayMs = 0): Promise<void> {
        const raw = toEntry(envelope);
        if (delayMs > 0) {
            await this.redis.zadd(this.keys.delayed, Date.now() + delayMs, raw);
        } else {
            await this.redis.lpush(this.keys.ready, raw);
        }
    }

    async dequeue(): Promise<Lease | null> {
        const now = Date.now();
        const leaseId = uuid();
        const expiresAt = now + this.visibilityTimeoutMs;
        const { ready, delayed, leases, expiry } = this.keys;

        const raw = await this.redis.eval(
            DEQUEUE_SCRIPT, 4,
            ready, delayed, leases, expiry,
            now, leaseId, expiresAt,
        );
        if (typeof raw !== 'string') return null;

        return { id: leaseId, envelope: fromEntry(raw), expiresAt };
    }

    async ack(lease: Lease): Promise<void> {
        const res = await this.redis.eval(
            ACK_SCRIPT, 2,
            this.keys.leases, this.keys.expiry,
            lease.id, Date.now(),
        );
        if (Number(res) !== 1) throw new LeaseExpiredError(lease.id);
    }

    async nack(lease: Lease, delayMs: number): Promise<void> {
        const now = Date.now();
        const { leases, expiry, ready, delayed } = this.keys;
        const res = await this.redis.eval(
            NACK_SCRIPT, 4,
            leases, expiry, ready, delayed,
            lease.id, now, now + delayMs,
        );
        if (Number(res) !== 1) throw new LeaseExpiredError(lease.id);
    }

    async renew(lease: Lease): Promise<Lease> {
        const now = Date.now();
        const expiresAt = now + this.visibilityTimeoutMs;
        const res = await this.redis.eval(
            RENEW_SCRIPT, 1,
            this.keys.expiry,
            lease.id, now, expiresAt,
        );
        if (Number(res) !== 1) throw new LeaseExpiredError(lease.id);
        return { ...lease, expiresAt };
    }

    async depth(): Promise<number> {
        const [ready, delayed, leased] = await Promise.all([
            this.redis.llen(this.keys.ready),
            this.redis.zcard(this.keys.delayed),
            this.redis.hlen(this.keys.leases),
        ]);
        return ready + delayed + leased;
    }

    async ping(): Promise<void> {
        await this.redis.ping();
    }
}
