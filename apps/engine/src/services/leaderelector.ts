import { Redis } from 'ioredis';

export interface LeaderLock {
    tryBecomeLeader(): Promise<boolean>;
    releaseLeadership(): Promise<void>;
}

// Single-process deployments (STORE_BACKEND=memory) are always the leader.
export class LocalLeaderLock implements LeaderLock {
    async tryBecomeLeader(): Promise<boolean> {
        return true;
    }

    async releaseLeadership(): Promise<void> { }
}

export class LeaderElector implements LeaderLock {
    private readonly workerId: string;
    private renewalInterval: NodeJS.Timeout | null = null;

    constructor(
        private redis: Redis,
        private readonly key: string = 'taskline:beat:leader',
        private readonly ttlSeconds: number = 30,
        workerId?: string,
    ) {
        this.workerId = workerId || `worker-${process.pid}-${Date.now()}`;
    }

    async tryBecomeLeader(): Promise<boolean> {
        // SET NX with TTL - atomic
        const result = await this.redis.set(this.key, this.workerId, 'EX', this.ttlSeconds, 'NX');

        if (result === 'OK') {
            this.startRenewal();
            return true;
        }

        // Already the leader (re-election on the next tick)
        const currentLeader = await this.redis.get(this.key);
        return currentLeader === this.workerId;
    }

    async releaseLeadership(): Promise<void> {
        this.stopRenewal();

        // Only release if we're the current leader
        const script = `
            if redis.call("get", KEYS[1]) == ARGV[1] then
                return redis.call("del", KEYS[1])
            else
                return 0
            end
        `;

        await this.redis.eval(script, 1, this.key, this.workerId);
    }

    private startRenewal(): void {
        this.stopRenewal();
        // Renew at half the TTL
        const renewalMs = (this.ttlSeconds * 1000) / 2;

        this.renewalInterval = setInterval(async () => {
            try {
                const stillLeader = await this.renewLock();
                if (!stillLeader) {
                    this.stopRenewal();
                }
            } catch (error) {
                console.error('[leader] lock renewal failed:', error);
            }
        }, renewalMs);
        this.renewalInterval.unref();
    }

    private stopRenewal(): void {
        if (this.renewalInterval) {
            clearInterval(this.renewalInterval);
            this.renewalInterval = null;
        }
    }

    private async renewLock(): Promise<boolean> {
        // Only extend the TTL if we still hold the key
        const script = `
            if redis.call("get", KEYS[1]) == ARGV[1] then
                return redis.call("expire", KEYS[1], ARGV[2])
            else
                return 0
            end
        `;

        const result = await this.redis.eval(script, 1, this.key, this.workerId, this.ttlSeconds);
        return result === 1;
    }
}
