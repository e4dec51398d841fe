import Redis from 'ioredis';
import { v4 as uuid } from 'uuid';
import { LeaderElector } from '../../src/services/leaderelector';
import { createTestRedis } from '../helpers/db';

describe('LeaderElector', () => {
    let redis: Redis;
    let key: string;

    beforeAll(() => {
        redis = createTestRedis();
    });

    beforeEach(() => {
        key = `taskline:test:${uuid()}:leader`;
    });

    afterAll(async () => {
        await redis.quit();
    });

    it('lets one instance hold the lock until it releases it', async () => {
        const a = new LeaderElector(redis, key, 30, 'worker-a');
        const b = new LeaderElector(redis, key, 30, 'worker-b');

        expect(await a.tryBecomeLeader()).toBe(true);
        expect(await b.tryBecomeLeader()).toBe(false);
        expect(await a.tryBecomeLeader()).toBe(true);
        expect(await redis.get(key)).toBe('worker-a');

        await a.releaseLeadership();
        expect(await b.tryBecomeLeader()).toBe(true);
        await b.releaseLeadership();
        expect(await redis.get(key)).toBeNull();
    });

    it('does not release a lock held by another instance', async () => {
        const a = new LeaderElector(redis, key, 30, 'worker-a');
        const b = new LeaderElector(redis, key, 30, 'worker-b');

        await a.tryBecomeLeader();
        await b.releaseLeadership();

        expect(await redis.get(key)).toBe('worker-a');
        await a.releaseLeadership();
    });
});
