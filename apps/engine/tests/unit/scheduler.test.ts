import { taskState } from '@taskline/sdk';
import { LeaderLock, LocalLeaderLock } from '../../src/services/leaderelector';
import { Scheduler } from '../../src/services/scheduler';
import { createHarness } from '../helpers/harness';

class FakeLeaderLock implements LeaderLock {
    leader = false;
    released = 0;

    async tryBecomeLeader(): Promise<boolean> {
        return this.leader;
    }

    async releaseLeadership(): Promise<void> {
        this.released++;
    }
}

describe('Scheduler', () => {
    it('submits a cleanup task through the gateway when leader', async () => {
        const h = createHarness();
        const scheduler = new Scheduler(h.gateway, new LocalLeaderLock(), 60_000);

        const taskId = await scheduler.tick();
        if (!taskId) throw new Error('expected a cleanup task');

        const record = await h.registry.read(taskId);
        expect(record.kind).toBe('cleanup');
        expect(record.state).toBe(taskState.PENDING);

        const lease = await h.queue.dequeue();
        expect(lease?.envelope.kind).toBe('cleanup');
        expect(lease?.envelope.taskId).toBe(taskId);
    });

    it('emits nothing when another instance holds the lock', async () => {
        const h = createHarness();
        const lock = new FakeLeaderLock();
        const scheduler = new Scheduler(h.gateway, lock, 60_000);

        expect(await scheduler.tick()).toBeNull();
        expect(await h.queue.depth()).toBe(0);

        lock.leader = true;
        expect(await scheduler.tick()).not.toBeNull();
        expect(await h.queue.depth()).toBe(1);
    });

    it('logs and swallows a failed submission so the next tick still runs', async () => {
        const h = createHarness();
        jest.spyOn(h.queue, 'enqueue').mockRejectedValueOnce(new Error('queue offline'));
        const scheduler = new Scheduler(h.gateway, new LocalLeaderLock(), 60_000);

        expect(await scheduler.tick()).toBeNull();
        expect(await scheduler.tick()).not.toBeNull();
    });

    it('ticks on its interval and releases leadership on stop', async () => {
        jest.useFakeTimers();
        try {
            const h = createHarness();
            const lock = new FakeLeaderLock();
            lock.leader = true;
            const scheduler = new Scheduler(h.gateway, lock, 1_000);
            const tick = jest.spyOn(scheduler, 'tick');

            await scheduler.start();
            expect(scheduler.isRunning()).toBe(true);
            jest.advanceTimersByTime(3_000);
            expect(tick).toHaveBeenCalledTimes(3);

            await scheduler.stop();
            expect(scheduler.isRunning()).toBe(false);
            expect(lock.released).toBe(1);
            jest.advanceTimersByTime(3_000);
            expect(tick).toHaveBeenCalledTimes(3);
        } finally {
            jest.useRealTimers();
        }
    });
});
