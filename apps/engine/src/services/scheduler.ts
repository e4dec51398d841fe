import { LeaderLock } from './leaderelector';
import { SubmissionGateway } from './submission-gateway';

const TAG = '[beat]';

/**
 * Emits a cleanup job every `intervalMs` through the regular submission path.
 * Only the instance holding the leader lock emits, so a cluster submits one
 * cleanup per tick.
 */
export class Scheduler {
    private intervalHandle: NodeJS.Timeout | null = null;
    private running = false;
    private ticking = false;

    constructor(
        private readonly gateway: SubmissionGateway,
        private readonly leader: LeaderLock,
        private readonly intervalMs: number,
    ) { }

    async start(): Promise<void> {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} started (interval: ${this.intervalMs}ms)`);

        this.intervalHandle = setInterval(() => {
            void this.tick();
        }, this.intervalMs);
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        await this.leader.releaseLeadership();
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    /** Returns the submitted cleanup task id, or null when nothing was emitted. */
    async tick(): Promise<string | null> {
        if (this.ticking) return null;
        this.ticking = true;

        try {
            const isLeader = await this.leader.tryBecomeLeader();
            if (!isLeader) {
                return null;
            }
            const payload = Buffer.from(JSON.stringify({ scheduledAt: new Date().toISOString() }));
            const { taskId } = await this.gateway.submit({ kind: 'cleanup', payload });
            console.log(`${TAG} emitted cleanup task ${taskId}`);
            return taskId;
        } catch (err) {
            console.error(`${TAG} failed to emit cleanup:`, err);
            return null;
        } finally {
            this.ticking = false;
        }
    }
}
