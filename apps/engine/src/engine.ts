import { Pool } from 'pg';
import { Redis } from 'ioredis';
import { v7 as uuid } from 'uuid';
import { ExecutorRegistry, ExperimentLogger } from '@taskline/sdk';
import { EngineConfig } from './config';
import { createPool, createRedis } from './db';
import { TaskRegistry } from './registry/task-registry';
import { TaskRepository } from './repositories/task.repository';
import { InMemoryTaskRepository } from './repositories/memory-task.repository';
import { JobQueue } from './queue/job-queue';
import { RedisJobQueue } from './queue/redis-job-queue';
import { InMemoryJobQueue } from './queue/memory-job-queue';
import { FsPayloadStore, PayloadStore } from './storage/payload-store';
import { PromTaskMetrics } from './metrics/task-metrics';
import { FileExperimentLogger } from './experiments/file-experiment-logger';
import { createCleanupExecutor } from './executors/cleanup.executor';
import {
    EventLoopMonitor,
    JobProcessor,
    LeaderElector,
    LeaderLock,
    LeaseKeeper,
    LocalLeaderLock,
    Scheduler,
    StatusReporter,
    SubmissionGateway,
    WorkerPool,
    createBackpressureCheck,
} from './services';

export interface Engine {
    registry: TaskRegistry;
    queue: JobQueue;
    payloads: PayloadStore;
    metrics: PromTaskMetrics;
    gateway: SubmissionGateway;
    reporter: StatusReporter;
    processor: JobProcessor;
    leaseKeeper: LeaseKeeper;
    pool: WorkerPool;
    scheduler: Scheduler;
    monitor: EventLoopMonitor;
    experiments?: ExperimentLogger;
    /** Postgres pool and Redis client, when the postgres backend is in use. */
    connections: { pg: Pool; redis: Redis } | null;
}

export interface EngineOverrides {
    registry?: TaskRegistry;
    queue?: JobQueue;
    payloads?: PayloadStore;
    leader?: LeaderLock;
    experiments?: ExperimentLogger;
}

/**
 * Wires the engine from configuration. Nothing is started here; callers start
 * the worker pool and scheduler once their dependencies answer.
 */
export function buildEngine(config: EngineConfig, executors: ExecutorRegistry, overrides: EngineOverrides = {}): Engine {
    let connections: Engine['connections'] = null;
    let registry: TaskRegistry;
    let queue: JobQueue;
    let leader: LeaderLock;

    if (config.storeBackend === 'postgres') {
        const pg = createPool(config.databaseUrl);
        const redis = createRedis(config.redisUrl);
        connections = { pg, redis };
        registry = overrides.registry ?? new TaskRepository(pg);
        queue = overrides.queue ?? new RedisJobQueue(redis, config.visibilityTimeoutMs, config.queuePrefix);
        leader = overrides.leader ?? new LeaderElector(redis, `${config.queuePrefix}:beat-leader`, config.leaderTtlSeconds);
    } else {
        registry = overrides.registry ?? new InMemoryTaskRepository();
        queue = overrides.queue ?? new InMemoryJobQueue(config.visibilityTimeoutMs);
        leader = overrides.leader ?? new LocalLeaderLock();
    }

    const payloads = overrides.payloads ?? new FsPayloadStore(config.payloadDir);
    const experiments = overrides.experiments
        ?? (config.experimentLog ? new FileExperimentLogger(config.experimentLog) : undefined);
    const metrics = new PromTaskMetrics();

    if (!executors.has('cleanup')) {
        executors.register('cleanup', createCleanupExecutor(registry, payloads, {
            retentionMs: config.retentionMs,
            payloadGraceMs: config.payloadGraceMs,
        }));
    }

    const gateway = new SubmissionGateway(registry, queue, payloads, {
        maxPayloadBytes: config.maxPayloadBytes,
        inlinePayloadBytes: config.inlinePayloadBytes,
    }, metrics);
    const reporter = new StatusReporter(registry);
    const leaseKeeper = new LeaseKeeper(queue, config.leaseRenewMs);
    const processor = new JobProcessor(
        { registry, queue, payloads, executors, leaseKeeper, metrics, experiments },
        { maxRetries: config.maxRetries, executionTimeoutMs: config.executionTimeoutMs, backoff: config.backoff },
    );

    const monitor = new EventLoopMonitor();
    const pool = new WorkerPool(queue, processor, {
        poolId: `worker-${uuid().slice(-8)}`,
        concurrency: config.workers,
        checkBackpressure: createBackpressureCheck(monitor, config.maxEventLoopLag),
    });
    const scheduler = new Scheduler(gateway, leader, config.cleanupIntervalMs);

    return {
        registry, queue, payloads, metrics, gateway, reporter, processor,
        leaseKeeper, pool, scheduler, monitor, experiments, connections,
    };
}
