import {
    ExecutionOutcome,
    ExecutorRegistry,
    ExperimentLogger,
    JobEnvelope,
    MAX_RESULT_SIZE,
    PayloadTooLargeError,
    SerializationError,
    fatal,
    outcomeFromError,
    serialize,
    taskState,
} from '@taskline/sdk';
import { TaskRegistry, TaskRecord } from '../registry/task-registry';
import { isTerminal } from '../registry/state-machine';
import { JobQueue, Lease } from '../queue/job-queue';
import { PayloadStore } from '../storage/payload-store';
import { TaskMetrics } from '../metrics/task-metrics';
import { LeaseKeeper } from './lease-keeper.service';
import { BackoffPolicy, DEFAULT_BACKOFF, calculateBackOff } from '../utils/backoff';
import { LeaseExpiredError, NotFoundError, StaleAttemptError } from '../errors/task.errors';

const TAG = '[processor]';

export type ProcessResult = 'succeeded' | 'retried' | 'failed' | 'dropped';

export interface ProcessorOptions {
    maxRetries: number;
    executionTimeoutMs: number;
    backoff?: BackoffPolicy;
    /** Largest serialized result a task may store. */
    maxResultBytes?: number;
}

export interface ProcessorDeps {
    registry: TaskRegistry;
    queue: JobQueue;
    payloads: PayloadStore;
    executors: ExecutorRegistry;
    leaseKeeper: LeaseKeeper;
    metrics?: TaskMetrics;
    experiments?: ExperimentLogger;
}

/**
 * Runs one leased envelope to a settled state. The only place execution
 * outcomes are turned into SUCCESS, RETRY or FAILURE.
 */
export class JobProcessor {
    private readonly backoff: BackoffPolicy;

    constructor(
        private readonly deps: ProcessorDeps,
        private readonly options: ProcessorOptions,
    ) {
        this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    }

    async process(lease: Lease): Promise<ProcessResult> {
        try {
            return await this.run(lease);
        } catch (err) {
            // Another delivery of the same task restarted it; that delivery settles the record.
            if (err instanceof StaleAttemptError) {
                console.warn(`${TAG} ${err.message}, dropping stale delivery`);
                await this.settle(lease);
                return 'dropped';
            }
            throw err;
        }
    }

    // Every write after the first read is guarded by the attempt count it was based on.
    private async run(lease: Lease): Promise<ProcessResult> {
        const { envelope } = lease;
        const { registry, metrics } = this.deps;
        const { taskId, kind } = envelope;

        let record: TaskRecord;
        try {
            record = await registry.read(taskId);
        } catch (err) {
            if (err instanceof NotFoundError) {
                console.warn(`${TAG} task ${taskId} has no record, dropping envelope`);
                await this.settle(lease);
                return 'dropped';
            }
            throw err;
        }

        if (isTerminal(record.state)) {
            console.warn(`${TAG} duplicate delivery of task ${taskId} (already ${record.state}), dropping`);
            await this.settle(lease);
            return 'dropped';
        }

        // Redeliveries after crashes count as attempts too.
        if (record.attempts > this.options.maxRetries) {
            await registry.update(taskId, {
                state: taskState.FAILURE,
                error: { kind: 'max_retries_exceeded', message: `Task exceeded ${this.options.maxRetries} retries after worker failure` },
                expectedAttempts: record.attempts,
            });
            metrics?.failed(kind, 0);
            await this.settle(lease);
            return 'failed';
        }

        const started = await registry.update(taskId, { state: taskState.STARTED, expectedAttempts: record.attempts });
        const expectedAttempts = started.attempts;
        metrics?.started(kind);
        console.log(`${TAG} task ${taskId} (${kind}) attempt ${started.attempts}`);

        const startedAt = Date.now();
        this.deps.leaseKeeper.start(lease);
        let outcome: ExecutionOutcome;
        try {
            outcome = this.checkResult(await this.execute(envelope, started.attempts));
        } finally {
            this.deps.leaseKeeper.stop(lease.id);
        }
        const durationMs = Date.now() - startedAt;

        if (outcome.kind === 'success') {
            await registry.update(taskId, { state: taskState.SUCCESS, result: outcome.result, expectedAttempts });
            metrics?.succeeded(kind, durationMs);
            await this.settle(lease);
            console.log(`${TAG} task ${taskId} succeeded in ${durationMs}ms`);
            return 'succeeded';
        }

        if (outcome.kind === 'retryable' && started.attempts <= this.options.maxRetries) {
            const delay = calculateBackOff(started.attempts, this.backoff);
            await registry.update(taskId, { state: taskState.RETRY, error: outcome.error, expectedAttempts });
            metrics?.retried(kind);
            try {
                await this.deps.queue.nack(lease, delay);
                console.log(`${TAG} task ${taskId} retry scheduled in ${delay}ms: ${outcome.error.message}`);
            } catch (err) {
                this.logSettleError(lease, err);
            }
            return 'retried';
        }

        await registry.update(taskId, { state: taskState.FAILURE, error: outcome.error, expectedAttempts });
        metrics?.failed(kind, durationMs);
        await this.settle(lease);
        console.error(`${TAG} task ${taskId} failed after ${started.attempts} attempt(s): ${outcome.error.kind}: ${outcome.error.message}`);
        return 'failed';
    }

    private async execute(envelope: JobEnvelope, attempt: number): Promise<ExecutionOutcome> {
        const fn = this.deps.executors.get(envelope.kind);
        if (!fn) {
            const registered = this.deps.executors.list();
            return fatal('unknown_work_kind', `No executor for "${envelope.kind}". Registered: [${registered.join(', ')}]`);
        }

        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<ExecutionOutcome>((resolve) => {
            timer = setTimeout(
                () => resolve(fatal('timeout', `Execution exceeded ${this.options.executionTimeoutMs}ms`)),
                this.options.executionTimeoutMs,
            );
        });

        try {
            const payload = await this.loadPayload(envelope);
            // The executor keeps running after a timeout; it cannot be cancelled.
            return await Promise.race([
                fn({
                    taskId: envelope.taskId,
                    kind: envelope.kind,
                    payload,
                    attempt,
                    experiments: this.deps.experiments,
                }),
                timeout,
            ]);
        } catch (err) {
            return outcomeFromError(err);
        } finally {
            clearTimeout(timer);
        }
    }

    // Results are checked before the registry write so both backends reject the same values.
    private checkResult(outcome: ExecutionOutcome): ExecutionOutcome {
        if (outcome.kind !== 'success') return outcome;
        try {
            serialize(outcome.result, this.options.maxResultBytes ?? MAX_RESULT_SIZE);
            return outcome;
        } catch (err) {
            if (err instanceof PayloadTooLargeError) return fatal('result_too_large', err.message);
            if (err instanceof SerializationError) return fatal('unserializable_result', err.message);
            throw err;
        }
    }

    private async loadPayload(envelope: JobEnvelope): Promise<Buffer> {
        const ref = envelope.payload;
        if (ref.type === 'inline') {
            return Buffer.from(ref.data, 'base64');
        }
        return this.deps.payloads.get(ref.key);
    }

    private async settle(lease: Lease): Promise<void> {
        try {
            await this.deps.queue.ack(lease);
        } catch (err) {
            this.logSettleError(lease, err);
        }
    }

    private logSettleError(lease: Lease, err: unknown): void {
        if (err instanceof LeaseExpiredError) {
            console.warn(`${TAG} lease for task ${lease.envelope.taskId} expired before settling; it will be redelivered`);
            return;
        }
        console.error(`${TAG} failed to settle task ${lease.envelope.taskId}:`, err);
    }
}

