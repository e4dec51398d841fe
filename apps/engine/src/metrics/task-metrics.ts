import { Counter, Gauge, Histogram, Registry } from 'prom-client';
import { WorkKind } from '@taskline/sdk';

/** Counters and timers the engine updates at every state transition. */
export interface TaskMetrics {
    submitted(kind: WorkKind): void;
    started(kind: WorkKind): void;
    succeeded(kind: WorkKind, durationMs: number): void;
    retried(kind: WorkKind): void;
    failed(kind: WorkKind, durationMs: number): void;
    queueDepth(depth: number): void;
}

export class PromTaskMetrics implements TaskMetrics {
    readonly registry: Registry;

    private readonly submittedCounter: Counter<'kind'>;
    private readonly startedCounter: Counter<'kind'>;
    private readonly succeededCounter: Counter<'kind'>;
    private readonly retriedCounter: Counter<'kind'>;
    private readonly failedCounter: Counter<'kind'>;
    private readonly durationHistogram: Histogram<'kind' | 'outcome'>;
    private readonly queueDepthGauge: Gauge<string>;

    constructor(registry: Registry = new Registry()) {
        this.registry = registry;

        this.submittedCounter = new Counter({
            name: 'taskline_tasks_submitted_total',
            help: 'Tasks accepted by the submission gateway',
            labelNames: ['kind'],
            registers: [registry],
        });
        this.startedCounter = new Counter({
            name: 'taskline_tasks_started_total',
            help: 'Execution attempts started by workers',
            labelNames: ['kind'],
            registers: [registry],
        });
        this.succeededCounter = new Counter({
            name: 'taskline_tasks_succeeded_total',
            help: 'Tasks that reached SUCCESS',
            labelNames: ['kind'],
            registers: [registry],
        });
        this.retriedCounter = new Counter({
            name: 'taskline_tasks_retried_total',
            help: 'Failed attempts requeued for retry',
            labelNames: ['kind'],
            registers: [registry],
        });
        this.failedCounter = new Counter({
            name: 'taskline_tasks_failed_total',
            help: 'Tasks that reached FAILURE',
            labelNames: ['kind'],
            registers: [registry],
        });
        this.durationHistogram = new Histogram({
            name: 'taskline_task_duration_seconds',
            help: 'Wall-clock duration of terminal execution attempts',
            labelNames: ['kind', 'outcome'],
            buckets: [0.05, 0.1, 0.5, 1, 2.5, 5, 10, 30, 60, 300, 1500],
            registers: [registry],
        });
        this.queueDepthGauge = new Gauge({
            name: 'taskline_queue_depth',
            help: 'Envelopes ready, delayed or leased',
            registers: [registry],
        });
    }

    submitted(kind: WorkKind): void {
        this.submittedCounter.inc({ kind });
    }

    started(kind: WorkKind): void {
        this.startedCounter.inc({ kind });
    }

    succeeded(kind: WorkKind, durationMs: number): void {
        this.succeededCounter.inc({ kind });
        this.durationHistogram.observe({ kind, outcome: 'success' }, durationMs / 1000);
    }

    retried(kind: WorkKind): void {
        this.retriedCounter.inc({ kind });
    }

    failed(kind: WorkKind, durationMs: number): void {
        this.failedCounter.inc({ kind });
        this.durationHistogram.observe({ kind, outcome: 'failure' }, durationMs / 1000);
    }

    queueDepth(depth: number): void {
        this.queueDepthGauge.set(depth);
    }
}
