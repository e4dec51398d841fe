export const WORK_KINDS = ['image-processing', 'rag-query', 'cleanup'] as const;

export type WorkKind = (typeof WORK_KINDS)[number];

export function isWorkKind(value: unknown): value is WorkKind {
    return WORK_KINDS.some(kind => kind === value);
}

/**
 * Lifecycle states for a task record.
 * Tasks progress: PENDING → STARTED → SUCCESS/RETRY/FAILURE, RETRY → STARTED
 */
export enum taskState {
    PENDING = 'pending',
    STARTED = 'started',
    RETRY = 'retry',
    SUCCESS = 'success',
    FAILURE = 'failure',
}

export interface TaskError {
    kind: string;
    message: string;
}

// Small payloads travel inside the envelope; larger ones are written to the
// payload store under the task id and referenced by key.
export type PayloadRef =
    | { type: 'inline'; data: string }
    | { type: 'stored'; key: string };

export interface JobEnvelope {
    readonly taskId: string;
    readonly kind: WorkKind;
    readonly payload: PayloadRef;
    readonly submittedAt: string;
    retryCount: number;
}
