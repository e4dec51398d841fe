import { TaskError } from './types';

export type ExecutionOutcome<T = unknown> =
    | { kind: 'success'; result: T }
    | { kind: 'retryable'; error: TaskError }
    | { kind: 'fatal'; error: TaskError };

export function success<T>(result: T): ExecutionOutcome<T> {
    return { kind: 'success', result };
}

export function retryable(kind: string, message: string): ExecutionOutcome<never> {
    return { kind: 'retryable', error: { kind, message } };
}

export function fatal(kind: string, message: string): ExecutionOutcome<never> {
    return { kind: 'fatal', error: { kind, message } };
}

/**
 * Raised by executors that prefer throwing over returning an outcome.
 * `retryable: false` sends the task straight to FAILURE.
 */
export class ExecutionError extends Error {
    constructor(
        message: string,
        public readonly kind: string = 'execution_error',
        public readonly retryable: boolean = true,
    ) {
        super(message);
        this.name = 'ExecutionError';
    }
}

// Thrown values are classified here so the worker only ever branches on an outcome.
export function outcomeFromError(err: unknown): ExecutionOutcome<never> {
    if (err instanceof ExecutionError) {
        return err.retryable ? retryable(err.kind, err.message) : fatal(err.kind, err.message);
    }
    if (err instanceof Error) {
        return retryable(err.name || 'Error', err.message);
    }
    return retryable('Error', String(err));
}
