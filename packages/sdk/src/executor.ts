import { ExecutionOutcome } from './outcome';
import { WorkKind, isWorkKind } from './types';

export interface ExperimentRecord {
    taskId: string;
    kind: WorkKind;
    inputSummary: Record<string, unknown>;
    durationMs: number;
    outcome: 'success' | 'failure';
    metrics?: Record<string, number>;
}

// Optional audit sink. Executors may call it; the engine never waits on it.
export interface ExperimentLogger {
    record(entry: ExperimentRecord): void;
}

export interface ExecutionContext {
    taskId: string;
    kind: WorkKind;
    payload: Buffer;
    attempt: number;
    experiments?: ExperimentLogger;
}

export type Executor = (ctx: ExecutionContext) => Promise<ExecutionOutcome>;

export class ExecutorRegistry {
    private executors = new Map<WorkKind, Executor>();

    register(kind: WorkKind, fn: Executor): void {
        if (!isWorkKind(kind)) {
            throw new Error(`Unknown work kind "${String(kind)}"`);
        }
        if (this.executors.has(kind)) {
            throw new Error(`Executor for "${kind}" is already registered.`);
        }
        this.executors.set(kind, fn);
    }

    get(kind: WorkKind): Executor | undefined {
        return this.executors.get(kind);
    }

    has(kind: WorkKind): boolean {
        return this.executors.has(kind);
    }

    list(): WorkKind[] {
        return Array.from(this.executors.keys());
    }
}

export const globalRegistry = new ExecutorRegistry();

/**
 * Register the execution function for a work kind.
 *
 * @example
 * executor('rag-query', async ({ payload }) => {
 *   const answer = await rag.answer(payload.toString('utf-8'));
 *   return success({ answer });
 * });
 */
export function executor(kind: WorkKind, fn: Executor): void {
    globalRegistry.register(kind, fn);
}
