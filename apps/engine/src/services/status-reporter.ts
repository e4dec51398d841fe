import { TaskError, WorkKind, taskState } from '@taskline/sdk';
import { TaskRecord, TaskRegistry } from '../registry/task-registry';
import { NotFoundError } from '../errors/task.errors';

export type TaskStatus =
    | { status: 'not_found'; taskId: string }
    | { status: 'in_progress'; taskId: string; kind: WorkKind; state: taskState; attempts: number }
    | { status: 'succeeded'; taskId: string; kind: WorkKind; state: taskState.SUCCESS; result: unknown; attempts: number }
    | { status: 'failed'; taskId: string; kind: WorkKind; state: taskState.FAILURE; error: TaskError; attempts: number };

const UNKNOWN_ERROR: TaskError = { kind: 'unknown', message: 'Task failed without a recorded error' };

// Read-only view over the registry for polling clients.
export class StatusReporter {
    constructor(private readonly registry: TaskRegistry) { }

    async status(taskId: string): Promise<TaskStatus> {
        let record: TaskRecord;
        try {
            record = await this.registry.read(taskId);
        } catch (err) {
            if (err instanceof NotFoundError) return { status: 'not_found', taskId };
            throw err;
        }

        const { kind, attempts } = record;
        switch (record.state) {
            case taskState.SUCCESS:
                return { status: 'succeeded', taskId, kind, state: taskState.SUCCESS, result: record.result, attempts };
            case taskState.FAILURE:
                return { status: 'failed', taskId, kind, state: taskState.FAILURE, error: record.error ?? UNKNOWN_ERROR, attempts };
            default:
                return { status: 'in_progress', taskId, kind, state: record.state, attempts };
        }
    }
}
