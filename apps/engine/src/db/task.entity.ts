import { TaskError, WorkKind, deserialize, taskState } from '@taskline/sdk';
import { TaskRecord } from '../registry/task-registry';

/**
 * Row shape of the task_records table (see schema.sql).
 * `result` holds the superjson-encoded execution result.
 */
export interface TaskEntity {
    id: string;
    kind: WorkKind;
    state: taskState;
    result: string | null;
    error: TaskError | null;
    attempts: number;
    created_at: Date;
    updated_at: Date;
}

export function toTaskRecord(row: TaskEntity): TaskRecord {
    const record: TaskRecord = {
        taskId: row.id,
        kind: row.kind,
        state: row.state,
        attempts: row.attempts,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    };
    if (row.result !== null) record.result = deserialize(row.result);
    if (row.error !== null) record.error = row.error;
    return record;
}
