import { TaskError, WorkKind, taskState } from '@taskline/sdk';

export interface TaskRecord {
    taskId: string;
    kind: WorkKind;
    state: taskState;
    result?: unknown;
    error?: TaskError;
    attempts: number;
    createdAt: Date;
    updatedAt: Date;
}

export interface TaskUpdate {
    state: taskState;
    result?: unknown;
    error?: TaskError;
    /**
     * Compare-and-set guard: the write only applies while the record is still
     * at this attempt count.
     */
    expectedAttempts?: number;
}

/**
 * Keyed store of task records. Implementations serialize writes per task id
 * and reject updates that leave a terminal state.
 */
export interface TaskRegistry {
    /** @throws DuplicateTaskIdError */
    create(taskId: string, kind: WorkKind): Promise<TaskRecord>;
    /** @throws NotFoundError */
    read(taskId: string): Promise<TaskRecord>;
    /**
     * Moving to STARTED increments `attempts`. SUCCESS clears any earlier
     * error and FAILURE clears any result.
     * @throws NotFoundError, StaleAttemptError, InvalidTransitionError
     */
    update(taskId: string, update: TaskUpdate): Promise<TaskRecord>;
    /** Returns false when the record did not exist. */
    delete(taskId: string): Promise<boolean>;
    /** Terminal records last updated before `cutoff`, oldest first. */
    listTerminalBefore(cutoff: Date, limit: number): Promise<TaskRecord[]>;
    /** The subset of `taskIds` that still have a record. */
    existing(taskIds: string[]): Promise<Set<string>>;
    ping(): Promise<void>;
}
