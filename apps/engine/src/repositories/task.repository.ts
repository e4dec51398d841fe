import { Pool } from "pg";
import { validate as isUuid } from "uuid";
import { WorkKind, serialize, taskState } from "@taskline/sdk";
import { TaskEntity, toTaskRecord } from "../db/task.entity";
import { TransactionManager } from "../db/transaction.manager";
import { TaskRecord, TaskRegistry, TaskUpdate } from "../registry/task-registry";
import { canTransition } from "../registry/state-machine";
import { DuplicateTaskIdError, InvalidTransitionError, NotFoundError, StaleAttemptError } from "../errors/task.errors";

const UNIQUE_VIOLATION = "23505";

function isUniqueViolation(err: unknown): boolean {
    return err instanceof Error && "code" in err && err.code === UNIQUE_VIOLATION;
}

export class TaskRepository implements TaskRegistry {
    private readonly tx: TransactionManager;

    constructor(private pool: Pool) {
        this.tx = new TransactionManager(pool);
    }

    async create(taskId: string, kind: WorkKind): Promise<TaskRecord> {
        try {
            const res = await this.pool.query<TaskEntity>(
                'INSERT INTO task_records (id, kind, state) VALUES ($1, $2, $3) RETURNING *',
                [taskId, kind, taskState.PENDING]
            );
            return toTaskRecord(res.rows[0]);
        } catch (err) {
            if (isUniqueViolation(err)) throw new DuplicateTaskIdError(taskId);
            throw err;
        }
    }

    async read(taskId: string): Promise<TaskRecord> {
        // ids are uuid columns; anything else can't exist
        if (!isUuid(taskId)) throw new NotFoundError(taskId);
        const res = await this.pool.query<TaskEntity>('SELECT * FROM task_records WHERE id = $1', [taskId]);
        const row = res.rows[0];
        if (!row) throw new NotFoundError(taskId);
        return toTaskRecord(row);
    }

    // Row lock serializes concurrent writers on the same task id.
    async update(taskId: string, update: TaskUpdate): Promise<TaskRecord> {
        if (!isUuid(taskId)) throw new NotFoundError(taskId);
        return this.tx.run(async (client) => {
            const locked = await client.query<TaskEntity>(
                'SELECT * FROM task_records WHERE id = $1 FOR UPDATE',
                [taskId]
            );
            const current = locked.rows[0];
            if (!current) throw new NotFoundError(taskId);
            if (update.expectedAttempts !== undefined && update.expectedAttempts !== current.attempts) {
                throw new StaleAttemptError(taskId, update.expectedAttempts, current.attempts);
            }
            if (!canTransition(current.state, update.state)) {
                throw new InvalidTransitionError(taskId, current.state, update.state);
            }

            // SUCCESS drops the last retry error, FAILURE drops any result
            let result = current.result;
            if (update.state === taskState.FAILURE) result = null;
            else if (update.result !== undefined) result = serialize(update.result);

            let error = current.error;
            if (update.state === taskState.SUCCESS) error = null;
            else if (update.error !== undefined) error = update.error;

            const res = await client.query<TaskEntity>(
                `UPDATE task_records
                 SET
                     state = $1,
                     result = $2,
                     error = $3::jsonb,
                     attempts = $4,
                     updated_at = NOW()
                 WHERE id = $5
                 RETURNING *`,
                [
                    update.state,
                    result,
                    error === null ? null : JSON.stringify(error),
                    update.state === taskState.STARTED ? current.attempts + 1 : current.attempts,
                    taskId,
                ]
            );
            return toTaskRecord(res.rows[0]);
        });
    }

    async delete(taskId: string): Promise<boolean> {
        if (!isUuid(taskId)) return false;
        const res = await this.pool.query('DELETE FROM task_records WHERE id = $1', [taskId]);
        return (res.rowCount ?? 0) > 0;
    }

    async listTerminalBefore(cutoff: Date, limit: number): Promise<TaskRecord[]> {
        const res = await this.pool.query<TaskEntity>(
            `SELECT * FROM task_records
             WHERE state IN ($1, $2) AND updated_at < $3
             ORDER BY updated_at ASC
             LIMIT $4`,
            [taskState.SUCCESS, taskState.FAILURE, cutoff, limit]
        );
        return res.rows.map(toTaskRecord);
    }

    async existing(taskIds: string[]): Promise<Set<string>> {
        const ids = taskIds.filter(id => isUuid(id));
        if (ids.length === 0) return new Set();
        const placeholders = ids.map((_, i) => `$${i + 1}`).join(', ');
        const res = await this.pool.query<Pick<TaskEntity, "id">>(
            `SELECT id FROM task_records WHERE id IN (${placeholders})`,
            ids
        );
        return new Set(res.rows.map(row => row.id));
    }

    async ping(): Promise<void> {
        await this.pool.query('SELECT 1');
    }
}
