import { WorkKind, taskState } from '@taskline/sdk';
import { TaskRecord, TaskRegistry, TaskUpdate } from '../registry/task-registry';
import { canTransition, isTerminal } from '../registry/state-machine';
import { DuplicateTaskIdError, InvalidTransitionError, NotFoundError, StaleAttemptError } from '../errors/task.errors';
import { KeyedMutex } from '../utils/keyed-mutex';

// In-process registry for tests and STORE_BACKEND=memory. Same contract as TaskRepository.
export class InMemoryTaskRepository implements TaskRegistry {
    private records = new Map<string, TaskRecord>();
    private readonly locks = new KeyedMutex();

    constructor(private readonly now: () => Date = () => new Date()) { }

    async create(taskId: string, kind: WorkKind): Promise<TaskRecord> {
        return this.locks.run(taskId, async () => {
            if (this.records.has(taskId)) {
                throw new DuplicateTaskIdError(taskId);
            }
            const at = this.now();
            const record: TaskRecord = {
                taskId,
                kind,
                state: taskState.PENDING,
                attempts: 0,
                createdAt: at,
                updatedAt: at,
            };
            this.records.set(taskId, record);
            return { ...record };
        });
    }

    async read(taskId: string): Promise<TaskRecord> {
        const record = this.records.get(taskId);
        if (!record) throw new NotFoundError(taskId);
        return { ...record };
    }

    async update(taskId: string, update: TaskUpdate): Promise<TaskRecord> {
        return this.locks.run(taskId, async () => {
            const current = this.records.get(taskId);
            if (!current) throw new NotFoundError(taskId);
            if (update.expectedAttempts !== undefined && update.expectedAttempts !== current.attempts) {
                throw new StaleAttemptError(taskId, update.expectedAttempts, current.attempts);
            }
            if (!canTransition(current.state, update.state)) {
                throw new InvalidTransitionError(taskId, current.state, update.state);
            }

            const { result, error, ...rest } = current;
            const next: TaskRecord = {
                ...rest,
                state: update.state,
                attempts: update.state === taskState.STARTED ? current.attempts + 1 : current.attempts,
                updatedAt: this.now(),
            };
            // A record carries a result or an error, never both.
            const nextResult = update.state === taskState.FAILURE ? undefined
                : update.result !== undefined ? update.result : result;
            const nextError = update.state === taskState.SUCCESS ? undefined : update.error ?? error;
            if (nextResult !== undefined) next.result = nextResult;
            if (nextError !== undefined) next.error = nextError;

            this.records.set(taskId, next);
            return { ...next };
        });
    }

    async delete(taskId: string): Promise<boolean> {
        return this.locks.run(taskId, async () => this.records.delete(taskId));
    }

    async listTerminalBefore(cutoff: Date, limit: number): Promise<TaskRecord[]> {
        return Array.from(this.records.values())
            .filter(r => isTerminal(r.state) && r.updatedAt.getTime() < cutoff.getTime())
            .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime())
            .slice(0, limit)
            .map(r => ({ ...r }));
    }

    async existing(taskIds: string[]): Promise<Set<string>> {
        return new Set(taskIds.filter(id => this.records.has(id)));
    }

    async ping(): Promise<void> { }

    get size(): number {
        return this.records.size;
    }
}
