import * as grpc from '@grpc/grpc-js';
import { ServerUnaryCall, sendUnaryData } from '@grpc/grpc-js';
import { TaskError, serialize, taskState } from '@taskline/sdk';
import { SubmissionGateway } from '../services/submission-gateway';
import { StatusReporter } from '../services/status-reporter';
import { QueueUnavailableError, ValidationError } from '../errors/task.errors';

export interface SubmitTaskRequest {
    kind: string;
    payload: Buffer;
}

export interface SubmitTaskResponse {
    task_id: string;
}

export interface GetTaskStatusRequest {
    task_id: string;
}

export type ProtoTaskState = 'TASK_STATE_UNSPECIFIED' | 'PENDING' | 'STARTED' | 'RETRY' | 'SUCCESS' | 'FAILURE';

export interface GetTaskStatusResponse {
    task_id: string;
    kind: string;
    state: ProtoTaskState;
    result: Buffer;
    error: TaskError | null;
    attempts: number;
}

const STATE_MAP: Record<taskState, ProtoTaskState> = {
    [taskState.PENDING]: 'PENDING',
    [taskState.STARTED]: 'STARTED',
    [taskState.RETRY]: 'RETRY',
    [taskState.SUCCESS]: 'SUCCESS',
    [taskState.FAILURE]: 'FAILURE',
};

// cleanup is emitted by the beat only
const CLIENT_KINDS = new Set(['image-processing', 'rag-query']);

/**
 * gRPC handlers for task submission and status polling.
 */
export class TaskServiceImpl {
    constructor(
        private readonly gateway: SubmissionGateway,
        private readonly reporter: StatusReporter,
    ) { }

    /**
     * Returns INVALID_ARGUMENT for rejected input, UNAVAILABLE when the queue
     * could not take the job (nothing is left behind in that case).
     */
    async submitTask(
        call: ServerUnaryCall<SubmitTaskRequest, SubmitTaskResponse>,
        callback: sendUnaryData<SubmitTaskResponse>
    ): Promise<void> {
        const { kind, payload } = call.request;
        if (!CLIENT_KINDS.has(kind)) {
            callback({ code: grpc.status.INVALID_ARGUMENT, message: `Kind "${kind}" cannot be submitted by clients` });
            return;
        }

        try {
            const { taskId } = await this.gateway.submit({ kind, payload });
            callback(null, { task_id: taskId });
        } catch (error) {
            if (error instanceof ValidationError) {
                callback({ code: grpc.status.INVALID_ARGUMENT, message: error.message });
                return;
            }
            if (error instanceof QueueUnavailableError) {
                callback({ code: grpc.status.UNAVAILABLE, message: error.message });
                return;
            }
            console.error('[TaskService] submitTask error:', error);
            callback({
                code: grpc.status.INTERNAL,
                message: error instanceof Error ? error.message : 'Unknown error',
            });
        }
    }

    async getTaskStatus(
        call: ServerUnaryCall<GetTaskStatusRequest, GetTaskStatusResponse>,
        callback: sendUnaryData<GetTaskStatusResponse>
    ): Promise<void> {
        const { task_id } = call.request;

        try {
            const status = await this.reporter.status(task_id);

            if (status.status === 'not_found') {
                callback({ code: grpc.status.NOT_FOUND, message: `Task ${task_id} not found` });
                return;
            }

            callback(null, {
                task_id,
                kind: status.kind,
                state: STATE_MAP[status.state],
                result: status.status === 'succeeded' ? Buffer.from(serialize(status.result)) : Buffer.alloc(0),
                error: status.status === 'failed' ? status.error : null,
                attempts: status.attempts,
            });
        } catch (error) {
            console.error('[TaskService] getTaskStatus error:', error);
            callback({
                code: grpc.status.INTERNAL,
                message: error instanceof Error ? error.message : 'Unknown error',
            });
        }
    }
}
