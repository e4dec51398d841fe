import { v4 as uuid } from 'uuid';
import { JobEnvelope, PayloadRef, WorkKind, inlinePayload, isWorkKind } from '@taskline/sdk';
import { TaskRegistry } from '../registry/task-registry';
import { JobQueue } from '../queue/job-queue';
import { PayloadStore } from '../storage/payload-store';
import { TaskMetrics } from '../metrics/task-metrics';
import { QueueUnavailableError, ValidationError } from '../errors/task.errors';

const TAG = '[gateway]';

export interface SubmitRequest {
    kind: string;
    payload: Buffer;
}

export interface SubmitResponse {
    taskId: string;
}

export interface GatewayLimits {
    maxPayloadBytes: number;
    inlinePayloadBytes: number;
}

export class SubmissionGateway {
    constructor(
        private readonly registry: TaskRegistry,
        private readonly queue: JobQueue,
        private readonly payloads: PayloadStore,
        private readonly limits: GatewayLimits,
        private readonly metrics?: TaskMetrics,
        private readonly newTaskId: () => string = uuid,
    ) { }

    /**
     * Registers a PENDING record, enqueues the envelope and returns the task id
     * without waiting for execution.
     *
     * @throws ValidationError before touching the registry or the queue
     * @throws QueueUnavailableError after removing the record it created
     */
    async submit(request: SubmitRequest): Promise<SubmitResponse> {
        const kind = this.validate(request);
        const taskId = this.newTaskId();

        await this.registry.create(taskId, kind);

        let payload: PayloadRef;
        try {
            payload = await this.storePayload(taskId, request.payload);
        } catch (err) {
            await this.compensate(taskId, null);
            throw err;
        }

        const envelope: JobEnvelope = {
            taskId,
            kind,
            payload,
            submittedAt: new Date().toISOString(),
            retryCount: 0,
        };

        try {
            await this.queue.enqueue(envelope);
        } catch (err) {
            console.error(`${TAG} enqueue failed for task ${taskId}, rolling back:`, err);
            await this.compensate(taskId, payload);
            throw new QueueUnavailableError(taskId, err);
        }

        this.metrics?.submitted(kind);
        console.log(`${TAG} submitted task ${taskId} (${kind}, ${request.payload.length} bytes)`);
        return { taskId };
    }

    private validate(request: SubmitRequest): WorkKind {
        if (!isWorkKind(request.kind)) {
            throw new ValidationError(`Unknown work kind "${request.kind}"`, 'kind');
        }
        if (!Buffer.isBuffer(request.payload) || request.payload.length === 0) {
            throw new ValidationError('Payload cannot be empty', 'payload');
        }
        if (request.payload.length > this.limits.maxPayloadBytes) {
            throw new ValidationError(
                `Payload of ${request.payload.length} bytes exceeds the ${this.limits.maxPayloadBytes} byte limit`,
                'payload',
            );
        }
        return request.kind;
    }

    private async storePayload(taskId: string, bytes: Buffer): Promise<PayloadRef> {
        if (bytes.length <= this.limits.inlinePayloadBytes) {
            return inlinePayload(bytes);
        }
        await this.payloads.put(taskId, bytes);
        return { type: 'stored', key: taskId };
    }

    // Not transactional: a crash between create and this call leaves a PENDING
    // record that only disappears once someone deletes it by hand.
    private async compensate(taskId: string, payload: PayloadRef | null): Promise<void> {
        try {
            await this.registry.delete(taskId);
            if (payload?.type === 'stored') {
                await this.payloads.delete(payload.key);
            }
        } catch (err) {
            console.error(`${TAG} compensation failed for task ${taskId}:`, err);
        }
    }
}
