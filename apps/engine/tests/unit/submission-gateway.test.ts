import { taskState } from '@taskline/sdk';
import { InMemoryTaskRepository } from '../../src/repositories/memory-task.repository';
import { InMemoryJobQueue } from '../../src/queue/memory-job-queue';
import { InMemoryPayloadStore } from '../../src/storage/payload-store';
import { SubmissionGateway } from '../../src/services/submission-gateway';
import { QueueUnavailableError, ValidationError } from '../../src/errors/task.errors';

describe('SubmissionGateway', () => {
    let registry: InMemoryTaskRepository;
    let queue: InMemoryJobQueue;
    let payloads: InMemoryPayloadStore;
    let gateway: SubmissionGateway;

    const limits = { maxPayloadBytes: 4096, inlinePayloadBytes: 1024 };

    beforeEach(() => {
        registry = new InMemoryTaskRepository();
        queue = new InMemoryJobQueue();
        payloads = new InMemoryPayloadStore();
        gateway = new SubmissionGateway(registry, queue, payloads, limits);
    });

    it('creates a PENDING record and enqueues an inline envelope', async () => {
        const { taskId } = await gateway.submit({ kind: 'rag-query', payload: Buffer.from('who is the author?') });

        const record = await registry.read(taskId);
        expect(record.state).toBe(taskState.PENDING);
        expect(record.kind).toBe('rag-query');

        const lease = await queue.dequeue();
        expect(lease?.envelope).toEqual({
            taskId,
            kind: 'rag-query',
            payload: { type: 'inline', data: Buffer.from('who is the author?').toString('base64') },
            submittedAt: expect.any(String),
            retryCount: 0,
        });
    });

    it('spills payloads above the inline limit to the payload store', async () => {
        const image = Buffer.alloc(2048, 7);
        const { taskId } = await gateway.submit({ kind: 'image-processing', payload: image });

        const lease = await queue.dequeue();
        expect(lease?.envelope.payload).toEqual({ type: 'stored', key: taskId });
        expect((await payloads.get(taskId)).equals(image)).toBe(true);
    });

    it('accepts a payload exactly at the size ceiling', async () => {
        await expect(gateway.submit({ kind: 'image-processing', payload: Buffer.alloc(4096, 1) }))
            .resolves.toEqual({ taskId: expect.any(String) });
    });

    it.each([
        ['an unknown kind', { kind: 'video-processing', payload: Buffer.from('x') }, 'kind'],
        ['an empty payload', { kind: 'rag-query', payload: Buffer.alloc(0) }, 'payload'],
        ['an oversized payload', { kind: 'image-processing', payload: Buffer.alloc(4097) }, 'payload'],
    ])('rejects %s without touching the stores', async (_label, request, field) => {
        const createSpy = jest.spyOn(registry, 'create');
        const enqueueSpy = jest.spyOn(queue, 'enqueue');

        const error = await gateway.submit(request).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(ValidationError);
        expect(error).toHaveProperty('field', field);
        expect(createSpy).not.toHaveBeenCalled();
        expect(enqueueSpy).not.toHaveBeenCalled();
        expect(registry.size).toBe(0);
        expect(await queue.depth()).toBe(0);
    });

    it('rolls back the record and stored payload when the queue is down', async () => {
        jest.spyOn(queue, 'enqueue').mockRejectedValue(new Error('ECONNREFUSED'));

        const error = await gateway
            .submit({ kind: 'image-processing', payload: Buffer.alloc(2048, 1) })
            .catch((err: unknown) => err);

        expect(error).toBeInstanceOf(QueueUnavailableError);
        expect(registry.size).toBe(0);
        expect(await payloads.list()).toEqual([]);
    });

    it('rolls back the record when the payload cannot be stored', async () => {
        jest.spyOn(payloads, 'put').mockRejectedValue(new Error('disk full'));

        await expect(gateway.submit({ kind: 'image-processing', payload: Buffer.alloc(2048, 1) }))
            .rejects.toThrow('disk full');
        expect(registry.size).toBe(0);
        expect(await queue.depth()).toBe(0);
    });

    it('hands out distinct ids to concurrent submissions', async () => {
        const submissions = await Promise.all(
            Array.from({ length: 50 }, (_, i) => gateway.submit({ kind: 'rag-query', payload: Buffer.from(`q${i}`) })),
        );

        const ids = new Set(submissions.map(s => s.taskId));
        expect(ids.size).toBe(50);
        expect(registry.size).toBe(50);
        expect(await queue.depth()).toBe(50);
    });

    it('surfaces a duplicate id from the id factory', async () => {
        const fixed = new SubmissionGateway(registry, queue, payloads, limits, undefined, () => 'same-id');
        await fixed.submit({ kind: 'rag-query', payload: Buffer.from('a') });

        await expect(fixed.submit({ kind: 'rag-query', payload: Buffer.from('b') }))
            .rejects.toThrow('Task same-id already exists');
        expect(await queue.depth()).toBe(1);
    });
});
