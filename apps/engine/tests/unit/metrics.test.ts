import http from 'http';
import { Registry } from 'prom-client';
import { PromTaskMetrics } from '../../src/metrics/task-metrics';
import { QueueDepthSampler } from '../../src/metrics/queue-depth-sampler';
import { startMetricsServer } from '../../src/metrics/server';
import { InMemoryJobQueue } from '../../src/queue/memory-job-queue';
import { makeEnvelope } from '../helpers/harness';

function get(port: number, urlPath: string): Promise<{ status: number; body: string }> {
    return new Promise((resolve, reject) => {
        http.get({ host: '127.0.0.1', port, path: urlPath }, (res) => {
            let body = '';
            res.setEncoding('utf-8');
            res.on('data', (chunk: string) => { body += chunk; });
            res.on('end', () => resolve({ status: res.statusCode ?? 0, body }));
        }).on('error', reject);
    });
}

describe('PromTaskMetrics', () => {
    it('counts transitions per work kind', async () => {
        const metrics = new PromTaskMetrics();
        metrics.submitted('rag-query');
        metrics.submitted('rag-query');
        metrics.submitted('image-processing');
        metrics.failed('image-processing', 1500);

        const submitted = await metrics.registry.getSingleMetricAsString('taskline_tasks_submitted_total');
        expect(submitted).toContain('taskline_tasks_submitted_total{kind="rag-query"} 2');
        expect(submitted).toContain('taskline_tasks_submitted_total{kind="image-processing"} 1');

        const duration = await metrics.registry.getSingleMetricAsString('taskline_task_duration_seconds');
        expect(duration).toContain('taskline_task_duration_seconds_sum{kind="image-processing",outcome="failure"} 1.5');
    });
});

describe('QueueDepthSampler', () => {
    it('publishes the queue depth as a gauge', async () => {
        const queue = new InMemoryJobQueue();
        const metrics = new PromTaskMetrics();
        await queue.enqueue(makeEnvelope({ taskId: 'a' }));
        await queue.enqueue(makeEnvelope({ taskId: 'b' }), 60_000);

        const sampler = new QueueDepthSampler(queue, metrics, 60_000);
        expect(await sampler.sample()).toBe(2);
        expect(await metrics.registry.getSingleMetricAsString('taskline_queue_depth')).toContain('taskline_queue_depth 2');
    });

    it('returns null when the queue cannot be reached', async () => {
        const queue = new InMemoryJobQueue();
        jest.spyOn(queue, 'depth').mockRejectedValue(new Error('redis down'));
        const sampler = new QueueDepthSampler(queue, new PromTaskMetrics(), 60_000);

        expect(await sampler.sample()).toBeNull();
    });
});

describe('startMetricsServer', () => {
    let server: http.Server;

    afterEach(async () => {
        await new Promise<void>((resolve) => server.close(() => resolve()));
    });

    it('serves the registry in Prometheus text format', async () => {
        const registry = new Registry();
        const metrics = new PromTaskMetrics(registry);
        metrics.started('rag-query');
        server = await startMetricsServer(registry, 0);
        const address = server.address();
        if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
        const { port } = address;

        const res = await get(port, '/metrics');
        expect(res.status).toBe(200);
        expect(res.body).toContain('taskline_tasks_started_total{kind="rag-query"} 1');

        expect((await get(port, '/other')).status).toBe(404);
    });
});
