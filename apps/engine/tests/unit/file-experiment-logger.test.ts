import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { FileExperimentLogger } from '../../src/experiments/file-experiment-logger';

describe('FileExperimentLogger', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'taskline-experiments-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('appends one JSON line per record in call order', async () => {
        const file = path.join(dir, 'runs.jsonl');
        const logger = new FileExperimentLogger(file, () => new Date('2024-05-01T12:00:00.000Z'));

        logger.record({ taskId: 'a', kind: 'image-processing', inputSummary: { width: 640 }, durationMs: 120, outcome: 'success', metrics: { detections: 3 } });
        logger.record({ taskId: 'b', kind: 'rag-query', inputSummary: { chars: 42 }, durationMs: 900, outcome: 'failure' });
        await logger.flush();

        const lines = (await fs.readFile(file, 'utf-8')).trim().split('\n').map(l => JSON.parse(l));
        expect(lines).toEqual([
            { taskId: 'a', kind: 'image-processing', inputSummary: { width: 640 }, durationMs: 120, outcome: 'success', metrics: { detections: 3 }, recordedAt: '2024-05-01T12:00:00.000Z' },
            { taskId: 'b', kind: 'rag-query', inputSummary: { chars: 42 }, durationMs: 900, outcome: 'failure', recordedAt: '2024-05-01T12:00:00.000Z' },
        ]);
    });

    it('logs write failures without throwing to the caller', async () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const logger = new FileExperimentLogger(path.join(dir, 'missing', 'runs.jsonl'));

        expect(() => logger.record({ taskId: 'x', kind: 'rag-query', inputSummary: {}, durationMs: 1, outcome: 'success' })).not.toThrow();
        await logger.flush();

        expect(error).toHaveBeenCalledWith('[experiments] failed to write record for task x:', expect.any(Error));
        error.mockRestore();
    });
});
