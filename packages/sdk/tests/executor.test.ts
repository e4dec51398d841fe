import { ExecutorRegistry } from '../src/executor';
import { success } from '../src/outcome';
import { isWorkKind } from '../src/types';

describe('ExecutorRegistry', () => {
    test('should register and look up executors by kind', () => {
        const registry = new ExecutorRegistry();
        const fn = async () => success('ok');
        registry.register('rag-query', fn);

        expect(registry.get('rag-query')).toBe(fn);
        expect(registry.has('image-processing')).toBe(false);
        expect(registry.list()).toEqual(['rag-query']);
    });

    test('should refuse a second executor for the same kind', () => {
        const registry = new ExecutorRegistry();
        registry.register('cleanup', async () => success(null));

        expect(() => registry.register('cleanup', async () => success(null)))
            .toThrow('Executor for "cleanup" is already registered.');
    });

    test('should only accept known work kinds', () => {
        expect(isWorkKind('image-processing')).toBe(true);
        expect(isWorkKind('video')).toBe(false);
        expect(isWorkKind(undefined)).toBe(false);
    });
});
