import path from 'path';
import { ExecutorRegistry } from '@taskline/sdk';

const TAG = '[executors]';

/**
 * Loads executor modules listed in TASKLINE_EXECUTORS. Each module registers
 * its executors through `executor()` from @taskline/sdk when it is required.
 */
export function loadExecutorModules(modulePaths: string[], registry: ExecutorRegistry): void {
    if (modulePaths.length === 0) {
        console.warn(`${TAG} TASKLINE_EXECUTORS is not set; only built-in executors are available`);
    }

    for (const p of modulePaths) {
        // Resolve relative to process.cwd(), not this file
        const resolved = path.isAbsolute(p) ? p : path.resolve(process.cwd(), p);
        // eslint-disable-next-line @typescript-eslint/no-require-imports
        require(resolved);
        console.log(`${TAG} loaded ${resolved}`);
    }

    console.log(`${TAG} registered: [${registry.list().join(', ')}]`);
}
