import { IntervalHistogram, monitorEventLoopDelay } from 'perf_hooks';

const TAG = '[backpressure]';

export class EventLoopMonitor {
    private histogram: IntervalHistogram;

    constructor(resolutionMs: number = 10) {
        this.histogram = monitorEventLoopDelay({ resolution: resolutionMs });
        this.histogram.enable();
    }

    /** p99 event loop delay in milliseconds */
    get lag(): number {
        return this.histogram.percentile(99) / 1_000_000;
    }

    disable(): void {
        this.histogram.disable();
    }
}

// Workers stop dequeueing while the process is too busy to serve its leases.
export function createBackpressureCheck(monitor: { lag: number }, maxLagMs: number): () => boolean {
    return () => {
        const lag = monitor.lag;
        if (lag >= maxLagMs) {
            console.warn(`${TAG} event loop lag ${lag.toFixed(2)}ms >= ${maxLagMs}ms`);
            return true;
        }
        return false;
    };
}
