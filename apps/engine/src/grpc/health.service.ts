import { ServerUnaryCall, ServerWritableStream, sendUnaryData } from '@grpc/grpc-js';

export interface HealthCheckRequest {
    service: string;
}

export interface HealthCheckResponse {
    status: 'UNKNOWN' | 'SERVING' | 'NOT_SERVING' | 'SERVICE_UNKNOWN';
}

export interface Pingable {
    ping(): Promise<void>;
}

/**
 * Standard gRPC health check. SERVING only when the registry and the queue
 * both answer.
 */
export class HealthService {
    constructor(private readonly dependencies: Pingable[]) { }

    async check(
        call: ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>,
        callback: sendUnaryData<HealthCheckResponse>
    ): Promise<void> {
        callback(null, { status: await this.currentStatus() });
    }

    async watch(call: ServerWritableStream<HealthCheckRequest, HealthCheckResponse>): Promise<void> {
        call.write({ status: await this.currentStatus() });
        call.end();
    }

    private async currentStatus(): Promise<HealthCheckResponse['status']> {
        try {
            await Promise.all(this.dependencies.map(d => d.ping()));
            return 'SERVING';
        } catch (error) {
            console.error('[health] check failed:', error);
            return 'NOT_SERVING';
        }
    }
}
