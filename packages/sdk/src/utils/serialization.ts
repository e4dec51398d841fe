import superjson from 'superjson';

export const MAX_RESULT_SIZE = 1024 * 1024; // 1MB

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

export class PayloadTooLargeError extends SerializationError {
    constructor(public readonly size: number, public readonly limit: number) {
        super(`Payload size exceeds maximum limit of ${limit} bytes. Current size: ${size} bytes`);
        this.name = 'PayloadTooLargeError';
    }
}

export function serialize(value: unknown, maxBytes: number = MAX_RESULT_SIZE): string {
    if (value === undefined) return '';

    let stringified: string;
    try {
        stringified = superjson.stringify(value);
    } catch (err) {
        throw new SerializationError(`Failed to serialize data: ${err instanceof Error ? err.message : String(err)}`);
    }

    const size = Buffer.byteLength(stringified);
    if (size > maxBytes) {
        throw new PayloadTooLargeError(size, maxBytes);
    }
    return stringified;
}

export function deserialize<T>(value: string | null | undefined): T | undefined {
    if (!value || value.trim() === '') return undefined;

    try {
        return superjson.parse<T>(value);
    } catch (err) {
        throw new SerializationError(`Failed to deserialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}
