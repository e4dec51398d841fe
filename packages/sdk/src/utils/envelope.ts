import { JobEnvelope, PayloadRef, isWorkKind } from '../types';
import { SerializationError } from './serialization';

export function encodeEnvelope(envelope: JobEnvelope): string {
    return JSON.stringify(envelope);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodePayloadRef(value: unknown): PayloadRef {
    if (isRecord(value)) {
        if (value.type === 'inline' && typeof value.data === 'string') {
            return { type: 'inline', data: value.data };
        }
        if (value.type === 'stored' && typeof value.key === 'string') {
            return { type: 'stored', key: value.key };
        }
    }
    throw new SerializationError('Malformed envelope: invalid payload reference');
}

export function decodeEnvelope(raw: string): JobEnvelope {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (err) {
        throw new SerializationError(`Malformed envelope: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (!isRecord(parsed)) {
        throw new SerializationError('Malformed envelope: expected an object');
    }
    const { taskId, kind, payload, submittedAt, retryCount } = parsed;
    if (typeof taskId !== 'string' || taskId.length === 0) {
        throw new SerializationError('Malformed envelope: missing taskId');
    }
    if (!isWorkKind(kind)) {
        throw new SerializationError(`Malformed envelope: unknown kind ${JSON.stringify(kind)}`);
    }
    if (typeof submittedAt !== 'string') {
        throw new SerializationError('Malformed envelope: missing submittedAt');
    }
    if (typeof retryCount !== 'number' || !Number.isInteger(retryCount) || retryCount < 0) {
        throw new SerializationError('Malformed envelope: invalid retryCount');
    }

    return { taskId, kind, payload: decodePayloadRef(payload), submittedAt, retryCount };
}

export function inlinePayload(bytes: Buffer): PayloadRef {
    return { type: 'inline', data: bytes.toString('base64') };
}
