import { taskState } from '@taskline/sdk';

export class ValidationError extends Error {
    constructor(message: string, public readonly field?: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class QueueUnavailableError extends Error {
    constructor(public readonly taskId: string, public readonly reason: unknown) {
        super(`Queue unavailable, task ${taskId} was not submitted`);
        this.name = 'QueueUnavailableError';
    }
}

export class DuplicateTaskIdError extends Error {
    constructor(public readonly taskId: string) {
        super(`Task ${taskId} already exists`);
        this.name = 'DuplicateTaskIdError';
    }
}

export class NotFoundError extends Error {
    constructor(public readonly taskId: string) {
        super(`Task ${taskId} not found`);
        this.name = 'NotFoundError';
    }
}

export class InvalidTransitionError extends Error {
    constructor(
        public readonly taskId: string,
        public readonly from: taskState,
        public readonly to: taskState,
    ) {
        super(`Task ${taskId}: invalid transition ${from} -> ${to}`);
        this.name = 'InvalidTransitionError';
    }
}

export class StaleAttemptError extends Error {
    constructor(
        public readonly taskId: string,
        public readonly expectedAttempts: number,
        public readonly actualAttempts: number,
    ) {
        super(`Task ${taskId}: write from attempt ${expectedAttempts} rejected, record is at attempt ${actualAttempts}`);
        this.name = 'StaleAttemptError';
    }
}

export class LeaseExpiredError extends Error {
    constructor(public readonly leaseId: string) {
        super(`Lease ${leaseId} expired or unknown`);
        this.name = 'LeaseExpiredError';
    }
}
