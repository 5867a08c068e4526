/**
 * errors.ts - Error taxonomy for the room server
 *
 * Each class maps to one recovery policy:
 * - ValidationError: drop the event, reply to the sender only
 * - AuthError: reject the join and close the connection
 * - TransportError: treat the session as disconnected
 * - NotFoundError: report "not found" to the caller (HTTP 404)
 * - PersistenceError: fall back to a fresh room on load, retry on save
 */

export class ValidationError extends Error {
    constructor(
        message: string,
        public readonly eventType?: string
    ) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class AuthError extends Error {
    constructor(message = 'Invalid room password') {
        super(message);
        this.name = 'AuthError';
    }
}

export class TransportError extends Error {
    constructor(
        message: string,
        public readonly connectionId: string
    ) {
        super(message);
        this.name = 'TransportError';
    }
}

export class NotFoundError extends Error {
    constructor(
        public readonly resource: string,
        public readonly id: string
    ) {
        super(`${resource} not found: ${id}`);
        this.name = 'NotFoundError';
    }
}

export class PersistenceError extends Error {
    constructor(
        message: string,
        public readonly roomId?: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'PersistenceError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
