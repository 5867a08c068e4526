/**
 * session.ts - One connected client
 *
 * Lifecycle:
 *   connecting → authenticating → joined → disconnected
 *
 * `disconnected` is terminal and reachable from every other state.
 * The transport is injected so the registry never sees Socket.IO types.
 */

import type { ServerMessage } from './protocol';

export type SessionStatus = 'connecting' | 'authenticating' | 'joined' | 'disconnected';

/**
 * Send primitive for one connection. `send` throws TransportError when
 * the connection can no longer deliver.
 */
export interface SessionTransport {
    send(message: ServerMessage): void;
    close(reason: string): void;
}

const ALLOWED_TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
    connecting: ['authenticating', 'disconnected'],
    authenticating: ['joined', 'disconnected'],
    joined: ['disconnected'],
    disconnected: []
};

export type SessionInit = {
    userId: string;
    connectionId: string;
    nickname: string;
    roomId: string;
    transport: SessionTransport;
};

/**
 * Public view of a session, as listed in `users` arrays.
 */
export type UserSummary = {
    id: string;
    nickname: string;
    color: string;
};

export class Session {
    readonly userId: string;
    readonly connectionId: string;
    readonly nickname: string;
    readonly roomId: string;
    readonly transport: SessionTransport;
    color = '';
    private state: SessionStatus = 'connecting';

    constructor(init: SessionInit) {
        this.userId = init.userId;
        this.connectionId = init.connectionId;
        this.nickname = init.nickname;
        this.roomId = init.roomId;
        this.transport = init.transport;
    }

    get status(): SessionStatus {
        return this.state;
    }

    get isJoined(): boolean {
        return this.state === 'joined';
    }

    /**
     * Move to `next`. Returns false (and stays put) for a transition the
     * lifecycle does not allow, e.g. leaving twice.
     */
    transition(next: SessionStatus): boolean {
        if (!ALLOWED_TRANSITIONS[this.state].includes(next)) {
            return false;
        }
        this.state = next;
        return true;
    }

    send(message: ServerMessage): void {
        this.transport.send(message);
    }

    toSummary(): UserSummary {
        return { id: this.userId, nickname: this.nickname, color: this.color };
    }
}
