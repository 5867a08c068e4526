import { TransportError } from '../server/errors';
import { createNoOpLogger } from '../server/logger';
import { InMemoryPersistence } from '../server/persistence';
import type { PersistenceGateway } from '../server/persistence';
import type { ServerMessage, ServerMessageType } from '../server/protocol';
import { RoomManager } from '../server/rooms';
import type { JoinResult } from '../server/rooms';
import { SaveQueue } from '../server/saveQueue';
import { Session } from '../server/session';
import type { SessionTransport } from '../server/session';

/**
 * In-process stand-in for a socket: records what it was sent.
 */
export class FakeTransport implements SessionTransport {
    readonly sent: ServerMessage[] = [];
    closed = false;
    closeReason: string | null = null;
    failing = false;

    constructor(private readonly connectionId: string) {}

    send(message: ServerMessage): void {
        if (this.failing || this.closed) {
            throw new TransportError('Socket is not connected', this.connectionId);
        }
        this.sent.push(message);
    }

    close(reason: string): void {
        this.closed = true;
        this.closeReason = reason;
    }

    ofType<T extends ServerMessageType>(type: T): Extract<ServerMessage, { type: T }>[] {
        return this.sent.filter((message): message is Extract<ServerMessage, { type: T }> => message.type === type);
    }

    types(): ServerMessageType[] {
        return this.sent.map(message => message.type);
    }

    clear(): void {
        this.sent.length = 0;
    }
}

export type TestHarness = {
    manager: RoomManager;
    gateway: PersistenceGateway;
    saveQueue: SaveQueue;
};

export function createHarness(options: {
    gateway?: PersistenceGateway;
    clock?: () => number;
    roomIdleTtlMs?: number;
    maxAttempts?: number;
} = {}): TestHarness {
    const gateway = options.gateway ?? new InMemoryPersistence();
    const saveQueue = new SaveQueue(gateway, createNoOpLogger(), {
        maxAttempts: options.maxAttempts ?? 3,
        retryBaseMs: 0,
        sleep: () => Promise.resolve()
    });
    const manager = new RoomManager({
        gateway,
        saveQueue,
        logger: createNoOpLogger(),
        clock: options.clock,
        roomIdleTtlMs: options.roomIdleTtlMs
    });
    return { manager, gateway, saveQueue };
}

export type Connected = {
    session: Session;
    transport: FakeTransport;
    result: JoinResult;
};

let connectionCounter = 0;

/**
 * Run a connection through the handshake and join, like the socket adapter does.
 */
export async function connect(
    manager: RoomManager,
    roomId: string,
    userId: string,
    options: { nickname?: string; password?: string } = {}
): Promise<Connected> {
    const connectionId = `conn-${++connectionCounter}`;
    const transport = new FakeTransport(connectionId);
    const session = new Session({
        userId,
        connectionId,
        nickname: options.nickname ?? userId,
        roomId,
        transport
    });
    session.transition('authenticating');
    const result = await manager.join(session, options.password);
    return { session, transport, result };
}

export function strokeEvent(id: string, layerId = 'layer_0', extra: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        type: 'stroke',
        id,
        points: [{ x: 10, y: 20 }, { x: 30, y: 40 }],
        color: '#FF0000',
        size: 5,
        layerId,
        ...extra
    };
}
