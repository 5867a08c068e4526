/**
 * socketHandlers.ts - Socket.IO transport adapter
 *
 * RESPONSIBILITY: turn one Socket.IO connection into a Session
 * - Every room is its own namespace: /room/<roomId>
 * - Handshake query carries userId, nickname and password
 *   (the password may also come in `auth`, which keeps it out of URLs)
 * - `message` events go to RoomManager.handle, in arrival order
 * - `disconnect` goes to RoomManager.leave
 *
 * No room logic lives here.
 */

import type { Server, Socket } from 'socket.io';
import { v4 as uuidv4 } from 'uuid';
import { TransportError, errorMessage } from './errors';
import type { Logger } from './logger';
import { SOCKET_EVENT } from './protocol';
import type { ServerMessage } from './protocol';
import type { RoomManager } from './rooms';
import { Session } from './session';
import type { SessionTransport } from './session';

export const ROOM_NAMESPACE = /^\/room\/[^/]+$/;
const NAMESPACE_PREFIX = '/room/';
const DEFAULT_NICKNAME = 'Anonymous';

/**
 * Room id encoded in a namespace name, or null if the name is not a room.
 */
export function roomIdFromNamespace(name: string): string | null {
    if (!ROOM_NAMESPACE.test(name)) return null;
    try {
        const roomId = decodeURIComponent(name.slice(NAMESPACE_PREFIX.length)).trim();
        return roomId.length > 0 ? roomId : null;
    } catch {
        return null;
    }
}

/**
 * SessionTransport over a Socket.IO socket.
 */
export class SocketTransport implements SessionTransport {
    constructor(
        private readonly socket: Socket,
        private readonly logger: Logger
    ) {}

    send(message: ServerMessage): void {
        if (!this.socket.connected) {
            throw new TransportError('Socket is not connected', this.socket.id);
        }
        this.socket.emit(SOCKET_EVENT, message);
    }

    close(reason: string): void {
        this.logger.info('Closing connection', { connectionId: this.socket.id, reason });
        if (this.socket.connected) {
            this.socket.disconnect(true);
        }
    }
}

function firstString(value: unknown): string | undefined {
    if (Array.isArray(value)) return firstString(value[0]);
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export type HandshakeParams = {
    userId?: string;
    nickname?: string;
    password?: string;
};

export function readHandshake(socket: Socket): HandshakeParams {
    const { query, auth } = socket.handshake;
    return {
        userId: firstString(query.userId),
        nickname: firstString(query.nickname),
        password: firstString(auth.password) ?? firstString(query.password)
    };
}

/**
 * Register all handlers for one connection.
 */
export function registerSocketHandlers(socket: Socket, manager: RoomManager, logger: Logger): void {
    const roomId = roomIdFromNamespace(socket.nsp.name);
    if (!roomId) {
        logger.warn('Connection to unknown namespace', { namespace: socket.nsp.name });
        socket.disconnect(true);
        return;
    }

    const params = readHandshake(socket);
    const session = new Session({
        userId: params.userId ?? uuidv4(),
        connectionId: socket.id,
        nickname: params.nickname?.trim() || DEFAULT_NICKNAME,
        roomId,
        transport: new SocketTransport(socket, logger)
    });

    logger.debug('New connection', { roomId, userId: session.userId, connectionId: socket.id });

    // Handshake is done once we are here
    session.transition('authenticating');

    // join() queues on the room lock before any message can be handled
    manager.join(session, params.password)
        .then(result => {
            if (result.status === 'rejected') {
                logger.info('Connection rejected', { roomId, userId: session.userId, reason: result.reason });
            }
        })
        .catch(error => {
            logger.error('Join failed', { roomId, userId: session.userId, error: errorMessage(error) });
            session.transition('disconnected');
            socket.disconnect(true);
        });

    socket.on(SOCKET_EVENT, (payload: unknown) => {
        manager.handle(session, payload).catch(error => {
            logger.error('Event handling failed', { roomId, userId: session.userId, error: errorMessage(error) });
        });
    });

    socket.on('disconnect', (reason: string) => {
        // A join still waiting for the lock sees this and gives up
        if (session.status !== 'joined') {
            session.transition('disconnected');
        }

        manager.leave(roomId, session.userId, session.connectionId)
            .then(nickname => {
                logger.debug('Connection closed', { roomId, userId: session.userId, nickname, reason });
            })
            .catch(error => {
                logger.error('Leave failed', { roomId, userId: session.userId, error: errorMessage(error) });
            });
    });
}

/**
 * Attach the room namespaces to a Socket.IO server.
 */
export function attachRoomNamespaces(io: Server, manager: RoomManager, logger: Logger): void {
    io.of(ROOM_NAMESPACE).on('connection', socket => {
        registerSocketHandlers(socket, manager, logger);
    });
}
