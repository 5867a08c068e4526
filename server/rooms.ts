/**
 * rooms.ts - Room registry, membership and broadcast fan-out
 *
 * RESPONSIBILITY: everything that touches more than one session
 * - Resolve or create rooms (fresh, or restored through the gateway)
 * - Join with password check, leave, color assignment
 * - Serialize every mutation of a room behind that room's Mutex
 * - Fan messages out to a copy of the room's sessions
 *
 * Locking:
 * - one Mutex per room id; different rooms never wait on each other
 * - public methods take the lock, private helpers assume it is held
 * - saves run outside the lock through SaveQueue
 */

import { Mutex } from 'async-mutex';
import { DrawingState } from './drawingState';
import type { RoomView } from './drawingState';
import { AuthError, NotFoundError, ValidationError, errorMessage } from './errors';
import type { Logger } from './logger';
import { routeEvent } from './messageRouter';
import type { RouteResult } from './messageRouter';
import { hashPassword, passwordMatches } from './password';
import type { PersistenceGateway, StoredRoomSummary } from './persistence';
import { errorReply } from './protocol';
import type { ServerMessage } from './protocol';
import type { SaveQueue } from './saveQueue';
import type { Session, UserSummary } from './session';

// Predefined colors for user assignment
export const USER_COLORS = [
    '#FF6B6B', '#4ECDC4', '#45B7D1', '#96CEB4',
    '#FFEAA7', '#DDA0DD', '#98D8C8', '#F7DC6F',
    '#BB8FCE', '#85C1E9', '#F8B500', '#00CED1'
];

export type RoomStats = {
    totalStrokes: number;
    totalUsersJoined: number;
    activeUsers: number;
    createdAt: number;
    lastActivity: number;
    unsaved: boolean;
};

export type RoomSummary = {
    id: string;
    name: string;
    createdAt: number;
    updatedAt: number | null;
    activeUsers: number;
};

export type JoinResult =
    | { status: 'joined'; snapshot: RoomView; stats: RoomStats; color: string }
    | { status: 'rejected'; reason: string };

/**
 * Registry entry: the shared document plus its live sessions.
 */
export class Room {
    // userId -> Session
    readonly sessions = new Map<string, Session>();
    totalStrokes: number;
    totalUsersJoined = 0;
    lastActivity: number;

    constructor(
        readonly state: DrawingState,
        now: number
    ) {
        // Restored strokes count towards the total
        this.totalStrokes = state.strokeCount;
        this.lastActivity = now;
    }

    get id(): string {
        return this.state.id;
    }

    get userCount(): number {
        return this.sessions.size;
    }

    getAllUsers(): UserSummary[] {
        return Array.from(this.sessions.values(), session => session.toSummary());
    }

    touch(now: number): void {
        this.lastActivity = now;
    }
}

export type RoomManagerOptions = {
    gateway: PersistenceGateway;
    saveQueue: SaveQueue;
    logger: Logger;
    clock?: () => number;
    /** Idle rooms without sessions are evicted after this long. 0 disables eviction. */
    roomIdleTtlMs?: number;
};

/**
 * RoomManager is the process-wide room registry.
 */
export class RoomManager {
    private rooms = new Map<string, Room>();
    private locks = new Map<string, Mutex>();
    // userId -> color, kept for the process lifetime
    private colorAssignments = new Map<string, string>();

    private readonly gateway: PersistenceGateway;
    private readonly saveQueue: SaveQueue;
    private readonly logger: Logger;
    private readonly clock: () => number;
    private readonly roomIdleTtlMs: number;

    constructor(options: RoomManagerOptions) {
        this.gateway = options.gateway;
        this.saveQueue = options.saveQueue;
        this.logger = options.logger;
        this.clock = options.clock ?? Date.now;
        this.roomIdleTtlMs = options.roomIdleTtlMs ?? 0;
    }

    // ==========================================
    // Registry
    // ==========================================

    /**
     * Return the room's state, loading or creating it if needed.
     * Calling it twice for the same id returns the same instance.
     */
    async resolveOrCreate(roomId: string): Promise<DrawingState> {
        return this.withRoomLock(roomId, async () => {
            const existing = this.rooms.get(roomId);
            if (existing) return existing.state;
            return this.register(await this.materialize(roomId, null)).state;
        });
    }

    getRoomState(roomId: string): DrawingState | undefined {
        return this.rooms.get(roomId)?.state;
    }

    hasRoom(roomId: string): boolean {
        return this.rooms.has(roomId);
    }

    get roomCount(): number {
        return this.rooms.size;
    }

    activeUserIds(roomId: string): string[] {
        const room = this.rooms.get(roomId);
        return room ? Array.from(room.sessions.keys()) : [];
    }

    // ==========================================
    // Membership
    // ==========================================

    /**
     * Admit `session` into its room.
     *
     * On success the joiner receives `init` and everyone else `user_joined`.
     * On a password mismatch the session gets an `error`, its transport is
     * closed and no room, session or counter is touched.
     */
    async join(session: Session, password?: string): Promise<JoinResult> {
        const roomId = session.roomId;

        return this.withRoomLock(roomId, async (): Promise<JoinResult> => {
            if (session.status !== 'authenticating') {
                return { status: 'rejected', reason: 'Connection closed before join' };
            }

            const existing = this.rooms.get(roomId);
            const state = existing
                ? existing.state
                : await this.materialize(roomId, password ? hashPassword(password) : null);

            // The connection may have closed while the room was loading
            if (session.status !== 'authenticating') {
                return { status: 'rejected', reason: 'Connection closed before join' };
            }

            const storedHash = state.storedPasswordHash;
            if (storedHash !== null && !passwordMatches(storedHash, password)) {
                const authError = new AuthError();
                this.rejectSession(session, authError);
                return { status: 'rejected', reason: authError.message };
            }

            const room = existing ?? this.register(state);
            const now = this.clock();

            const previous = room.sessions.get(session.userId);
            if (previous) {
                // Same user on a newer connection: the old one is dropped quietly
                room.sessions.delete(previous.userId);
                previous.transition('disconnected');
                previous.transport.close('Replaced by a newer connection');
                this.logger.info('Replaced existing connection', { roomId, userId: session.userId });
            }

            session.color = this.colorFor(session.userId);
            session.transition('joined');
            room.sessions.set(session.userId, session);
            room.totalUsersJoined++;
            room.touch(now);

            this.logger.info(`${session.nickname} joined`, { roomId, userId: session.userId, activeUsers: room.userCount });

            this.fanOut(room, {
                type: 'user_joined',
                userId: session.userId,
                nickname: session.nickname,
                color: session.color,
                users: room.getAllUsers()
            }, session.userId);

            const snapshot = state.toView();
            const stats = this.statsFor(room);
            this.deliver(room, session, {
                type: 'init',
                userId: session.userId,
                room: snapshot,
                users: room.getAllUsers(),
                stats,
                yourColor: session.color
            });

            return { status: 'joined', snapshot, stats, color: session.color };
        });
    }

    /**
     * Remove a session. Returns its nickname, or null when it was already
     * gone. With `connectionId`, only that exact connection is removed, so
     * a late close from a replaced connection can't evict its successor.
     */
    async leave(roomId: string, userId: string, connectionId?: string): Promise<string | null> {
        return this.withRoomLock(roomId, () => {
            const room = this.rooms.get(roomId);
            const session = room?.sessions.get(userId);
            if (!room || !session) return null;
            if (connectionId !== undefined && session.connectionId !== connectionId) return null;
            return this.removeSession(room, session);
        });
    }

    // ==========================================
    // Events
    // ==========================================

    /**
     * Process one inbound payload from `session`.
     * Runs validate → mutate → broadcast without interleaving with any
     * other event of the same room.
     */
    async handle(session: Session, raw: unknown): Promise<void> {
        await this.withRoomLock(session.roomId, () => {
            const room = this.rooms.get(session.roomId);
            if (!room || room.sessions.get(session.userId) !== session) {
                this.logger.debug('Dropping event from inactive session', { roomId: session.roomId, userId: session.userId });
                return;
            }

            const now = this.clock();
            let result: RouteResult;
            try {
                result = routeEvent({
                    state: room.state,
                    sender: { userId: session.userId, nickname: session.nickname, color: session.color },
                    now
                }, raw);
            } catch (error) {
                if (error instanceof ValidationError) {
                    this.logger.warn('Rejected event', { roomId: room.id, userId: session.userId, error: error.message });
                    this.deliver(room, session, errorReply(error.message));
                    return;
                }
                throw error;
            }

            if (result.eventType === null) {
                this.logger.debug('Ignoring unknown event type', { roomId: room.id, userId: session.userId });
                return;
            }

            room.touch(now);
            if (result.eventType === 'stroke') {
                room.totalStrokes++;
            }

            for (const dispatch of result.dispatches) {
                this.fanOut(room, dispatch.message, dispatch.excludeUserId);
            }
        });
    }

    /**
     * Send `message` to every session of `roomId` except `excludeUserId`.
     */
    async broadcast(roomId: string, message: ServerMessage, excludeUserId?: string): Promise<void> {
        await this.withRoomLock(roomId, () => {
            const room = this.rooms.get(roomId);
            if (room) {
                this.fanOut(room, message, excludeUserId);
            }
        });
    }

    // ==========================================
    // Stats, listing, saving, eviction
    // ==========================================

    getStats(roomId: string): RoomStats {
        const room = this.rooms.get(roomId);
        if (!room) {
            throw new NotFoundError('Room', roomId);
        }
        return this.statsFor(room);
    }

    /**
     * Live rooms first, then rooms that only exist in storage.
     */
    async listRooms(): Promise<RoomSummary[]> {
        let stored: StoredRoomSummary[] = [];
        try {
            stored = await this.gateway.list();
        } catch (error) {
            this.logger.error('Failed to list stored rooms', { error: errorMessage(error) });
        }

        const storedById = new Map(stored.map(summary => [summary.id, summary]));
        const summaries: RoomSummary[] = [];

        for (const room of this.rooms.values()) {
            summaries.push({
                id: room.id,
                name: room.state.name,
                createdAt: room.state.createdAt,
                updatedAt: storedById.get(room.id)?.updatedAt ?? null,
                activeUsers: room.userCount
            });
        }
        for (const summary of stored) {
            if (this.rooms.has(summary.id)) continue;
            summaries.push({ ...summary, activeUsers: 0 });
        }
        return summaries;
    }

    /**
     * Save a live room right now.
     *
     * @throws NotFoundError when the room is not in memory
     * @throws PersistenceError when the write fails
     */
    async saveRoom(roomId: string): Promise<void> {
        const snapshot = await this.withRoomLock(roomId, () => {
            const room = this.rooms.get(roomId);
            if (!room) {
                throw new NotFoundError('Room', roomId);
            }
            return room.state.toSnapshot(this.clock());
        });
        await this.saveQueue.saveNow(snapshot);
    }

    /**
     * Drop rooms that have no sessions, have been idle for the configured
     * TTL and have nothing left to save. Returns the evicted ids.
     */
    async evictIdleRooms(now: number = this.clock()): Promise<string[]> {
        if (this.roomIdleTtlMs <= 0) return [];

        const evicted: string[] = [];
        for (const roomId of Array.from(this.rooms.keys())) {
            const removed = await this.withRoomLock(roomId, () => {
                const room = this.rooms.get(roomId);
                if (!room || room.userCount > 0) return false;
                if (now - room.lastActivity < this.roomIdleTtlMs) return false;
                if (this.saveQueue.isPending(roomId) || this.saveQueue.isUnsaved(roomId)) return false;

                this.rooms.delete(roomId);
                return true;
            });

            if (removed) {
                evicted.push(roomId);
                this.logger.info('Evicted idle room', { roomId });
            }
        }
        return evicted;
    }

    /**
     * Queue a save for every live room and wait for all saves to settle.
     */
    async shutdown(): Promise<void> {
        for (const room of this.rooms.values()) {
            this.saveQueue.schedule(room.id, () => room.state.toSnapshot(this.clock()));
        }
        await this.saveQueue.flush();
    }

    async flush(): Promise<void> {
        await this.saveQueue.flush();
    }

    // ==========================================
    // Helpers (caller holds the room lock)
    // ==========================================

    private lockFor(roomId: string): Mutex {
        let lock = this.locks.get(roomId);
        if (!lock) {
            lock = new Mutex();
            this.locks.set(roomId, lock);
        }
        return lock;
    }

    private async withRoomLock<T>(roomId: string, fn: () => T | Promise<T>): Promise<T> {
        try {
            return await this.lockFor(roomId).runExclusive(fn);
        } finally {
            this.releaseLockIfIdle(roomId);
        }
    }

    // Locks of rooms that are not in memory are dropped once nobody waits on them
    private releaseLockIfIdle(roomId: string): void {
        const lock = this.locks.get(roomId);
        if (lock && !lock.isLocked() && !this.rooms.has(roomId)) {
            this.locks.delete(roomId);
        }
    }

    private async materialize(roomId: string, passwordHash: string | null): Promise<DrawingState> {
        try {
            const snapshot = await this.gateway.load(roomId);
            if (snapshot) {
                this.logger.info('Restored room from storage', { roomId, strokes: snapshot.strokes.length });
                return DrawingState.fromSnapshot(snapshot);
            }
        } catch (error) {
            this.logger.warn('Failed to load room, starting fresh', { roomId, error: errorMessage(error) });
        }
        return DrawingState.create(roomId, this.clock(), passwordHash);
    }

    private register(state: DrawingState): Room {
        const room = new Room(state, this.clock());
        this.rooms.set(state.id, room);
        this.logger.info('Created room', { roomId: state.id, protected: state.hasPassword });
        return room;
    }

    private colorFor(userId: string): string {
        let color = this.colorAssignments.get(userId);
        if (!color) {
            color = USER_COLORS[this.colorAssignments.size % USER_COLORS.length];
            this.colorAssignments.set(userId, color);
        }
        return color;
    }

    private statsFor(room: Room): RoomStats {
        return {
            totalStrokes: room.totalStrokes,
            totalUsersJoined: room.totalUsersJoined,
            activeUsers: room.userCount,
            createdAt: room.state.createdAt,
            lastActivity: room.lastActivity,
            unsaved: this.saveQueue.isUnsaved(room.id)
        };
    }

    private rejectSession(session: Session, error: AuthError): void {
        this.logger.warn('Join rejected', { roomId: session.roomId, userId: session.userId, reason: error.message });
        try {
            session.send(errorReply(error.message));
        } catch (sendError) {
            this.logger.debug('Could not deliver rejection', { userId: session.userId, error: errorMessage(sendError) });
        }
        session.transition('disconnected');
        session.transport.close(error.message);
    }

    /**
     * Deliver to a single session; a failed send removes it.
     */
    private deliver(room: Room, session: Session, message: ServerMessage): void {
        try {
            session.send(message);
        } catch (error) {
            this.logger.warn('Delivery failed', { roomId: room.id, userId: session.userId, type: message.type, error: errorMessage(error) });
            if (room.sessions.get(session.userId) === session) {
                this.removeSession(room, session);
            }
        }
    }

    /**
     * Fan `message` out over a copy of the room's sessions. Sessions whose
     * send fails are removed only after the pass completes.
     */
    private fanOut(room: Room, message: ServerMessage, excludeUserId?: string): void {
        const recipients = Array.from(room.sessions.values());
        const failed: Session[] = [];

        for (const session of recipients) {
            if (session.userId === excludeUserId) continue;
            try {
                session.send(message);
            } catch (error) {
                this.logger.warn('Broadcast delivery failed', { roomId: room.id, userId: session.userId, type: message.type, error: errorMessage(error) });
                failed.push(session);
            }
        }

        for (const session of failed) {
            // An earlier removal in this loop may already have taken it out
            if (room.sessions.get(session.userId) === session) {
                this.removeSession(room, session);
            }
        }
    }

    private removeSession(room: Room, session: Session): string {
        room.sessions.delete(session.userId);
        session.transition('disconnected');
        room.touch(this.clock());

        this.logger.info(`${session.nickname} left`, { roomId: room.id, userId: session.userId, activeUsers: room.userCount });

        this.fanOut(room, {
            type: 'user_left',
            userId: session.userId,
            nickname: session.nickname,
            users: room.getAllUsers()
        });

        this.saveQueue.schedule(room.id, () => room.state.toSnapshot(this.clock()));
        return session.nickname;
    }
}
