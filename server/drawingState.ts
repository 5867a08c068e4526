/**
 * drawingState.ts - Shared document for a single room
 *
 * ARCHITECTURE DECISION: Append/remove stroke log
 * - Strokes are appended in the order the server processed them
 * - A stroke never moves; it is only removed wholesale (undo, layer clear)
 * - Late joiners receive the log as-is, so every client replays the same order
 *
 * The class does no I/O and no locking. RoomManager serializes access
 * per room, so every method here runs to completion without interleaving.
 */

import { v4 as uuidv4 } from 'uuid';
import { RingBuffer } from './ringBuffer';

export const DEFAULT_LAYER_ID = 'layer_0';
export const DEFAULT_LAYER_NAME = 'Background';

export const CHAT_HISTORY_LIMIT = 100;
export const CHAT_SNAPSHOT_LIMIT = 50;
export const CHAT_TEXT_LIMIT = 500;
export const TIMER_MAX_SECONDS = 3600;
export const THUMBNAIL_LIMIT = 50_000;

export const TOOLS = ['brush', 'eraser', 'line', 'rect', 'circle', 'text', 'fill'] as const;
export type Tool = (typeof TOOLS)[number];

export type Point = { x: number; y: number };

export type Stroke = {
    id: string;
    userId: string;
    points: Point[];
    color: string;
    size: number;
    layerId: string;
    tool: Tool;
    text?: string;
    timestamp: number;
};

export type Layer = {
    id: string;
    name: string;
    visible: boolean;
    locked: boolean;
    opacity: number;
    order: number;
};

export type ChatMessage = {
    id: string;
    userId: string;
    nickname: string;
    text: string;
    timestamp: number;
};

/**
 * Serializable room state written to storage.
 * Timer and live counters are not part of it.
 */
export type RoomSnapshot = {
    id: string;
    name: string;
    passwordHash: string | null;
    layers: Layer[];
    strokes: Stroke[];
    chatMessages: ChatMessage[];
    thumbnail: string | null;
    createdAt: number;
    updatedAt: number;
};

/**
 * Room section of the `init` message sent to a joining client.
 * Never carries the password hash.
 */
export type RoomView = {
    id: string;
    name: string;
    hasPassword: boolean;
    layers: Layer[];
    strokes: Stroke[];
    chatMessages: ChatMessage[];
    timerEnd: number | null;
    createdAt: number;
};

export type TimerState = {
    timerEnd: number;
    duration: number;
};

export function createDefaultLayer(): Layer {
    return {
        id: DEFAULT_LAYER_ID,
        name: DEFAULT_LAYER_NAME,
        visible: true,
        locked: false,
        opacity: 1,
        order: 0
    };
}

export function clampTimerDuration(seconds: number): number {
    return Math.min(Math.max(seconds, 0), TIMER_MAX_SECONDS);
}

// Counts code points, so a surrogate pair is never split
export function truncateCharacters(text: string, limit: number): string {
    return Array.from(text).slice(0, limit).join('');
}

type DrawingStateInit = {
    id: string;
    name?: string;
    passwordHash?: string | null;
    createdAt: number;
    layers?: Layer[];
    strokes?: Stroke[];
    chatMessages?: ChatMessage[];
    thumbnail?: string | null;
};

/**
 * DrawingState holds the authoritative document of one room.
 */
export class DrawingState {
    readonly id: string;
    readonly name: string;
    readonly createdAt: number;
    // Set once at construction; there is no setter
    private readonly passwordHash: string | null;

    private layerList: Layer[];
    private strokeLog: Stroke[];
    private chat = new RingBuffer<ChatMessage>(CHAT_HISTORY_LIMIT);
    private timerEndAt: number | null = null;
    private thumbnailData: string | null;

    constructor(init: DrawingStateInit) {
        this.id = init.id;
        this.name = init.name ?? init.id;
        this.createdAt = init.createdAt;
        this.passwordHash = init.passwordHash ?? null;
        this.layerList = init.layers && init.layers.length > 0
            ? init.layers.map(layer => ({ ...layer }))
            : [createDefaultLayer()];
        this.strokeLog = init.strokes ? init.strokes.map(stroke => ({ ...stroke })) : [];
        this.thumbnailData = init.thumbnail ?? null;

        for (const message of init.chatMessages ?? []) {
            this.chat.push({ ...message });
        }
    }

    /**
     * Fresh room with only the Background layer.
     */
    static create(id: string, createdAt: number, passwordHash: string | null = null): DrawingState {
        return new DrawingState({ id, createdAt, passwordHash });
    }

    static fromSnapshot(snapshot: RoomSnapshot): DrawingState {
        return new DrawingState({
            id: snapshot.id,
            name: snapshot.name,
            passwordHash: snapshot.passwordHash,
            createdAt: snapshot.createdAt,
            layers: snapshot.layers,
            strokes: snapshot.strokes,
            chatMessages: snapshot.chatMessages,
            thumbnail: snapshot.thumbnail
        });
    }

    // --- Strokes ---

    addStroke(stroke: Stroke): void {
        this.strokeLog.push(stroke);
    }

    /**
     * Remove the newest stroke authored by `userId`.
     *
     * Scans newest → oldest and stops at the first match. Strokes by other
     * users drawn after it stay where they are.
     */
    removeLastStrokeBy(userId: string): Stroke | null {
        for (let i = this.strokeLog.length - 1; i >= 0; i--) {
            if (this.strokeLog[i].userId === userId) {
                const [removed] = this.strokeLog.splice(i, 1);
                return removed;
            }
        }
        return null;
    }

    /**
     * Remove every stroke on `layerId`. Returns how many were removed.
     */
    clearLayer(layerId: string): number {
        const before = this.strokeLog.length;
        this.strokeLog = this.strokeLog.filter(stroke => stroke.layerId !== layerId);
        return before - this.strokeLog.length;
    }

    get strokes(): Stroke[] {
        return [...this.strokeLog];
    }

    get strokeCount(): number {
        return this.strokeLog.length;
    }

    // --- Layers ---

    /**
     * Append a layer. `order` is the layer count before insertion and is
     * never renumbered, so ids or orders supplied by clients may repeat.
     */
    addLayer(input: { id?: string; name?: string }): Layer {
        const layer: Layer = {
            id: input.id ?? `layer_${uuidv4().replace(/-/g, '').slice(0, 8)}`,
            name: input.name ?? 'New Layer',
            visible: true,
            locked: false,
            opacity: 1,
            order: this.layerList.length
        };
        this.layerList.push(layer);
        return layer;
    }

    get layers(): Layer[] {
        return this.layerList.map(layer => ({ ...layer }));
    }

    // --- Chat ---

    appendChat(userId: string, nickname: string, text: string, timestamp: number): ChatMessage {
        const message: ChatMessage = {
            id: uuidv4(),
            userId,
            nickname,
            text: truncateCharacters(text, CHAT_TEXT_LIMIT),
            timestamp
        };
        this.chat.push(message);
        return message;
    }

    /**
     * Chat history oldest → newest, at most `limit` entries.
     */
    chatHistory(limit: number = CHAT_HISTORY_LIMIT): ChatMessage[] {
        return this.chat.toArray(limit);
    }

    // --- Timer ---

    startTimer(durationSeconds: number, now: number): TimerState {
        const duration = clampTimerDuration(durationSeconds);
        this.timerEndAt = now + duration * 1000;
        return { timerEnd: this.timerEndAt, duration };
    }

    stopTimer(): void {
        this.timerEndAt = null;
    }

    get timerEnd(): number | null {
        return this.timerEndAt;
    }

    // --- Thumbnail ---

    saveThumbnail(data: string): void {
        this.thumbnailData = truncateCharacters(data, THUMBNAIL_LIMIT);
    }

    get thumbnail(): string | null {
        return this.thumbnailData;
    }

    // --- Password ---

    get hasPassword(): boolean {
        return this.passwordHash !== null;
    }

    get storedPasswordHash(): string | null {
        return this.passwordHash;
    }

    // --- Snapshots ---

    toView(): RoomView {
        return {
            id: this.id,
            name: this.name,
            hasPassword: this.hasPassword,
            layers: this.layers,
            strokes: this.strokes,
            chatMessages: this.chatHistory(CHAT_SNAPSHOT_LIMIT),
            timerEnd: this.timerEndAt,
            createdAt: this.createdAt
        };
    }

    toSnapshot(updatedAt: number): RoomSnapshot {
        return {
            id: this.id,
            name: this.name,
            passwordHash: this.passwordHash,
            layers: this.layers,
            strokes: this.strokes,
            chatMessages: this.chatHistory(CHAT_SNAPSHOT_LIMIT),
            thumbnail: this.thumbnailData,
            createdAt: this.createdAt,
            updatedAt
        };
    }
}
