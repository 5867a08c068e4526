/**
 * persistence.ts - Persistence Gateway
 *
 * RESPONSIBILITY: load/save room snapshots, store gallery entries
 *
 * The room server only depends on the PersistenceGateway interface.
 * Two implementations ship:
 * - JsonFilePersistence: one JSON file per room under DATA_DIR/rooms
 * - InMemoryPersistence: process-local maps, for tests and PERSISTENCE=memory
 *
 * Snapshots are validated on load; a corrupt file is a PersistenceError,
 * which the registry treats the same as "room not found".
 */

import { mkdir, readFile, readdir, rename, writeFile } from 'fs/promises';
import path from 'path';
import { Mutex } from 'async-mutex';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { TOOLS } from './drawingState';
import type { RoomSnapshot } from './drawingState';
import { PersistenceError, errorMessage } from './errors';
import { createNoOpLogger } from './logger';
import type { Logger } from './logger';

export type StoredRoomSummary = {
    id: string;
    name: string;
    createdAt: number;
    updatedAt: number;
};

export type GalleryEntryInput = {
    roomId: string;
    title: string;
    author: string;
    imageData: string;
};

export type GalleryEntry = GalleryEntryInput & {
    id: string;
    likes: number;
    createdAt: number;
};

export interface PersistenceGateway {
    /** Resolves null when nothing is stored for `roomId`. */
    load(roomId: string): Promise<RoomSnapshot | null>;
    save(snapshot: RoomSnapshot): Promise<void>;
    /** Stored rooms, most recently updated first. */
    list(): Promise<StoredRoomSummary[]>;
    appendGalleryEntry(entry: GalleryEntryInput, createdAt: number): Promise<string>;
    /** Gallery entries, newest first. */
    listGallery(): Promise<GalleryEntry[]>;
    /** Resolves false when `id` is unknown. */
    likeGalleryEntry(id: string): Promise<boolean>;
}

// ==========================================
// Snapshot schema
// ==========================================

const finiteNumber = z.number().finite();

export const roomSnapshotSchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    passwordHash: z.string().nullable(),
    layers: z.array(z.object({
        id: z.string(),
        name: z.string(),
        visible: z.boolean().default(true),
        locked: z.boolean().default(false),
        opacity: finiteNumber.min(0).max(1).default(1),
        order: z.number().int()
    })),
    strokes: z.array(z.object({
        id: z.string(),
        userId: z.string(),
        points: z.array(z.object({ x: finiteNumber, y: finiteNumber })),
        color: z.string(),
        size: finiteNumber,
        layerId: z.string(),
        tool: z.enum(TOOLS).default('brush'),
        text: z.string().optional(),
        timestamp: finiteNumber
    })),
    chatMessages: z.array(z.object({
        id: z.string(),
        userId: z.string(),
        nickname: z.string(),
        text: z.string(),
        timestamp: finiteNumber
    })),
    thumbnail: z.string().nullable().default(null),
    createdAt: finiteNumber,
    updatedAt: finiteNumber
});

export function parseRoomSnapshot(raw: unknown, roomId: string): RoomSnapshot {
    const result = roomSnapshotSchema.safeParse(raw);
    if (!result.success) {
        throw new PersistenceError(`Stored room ${roomId} is malformed: ${result.error.issues[0]?.message ?? 'unknown issue'}`, roomId);
    }
    return result.data;
}

const galleryEntrySchema = z.object({
    id: z.string(),
    roomId: z.string(),
    title: z.string(),
    author: z.string(),
    imageData: z.string(),
    likes: z.number().int().min(0),
    createdAt: finiteNumber
});

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function newestFirst<T extends { updatedAt: number }>(items: T[]): T[] {
    return [...items].sort((a, b) => b.updatedAt - a.updatedAt);
}

// ==========================================
// JSON files
// ==========================================

/**
 * Stores each room as DATA_DIR/rooms/<encoded id>.json and the gallery
 * as DATA_DIR/gallery.json. Writes go to a temp file first and are
 * renamed into place.
 */
export class JsonFilePersistence implements PersistenceGateway {
    private readonly roomsDir: string;
    private readonly galleryFile: string;
    // Gallery updates are read-modify-write on one file
    private readonly galleryLock = new Mutex();

    constructor(
        private readonly dataDir: string,
        private readonly logger: Logger = createNoOpLogger()
    ) {
        this.roomsDir = path.join(dataDir, 'rooms');
        this.galleryFile = path.join(dataDir, 'gallery.json');
    }

    async load(roomId: string): Promise<RoomSnapshot | null> {
        let contents: string;
        try {
            contents = await readFile(this.roomFile(roomId), 'utf8');
        } catch (error) {
            if (isMissingFile(error)) return null;
            throw new PersistenceError(`Failed to read room ${roomId}: ${errorMessage(error)}`, roomId, { cause: error });
        }

        let raw: unknown;
        try {
            raw = JSON.parse(contents);
        } catch (error) {
            throw new PersistenceError(`Stored room ${roomId} is not valid JSON`, roomId, { cause: error });
        }
        return parseRoomSnapshot(raw, roomId);
    }

    async save(snapshot: RoomSnapshot): Promise<void> {
        try {
            await mkdir(this.roomsDir, { recursive: true });
            await this.writeAtomic(this.roomFile(snapshot.id), JSON.stringify(snapshot));
        } catch (error) {
            throw new PersistenceError(`Failed to save room ${snapshot.id}: ${errorMessage(error)}`, snapshot.id, { cause: error });
        }
    }

    async list(): Promise<StoredRoomSummary[]> {
        let files: string[];
        try {
            files = await readdir(this.roomsDir);
        } catch (error) {
            if (isMissingFile(error)) return [];
            throw new PersistenceError(`Failed to list rooms: ${errorMessage(error)}`, undefined, { cause: error });
        }

        const summaries: StoredRoomSummary[] = [];
        for (const file of files) {
            if (!file.endsWith('.json')) continue;
            let snapshot: RoomSnapshot | null;
            try {
                snapshot = await this.load(decodeURIComponent(file.slice(0, -'.json'.length)));
            } catch (error) {
                // One unreadable file must not hide the other rooms
                if (!(error instanceof PersistenceError || error instanceof URIError)) throw error;
                this.logger.warn('Skipping unreadable room file', { file, error: error.message });
                continue;
            }
            if (snapshot) {
                summaries.push({
                    id: snapshot.id,
                    name: snapshot.name,
                    createdAt: snapshot.createdAt,
                    updatedAt: snapshot.updatedAt
                });
            }
        }
        return newestFirst(summaries);
    }

    async appendGalleryEntry(entry: GalleryEntryInput, createdAt: number): Promise<string> {
        return this.galleryLock.runExclusive(async () => {
            const entries = await this.readGallery();
            const id = uuidv4();
            entries.push({ ...entry, id, likes: 0, createdAt });
            await this.writeGallery(entries);
            return id;
        });
    }

    async listGallery(): Promise<GalleryEntry[]> {
        const entries = await this.readGallery();
        return entries.sort((a, b) => b.createdAt - a.createdAt);
    }

    async likeGalleryEntry(id: string): Promise<boolean> {
        return this.galleryLock.runExclusive(async () => {
            const entries = await this.readGallery();
            const entry = entries.find(item => item.id === id);
            if (!entry) return false;
            entry.likes += 1;
            await this.writeGallery(entries);
            return true;
        });
    }

    private roomFile(roomId: string): string {
        return path.join(this.roomsDir, `${encodeURIComponent(roomId)}.json`);
    }

    private async readGallery(): Promise<GalleryEntry[]> {
        let contents: string;
        try {
            contents = await readFile(this.galleryFile, 'utf8');
        } catch (error) {
            if (isMissingFile(error)) return [];
            throw new PersistenceError(`Failed to read gallery: ${errorMessage(error)}`, undefined, { cause: error });
        }

        let raw: unknown;
        try {
            raw = JSON.parse(contents);
        } catch (error) {
            throw new PersistenceError('Stored gallery is not valid JSON', undefined, { cause: error });
        }

        const result = z.array(galleryEntrySchema).safeParse(raw);
        if (!result.success) {
            throw new PersistenceError('Stored gallery is malformed');
        }
        return result.data;
    }

    private async writeGallery(entries: GalleryEntry[]): Promise<void> {
        try {
            await mkdir(this.dataDir, { recursive: true });
            await this.writeAtomic(this.galleryFile, JSON.stringify(entries));
        } catch (error) {
            throw new PersistenceError(`Failed to write gallery: ${errorMessage(error)}`, undefined, { cause: error });
        }
    }

    private async writeAtomic(file: string, contents: string): Promise<void> {
        const temp = `${file}.${uuidv4()}.tmp`;
        await writeFile(temp, contents, 'utf8');
        await rename(temp, file);
    }
}

// ==========================================
// In memory
// ==========================================

export class InMemoryPersistence implements PersistenceGateway {
    private rooms = new Map<string, string>();
    private gallery: GalleryEntry[] = [];

    async load(roomId: string): Promise<RoomSnapshot | null> {
        const stored = this.rooms.get(roomId);
        if (stored === undefined) return null;
        return parseRoomSnapshot(JSON.parse(stored), roomId);
    }

    async save(snapshot: RoomSnapshot): Promise<void> {
        // Stored serialized; every load returns a fresh copy
        this.rooms.set(snapshot.id, JSON.stringify(snapshot));
    }

    async list(): Promise<StoredRoomSummary[]> {
        const summaries: StoredRoomSummary[] = [];
        for (const [roomId, stored] of this.rooms) {
            const snapshot = parseRoomSnapshot(JSON.parse(stored), roomId);
            summaries.push({
                id: snapshot.id,
                name: snapshot.name,
                createdAt: snapshot.createdAt,
                updatedAt: snapshot.updatedAt
            });
        }
        return newestFirst(summaries);
    }

    async appendGalleryEntry(entry: GalleryEntryInput, createdAt: number): Promise<string> {
        const id = uuidv4();
        this.gallery.push({ ...entry, id, likes: 0, createdAt });
        return id;
    }

    async listGallery(): Promise<GalleryEntry[]> {
        return [...this.gallery]
            .sort((a, b) => b.createdAt - a.createdAt)
            .map(entry => ({ ...entry }));
    }

    async likeGalleryEntry(id: string): Promise<boolean> {
        const entry = this.gallery.find(item => item.id === id);
        if (!entry) return false;
        entry.likes += 1;
        return true;
    }

    has(roomId: string): boolean {
        return this.rooms.has(roomId);
    }
}
