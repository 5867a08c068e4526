/**
 * saveQueue.ts - Background room saves
 *
 * Saves triggered by disconnects never block the broadcast path:
 * `schedule` returns immediately and the write happens in the background.
 *
 * Failure policy:
 * - each save is retried up to `maxAttempts` times with exponential backoff
 * - saves for the same room run one after another, never concurrently
 * - when every attempt fails the room is flagged unsaved until a later
 *   save succeeds; RoomStats exposes the flag
 */

import { setTimeout as delay } from 'timers/promises';
import type { RoomSnapshot } from './drawingState';
import { PersistenceError, errorMessage } from './errors';
import type { Logger } from './logger';
import type { PersistenceGateway } from './persistence';

export type SaveQueueOptions = {
    maxAttempts: number;
    retryBaseMs: number;
    sleep?: (ms: number) => Promise<unknown>;
};

export class SaveQueue {
    private readonly pending = new Map<string, Promise<boolean>>();
    private readonly unsaved = new Set<string>();
    private readonly sleep: (ms: number) => Promise<unknown>;

    constructor(
        private readonly gateway: PersistenceGateway,
        private readonly logger: Logger,
        private readonly options: SaveQueueOptions
    ) {
        this.sleep = options.sleep ?? (ms => delay(ms));
    }

    /**
     * Queue a save. `takeSnapshot` runs when the attempt starts, so a save
     * that waited behind another one writes the latest state.
     */
    schedule(roomId: string, takeSnapshot: () => RoomSnapshot): void {
        const previous = this.pending.get(roomId);

        const run = async (): Promise<boolean> => {
            if (previous) await previous;
            try {
                return await this.saveWithRetry(roomId, takeSnapshot);
            } finally {
                if (this.pending.get(roomId) === task) {
                    this.pending.delete(roomId);
                }
            }
        };

        const task = run();
        this.pending.set(roomId, task);
    }

    /**
     * Single immediate attempt. Failures are returned to the caller.
     */
    async saveNow(snapshot: RoomSnapshot): Promise<void> {
        try {
            await this.gateway.save(snapshot);
        } catch (error) {
            this.unsaved.add(snapshot.id);
            this.logger.error('Save failed', { roomId: snapshot.id, error: errorMessage(error) });
            throw error instanceof PersistenceError
                ? error
                : new PersistenceError(`Failed to save room ${snapshot.id}: ${errorMessage(error)}`, snapshot.id, { cause: error });
        }
        this.unsaved.delete(snapshot.id);
        this.logger.info('Room saved', { roomId: snapshot.id, strokes: snapshot.strokes.length });
    }

    isUnsaved(roomId: string): boolean {
        return this.unsaved.has(roomId);
    }

    isPending(roomId: string): boolean {
        return this.pending.has(roomId);
    }

    /**
     * Wait for every queued save, including ones queued while waiting.
     */
    async flush(): Promise<void> {
        while (this.pending.size > 0) {
            await Promise.all(this.pending.values());
        }
    }

    private async saveWithRetry(roomId: string, takeSnapshot: () => RoomSnapshot): Promise<boolean> {
        const { maxAttempts, retryBaseMs } = this.options;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            try {
                const snapshot = takeSnapshot();
                await this.gateway.save(snapshot);
                this.unsaved.delete(roomId);
                this.logger.debug('Room saved', { roomId, attempt, strokes: snapshot.strokes.length });
                return true;
            } catch (error) {
                this.logger.warn('Save attempt failed', { roomId, attempt, maxAttempts, error: errorMessage(error) });
                if (attempt < maxAttempts) {
                    await this.sleep(retryBaseMs * 2 ** (attempt - 1));
                }
            }
        }

        this.unsaved.add(roomId);
        this.logger.error('Room left unsaved after retries', { roomId, attempts: maxAttempts });
        return false;
    }
}
