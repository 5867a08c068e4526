import express from 'express';
import { createServer } from 'http';
import type { Server as HttpServer } from 'http';
import { afterEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { createApiRouter, createErrorHandler, parseGalleryEntry, toErrorResponse } from '../../server/api';
import type { RoomSnapshot } from '../../server/drawingState';
import { NotFoundError, PersistenceError, ValidationError } from '../../server/errors';
import { createNoOpLogger } from '../../server/logger';
import { InMemoryPersistence } from '../../server/persistence';
import type { PersistenceGateway } from '../../server/persistence';
import { createHarness } from '../helpers';

describe('toErrorResponse', () => {
    it('should map known errors to status codes', () => {
        expect(toErrorResponse(new NotFoundError('Room', 'r1'))).toEqual({ status: 404, body: { error: 'Room not found' } });
        expect(toErrorResponse(new ValidationError('title: Required'))).toEqual({ status: 400, body: { error: 'title: Required' } });
        expect(toErrorResponse(new PersistenceError('Failed to save room r1', 'r1'))).toEqual({
            status: 500,
            body: { error: 'Failed to save room r1' }
        });
    });

    it('should leave unknown errors to the generic handler', () => {
        expect(toErrorResponse(new Error('boom'))).toBeNull();
        expect(toErrorResponse('boom')).toBeNull();
    });
});

describe('parseGalleryEntry', () => {
    it('should trim text fields and default the author', () => {
        expect(parseGalleryEntry({ roomId: 'r1', title: '  Sunset  ', imageData: 'data:a' })).toEqual({
            roomId: 'r1',
            title: 'Sunset',
            author: 'Anonymous',
            imageData: 'data:a'
        });
    });

    it('should reject incomplete entries', () => {
        expect(() => parseGalleryEntry({ roomId: 'r1', title: '   ', imageData: 'data:a' })).toThrow(ValidationError);
        expect(() => parseGalleryEntry({ title: 'Sunset', imageData: 'data:a' })).toThrow('roomId: Required');
    });
});

class FailingSavePersistence extends InMemoryPersistence {
    async save(_snapshot: RoomSnapshot): Promise<void> {
        throw new Error('disk full');
    }
}

type ApiResponse = {
    status: number;
    body: unknown;
};

describe('API routes', () => {
    const servers: HttpServer[] = [];

    afterEach(async () => {
        for (const server of servers.splice(0)) {
            await new Promise<void>((resolve, reject) => {
                server.close(error => (error ? reject(error) : resolve()));
            });
        }
    });

    async function startApi(gateway: PersistenceGateway = new InMemoryPersistence()) {
        const { manager } = createHarness({ gateway, clock: () => 1000, maxAttempts: 1 });
        const app = express();
        app.use(express.json());
        app.use('/api', createApiRouter({ manager, gateway, logger: createNoOpLogger(), clock: () => 2000 }));
        app.use(createErrorHandler(createNoOpLogger()));

        const server = createServer(app);
        servers.push(server);
        await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
        const address = server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('Expected a TCP address');
        }
        const baseUrl = `http://127.0.0.1:${address.port}/api`;

        async function request(method: 'GET' | 'POST', path: string, body?: unknown): Promise<ApiResponse> {
            const response = await fetch(`${baseUrl}${path}`, {
                method,
                headers: body === undefined ? undefined : { 'content-type': 'application/json' },
                body: body === undefined ? undefined : JSON.stringify(body)
            });
            return { status: response.status, body: await response.json() };
        }

        return { manager, request };
    }

    it('should answer 404 for stats and saves of unknown rooms', async () => {
        const { request } = await startApi();

        expect(await request('GET', '/rooms/missing/stats')).toEqual({ status: 404, body: { error: 'Room not found' } });
        expect(await request('POST', '/rooms/missing/save')).toEqual({ status: 404, body: { error: 'Room not found' } });
    });

    it('should report stats, save a live room and list it', async () => {
        const { manager, request } = await startApi();
        await manager.resolveOrCreate('r1');

        expect(await request('GET', '/rooms/r1/stats')).toEqual({
            status: 200,
            body: { totalStrokes: 0, totalUsersJoined: 0, activeUsers: 0, createdAt: 1000, lastActivity: 1000, unsaved: false }
        });
        expect(await request('POST', '/rooms/r1/save')).toEqual({ status: 200, body: { status: 'saved' } });
        expect(await request('GET', '/rooms')).toEqual({
            status: 200,
            body: [{ id: 'r1', name: 'r1', createdAt: 1000, updatedAt: 1000, activeUsers: 0 }]
        });
    });

    it('should answer 500 when a save fails', async () => {
        const { manager, request } = await startApi(new FailingSavePersistence());
        await manager.resolveOrCreate('r1');

        expect(await request('POST', '/rooms/r1/save')).toEqual({
            status: 500,
            body: { error: 'Failed to save room r1: disk full' }
        });
    });

    it('should add, like and list gallery entries', async () => {
        const { request } = await startApi();

        expect(await request('POST', '/gallery', { roomId: 'r1', imageData: 'data:a' })).toEqual({
            status: 400,
            body: { error: 'title: Required' }
        });

        const created = await request('POST', '/gallery', { roomId: 'r1', title: 'Sunset', imageData: 'data:a' });
        expect(created.status).toBe(200);
        const { id } = z.object({ id: z.string().min(1) }).parse(created.body);

        expect(await request('POST', `/gallery/${id}/like`)).toEqual({ status: 200, body: { status: 'liked' } });
        expect(await request('POST', '/gallery/unknown/like')).toEqual({
            status: 404,
            body: { error: 'Gallery entry not found' }
        });
        expect(await request('GET', '/gallery')).toEqual({
            status: 200,
            body: [{ id, roomId: 'r1', title: 'Sunset', author: 'Anonymous', imageData: 'data:a', likes: 1, createdAt: 2000 }]
        });
    });
});
