/**
 * api.ts - HTTP endpoints
 *
 * GET  /api/rooms                 live and stored rooms with active user counts
 * GET  /api/rooms/:roomId/stats   RoomStats of a live room
 * POST /api/rooms/:roomId/save    save a live room now
 * GET  /api/gallery               gallery entries, newest first
 * POST /api/gallery               add an entry
 * POST /api/gallery/:id/like      like an entry
 */

import express from 'express';
import type { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import { NotFoundError, PersistenceError, ValidationError, errorMessage } from './errors';
import type { Logger } from './logger';
import type { GalleryEntryInput, PersistenceGateway } from './persistence';
import type { RoomManager } from './rooms';

const galleryEntryBody = z.object({
    roomId: z.string().min(1),
    title: z.string().trim().min(1).max(200),
    author: z.string().trim().min(1).max(100).default('Anonymous'),
    imageData: z.string().min(1)
});

export function parseGalleryEntry(body: unknown): GalleryEntryInput {
    const parsed = galleryEntryBody.safeParse(body);
    if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; '));
    }
    return parsed.data;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to error middleware
function asyncRoute(handler: AsyncHandler) {
    return (req: Request, res: Response, next: NextFunction): void => {
        handler(req, res).catch(next);
    };
}

export type ApiDependencies = {
    manager: RoomManager;
    gateway: PersistenceGateway;
    logger: Logger;
    clock?: () => number;
};

export function createApiRouter({ manager, gateway, logger, clock = Date.now }: ApiDependencies): Router {
    const router = express.Router();

    router.get('/rooms', asyncRoute(async (_req, res) => {
        res.json(await manager.listRooms());
    }));

    router.get('/rooms/:roomId/stats', (req, res) => {
        res.json(manager.getStats(req.params.roomId));
    });

    router.post('/rooms/:roomId/save', asyncRoute(async (req, res) => {
        await manager.saveRoom(req.params.roomId);
        res.json({ status: 'saved' });
    }));

    router.get('/gallery', asyncRoute(async (_req, res) => {
        res.json(await gateway.listGallery());
    }));

    router.post('/gallery', asyncRoute(async (req, res) => {
        const entry = parseGalleryEntry(req.body);
        const id = await gateway.appendGalleryEntry(entry, clock());
        logger.info('Gallery entry added', { id, roomId: entry.roomId });
        res.json({ id });
    }));

    router.post('/gallery/:id/like', asyncRoute(async (req, res) => {
        const liked = await gateway.likeGalleryEntry(req.params.id);
        if (!liked) {
            throw new NotFoundError('Gallery entry', req.params.id);
        }
        res.json({ status: 'liked' });
    }));

    return router;
}

export type ErrorResponse = {
    status: number;
    body: { error: string };
};

/**
 * Maps the error taxonomy onto HTTP status codes.
 * Returns null for errors that are not part of it.
 */
export function toErrorResponse(error: unknown): ErrorResponse | null {
    if (error instanceof NotFoundError) {
        return { status: 404, body: { error: `${error.resource} not found` } };
    }
    if (error instanceof ValidationError) {
        return { status: 400, body: { error: error.message } };
    }
    if (error instanceof PersistenceError) {
        return { status: 500, body: { error: error.message } };
    }
    return null;
}

export function createErrorHandler(logger: Logger) {
    return (error: unknown, _req: Request, res: Response, _next: NextFunction): void => {
        const known = toErrorResponse(error);
        if (known) {
            res.status(known.status).json(known.body);
            return;
        }

        logger.error('Unhandled request error', { error: errorMessage(error) });
        res.status(500).json({ error: 'Internal server error' });
    };
}
