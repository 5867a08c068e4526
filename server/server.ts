/**
 * server.ts - Main server entry point
 *
 * RESPONSIBILITY: Bootstrap only
 * - Load config and create the logger
 * - Pick the persistence gateway and wire the room manager
 * - Mount the HTTP API and the Socket.IO room namespaces
 * - Run the idle-room sweep and shut down cleanly
 */

import express from 'express';
import { createServer } from 'http';
import type { Server as HttpServer } from 'http';
import { Server } from 'socket.io';
import { createApiRouter, createErrorHandler } from './api';
import { loadConfig } from './config';
import type { ServerConfig } from './config';
import { errorMessage } from './errors';
import { createLogger } from './logger';
import type { Logger } from './logger';
import { InMemoryPersistence, JsonFilePersistence } from './persistence';
import type { PersistenceGateway } from './persistence';
import { RoomManager } from './rooms';
import { SaveQueue } from './saveQueue';
import { attachRoomNamespaces } from './socketHandlers';

export type SketchRoomServer = {
    httpServer: HttpServer;
    io: Server;
    manager: RoomManager;
    start(): Promise<void>;
    stop(): Promise<void>;
};

export function createGateway(config: ServerConfig, logger: Logger): PersistenceGateway {
    return config.persistence === 'memory'
        ? new InMemoryPersistence()
        : new JsonFilePersistence(config.dataDir, logger);
}

export function createSketchRoomServer(config: ServerConfig, logger: Logger): SketchRoomServer {
    const gateway = createGateway(config, logger.child('storage'));
    const saveQueue = new SaveQueue(gateway, logger.child('save'), {
        maxAttempts: config.saveMaxAttempts,
        retryBaseMs: config.saveRetryBaseMs
    });
    const manager = new RoomManager({
        gateway,
        saveQueue,
        logger: logger.child('rooms'),
        roomIdleTtlMs: config.roomIdleTtlMs
    });

    const app = express();
    app.use(express.json({ limit: '5mb' }));
    app.get('/health', (_req, res) => {
        res.json({ status: 'ok', rooms: manager.roomCount });
    });
    app.use('/api', createApiRouter({ manager, gateway, logger: logger.child('api') }));
    app.use(createErrorHandler(logger.child('api')));

    const httpServer = createServer(app);
    const io = new Server(httpServer, {
        cors: {
            origin: config.corsOrigin,
            methods: ['GET', 'POST']
        }
    });
    attachRoomNamespaces(io, manager, logger.child('socket'));

    let sweepTimer: NodeJS.Timeout | null = null;

    const start = (): Promise<void> => new Promise((resolve, reject) => {
        httpServer.once('error', reject);
        httpServer.listen(config.port, config.host, () => {
            httpServer.off('error', reject);
            logger.info(`Listening on http://${config.host}:${config.port}`, { persistence: config.persistence });

            if (config.roomIdleTtlMs > 0) {
                sweepTimer = setInterval(() => {
                    manager.evictIdleRooms().catch(error => {
                        logger.error('Idle sweep failed', { error: errorMessage(error) });
                    });
                }, config.evictionIntervalMs);
                sweepTimer.unref();
            }
            resolve();
        });
    });

    const stop = async (): Promise<void> => {
        if (sweepTimer) clearInterval(sweepTimer);
        // Closes every socket, which queues their leave + save
        await new Promise<void>(resolve => {
            io.close(() => resolve());
        });
        await manager.shutdown();
        logger.info('Closed.');
    };

    return { httpServer, io, manager, start, stop };
}

async function main(): Promise<void> {
    const config = loadConfig();
    const logger = createLogger({ component: 'server', level: config.logLevel });
    const server = createSketchRoomServer(config, logger);

    await server.start();

    // Graceful shutdown
    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down...`);
        server.stop()
            .then(() => process.exit(0))
            .catch(error => {
                logger.error('Shutdown failed', { error: errorMessage(error) });
                process.exit(1);
            });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
    main().catch(error => {
        console.error(`[Server] Failed to start: ${errorMessage(error)}`);
        process.exit(1);
    });
}
