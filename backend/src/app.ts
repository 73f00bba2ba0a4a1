import express, { type Express } from 'express';
import fs from 'fs-extra';
import path from 'path';
import { createServer, type Server } from 'http';
import type { ServerConfig } from '../../shared/types';
import { errorMessage, isErrnoException } from '../../shared/utils/errors';
import { setupRoutes } from './routes';
import { errorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { AppError } from './utils/AppError';
import { logger } from './utils/logger';

export const createApp = (config: Pick<ServerConfig, 'ipFile'>): Express => {
    const app = express();
    app.disable('x-powered-by');

    app.use(requestLogger);
    setupRoutes(app, config.ipFile);

    // Global Error Handler
    app.use(errorHandler);

    return app;
};

export const toStartupError = (err: unknown, config: Pick<ServerConfig, 'port' | 'bind'>): AppError => {
    if (isErrnoException(err)) {
        if (err.code === 'EACCES') {
            return new AppError(500, 'E_PERMISSION_DENIED', `Permission denied. Port ${config.port} may require root privileges.`, false);
        }
        if (err.code === 'EADDRINUSE') {
            return new AppError(500, 'E_PORT_IN_USE', `Port ${config.port} is already in use on ${config.bind}.`, false);
        }
    }
    return new AppError(500, 'E_BIND_FAILED', `Error starting server: ${errorMessage(err)}`, false);
};

/**
 * Creates the IP file's directory, then listens.
 * Rejects with an AppError when the listener cannot be bound.
 */
export const startServer = async (config: ServerConfig): Promise<Server> => {
    const ipDir = path.dirname(config.ipFile);
    try {
        await fs.ensureDir(ipDir);
    } catch (e) {
        throw new AppError(500, 'E_FILE_ACCESS', `Cannot create directory ${ipDir}: ${errorMessage(e)}`, false);
    }

    const httpServer = createServer(createApp(config));

    await new Promise<void>((resolve, reject) => {
        httpServer.once('error', (err) => reject(toStartupError(err, config)));
        httpServer.listen(config.port, config.bind, () => resolve());
    });

    logger.info(`Listening on ${config.bind}:${config.port}`);
    logger.info(`IP file: ${config.ipFile}`);
    return httpServer;
};
