#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();
import { Command } from 'commander';
import type { Server } from 'http';
import type { ServerConfig } from '../../shared/types';
import { resolveServerConfig, type ServerCliOptions } from './config';
import { startServer } from './app';
import { DEFAULT_BIND, DEFAULT_IP_FILE, DEFAULT_PORT } from './constants';
import { AppError } from './utils/AppError';
import { logger } from './utils/logger';

const program = new Command();
program
    .name('ipbeacon-server')
    .description('IPBeacon Server - serves the last public IP pushed by the agent')
    .option('--port <port>', 'Port to listen on', process.env.IPBEACON_PORT ?? String(DEFAULT_PORT))
    .option('--bind <address>', 'Address to bind to', process.env.IPBEACON_BIND ?? DEFAULT_BIND)
    .option('--ip-file <path>', 'Path to the IP file', process.env.IPBEACON_IP_FILE ?? DEFAULT_IP_FILE)
    .parse(process.argv);

const fail = (e: unknown): never => {
    logger.error(e instanceof AppError ? `${e.errorCode}: ${e.message}` : `Error starting server: ${String(e)}`);
    process.exit(1);
};

const main = async () => {
    let config: ServerConfig;
    try {
        config = resolveServerConfig(program.opts<ServerCliOptions>());
    } catch (e) {
        return fail(e);
    }

    logger.info('IPBeacon Server starting...');

    let httpServer: Server;
    try {
        httpServer = await startServer(config);
    } catch (e) {
        return fail(e);
    }
    logger.info(`Access your IP at: http://<server>:${config.port}/ip`);

    const shutdown = () => {
        logger.info('Shutting down server...');
        httpServer.close(() => process.exit(0));
        httpServer.closeAllConnections();
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    process.on('uncaughtException', (err) => {
        logger.error(`Uncaught exception: ${err.stack || err.message}`);
    });

    process.on('unhandledRejection', (reason: unknown) => {
        logger.error(`Unhandled rejection: ${reason instanceof Error ? reason.message : String(reason)}`);
    });
};

main().catch(fail);
