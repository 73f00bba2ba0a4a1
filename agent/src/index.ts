#!/usr/bin/env node
/**
 * IPBeacon Agent
 *
 * Runs on the host without a static address. Polls the public IP and pushes
 * it to the server host over scp whenever it changes.
 *
 * Usage:
 *   ipbeacon-agent --server user@server.example.com [--ssh-key ~/.ssh/id_ed25519] [--once]
 */

import dotenv from 'dotenv';
dotenv.config();
import { Command } from 'commander';
import type { AgentConfig } from '../../shared/types';
import { AddressProber } from './AddressProber';
import { CacheStore } from './CacheStore';
import { type AgentCliOptions, resolveAgentConfig } from './config';
import { DEFAULT_CACHE_FILE, DEFAULT_INTERVAL_SECONDS, DEFAULT_REMOTE_PATH } from './constants';
import { logger } from './logger';
import { PollingDriver } from './PollingDriver';
import { PushTransport } from './PushTransport';

// ──────────────────────────────────────────────
// CLI Argument Parsing
// ──────────────────────────────────────────────

const program = new Command();
program
    .name('ipbeacon-agent')
    .description('IPBeacon Agent - monitors your public IP and pushes changes to the server')
    .option('--server <host>', 'Server address (e.g., user@server.example.com)', process.env.IPBEACON_SERVER)
    .option('--remote-path <path>', 'Remote path of the IP file', process.env.IPBEACON_REMOTE_PATH ?? DEFAULT_REMOTE_PATH)
    .option('--interval <seconds>', 'Check interval in seconds', process.env.IPBEACON_INTERVAL ?? String(DEFAULT_INTERVAL_SECONDS))
    .option('--cache-file <path>', 'Local cache file for the last pushed IP', process.env.IPBEACON_CACHE_FILE ?? DEFAULT_CACHE_FILE)
    .option('--ssh-key <path>', 'Path to SSH private key for authentication', process.env.IPBEACON_SSH_KEY)
    .option('--disable-host-key-check', 'Disable SSH host key checking (NOT RECOMMENDED for security)')
    .option('--once', 'Run one cycle and exit (default: run continuously)')
    .parse(process.argv);

let config: AgentConfig;
try {
    config = resolveAgentConfig(program.opts<AgentCliOptions>());
} catch (e) {
    logger.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
}

// ──────────────────────────────────────────────
// Entry Point
// ──────────────────────────────────────────────

logger.info('Starting IPBeacon Agent');
logger.info(`Server: ${config.server}`);
logger.info(`Remote path: ${config.remotePath}`);
logger.info(`Check interval: ${config.interval} seconds`);
logger.info(`Cache file: ${config.cacheFile}`);
if (!config.strictHostKeyChecking) {
    logger.warn('SSH host key checking is DISABLED. The agent cannot detect a spoofed server host.');
}

const driver = new PollingDriver(
    {
        prober: new AddressProber(),
        cache: new CacheStore(config.cacheFile),
        transport: new PushTransport(),
    },
    {
        target: {
            host: config.server,
            remotePath: config.remotePath,
            sshKey: config.sshKey,
            strictHostKeyChecking: config.strictHostKeyChecking,
        },
        intervalSeconds: config.interval,
        once: config.once,
    }
);

const shutdown = () => {
    if (driver.stopped) return;
    logger.info('Interrupt received, stopping...');
    driver.stop();
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

process.on('uncaughtException', (err) => {
    logger.error(`Uncaught exception: ${err.stack || err.message}`);
    shutdown();
});

process.on('unhandledRejection', (reason: unknown) => {
    logger.error(`Unhandled rejection: ${reason instanceof Error ? reason.message : String(reason)}`);
});

driver
    .run()
    .then(code => process.exit(code))
    .catch((e: unknown) => {
        logger.error(`Agent failed: ${e instanceof Error ? e.message : String(e)}`);
        process.exit(1);
    });
