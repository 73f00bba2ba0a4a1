import os from 'os';
import path from 'path';
import type { AgentConfig } from '../../shared/types';

export type AgentCliOptions = {
    server?: string;
    remotePath: string;
    interval: string;
    cacheFile: string;
    sshKey?: string;
    disableHostKeyCheck?: boolean;
    once?: boolean;
};

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export function expandHome(filePath: string): string {
    if (filePath === '~') return os.homedir();
    if (filePath.startsWith('~/')) return path.join(os.homedir(), filePath.slice(2));
    return filePath;
}

export function resolveAgentConfig(opts: AgentCliOptions): AgentConfig {
    const server = (opts.server ?? '').trim();
    if (!server) {
        throw new ConfigError('Missing --server. Expected a scp destination like user@server.example.com');
    }

    const remotePath = opts.remotePath.trim();
    if (!remotePath) {
        throw new ConfigError('Invalid --remote-path: path must not be empty.');
    }

    const interval = Number(opts.interval);
    if (!Number.isInteger(interval) || interval < 1) {
        throw new ConfigError(`Invalid --interval "${opts.interval}". Expected a positive number of seconds.`);
    }

    const sshKey = opts.sshKey?.trim();

    return Object.freeze({
        server,
        remotePath,
        interval,
        cacheFile: path.resolve(expandHome(opts.cacheFile.trim())),
        sshKey: sshKey ? expandHome(sshKey) : undefined,
        strictHostKeyChecking: !opts.disableHostKeyCheck,
        once: opts.once === true,
    });
}
