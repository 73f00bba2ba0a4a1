import type { ServerConfig } from '../../shared/types';
import { AppError } from './utils/AppError';

export type ServerCliOptions = {
    port: string;
    bind: string;
    ipFile: string;
};

export function resolveServerConfig(opts: ServerCliOptions): ServerConfig {
    const port = Number(opts.port);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new AppError(400, 'E_VALIDATION', `Invalid --port "${opts.port}". Expected an integer between 1 and 65535.`);
    }

    const bind = opts.bind.trim();
    if (!bind) {
        throw new AppError(400, 'E_VALIDATION', 'Invalid --bind: address must not be empty.');
    }

    const ipFile = opts.ipFile.trim();
    if (!ipFile) {
        throw new AppError(400, 'E_VALIDATION', 'Invalid --ip-file: path must not be empty.');
    }

    return Object.freeze({ port, bind, ipFile });
}
