import { execFile } from 'child_process';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { promisify } from 'util';
import type { PushResult, PushTarget } from '../../shared/types';
import { errorMessage } from '../../shared/utils/errors';
import { isValidIPv4 } from '../../shared/utils/ipv4';
import { PUSH_TIMEOUT_MS } from './constants';
import { logger } from './logger';

const execFileAsync = promisify(execFile);

export interface CommandOutput {
    stdout: string;
    stderr: string;
}

/** Runs an executable; rejects on spawn error, non-zero exit or timeout. */
export type CommandRunner = (file: string, args: string[], options: { timeout: number }) => Promise<CommandOutput>;

export const runCommand: CommandRunner = async (file, args, options) => {
    const { stdout, stderr } = await execFileAsync(file, args, { timeout: options.timeout, encoding: 'utf8' });
    return { stdout, stderr };
};

export function buildScpArgs(localFile: string, target: PushTarget): string[] {
    // BatchMode: fail instead of prompting for a password.
    const args = ['-o', 'BatchMode=yes'];
    if (target.sshKey) {
        args.push('-i', target.sshKey);
    }
    if (!target.strictHostKeyChecking) {
        args.push('-o', 'StrictHostKeyChecking=no');
    }
    args.push(localFile, `${target.host}:${target.remotePath}`);
    return args;
}

function describeFailure(e: unknown, timeoutMs: number): string {
    if (e instanceof Error) {
        if ('killed' in e && e.killed === true) {
            return `scp timed out after ${timeoutMs / 1000}s`;
        }
        const stderr = 'stderr' in e && typeof e.stderr === 'string' ? e.stderr.trim() : '';
        return stderr || e.message;
    }
    return String(e);
}

/**
 * Copies the address to the server host with scp. Each call stages the value
 * in its own temp directory, which is removed whatever the outcome.
 */
export class PushTransport {
    constructor(
        private readonly runner: CommandRunner = runCommand,
        private readonly timeoutMs: number = PUSH_TIMEOUT_MS
    ) {}

    public async push(address: string, target: PushTarget): Promise<PushResult> {
        if (!isValidIPv4(address)) {
            const error = `Refusing to push invalid address "${address}"`;
            logger.error(`[Push] ${error}`);
            return { ok: false, error };
        }

        let tempDir: string | null = null;
        try {
            tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ipbeacon-'));
            const tempFile = path.join(tempDir, 'ip.txt');
            await fs.writeFile(tempFile, address);

            await this.runner('scp', buildScpArgs(tempFile, target), { timeout: this.timeoutMs });

            logger.success(`[Push] Successfully updated server with IP: ${address}`);
            return { ok: true };
        } catch (e) {
            const error = describeFailure(e, this.timeoutMs);
            logger.error(`[Push] Failed to update server: ${error}`);
            return { ok: false, error };
        } finally {
            if (tempDir) {
                await removeTempDir(tempDir);
            }
        }
    }
}

async function removeTempDir(dir: string): Promise<void> {
    try {
        await fs.remove(dir);
    } catch (e) {
        logger.warn(`[Push] Could not remove temp directory ${dir}: ${errorMessage(e)}`);
    }
}
