import fs from 'fs-extra';
import path from 'path';
import { errorMessage, isErrnoException } from '../../shared/utils/errors';
import { isValidIPv4, parseAddress } from '../../shared/utils/ipv4';
import { logger } from './logger';

/**
 * Single-value store for the last address the server accepted.
 * Neither method throws.
 */
export class CacheStore {
    constructor(public readonly filePath: string) {}

    public async read(): Promise<string | null> {
        let raw: string;
        try {
            raw = await fs.readFile(this.filePath, 'utf8');
        } catch (e) {
            if (!(isErrnoException(e) && e.code === 'ENOENT')) {
                logger.warn(`[Cache] Error reading cache ${this.filePath}: ${errorMessage(e)}`);
            }
            return null;
        }

        const address = parseAddress(raw);
        if (!address && raw.trim()) {
            logger.warn(`[Cache] Ignoring invalid cached value in ${this.filePath}`);
        }
        return address;
    }

    public async write(address: string): Promise<boolean> {
        if (!isValidIPv4(address)) {
            logger.error(`[Cache] Refusing to cache invalid address "${address}"`);
            return false;
        }

        // Write beside the target, then rename over it so a reader never sees a partial value.
        const tempFile = `${this.filePath}.tmp-${process.pid}`;
        try {
            await fs.ensureDir(path.dirname(this.filePath));
            await fs.writeFile(tempFile, address);
            await fs.rename(tempFile, this.filePath);
            return true;
        } catch (e) {
            logger.error(`[Cache] Error writing cache ${this.filePath}: ${errorMessage(e)}`);
            await fs.remove(tempFile).catch((cleanupErr: unknown) => {
                logger.debug(`[Cache] Could not remove ${tempFile}: ${errorMessage(cleanupErr)}`);
            });
            return false;
        }
    }
}
