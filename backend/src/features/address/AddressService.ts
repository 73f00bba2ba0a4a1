import fs from 'fs-extra';
import { ERROR_CODES } from '../../../../shared/errorCodes';
import { errorMessage, isErrnoException } from '../../../../shared/utils/errors';
import { parseAddress } from '../../../../shared/utils/ipv4';
import { AppError } from '../../utils/AppError';
import { logger } from '../../utils/logger';

/**
 * Reads the address the agent pushed. The file is written by another host,
 * so its content is validated on every read.
 */
export class AddressService {
    constructor(private readonly ipFile: string) {}

    public async getCurrentAddress(): Promise<string> {
        let raw: string;
        try {
            raw = await fs.readFile(this.ipFile, 'utf8');
        } catch (e) {
            if (isErrnoException(e) && e.code === 'ENOENT') {
                throw new AppError(503, 'E_IP_UNAVAILABLE', ERROR_CODES.E_IP_UNAVAILABLE.message);
            }
            logger.error(`[AddressService] Error reading IP file ${this.ipFile}: ${errorMessage(e)}`);
            throw new AppError(500, 'E_FILE_ACCESS', ERROR_CODES.E_FILE_ACCESS.message);
        }

        const address = parseAddress(raw);
        if (!address) {
            logger.error(`[AddressService] Invalid IP address in file: ${JSON.stringify(raw.trim())}`);
            throw new AppError(500, 'E_IP_INVALID', ERROR_CODES.E_IP_INVALID.message);
        }
        return address;
    }
}
