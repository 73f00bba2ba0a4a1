import axios from 'axios';
import type { ProbeSource } from '../../shared/types';
import { errorMessage } from '../../shared/utils/errors';
import { parseAddress } from '../../shared/utils/ipv4';
import { IP_SOURCES, PROBE_SOURCE_TIMEOUT_MS, PROBE_REQUEST_TIMEOUT_MS } from './constants';
import { logger } from './logger';

export interface ProberOptions {
    sources?: readonly ProbeSource[];
    requestTimeoutMs?: number;
    sourceTimeoutMs?: number;
}

/**
 * Asks echo services for our public address, in order, until one answers
 * with a valid IPv4 address.
 */
export class AddressProber {
    private readonly sources: readonly ProbeSource[];
    private readonly requestTimeoutMs: number;
    private readonly sourceTimeoutMs: number;

    constructor(options: ProberOptions = {}) {
        this.sources = options.sources ?? IP_SOURCES;
        this.requestTimeoutMs = options.requestTimeoutMs ?? PROBE_REQUEST_TIMEOUT_MS;
        this.sourceTimeoutMs = options.sourceTimeoutMs ?? PROBE_SOURCE_TIMEOUT_MS;
    }

    public async probe(): Promise<string | null> {
        for (const source of this.sources) {
            const ip = await this.querySource(source);
            if (ip) return ip;
        }
        return null;
    }

    private async querySource(source: ProbeSource): Promise<string | null> {
        // Hard cap per source, on top of the axios timeout.
        const limit = new AbortController();
        const timer = setTimeout(() => limit.abort(), this.sourceTimeoutMs);
        try {
            const response = await axios.get<unknown>(source.url, {
                timeout: this.requestTimeoutMs,
                signal: limit.signal,
                headers: { Accept: 'text/plain, application/json' },
            });

            const ip = extractAddress(response.data);
            if (!ip) {
                logger.warn(`[Prober] Source ${source.name} returned no valid IPv4 address.`);
            }
            return ip;
        } catch (e) {
            logger.warn(`[Prober] Failed to get IP from ${source.name}: ${errorMessage(e)}`);
            return null;
        } finally {
            clearTimeout(timer);
        }
    }
}

/** Accepts a plain-text body or a JSON body of the form { "ip": "..." }. */
export function extractAddress(data: unknown): string | null {
    if (typeof data === 'string') {
        return parseAddress(data);
    }
    if (data && typeof data === 'object' && 'ip' in data) {
        return parseAddress(data.ip);
    }
    return null;
}
