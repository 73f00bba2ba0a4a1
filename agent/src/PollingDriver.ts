import { setTimeout as delay } from 'timers/promises';
import type { CycleOutcome, PushResult, PushTarget } from '../../shared/types';
import { errorMessage } from '../../shared/utils/errors';
import { hasChanged } from './ChangeDetector';
import { logger } from './logger';

export interface PollingDeps {
    prober: { probe(): Promise<string | null> };
    cache: { read(): Promise<string | null>; write(address: string): Promise<boolean> };
    transport: { push(address: string, target: PushTarget): Promise<PushResult> };
}

export interface PollingOptions {
    target: PushTarget;
    intervalSeconds: number;
    once: boolean;
}

export function isSuccessfulOutcome(outcome: CycleOutcome): boolean {
    return outcome === 'unchanged' || outcome === 'pushed';
}

/**
 * Probe → compare → push → cache, once or on a fixed interval.
 * The cache only moves forward after the server has the new value.
 */
export class PollingDriver {
    private readonly abort = new AbortController();

    constructor(private readonly deps: PollingDeps, private readonly options: PollingOptions) {}

    public get stopped(): boolean {
        return this.abort.signal.aborted;
    }

    /** Ends the loop; a pending sleep resolves immediately. */
    public stop(): void {
        this.abort.abort();
    }

    public async runCycle(): Promise<CycleOutcome> {
        const currentIp = await this.deps.prober.probe();
        if (!currentIp) {
            logger.error('Failed to get public IP address');
            return 'probe-failed';
        }
        logger.info(`Current public IP: ${currentIp}`);
        if (this.stopped) return 'interrupted';

        const cachedIp = await this.deps.cache.read();
        if (!hasChanged(currentIp, cachedIp)) {
            logger.info('IP unchanged');
            return 'unchanged';
        }
        if (this.stopped) return 'interrupted';

        logger.info(`IP changed from ${cachedIp ?? 'none'} to ${currentIp}`);
        const result = await this.deps.transport.push(currentIp, this.options.target);
        if (!result.ok) {
            logger.error('Failed to update server; cache left unchanged');
            return 'push-failed';
        }

        if (!(await this.deps.cache.write(currentIp))) {
            logger.warn('Server updated but the cache could not be written; the next cycle will push again');
            return 'cache-failed';
        }
        return 'pushed';
    }

    /** @returns the process exit code */
    public async run(): Promise<number> {
        while (!this.stopped) {
            let outcome: CycleOutcome;
            try {
                outcome = await this.runCycle();
            } catch (e) {
                logger.error(`Unexpected error: ${errorMessage(e)}`);
                if (this.options.once) return 1;
                outcome = 'probe-failed';
            }

            if (this.options.once) {
                return outcome === 'interrupted' || isSuccessfulOutcome(outcome) ? 0 : 1;
            }

            await this.sleep(this.options.intervalSeconds * 1000);
        }

        logger.info('Shutting down...');
        return 0;
    }

    private async sleep(ms: number): Promise<void> {
        try {
            await delay(ms, undefined, { signal: this.abort.signal });
        } catch (e) {
            if (!this.stopped) throw e;
        }
    }
}
