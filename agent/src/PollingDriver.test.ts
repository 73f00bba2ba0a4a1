import { describe, expect, it, vi } from 'vitest';
import type { PushResult, PushTarget } from '../../shared/types';
import { isSuccessfulOutcome, type PollingDeps, PollingDriver } from './PollingDriver';

const target: PushTarget = {
    host: 'beacon@server.example.com',
    remotePath: '/var/www/html/myip.txt',
    strictHostKeyChecking: true,
};

type CacheDep = PollingDeps['cache'];

class MemoryCache implements CacheDep {
    public writes = 0;

    constructor(public value: string | null = null, private readonly failWrites = false) {}

    async read() {
        return this.value;
    }

    async write(address: string) {
        if (this.failWrites) return false;
        this.writes++;
        this.value = address;
        return true;
    }
}

const fixedProber = (value: string | null) => ({ probe: vi.fn(async () => value) });

const okTransport = () => ({ push: vi.fn(async (): Promise<PushResult> => ({ ok: true })) });
const failingTransport = () => ({ push: vi.fn(async (): Promise<PushResult> => ({ ok: false, error: 'Permission denied' })) });

const onceOptions = { target, intervalSeconds: 300, once: true };

describe('PollingDriver.runCycle', () => {
    it('pushes and caches when nothing is cached yet', async () => {
        const cache = new MemoryCache();
        const transport = okTransport();
        const driver = new PollingDriver({ prober: fixedProber('203.0.113.5'), cache, transport }, onceOptions);

        expect(await driver.runCycle()).toBe('pushed');
        expect(transport.push).toHaveBeenCalledWith('203.0.113.5', target);
        expect(cache.value).toBe('203.0.113.5');
    });

    it('never pushes or rewrites the cache while the address is unchanged', async () => {
        const cache = new MemoryCache('203.0.113.5');
        const transport = okTransport();
        const driver = new PollingDriver({ prober: fixedProber('203.0.113.5'), cache, transport }, onceOptions);

        for (let i = 0; i < 3; i++) {
            expect(await driver.runCycle()).toBe('unchanged');
        }
        expect(transport.push).not.toHaveBeenCalled();
        expect(cache.writes).toBe(0);
    });

    it('leaves the cache untouched when the push fails', async () => {
        const cache = new MemoryCache('203.0.113.5');
        const driver = new PollingDriver(
            { prober: fixedProber('198.51.100.7'), cache, transport: failingTransport() },
            onceOptions
        );

        expect(await driver.runCycle()).toBe('push-failed');
        expect(cache.value).toBe('203.0.113.5');
        expect(cache.writes).toBe(0);
    });

    it('skips the push when probing fails', async () => {
        const cache = new MemoryCache('203.0.113.5');
        const transport = okTransport();
        const driver = new PollingDriver({ prober: fixedProber(null), cache, transport }, onceOptions);

        expect(await driver.runCycle()).toBe('probe-failed');
        expect(transport.push).not.toHaveBeenCalled();
    });

    it('reports a cache failure after a successful push', async () => {
        const cache = new MemoryCache(null, true);
        const driver = new PollingDriver({ prober: fixedProber('203.0.113.5'), cache, transport: okTransport() }, onceOptions);

        expect(await driver.runCycle()).toBe('cache-failed');
    });

    it('does not push once stopped between steps', async () => {
        const transport = okTransport();
        const cache = new MemoryCache();
        let driver: PollingDriver | null = null;
        const prober = {
            probe: vi.fn(async () => {
                driver?.stop();
                return '203.0.113.5';
            }),
        };
        driver = new PollingDriver({ prober, cache, transport }, onceOptions);

        expect(await driver.runCycle()).toBe('interrupted');
        expect(transport.push).not.toHaveBeenCalled();
        expect(cache.value).toBeNull();
    });
});

describe('PollingDriver.run', () => {
    it('exits 0 after a successful single run', async () => {
        const driver = new PollingDriver(
            { prober: fixedProber('203.0.113.5'), cache: new MemoryCache(), transport: okTransport() },
            onceOptions
        );
        expect(await driver.run()).toBe(0);
    });

    it('exits 0 for a single run with nothing to push', async () => {
        const driver = new PollingDriver(
            { prober: fixedProber('203.0.113.5'), cache: new MemoryCache('203.0.113.5'), transport: okTransport() },
            onceOptions
        );
        expect(await driver.run()).toBe(0);
    });

    it.each([
        ['probe failure', fixedProber(null), new MemoryCache(), okTransport()],
        ['push failure', fixedProber('203.0.113.5'), new MemoryCache(), failingTransport()],
        ['cache failure', fixedProber('203.0.113.5'), new MemoryCache(null, true), okTransport()],
    ])('exits 1 on a single-run %s', async (_label, prober, cache, transport) => {
        const driver = new PollingDriver({ prober, cache, transport }, onceOptions);
        expect(await driver.run()).toBe(1);
    });

    it('exits 1 when a single run throws', async () => {
        const prober = { probe: vi.fn(async (): Promise<string | null> => { throw new Error('boom'); }) };
        const driver = new PollingDriver({ prober, cache: new MemoryCache(), transport: okTransport() }, onceOptions);
        expect(await driver.run()).toBe(1);
    });

    it('converges on the latest address and retries failed pushes', async () => {
        const results = ['203.0.113.5', null, '198.51.100.7', '198.51.100.7', '198.51.100.7', '198.51.100.7'];
        let calls = 0;
        let driver: PollingDriver | null = null;
        const prober = {
            probe: vi.fn(async () => {
                const value = results[calls++];
                if (calls === results.length) driver?.stop();
                return value;
            }),
        };
        const cache = new MemoryCache();
        const push = vi
            .fn(async (_address: string, _target: PushTarget): Promise<PushResult> => ({ ok: true }))
            .mockResolvedValueOnce({ ok: true })
            .mockResolvedValueOnce({ ok: false, error: 'Connection timed out' });
        driver = new PollingDriver({ prober, cache, transport: { push } }, { target, intervalSeconds: 0.001, once: false });

        expect(await driver.run()).toBe(0);
        expect(push.mock.calls.map(([address]) => address)).toEqual(['203.0.113.5', '198.51.100.7', '198.51.100.7']);
        expect(cache.value).toBe('198.51.100.7');
        expect(cache.writes).toBe(2);
    });

    it('keeps looping after a cycle throws', async () => {
        let calls = 0;
        let driver: PollingDriver | null = null;
        const prober = {
            probe: vi.fn(async (): Promise<string | null> => {
                calls++;
                if (calls === 1) throw new Error('boom');
                driver?.stop();
                return '203.0.113.5';
            }),
        };
        driver = new PollingDriver(
            { prober, cache: new MemoryCache(), transport: okTransport() },
            { target, intervalSeconds: 0.001, once: false }
        );

        expect(await driver.run()).toBe(0);
        expect(prober.probe).toHaveBeenCalledTimes(2);
    });

    it('wakes from the interval sleep when stopped', async () => {
        const cache = new MemoryCache();
        const driver = new PollingDriver(
            { prober: fixedProber('203.0.113.5'), cache, transport: okTransport() },
            { target, intervalSeconds: 3600, once: false }
        );

        const running = driver.run();
        await vi.waitFor(() => expect(cache.writes).toBe(1));
        driver.stop();

        await expect(running).resolves.toBe(0);
    });
});

describe('isSuccessfulOutcome', () => {
    it('treats only unchanged and pushed as success', () => {
        expect(isSuccessfulOutcome('pushed')).toBe(true);
        expect(isSuccessfulOutcome('unchanged')).toBe(true);
        expect(isSuccessfulOutcome('push-failed')).toBe(false);
        expect(isSuccessfulOutcome('cache-failed')).toBe(false);
        expect(isSuccessfulOutcome('probe-failed')).toBe(false);
    });
});
