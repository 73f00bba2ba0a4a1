import { describe, expect, it } from 'vitest';
import { resolveServerConfig } from './config';
import { AppError } from './utils/AppError';

describe('resolveServerConfig', () => {
    it('parses the port', () => {
        expect(resolveServerConfig({ port: '8080', bind: '0.0.0.0', ipFile: '/var/www/html/myip.txt' })).toEqual({
            port: 8080,
            bind: '0.0.0.0',
            ipFile: '/var/www/html/myip.txt',
        });
    });

    it.each(['0', '65536', 'http', '80.5', ''])('rejects port %j', (port) => {
        const resolve = () => resolveServerConfig({ port, bind: '0.0.0.0', ipFile: '/var/www/html/myip.txt' });
        expect(resolve).toThrow(AppError);
        expect(resolve).toThrow(/Invalid --port/);
    });

    it('rejects an empty ip file path', () => {
        expect(() => resolveServerConfig({ port: '8080', bind: '0.0.0.0', ipFile: ' ' })).toThrow(/--ip-file/);
    });
});
