import { describe, expect, it } from 'vitest';
import { isValidIPv4, parseAddress } from './ipv4';

describe('isValidIPv4', () => {
    it.each(['0.0.0.0', '203.0.113.5', '255.255.255.255', '10.0.0.1', '198.51.100.99'])('accepts %s', (value) => {
        expect(isValidIPv4(value)).toBe(true);
    });

    it.each([
        '',
        'not-an-ip',
        '256.1.1.1',
        '1.2.3',
        '1.2.3.4.5',
        '1..3.4',
        '01.2.3.4',
        '1.2.3.004',
        '-1.2.3.4',
        '+1.2.3.4',
        ' 1.2.3.4',
        '1.2.3.4\n',
        '1.2.3.4a',
        '::1',
        '1.2.3.1000',
    ])('rejects %j', (value) => {
        expect(isValidIPv4(value)).toBe(false);
    });
});

describe('parseAddress', () => {
    it('trims surrounding whitespace from file and body content', () => {
        expect(parseAddress('203.0.113.5\n')).toBe('203.0.113.5');
        expect(parseAddress('  198.51.100.7  ')).toBe('198.51.100.7');
    });

    it('returns null for invalid or non-string input', () => {
        expect(parseAddress('not-an-ip')).toBeNull();
        expect(parseAddress('')).toBeNull();
        expect(parseAddress(null)).toBeNull();
        expect(parseAddress(42)).toBeNull();
    });
});
