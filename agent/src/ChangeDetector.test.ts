import { describe, expect, it } from 'vitest';
import { hasChanged } from './ChangeDetector';

describe('hasChanged', () => {
    it('forces a push when nothing is cached', () => {
        expect(hasChanged('203.0.113.5', null)).toBe(true);
    });

    it('compares addresses as strings', () => {
        expect(hasChanged('203.0.113.5', '203.0.113.5')).toBe(false);
        expect(hasChanged('203.0.113.6', '203.0.113.5')).toBe(true);
    });
});
