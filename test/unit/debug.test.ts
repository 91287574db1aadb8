import { afterEach, describe, expect, it } from 'vitest';

import { readDebugFlag } from '../../src/utils';

describe('readDebugFlag', () => {
    afterEach(() => {
        delete process.env.VITE_DEBUG;
        delete import.meta.env.VITE_DEBUG;
    });

    it('is off without VITE_DEBUG', () => {
        delete process.env.VITE_DEBUG;
        delete import.meta.env.VITE_DEBUG;
        expect(readDebugFlag()).toBe(false);
    });

    it('reads VITE_DEBUG from process.env', () => {
        process.env.VITE_DEBUG = 'true';
        expect(readDebugFlag()).toBe(true);
    });

    it('reads VITE_DEBUG from import.meta.env', () => {
        delete process.env.VITE_DEBUG;
        import.meta.env.VITE_DEBUG = 'true';
        expect(readDebugFlag()).toBe(true);
    });
});
