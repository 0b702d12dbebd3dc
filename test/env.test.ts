import { afterEach, describe, expect, it, vi } from 'vitest';

describe('config', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
        vi.resetModules();
    });

    it('treats an unset NODE_ENV as production', async () => {
        vi.stubEnv('NODE_ENV', '');
        vi.resetModules();
        const { config } = await import('../src/config/env');

        expect(config.nodeEnv).toBe('production');
    });

    it('reads an explicit NODE_ENV', async () => {
        vi.stubEnv('NODE_ENV', 'development');
        vi.resetModules();
        const { config } = await import('../src/config/env');

        expect(config.nodeEnv).toBe('development');
    });
});
