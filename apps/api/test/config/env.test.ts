import { DEFAULT_ALLOWED_ORIGINS, loadConfig, parseOrigins } from '../../src/config/env';

describe('loadConfig', () => {
    it('applies defaults around the required API key', () => {
        const config = loadConfig({ OPENAI_API_KEY: 'test-secret' });

        expect(config).toEqual({
            openai: {
                apiKey: 'test-secret',
                model: 'gpt-4o-mini-2024-07-18',
                baseUrl: 'https://api.openai.com/v1',
                timeoutMs: 60000,
            },
            redis: {
                host: 'localhost',
                port: 6379,
                password: undefined,
            },
            allowedOrigins: DEFAULT_ALLOWED_ORIGINS,
            port: 8002,
            trustProxy: false,
            logLevel: 'info',
            skipStartupProbe: false,
        });
    });

    it('reads overrides from the environment', () => {
        const config = loadConfig({
            OPENAI_API_KEY: 'test-secret',
            OPENAI_BASE_URL: 'http://localhost:11434/v1/',
            REDIS_HOST: 'cache.internal',
            REDIS_PORT: '6380',
            REDIS_PASSWORD: 'test-password',
            PORT: '10000',
            TRUST_PROXY: 'true',
            ALLOWED_ORIGINS: 'https://app.example.test, https://admin.example.test',
        });

        expect(config.openai.baseUrl).toBe('http://localhost:11434/v1');
        expect(config.redis).toEqual({ host: 'cache.internal', port: 6380, password: 'test-password' });
        expect(config.port).toBe(10000);
        expect(config.trustProxy).toBe(true);
        expect(config.allowedOrigins).toEqual(['https://app.example.test', 'https://admin.example.test']);
    });

    it('lists every invalid variable', () => {
        expect(() => loadConfig({ OPENAI_API_KEY: '  ', PORT: 'eighty' })).toThrow(
            'Invalid configuration: OPENAI_API_KEY: OPENAI_API_KEY is required; PORT: Expected number, received nan'
        );
    });
});

describe('parseOrigins', () => {
    it('falls back to the local defaults for an empty list', () => {
        expect(parseOrigins(' , ')).toEqual(DEFAULT_ALLOWED_ORIGINS);
    });
});
