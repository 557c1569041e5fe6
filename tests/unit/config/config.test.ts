import { Config, getConfig, loadConfig, resetConfig, validateConfig } from '../../../src/config';

const MANAGED_KEYS = [
    'PORT',
    'HOST',
    'NODE_ENV',
    'CORS_ORIGINS',
    'SCRAPER_TIMEOUT_MS',
    'SCRAPER_USER_AGENT',
    'SCRAPER_MAX_REDIRECTS',
];

describe('config', () => {
    const saved: Record<string, string | undefined> = {};

    beforeEach(() => {
        for (const key of MANAGED_KEYS) {
            saved[key] = process.env[key];
            delete process.env[key];
        }
        resetConfig();
    });

    afterEach(() => {
        for (const key of MANAGED_KEYS) {
            if (saved[key] === undefined) {
                delete process.env[key];
            } else {
                process.env[key] = saved[key];
            }
        }
        resetConfig();
    });

    describe('loadConfig', () => {
        test('uses defaults when nothing is set', () => {
            expect(loadConfig()).toEqual({
                port: 8000,
                host: '0.0.0.0',
                environment: 'development',
                corsOrigins: ['*'],
                scraper: {
                    timeoutMs: 10000,
                    userAgent: 'AdmissionAnnouncementsBot/1.0',
                    maxRedirects: 5,
                },
            });
        });

        test('reads overrides from the environment', () => {
            process.env.PORT = '9100';
            process.env.HOST = '127.0.0.1';
            process.env.NODE_ENV = 'production';
            process.env.SCRAPER_TIMEOUT_MS = '2500';
            process.env.SCRAPER_MAX_REDIRECTS = '0';

            const config = loadConfig();

            expect(config.port).toBe(9100);
            expect(config.host).toBe('127.0.0.1');
            expect(config.environment).toBe('production');
            expect(config.scraper.timeoutMs).toBe(2500);
            expect(config.scraper.maxRedirects).toBe(0);
        });

        test('strips whitespace and wrapping quotes', () => {
            process.env.SCRAPER_USER_AGENT = '  "NoticeReader/2.0"  ';
            expect(loadConfig().scraper.userAgent).toBe('NoticeReader/2.0');
        });

        test('splits the CORS origin list', () => {
            process.env.CORS_ORIGINS = 'https://a.example.test, https://b.example.test,,';
            expect(loadConfig().corsOrigins).toEqual(['https://a.example.test', 'https://b.example.test']);
        });

        test('rejects non-numeric numbers', () => {
            process.env.SCRAPER_TIMEOUT_MS = 'soon';
            expect(() => loadConfig()).toThrow('Environment variable SCRAPER_TIMEOUT_MS must be a number, got: soon');
        });
    });

    describe('validateConfig', () => {
        const valid = (): Config => ({
            port: 8000,
            host: '0.0.0.0',
            environment: 'test',
            corsOrigins: ['*'],
            scraper: { timeoutMs: 10000, userAgent: 'TestBot/1.0', maxRedirects: 5 },
        });

        test('accepts the defaults', () => {
            expect(validateConfig(valid())).toEqual([]);
        });

        test('reports every invalid value', () => {
            const config = valid();
            config.port = 70000;
            config.scraper.timeoutMs = 0;
            config.scraper.maxRedirects = -1;
            config.corsOrigins = [];

            expect(validateConfig(config)).toEqual([
                'PORT must be an integer between 1 and 65535, got: 70000',
                'SCRAPER_TIMEOUT_MS must be positive, got: 0',
                'SCRAPER_MAX_REDIRECTS must be a non-negative integer, got: -1',
                'CORS_ORIGINS must name at least one origin (use * to allow any)',
            ]);
        });
    });

    describe('getConfig', () => {
        test('caches until reset', () => {
            process.env.PORT = '8100';
            const first = getConfig();
            process.env.PORT = '8200';

            expect(getConfig()).toBe(first);
            expect(getConfig().port).toBe(8100);

            resetConfig();
            expect(getConfig().port).toBe(8200);
        });
    });
});
