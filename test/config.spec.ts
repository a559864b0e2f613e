import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config';
import { ConfigurationError } from '../src/errors';

describe('loadConfig', () => {
    it('fills in defaults', () => {
        expect(loadConfig({})).toEqual({
            address: ':8080',
            certFile: undefined,
            keyFile: undefined,
            routesFile: undefined,
            routesPollMs: 5_000,
            removeAbsentRoutes: false,
            upstreamTimeoutMs: 30_000,
            maxRequestBodyBytes: 2 * 1024 * 1024,
            adminPath: '/gateway',
            logLevel: 'info',
        });
    });

    it('reads overrides from the environment', () => {
        const config = loadConfig({
            GATEWAY_ADDRESS: '127.0.0.1:9000',
            GATEWAY_CERT_FILE: '/etc/gateway/tls.crt',
            GATEWAY_KEY_FILE: '/etc/gateway/tls.key',
            GATEWAY_ROUTES_FILE: './routes.json',
            GATEWAY_ROUTES_POLL_MS: '1000',
            GATEWAY_REMOVE_ABSENT_ROUTES: 'true',
            GATEWAY_UPSTREAM_TIMEOUT_MS: '2500',
            GATEWAY_MAX_BODY_BYTES: '1024',
            GATEWAY_ADMIN_PATH: '',
            LOG_LEVEL: 'debug',
        });

        expect(config).toEqual({
            address: '127.0.0.1:9000',
            certFile: '/etc/gateway/tls.crt',
            keyFile: '/etc/gateway/tls.key',
            routesFile: './routes.json',
            routesPollMs: 1_000,
            removeAbsentRoutes: true,
            upstreamTimeoutMs: 2_500,
            maxRequestBodyBytes: 1_024,
            adminPath: '',
            logLevel: 'debug',
        });
    });

    it('rejects invalid values, naming the variable', () => {
        expect(() => loadConfig({ GATEWAY_ROUTES_POLL_MS: 'soon' })).toThrow(ConfigurationError);
        expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
        expect(() => loadConfig({ GATEWAY_REMOVE_ABSENT_ROUTES: 'yes' })).toThrow(/GATEWAY_REMOVE_ABSENT_ROUTES/);
    });
});
