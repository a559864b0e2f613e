import { z } from 'zod';
import { ConfigurationError } from './errors';

// =================================================================
// PROCESS CONFIGURATION
// =================================================================
// Environment variables (a .env file is loaded by main.ts first):
//
//   GATEWAY_ADDRESS               :8080
//   GATEWAY_CERT_FILE             TLS certificate (with KEY_FILE → https)
//   GATEWAY_KEY_FILE              TLS private key
//   GATEWAY_ROUTES_FILE           JSON route list to poll
//   GATEWAY_ROUTES_POLL_MS        5000
//   GATEWAY_REMOVE_ABSENT_ROUTES  false (drain instead)
//   GATEWAY_UPSTREAM_TIMEOUT_MS   30000
//   GATEWAY_MAX_BODY_BYTES        2097152
//   GATEWAY_ADMIN_PATH            /gateway ('' disables)
//   LOG_LEVEL                     info
// =================================================================

const flag = z
    .enum(['true', 'false', '1', '0'])
    .transform(v => v === 'true' || v === '1');

const envSchema = z.object({
    GATEWAY_ADDRESS: z.string().default(':8080'),
    GATEWAY_CERT_FILE: z.string().optional(),
    GATEWAY_KEY_FILE: z.string().optional(),
    GATEWAY_ROUTES_FILE: z.string().optional(),
    GATEWAY_ROUTES_POLL_MS: z.coerce.number().int().positive().default(5_000),
    GATEWAY_REMOVE_ABSENT_ROUTES: flag.default('false'),
    GATEWAY_UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    GATEWAY_MAX_BODY_BYTES: z.coerce.number().int().positive().default(2 * 1024 * 1024),
    GATEWAY_ADMIN_PATH: z.string().default('/gateway'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface GatewayConfig {
    address: string;
    certFile?: string;
    keyFile?: string;
    routesFile?: string;
    routesPollMs: number;
    removeAbsentRoutes: boolean;
    upstreamTimeoutMs: number;
    maxRequestBodyBytes: number;
    adminPath: string;
    logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
        throw new ConfigurationError(`invalid environment (${problems.join('; ')})`);
    }

    const e = parsed.data;
    return {
        address: e.GATEWAY_ADDRESS,
        certFile: e.GATEWAY_CERT_FILE || undefined,
        keyFile: e.GATEWAY_KEY_FILE || undefined,
        routesFile: e.GATEWAY_ROUTES_FILE || undefined,
        routesPollMs: e.GATEWAY_ROUTES_POLL_MS,
        removeAbsentRoutes: e.GATEWAY_REMOVE_ABSENT_ROUTES,
        upstreamTimeoutMs: e.GATEWAY_UPSTREAM_TIMEOUT_MS,
        maxRequestBodyBytes: e.GATEWAY_MAX_BODY_BYTES,
        adminPath: e.GATEWAY_ADMIN_PATH,
        logLevel: e.LOG_LEVEL,
    };
}
