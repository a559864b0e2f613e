import { randomUUID } from 'node:crypto';
import pinoHttp from 'pino-http';
import type { Logger } from '../logger';
import { fromExpress } from './express';
import type { GatewayMiddleware } from './types';

// =================================================================
// LOGGER MIDDLEWARE
// =================================================================
// Access log through pino-http. Logs once the response finishes so
// status and timing are known; 5xx → error, 4xx → warn.
// Reuses the id set by RequestIdMiddleware when it ran first.
// =================================================================

export function loggerMiddleware(logger: Logger): GatewayMiddleware {
    const httpLogger = pinoHttp({
        logger,

        customLogLevel(_req, res, err) {
            if (err) return 'error';
            if (res.statusCode >= 500) return 'error';
            if (res.statusCode >= 400) return 'warn';
            return 'info';
        },

        genReqId(req) {
            const hdr = req.headers['x-request-id'];
            return (Array.isArray(hdr) ? hdr[0] : hdr) || randomUUID();
        },

        serializers: {
            req(req: { id?: unknown; method?: string; url?: string }) {
                return { id: req.id, method: req.method, url: req.url };
            },
            res(res: { statusCode?: number }) {
                return { statusCode: res.statusCode };
            },
        },
    });

    return fromExpress('logger', httpLogger);
}
