import type { ErrorRequestHandler, RequestHandler } from 'express';
import { NoRouteMatchedError, toHttpError } from '../errors';
import type { Logger } from '../logger';
import { sendError } from '../middleware/respond';
import type { RouteTable } from './route-table';
import type { ProxyRouter } from './router';

// =================================================================
// DISPATCHER
// =================================================================
// Matches the request against the router and hands it to that
// route's pipeline. No match is a 404, never a 5xx.
// =================================================================

export function dispatcher(router: ProxyRouter, table: RouteTable): RequestHandler {
    return (req, res, next) => {
        const host = req.headers.host;
        const match = router.match(host, req.originalUrl);
        const pipeline = match ? table.get(match.name) : undefined;

        if (!match || !pipeline) {
            next(new NoRouteMatchedError(host ?? '', req.path));
            return;
        }

        pipeline.handle(req, res, match.path).catch(next);
    };
}

/** Last line of defence for anything the route pipelines did not answer. */
export function errorHandler(logger: Logger): ErrorRequestHandler {
    return (err: unknown, req, res, _next) => {
        const { status } = toHttpError(err);
        if (status >= 500) {
            logger.error({ err, method: req.method, url: req.originalUrl }, 'unhandled gateway error');
        } else {
            logger.debug({ method: req.method, url: req.originalUrl, status }, 'request not routed');
        }
        sendError(res, err);
    };
}
