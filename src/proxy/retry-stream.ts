import type { IncomingMessage } from 'node:http';
import { pipeline } from 'node:stream/promises';
import { NetworkError } from '../errors';
import type { LoadBalancer } from '../load-balancers/types';
import type { Logger } from '../logger';
import type { GatewayContext } from '../middleware/types';
import { forward, stripHopByHop } from './forward';

// =================================================================
// RETRY-STREAM WRAPPER
// =================================================================
//
//   attempt 1: next() → forward ── network error ──┐
//   attempt 2: next() → forward ◀──────────────────┘ (maybe another target)
//               └─ headers in → pipe body to client, no more retries
//
// Only transport failures before response headers are retried.
// A backend 4xx/5xx is a response like any other and goes straight
// through. A client that goes away ends everything, no retry.
// =================================================================

export interface RetryStreamOptions {
    maxAttempts: number;
    upstreamTimeoutMs: number;
}

export class RetryStream {
    private readonly maxAttempts: number;

    constructor(
        private pool: LoadBalancer,
        private options: RetryStreamOptions,
        private logger: Logger,
    ) {
        this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    }

    async serve(ctx: GatewayContext): Promise<void> {
        const { req } = ctx;

        for (let attempt = 1; ; attempt++) {
            if (ctx.signal.aborted) {
                ctx.outcome = 'cancelled';
                return;
            }

            let target: URL;
            try {
                target = this.pool.next();
            } catch (err) {
                ctx.outcome = 'no-backend';
                throw err;
            }
            ctx.target = target;
            ctx.attempts = attempt;

            let upstream: IncomingMessage;
            try {
                upstream = await forward({
                    route: ctx.route,
                    target,
                    method: req.method,
                    path: ctx.path,
                    headers: req.headers,
                    body: ctx.body,
                    remoteAddress: req.socket.remoteAddress,
                    protocol: req.protocol,
                    timeoutMs: this.options.upstreamTimeoutMs,
                    signal: ctx.signal,
                });
            } catch (err) {
                if (ctx.signal.aborted) {
                    ctx.outcome = 'cancelled';
                    return;
                }
                if (!(err instanceof NetworkError)) throw err;

                const fields = { route: ctx.route, target: target.href, attempt, code: err.code, requestId: ctx.requestId };
                if (attempt >= this.maxAttempts) {
                    ctx.outcome = 'network-error';
                    this.logger.warn(fields, 'backend unreachable, giving up');
                    throw err;
                }
                this.logger.warn(fields, 'backend unreachable, retrying');
                continue;
            }

            ctx.outcome = 'success';
            await this.stream(ctx, upstream);
            return;
        }
    }

    private async stream(ctx: GatewayContext, upstream: IncomingMessage): Promise<void> {
        const { res } = ctx;

        res.writeHead(upstream.statusCode ?? 502, stripHopByHop(upstream.headers));

        try {
            await pipeline(upstream, res);
        } catch (err) {
            // Headers are gone; pipeline has already torn down both sides
            if (ctx.signal.aborted) {
                this.logger.debug({ route: ctx.route, requestId: ctx.requestId }, 'client went away mid-stream');
            } else {
                this.logger.warn({ err, route: ctx.route, requestId: ctx.requestId }, 'response stream interrupted');
            }
        }
    }
}
