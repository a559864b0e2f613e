import { NoHealthyBackendError } from '../errors';
import type { LoadBalancer } from '../load-balancers/types';
import { sendError } from './respond';
import { GatewayMiddleware, GatewayContext, NextFunction } from './types';

// =================================================================
// BAD GATEWAY FALLBACK
// =================================================================
// A drained or never-populated pool answers 502 right away, before
// the breaker or any backend is involved.
// =================================================================

export class BadGatewayMiddleware implements GatewayMiddleware {
    name = 'bad-gateway';

    constructor(private pool: LoadBalancer) {}

    async handle(ctx: GatewayContext, next: NextFunction): Promise<void> {
        if (this.pool.size === 0) {
            ctx.outcome = 'no-backend';
            sendError(ctx.res, new NoHealthyBackendError(ctx.route));
            return;
        }

        await next();
    }
}
