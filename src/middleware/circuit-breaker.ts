import { CircuitTrippedError } from '../errors';
import type { Admission, CircuitBreaker } from '../circuit-breaker/circuit-breaker';
import { sendError } from './respond';
import { GatewayMiddleware, GatewayContext, NextFunction, ProxyOutcome } from './types';

// =================================================================
// CIRCUIT BREAKER MIDDLEWARE
// =================================================================
// Asks the route's breaker before anything is forwarded. A tripped
// breaker answers 503 without contacting a backend. Otherwise the
// outcome the proxy stage leaves on the context is reported back.
// =================================================================

export class CircuitBreakerMiddleware implements GatewayMiddleware {
    name = 'circuit-breaker';

    constructor(private breaker: CircuitBreaker) {}

    async handle(ctx: GatewayContext, next: NextFunction): Promise<void> {
        const admission = this.breaker.canRequest();
        if (!admission) {
            sendError(ctx.res, new CircuitTrippedError(ctx.route));
            return;
        }

        try {
            await next();
        } finally {
            this.settle(admission, ctx.outcome);
        }
    }

    private settle(admission: Admission, outcome: ProxyOutcome | undefined): void {
        switch (outcome) {
        case 'success':
            this.breaker.onSuccess(admission);
            break;
        case 'network-error':
            this.breaker.onFailure(admission);
            break;
        default:
            this.breaker.onAbandoned(admission);
        }
    }
}
