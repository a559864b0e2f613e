// =================================================================
// MIDDLEWARE TYPES
// =================================================================
//
// Every stage receives a GatewayContext and a next() function.
// A stage that does not call next() ends the chain; that is how the
// fallback and breaker stages answer without touching a backend.
//
// GatewayContext carries data between stages:
//   - The Express req/res
//   - Route name and the path to forward
//   - Buffered request body (for replay on retry)
//   - Selected target, attempt count and final outcome
// =================================================================

import type { Request, Response } from 'express';

export type ProxyOutcome = 'success' | 'network-error' | 'no-backend' | 'cancelled';

export interface GatewayContext {
    req: Request;
    res: Response;

    route: string;
    path: string;

    // Aborted when the client disconnects before the response finished
    signal: AbortSignal;

    // Set by stages as the request flows through
    requestId?: string;
    body?: Buffer;
    target?: URL;
    attempts: number;
    outcome?: ProxyOutcome;
}

export type NextFunction = () => Promise<void>;

export interface GatewayMiddleware {
    name: string;
    handle(ctx: GatewayContext, next: NextFunction): Promise<void>;
}
