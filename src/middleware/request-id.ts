import { randomUUID } from 'node:crypto';
import { GatewayMiddleware, GatewayContext, NextFunction } from './types';

// =================================================================
// REQUEST ID MIDDLEWARE
// =================================================================
// Propagates the caller's x-request-id or mints one. The id goes
// back to the client and on to the backend with the request.
// =================================================================

export class RequestIdMiddleware implements GatewayMiddleware {
    name = 'request-id';
    private readonly header: string;

    constructor(header = 'x-request-id') {
        this.header = header.toLowerCase();
    }

    async handle(ctx: GatewayContext, next: NextFunction): Promise<void> {
        const { req, res } = ctx;
        const incoming = req.headers[this.header];
        const id = (Array.isArray(incoming) ? incoming[0] : incoming) || randomUUID();

        ctx.requestId = id;
        req.headers[this.header] = id;
        res.setHeader(this.header, id);

        await next();
    }
}
