import getRawBody from 'raw-body';
import type { Request } from 'express';
import { GatewayMiddleware, GatewayContext, NextFunction } from './types';

// =================================================================
// BODY BUFFER MIDDLEWARE
// =================================================================
// Reads the request body into memory, up to the limit (413 past
// it), so a retried attempt can send it again. The bytes are kept
// exactly as received: content-encoding travels with them to the
// backend. Responses are never buffered.
// =================================================================

export class BodyBufferMiddleware implements GatewayMiddleware {
    name = 'body';

    constructor(private readonly limitBytes: number) {}

    async handle(ctx: GatewayContext, next: NextFunction): Promise<void> {
        const { req } = ctx;

        let body: Buffer;
        try {
            body = await getRawBody(req, {
                limit: this.limitBytes,
                length: req.headers['content-length'],
            });
        } catch (err) {
            await drain(req);
            throw err;
        }

        if (body.length > 0) ctx.body = body;
        await next();
    }
}

// Let the client finish sending so it can read the error response
function drain(req: Request): Promise<void> {
    if (req.readableEnded || req.destroyed) return Promise.resolve();

    return new Promise((resolve) => {
        req.once('end', resolve);
        req.once('close', resolve);
        req.resume();
    });
}
