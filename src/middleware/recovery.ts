import type { Logger } from '../logger';
import { toHttpError } from '../errors';
import { sendError } from './respond';
import { GatewayMiddleware, GatewayContext, NextFunction } from './types';

// =================================================================
// RECOVERY MIDDLEWARE
// =================================================================
// Anything thrown further down the chain ends here and becomes an
// HTTP response. Internal messages never reach the client.
// =================================================================

export class RecoveryMiddleware implements GatewayMiddleware {
    name = 'recovery';

    constructor(private logger: Logger) {}

    async handle(ctx: GatewayContext, next: NextFunction): Promise<void> {
        try {
            await next();
        } catch (err) {
            const { status } = toHttpError(err);
            const fields = {
                err,
                route: ctx.route,
                requestId: ctx.requestId,
                target: ctx.target?.href,
                attempts: ctx.attempts,
            };
            if (status >= 500) {
                this.logger.error(fields, 'request handling failed');
            } else {
                this.logger.warn(fields, 'request rejected');
            }
            sendError(ctx.res, err);
        }
    }
}
