import type { Request, Response } from 'express';
import type { GatewayMiddleware } from './types';

export type ExpressHandler = (
    req: Request,
    res: Response,
    next: (err?: unknown) => void,
) => unknown;

/**
 * Run a connect-style handler (pino-http, body parsers, auth) as a
 * pipeline stage. If the handler answers without calling next, the
 * stage settles when the response closes.
 */
export function fromExpress(name: string, handler: ExpressHandler): GatewayMiddleware {
    return {
        name,
        handle(ctx, next) {
            return new Promise<void>((resolve, reject) => {
                const { req, res } = ctx;
                const ended = () => resolve();
                res.once('close', ended);

                const proceed = (err?: unknown) => {
                    res.off('close', ended);
                    if (err) {
                        reject(err);
                        return;
                    }
                    next().then(resolve, reject);
                };

                try {
                    const result = handler(req, res, proceed);
                    if (result instanceof Promise) result.catch(reject);
                } catch (err) {
                    res.off('close', ended);
                    reject(err);
                }
            });
        },
    };
}
