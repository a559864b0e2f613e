import type { Response } from 'express';
import { toHttpError } from '../errors';

/**
 * Answer with the error's fallback response. Once headers are out
 * there is nothing left to say, so the connection is cut instead.
 */
export function sendError(res: Response, err: unknown): void {
    if (res.headersSent) {
        res.destroy();
        return;
    }

    const { status, body } = toHttpError(err);
    res.status(status).json(body);
}
