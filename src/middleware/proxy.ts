import { NetworkError, NoHealthyBackendError } from '../errors';
import type { RetryStream } from '../proxy/retry-stream';
import { sendError } from './respond';
import { GatewayMiddleware, GatewayContext } from './types';

// =================================================================
// PROXY MIDDLEWARE — Final step in the pipeline
// =================================================================
// Hands the request to the retry-stream wrapper. Exhausted retries
// and a pool drained mid-request become 502s here; anything else is
// a fault for the recovery stage.
// =================================================================

export class ProxyMiddleware implements GatewayMiddleware {
    name = 'proxy';

    constructor(private retryStream: RetryStream) {}

    async handle(ctx: GatewayContext): Promise<void> {
        try {
            await this.retryStream.serve(ctx);
        } catch (err) {
            if (err instanceof NetworkError || err instanceof NoHealthyBackendError) {
                sendError(ctx.res, err);
                return;
            }
            throw err;
        }
    }
}
