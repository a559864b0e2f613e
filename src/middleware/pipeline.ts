import type { GatewayContext, GatewayMiddleware } from './types';

// =================================================================
// MIDDLEWARE PIPELINE
// =================================================================
//
// Chains stages together in order. Each stage calls next() to
// continue, or doesn't to stop.
//
//   pipeline.use(requestId);   // shared
//   pipeline.use(logger);      // shared
//   pipeline.use(recovery);    // shared — turns faults into 500
//   pipeline.use(fallback);    // might stop here (502, empty pool)
//   pipeline.use(breaker);     // might stop here (503, tripped)
//   pipeline.use(proxy);       // final destination
//
// compose() nests the stages once, when the route is built, so a
// request only walks closures that already exist.
// =================================================================

export type ComposedHandler = (ctx: GatewayContext) => Promise<void>;

const done: ComposedHandler = async () => {};

export class MiddlewarePipeline {
    private middleware: GatewayMiddleware[] = [];

    use(...mw: GatewayMiddleware[]): MiddlewarePipeline {
        this.middleware.push(...mw);
        return this; // Chainable: pipeline.use(a).use(b).use(c)
    }

    compose(): ComposedHandler {
        return this.middleware.reduceRight<ComposedHandler>(
            (next, mw) => (ctx) => mw.handle(ctx, () => next(ctx)),
            done,
        );
    }

    getMiddlewareNames(): string[] {
        return this.middleware.map(m => m.name);
    }
}
