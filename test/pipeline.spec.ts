import { describe, it, expect } from 'vitest';
import express from 'express';
import { MiddlewarePipeline } from '../src/middleware/pipeline';
import type { GatewayContext, GatewayMiddleware } from '../src/middleware/types';

function context(): GatewayContext {
    return {
        // stages under test never touch req/res
        req: express.request,
        res: express.response,
        route: 'orders',
        path: '/orders',
        signal: new AbortController().signal,
        attempts: 0,
    };
}

function tracing(name: string, log: string[], stop = false): GatewayMiddleware {
    return {
        name,
        async handle(_ctx, next) {
            log.push(`${name}:in`);
            if (!stop) await next();
            log.push(`${name}:out`);
        },
    };
}

describe('MiddlewarePipeline', () => {
    it('runs stages in order, unwinding in reverse', async () => {
        const log: string[] = [];
        const chain = new MiddlewarePipeline()
            .use(tracing('a', log))
            .use(tracing('b', log), tracing('c', log))
            .compose();

        await chain(context());

        expect(log).toEqual(['a:in', 'b:in', 'c:in', 'c:out', 'b:out', 'a:out']);
    });

    it('stops when a stage does not call next', async () => {
        const log: string[] = [];
        const chain = new MiddlewarePipeline()
            .use(tracing('a', log), tracing('gate', log, true), tracing('proxy', log))
            .compose();

        await chain(context());

        expect(log).toEqual(['a:in', 'gate:in', 'gate:out', 'a:out']);
    });

    it('reuses the composed chain across requests', async () => {
        const seen: string[] = [];
        const chain = new MiddlewarePipeline()
            .use({ name: 'record', handle: async (ctx, next) => { seen.push(ctx.path); await next(); } })
            .compose();

        const first = context();
        const second = { ...context(), path: '/orders/2' };
        await chain(first);
        await chain(second);

        expect(seen).toEqual(['/orders', '/orders/2']);
    });

    it('lists its stage names', () => {
        const pipeline = new MiddlewarePipeline().use(tracing('a', []), tracing('b', []));

        expect(pipeline.getMiddlewareNames()).toEqual(['a', 'b']);
    });
});
