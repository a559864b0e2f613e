import type { Request, Response } from 'express';
import { CircuitBreaker, type CircuitBreakerOptions } from '../circuit-breaker/circuit-breaker';
import { RoundRobinBalancer } from '../load-balancers/round-robin';
import type { Logger } from '../logger';
import { BadGatewayMiddleware } from '../middleware/bad-gateway';
import { BodyBufferMiddleware } from '../middleware/body';
import { CircuitBreakerMiddleware } from '../middleware/circuit-breaker';
import { MiddlewarePipeline, type ComposedHandler } from '../middleware/pipeline';
import { ProxyMiddleware } from '../middleware/proxy';
import type { GatewayContext, GatewayMiddleware } from '../middleware/types';
import { RetryStream } from '../proxy/retry-stream';
import type { MatchRule, ProxyRoute, RouteSnapshot } from './proxy-route';

// =================================================================
// ROUTE PIPELINE — everything one service needs
// =================================================================
//
//   shared middleware → bad-gateway → circuit breaker → body → proxy
//                          │              │                     │
//                      empty pool?     tripped?        retry-stream
//                         502            503        (round-robin pool)
//
// Built once, when the route is first seen. Reconciliation only
// ever touches the pool's membership after that.
// =================================================================

export interface PipelineOptions {
    maxAttempts: number;
    upstreamTimeoutMs: number;
    maxRequestBodyBytes: number;
    breaker: Partial<CircuitBreakerOptions>;
}

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
    maxAttempts: 2,
    upstreamTimeoutMs: 30_000,
    maxRequestBodyBytes: 2 * 1024 * 1024,
    breaker: {},
};

export interface BackendDiff {
    added: string[];
    removed: string[];
}

export class RoutePipeline {
    readonly name: string;
    readonly pool: RoundRobinBalancer;
    readonly breaker: CircuitBreaker;
    private rule: MatchRule;
    private readonly chain: ComposedHandler;
    private readonly logger: Logger;

    constructor(
        route: ProxyRoute,
        shared: readonly GatewayMiddleware[],
        options: PipelineOptions,
        logger: Logger,
    ) {
        this.name = route.name;
        this.rule = route.match;
        this.logger = logger.child({ route: route.name });

        this.pool = new RoundRobinBalancer(route.name);
        for (const backend of route.backends) {
            this.pool.upsert(backend);
            this.logger.info({ backend: backend.href }, 'register new backend for service');
        }

        this.breaker = new CircuitBreaker(route.name, options.breaker, this.logger);
        const retryStream = new RetryStream(this.pool, options, this.logger);

        this.chain = new MiddlewarePipeline()
            .use(...shared)
            .use(new BadGatewayMiddleware(this.pool))
            .use(new CircuitBreakerMiddleware(this.breaker))
            .use(new BodyBufferMiddleware(options.maxRequestBodyBytes))
            .use(new ProxyMiddleware(retryStream))
            .compose();
    }

    get match(): MatchRule {
        return this.rule;
    }

    set match(rule: MatchRule) {
        this.rule = { ...rule };
    }

    handle(req: Request, res: Response, path: string): Promise<void> {
        const controller = new AbortController();
        res.once('close', () => {
            if (!res.writableFinished) controller.abort();
        });

        const ctx: GatewayContext = {
            req,
            res,
            route: this.name,
            path,
            signal: controller.signal,
            attempts: 0,
        };

        return this.chain(ctx);
    }

    /**
     * Bring the pool in line with the route's backend list: add what
     * is new, remove what is gone, leave the rest untouched.
     */
    sync(backends: readonly URL[]): BackendDiff {
        const diff: BackendDiff = { added: [], removed: [] };
        const current = this.pool.servers();
        const wanted = new Set(backends.map(b => b.href));
        const present = new Set(current.map(b => b.href));

        for (const backend of backends) {
            if (present.has(backend.href)) continue;
            this.logger.info({ backend: backend.href }, 'register new backend');
            this.pool.upsert(backend);
            diff.added.push(backend.href);
        }

        for (const backend of current) {
            if (wanted.has(backend.href)) continue;
            this.logger.info({ backend: backend.href }, 'unregister backend');
            this.pool.remove(backend);
            diff.removed.push(backend.href);
        }

        return diff;
    }

    /** Remove every backend; requests then get the 502 fallback. */
    drain(): string[] {
        return this.sync([]).removed;
    }

    snapshot(): RouteSnapshot {
        return { name: this.name, backends: this.pool.servers().map(b => b.href) };
    }
}
