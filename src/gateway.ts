import express, { type Express } from 'express';
import { readFile } from 'node:fs/promises';
import http from 'node:http';
import https from 'node:https';
import type { AddressInfo } from 'node:net';
import { ConfigurationError } from './errors';
import { createLogger, type Logger } from './logger';
import { loggerMiddleware } from './middleware/logger';
import { RecoveryMiddleware } from './middleware/recovery';
import { RequestIdMiddleware } from './middleware/request-id';
import type { GatewayMiddleware } from './middleware/types';
import { dispatcher, errorHandler } from './routing/dispatcher';
import type { ProxyRouteDefinition, RouteSnapshot } from './routing/proxy-route';
import { DEFAULT_PIPELINE_OPTIONS, type PipelineOptions } from './routing/route-pipeline';
import { RouteTable, type ReconcileReport } from './routing/route-table';
import { ProxyRouter } from './routing/router';

// =================================================================
// GATEWAY SERVER
// =================================================================
//
//   registry ──configureProxyRoutes()──▶ RouteTable ──▶ ProxyRouter
//                                            │
//   client ──▶ express ──▶ dispatcher ───────┴──▶ RoutePipeline ──▶ backend
//
// Owns the listener, the router and the route table. The registry
// side only ever calls configureProxyRoutes() with the full list.
//
// Management:
//   GET <adminPath>/health → routes, backends and breaker state
// =================================================================

export interface ServerConfiguration {
    /** host:port or :port (default :8080) */
    address?: string;
    certFile?: string;
    keyFile?: string;
    /** Shared stages run by every route. Empty → request id, access log, recovery. */
    middleware?: GatewayMiddleware[];
    router?: ProxyRouter;
    logger?: Logger;
    pipeline?: Partial<PipelineOptions>;
    /** Drop routes missing from a reconciliation instead of draining them. */
    removeAbsentRoutes?: boolean;
    /** Prefix of the management endpoints; '' turns them off (default /gateway). */
    adminPath?: string;
}

export interface ListenAddress {
    host?: string;
    port: number;
}

export function parseListenAddress(address: string): ListenAddress {
    const match = /^(?:\[([^\]]+)\]|([^:]*)):(\d{1,5})$/.exec(address.trim());
    const port = match ? Number(match[3]) : NaN;
    if (!match || port > 65535) {
        throw new ConfigurationError(`invalid listen address "${address}"`);
    }

    const host = match[1] ?? match[2];
    return host ? { host, port } : { port };
}

export class GatewayServer {
    readonly app: Express;
    readonly router: ProxyRouter;
    private readonly table: RouteTable;
    private readonly logger: Logger;
    private readonly listen: ListenAddress;
    private server?: http.Server;

    constructor(private readonly config: ServerConfiguration = {}) {
        this.logger = config.logger ?? createLogger();
        this.router = config.router ?? new ProxyRouter();

        const address = config.address || ':8080';
        this.listen = parseListenAddress(address);

        const middleware = config.middleware && config.middleware.length > 0
            ? config.middleware
            : [
                new RequestIdMiddleware(),
                loggerMiddleware(this.logger),
                new RecoveryMiddleware(this.logger),
            ];

        this.table = new RouteTable(
            this.router,
            middleware,
            {
                removeAbsentRoutes: config.removeAbsentRoutes ?? false,
                pipeline: { ...DEFAULT_PIPELINE_OPTIONS, ...config.pipeline },
            },
            this.logger,
        );

        this.app = this.createApp(config.adminPath ?? '/gateway');
        this.logger.debug({ address }, 'creating new gateway server');
    }

    /**
     * Reconcile the live routes with a full desired-state list. Safe to
     * call repeatedly with the same list. Throws ReconciliationError
     * after applying the valid routes if any definition was rejected.
     */
    configureProxyRoutes(routes: readonly ProxyRouteDefinition[]): ReconcileReport {
        return this.table.reconcile(routes);
    }

    getProxyRoutes(): RouteSnapshot[] {
        return this.table.snapshot();
    }

    /**
     * Listen until the server is stopped. Uses HTTPS when both a
     * certificate and a key are configured. Rejects if the listener
     * fails.
     */
    async start(onListening?: (address: AddressInfo) => void): Promise<void> {
        if (this.server) throw new Error('gateway server already started');

        const { certFile, keyFile } = this.config;
        let server: http.Server;
        if (certFile && keyFile) {
            const [cert, key] = await Promise.all([readFile(certFile), readFile(keyFile)]);
            server = https.createServer({ cert, key }, this.app);
            this.logger.info({ address: this.config.address }, 'starting https gateway server');
        } else {
            server = http.createServer(this.app);
            this.logger.info({ address: this.config.address }, 'starting http gateway server');
        }
        this.server = server;

        try {
            await new Promise<void>((resolve, reject) => {
                server.once('error', reject);
                server.once('close', resolve);
                server.listen(this.listen.port, this.listen.host, () => {
                    const bound = server.address();
                    if (bound && typeof bound === 'object') {
                        this.logger.info({ port: bound.port, host: bound.address }, 'gateway listening');
                        onListening?.(bound);
                    }
                });
            });
        } finally {
            if (this.server === server) this.server = undefined;
        }
    }

    stop(): Promise<void> {
        const server = this.server;
        if (!server) return Promise.resolve();

        return new Promise<void>((resolve, reject) => {
            server.close((err) => (err ? reject(err) : resolve()));
            server.closeIdleConnections();
        });
    }

    private createApp(adminPath: string): Express {
        const app = express();
        app.disable('x-powered-by');

        if (adminPath) {
            app.get(`${adminPath}/health`, (_req, res) => {
                res.json({
                    status: 'ok',
                    routes: this.table.pipelinesList().map(p => ({
                        name: p.name,
                        match: p.match,
                        backends: p.pool.servers().map(b => b.href),
                        circuit: p.breaker.getStats(),
                    })),
                });
            });
        }

        app.use(dispatcher(this.router, this.table));
        app.use(errorHandler(this.logger));

        return app;
    }
}
