import { ConfigurationError, ReconciliationError } from '../errors';
import type { Logger } from '../logger';
import type { GatewayMiddleware } from '../middleware/types';
import { parseProxyRoute, sameRule, type ProxyRoute, type RouteSnapshot } from './proxy-route';
import { RoutePipeline, type PipelineOptions } from './route-pipeline';
import type { ProxyRouter } from './router';

// =================================================================
// ROUTE TABLE
// =================================================================
//
// service name → RoutePipeline. reconcile() applies a full desired
// state snapshot:
//
//   listed, known      → diff the pool (upsert new, remove gone)
//   listed, unknown    → build a pipeline, install its match rule
//   known, not listed  → drain the pool (or remove the route when
//                        removeAbsentRoutes is set)
//
// Each route's diff runs synchronously, so no request on the event
// loop can observe a pool halfway through it. Routes are applied
// independently: one bad definition does not stop the others.
// =================================================================

export interface ReconcileReport {
    added: string[];
    updated: string[];
    unchanged: string[];
    drained: string[];
    removed: string[];
}

export interface RouteTableOptions {
    removeAbsentRoutes: boolean;
    pipeline: PipelineOptions;
}

export class RouteTable {
    private readonly pipelines = new Map<string, RoutePipeline>();
    private readonly logger: Logger;

    constructor(
        private readonly router: ProxyRouter,
        private readonly middleware: readonly GatewayMiddleware[],
        private readonly options: RouteTableOptions,
        logger: Logger,
    ) {
        this.logger = logger.child({ component: 'route-table' });
    }

    get(name: string): RoutePipeline | undefined {
        return this.pipelines.get(name);
    }

    /**
     * Apply the desired route list. Valid routes are always applied;
     * if any definition was rejected a ReconciliationError is thrown
     * afterwards, carrying the report of what did change.
     */
    reconcile(definitions: readonly unknown[]): ReconcileReport {
        this.logger.debug({ routes: definitions.length }, 'configure proxy routes');

        const report: ReconcileReport = { added: [], updated: [], unchanged: [], drained: [], removed: [] };
        const failures: ConfigurationError[] = [];
        const listed = new Set<string>();

        for (const definition of definitions) {
            let route: ProxyRoute;
            try {
                route = parseProxyRoute(definition);
                if (listed.has(route.name)) {
                    throw new ConfigurationError('duplicate route name', route.name);
                }
            } catch (err) {
                if (!(err instanceof ConfigurationError)) throw err;
                // A rejected update leaves the live route as it was
                if (err.route) listed.add(err.route);
                failures.push(err);
                this.logger.warn({ err }, 'rejected proxy route');
                continue;
            }

            listed.add(route.name);
            const existing = this.pipelines.get(route.name);
            if (existing) {
                this.update(existing, route, report);
            } else {
                this.add(route);
                report.added.push(route.name);
            }
        }

        for (const [name, pipeline] of this.pipelines) {
            if (listed.has(name)) continue;

            if (this.options.removeAbsentRoutes) {
                pipeline.drain();
                this.router.uninstall(name);
                this.pipelines.delete(name);
                report.removed.push(name);
                this.logger.info({ route: name }, 'removed proxy route');
            } else if (pipeline.pool.size > 0) {
                pipeline.drain();
                report.drained.push(name);
                this.logger.info({ route: name }, 'drained proxy route');
            }
        }

        if (failures.length > 0) throw new ReconciliationError(failures, report);
        return report;
    }

    snapshot(): RouteSnapshot[] {
        return [...this.pipelines.values()].map(p => p.snapshot());
    }

    pipelinesList(): RoutePipeline[] {
        return [...this.pipelines.values()];
    }

    private add(route: ProxyRoute): void {
        this.logger.debug({ route: route.name }, 'add proxy route for service');
        const pipeline = new RoutePipeline(route, this.middleware, this.options.pipeline, this.logger);
        this.pipelines.set(route.name, pipeline);
        this.router.install(route.name, route.match);
    }

    private update(pipeline: RoutePipeline, route: ProxyRoute, report: ReconcileReport): void {
        this.logger.debug({ route: route.name }, 'update proxy route for service');
        const diff = pipeline.sync(route.backends);

        let ruleChanged = false;
        if (!sameRule(pipeline.match, route.match)) {
            pipeline.match = route.match;
            this.router.install(route.name, route.match);
            ruleChanged = true;
        }

        if (diff.added.length > 0 || diff.removed.length > 0 || ruleChanged) {
            report.updated.push(route.name);
        } else {
            report.unchanged.push(route.name);
        }
    }
}
