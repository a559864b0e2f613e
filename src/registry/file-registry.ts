import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError, ReconciliationError } from '../errors';
import type { Logger } from '../logger';
import { proxyRouteDefinitionSchema, type ProxyRouteDefinition } from '../routing/proxy-route';
import type { ReconcileReport } from '../routing/route-table';

// =================================================================
// FILE ROUTE REGISTRY
// =================================================================
// Polls a JSON file holding the full route list and pushes it to
// the gateway whenever the content changes:
//
//   [
//     { "name": "orders", "backends": ["http://10.0.0.5:8080"] },
//     { "name": "users",  "backends": ["http://10.0.0.7:8080"],
//       "match": { "pathPrefix": "/api/users", "stripPrefix": true } }
//   ]
//
// A file that does not parse is skipped as a whole; the routes last
// applied stay live.
// =================================================================

export interface RouteConfigurator {
    configureProxyRoutes(routes: readonly ProxyRouteDefinition[]): ReconcileReport;
}

export interface FileRouteRegistryOptions {
    intervalMs: number;
}

const routeFileSchema = z.array(proxyRouteDefinitionSchema);

export class FileRouteRegistry {
    private timer?: NodeJS.Timeout;
    private lastApplied?: string;
    private readonly logger: Logger;

    constructor(
        private readonly file: string,
        private readonly gateway: RouteConfigurator,
        private readonly options: FileRouteRegistryOptions,
        logger: Logger,
    ) {
        this.logger = logger.child({ component: 'file-registry', file });
    }

    /** Read the file once. Resolves true when a new route list was applied. */
    async poll(): Promise<boolean> {
        const content = await readFile(this.file, 'utf8');
        if (content === this.lastApplied) return false;

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (err) {
            throw new ConfigurationError(`route file ${this.file} is not valid JSON`, undefined, { cause: err });
        }

        const parsed = routeFileSchema.safeParse(raw);
        if (!parsed.success) {
            const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
            throw new ConfigurationError(`route file ${this.file} is invalid (${problems.join('; ')})`);
        }

        try {
            const report = this.gateway.configureProxyRoutes(parsed.data);
            this.logger.info({ report }, 'applied route file');
        } catch (err) {
            if (!(err instanceof ReconciliationError)) throw err;
            this.logger.warn({ report: err.report, failures: err.failures.map(f => f.message) }, 'applied route file with rejected routes');
        }

        this.lastApplied = content;
        return true;
    }

    start(): void {
        if (this.timer) return;

        this.tick();
        this.timer = setInterval(() => this.tick(), this.options.intervalMs);
        this.timer.unref();
    }

    stop(): void {
        if (!this.timer) return;
        clearInterval(this.timer);
        this.timer = undefined;
    }

    private tick(): void {
        this.poll().catch((err: unknown) => {
            this.logger.error({ err }, 'route file poll failed');
        });
    }
}
