import { z } from 'zod';
import { ConfigurationError } from '../errors';

// =================================================================
// PROXY ROUTES
// =================================================================
// What the registry hands over on every reconciliation:
//
//   { name: 'orders',
//     backends: ['http://10.0.0.5:8080', 'http://10.0.0.6:8080'],
//     match: { pathPrefix: '/orders', host: 'api.example.com' } }
//
// Definitions are validated one by one. A bad one rejects only its
// own route.
// =================================================================

export interface MatchRule {
    pathPrefix: string;
    host?: string;
    stripPrefix: boolean;
}

export interface ProxyRoute {
    name: string;
    backends: URL[];
    match: MatchRule;
}

export interface RouteSnapshot {
    name: string;
    backends: string[];
}

export const proxyRouteDefinitionSchema = z.object({
    name: z.string().trim().min(1, 'name must not be empty'),
    backends: z.array(z.union([z.string(), z.instanceof(URL)])),
    match: z
        .object({
            pathPrefix: z.string().startsWith('/', 'pathPrefix must start with /').optional(),
            host: z.string().min(1).optional(),
            stripPrefix: z.boolean().optional(),
        })
        .optional(),
});

export type ProxyRouteDefinition = z.input<typeof proxyRouteDefinitionSchema>;

function nameOf(definition: unknown): string | undefined {
    if (typeof definition !== 'object' || definition === null || !('name' in definition)) return undefined;
    const { name } = definition;
    return typeof name === 'string' && name.trim() !== '' ? name.trim() : undefined;
}

export function normalizePrefix(prefix: string): string {
    return '/' + prefix.split('/').filter(Boolean).join('/');
}

function toBackendUrl(value: string | URL, route: string): URL {
    let url: URL;
    try {
        url = new URL(typeof value === 'string' ? value : value.href);
    } catch (err) {
        throw new ConfigurationError(`malformed backend URL "${String(value)}"`, route, { cause: err });
    }

    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        throw new ConfigurationError(`backend ${url.href} must use http or https`, route);
    }
    if (url.search || url.hash) {
        throw new ConfigurationError(`backend ${url.href} must not carry a query or fragment`, route);
    }

    return url;
}

/** Validate a raw definition. Throws ConfigurationError naming the route when it can. */
export function parseProxyRoute(definition: unknown): ProxyRoute {
    const parsed = proxyRouteDefinitionSchema.safeParse(definition);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
            .join(', ');
        throw new ConfigurationError(issues, nameOf(definition));
    }

    const { name, backends, match } = parsed.data;

    const seen = new Set<string>();
    const urls: URL[] = [];
    for (const backend of backends) {
        const url = toBackendUrl(backend, name);
        if (seen.has(url.href)) continue;
        seen.add(url.href);
        urls.push(url);
    }

    return {
        name,
        backends: urls,
        match: {
            pathPrefix: normalizePrefix(match?.pathPrefix ?? `/${name}`),
            host: match?.host?.toLowerCase(),
            stripPrefix: match?.stripPrefix ?? false,
        },
    };
}

export function sameRule(a: MatchRule, b: MatchRule): boolean {
    return a.pathPrefix === b.pathPrefix && a.host === b.host && a.stripPrefix === b.stripPrefix;
}
