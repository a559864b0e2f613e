import type { MatchRule } from './proxy-route';

// =================================================================
// PROXY ROUTER
// =================================================================
// Host/path rules, one per route name. The most specific rule wins:
//
//   1. rules bound to a host before rules for any host
//   2. longer pathPrefix before shorter
//   3. route name, for a stable order on ties
//
// Prefixes match whole segments: /api matches /api and /api/x,
// not /apix.
// =================================================================

export interface RouteMatch {
    name: string;
    /** Path and query to forward, prefix removed if the rule strips it */
    path: string;
}

function normalizeHost(host: string | undefined): string | undefined {
    if (!host) return undefined;
    return host.toLowerCase().replace(/:\d+$/, '');
}

function prefixMatches(prefix: string, pathname: string): boolean {
    return prefix === '/' || pathname === prefix || pathname.startsWith(`${prefix}/`);
}

export class ProxyRouter {
    private rules = new Map<string, MatchRule>();
    private ordered: Array<[string, MatchRule]> = [];

    install(name: string, rule: MatchRule): void {
        this.rules.set(name, { ...rule });
        this.reorder();
    }

    uninstall(name: string): boolean {
        const removed = this.rules.delete(name);
        if (removed) this.reorder();
        return removed;
    }

    ruleFor(name: string): MatchRule | undefined {
        return this.rules.get(name);
    }

    match(host: string | undefined, url: string): RouteMatch | undefined {
        const q = url.indexOf('?');
        const pathname = q === -1 ? url : url.slice(0, q);
        const search = q === -1 ? '' : url.slice(q);
        const hostname = normalizeHost(host);

        for (const [name, rule] of this.ordered) {
            if (rule.host && rule.host !== hostname) continue;
            if (!prefixMatches(rule.pathPrefix, pathname)) continue;

            const forwarded = rule.stripPrefix && rule.pathPrefix !== '/'
                ? pathname.slice(rule.pathPrefix.length) || '/'
                : pathname;
            return { name, path: forwarded + search };
        }

        return undefined;
    }

    private reorder(): void {
        this.ordered = [...this.rules.entries()].sort(([nameA, a], [nameB, b]) => {
            if (Boolean(a.host) !== Boolean(b.host)) return a.host ? -1 : 1;
            if (a.pathPrefix.length !== b.pathPrefix.length) return b.pathPrefix.length - a.pathPrefix.length;
            return nameA < nameB ? -1 : nameA > nameB ? 1 : 0;
        });
    }
}
