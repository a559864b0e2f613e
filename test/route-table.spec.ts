import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RouteTable } from '../src/routing/route-table';
import { ProxyRouter } from '../src/routing/router';
import { DEFAULT_PIPELINE_OPTIONS } from '../src/routing/route-pipeline';
import { ConfigurationError, ReconciliationError } from '../src/errors';
import { createSilentLogger } from '../src/logger';

const a = 'http://10.0.0.1:8080';
const b = 'http://10.0.0.2:8080';
const c = 'http://10.0.0.3:8080';
const d = 'http://10.0.0.4:8080';
const href = (u: string) => new URL(u).href;

describe('RouteTable.reconcile', () => {
    let router: ProxyRouter;
    let table: RouteTable;

    function createTable(removeAbsentRoutes = false): RouteTable {
        return new RouteTable(
            router,
            [],
            { removeAbsentRoutes, pipeline: DEFAULT_PIPELINE_OPTIONS },
            createSilentLogger(),
        );
    }

    beforeEach(() => {
        router = new ProxyRouter();
        table = createTable();
    });

    it('creates a pipeline and installs its match rule for a new route', () => {
        const report = table.reconcile([{ name: 'orders', backends: [a, b] }]);

        expect(report.added).toEqual(['orders']);
        expect(table.snapshot()).toEqual([{ name: 'orders', backends: [href(a), href(b)] }]);
        expect(table.get('orders')?.breaker.getState()).toBe('CLOSED');
        expect(router.match(undefined, '/orders/1')).toEqual({ name: 'orders', path: '/orders/1' });
    });

    it('applies only the difference to an existing pool', () => {
        table.reconcile([{ name: 'orders', backends: [a, b, c] }]);
        const pool = table.get('orders')?.pool;
        if (!pool) throw new Error('pipeline missing');
        const upsert = vi.spyOn(pool, 'upsert');
        const remove = vi.spyOn(pool, 'remove');

        const report = table.reconcile([{ name: 'orders', backends: [b, c, d] }]);

        expect(remove).toHaveBeenCalledTimes(1);
        expect(remove.mock.calls[0][0].href).toBe(href(a));
        expect(upsert).toHaveBeenCalledTimes(1);
        expect(upsert.mock.calls[0][0].href).toBe(href(d));
        expect(report.updated).toEqual(['orders']);
        expect(table.snapshot()).toEqual([{ name: 'orders', backends: [href(b), href(c), href(d)] }]);
    });

    it('is idempotent for an identical route list', () => {
        const routes = [{ name: 'orders', backends: [a, b] }];
        table.reconcile(routes);
        const pipeline = table.get('orders');
        if (!pipeline) throw new Error('pipeline missing');
        const upsert = vi.spyOn(pipeline.pool, 'upsert');
        const remove = vi.spyOn(pipeline.pool, 'remove');

        const report = table.reconcile(routes);

        expect(upsert).not.toHaveBeenCalled();
        expect(remove).not.toHaveBeenCalled();
        expect(report).toEqual({ added: [], updated: [], unchanged: ['orders'], drained: [], removed: [] });
        expect(table.get('orders')).toBe(pipeline);
    });

    it('drains a route missing from the list but keeps it routable', () => {
        table.reconcile([
            { name: 'orders', backends: [a] },
            { name: 'users', backends: [b] },
        ]);

        const report = table.reconcile([{ name: 'orders', backends: [a] }]);

        expect(report.drained).toEqual(['users']);
        expect(table.get('users')?.pool.size).toBe(0);
        expect(router.match(undefined, '/users')).toEqual({ name: 'users', path: '/users' });
        expect(table.reconcile([{ name: 'orders', backends: [a] }]).drained).toEqual([]);
    });

    it('refills a drained route when it comes back', () => {
        table.reconcile([{ name: 'users', backends: [a] }]);
        table.reconcile([]);

        const report = table.reconcile([{ name: 'users', backends: [b] }]);

        expect(report.updated).toEqual(['users']);
        expect(table.snapshot()).toEqual([{ name: 'users', backends: [href(b)] }]);
    });

    it('removes absent routes entirely when configured to', () => {
        table = createTable(true);
        table.reconcile([{ name: 'users', backends: [a] }]);

        const report = table.reconcile([]);

        expect(report.removed).toEqual(['users']);
        expect(table.get('users')).toBeUndefined();
        expect(router.ruleFor('users')).toBeUndefined();
    });

    it('re-installs the match rule when it changes', () => {
        table.reconcile([{ name: 'orders', backends: [a] }]);

        const report = table.reconcile([{ name: 'orders', backends: [a], match: { pathPrefix: '/v2/orders' } }]);

        expect(report.updated).toEqual(['orders']);
        expect(router.match(undefined, '/orders')).toBeUndefined();
        expect(router.match(undefined, '/v2/orders/7')).toEqual({ name: 'orders', path: '/v2/orders/7' });
    });

    it('rejects a bad route without stopping the others', () => {
        let caught: unknown;
        try {
            table.reconcile([
                { name: 'orders', backends: [a] },
                { name: 'users', backends: ['not a url'] },
            ]);
        } catch (err) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(ReconciliationError);
        if (!(caught instanceof ReconciliationError)) return;
        expect(caught.failures).toHaveLength(1);
        expect(caught.failures[0]).toBeInstanceOf(ConfigurationError);
        expect(caught.failures[0].route).toBe('users');
        expect(caught.report.added).toEqual(['orders']);
        expect(table.get('users')).toBeUndefined();
    });

    it('keeps the live backends of a route whose update was rejected', () => {
        table.reconcile([{ name: 'users', backends: [a] }]);

        expect(() => table.reconcile([{ name: 'users', backends: ['ftp://nope'] }])).toThrow(ReconciliationError);
        expect(table.snapshot()).toEqual([{ name: 'users', backends: [href(a)] }]);
    });

    it('rejects a duplicated route name', () => {
        expect(() => table.reconcile([
            { name: 'orders', backends: [a] },
            { name: 'orders', backends: [b] },
        ])).toThrow('route orders: duplicate route name');
        expect(table.snapshot()).toEqual([{ name: 'orders', backends: [href(a)] }]);
    });
});
