import { describe, it, expect } from 'vitest';
import { ProxyRouter } from '../src/routing/router';
import { parseProxyRoute } from '../src/routing/proxy-route';
import { ConfigurationError } from '../src/errors';

describe('ProxyRouter', () => {
    function router(): ProxyRouter {
        const r = new ProxyRouter();
        r.install('api', { pathPrefix: '/api', stripPrefix: false });
        r.install('users', { pathPrefix: '/api/users', stripPrefix: true });
        r.install('admin', { pathPrefix: '/', host: 'admin.example.com', stripPrefix: false });
        return r;
    }

    it('matches on whole path segments', () => {
        const r = router();

        expect(r.match('gw.local', '/api')).toEqual({ name: 'api', path: '/api' });
        expect(r.match('gw.local', '/api/orders')).toEqual({ name: 'api', path: '/api/orders' });
        expect(r.match('gw.local', '/apix')).toBeUndefined();
    });

    it('prefers the longest prefix and strips it when asked', () => {
        expect(router().match('gw.local', '/api/users/42?expand=1')).toEqual({
            name: 'users',
            path: '/42?expand=1',
        });
        expect(router().match('gw.local', '/api/users')).toEqual({ name: 'users', path: '/' });
    });

    it('prefers host-bound rules and ignores case and port', () => {
        expect(router().match('Admin.Example.com:8443', '/api/users')).toEqual({
            name: 'admin',
            path: '/api/users',
        });
    });

    it('returns undefined when nothing matches', () => {
        expect(router().match(undefined, '/other')).toBeUndefined();
    });

    it('stops matching after uninstall', () => {
        const r = router();

        expect(r.uninstall('users')).toBe(true);
        expect(r.uninstall('users')).toBe(false);
        expect(r.match('gw.local', '/api/users/42')).toEqual({ name: 'api', path: '/api/users/42' });
    });
});

describe('parseProxyRoute', () => {
    it('defaults the match rule to /<name>', () => {
        const route = parseProxyRoute({ name: 'orders', backends: ['http://10.0.0.1:8080'] });

        expect(route.match).toEqual({ pathPrefix: '/orders', host: undefined, stripPrefix: false });
        expect(route.backends.map(b => b.href)).toEqual(['http://10.0.0.1:8080/']);
    });

    it('drops duplicate backends and keeps their order', () => {
        const route = parseProxyRoute({
            name: 'orders',
            backends: ['http://b:80', 'http://a:80', new URL('http://b')],
        });

        expect(route.backends.map(b => b.href)).toEqual(['http://b/', 'http://a/']);
    });

    it('normalizes the match rule', () => {
        const route = parseProxyRoute({
            name: 'orders',
            backends: [],
            match: { pathPrefix: '/v1//orders/', host: 'API.example.com', stripPrefix: true },
        });

        expect(route.match).toEqual({ pathPrefix: '/v1/orders', host: 'api.example.com', stripPrefix: true });
    });

    it('rejects a malformed backend URL, naming the route', () => {
        expect(() => parseProxyRoute({ name: 'orders', backends: ['not a url'] })).toThrow(
            new ConfigurationError('malformed backend URL "not a url"', 'orders'),
        );
    });

    it('rejects non-http backends', () => {
        expect(() => parseProxyRoute({ name: 'orders', backends: ['ftp://files.local'] })).toThrow(
            'route orders: backend ftp://files.local/ must use http or https',
        );
    });

    it('rejects a definition without a name', () => {
        expect(() => parseProxyRoute({ name: '  ', backends: [] })).toThrow('name: name must not be empty');
    });
});
