import http, {
    type ClientRequest,
    type IncomingHttpHeaders,
    type IncomingMessage,
    type OutgoingHttpHeaders,
    type RequestOptions,
} from 'node:http';
import https from 'node:https';
import { NetworkError } from '../errors';

// =================================================================
// FORWARD — one attempt against one backend
// =================================================================
// Resolves with the upstream response as soon as its headers are
// in; the body is left for the caller to stream. Any failure before
// that point is a NetworkError, unless the caller aborted.
// =================================================================

const HOP_BY_HOP = new Set([
    'connection',
    'keep-alive',
    'proxy-authenticate',
    'proxy-authorization',
    'proxy-connection',
    'te',
    'trailer',
    'transfer-encoding',
    'upgrade',
]);

export interface ForwardRequest {
    route: string;
    target: URL;
    method: string;
    path: string;
    headers: IncomingHttpHeaders;
    body?: Buffer;
    remoteAddress?: string;
    protocol: string;
    timeoutMs: number;
    signal: AbortSignal;
}

function connectionTokens(headers: IncomingHttpHeaders): Set<string> {
    const value = headers.connection;
    if (!value) return new Set();
    return new Set(value.split(',').map(t => t.trim().toLowerCase()).filter(Boolean));
}

/** Drop hop-by-hop headers, including those named in Connection. */
export function stripHopByHop(headers: IncomingHttpHeaders): OutgoingHttpHeaders {
    const named = connectionTokens(headers);
    const out: OutgoingHttpHeaders = {};

    for (const [key, value] of Object.entries(headers)) {
        const k = key.toLowerCase();
        if (value === undefined || HOP_BY_HOP.has(k) || named.has(k)) continue;
        out[k] = value;
    }

    return out;
}

export function joinPath(base: string, path: string): string {
    const trimmed = base.replace(/\/+$/, '');
    return trimmed + (path.startsWith('/') ? path : `/${path}`);
}

function mergeForwardedFor(existing: string | string[] | undefined, remote?: string): string | undefined {
    const prior = Array.isArray(existing) ? existing.join(', ') : existing;
    if (!remote) return prior;
    return prior ? `${prior}, ${remote}` : remote;
}

function errorCode(err: Error): string {
    if ('code' in err && typeof err.code === 'string') return err.code;
    return 'EUNKNOWN';
}

export function buildUpstreamHeaders(request: ForwardRequest): OutgoingHttpHeaders {
    const { headers, target, body } = request;
    const out = stripHopByHop(headers);

    const forwardedFor = mergeForwardedFor(headers['x-forwarded-for'], request.remoteAddress);
    if (forwardedFor) out['x-forwarded-for'] = forwardedFor;
    out['x-forwarded-host'] = headers['x-forwarded-host'] ?? headers.host ?? '';
    out['x-forwarded-proto'] = headers['x-forwarded-proto'] ?? request.protocol;
    out.host = target.host;

    delete out['content-length'];
    if (body) out['content-length'] = String(body.length);

    return out;
}

export function forward(request: ForwardRequest): Promise<IncomingMessage> {
    const { route, target, signal } = request;
    const [pathname, search] = splitQuery(request.path);
    const url = new URL(target.href);
    url.pathname = joinPath(target.pathname, pathname);
    url.search = search;

    return new Promise<IncomingMessage>((resolve, reject) => {
        const upstreamReq = open(
            url,
            {
                method: request.method,
                headers: buildUpstreamHeaders(request),
                timeout: request.timeoutMs,
                signal,
            },
            resolve,
        );

        upstreamReq.on('timeout', () => {
            upstreamReq.destroy(Object.assign(new Error('upstream timed out'), { code: 'ETIMEDOUT' }));
        });

        upstreamReq.on('error', (err) => {
            if (signal.aborted) {
                reject(err);
                return;
            }
            reject(new NetworkError(route, target.href, errorCode(err), { cause: err }));
        });

        upstreamReq.end(request.body);
    });
}

function open(
    url: URL,
    options: RequestOptions,
    onResponse: (res: IncomingMessage) => void,
): ClientRequest {
    return url.protocol === 'https:'
        ? https.request(url, options, onResponse)
        : http.request(url, options, onResponse);
}

function splitQuery(path: string): [string, string] {
    const q = path.indexOf('?');
    return q === -1 ? [path, ''] : [path.slice(0, q), path.slice(q)];
}
