// =================================================================
// GATEWAY ERRORS
// =================================================================
//
// Every request-path failure is recovered into an HTTP response.
// Each error knows its status and title; toHttpError() turns any
// thrown value into the JSON body the gateway sends:
//
//   NoRouteMatchedError   → 404  nothing matched host/path
//   NoHealthyBackendError → 502  pool is empty
//   NetworkError          → 502  retries exhausted
//   CircuitTrippedError   → 503  breaker short-circuited
//
// Only reconciliation errors (ConfigurationError, ReconciliationError)
// propagate to the caller.
// =================================================================

import type { ReconcileReport } from './routing/route-table';

export abstract class GatewayError extends Error {
    abstract readonly status: number;
    abstract readonly title: string;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class NoRouteMatchedError extends GatewayError {
    readonly status = 404;
    readonly title = 'Not Found';

    constructor(readonly host: string, readonly path: string) {
        super(`No route matches ${path}`);
    }
}

export class NoHealthyBackendError extends GatewayError {
    readonly status = 502;
    readonly title = 'Bad Gateway';

    constructor(readonly route: string) {
        super(`No healthy backend for service ${route}`);
    }
}

export class CircuitTrippedError extends GatewayError {
    readonly status = 503;
    readonly title = 'Service Unavailable';

    constructor(readonly route: string) {
        super(`Circuit for service ${route} is open. System is recovering.`);
    }
}

/**
 * Transport-level failure before any response headers arrived:
 * connection refused/reset, DNS failure or upstream timeout.
 * `target` stays out of the message so it never reaches a client.
 */
export class NetworkError extends GatewayError {
    readonly status = 502;
    readonly title = 'Bad Gateway';

    constructor(
        readonly route: string,
        readonly target: string,
        readonly code: string,
        options?: ErrorOptions,
    ) {
        super(`Service ${route} is unavailable`, options);
    }
}

export class ConfigurationError extends Error {
    constructor(message: string, readonly route?: string, options?: ErrorOptions) {
        super(route ? `route ${route}: ${message}` : message, options);
        this.name = 'ConfigurationError';
    }
}

export class ReconciliationError extends Error {
    constructor(readonly failures: ConfigurationError[], readonly report: ReconcileReport) {
        super(
            `${failures.length} route(s) rejected: ` +
            failures.map(f => f.message).join('; ')
        );
        this.name = 'ReconciliationError';
    }
}

export interface HttpErrorResponse {
    status: number;
    body: { error: string; message: string };
}

const STATUS_TITLES: Record<number, string> = {
    400: 'Bad Request',
    413: 'Payload Too Large',
    415: 'Unsupported Media Type',
};

// Body reading errors (raw-body) carry their own 4xx status
function expressStatus(err: unknown): number | undefined {
    if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
    const status = err.status;
    return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function toHttpError(err: unknown): HttpErrorResponse {
    if (err instanceof GatewayError) {
        return { status: err.status, body: { error: err.title, message: err.message } };
    }

    const status = expressStatus(err);
    if (status !== undefined) {
        const title = STATUS_TITLES[status] ?? 'Bad Request';
        return { status, body: { error: title, message: title } };
    }

    return {
        status: 500,
        body: { error: 'Internal Gateway Error', message: 'Unexpected error while handling the request' },
    };
}
