export { GatewayServer, parseListenAddress } from './gateway';
export type { ServerConfiguration, ListenAddress } from './gateway';

export { RouteTable } from './routing/route-table';
export type { ReconcileReport, RouteTableOptions } from './routing/route-table';
export { RoutePipeline, DEFAULT_PIPELINE_OPTIONS } from './routing/route-pipeline';
export type { PipelineOptions, BackendDiff } from './routing/route-pipeline';
export { ProxyRouter } from './routing/router';
export type { RouteMatch } from './routing/router';
export { parseProxyRoute, proxyRouteDefinitionSchema } from './routing/proxy-route';
export type { ProxyRoute, ProxyRouteDefinition, MatchRule, RouteSnapshot } from './routing/proxy-route';

export { RoundRobinBalancer } from './load-balancers/round-robin';
export type { LoadBalancer } from './load-balancers/types';
export { CircuitBreaker, DEFAULT_BREAKER_OPTIONS } from './circuit-breaker/circuit-breaker';
export type { Admission, CircuitBreakerOptions, CircuitState, CircuitTransition } from './circuit-breaker/circuit-breaker';

export { MiddlewarePipeline } from './middleware/pipeline';
export { fromExpress } from './middleware/express';
export { RequestIdMiddleware } from './middleware/request-id';
export { RecoveryMiddleware } from './middleware/recovery';
export { loggerMiddleware } from './middleware/logger';
export type { GatewayContext, GatewayMiddleware, NextFunction, ProxyOutcome } from './middleware/types';

export { FileRouteRegistry } from './registry/file-registry';
export type { RouteConfigurator, FileRouteRegistryOptions } from './registry/file-registry';
export { loadConfig } from './config';
export type { GatewayConfig } from './config';
export { createLogger, createSilentLogger } from './logger';
export type { Logger } from './logger';
export * from './errors';
