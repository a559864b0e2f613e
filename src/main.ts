import { config as loadEnv } from 'dotenv';
import { loadConfig } from './config';
import { GatewayServer } from './gateway';
import { createLogger } from './logger';
import { FileRouteRegistry } from './registry/file-registry';

// =================================================================
// Gateway process: env → config → server (+ route file polling)
// =================================================================

loadEnv();

async function main(): Promise<void> {
    const config = loadConfig();
    const logger = createLogger({ level: config.logLevel });

    const gateway = new GatewayServer({
        address: config.address,
        certFile: config.certFile,
        keyFile: config.keyFile,
        logger,
        removeAbsentRoutes: config.removeAbsentRoutes,
        adminPath: config.adminPath,
        pipeline: {
            upstreamTimeoutMs: config.upstreamTimeoutMs,
            maxRequestBodyBytes: config.maxRequestBodyBytes,
        },
    });

    const registry = config.routesFile
        ? new FileRouteRegistry(config.routesFile, gateway, { intervalMs: config.routesPollMs }, logger)
        : undefined;

    const shutdown = (signal: NodeJS.Signals) => {
        logger.info({ signal }, 'shutting down');
        registry?.stop();
        gateway.stop().catch((err: unknown) => logger.error({ err }, 'failed to stop gateway'));
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    registry?.start();
    await gateway.start();
    logger.info('gateway stopped');
}

main().catch((err: unknown) => {
    createLogger().fatal({ err }, 'gateway failed');
    process.exit(1);
});
