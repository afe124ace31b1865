import 'reflect-metadata';
import { EndpointServerConfig, EndpointServerFactory } from '@endpointkit/http-server';
import { toError } from '@endpointkit/core-util';
import { AppConfig } from './AppConfig';
import { ProdServerMeta } from './ProdServerMeta';

const DEFAULT_PORT = 8008;

/**
 * Settings come from the environment:
 * - PORT (default 8008)
 * - SERVER_NAME (default localhost)
 * - DEV_ACCESS_TOKEN: when set, accepted as `@dev:<SERVER_NAME>`
 */
function loadConfig(): { app: AppConfig; server: EndpointServerConfig } {
    const port = Number(process.env.PORT ?? DEFAULT_PORT);
    if (!Number.isInteger(port) || port <= 0) {
        throw new Error(`PORT must be a positive integer, got ${process.env.PORT}`);
    }
    const serverName = process.env.SERVER_NAME ?? 'localhost';
    const tokens: Record<string, string> = {};
    const devToken = process.env.DEV_ACCESS_TOKEN;
    if (devToken) {
        tokens[devToken] = `@dev:${serverName}`;
    }
    return { app: new AppConfig(serverName, tokens), server: new EndpointServerConfig(port) };
}

async function main(): Promise<void> {
    console.log('[Server] Starting chat server...');
    const config = loadConfig();
    const server = await EndpointServerFactory.create(new ProdServerMeta(config.app), config.server);
    await server.start();

    await new Promise<void>((resolve) => {
        process.on('SIGTERM', () => {
            console.log('[Server] Received SIGTERM signal, shutting down...');
            resolve();
        });
        process.on('SIGINT', () => {
            console.log('[Server] Received SIGINT signal, shutting down...');
            resolve();
        });
    });
    await server.stop();
}

main().catch((err: unknown) => {
    const error = toError(err);
    console.error('[Server] Error during startup:', error);
    process.exit(1);
});
