import { ContainerModule } from 'inversify';
import { RouteConfig, ServerMeta } from '@endpointkit/http-server';
import { AppConfig } from './AppConfig';
import { configModule } from './modules/ConfigModule';
import { InversifyModule } from './modules/InversifyModule';
import { ChatRoutes } from './routes/ChatRoutes';

/**
 * ProdServerMeta - What the chat server is made of.
 *
 * Usage:
 * ```typescript
 * const server = await EndpointServerFactory.create(new ProdServerMeta(new AppConfig('example.org', tokens)));
 * await server.start();
 * ```
 */
export class ProdServerMeta implements ServerMeta {
    constructor(private readonly config: AppConfig = new AppConfig()) {}

    getDIModules(): ContainerModule[] {
        return [configModule(this.config), InversifyModule];
    }

    getRoutes(): RouteConfig[] {
        return [new ChatRoutes()];
    }
}
