import { Container, ContainerModule } from 'inversify';
import { EndpointServerConfig, SERVER_TYPES } from './config/EndpointServerConfig';
import { EndpointServer } from './EndpointServer';
import { EndpointServerImpl } from './EndpointServerImpl';
import { EndpointServerModule } from './modules/EndpointServerModule';
import { ServerMeta } from './ServerMeta';

/**
 * EndpointServerFactory - Creates initialised servers.
 *
 * 1. Creates the server container and binds the config
 * 2. Loads EndpointServerModule
 * 3. Resolves EndpointServerImpl
 * 4. Initialises it (application modules, overrides, routes)
 * 5. Returns it as the EndpointServer interface, hiding initialize()
 *
 * Usage:
 * ```typescript
 * // Production
 * const server = await EndpointServerFactory.create(new ChatServerMeta());
 * await server.start();
 *
 * // Testing with appOverrides
 * const appOverrides = new ContainerModule(async (options) => {
 *     (await options.rebind<RoomStore>(TYPES.RoomStore)).toConstantValue(mockStore);
 * });
 * const server = await EndpointServerFactory.create(new ChatServerMeta(), new EndpointServerConfig(), appOverrides);
 * ```
 */
export class EndpointServerFactory {
    /**
     * @param appOverrides - loaded after the application modules, so its bindings win
     */
    static async create(
        meta: ServerMeta,
        config: EndpointServerConfig = new EndpointServerConfig(),
        appOverrides?: ContainerModule,
    ): Promise<EndpointServer> {
        const serverContainer = new Container();
        serverContainer.bind<EndpointServerConfig>(SERVER_TYPES.EndpointServerConfig).toConstantValue(config);
        await serverContainer.load(EndpointServerModule);

        const serverImpl = serverContainer.get(EndpointServerImpl);
        await serverImpl.initialize(serverContainer, meta, appOverrides);
        return serverImpl;
    }
}
