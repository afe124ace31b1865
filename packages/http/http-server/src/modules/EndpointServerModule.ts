import { ContainerModule } from 'inversify';
import { LogApiCall } from '@endpointkit/http-api';
import { EndpointServerImpl } from '../EndpointServerImpl';
import { ErrorTranslator } from '../ErrorTranslator';

/**
 * EndpointServerModule - Framework-level DI bindings.
 *
 * Loaded into the server container by EndpointServerFactory, before any
 * application module. The config is bound by the factory itself.
 *
 * Module Loading Order:
 * 1. EndpointServerModule (server container) ← YOU ARE HERE
 * 2. ServerMeta.getDIModules() (application container)
 * 3. appOverrides (application container, tests only)
 */
export const EndpointServerModule = new ContainerModule((options) => {
    const { bind } = options;

    // LogApiCall is not decorated; share one instance
    bind<LogApiCall>(LogApiCall).toConstantValue(new LogApiCall());
    bind<ErrorTranslator>(ErrorTranslator).toSelf().inSingletonScope();
    bind<EndpointServerImpl>(EndpointServerImpl).toSelf().inSingletonScope();
});
