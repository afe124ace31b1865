import { ContainerModule } from 'inversify';
import { AppConfig, TYPES } from '../AppConfig';

/**
 * Binds the application config. Loaded before InversifyModule, whose
 * bindings read it.
 */
export function configModule(config: AppConfig): ContainerModule {
    return new ContainerModule((options) => {
        options.bind<AppConfig>(TYPES.AppConfig).toConstantValue(config);
    });
}
