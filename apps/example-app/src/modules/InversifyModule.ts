import { ContainerModule } from 'inversify';
import { AppConfig, TYPES } from '../AppConfig';
import { AccessTokens } from '../auth/AccessTokens';
import { Clock, InMemoryRoomStore } from '../store/InMemoryRoomStore';
import { RoomStore } from '../store/RoomStore';

/**
 * InversifyModule - Application services.
 *
 * Handlers need no binding here: the server binds each routed handler class
 * in singleton scope.
 */
export const InversifyModule = new ContainerModule((options) => {
    const { bind } = options;

    bind<Clock>(TYPES.Clock).toConstantValue(() => Date.now());
    bind<RoomStore>(TYPES.RoomStore).to(InMemoryRoomStore).inSingletonScope();
    bind<AccessTokens>(TYPES.AccessTokens)
        .toDynamicValue((context) => new AccessTokens(context.get<AppConfig>(TYPES.AppConfig).accessTokens))
        .inSingletonScope();
});
