import { RouteConfig, RouteRegistry } from '@endpointkit/http-server';
import { CreateRoom, GetMessages, GetPublicRooms, SendMessage, SendStateEvent } from '../api';
import { CreateRoomHandler } from '../handlers/CreateRoomHandler';
import { GetMessagesHandler } from '../handlers/GetMessagesHandler';
import { GetPublicRoomsHandler } from '../handlers/GetPublicRoomsHandler';
import { SendMessageHandler } from '../handlers/SendMessageHandler';
import { SendStateEventHandler } from '../handlers/SendStateEventHandler';

export class ChatRoutes implements RouteConfig {
    configure(routes: RouteRegistry): void {
        routes.route(CreateRoom, CreateRoomHandler);
        routes.route(SendMessage, SendMessageHandler);
        routes.route(SendStateEvent, SendStateEventHandler);
        routes.route(GetMessages, GetMessagesHandler);
        routes.route(GetPublicRooms, GetPublicRoomsHandler);
    }
}
