import { inject, injectable } from 'inversify';
import { HttpBadRequestError, WireRequest } from '@endpointkit/http-api';
import { EndpointHandler } from '@endpointkit/http-server';
import { CreateRoomRequest, CreateRoomResponse } from '../api/CreateRoom';
import { TYPES } from '../AppConfig';
import { AccessTokens } from '../auth/AccessTokens';
import { RoomStore } from '../store/RoomStore';

@injectable()
export class CreateRoomHandler implements EndpointHandler<CreateRoomRequest, CreateRoomResponse> {
    constructor(
        @inject(TYPES.RoomStore) private readonly store: RoomStore,
        @inject(TYPES.AccessTokens) private readonly tokens: AccessTokens,
    ) {}

    async handle(request: CreateRoomRequest, wire: WireRequest): Promise<CreateRoomResponse> {
        const userId = this.tokens.authenticate(wire);
        const visibility = request.visibility ?? 'private';
        if (visibility !== 'public' && visibility !== 'private') {
            throw new HttpBadRequestError("visibility must be 'public' or 'private'", 'visibility');
        }

        const room = this.store.createRoom(userId, visibility === 'public', request.name);
        console.log(`[CreateRoomHandler] ${userId} created ${room.roomId}`);

        const response = new CreateRoomResponse();
        response.roomId = room.roomId;
        return response;
    }
}
