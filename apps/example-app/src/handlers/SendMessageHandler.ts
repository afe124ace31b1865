import { inject, injectable } from 'inversify';
import { HttpForbiddenError, WireRequest } from '@endpointkit/http-api';
import { EndpointHandler } from '@endpointkit/http-server';
import { SendMessageRequest, SendMessageResponse } from '../api/SendMessage';
import { TYPES } from '../AppConfig';
import { AccessTokens } from '../auth/AccessTokens';
import { RoomStore } from '../store/RoomStore';
import { requireRoom } from './RoomAccess';

@injectable()
export class SendMessageHandler implements EndpointHandler<SendMessageRequest, SendMessageResponse> {
    constructor(
        @inject(TYPES.RoomStore) private readonly store: RoomStore,
        @inject(TYPES.AccessTokens) private readonly tokens: AccessTokens,
    ) {}

    async handle(request: SendMessageRequest, wire: WireRequest): Promise<SendMessageResponse> {
        const userId = this.tokens.authenticate(wire);
        const room = requireRoom(this.store, request.roomId);
        if (!room.isPublic && room.creator !== userId) {
            throw new HttpForbiddenError(`${userId} is not in ${room.roomId}`);
        }

        const content = { msgtype: request.msgType, body: request.body };
        const event = this.store.appendEvent(room, userId, request.eventType, content, request.txnId);

        const response = new SendMessageResponse();
        response.eventId = event.eventId;
        return response;
    }
}
