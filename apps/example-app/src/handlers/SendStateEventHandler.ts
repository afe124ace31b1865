import { inject, injectable } from 'inversify';
import { HttpForbiddenError, WireRequest } from '@endpointkit/http-api';
import { EndpointHandler } from '@endpointkit/http-server';
import { SendStateEventRequest, SendStateEventResponse } from '../api/SendStateEvent';
import { TYPES } from '../AppConfig';
import { AccessTokens } from '../auth/AccessTokens';
import { RoomStore } from '../store/RoomStore';
import { requireRoom } from './RoomAccess';

/**
 * Only the creator of a room may change its state.
 */
@injectable()
export class SendStateEventHandler implements EndpointHandler<SendStateEventRequest, SendStateEventResponse> {
    constructor(
        @inject(TYPES.RoomStore) private readonly store: RoomStore,
        @inject(TYPES.AccessTokens) private readonly tokens: AccessTokens,
    ) {}

    async handle(request: SendStateEventRequest, wire: WireRequest): Promise<SendStateEventResponse> {
        const userId = this.tokens.authenticate(wire);
        const room = requireRoom(this.store, request.roomId);
        if (room.creator !== userId) {
            throw new HttpForbiddenError(`${userId} may not change state in ${room.roomId}`);
        }

        const event = this.store.appendEvent(room, userId, request.eventType, request.content, undefined, '');

        const response = new SendStateEventResponse();
        response.eventId = event.eventId;
        return response;
    }
}
