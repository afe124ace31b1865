import { inject, injectable } from 'inversify';
import { HttpBadRequestError, HttpForbiddenError, WireRequest } from '@endpointkit/http-api';
import { EndpointHandler } from '@endpointkit/http-server';
import { ClientEvent, GetMessagesRequest, GetMessagesResponse } from '../api/GetMessages';
import { TYPES } from '../AppConfig';
import { AccessTokens } from '../auth/AccessTokens';
import { RoomEvent, RoomStore } from '../store/RoomStore';
import { requireRoom } from './RoomAccess';

const DEFAULT_LIMIT = 10;
const MAX_LIMIT = 100;

/**
 * Pagination tokens are timeline offsets.
 */
@injectable()
export class GetMessagesHandler implements EndpointHandler<GetMessagesRequest, GetMessagesResponse> {
    constructor(
        @inject(TYPES.RoomStore) private readonly store: RoomStore,
        @inject(TYPES.AccessTokens) private readonly tokens: AccessTokens,
    ) {}

    async handle(request: GetMessagesRequest, wire: WireRequest): Promise<GetMessagesResponse> {
        const userId = this.tokens.authenticate(wire);
        const room = requireRoom(this.store, request.roomId);
        if (!room.isPublic && room.creator !== userId) {
            throw new HttpForbiddenError(`${userId} is not in ${room.roomId}`);
        }

        const from = this.parseFrom(request.from);
        const limit = request.limit ?? DEFAULT_LIMIT;
        if (limit < 1 || limit > MAX_LIMIT) {
            throw new HttpBadRequestError(`limit must be between 1 and ${MAX_LIMIT}`, 'limit');
        }

        const page = room.timeline.slice(from, from + limit);
        const next = from + page.length;

        const response = new GetMessagesResponse();
        response.chunk = page.map(toClientEvent);
        if (next < room.timeline.length) {
            response.end = String(next);
        }
        response.timelineLength = room.timeline.length;
        return response;
    }

    private parseFrom(from: string | undefined): number {
        if (from === undefined) {
            return 0;
        }
        if (!/^\d+$/.test(from)) {
            throw new HttpBadRequestError(`unknown pagination token ${from}`, 'from');
        }
        return Number(from);
    }
}

export function toClientEvent(event: RoomEvent): ClientEvent {
    const clientEvent: ClientEvent = {
        event_id: event.eventId,
        sender: event.sender,
        type: event.type,
        content: event.content,
        origin_server_ts: event.originServerTs,
    };
    if (event.stateKey !== undefined) {
        clientEvent.state_key = event.stateKey;
    }
    return clientEvent;
}
