import { Body, FieldTypes, Header, Path, ProtocolErrorType, Query } from '@endpointkit/http-api';
import { defineEndpoint } from '@endpointkit/http-codegen';

/**
 * An event as clients see it.
 */
export interface ClientEvent {
    event_id: string;
    sender: string;
    type: string;
    content: Record<string, unknown>;
    origin_server_ts: number;
    state_key?: string;
}

export class GetMessagesRequest {
    @Path()
    roomId!: string;

    /** Pagination token from a previous response's `end`. */
    @Query('from', { optional: true })
    from?: string;

    @Query('limit', { optional: true, type: FieldTypes.integer })
    limit?: number;
}

export class GetMessagesResponse {
    @Body()
    chunk!: ClientEvent[];

    /** Absent on the last page. */
    @Body('end', { optional: true })
    end?: string;

    /** Number of events in the room's timeline. */
    @Header('X-Timeline-Length', { type: FieldTypes.integer })
    timelineLength!: number;
}

export const GetMessages = defineEndpoint({
    metadata: {
        description: 'Page through the timeline of a room, oldest first.',
        method: 'GET',
        name: 'get_messages',
        path: '/_matrix/client/r0/rooms/{roomId}/messages',
        rateLimited: false,
        authentication: 'AccessToken',
    },
    request: GetMessagesRequest,
    response: GetMessagesResponse,
    error: ProtocolErrorType,
});
