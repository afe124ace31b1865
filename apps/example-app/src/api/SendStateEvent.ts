import { Body, NewtypeBody, Path, ProtocolErrorType } from '@endpointkit/http-api';
import { defineEndpoint } from '@endpointkit/http-codegen';

export class SendStateEventRequest {
    @Path()
    roomId!: string;

    @Path()
    eventType!: string;

    /** The event content, sent as the whole body. */
    @NewtypeBody()
    content!: Record<string, unknown>;
}

export class SendStateEventResponse {
    @Body('event_id')
    eventId!: string;
}

export const SendStateEvent = defineEndpoint({
    metadata: {
        description: 'Set a piece of room state, such as its name.',
        method: 'PUT',
        name: 'send_state_event',
        path: '/_matrix/client/r0/rooms/{roomId}/state/{eventType}',
        rateLimited: false,
        authentication: 'AccessToken',
    },
    request: SendStateEventRequest,
    response: SendStateEventResponse,
    error: ProtocolErrorType,
});
