import { Body, Path, ProtocolErrorType } from '@endpointkit/http-api';
import { defineEndpoint } from '@endpointkit/http-codegen';

/**
 * Sending twice with the same txnId returns the first event id and stores
 * nothing new.
 */
export class SendMessageRequest {
    @Path()
    roomId!: string;

    @Path()
    eventType!: string;

    @Path()
    txnId!: string;

    @Body('msgtype')
    msgType!: string;

    @Body()
    body!: string;
}

export class SendMessageResponse {
    @Body('event_id')
    eventId!: string;
}

export const SendMessage = defineEndpoint({
    metadata: {
        description: 'Send a message event to a room.',
        method: 'PUT',
        name: 'send_message',
        path: '/_matrix/client/r0/rooms/{roomId}/send/{eventType}/{txnId}',
        rateLimited: true,
        authentication: 'AccessToken',
    },
    request: SendMessageRequest,
    response: SendMessageResponse,
    error: ProtocolErrorType,
});
