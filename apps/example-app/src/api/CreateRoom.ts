import { Body, ProtocolErrorType } from '@endpointkit/http-api';
import { defineEndpoint } from '@endpointkit/http-codegen';

export class CreateRoomRequest {
    @Body('name', { optional: true })
    name?: string;

    /** 'public' or 'private'; private when absent. */
    @Body('visibility', { optional: true })
    visibility?: string;
}

export class CreateRoomResponse {
    @Body('room_id')
    roomId!: string;
}

export const CreateRoom = defineEndpoint({
    metadata: {
        description: 'Create a new room.',
        method: 'POST',
        name: 'create_room',
        path: '/_matrix/client/r0/createRoom',
        rateLimited: false,
        authentication: 'AccessToken',
    },
    request: CreateRoomRequest,
    response: CreateRoomResponse,
    error: ProtocolErrorType,
});
