import { Body, QueryMap } from '@endpointkit/http-api';
import { defineEndpoint } from '@endpointkit/http-codegen';

export interface PublicRoomChunk {
    room_id: string;
    name?: string;
    num_events: number;
}

/**
 * Every query parameter lands in `filter`. Recognised keys: `q`, matched
 * case-insensitively against room names. Others are ignored.
 */
export class GetPublicRoomsRequest {
    @QueryMap()
    filter!: Record<string, string>;
}

export class GetPublicRoomsResponse {
    @Body()
    chunk!: PublicRoomChunk[];

    @Body('total_room_count_estimate')
    total!: number;
}

// no error payload: every failure arrives as an unknown server error
export const GetPublicRooms = defineEndpoint({
    metadata: {
        description: 'List the rooms published to the room directory.',
        method: 'GET',
        name: 'get_public_rooms',
        path: '/_matrix/client/r0/publicRooms',
        rateLimited: false,
        authentication: 'None',
    },
    request: GetPublicRoomsRequest,
    response: GetPublicRoomsResponse,
});
