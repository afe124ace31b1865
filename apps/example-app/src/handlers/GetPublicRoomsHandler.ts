import { inject, injectable } from 'inversify';
import { EndpointHandler } from '@endpointkit/http-server';
import { GetPublicRoomsRequest, GetPublicRoomsResponse, PublicRoomChunk } from '../api/GetPublicRooms';
import { TYPES } from '../AppConfig';
import { RoomStore } from '../store/RoomStore';

@injectable()
export class GetPublicRoomsHandler implements EndpointHandler<GetPublicRoomsRequest, GetPublicRoomsResponse> {
    constructor(@inject(TYPES.RoomStore) private readonly store: RoomStore) {}

    async handle(request: GetPublicRoomsRequest): Promise<GetPublicRoomsResponse> {
        const query: string | undefined = request.filter.q;
        const term = query?.toLowerCase();
        const rooms = this.store
            .publicRooms()
            .filter((room) => term === undefined || (room.name ?? '').toLowerCase().includes(term));

        const response = new GetPublicRoomsResponse();
        response.chunk = rooms.map((room): PublicRoomChunk => {
            const chunk: PublicRoomChunk = { room_id: room.roomId, num_events: room.timeline.length };
            if (room.name !== undefined) {
                chunk.name = room.name;
            }
            return chunk;
        });
        response.total = rooms.length;
        return response;
    }
}
