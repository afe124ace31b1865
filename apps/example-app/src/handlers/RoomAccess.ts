import { HttpNotFoundError } from '@endpointkit/http-api';
import { Room, RoomStore } from '../store/RoomStore';

export function requireRoom(store: RoomStore, roomId: string): Room {
    const room = store.getRoom(roomId);
    if (room === undefined) {
        throw new HttpNotFoundError(`Unknown room ${roomId}`);
    }
    return room;
}
