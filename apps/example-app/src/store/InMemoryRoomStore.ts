import { inject, injectable } from 'inversify';
import { AppConfig, TYPES } from '../AppConfig';
import { Room, RoomEvent, RoomStore } from './RoomStore';

export type Clock = () => number;

@injectable()
export class InMemoryRoomStore implements RoomStore {
    private readonly rooms = new Map<string, Room>();
    // `${sender} ${txnId}` → event
    private readonly transactions = new Map<string, RoomEvent>();
    private roomCount = 0;
    private eventCount = 0;

    constructor(
        @inject(TYPES.AppConfig) private readonly config: AppConfig,
        @inject(TYPES.Clock) private readonly clock: Clock,
    ) {}

    createRoom(creator: string, isPublic: boolean, name?: string): Room {
        this.roomCount++;
        const room = new Room(`!r${this.roomCount}:${this.config.serverName}`, creator, isPublic);
        this.rooms.set(room.roomId, room);
        this.appendEvent(room, creator, 'm.room.create', { creator }, undefined, '');
        if (name !== undefined) {
            this.appendEvent(room, creator, 'm.room.name', { name }, undefined, '');
        }
        return room;
    }

    getRoom(roomId: string): Room | undefined {
        return this.rooms.get(roomId);
    }

    appendEvent(
        room: Room,
        sender: string,
        type: string,
        content: Record<string, unknown>,
        txnId?: string,
        stateKey?: string,
    ): RoomEvent {
        const txnKey = txnId === undefined ? undefined : `${sender} ${txnId}`;
        if (txnKey !== undefined) {
            const earlier = this.transactions.get(txnKey);
            if (earlier !== undefined) {
                return earlier;
            }
        }

        this.eventCount++;
        const event = new RoomEvent(`$e${this.eventCount}`, sender, type, content, this.clock(), stateKey);
        room.timeline.push(event);
        if (type === 'm.room.name' && stateKey === '' && typeof content.name === 'string') {
            room.name = content.name;
        }
        if (txnKey !== undefined) {
            this.transactions.set(txnKey, event);
        }
        return event;
    }

    publicRooms(): Room[] {
        return [...this.rooms.values()].filter((room) => room.isPublic);
    }
}
