export class RoomEvent {
    constructor(
        readonly eventId: string,
        readonly sender: string,
        readonly type: string,
        readonly content: Record<string, unknown>,
        readonly originServerTs: number,
        /** Set on state events only. */
        readonly stateKey?: string,
    ) {}
}

export class Room {
    readonly timeline: RoomEvent[] = [];
    name?: string;

    constructor(
        readonly roomId: string,
        readonly creator: string,
        readonly isPublic: boolean,
    ) {}
}

/**
 * Rooms and their timelines.
 */
export interface RoomStore {
    createRoom(creator: string, isPublic: boolean, name?: string): Room;

    getRoom(roomId: string): Room | undefined;

    /**
     * Appends an event and returns it. When `txnId` was already used by the
     * same sender, returns the earlier event instead.
     */
    appendEvent(
        room: Room,
        sender: string,
        type: string,
        content: Record<string, unknown>,
        txnId?: string,
        stateKey?: string,
    ): RoomEvent;

    publicRooms(): Room[];
}
