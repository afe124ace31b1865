import { Body, Field, getFieldDeclarations, Header, Path, Query } from '../decorators';

class RoomRequest {
    @Path()
    roomId!: string;

    @Query('ts', { optional: true })
    timestamp?: number;

    @Header('X-Txn-Id')
    txnId!: string;

    @Field()
    note?: string;
}

class ExtendedRoomRequest extends RoomRequest {
    @Body('extra_flag')
    extraFlag!: boolean;
}

describe('field decorators', () => {
    it('should record declarations in order', () => {
        const declarations = getFieldDeclarations(RoomRequest);

        expect(declarations.map((d) => d.propertyKey)).toEqual(['roomId', 'timestamp', 'txnId', 'note']);
        expect(declarations.map((d) => d.marker)).toEqual(['path', 'query', 'header', undefined]);
    });

    it('should capture keys, header names and optionality', () => {
        const [roomId, timestamp, txnId] = getFieldDeclarations(RoomRequest);

        expect(roomId.optional).toBe(false);
        expect(timestamp.key).toBe('ts');
        expect(timestamp.optional).toBe(true);
        expect(txnId.headerName).toBe('X-Txn-Id');
    });

    it('should capture the emitted design type', () => {
        const [roomId, timestamp] = getFieldDeclarations(RoomRequest);

        expect(roomId.designType).toBe(String);
        expect(timestamp.designType).toBe(Number);
    });

    it('should append subclass fields without touching the parent', () => {
        expect(getFieldDeclarations(ExtendedRoomRequest).map((d) => d.propertyKey)).toEqual([
            'roomId',
            'timestamp',
            'txnId',
            'note',
            'extraFlag',
        ]);
        expect(getFieldDeclarations(RoomRequest)).toHaveLength(4);
    });

    it('should return nothing for undecorated classes', () => {
        class Plain {}

        expect(getFieldDeclarations(Plain)).toEqual([]);
    });
});
