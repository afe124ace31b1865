import { IsString } from 'class-validator';
import { Body, Field, FieldTypes, Header, Path, Query, QueryMap, RawFieldDeclaration } from '@endpointkit/http-api';
import { parseFieldDeclarations, parseSchema } from '../SchemaParser';

class MessageContent {
    @IsString()
    text!: string;
}

class PostMessageRequest {
    @Path()
    roomId!: string;

    @Query('limit', { optional: true })
    limit?: number;

    @QueryMap()
    extra!: Record<string, string>;

    @Header('X-Txn-Id')
    txnId!: string;

    @Body()
    content!: MessageContent;

    @Field()
    tags!: string[];

    @Body('is_direct')
    isDirect!: boolean;
}

class RoomResponse {
    @Path()
    roomId!: string;
}

class PagedResponse {
    @Query('next')
    next!: string;

    @QueryMap()
    extra!: Record<string, string>;

    @Body()
    chunk!: string;
}

class Empty {}

describe('parseSchema', () => {
    it('should read fields in declaration order with their locations', () => {
        const result = parseSchema('request', PostMessageRequest);

        if (!result.ok) {
            throw new Error(result.violations.map((v) => v.message).join(', '));
        }
        const schema = result.value;
        expect(schema.fields.map((f) => [f.name, f.location])).toEqual([
            ['roomId', { kind: 'path' }],
            ['limit', { kind: 'query', key: 'limit' }],
            ['extra', { kind: 'queryMap' }],
            ['txnId', { kind: 'header', headerName: 'x-txn-id' }],
            ['content', { kind: 'body', key: 'content' }],
            ['tags', { kind: 'body', key: 'tags' }],
            ['isDirect', { kind: 'body', key: 'is_direct' }],
        ]);
        expect(schema.fields.map((f) => f.optional)).toEqual([false, true, false, false, false, false, false]);
    });

    it('should derive field types from the emitted design types', () => {
        const result = parseSchema('request', PostMessageRequest);
        const types = result.ok ? result.value.fields.map((f) => f.type) : [];

        expect(types[0]).toBe(FieldTypes.string);
        expect(types[1]).toBe(FieldTypes.number);
        expect(types[2]).toBe(FieldTypes.stringMap);
        expect(types[3]).toBe(FieldTypes.string);
        expect(types[4].name).toBe('MessageContent');
        expect(types[5]).toBe(FieldTypes.json);
        expect(types[6]).toBe(FieldTypes.boolean);
    });

    it('should group fields and compute the flags', () => {
        const result = parseSchema('request', PostMessageRequest);
        if (!result.ok) {
            throw new Error('expected a schema');
        }
        const schema = result.value;

        expect(schema.pathFields.map((f) => f.name)).toEqual(['roomId']);
        expect(schema.bodyFields.map((f) => f.name)).toEqual(['content', 'tags', 'isDirect']);
        expect(schema.queryMapField?.name).toBe('extra');
        expect(schema.newtypeBodyField).toBeUndefined();
        expect(schema.hasPathFields).toBe(true);
        expect(schema.hasQueryFields).toBe(true);
        expect(schema.hasQueryMapField).toBe(true);
        expect(schema.hasHeaderFields).toBe(true);
        expect(schema.hasBodyFields).toBe(true);
        expect(schema.hasNewtypeBodyField).toBe(false);
    });

    it('should accept a class without fields', () => {
        const result = parseSchema('response', Empty);

        expect(result.ok && result.value.fields).toEqual([]);
        expect(result.ok && result.value.create()).toBeInstanceOf(Empty);
    });

    it('should reject path fields in a response', () => {
        const result = parseSchema('response', RoomResponse);

        expect(result.ok ? [] : result.violations.map((v) => [v.field, v.message])).toEqual([
            ['roomId', 'response fields cannot be path fields'],
        ]);
    });

    it('should reject query and query map fields in a response', () => {
        const result = parseSchema('response', PagedResponse);

        expect(result.ok ? [] : result.violations.map((v) => [v.rule, v.field, v.message])).toEqual([
            ['response-query', 'next', 'response fields cannot be query fields'],
            ['response-query', 'extra', 'response fields cannot be query map fields'],
        ]);
    });
});

describe('parseFieldDeclarations', () => {
    it('should reject an unrecognised location marker', () => {
        const result = parseFieldDeclarations('request', [new RawFieldDeclaration('session', 'cookie')]);

        expect(result.ok ? [] : result.violations.map((v) => v.message)).toEqual([
            'unrecognised location marker "cookie"',
        ]);
    });

    it('should collect every bad declaration', () => {
        const result = parseFieldDeclarations('request', [
            new RawFieldDeclaration('first', 'header'),
            new RawFieldDeclaration('second', 'header', { headerName: 'bad name' }),
            new RawFieldDeclaration(Symbol('hidden'), 'body'),
            new RawFieldDeclaration('fine', 'body', {}, String),
            new RawFieldDeclaration('weird', 'body', {}, 42),
        ]);

        expect(result.ok ? [] : result.violations.map((v) => v.message)).toEqual([
            'header field needs a valid header name, got undefined',
            'header field needs a valid header name, got "bad name"',
            'symbol property Symbol(hidden) cannot be a wire field',
            'cannot derive a field type from 42',
        ]);
    });

    it('should prefer an explicit type over the design type', () => {
        const result = parseFieldDeclarations('request', [
            new RawFieldDeclaration('ts', 'query', { type: FieldTypes.integer }, Number),
        ]);

        expect(result.ok && result.value[0].type).toBe(FieldTypes.integer);
    });

    it('should fall back to the location type when no design type was emitted', () => {
        const result = parseFieldDeclarations('request', [
            new RawFieldDeclaration('token', 'header', { headerName: 'x-token' }),
            new RawFieldDeclaration('params', 'query_map'),
            new RawFieldDeclaration('payload', 'newtype_body'),
        ]);

        expect(result.ok ? result.value.map((f) => f.type) : []).toEqual([
            FieldTypes.string,
            FieldTypes.stringMap,
            FieldTypes.json,
        ]);
    });
});
