import { IsString } from 'class-validator';
import { FieldTypes, FieldValueError } from '../FieldType';

class MessageContent {
    @IsString()
    msgtype!: string;

    @IsString()
    body!: string;
}

describe('FieldTypes', () => {
    describe('string', () => {
        it('should reject non-strings', () => {
            expect(() => FieldTypes.string.fromJson(1)).toThrow('expected string, got number');
        });
    });

    describe('number', () => {
        it('should parse text', () => {
            expect(FieldTypes.number.fromText?.('42.5')).toBe(42.5);
        });

        it('should reject empty and non-numeric text', () => {
            expect(() => FieldTypes.number.fromText?.('')).toThrow(FieldValueError);
            expect(() => FieldTypes.number.fromText?.('abc')).toThrow('expected number, got "abc"');
        });
    });

    describe('integer', () => {
        it('should reject fractions', () => {
            expect(() => FieldTypes.integer.fromText?.('1.5')).toThrow('expected integer, got "1.5"');
            expect(() => FieldTypes.integer.fromJson(1.5)).toThrow('expected integer, got 1.5');
        });

        it('should format as text', () => {
            expect(FieldTypes.integer.toText?.(20)).toBe('20');
        });
    });

    describe('boolean', () => {
        it('should accept only true and false', () => {
            expect(FieldTypes.boolean.fromText?.('true')).toBe(true);
            expect(FieldTypes.boolean.fromText?.('false')).toBe(false);
            expect(() => FieldTypes.boolean.fromText?.('yes')).toThrow('expected boolean, got "yes"');
        });
    });

    describe('stringMap', () => {
        it('should let later pairs win', () => {
            expect(FieldTypes.stringMap.fromPairs?.([['a', '1'], ['a', '2'], ['b', '3']])).toEqual({ a: '2', b: '3' });
        });

        it('should keep a __proto__ key as an ordinary entry', () => {
            const fromPairs = FieldTypes.stringMap.fromPairs?.([['__proto__', 'x'], ['a', 'b']]);
            const fromJson = FieldTypes.stringMap.fromJson(JSON.parse('{"__proto__":"x","a":"b"}'));

            expect(Object.keys(fromPairs ?? {})).toEqual(['__proto__', 'a']);
            expect(Object.getOwnPropertyDescriptor(fromPairs ?? {}, '__proto__')?.value).toBe('x');
            expect(Object.keys(fromJson)).toEqual(['__proto__', 'a']);
            expect(Object.getPrototypeOf(fromJson)).toBe(Object.prototype);
        });

        it('should list pairs in insertion order', () => {
            expect(FieldTypes.stringMap.toPairs?.({ b: '2', a: '1' })).toEqual([['b', '2'], ['a', '1']]);
        });

        it('should have no text form', () => {
            expect(FieldTypes.stringMap.toText).toBeUndefined();
        });
    });

    describe('dto', () => {
        const contentType = FieldTypes.dto(MessageContent);

        it('should build an instance of the class', () => {
            const content = contentType.fromJson({ msgtype: 'm.text', body: 'hello' });

            expect(content).toBeInstanceOf(MessageContent);
            expect(content.body).toBe('hello');
        });

        it('should run the class constraints', () => {
            expect(() => contentType.fromJson({ msgtype: 5, body: 'hello' })).toThrow(
                'invalid MessageContent: msgtype must be a string',
            );
        });

        it('should reject non-objects', () => {
            expect(() => contentType.fromJson([])).toThrow('expected MessageContent object, got array');
        });

        it('should write plain objects', () => {
            const content = new MessageContent();
            content.msgtype = 'm.text';
            content.body = 'hi';

            expect(contentType.toJson(content)).toEqual({ msgtype: 'm.text', body: 'hi' });
        });
    });
});
