import { instanceToPlain, plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { isJsonObject } from './wire';

/**
 * How a declared field type crosses the wire.
 *
 * Every type has a JSON form (body placement). Types that can also live in a
 * path segment, query value or header provide a text form; types that can
 * capture a whole query string provide a pairs form. The schema validator
 * checks that each field's type supports its location.
 *
 * The decode methods throw FieldValueError on input they do not accept.
 */
export interface FieldType<T> {
    readonly name: string;
    toJson(value: T): unknown;
    fromJson(json: unknown): T;
    toText?(value: T): string;
    fromText?(text: string): T;
    toPairs?(value: T): Array<[string, string]>;
    fromPairs?(pairs: Iterable<[string, string]>): T;
}

export class FieldValueError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'FieldValueError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

function describe(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    return typeof value;
}

const stringType: FieldType<string> = {
    name: 'string',
    toJson(value: string): unknown {
        return expectString(value);
    },
    fromJson(json: unknown): string {
        return expectString(json);
    },
    toText(value: string): string {
        return expectString(value);
    },
    fromText(text: string): string {
        return text;
    },
};

function expectString(value: unknown): string {
    if (typeof value !== 'string') {
        throw new FieldValueError(`expected string, got ${describe(value)}`);
    }
    return value;
}

function numeric(name: string, accept: (n: number) => boolean): FieldType<number> {
    const expect = (value: unknown): number => {
        if (typeof value !== 'number' || !accept(value)) {
            throw new FieldValueError(`expected ${name}, got ${typeof value === 'number' ? value : describe(value)}`);
        }
        return value;
    };
    return {
        name,
        toJson: expect,
        fromJson: expect,
        toText(value: number): string {
            return String(expect(value));
        },
        fromText(text: string): number {
            if (text.trim() === '') {
                throw new FieldValueError(`expected ${name}, got empty text`);
            }
            const parsed = Number(text);
            if (!accept(parsed)) {
                throw new FieldValueError(`expected ${name}, got "${text}"`);
            }
            return parsed;
        },
    };
}

const booleanType: FieldType<boolean> = {
    name: 'boolean',
    toJson(value: boolean): unknown {
        return expectBoolean(value);
    },
    fromJson(json: unknown): boolean {
        return expectBoolean(json);
    },
    toText(value: boolean): string {
        return String(expectBoolean(value));
    },
    fromText(text: string): boolean {
        if (text === 'true') return true;
        if (text === 'false') return false;
        throw new FieldValueError(`expected boolean, got "${text}"`);
    },
};

function expectBoolean(value: unknown): boolean {
    if (typeof value !== 'boolean') {
        throw new FieldValueError(`expected boolean, got ${describe(value)}`);
    }
    return value;
}

/**
 * Opaque JSON. Whatever the body holds is handed over as is.
 */
const jsonType: FieldType<unknown> = {
    name: 'json',
    toJson(value: unknown): unknown {
        return value;
    },
    fromJson(json: unknown): unknown {
        return json;
    },
};

/**
 * String-to-string map. The only built-in type usable as a query map.
 */
const stringMapType: FieldType<Record<string, string>> = {
    name: 'stringMap',
    toJson(value: Record<string, string>): unknown {
        return { ...value };
    },
    fromJson(json: unknown): Record<string, string> {
        if (!isJsonObject(json)) {
            throw new FieldValueError(`expected object, got ${describe(json)}`);
        }
        // fromEntries defines own properties, so a "__proto__" key is kept
        return Object.fromEntries(Object.entries(json).map(([key, value]) => [key, expectString(value)]));
    },
    toPairs(value: Record<string, string>): Array<[string, string]> {
        return Object.entries(value).map(([key, v]): [string, string] => [key, expectString(v)]);
    },
    fromPairs(pairs: Iterable<[string, string]>): Record<string, string> {
        return Object.fromEntries(pairs);
    },
};

/**
 * A class-transformer DTO. Decoding builds an instance of the class and runs
 * its class-validator constraints, so the DTO validates its own contents.
 */
function dto<T extends object>(cls: new () => T): FieldType<T> {
    return {
        name: cls.name,
        toJson(value: T): unknown {
            return instanceToPlain(value);
        },
        fromJson(json: unknown): T {
            if (!isJsonObject(json)) {
                throw new FieldValueError(`expected ${cls.name} object, got ${describe(json)}`);
            }
            const instance = plainToInstance(cls, json);
            const errors = validateSync(instance, { forbidUnknownValues: false });
            if (errors.length > 0) {
                throw new FieldValueError(`invalid ${cls.name}: ${formatValidationErrors(errors).join('; ')}`);
            }
            return instance;
        },
    };
}

function formatValidationErrors(errors: ValidationError[]): string[] {
    const messages: string[] = [];
    for (const error of errors) {
        if (error.constraints) {
            messages.push(...Object.values(error.constraints));
        }
        if (error.children && error.children.length > 0) {
            messages.push(...formatValidationErrors(error.children));
        }
    }
    return messages;
}

export const FieldTypes = {
    string: stringType,
    number: numeric('number', Number.isFinite),
    integer: numeric('integer', Number.isSafeInteger),
    boolean: booleanType,
    json: jsonType,
    stringMap: stringMapType,
    dto,
} as const;

export { formatValidationErrors };
