import {
    FieldLocation,
    FieldType,
    FieldTypes,
    getFieldDeclarations,
    isHeaderName,
    isLocationMarker,
    RawFieldDeclaration,
    Violation,
} from '@endpointkit/http-api';
import { parsed, ParseResult, rejected } from './ParseResult';

export type SchemaKind = 'request' | 'response';

/**
 * One declared field of a request or response.
 */
export class SchemaField {
    constructor(
        /** Property name on the request/response class. */
        readonly name: string,
        readonly type: FieldType<unknown>,
        readonly location: FieldLocation,
        readonly optional: boolean,
    ) {}
}

/**
 * Ordered fields of one side of an endpoint, grouped by location. The
 * groupings and flags are computed once, here.
 */
export class Schema<T extends object> {
    readonly pathFields: readonly SchemaField[];
    readonly queryFields: readonly SchemaField[];
    readonly queryMapFields: readonly SchemaField[];
    readonly headerFields: readonly SchemaField[];
    readonly bodyFields: readonly SchemaField[];
    readonly newtypeBodyFields: readonly SchemaField[];

    readonly hasPathFields: boolean;
    readonly hasQueryFields: boolean;
    readonly hasQueryMapField: boolean;
    readonly hasHeaderFields: boolean;
    readonly hasBodyFields: boolean;
    readonly hasNewtypeBodyField: boolean;

    constructor(
        readonly kind: SchemaKind,
        readonly type: new () => T,
        readonly fields: readonly SchemaField[],
    ) {
        const at = (kind: FieldLocation['kind']) => fields.filter((f) => f.location.kind === kind);
        this.pathFields = at('path');
        this.queryFields = at('query');
        this.queryMapFields = at('queryMap');
        this.headerFields = at('header');
        this.bodyFields = at('body');
        this.newtypeBodyFields = at('newtypeBody');

        this.hasPathFields = this.pathFields.length > 0;
        this.hasQueryFields = this.queryFields.length > 0;
        this.hasQueryMapField = this.queryMapFields.length > 0;
        this.hasHeaderFields = this.headerFields.length > 0;
        this.hasBodyFields = this.bodyFields.length > 0;
        this.hasNewtypeBodyField = this.newtypeBodyFields.length > 0;
        Object.freeze(this);
    }

    get queryMapField(): SchemaField | undefined {
        return this.queryMapFields[0];
    }

    get newtypeBodyField(): SchemaField | undefined {
        return this.newtypeBodyFields[0];
    }

    /** A fresh, empty value of the declared class. */
    create(): T {
        return new this.type();
    }
}

/**
 * Reads the field declarations of a request or response class.
 */
export function parseSchema<T extends object>(kind: SchemaKind, type: new () => T): ParseResult<Schema<T>> {
    const fields = parseFieldDeclarations(kind, getFieldDeclarations(type));
    return fields.ok ? parsed(new Schema(kind, type, fields.value)) : rejected(fields.violations);
}

export function parseFieldDeclarations(
    kind: SchemaKind,
    declarations: readonly RawFieldDeclaration[],
): ParseResult<SchemaField[]> {
    const fields: SchemaField[] = [];
    const violations: Violation[] = [];

    for (const declaration of declarations) {
        if (typeof declaration.propertyKey === 'symbol') {
            violations.push(
                new Violation('field-name', `symbol property ${declaration.propertyKey.toString()} cannot be a wire field`),
            );
            continue;
        }
        const name = declaration.propertyKey;
        const location = parseLocation(kind, name, declaration, violations);
        if (location === undefined) {
            continue;
        }
        const type = declaration.explicitType ?? typeFromDesign(declaration.designType, location);
        if (type === undefined) {
            violations.push(new Violation('field-type', `cannot derive a field type from ${String(declaration.designType)}`, name));
            continue;
        }
        fields.push(new SchemaField(name, type, location, declaration.optional));
    }

    return violations.length > 0 ? rejected(violations) : parsed(fields);
}

function parseLocation(
    kind: SchemaKind,
    name: string,
    declaration: RawFieldDeclaration,
    violations: Violation[],
): FieldLocation | undefined {
    const marker = declaration.marker ?? 'body';
    if (!isLocationMarker(marker)) {
        violations.push(new Violation('location-marker', `unrecognised location marker "${marker}"`, name));
        return undefined;
    }
    const key = declaration.key ?? name;
    if (key === '') {
        violations.push(new Violation('field-key', 'key must not be empty', name));
        return undefined;
    }

    switch (marker) {
        case 'path':
            if (kind === 'response') {
                violations.push(new Violation('response-path', 'response fields cannot be path fields', name));
                return undefined;
            }
            return { kind: 'path' };
        case 'query':
            if (kind === 'response') {
                violations.push(new Violation('response-query', 'response fields cannot be query fields', name));
                return undefined;
            }
            return { kind: 'query', key };
        case 'query_map':
            if (kind === 'response') {
                violations.push(new Violation('response-query', 'response fields cannot be query map fields', name));
                return undefined;
            }
            return { kind: 'queryMap' };
        case 'header': {
            const headerName = declaration.headerName;
            if (headerName === undefined || !isHeaderName(headerName)) {
                violations.push(
                    new Violation('header-name', `header field needs a valid header name, got ${JSON.stringify(headerName)}`, name),
                );
                return undefined;
            }
            return { kind: 'header', headerName: headerName.toLowerCase() };
        }
        case 'body':
            return { kind: 'body', key };
        case 'newtype_body':
            return { kind: 'newtypeBody' };
    }
}

/**
 * Field type for a `design:type` emitted by the compiler. Without one, the
 * location's natural type is used.
 */
function typeFromDesign(designType: unknown, location: FieldLocation): FieldType<unknown> | undefined {
    if (designType === undefined || designType === Object) {
        switch (location.kind) {
            case 'path':
            case 'query':
            case 'header':
                return designType === undefined ? FieldTypes.string : FieldTypes.json;
            case 'queryMap':
                return FieldTypes.stringMap;
            default:
                return FieldTypes.json;
        }
    }
    if (designType === String) return FieldTypes.string;
    if (designType === Number) return FieldTypes.number;
    if (designType === Boolean) return FieldTypes.boolean;
    if (designType === Array) return FieldTypes.json;
    if (isClass(designType)) return FieldTypes.dto(designType);
    return undefined;
}

function isClass(value: unknown): value is new () => object {
    return typeof value === 'function';
}
