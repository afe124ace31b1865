import 'reflect-metadata';
import { LocationMarker } from './FieldLocation';
import { FieldType } from './FieldType';

/**
 * Metadata keys under which field declarations are stored on request and
 * response classes.
 */
export const METADATA_KEYS = {
    FIELDS: 'endpointkit:fields',
};

/**
 * A field declaration exactly as the decorators recorded it. Nothing here is
 * checked yet; the schema parser turns these into fields or violations.
 */
export class RawFieldDeclaration {
    readonly propertyKey: string | symbol;
    /** Location marker, undefined when the field carries none. */
    readonly marker: string | undefined;
    /** Query or body key when it differs from the property name. */
    readonly key?: string;
    readonly headerName?: string;
    readonly optional: boolean;
    readonly explicitType?: FieldType<unknown>;
    /** `design:type` emitted by the compiler, if any. */
    readonly designType: unknown;

    constructor(
        propertyKey: string | symbol,
        marker: string | undefined,
        options: { key?: string; headerName?: string; optional?: boolean; type?: FieldType<unknown> } = {},
        designType: unknown = undefined,
    ) {
        this.propertyKey = propertyKey;
        this.marker = marker;
        this.key = options.key;
        this.headerName = options.headerName;
        this.optional = options.optional ?? false;
        this.explicitType = options.type;
        this.designType = designType;
    }
}

export interface FieldOptions {
    /** Location marker; a field without one goes to the JSON body. */
    in?: LocationMarker;
    /** Query or body key, defaults to the property name. */
    key?: string;
    /** Header name, required with `in: 'header'`. */
    header?: string;
    /** Absent values are allowed when decoding and skipped when encoding. */
    optional?: boolean;
    /** Overrides the type derived from `design:type`. */
    type?: FieldType<unknown>;
}

export type LocatedFieldOptions = Pick<FieldOptions, 'optional' | 'type'>;

/**
 * Declares a field of a request or response class.
 *
 * ```typescript
 * export class SendMessageRequest {
 *     @Path() roomId!: string;
 *     @Query('ts', { optional: true, type: FieldTypes.integer }) timestamp?: number;
 *     @Header('x-txn-id') txnId!: string;
 *     @Field() body!: string;
 * }
 * ```
 */
export function Field(options: FieldOptions = {}): PropertyDecorator {
    return (target: object, propertyKey: string | symbol) => {
        const owner = target.constructor;
        const designType: unknown = Reflect.getMetadata('design:type', target, propertyKey);
        const declaration = new RawFieldDeclaration(
            propertyKey,
            options.in,
            { key: options.key, headerName: options.header, optional: options.optional, type: options.type },
            designType,
        );
        // copy, so a subclass never appends to its parent's list
        Reflect.defineMetadata(METADATA_KEYS.FIELDS, [...getFieldDeclarations(owner), declaration], owner);
    };
}

/** Substituted into the path template, in declaration order. */
export function Path(options: LocatedFieldOptions = {}): PropertyDecorator {
    return Field({ ...options, in: 'path' });
}

export function Query(key?: string, options: LocatedFieldOptions = {}): PropertyDecorator {
    return Field({ ...options, in: 'query', key });
}

/** Receives every query pair; excludes named query fields. */
export function QueryMap(options: LocatedFieldOptions = {}): PropertyDecorator {
    return Field({ ...options, in: 'query_map' });
}

export function Header(name: string, options: LocatedFieldOptions = {}): PropertyDecorator {
    return Field({ ...options, in: 'header', header: name });
}

export function Body(key?: string, options: LocatedFieldOptions = {}): PropertyDecorator {
    return Field({ ...options, in: 'body', key });
}

/** The field is the whole JSON body. */
export function NewtypeBody(options: LocatedFieldOptions = {}): PropertyDecorator {
    return Field({ ...options, in: 'newtype_body' });
}

/**
 * Field declarations of a class, in declaration order, inherited ones first.
 */
export function getFieldDeclarations(cls: Function): RawFieldDeclaration[] {
    const declarations: unknown = Reflect.getMetadata(METADATA_KEYS.FIELDS, cls);
    if (!Array.isArray(declarations)) {
        return [];
    }
    return declarations.filter((d): d is RawFieldDeclaration => d instanceof RawFieldDeclaration);
}
