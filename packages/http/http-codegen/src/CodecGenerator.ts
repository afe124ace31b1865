import { decodePathSegment, encodePathSegment, toError } from '@endpointkit/core-util';
import {
    decodeJsonBody,
    EMPTY_BODY,
    encodeJson,
    FieldValueError,
    FromHttpRequestError,
    FromHttpResponseError,
    GeneratedEndpoint,
    HeaderMap,
    IntoHttpError,
    InvalidHeaderError,
    isJsonObject,
    WireRequest,
    WireResponse,
} from '@endpointkit/http-api';
import { CompiledEndpoint } from './SchemaAssembler';
import { SchemaField, Schema } from './SchemaParser';

const JSON_CONTENT_TYPE = 'application/json';
// only used to parse origin-form request targets
const PLACEHOLDER_ORIGIN = 'http://localhost';

type DecodeFailure = (part: 'Header' | 'Body', message: string, field?: string, cause?: Error) => Error;

/**
 * Builds the four codec routines of a validated endpoint.
 *
 * Everything that depends only on the declaration (groupings, the split
 * template, the error type) is captured here once; the routines themselves
 * only walk the fields.
 */
export function generateCodecs<Req extends object, Res extends object, E>(
    compiled: CompiledEndpoint<Req, Res, E>,
): GeneratedEndpoint<Req, Res, E> {
    const { metadata, placeholders, request, response, errorType } = compiled;
    const templateSegments = metadata.path.slice(1).split('/');

    const requestFailure = (part: 'Header' | 'Body', message: string, field?: string, cause?: Error): Error =>
        new FromHttpRequestError(part, message, field, cause);
    const responseFailure = (part: 'Header' | 'Body', message: string, field?: string, cause?: Error): Error =>
        FromHttpResponseError.deserialization<E>(part, message, field, cause);

    function buildUri(value: Req, baseUrl: string): string {
        const segments = [...templateSegments];
        request.pathFields.forEach((field, index) => {
            const placeholder = placeholders[index];
            const raw = Reflect.get(value, field.name);
            if (placeholder === undefined || !isPresent(field, raw)) {
                return;
            }
            const text = textOf(field, raw);
            // URL parsing drops or collapses these, even when escaped
            if (text === '' || text === '.' || text === '..') {
                throw new IntoHttpError(
                    'InvalidValue',
                    `field "${field.name}": ${JSON.stringify(text)} cannot be sent as a path segment`,
                    field.name,
                );
            }
            segments[placeholder.segmentIndex] = encodePathSegment(text);
        });

        const query = new URLSearchParams();
        for (const field of request.queryFields) {
            const raw = Reflect.get(value, field.name);
            if (field.location.kind === 'query' && isPresent(field, raw)) {
                query.append(field.location.key, textOf(field, raw));
            }
        }
        const queryMap = request.queryMapField;
        if (queryMap !== undefined) {
            const raw = Reflect.get(value, queryMap.name);
            if (isPresent(queryMap, raw)) {
                for (const [key, text] of pairsOf(queryMap, raw)) {
                    query.append(key, text);
                }
            }
        }

        const base = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
        const queryString = query.toString();
        return `${base}/${segments.join('/')}${queryString === '' ? '' : `?${queryString}`}`;
    }

    function intoHttpRequest(value: Req, baseUrl: string, accessToken?: string): WireRequest {
        if (metadata.authentication === 'AccessToken' && accessToken === undefined) {
            throw IntoHttpError.needsAuthentication(metadata.name);
        }
        const uri = buildUri(value, baseUrl);
        const headers = encodeHeaders(request, value);
        if (metadata.authentication === 'AccessToken' && accessToken !== undefined) {
            setHeader(headers, 'authorization', `Bearer ${accessToken}`);
        }
        const body = encodeBody(request, value, EMPTY_BODY);
        if (body.length > 0) {
            headers.set('content-type', JSON_CONTENT_TYPE);
        }
        return new WireRequest(metadata.method, uri, headers, body);
    }

    function fromHttpRequest(wire: WireRequest): Req {
        const url = parseTarget(wire.uri);
        const values: Record<string, unknown> = {};
        const segments = url.pathname.slice(1).split('/');
        request.pathFields.forEach((field, index) => {
            const placeholder = placeholders[index];
            const segment = placeholder === undefined ? undefined : segments[placeholder.segmentIndex];
            if (segment === undefined || segment === '') {
                throw new FromHttpRequestError('Path', `missing path segment for "${field.name}"`, field.name);
            }
            values[field.name] = decodeRequestPart('Path', field, () => fromText(field, decodePathSegment(segment)));
        });

        for (const field of request.queryFields) {
            if (field.location.kind !== 'query') {
                continue;
            }
            const text = url.searchParams.get(field.location.key);
            if (text === null) {
                if (!field.optional) {
                    throw new FromHttpRequestError('Query', `missing query parameter "${field.location.key}"`, field.name);
                }
                continue;
            }
            values[field.name] = decodeRequestPart('Query', field, () => fromText(field, text));
        }
        const queryMap = request.queryMapField;
        if (queryMap !== undefined) {
            values[queryMap.name] = decodeRequestPart('Query', queryMap, () => fromPairs(queryMap, url.searchParams.entries()));
        }

        decodeHeaders(request, wire.headers, values, requestFailure);
        decodeBody(request, wire.body, values, requestFailure);
        return Object.assign(request.create(), values);
    }

    function intoHttpResponse(value: Res): WireResponse {
        const headers = encodeHeaders(response, value);
        headers.set('content-type', JSON_CONTENT_TYPE);
        const body = encodeBody(response, value, encodeJson({}));
        return new WireResponse(200, headers, body);
    }

    function fromHttpResponse(wire: WireResponse): Res {
        if (wire.status >= 400) {
            let error: E;
            try {
                error = errorType.fromHttpResponse(wire);
            } catch (err: unknown) {
                throw FromHttpResponseError.unknown<E>(wire, toError(err));
            }
            throw FromHttpResponseError.known<E>(wire.status, error);
        }
        const values: Record<string, unknown> = {};
        decodeHeaders(response, wire.headers, values, responseFailure);
        decodeBody(response, wire.body, values, responseFailure);
        return Object.assign(response.create(), values);
    }

    return Object.freeze({
        metadata,
        isNonAuth: metadata.authentication === 'None',
        errorType,
        requestType: request.type,
        responseType: response.type,
        intoHttpRequest,
        fromHttpRequest,
        intoHttpResponse,
        fromHttpResponse,
    });
}

// ---------------------------------------------------------------------------
// encoding
// ---------------------------------------------------------------------------

/**
 * False for an absent optional value.
 * @throws IntoHttpError when a required value is absent
 */
function isPresent(field: SchemaField, value: unknown): boolean {
    if (value !== undefined && value !== null) {
        return true;
    }
    if (field.optional) {
        return false;
    }
    throw new IntoHttpError('InvalidValue', `field "${field.name}" is required`, field.name);
}

function encodeWith<T>(field: SchemaField, encode: () => T): T {
    try {
        return encode();
    } catch (err: unknown) {
        const error = toError(err);
        throw new IntoHttpError('InvalidValue', `field "${field.name}": ${error.message}`, field.name, error);
    }
}

function textOf(field: SchemaField, value: unknown): string {
    return encodeWith(field, () => {
        if (field.type.toText === undefined) {
            throw new FieldValueError(`type ${field.type.name} has no text form`);
        }
        return field.type.toText(value);
    });
}

function pairsOf(field: SchemaField, value: unknown): Array<[string, string]> {
    return encodeWith(field, () => {
        if (field.type.toPairs === undefined) {
            throw new FieldValueError(`type ${field.type.name} is not a string map`);
        }
        return field.type.toPairs(value);
    });
}

function setHeader(headers: HeaderMap, name: string, value: string, field?: string): void {
    try {
        headers.set(name, value);
    } catch (err: unknown) {
        const error = toError(err);
        if (error instanceof InvalidHeaderError) {
            throw new IntoHttpError('InvalidHeaderValue', error.message, field, error);
        }
        throw error;
    }
}

function encodeHeaders(schema: Schema<object>, value: object): HeaderMap {
    const headers = new HeaderMap();
    for (const field of schema.headerFields) {
        const raw = Reflect.get(value, field.name);
        if (field.location.kind === 'header' && isPresent(field, raw)) {
            setHeader(headers, field.location.headerName, textOf(field, raw), field.name);
        }
    }
    return headers;
}

/**
 * The JSON body of a message, or `empty` when the schema declares no body.
 */
function encodeBody(schema: Schema<object>, value: object, empty: Uint8Array): Uint8Array {
    const newtype = schema.newtypeBodyField;
    if (newtype !== undefined) {
        const raw = Reflect.get(value, newtype.name);
        if (!isPresent(newtype, raw)) {
            return EMPTY_BODY;
        }
        return encodeJson(encodeWith(newtype, () => newtype.type.toJson(raw)));
    }
    if (!schema.hasBodyFields) {
        return empty;
    }
    const body: Record<string, unknown> = {};
    for (const field of schema.bodyFields) {
        const raw = Reflect.get(value, field.name);
        if (field.location.kind === 'body' && isPresent(field, raw)) {
            body[field.location.key] = encodeWith(field, () => field.type.toJson(raw));
        }
    }
    return encodeJson(body);
}

// ---------------------------------------------------------------------------
// decoding
// ---------------------------------------------------------------------------

function parseTarget(uri: string): URL {
    try {
        return new URL(uri, PLACEHOLDER_ORIGIN);
    } catch (err: unknown) {
        const error = toError(err);
        throw new FromHttpRequestError('Path', `cannot parse request target "${uri}"`, undefined, error);
    }
}

function failureMessage(field: SchemaField, error: Error): string {
    return `field "${field.name}": ${error.message}`;
}

function decodeRequestPart(part: 'Path' | 'Query', field: SchemaField, decode: () => unknown): unknown {
    try {
        return decode();
    } catch (err: unknown) {
        const error = toError(err);
        throw new FromHttpRequestError(part, failureMessage(field, error), field.name, error);
    }
}

function decodeWith(part: 'Header' | 'Body', field: SchemaField, fail: DecodeFailure, decode: () => unknown): unknown {
    try {
        return decode();
    } catch (err: unknown) {
        const error = toError(err);
        throw fail(part, failureMessage(field, error), field.name, error);
    }
}

function fromText(field: SchemaField, text: string): unknown {
    if (field.type.fromText === undefined) {
        throw new FieldValueError(`type ${field.type.name} has no text form`);
    }
    return field.type.fromText(text);
}

function fromPairs(field: SchemaField, pairs: Iterable<[string, string]>): unknown {
    if (field.type.fromPairs === undefined) {
        throw new FieldValueError(`type ${field.type.name} is not a string map`);
    }
    return field.type.fromPairs(pairs);
}

function decodeHeaders(schema: Schema<object>, headers: HeaderMap, values: Record<string, unknown>, fail: DecodeFailure): void {
    for (const field of schema.headerFields) {
        if (field.location.kind !== 'header') {
            continue;
        }
        const text = headers.get(field.location.headerName);
        if (text === undefined) {
            if (!field.optional) {
                throw fail('Header', `missing header "${field.location.headerName}"`, field.name);
            }
            continue;
        }
        values[field.name] = decodeWith('Header', field, fail, () => fromText(field, text));
    }
}

function parseBody(body: Uint8Array, fail: DecodeFailure): unknown {
    try {
        return decodeJsonBody(body);
    } catch (err: unknown) {
        const error = toError(err);
        throw fail('Body', `body is not valid JSON: ${error.message}`, undefined, error);
    }
}

function decodeBody(schema: Schema<object>, body: Uint8Array, values: Record<string, unknown>, fail: DecodeFailure): void {
    const newtype = schema.newtypeBodyField;
    if (newtype !== undefined) {
        if (body.length === 0 && newtype.optional) {
            return;
        }
        const json = parseBody(body, fail);
        values[newtype.name] = decodeWith('Body', newtype, fail, () => newtype.type.fromJson(json));
        return;
    }
    if (!schema.hasBodyFields) {
        return;
    }
    const json = parseBody(body, fail);
    if (!isJsonObject(json)) {
        throw fail('Body', 'body must be a JSON object');
    }
    for (const field of schema.bodyFields) {
        if (field.location.kind !== 'body') {
            continue;
        }
        const raw = json[field.location.key];
        // null on an optional field reads as absent
        if (raw === undefined || raw === null) {
            if (!field.optional) {
                throw fail('Body', `missing body key "${field.location.key}"`, field.name);
            }
            continue;
        }
        values[field.name] = decodeWith('Body', field, fail, () => field.type.fromJson(raw));
    }
}
