/**
 * Wire-level HTTP messages.
 *
 * These are the values the generated codecs produce and consume. They carry
 * fully buffered bodies so that every codec routine stays synchronous; the
 * transports (http-client, http-server) do the buffering.
 */

const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
// visible Latin-1 plus space and horizontal tab
const FIELD_VALUE = /^[\t\x20-\x7e\x80-\xff]*$/;

export const EMPTY_BODY: Uint8Array = new Uint8Array(0);

/**
 * Thrown when a header name or value cannot be put on the wire.
 */
export class InvalidHeaderError extends Error {
    readonly headerName: string;

    constructor(headerName: string, message: string) {
        super(message);
        this.name = 'InvalidHeaderError';
        this.headerName = headerName;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export function isHeaderName(name: string): boolean {
    return TOKEN.test(name);
}

/**
 * Case-insensitive header collection. Names are stored lower-cased, in
 * insertion order. Names and values are checked when they are inserted.
 */
export class HeaderMap implements Iterable<[string, string]> {
    private readonly values = new Map<string, string>();

    constructor(init?: Iterable<readonly [string, string]> | Record<string, string>) {
        if (init === undefined) {
            return;
        }
        const entries = isIterable(init) ? init : Object.entries(init);
        for (const [name, value] of entries) {
            this.append(name, value);
        }
    }

    set(name: string, value: string): this {
        this.values.set(checkName(name), checkValue(name, value));
        return this;
    }

    /**
     * Adds a value, joining with ", " when the header is already present.
     */
    append(name: string, value: string): this {
        const key = checkName(name);
        const checked = checkValue(name, value);
        const existing = this.values.get(key);
        this.values.set(key, existing === undefined ? checked : `${existing}, ${checked}`);
        return this;
    }

    get(name: string): string | undefined {
        return this.values.get(name.toLowerCase());
    }

    has(name: string): boolean {
        return this.values.has(name.toLowerCase());
    }

    delete(name: string): boolean {
        return this.values.delete(name.toLowerCase());
    }

    get size(): number {
        return this.values.size;
    }

    [Symbol.iterator](): Iterator<[string, string]> {
        return this.values.entries();
    }

    toRecord(): Record<string, string> {
        return Object.fromEntries(this.values);
    }
}

function isIterable(
    value: Iterable<readonly [string, string]> | Record<string, string>,
): value is Iterable<readonly [string, string]> {
    return Symbol.iterator in value;
}

function checkName(name: string): string {
    if (!TOKEN.test(name)) {
        throw new InvalidHeaderError(name, `"${name}" is not a valid header name`);
    }
    return name.toLowerCase();
}

function checkValue(name: string, value: string): string {
    if (!FIELD_VALUE.test(value)) {
        throw new InvalidHeaderError(name, `value of header "${name}" contains characters not allowed in a header`);
    }
    return value;
}

export class WireRequest {
    readonly method: string;
    /** Absolute URI or origin-form path with optional query, e.g. `/a/b?c=d`. */
    readonly uri: string;
    readonly headers: HeaderMap;
    readonly body: Uint8Array;

    constructor(method: string, uri: string, headers: HeaderMap = new HeaderMap(), body: Uint8Array = EMPTY_BODY) {
        this.method = method;
        this.uri = uri;
        this.headers = headers;
        this.body = body;
    }

    bodyText(): string {
        return decodeUtf8(this.body);
    }
}

export class WireResponse {
    readonly status: number;
    readonly headers: HeaderMap;
    readonly body: Uint8Array;

    constructor(status: number, headers: HeaderMap = new HeaderMap(), body: Uint8Array = EMPTY_BODY) {
        this.status = status;
        this.headers = headers;
        this.body = body;
    }

    bodyText(): string {
        return decodeUtf8(this.body);
    }
}

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

export function encodeUtf8(text: string): Uint8Array {
    return encoder.encode(text);
}

/**
 * Throws TypeError on invalid UTF-8.
 */
export function decodeUtf8(bytes: Uint8Array): string {
    return decoder.decode(bytes);
}

export function encodeJson(value: unknown): Uint8Array {
    return encodeUtf8(JSON.stringify(value));
}

/**
 * Parses a JSON body. A zero-length body reads as `{}`, so messages whose body
 * fields are all optional still decode.
 */
export function decodeJsonBody(bytes: Uint8Array): unknown {
    if (bytes.length === 0) {
        return {};
    }
    return JSON.parse(decodeUtf8(bytes));
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
