/**
 * Error taxonomy of endpointkit.
 *
 * Generation time (thrown by defineEndpoint, nothing is generated):
 * - DefinitionSyntaxError: malformed declaration, every violation listed
 * - UnsupportedCombinationError: well-formed fields that cannot coexist
 *
 * Runtime (thrown by the generated codecs):
 * - IntoHttpError: a value could not be encoded into a wire message
 * - FromHttpRequestError: an incoming wire request could not be decoded
 * - FromHttpResponseError<E>: an incoming wire response could not be decoded,
 *   or carried a server error (known to the endpoint's error type or not)
 *
 * Handlers (thrown by server-side endpoint handlers, translated to a status):
 * - HttpError and its subclasses
 */
import { WireResponse } from './wire';

// ---------------------------------------------------------------------------
// generation time
// ---------------------------------------------------------------------------

/**
 * One problem found in an endpoint declaration.
 */
export class Violation {
    /** Short rule id, e.g. `get-with-body` or `duplicate-header`. */
    readonly rule: string;
    readonly message: string;
    /** Offending field, when the problem belongs to one. */
    readonly field?: string;
    /** True for fields that are fine alone but not together. */
    readonly combination: boolean;

    constructor(rule: string, message: string, field?: string, combination: boolean = false) {
        this.rule = rule;
        this.message = message;
        this.field = field;
        this.combination = combination;
    }
}

export class DefinitionSyntaxError extends Error {
    readonly endpoint: string;
    readonly violations: readonly Violation[];

    constructor(endpoint: string, violations: readonly Violation[]) {
        super(formatViolations(endpoint, violations));
        this.name = 'DefinitionSyntaxError';
        this.endpoint = endpoint;
        this.violations = violations;
        Object.setPrototypeOf(this, new.target.prototype);
    }

    /**
     * Names of the fields that have at least one violation, in report order.
     */
    offendingFields(): string[] {
        const fields: string[] = [];
        for (const violation of this.violations) {
            if (violation.field !== undefined && !fields.includes(violation.field)) {
                fields.push(violation.field);
            }
        }
        return fields;
    }
}

export class UnsupportedCombinationError extends DefinitionSyntaxError {
    constructor(endpoint: string, violations: readonly Violation[]) {
        super(endpoint, violations);
        this.name = 'UnsupportedCombinationError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

function formatViolations(endpoint: string, violations: readonly Violation[]): string {
    const lines = violations.map((v) => `  - ${v.field !== undefined ? `${v.field}: ` : ''}${v.message}`);
    return `invalid endpoint definition "${endpoint}":\n${lines.join('\n')}`;
}

// ---------------------------------------------------------------------------
// runtime
// ---------------------------------------------------------------------------

export type IntoHttpErrorKind = 'NeedsAuthentication' | 'InvalidHeaderValue' | 'InvalidValue';

export class IntoHttpError extends Error {
    readonly kind: IntoHttpErrorKind;
    readonly field?: string;

    constructor(kind: IntoHttpErrorKind, message: string, field?: string, cause?: Error) {
        super(message, { cause });
        this.name = 'IntoHttpError';
        this.kind = kind;
        this.field = field;
        Object.setPrototypeOf(this, new.target.prototype);
    }

    static needsAuthentication(endpoint: string): IntoHttpError {
        return new IntoHttpError('NeedsAuthentication', `endpoint "${endpoint}" needs an access token`);
    }
}

/** Part of a wire message a decoding failure came from. */
export type MessagePart = 'Path' | 'Query' | 'Header' | 'Body';

export class FromHttpRequestError extends Error {
    readonly kind: MessagePart;
    readonly field?: string;

    constructor(kind: MessagePart, message: string, field?: string, cause?: Error) {
        super(message, { cause });
        this.name = 'FromHttpRequestError';
        this.kind = kind;
        this.field = field;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * A response with status >= 400. Known when the endpoint's error type decoded
 * the body, unknown otherwise; the unknown case keeps the raw response.
 */
export type ServerError<E> =
    | { readonly kind: 'known'; readonly status: number; readonly error: E }
    | { readonly kind: 'unknown'; readonly response: WireResponse };

export type ResponseFailure<E> =
    | { readonly kind: 'Deserialization'; readonly part: 'Header' | 'Body'; readonly field?: string }
    | { readonly kind: 'Server'; readonly serverError: ServerError<E> };

export class FromHttpResponseError<E> extends Error {
    readonly detail: ResponseFailure<E>;

    constructor(message: string, detail: ResponseFailure<E>, cause?: Error) {
        super(message, { cause });
        this.name = 'FromHttpResponseError';
        this.detail = detail;
        Object.setPrototypeOf(this, new.target.prototype);
    }

    static deserialization<E>(
        part: 'Header' | 'Body',
        message: string,
        field?: string,
        cause?: Error,
    ): FromHttpResponseError<E> {
        return new FromHttpResponseError<E>(message, { kind: 'Deserialization', part, field }, cause);
    }

    static known<E>(status: number, error: E): FromHttpResponseError<E> {
        return new FromHttpResponseError<E>(`server returned a known error with status ${status}`, {
            kind: 'Server',
            serverError: { kind: 'known', status, error },
        });
    }

    static unknown<E>(response: WireResponse, cause?: Error): FromHttpResponseError<E> {
        return new FromHttpResponseError<E>(
            `server returned an unrecognised error with status ${response.status}`,
            { kind: 'Server', serverError: { kind: 'unknown', response } },
            cause,
        );
    }

    isKnown(): boolean {
        return this.detail.kind === 'Server' && this.detail.serverError.kind === 'known';
    }

    isUnknown(): boolean {
        return this.detail.kind === 'Server' && this.detail.serverError.kind === 'unknown';
    }

    /** The decoded error, when the server error was recognised. */
    knownError(): E | undefined {
        if (this.detail.kind === 'Server' && this.detail.serverError.kind === 'known') {
            return this.detail.serverError.error;
        }
        return undefined;
    }

    /** The untouched response, when the server error was not recognised. */
    unknownResponse(): WireResponse | undefined {
        if (this.detail.kind === 'Server' && this.detail.serverError.kind === 'unknown') {
            return this.detail.serverError.response;
        }
        return undefined;
    }

    /** Status of the server error, undefined for deserialization failures. */
    status(): number | undefined {
        if (this.detail.kind !== 'Server') {
            return undefined;
        }
        const serverError = this.detail.serverError;
        return serverError.kind === 'known' ? serverError.status : serverError.response.status;
    }
}

// ---------------------------------------------------------------------------
// handlers
// ---------------------------------------------------------------------------

/**
 * Base class for errors a server-side handler throws on purpose. The server
 * answers with `code` and a ProtocolError body carrying `errorCode`.
 */
export class HttpError extends Error {
    readonly code: number;
    readonly errorCode: string;
    readonly field?: string;
    readonly waitSeconds?: number;

    constructor(message: string, code: number, errorCode: string, field?: string, waitSeconds?: number) {
        super(message);
        this.name = 'HttpError';
        this.code = code;
        this.errorCode = errorCode;
        this.field = field;
        this.waitSeconds = waitSeconds;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class HttpBadRequestError extends HttpError {
    constructor(message: string, field?: string) {
        super(message, 400, 'BAD_REQUEST', field);
        this.name = 'BadRequest';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class HttpUnauthorizedError extends HttpError {
    constructor(message: string) {
        super(message, 401, 'UNAUTHORIZED');
        this.name = 'Unauthorized';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class HttpForbiddenError extends HttpError {
    constructor(message: string) {
        super(message, 403, 'FORBIDDEN');
        this.name = 'Forbidden';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class HttpNotFoundError extends HttpError {
    constructor(message: string) {
        super(message, 404, 'NOT_FOUND');
        this.name = 'NotFound';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * 429, with a retry hint for clients of rate-limited endpoints.
 */
export class HttpTooManyRequestsError extends HttpError {
    constructor(message: string, waitSeconds: number = 30) {
        super(message, 429, 'LIMIT_EXCEEDED', undefined, waitSeconds);
        this.name = 'TooManyRequests';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class HttpInternalServerError extends HttpError {
    constructor(message: string) {
        super(message, 500, 'UNKNOWN');
        this.name = 'InternalServerError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}
