import { HttpError } from './errors';
import { decodeJsonBody, isJsonObject, WireResponse } from './wire';

/**
 * Decoder for the body of a non-success response.
 *
 * `fromHttpResponse` throws when the response is not an error of this type;
 * the generated response decoder then reports the response as an unknown
 * server error instead of dropping it.
 */
export interface EndpointErrorType<E> {
    readonly name: string;
    fromHttpResponse(response: WireResponse): E;
}

/**
 * Error payload of endpoints that declare none. No value of this type exists.
 */
export type Void = never;

export const VoidErrorType: EndpointErrorType<Void> = {
    name: 'Void',
    fromHttpResponse(response: WireResponse): never {
        throw new Error(`endpoint declares no error payload (status ${response.status})`);
    },
};

/**
 * The standard JSON error body:
 * `{ "errorCode": "NOT_FOUND", "message": "...", "field": "...", "waitSeconds": 5 }`
 */
export class ProtocolError {
    /** Status of the response this error arrived with. Not part of the body. */
    readonly status: number;
    readonly errorCode: string;
    readonly message: string;
    readonly field?: string;
    readonly waitSeconds?: number;

    constructor(status: number, errorCode: string, message: string, field?: string, waitSeconds?: number) {
        this.status = status;
        this.errorCode = errorCode;
        this.message = message;
        this.field = field;
        this.waitSeconds = waitSeconds;
    }

    static fromHttpError(error: HttpError): ProtocolError {
        return new ProtocolError(error.code, error.errorCode, error.message, error.field, error.waitSeconds);
    }

    toJson(): Record<string, unknown> {
        const body: Record<string, unknown> = { errorCode: this.errorCode, message: this.message };
        if (this.field !== undefined) body.field = this.field;
        if (this.waitSeconds !== undefined) body.waitSeconds = this.waitSeconds;
        return body;
    }
}

export const ProtocolErrorType: EndpointErrorType<ProtocolError> = {
    name: 'ProtocolError',
    fromHttpResponse(response: WireResponse): ProtocolError {
        if (response.body.length === 0) {
            throw new Error('error response has no body');
        }
        const json = decodeJsonBody(response.body);
        if (!isJsonObject(json) || typeof json.errorCode !== 'string') {
            throw new Error('error body has no string "errorCode"');
        }
        const message = typeof json.message === 'string' ? json.message : '';
        const field = typeof json.field === 'string' ? json.field : undefined;
        const waitSeconds = typeof json.waitSeconds === 'number' ? json.waitSeconds : undefined;
        return new ProtocolError(response.status, json.errorCode, message, field, waitSeconds);
    },
};
