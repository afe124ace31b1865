import { EndpointErrorType, Violation, VoidErrorType } from '@endpointkit/http-api';
import { parsed, ParseResult, rejected } from './ParseResult';

/**
 * Resolves the `error` entry of a declaration. Endpoints without one get the
 * Void error type, which turns every error response into an unknown server
 * error.
 */
export function resolveErrorType<E>(declared: EndpointErrorType<E> | undefined): ParseResult<EndpointErrorType<E>> {
    if (declared === undefined) {
        return parsed(VoidErrorType);
    }
    // declarations may come from untyped code
    if (!isErrorType(declared)) {
        return rejected([
            new Violation('error-type', 'error type must have a string "name" and a "fromHttpResponse" function'),
        ]);
    }
    return parsed(declared);
}

function isErrorType(value: unknown): boolean {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    return typeof Reflect.get(value, 'name') === 'string' && typeof Reflect.get(value, 'fromHttpResponse') === 'function';
}
