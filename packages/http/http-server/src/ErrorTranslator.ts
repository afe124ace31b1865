import { injectable } from 'inversify';
import {
    encodeJson,
    FromHttpRequestError,
    HeaderMap,
    HttpBadRequestError,
    HttpError,
    ProtocolError,
    WireResponse,
} from '@endpointkit/http-api';

/**
 * Turns whatever a request failed with into a ProtocolError response.
 *
 * - FromHttpRequestError → 400, the offending field in `field`
 * - HttpError subclasses → their own status and errorCode
 * - anything else → 500 UNKNOWN, message hidden from the caller
 *
 * The JSON body is the one ProtocolErrorType decodes on the client.
 */
@injectable()
export class ErrorTranslator {
    translate(error: Error): WireResponse {
        if (error instanceof FromHttpRequestError) {
            return this.translate(new HttpBadRequestError(error.message, error.field));
        }

        if (error instanceof HttpError) {
            if (error.code >= 500) {
                console.error(`[EndpointServer] ${error.name}:`, error.message);
            } else {
                console.log(`[EndpointServer] ${error.name}:`, error.message);
            }
            return this.respond(ProtocolError.fromHttpError(error));
        }

        console.error('[EndpointServer] Unexpected error:', error);
        return this.respond(new ProtocolError(500, 'UNKNOWN', 'Internal Server Error'));
    }

    private respond(protocolError: ProtocolError): WireResponse {
        const headers = new HeaderMap({ 'content-type': 'application/json' });
        return new WireResponse(protocolError.status, headers, encodeJson(protocolError.toJson()));
    }
}
