/**
 * @endpointkit/http-api
 *
 * Definition surface shared by the generator and the transports: endpoint
 * metadata, field locations and decorators, field types, wire messages and
 * the error taxonomy.
 *
 * Architecture:
 * ```
 * http-api (definition surface)
 *    ↑
 *    ├── http-codegen (declaration → GeneratedEndpoint)
 *    ├── http-client  (GeneratedEndpoint + fetch)
 *    └── http-server  (GeneratedEndpoint + express)
 * ```
 */

export {
    HTTP_METHODS,
    HttpMethod,
    AUTH_SCHEMES,
    AuthScheme,
    MetadataDeclaration,
    EndpointMetadata,
    isHttpMethod,
    isAuthScheme,
} from './metadata';

export {
    LOCATION_MARKERS,
    LocationMarker,
    FieldLocation,
    FieldLocationKind,
    isLocationMarker,
    describeLocation,
} from './FieldLocation';

export {
    METADATA_KEYS,
    RawFieldDeclaration,
    FieldOptions,
    LocatedFieldOptions,
    Field,
    Path,
    Query,
    QueryMap,
    Header,
    Body,
    NewtypeBody,
    getFieldDeclarations,
} from './decorators';

export { FieldType, FieldTypes, FieldValueError, formatValidationErrors } from './FieldType';

export {
    EMPTY_BODY,
    InvalidHeaderError,
    isHeaderName,
    HeaderMap,
    WireRequest,
    WireResponse,
    encodeUtf8,
    decodeUtf8,
    encodeJson,
    decodeJsonBody,
    isJsonObject,
} from './wire';

export {
    Violation,
    DefinitionSyntaxError,
    UnsupportedCombinationError,
    IntoHttpErrorKind,
    IntoHttpError,
    MessagePart,
    FromHttpRequestError,
    ServerError,
    ResponseFailure,
    FromHttpResponseError,
    HttpError,
    HttpBadRequestError,
    HttpUnauthorizedError,
    HttpForbiddenError,
    HttpNotFoundError,
    HttpTooManyRequestsError,
    HttpInternalServerError,
} from './errors';

export { EndpointErrorType, Void, VoidErrorType, ProtocolError, ProtocolErrorType } from './EndpointError';

export { GeneratedEndpoint, AnyEndpoint, RequestOf, ResponseOf } from './GeneratedEndpoint';

export { HeaderMasker, SECURE_HEADERS } from './HeaderMasker';
export { LogApiCall, CallSide } from './LogApiCall';
