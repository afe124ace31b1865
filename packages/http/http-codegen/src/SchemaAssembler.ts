import {
    DefinitionSyntaxError,
    EndpointErrorType,
    EndpointMetadata,
    isJsonObject,
    MetadataDeclaration,
    Violation,
    Void,
} from '@endpointkit/http-api';
import { resolveErrorType } from './ErrorTypeResolver';
import { parseMetadata, Placeholder } from './MetadataParser';
import { prefixViolations, violationsOf } from './ParseResult';
import { parseSchema, Schema } from './SchemaParser';

/**
 * Everything an endpoint is defined by.
 *
 * ```typescript
 * export const GetRoomState = defineEndpoint({
 *     metadata: {
 *         description: 'Get the state events of a room.',
 *         method: 'GET',
 *         name: 'get_room_state',
 *         path: '/_matrix/client/r0/rooms/{roomId}/state',
 *         rateLimited: false,
 *         authentication: 'AccessToken',
 *     },
 *     request: GetRoomStateRequest,
 *     response: GetRoomStateResponse,
 *     error: ProtocolErrorType,
 * });
 * ```
 */
export interface EndpointDeclaration<Req extends object, Res extends object, E = Void> {
    metadata: MetadataDeclaration;
    request: new () => Req;
    response: new () => Res;
    error?: EndpointErrorType<E>;
}

/**
 * A parsed declaration, not yet validated.
 */
export class CompiledEndpoint<Req extends object, Res extends object, E> {
    constructor(
        readonly metadata: EndpointMetadata,
        readonly placeholders: readonly Placeholder[],
        readonly request: Schema<Req>,
        readonly response: Schema<Res>,
        readonly errorType: EndpointErrorType<E>,
    ) {
        Object.freeze(this);
    }
}

/**
 * Runs every parser over the declaration and combines the results. Nothing is
 * assembled unless all of them succeed; otherwise their violations are thrown
 * together.
 *
 * @throws DefinitionSyntaxError
 */
export function assembleEndpoint<Req extends object, Res extends object, E>(
    declaration: EndpointDeclaration<Req, Res, E>,
): CompiledEndpoint<Req, Res, E> {
    const metadata = parseMetadata(declaration.metadata);
    const request = parseSchema('request', declaration.request);
    const response = parseSchema('response', declaration.response);
    const errorType = resolveErrorType(declaration.error);

    if (metadata.ok && request.ok && response.ok && errorType.ok) {
        return new CompiledEndpoint(
            metadata.value.metadata,
            metadata.value.placeholders,
            request.value,
            response.value,
            errorType.value,
        );
    }

    const violations: Violation[] = [
        ...violationsOf(metadata),
        ...prefixViolations('request', violationsOf(request)),
        ...prefixViolations('response', violationsOf(response)),
        ...violationsOf(errorType),
    ];
    throw new DefinitionSyntaxError(endpointName(declaration.metadata), violations);
}

/**
 * Name to report a declaration under, even when its metadata is broken.
 */
export function endpointName(metadata: unknown): string {
    if (isJsonObject(metadata) && typeof metadata.name === 'string' && metadata.name !== '') {
        return metadata.name;
    }
    return '<unnamed>';
}
