import { Newable } from 'inversify';
import { WireRequest } from '@endpointkit/http-api';

/**
 * Server-side implementation of one endpoint.
 *
 * Handlers are resolved from the DI container (singleton scope), so they can
 * take their collaborators through constructor injection. Throw an HttpError
 * subclass to answer with a specific status.
 *
 * ```typescript
 * @injectable()
 * export class SendMessageHandler implements EndpointHandler<SendMessageRequest, SendMessageResponse> {
 *     constructor(@inject(TYPES.RoomStore) private rooms: RoomStore) {}
 *
 *     async handle(request: SendMessageRequest): Promise<SendMessageResponse> {
 *         ...
 *     }
 * }
 * ```
 */
export interface EndpointHandler<Req extends object, Res extends object> {
    /**
     * @param request - the decoded request
     * @param wire - the raw request, for credentials and other transport details
     */
    handle(request: Req, wire: WireRequest): Promise<Res>;
}

export type HandlerClass<Req extends object, Res extends object> = Newable<EndpointHandler<Req, Res>>;
