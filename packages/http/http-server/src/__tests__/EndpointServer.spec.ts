import { ContainerModule, inject, injectable } from 'inversify';
import {
    Body,
    decodeJsonBody,
    encodeJson,
    encodeUtf8,
    FromHttpResponseError,
    HeaderMap,
    HttpNotFoundError,
    Path,
    ProtocolError,
    ProtocolErrorType,
    WireRequest,
} from '@endpointkit/http-api';
import { defineEndpoint } from '@endpointkit/http-codegen';
import { EndpointServerConfig } from '../config/EndpointServerConfig';
import { EndpointHandler } from '../EndpointHandler';
import { EndpointServerFactory } from '../EndpointServerFactory';
import { RouteConfig, RouteRegistry, ServerMeta } from '../ServerMeta';

// ---------------------------------------------------------------------------
// a small application: room topics
// ---------------------------------------------------------------------------

const TYPES = {
    TopicStore: Symbol.for('TopicStore'),
};

interface TopicStore {
    get(roomId: string): string | undefined;
    set(roomId: string, topic: string): void;
}

@injectable()
class InMemoryTopicStore implements TopicStore {
    private readonly topics = new Map<string, string>();

    get(roomId: string): string | undefined {
        return this.topics.get(roomId);
    }

    set(roomId: string, topic: string): void {
        this.topics.set(roomId, topic);
    }
}

class SetTopicRequest {
    @Path()
    roomId!: string;

    @Body()
    topic!: string;
}

class GetTopicRequest {
    @Path()
    roomId!: string;
}

class TopicResponse {
    @Body()
    topic!: string;
}

class BoomRequest {}

class BoomResponse {}

const SetTopic = defineEndpoint({
    metadata: {
        description: 'Set the topic of a room.',
        method: 'PUT',
        name: 'set_topic',
        path: '/rooms/{roomId}/topic',
        rateLimited: false,
        authentication: 'AccessToken',
    },
    request: SetTopicRequest,
    response: TopicResponse,
    error: ProtocolErrorType,
});

const GetTopic = defineEndpoint({
    metadata: {
        description: 'Get the topic of a room.',
        method: 'GET',
        name: 'get_topic',
        path: '/rooms/{roomId}/topic',
        rateLimited: false,
        authentication: 'None',
    },
    request: GetTopicRequest,
    response: TopicResponse,
    error: ProtocolErrorType,
});

const Boom = defineEndpoint({
    metadata: {
        description: 'Always fails.',
        method: 'GET',
        name: 'boom',
        path: '/boom',
        rateLimited: false,
        authentication: 'None',
    },
    request: BoomRequest,
    response: BoomResponse,
    error: ProtocolErrorType,
});

@injectable()
class SetTopicHandler implements EndpointHandler<SetTopicRequest, TopicResponse> {
    constructor(@inject(TYPES.TopicStore) private readonly store: TopicStore) {}

    async handle(request: SetTopicRequest): Promise<TopicResponse> {
        this.store.set(request.roomId, request.topic);
        return Object.assign(new TopicResponse(), { topic: request.topic });
    }
}

@injectable()
class GetTopicHandler implements EndpointHandler<GetTopicRequest, TopicResponse> {
    constructor(@inject(TYPES.TopicStore) private readonly store: TopicStore) {}

    async handle(request: GetTopicRequest): Promise<TopicResponse> {
        const topic = this.store.get(request.roomId);
        if (topic === undefined) {
            throw new HttpNotFoundError(`No topic for ${request.roomId}`);
        }
        return Object.assign(new TopicResponse(), { topic });
    }
}

@injectable()
class BoomHandler implements EndpointHandler<BoomRequest, BoomResponse> {
    async handle(): Promise<BoomResponse> {
        throw new Error('kaboom');
    }
}

const TopicModule = new ContainerModule((options) => {
    options.bind<TopicStore>(TYPES.TopicStore).to(InMemoryTopicStore).inSingletonScope();
});

class TopicRoutes implements RouteConfig {
    configure(routes: RouteRegistry): void {
        routes.route(SetTopic, SetTopicHandler);
        routes.route(GetTopic, GetTopicHandler);
        routes.route(Boom, BoomHandler);
    }
}

class TopicServerMeta implements ServerMeta {
    getDIModules(): ContainerModule[] {
        return [TopicModule];
    }

    getRoutes(): RouteConfig[] {
        return [new TopicRoutes()];
    }
}

const api = { setTopic: SetTopic, getTopic: GetTopic, boom: Boom };

function setTopicRequest(roomId: string, topic: string): SetTopicRequest {
    return Object.assign(new SetTopicRequest(), { roomId, topic });
}

function getTopicRequest(roomId: string): GetTopicRequest {
    return Object.assign(new GetTopicRequest(), { roomId });
}

// ---------------------------------------------------------------------------

describe('EndpointServer', () => {
    let logSpy: jest.SpyInstance;
    let errorSpy: jest.SpyInstance;

    beforeEach(() => {
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        logSpy.mockRestore();
        errorSpy.mockRestore();
    });

    it('serves requests through the in-process client', async () => {
        const server = await EndpointServerFactory.create(new TopicServerMeta());
        const client = server.createApiClient(api, 'test-token');

        const set = await client.setTopic(setTopicRequest('!a:example.org', 'Lunch'));
        expect(set.topic).toBe('Lunch');

        const got = await client.getTopic(getTopicRequest('!a:example.org'));
        expect(got).toBeInstanceOf(TopicResponse);
        expect(got.topic).toBe('Lunch');
    });

    it('registers every route and logs calls', async () => {
        const server = await EndpointServerFactory.create(new TopicServerMeta());
        const client = server.createApiClient(api, 'test-token');
        await client.setTopic(setTopicRequest('r1', 'Hi'));

        expect(logSpy).toHaveBeenCalledWith(
            '[EndpointServer] Registered set_topic PUT /rooms/{roomId}/topic -> SetTopicHandler',
        );
        expect(logSpy).toHaveBeenCalledWith('[API-SVR-resp-SUCCESS] set_topic response={"topic":"Hi"}');
    });

    it('answers handler errors with their status and a ProtocolError body', async () => {
        const server = await EndpointServerFactory.create(new TopicServerMeta());
        const client = server.createApiClient(api);

        const error: unknown = await client.getTopic(getTopicRequest('!none:example.org')).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(FromHttpResponseError);
        if (!(error instanceof FromHttpResponseError)) return;
        expect(error.isKnown()).toBe(true);
        expect(error.knownError()).toEqual(
            new ProtocolError(404, 'NOT_FOUND', 'No topic for !none:example.org'),
        );
    });

    it('hides the message of unexpected errors behind a 500', async () => {
        const server = await EndpointServerFactory.create(new TopicServerMeta());

        const response = await server.handle(new WireRequest('GET', '/boom'));

        expect(response.status).toBe(500);
        expect(response.headers.get('content-type')).toBe('application/json');
        expect(decodeJsonBody(response.body)).toEqual({ errorCode: 'UNKNOWN', message: 'Internal Server Error' });
        expect(errorSpy).toHaveBeenCalledWith('[API-SVR-resp-FAIL] boom errorType=Error error=kaboom');
    });

    it('answers 404 for unknown paths and for the wrong method', async () => {
        const server = await EndpointServerFactory.create(new TopicServerMeta());

        const unknown = await server.handle(new WireRequest('GET', '/nope?x=1'));
        expect(unknown.status).toBe(404);
        expect(decodeJsonBody(unknown.body)).toEqual({ errorCode: 'NOT_FOUND', message: 'No endpoint for GET /nope' });

        const wrongMethod = await server.handle(new WireRequest('DELETE', '/rooms/r1/topic'));
        expect(wrongMethod.status).toBe(404);
    });

    it('answers 401 when an access token endpoint gets no authorization header', async () => {
        const server = await EndpointServerFactory.create(new TopicServerMeta());

        const response = await server.handle(
            new WireRequest('PUT', '/rooms/r1/topic', new HeaderMap(), encodeJson({ topic: 'Hi' })),
        );

        expect(response.status).toBe(401);
        expect(decodeJsonBody(response.body)).toEqual({
            errorCode: 'UNAUTHORIZED',
            message: "Endpoint 'set_topic' needs an access token",
        });
    });

    it('answers 400 with the offending field when a request does not decode', async () => {
        const server = await EndpointServerFactory.create(new TopicServerMeta());
        const headers = new HeaderMap({ authorization: 'Bearer test-token' });

        const missing = await server.handle(new WireRequest('PUT', '/rooms/r1/topic', headers, encodeJson({})));
        expect(missing.status).toBe(400);
        expect(decodeJsonBody(missing.body)).toEqual({
            errorCode: 'BAD_REQUEST',
            message: 'missing body key "topic"',
            field: 'topic',
        });

        const garbled = await server.handle(new WireRequest('PUT', '/rooms/r1/topic', headers, encodeUtf8('not json')));
        expect(garbled.status).toBe(400);
        const body = decodeJsonBody(garbled.body);
        expect(body).toMatchObject({ errorCode: 'BAD_REQUEST' });
        expect(JSON.stringify(body)).toContain('body is not valid JSON');
    });

    it('loads appOverrides after the application modules', async () => {
        const stub: TopicStore = {
            get: () => 'from the stub',
            set: () => undefined,
        };
        const overrides = new ContainerModule(async (options) => {
            (await options.rebind<TopicStore>(TYPES.TopicStore)).toConstantValue(stub);
        });

        const server = await EndpointServerFactory.create(new TopicServerMeta(), new EndpointServerConfig(), overrides);
        const response = await server.createApiClient(api).getTopic(getTopicRequest('r1'));

        expect(response.topic).toBe('from the stub');
        expect(server.getContainer().get<TopicStore>(TYPES.TopicStore)).toBe(stub);
    });

    it('stays quiet when logging is disabled', async () => {
        const server = await EndpointServerFactory.create(new TopicServerMeta(), new EndpointServerConfig(8008, false));
        await server.createApiClient(api, 'test-token').setTopic(setTopicRequest('r1', 'Hi'));

        expect(logSpy).not.toHaveBeenCalled();
    });

    it('rejects a second registration of the same endpoint', async () => {
        class TwiceRoutes implements RouteConfig {
            configure(routes: RouteRegistry): void {
                routes.route(GetTopic, GetTopicHandler);
                routes.route(GetTopic, GetTopicHandler);
            }
        }
        const meta: ServerMeta = {
            getDIModules: () => [TopicModule],
            getRoutes: () => [new TwiceRoutes()],
        };

        await expect(EndpointServerFactory.create(meta)).rejects.toThrow("Endpoint 'get_topic' is already registered");
    });
});
