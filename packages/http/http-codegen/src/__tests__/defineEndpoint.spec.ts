import { DefinitionSyntaxError, Query } from '@endpointkit/http-api';
import { defineEndpoint, GeneratorOptions } from '../defineEndpoint';

class PingRequest {
    @Query('echo', { optional: true })
    echo?: string;
}

class PingResponse {}

const declaration = {
    metadata: {
        description: 'Liveness check.',
        method: 'GET' as const,
        name: 'ping',
        path: '/ping',
        rateLimited: false,
        authentication: 'None' as const,
    },
    request: PingRequest,
    response: PingResponse,
};

describe('defineEndpoint', () => {
    let logSpy: jest.SpyInstance;

    beforeEach(() => {
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        logSpy.mockRestore();
    });

    it('should return a frozen endpoint', () => {
        const endpoint = defineEndpoint(declaration);

        expect(Object.isFrozen(endpoint)).toBe(true);
        expect(Object.isFrozen(endpoint.metadata)).toBe(true);
        expect(endpoint.metadata.name).toBe('ping');
    });

    it('should stay quiet by default', () => {
        defineEndpoint(declaration);

        expect(logSpy).not.toHaveBeenCalled();
    });

    it('should log the generated endpoint when asked to', () => {
        defineEndpoint(declaration, new GeneratorOptions(true));

        expect(logSpy).toHaveBeenCalledWith('[endpointkit] generated ping GET /ping');
    });

    it('should generate nothing for a broken declaration', () => {
        expect(() =>
            defineEndpoint({ ...declaration, metadata: { ...declaration.metadata, path: '/ping/{id}' } }, new GeneratorOptions(true)),
        ).toThrow(DefinitionSyntaxError);
        expect(logSpy).not.toHaveBeenCalled();
    });
});
