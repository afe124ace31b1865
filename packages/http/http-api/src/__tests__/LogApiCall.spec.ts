import { HttpNotFoundError } from '../errors';
import { LogApiCall } from '../LogApiCall';
import { EndpointMetadata } from '../metadata';
import { HeaderMap } from '../wire';

describe('LogApiCall', () => {
    const metadata = new EndpointMetadata('Get a room.', 'GET', 'get_room', '/rooms/{roomId}', false, 'AccessToken');
    const headers = new HeaderMap({ authorization: 'Bearer test-secret-token' });
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

    it('should log request and success with masked credentials', async () => {
        const result = await new LogApiCall().execute('CLIENT', metadata, { roomId: '!r' }, headers, async () => ({
            name: 'lobby',
        }));

        expect(result).toEqual({ name: 'lobby' });
        expect(logSpy).toHaveBeenNthCalledWith(
            1,
            '[API-CLIENT-req] get_room GET /rooms/{roomId} request={"roomId":"!r"} headers={"authorization":"Bea...ken"}',
        );
        expect(logSpy).toHaveBeenNthCalledWith(2, '[API-CLIENT-resp-SUCCESS] get_room response={"name":"lobby"}');
    });

    it('should log caller mistakes as OTHER and rethrow', async () => {
        const notFound = new HttpNotFoundError('no such room');

        await expect(
            new LogApiCall().execute('SVR', metadata, {}, new HeaderMap(), async () => {
                throw notFound;
            }),
        ).rejects.toBe(notFound);
        expect(logSpy).toHaveBeenLastCalledWith('[API-SVR-resp-OTHER] get_room errorType=NotFound status=404');
        expect(errorSpy).not.toHaveBeenCalled();
    });

    it('should log everything else as FAIL', async () => {
        await expect(
            new LogApiCall().execute('CLIENT', metadata, {}, new HeaderMap(), async () => {
                throw new Error('socket hang up');
            }),
        ).rejects.toThrow('socket hang up');
        expect(errorSpy).toHaveBeenCalledWith('[API-CLIENT-resp-FAIL] get_room errorType=Error error=socket hang up');
    });
});
