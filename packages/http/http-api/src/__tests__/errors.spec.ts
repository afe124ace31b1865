import {
    DefinitionSyntaxError,
    FromHttpResponseError,
    IntoHttpError,
    UnsupportedCombinationError,
    Violation,
} from '../errors';
import { encodeUtf8, WireResponse } from '../wire';

describe('DefinitionSyntaxError', () => {
    const violations = [
        new Violation('get-with-body', 'GET endpoints cannot have body fields', 'content', true),
        new Violation('get-with-body', 'GET endpoints cannot have body fields', 'txn', true),
        new Violation('path-template', 'path must start with "/"'),
    ];

    it('should list every violation in its message', () => {
        const error = new DefinitionSyntaxError('send_message', violations);

        expect(error.message).toBe(
            'invalid endpoint definition "send_message":\n' +
                '  - content: GET endpoints cannot have body fields\n' +
                '  - txn: GET endpoints cannot have body fields\n' +
                '  - path must start with "/"',
        );
    });

    it('should name the offending fields', () => {
        expect(new DefinitionSyntaxError('send_message', violations).offendingFields()).toEqual(['content', 'txn']);
    });

    it('should keep the subclass relationship for combination errors', () => {
        const error = new UnsupportedCombinationError('send_message', violations);

        expect(error).toBeInstanceOf(UnsupportedCombinationError);
        expect(error).toBeInstanceOf(DefinitionSyntaxError);
        expect(error.name).toBe('UnsupportedCombinationError');
    });
});

describe('IntoHttpError', () => {
    it('should name the endpoint that needs a token', () => {
        const error = IntoHttpError.needsAuthentication('get_room');

        expect(error.kind).toBe('NeedsAuthentication');
        expect(error.message).toBe('endpoint "get_room" needs an access token');
    });
});

describe('FromHttpResponseError', () => {
    it('should expose a known error and its status', () => {
        const error = FromHttpResponseError.known(404, { errorCode: 'NOT_FOUND' });

        expect(error.knownError()).toEqual({ errorCode: 'NOT_FOUND' });
        expect(error.unknownResponse()).toBeUndefined();
        expect(error.status()).toBe(404);
    });

    it('should keep the raw response of an unknown error', () => {
        const response = new WireResponse(502, undefined, encodeUtf8('<html>bad gateway</html>'));

        const error = FromHttpResponseError.unknown<never>(response);

        expect(error.unknownResponse()).toBe(response);
        expect(error.knownError()).toBeUndefined();
        expect(error.status()).toBe(502);
    });

    it('should have no status for deserialization failures', () => {
        const error = FromHttpResponseError.deserialization('Body', 'bad json');

        expect(error.detail).toEqual({ kind: 'Deserialization', part: 'Body', field: undefined });
        expect(error.status()).toBeUndefined();
    });
});
