import { toError } from '../lib/errorUtils';

describe('toError', () => {
    it('should return Error instances unchanged', () => {
        const original = new TypeError('bad type');

        expect(toError(original)).toBe(original);
    });

    it('should copy message, name and stack from error-like objects', () => {
        const result = toError({ message: 'boom', name: 'FetchError', stack: 'at somewhere' });

        expect(result).toBeInstanceOf(Error);
        expect(result.message).toBe('boom');
        expect(result.name).toBe('FetchError');
        expect(result.stack).toBe('at somewhere');
    });

    it('should stringify objects without a message', () => {
        expect(toError({ status: 404 }).message).toBe('Non-Error object thrown: {"status":404}');
    });

    it('should survive objects that cannot be stringified', () => {
        const cyclic: { self?: unknown } = {};
        cyclic.self = cyclic;

        expect(toError(cyclic).message).toBe('Non-Error object thrown: (unable to stringify)');
    });

    it('should convert primitives', () => {
        expect(toError('rejected').message).toBe('rejected');
        expect(toError(42).message).toBe('42');
        expect(toError(Symbol('tag')).message).toBe('Symbol(tag)');
    });

    it('should handle null and undefined', () => {
        expect(toError(null).message).toBe('Null or undefined thrown');
        expect(toError(undefined).message).toBe('Null or undefined thrown');
    });
});
