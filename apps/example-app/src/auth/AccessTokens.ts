import { HttpUnauthorizedError, WireRequest } from '@endpointkit/http-api';

const BEARER = /^Bearer (.*)$/;

/**
 * Resolves the user behind a request's access token.
 */
export class AccessTokens {
    private readonly users: Map<string, string>;

    constructor(tokens: Record<string, string>) {
        this.users = new Map(Object.entries(tokens));
    }

    /**
     * @returns the user id
     * @throws HttpUnauthorizedError for a missing, malformed or unknown token
     */
    authenticate(wire: WireRequest): string {
        const match = BEARER.exec(wire.headers.get('authorization') ?? '');
        const userId = match === null ? undefined : this.users.get(match[1]);
        if (userId === undefined) {
            throw new HttpUnauthorizedError('Unknown access token');
        }
        return userId;
    }
}
