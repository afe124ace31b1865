/**
 * Application settings. Data only.
 */
export class AppConfig {
    /** Suffix of generated room ids, e.g. `!r1:localhost`. */
    serverName: string;

    /** Access token → user id. */
    accessTokens: Record<string, string>;

    constructor(serverName: string = 'localhost', accessTokens: Record<string, string> = {}) {
        this.serverName = serverName;
        this.accessTokens = accessTokens;
    }
}

/**
 * DI tokens of the application.
 */
export const TYPES = {
    AppConfig: Symbol.for('AppConfig'),
    RoomStore: Symbol.for('RoomStore'),
    AccessTokens: Symbol.for('AccessTokens'),
    Clock: Symbol.for('Clock'),
};
