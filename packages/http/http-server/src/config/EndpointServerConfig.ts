/**
 * DI tokens of the server package.
 */
export const SERVER_TYPES = {
    EndpointServerConfig: Symbol.for('EndpointServerConfig'),
};

/**
 * Server settings. Data only; override the binding under
 * SERVER_TYPES.EndpointServerConfig to change them.
 */
export class EndpointServerConfig {
    /** Port used by start() when none is passed. */
    port: number;

    /** Log every call through LogApiCall and every route registration. */
    loggingEnabled: boolean;

    constructor(port: number = 8008, loggingEnabled: boolean = true) {
        this.port = port;
        this.loggingEnabled = loggingEnabled;
    }
}
