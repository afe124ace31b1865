import { EndpointMetadata, WireRequest, WireResponse } from '@endpointkit/http-api';

/**
 * A registered endpoint. `dispatch` decodes, runs the handler and encodes;
 * errors are left to the caller.
 */
export class Route {
    readonly segments: readonly string[];

    constructor(
        readonly metadata: EndpointMetadata,
        readonly handlerName: string,
        readonly dispatch: (wire: WireRequest) => Promise<WireResponse>,
    ) {
        this.segments = metadata.path.slice(1).split('/');
    }

    /**
     * Literal segments must match exactly; a placeholder matches any non-empty
     * segment.
     */
    matches(method: string, pathSegments: readonly string[]): boolean {
        if (method.toUpperCase() !== this.metadata.method || pathSegments.length !== this.segments.length) {
            return false;
        }
        return this.segments.every((segment, index) => {
            const actual = pathSegments[index];
            return isPlaceholder(segment) ? actual !== '' : actual === segment;
        });
    }
}

function isPlaceholder(segment: string): boolean {
    return segment.startsWith('{') && segment.endsWith('}');
}

/**
 * Routes in registration order. The first match wins.
 */
export class RouteTable {
    private readonly routes: Route[] = [];

    add(route: Route): void {
        const { name, method, path } = route.metadata;
        for (const existing of this.routes) {
            if (existing.metadata.name === name) {
                throw new Error(`Endpoint '${name}' is already registered`);
            }
            if (existing.metadata.method === method && existing.metadata.path === path) {
                throw new Error(`${method} ${path} is already registered by endpoint '${existing.metadata.name}'`);
            }
        }
        this.routes.push(route);
    }

    match(method: string, pathname: string): Route | undefined {
        const segments = pathname.slice(1).split('/');
        return this.routes.find((route) => route.matches(method, segments));
    }

    get size(): number {
        return this.routes.length;
    }

    all(): readonly Route[] {
        return this.routes;
    }
}
