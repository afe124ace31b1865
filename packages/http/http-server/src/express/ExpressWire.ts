import { Request, Response } from 'express';
import { EMPTY_BODY, HeaderMap, WireRequest, WireResponse } from '@endpointkit/http-api';

/**
 * Copies an express request into a WireRequest. Expects the body to have
 * been buffered by `express.raw()`; anything else reads as an empty body.
 */
export function toWireRequest(req: Request): WireRequest {
    const headers = new HeaderMap();
    for (const [name, value] of Object.entries(req.headers)) {
        if (typeof value === 'string') {
            headers.append(name, value);
        } else if (Array.isArray(value)) {
            for (const item of value) {
                headers.append(name, item);
            }
        }
    }

    const raw: unknown = req.body;
    const body = Buffer.isBuffer(raw) ? new Uint8Array(raw) : EMPTY_BODY;
    return new WireRequest(req.method, req.originalUrl, headers, body);
}

export function sendWireResponse(res: Response, wire: WireResponse): void {
    res.status(wire.status);
    for (const [name, value] of wire.headers) {
        res.setHeader(name, value);
    }
    res.end(Buffer.from(wire.body));
}
