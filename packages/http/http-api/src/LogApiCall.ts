import { toError } from '@endpointkit/core-util';
import { FromHttpResponseError, HttpError } from './errors';
import { HeaderMasker } from './HeaderMasker';
import { EndpointMetadata } from './metadata';
import { HeaderMap } from './wire';

export type CallSide = 'CLIENT' | 'SVR';

/**
 * Logs one endpoint call around its execution.
 *
 * Line formats:
 * - [API-{side}-req] name METHOD path request={...} headers={...}
 * - [API-{side}-resp-SUCCESS] name response={...}
 * - [API-{side}-resp-OTHER] name errorType=... status=...   (caller mistakes, 4xx)
 * - [API-{side}-resp-FAIL] name errorType=... error=...     (everything else)
 *
 * Credential headers are masked by HeaderMasker.
 */
export class LogApiCall {
    constructor(private readonly masker: HeaderMasker = new HeaderMasker()) {}

    async execute<T>(
        side: CallSide,
        metadata: EndpointMetadata,
        requestDto: unknown,
        headers: HeaderMap,
        method: () => Promise<T>,
    ): Promise<T> {
        console.log(
            `[API-${side}-req] ${metadata.name} ${metadata.method} ${metadata.path} request=${JSON.stringify(requestDto)} headers=${JSON.stringify(this.masker.forLogs(headers))}`,
        );

        try {
            const response = await method();
            console.log(`[API-${side}-resp-SUCCESS] ${metadata.name} response=${JSON.stringify(response)}`);
            return response;
        } catch (err: unknown) {
            const error = toError(err);
            const status = LogApiCall.statusOf(error);
            if (status !== undefined && status < 500) {
                console.log(`[API-${side}-resp-OTHER] ${metadata.name} errorType=${error.name} status=${status}`);
            } else {
                console.error(`[API-${side}-resp-FAIL] ${metadata.name} errorType=${error.name} error=${error.message}`);
            }
            throw error;
        }
    }

    /**
     * Status carried by an error, if it carries one.
     */
    static statusOf(error: Error): number | undefined {
        if (error instanceof HttpError) {
            return error.code;
        }
        if (error instanceof FromHttpResponseError) {
            return error.status();
        }
        return undefined;
    }
}
