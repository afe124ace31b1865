/**
 * @endpointkit/core-util
 *
 * Lowest-level helpers shared by every endpointkit package.
 *
 * @packageDocumentation
 */

export { toError } from './lib/errorUtils';
export { encodePathSegment, decodePathSegment } from './lib/percentEncoding';
