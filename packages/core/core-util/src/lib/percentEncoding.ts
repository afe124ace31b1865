/**
 * Path segment escaping.
 *
 * Encoding keeps only the RFC 3986 unreserved characters (ALPHA, DIGIT, "-",
 * ".", "_", "~") and writes every other character as %XX of its UTF-8 bytes.
 * encodeURIComponent already does that except for ! ' ( ) *, which are
 * escaped here as well.
 */

const SUB_DELIMS_LEFT_BY_ENCODE_URI = /[!'()*]/g;

export function encodePathSegment(raw: string): string {
    return encodeURIComponent(raw).replace(
        SUB_DELIMS_LEFT_BY_ENCODE_URI,
        (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
    );
}

/**
 * Inverse of encodePathSegment. A segment that was sent unescaped decodes to
 * itself. Throws URIError on malformed escapes such as "%E0%A4%A".
 */
export function decodePathSegment(segment: string): string {
    return decodeURIComponent(segment);
}
