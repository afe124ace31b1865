import { HeaderMap } from './wire';

/**
 * Headers whose values never reach a log line in clear.
 */
export const SECURE_HEADERS: readonly string[] = ['authorization', 'cookie', 'set-cookie', 'x-api-key'];

/**
 * Builds loggable copies of header maps with credentials masked.
 *
 * Masking rules:
 * - longer than 15 characters: first 3 and last 3 with "..." between
 * - 8 to 15 characters: first 2 followed by "..."
 * - shorter: "<secure key too short to log>"
 */
export class HeaderMasker {
    private readonly secure: Set<string>;

    constructor(secureHeaders: readonly string[] = SECURE_HEADERS) {
        this.secure = new Set(secureHeaders.map((h) => h.toLowerCase()));
    }

    forLogs(headers: HeaderMap): Record<string, string> {
        const result: Record<string, string> = {};
        for (const [name, value] of headers) {
            result[name] = this.secure.has(name) ? this.mask(value) : value;
        }
        return result;
    }

    mask(value: string): string {
        const len = value.length;
        if (len < 8) {
            return '<secure key too short to log>';
        } else if (len <= 15) {
            return `${value.substring(0, 2)}...`;
        }
        return `${value.substring(0, 3)}...${value.substring(len - 3)}`;
    }
}
