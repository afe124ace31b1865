import { Violation } from '@endpointkit/http-api';

/**
 * Outcome of a parsing step. Failures carry every violation found, never just
 * the first one.
 */
export type ParseResult<T> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly violations: readonly Violation[] };

export function parsed<T>(value: T): ParseResult<T> {
    return { ok: true, value };
}

export function rejected<T>(violations: readonly Violation[]): ParseResult<T> {
    return { ok: false, violations };
}

/**
 * Violations of a result, empty on success.
 */
export function violationsOf<T>(result: ParseResult<T>): readonly Violation[] {
    return result.ok ? [] : result.violations;
}

/**
 * Copies violations with their message prefixed by the side they belong to,
 * e.g. `request: ...`.
 */
export function prefixViolations(side: string, violations: readonly Violation[]): Violation[] {
    return violations.map((v) => new Violation(v.rule, `${side}: ${v.message}`, v.field, v.combination));
}
