import { DefinitionSyntaxError, describeLocation, UnsupportedCombinationError, Violation } from '@endpointkit/http-api';
import { prefixViolations } from './ParseResult';
import { CompiledEndpoint } from './SchemaAssembler';
import { SchemaField, Schema } from './SchemaParser';

/**
 * Every structural rule an endpoint breaks. Rules that are about fields which
 * are valid alone but not together are flagged as combinations.
 */
export function collectViolations(endpoint: CompiledEndpoint<object, object, unknown>): Violation[] {
    const { request, response } = endpoint;
    return [
        ...getWithBody(endpoint),
        ...prefixViolations('request', [
            ...newtypeBodyRules(request),
            ...queryMapRules(request),
            ...duplicateHeaders(request),
            ...duplicateKeys(request),
            ...pathRules(endpoint),
            ...typeRules(request),
        ]),
        ...prefixViolations('response', [
            ...newtypeBodyRules(response),
            ...queryMapRules(response),
            ...duplicateHeaders(response),
            ...duplicateKeys(response),
            ...typeRules(response),
        ]),
    ];
}

/**
 * @throws UnsupportedCombinationError when any violation is a combination
 * @throws DefinitionSyntaxError for every other violation
 */
export function validateEndpoint(endpoint: CompiledEndpoint<object, object, unknown>): void {
    const violations = collectViolations(endpoint);
    if (violations.length === 0) {
        return;
    }
    const name = endpoint.metadata.name;
    if (violations.some((v) => v.combination)) {
        throw new UnsupportedCombinationError(name, violations);
    }
    throw new DefinitionSyntaxError(name, violations);
}

function getWithBody(endpoint: CompiledEndpoint<object, object, unknown>): Violation[] {
    if (endpoint.metadata.method !== 'GET') {
        return [];
    }
    const request = endpoint.request;
    return request.fields
        .filter((f) => f.location.kind === 'body' || f.location.kind === 'newtypeBody')
        .map((f) => new Violation('get-with-body', 'GET endpoints cannot have body fields', f.name, true));
}

function newtypeBodyRules(schema: Schema<object>): Violation[] {
    const violations: Violation[] = [];
    if (schema.newtypeBodyFields.length > 1) {
        for (const field of schema.newtypeBodyFields) {
            violations.push(
                new Violation('newtype-body', 'at most one newtype body field is allowed', field.name, true),
            );
        }
    }
    const newtype = schema.newtypeBodyField;
    if (newtype !== undefined) {
        for (const field of schema.bodyFields) {
            violations.push(
                new Violation('newtype-body', `body fields cannot be combined with newtype body "${newtype.name}"`, field.name, true),
            );
        }
    }
    return violations;
}

function queryMapRules(schema: Schema<object>): Violation[] {
    const violations: Violation[] = [];
    if (schema.queryMapFields.length > 1) {
        for (const field of schema.queryMapFields) {
            violations.push(new Violation('query-map', 'at most one query map field is allowed', field.name, true));
        }
    }
    const queryMap = schema.queryMapField;
    if (queryMap !== undefined) {
        for (const field of schema.queryFields) {
            violations.push(
                new Violation('query-map', `query fields cannot be combined with query map "${queryMap.name}"`, field.name, true),
            );
        }
    }
    return violations;
}

function duplicateHeaders(schema: Schema<object>): Violation[] {
    const violations: Violation[] = [];
    const seen = new Map<string, string>();
    for (const field of schema.fields) {
        if (field.location.kind !== 'header') {
            continue;
        }
        const header = field.location.headerName.toLowerCase();
        const first = seen.get(header);
        if (first !== undefined) {
            violations.push(
                new Violation('duplicate-header', `header "${header}" is already used by "${first}"`, field.name),
            );
        } else {
            seen.set(header, field.name);
        }
    }
    return violations;
}

function duplicateKeys(schema: Schema<object>): Violation[] {
    const violations: Violation[] = [];
    const seen = { body: new Map<string, string>(), query: new Map<string, string>() };
    for (const field of schema.fields) {
        const location = field.location;
        if (location.kind !== 'body' && location.kind !== 'query') {
            continue;
        }
        const keys = seen[location.kind];
        const first = keys.get(location.key);
        if (first !== undefined) {
            violations.push(
                new Violation('duplicate-key', `${location.kind} key "${location.key}" is already used by "${first}"`, field.name),
            );
        } else {
            keys.set(location.key, field.name);
        }
    }
    return violations;
}

/**
 * Path fields pair up with the template's placeholders by position, and each
 * must carry its placeholder's name.
 */
function pathRules(endpoint: CompiledEndpoint<object, object, unknown>): Violation[] {
    const violations: Violation[] = [];
    const fields = endpoint.request.pathFields;
    const placeholders = endpoint.placeholders;

    fields.forEach((field, index) => {
        if (field.optional) {
            violations.push(new Violation('optional-path', 'path fields cannot be optional', field.name));
        }
        const placeholder = placeholders[index];
        if (placeholder === undefined) {
            violations.push(
                new Violation('path-fields', `path template ${endpoint.metadata.path} has no placeholder for this field`, field.name),
            );
        } else if (placeholder.name !== field.name) {
            violations.push(
                new Violation('path-fields', `path field ${index + 1} must be named "${placeholder.name}" to match the template`, field.name),
            );
        }
    });
    for (const placeholder of placeholders.slice(fields.length)) {
        violations.push(new Violation('path-fields', `placeholder "{${placeholder.name}}" has no path field`));
    }
    return violations;
}

function typeRules(schema: Schema<object>): Violation[] {
    return schema.fields.flatMap((field) => {
        const problem = typeProblem(field);
        return problem === undefined ? [] : [new Violation('field-type', problem, field.name)];
    });
}

function typeProblem(field: SchemaField): string | undefined {
    const type = field.type;
    switch (field.location.kind) {
        case 'path':
        case 'query':
        case 'header':
            return type.toText === undefined || type.fromText === undefined
                ? `type ${type.name} has no text form and cannot be used in ${describeLocation(field.location)}`
                : undefined;
        case 'queryMap':
            return type.toPairs === undefined || type.fromPairs === undefined
                ? `type ${type.name} is not a string map and cannot be used as a query map`
                : undefined;
        case 'body':
        case 'newtypeBody':
            return undefined;
    }
}
