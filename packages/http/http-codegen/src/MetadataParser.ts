import 'reflect-metadata';
import { plainToInstance } from 'class-transformer';
import { IsBoolean, IsIn, IsString, Matches, validateSync, ValidationError } from 'class-validator';
import {
    AUTH_SCHEMES,
    EndpointMetadata,
    HTTP_METHODS,
    isAuthScheme,
    isHttpMethod,
    isJsonObject,
    Violation,
} from '@endpointkit/http-api';
import { parsed, ParseResult, rejected } from './ParseResult';

const PLACEHOLDER_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const WHOLE_PLACEHOLDER = /^\{([^{}]*)\}$/;

/**
 * A `{name}` placeholder and the index of the path segment it occupies,
 * counting segments after the leading "/".
 */
export class Placeholder {
    constructor(
        readonly name: string,
        readonly segmentIndex: number,
    ) {}
}

export class ParsedMetadata {
    constructor(
        readonly metadata: EndpointMetadata,
        readonly placeholders: readonly Placeholder[],
    ) {}
}

/**
 * Shape checks of the metadata block, run by class-validator.
 */
class MetadataBlock {
    @IsString({ message: 'description must be a string' })
    description!: string;

    @IsIn(HTTP_METHODS, { message: `method must be one of ${HTTP_METHODS.join(', ')}` })
    method!: string;

    @IsString({ message: 'name must be a string' })
    @Matches(/^[A-Za-z0-9_.-]+$/, { message: 'name must be non-empty and use only letters, digits, "_", "." and "-"' })
    name!: string;

    @IsString({ message: 'path must be a string' })
    @Matches(/^\//, { message: 'path must start with "/"' })
    path!: string;

    @IsBoolean({ message: 'rateLimited must be a boolean' })
    rateLimited!: boolean;

    @IsIn(AUTH_SCHEMES, { message: `authentication must be one of ${AUTH_SCHEMES.join(', ')}` })
    authentication!: string;
}

/**
 * Parses the metadata block of an endpoint declaration.
 */
export function parseMetadata(raw: unknown): ParseResult<ParsedMetadata> {
    if (!isJsonObject(raw)) {
        return rejected([new Violation('metadata', 'metadata block must be an object')]);
    }

    const block = plainToInstance(MetadataBlock, raw);
    const errors = validateSync(block, { whitelist: true, forbidNonWhitelisted: true });
    const violations = errors.flatMap(toViolations);

    const template = typeof block.path === 'string' && block.path.startsWith('/') ? scanTemplate(block.path) : undefined;
    if (template !== undefined) {
        violations.push(...template.violations);
    }

    if (violations.length > 0 || template === undefined) {
        return rejected(violations);
    }
    if (!isHttpMethod(block.method) || !isAuthScheme(block.authentication)) {
        // already reported by the IsIn constraints
        return rejected(violations);
    }

    const metadata = new EndpointMetadata(
        block.description,
        block.method,
        block.name,
        block.path,
        block.rateLimited,
        block.authentication,
    );
    return parsed(new ParsedMetadata(metadata, template.placeholders));
}

function toViolations(error: ValidationError): Violation[] {
    return Object.values(error.constraints ?? {}).map((message) => new Violation('metadata', message));
}

/**
 * Finds the placeholders of a path template. A placeholder must be a whole
 * segment, named like an identifier, and appear once.
 */
export function scanTemplate(path: string): { placeholders: Placeholder[]; violations: Violation[] } {
    const placeholders: Placeholder[] = [];
    const violations: Violation[] = [];
    const segments = path.slice(1).split('/');

    segments.forEach((segment, index) => {
        if (!segment.includes('{') && !segment.includes('}')) {
            return;
        }
        const match = WHOLE_PLACEHOLDER.exec(segment);
        if (match === null) {
            violations.push(
                new Violation('path-template', `path segment "${segment}" must be a single "{name}" placeholder`),
            );
            return;
        }
        const name = match[1];
        if (!PLACEHOLDER_NAME.test(name)) {
            violations.push(new Violation('path-template', `placeholder "{${name}}" is not a valid name`));
        } else if (placeholders.some((p) => p.name === name)) {
            violations.push(new Violation('path-template', `placeholder "{${name}}" appears more than once`));
        } else {
            placeholders.push(new Placeholder(name, index));
        }
    });

    return { placeholders, violations };
}
