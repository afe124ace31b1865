/**
 * @endpointkit/http-codegen
 *
 * Turns endpoint declarations into GeneratedEndpoint values:
 *
 * ```
 * declaration ──► MetadataParser ─┐
 *                 SchemaParser ───┼─► SchemaAssembler ─► Validator ─► CodecGenerator
 *                 ErrorTypeResolver┘
 * ```
 *
 * Everything runs once per endpoint; the generated routines do no I/O.
 */

export { defineEndpoint, GeneratorOptions } from './defineEndpoint';
export { EndpointDeclaration, CompiledEndpoint, assembleEndpoint, endpointName } from './SchemaAssembler';
export { parseMetadata, scanTemplate, ParsedMetadata, Placeholder } from './MetadataParser';
export { parseSchema, parseFieldDeclarations, Schema, SchemaKind, SchemaField } from './SchemaParser';
export { resolveErrorType } from './ErrorTypeResolver';
export { collectViolations, validateEndpoint } from './Validator';
export { generateCodecs } from './CodecGenerator';
export { ParseResult, parsed, rejected, violationsOf, prefixViolations } from './ParseResult';
