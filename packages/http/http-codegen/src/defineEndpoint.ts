import { GeneratedEndpoint, Void } from '@endpointkit/http-api';
import { generateCodecs } from './CodecGenerator';
import { assembleEndpoint, EndpointDeclaration } from './SchemaAssembler';
import { validateEndpoint } from './Validator';

/**
 * Generation settings. Data only.
 */
export class GeneratorOptions {
    /** Log one line per generated endpoint. */
    logging: boolean = false;

    constructor(logging: boolean = false) {
        this.logging = logging;
    }
}

/**
 * Turns an endpoint declaration into its codec routines and metadata record.
 * Called once per endpoint, usually at module load.
 *
 * @throws DefinitionSyntaxError listing every problem with the declaration
 * @throws UnsupportedCombinationError when fields conflict with each other or
 * with the method
 */
export function defineEndpoint<Req extends object, Res extends object, E = Void>(
    declaration: EndpointDeclaration<Req, Res, E>,
    options: GeneratorOptions = new GeneratorOptions(),
): GeneratedEndpoint<Req, Res, E> {
    const compiled = assembleEndpoint(declaration);
    validateEndpoint(compiled);
    const endpoint = generateCodecs(compiled);
    if (options.logging) {
        const { name, method, path } = endpoint.metadata;
        console.log(`[endpointkit] generated ${name} ${method} ${path}`);
    }
    return endpoint;
}
