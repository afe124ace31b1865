/**
 * @endpointkit/http-client
 *
 * Sends requests of generated endpoints over fetch.
 *
 * Architecture:
 * ```
 * http-api (definition surface)
 *    ↑
 *    ├── http-codegen (declaration → GeneratedEndpoint)
 *    └── http-client  (GeneratedEndpoint → fetch)  ← YOU ARE HERE
 * ```
 *
 * Usage:
 * ```typescript
 * import { createClient, ClientConfig } from '@endpointkit/http-client';
 *
 * const config = new ClientConfig('http://localhost:8008', 'my-token');
 * const client = createClient({ sendMessage: SendMessage }, config);
 *
 * const response = await client.sendMessage(request);
 * ```
 */

export { createClient, proxyFor, ClientConfig, EndpointClient, EndpointSender, EndpointMethods } from './ClientFactory';
