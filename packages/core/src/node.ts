/**
 * @concierge/core/node
 *
 * Node.js-only exports. These use `node:fs` and `node:http`. Import from
 * this subpath for running the server locally.
 *
 * @example
 * ```typescript
 * import { startLocalServer, loadEnvFile } from '@concierge/core/node';
 * ```
 *
 * @packageDocumentation
 */

export { startLocalServer, loadEnvFile, type LocalServerOptions, type LocalServerHandle } from './server/local-server.js';
