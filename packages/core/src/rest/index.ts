// packages/core/src/rest/index.ts -- barrel re-export

export { FetchExecutor } from './fetch-executor.js';
export type { FetchExecutorOptions } from './fetch-executor.js';
export { ZosmfRestClient, isHttpError } from './zosmf-rest-client.js';
export type { ZosmfRequestOptions } from './zosmf-rest-client.js';
export { ZosmfHeaders, jclSymbolHeaders } from './headers.js';
