export {
    EnrichmentClient,
    type EnrichmentClientOptions,
    type EnrichmentFetchResult,
    type EnrichmentTransport,
    type FailedBatch,
} from './client.js';
export { createHttpEnrichmentTransport, type HttpTransportOptions } from './httpTransport.js';
