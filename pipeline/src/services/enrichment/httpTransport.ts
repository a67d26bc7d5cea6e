/**
 * Axios transport for the SKU attribute service.
 *
 * POST `{ skus: [...] }` → `{ status, data: { [sku]: { ... } } }`
 */

import axios from 'axios';
import type { EnrichmentTransport } from './client.js';

export interface HttpTransportOptions {
    apiUrl: string;
    apiKey?: string | null;
    timeoutMs: number;
}

export function createHttpEnrichmentTransport(options: HttpTransportOptions): EnrichmentTransport {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (options.apiKey) headers['x-api-key'] = options.apiKey;

    return async (skus) => {
        const response = await axios.post<unknown>(
            options.apiUrl,
            { skus },
            { headers, timeout: options.timeoutMs }
        );
        return response.data;
    };
}
