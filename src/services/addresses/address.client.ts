import type { HttpRequestAdapter } from './adapters/http/http.interface';
import { HttpRequestError } from './adapters/http/http.interface';
import { KyHttpAdapter } from './adapters/http/ky.adapter';
import { checkResponse } from './response-checker';
import {
    AddressNotFoundError,
    type AddressFeature,
    type QueryParams,
    type ReverseOptions,
    type SearchOptions,
} from './types';
import { loadConfig, type AddressClientConfig } from '@/shared/config/config';
import { logAddressLookup } from '@/shared/utils/logger';

const DEFAULT_LIMIT = 10;

/**
 * Address Client
 *
 * Queries the French national address service (Géoplateforme geocoding)
 * API Docs: https://geoservices.ign.fr/documentation/services/services-geoplateforme/geocodage
 *
 * Holds a single HTTP adapter for the lifetime of the client. Callers must not
 * close it while other lookups are still pending.
 */
export class AddressClient {
    constructor(private readonly http: HttpRequestAdapter) {}

    /**
     * Build a client over a ky session configured from the environment
     */
    static fromConfig(config: AddressClientConfig = loadConfig()): AddressClient {
        return new AddressClient(new KyHttpAdapter(config.addressApi));
    }

    /**
     * Search addresses, POIs or parcels matching a free-text query
     *
     * @param query - Search text, e.g. "10 rue de Rivoli Paris"
     * @param options - `limit` (default 10) and any filter the service accepts
     * @returns Features in the order returned by the service
     * @throws {AddressNotFoundError} If the request fails or nothing matches
     * @throws {AddressError} If the response is invalid
     */
    async search(query: string, options: SearchOptions = {}): Promise<AddressFeature[]> {
        const { limit = DEFAULT_LIMIT, ...filters } = options;

        return this.lookup('search', {
            q: query,
            limit,
            ...filters,
        });
    }

    /**
     * Reverse geocode a location
     *
     * @param options - Usually `lat` and `lon`, plus any filter the service accepts
     * @returns Features closest to the location
     * @throws {AddressNotFoundError} If the request fails or nothing matches
     * @throws {AddressError} If the response is invalid
     */
    async reverse(options: ReverseOptions = {}): Promise<AddressFeature[]> {
        return this.lookup('reverse', { ...options });
    }

    /**
     * Close the underlying HTTP session
     */
    async close(): Promise<void> {
        await this.http.close();
    }

    private async lookup(endpoint: string, params: QueryParams): Promise<AddressFeature[]> {
        let body: unknown;
        try {
            body = await this.http.get(endpoint, params);
        } catch (error) {
            if (!(error instanceof HttpRequestError)) {
                throw error;
            }

            logAddressLookup({
                endpoint,
                params,
                error: error.message,
            });
            throw new AddressNotFoundError('Address not found.', { cause: error });
        }

        const features = checkResponse(body);

        logAddressLookup({
            endpoint,
            params,
            resultCount: features.length,
        });

        return features;
    }
}
