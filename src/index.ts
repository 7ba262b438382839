/**
 * French address geocoding client
 */
export { AddressClient } from './services/addresses/address.client';
export { checkResponse } from './services/addresses/response-checker';
export { KyHttpAdapter } from './services/addresses/adapters/http/ky.adapter';
export type { FetchFunction, KyHttpAdapterOptions } from './services/addresses/adapters/http/ky.adapter';
export type { HttpRequestAdapter } from './services/addresses/adapters/http/http.interface';
export { HttpRequestError, TimeoutExceededError } from './services/addresses/adapters/http/http.interface';
export { AddressError, AddressNotFoundError } from './services/addresses/types';
export type {
    AddressFeature,
    AddressResponseBody,
    AddressIndex,
    QueryParams,
    QueryValue,
    ReverseOptions,
    SearchFilters,
    SearchOptions,
} from './services/addresses/types';
export { loadConfig } from './shared/config/config';
export type { AddressClientConfig } from './shared/config/config';
export { logger } from './shared/utils/logger';
