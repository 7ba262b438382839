/**
 * Address Service Types
 */

/**
 * Scalar accepted as a query parameter value
 */
export type QueryValue = string | number | boolean;

/**
 * Open set of query parameters, forwarded as-is to the service
 * Undefined entries are dropped before the request is sent
 */
export type QueryParams = Record<string, QueryValue | undefined>;

/**
 * Index to search in (comma-separated combinations such as "poi,parcel" are allowed)
 */
export type AddressIndex = 'address' | 'poi' | 'parcel';

/**
 * Filters shared by the search and reverse endpoints
 * API Docs: https://geoservices.ign.fr/documentation/services/services-geoplateforme/geocodage
 */
export interface SearchFilters extends QueryParams {
    /** Return autocomplete suggestions */
    autocomplete?: boolean | undefined;
    /** Index to search in, e.g. "poi" or "poi,parcel" */
    index?: AddressIndex | string | undefined;
    /** Latitude to search around */
    lat?: number | undefined;
    /** Longitude to search around */
    lon?: number | undefined;
    /** Return the true geometry of the result */
    returntruegeometry?: boolean | undefined;
    postcode?: string | undefined;
    /** INSEE city code */
    citycode?: string | undefined;
    /** Result type, e.g. "street", "municipality" */
    type?: string | undefined;
    city?: string | undefined;
    /** POI category, e.g. "school" */
    category?: string | undefined;
    departmentcode?: string | undefined;
    municipalitycode?: string | undefined;
    oldmunicipalitycode?: string | undefined;
    districtcode?: string | undefined;
    /** Cadastral section */
    section?: string | undefined;
    /** Cadastral parcel number */
    number?: string | undefined;
    /** Cadastral sheet */
    sheet?: string | undefined;
}

/**
 * Options for a forward search
 */
export interface SearchOptions extends SearchFilters {
    /** Maximum number of results (default: 10) */
    limit?: number | undefined;
}

/**
 * Options for a reverse lookup
 */
export interface ReverseOptions extends SearchFilters {
    limit?: number | undefined;
    /** Geometry to search within, e.g. a GeoJSON polygon */
    searchgeom?: string | undefined;
}

/**
 * One geocoding result (address, POI or parcel)
 * Passed through to callers exactly as the service returned it
 */
export interface AddressFeature {
    type?: string;
    geometry?: {
        type: string;
        coordinates: unknown;
    };
    properties?: Record<string, unknown>;
    [key: string]: unknown;
}

/**
 * Decoded body of a search or reverse response
 * A GeoJSON FeatureCollection on success, `error` set on failure
 */
export interface AddressResponseBody {
    features?: unknown;
    error?: unknown;
    [key: string]: unknown;
}

/**
 * General address client error
 * Raised when the service response is missing, malformed, or reports an error
 */
export class AddressError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'AddressError';
    }
}

/**
 * Address Not Found Error
 * Raised when the lookup fails at the transport level or yields no features
 */
export class AddressNotFoundError extends AddressError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'AddressNotFoundError';
    }
}
