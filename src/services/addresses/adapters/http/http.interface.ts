import type { QueryParams } from '../../types';

/**
 * HTTP Request Adapter Interface
 *
 * Owns the HTTP session used to reach the geocoding service.
 * A single instance is shared by every call made through a client.
 *
 * Implementations: ky
 */
export interface HttpRequestAdapter {
    /**
     * Issue a GET request relative to the service base URL
     *
     * @param path - Endpoint path, e.g. "search"
     * @param params - Query parameters, undefined values are omitted
     * @returns Decoded JSON body
     * @throws {HttpRequestError} If the request fails, times out, or the session is closed
     */
    get(path: string, params: QueryParams): Promise<unknown>;

    /**
     * Release the session and abort requests still in flight
     */
    close(): Promise<void>;
}

/**
 * HTTP Request Error
 */
export class HttpRequestError extends Error {
    constructor(
        message: string,
        public readonly url?: string,
        public readonly statusCode?: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'HttpRequestError';
    }
}

/**
 * Raised when the service does not answer within the configured timeout
 */
export class TimeoutExceededError extends HttpRequestError {
    constructor(message: string, url?: string, options?: { cause?: unknown }) {
        super(message, url, undefined, options);
        this.name = 'TimeoutExceededError';
    }
}
