import { describe, it, expect, vi } from 'vitest';
import { KyHttpAdapter, type FetchFunction } from '@/services/addresses/adapters/http/ky.adapter';
import { HttpRequestError, TimeoutExceededError } from '@/services/addresses/adapters/http/http.interface';

/**
 * Unit tests for the ky HTTP adapter
 *
 * fetch is replaced by an in-process stub, no network access
 */

const BASE_URL = 'https://geocoder.test/geocodage';

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

function requestUrl(input: Parameters<FetchFunction>[0]): URL {
    return new URL(input instanceof Request ? input.url : String(input));
}

/**
 * fetch stub that never answers and rejects once its request is aborted
 */
function hangingFetch(): { fetch: FetchFunction; started: Promise<void> } {
    let markStarted: () => void = () => {};
    const started = new Promise<void>((resolve) => {
        markStarted = resolve;
    });

    const fetch: FetchFunction = (input) =>
        new Promise<Response>((_resolve, reject) => {
            markStarted();
            if (!(input instanceof Request)) {
                return;
            }
            if (input.signal.aborted) {
                reject(new Error('aborted'));
                return;
            }
            input.signal.addEventListener('abort', () => reject(new Error('aborted')));
        });

    return { fetch, started };
}

function createAdapter(fetchStub: FetchFunction, timeoutMs = 1000): KyHttpAdapter {
    return new KyHttpAdapter({ baseUrl: BASE_URL, timeoutMs, fetch: fetchStub });
}

describe('KyHttpAdapter', () => {
    it('should GET the endpoint under the base URL with every parameter', async () => {
        const urls: URL[] = [];
        const adapter = createAdapter(async (input) => {
            urls.push(requestUrl(input));
            return jsonResponse({ features: [] });
        });

        const body = await adapter.get('search', {
            q: '10 rue de Rivoli',
            limit: 5,
            autocomplete: false,
            postcode: undefined,
        });

        expect(body).toEqual({ features: [] });
        expect(urls).toHaveLength(1);
        expect(urls[0]?.origin).toBe('https://geocoder.test');
        expect(urls[0]?.pathname).toBe('/geocodage/search');
        expect(urls[0]?.searchParams.get('q')).toBe('10 rue de Rivoli');
        expect(urls[0]?.searchParams.get('limit')).toBe('5');
        expect(urls[0]?.searchParams.get('autocomplete')).toBe('false');
        expect(urls[0]?.searchParams.has('postcode')).toBe(false);
    });

    it('should map an HTTP error status to HttpRequestError', async () => {
        const adapter = createAdapter(async () => jsonResponse({ error: 'unavailable' }, 503));

        const error = await adapter.get('reverse', { lat: 48.85, lon: 2.35 }).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(HttpRequestError);
        expect(error).not.toBeInstanceOf(TimeoutExceededError);
        expect(error).toHaveProperty('statusCode', 503);
        expect(error).toHaveProperty('message', 'Request failed with status 503');
    });

    it('should not retry failed requests', async () => {
        const fetchStub = vi.fn(async () => jsonResponse({}, 503));
        const adapter = createAdapter(fetchStub);

        await expect(adapter.get('search', { q: 'Paris' })).rejects.toThrow(HttpRequestError);

        expect(fetchStub).toHaveBeenCalledTimes(1);
    });

    it('should map a timeout to TimeoutExceededError', async () => {
        const adapter = createAdapter(hangingFetch().fetch, 20);

        await expect(adapter.get('search', { q: 'Paris' })).rejects.toThrow(TimeoutExceededError);
    });

    it('should map an undecodable body to HttpRequestError', async () => {
        const adapter = createAdapter(
            async () =>
                new Response('<html>oops</html>', {
                    status: 200,
                    headers: { 'Content-Type': 'text/html' },
                })
        );

        const error = await adapter.get('search', { q: 'Paris' }).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(HttpRequestError);
        expect(error).toHaveProperty('statusCode', undefined);
    });

    it('should reject requests once closed', async () => {
        const fetchStub = vi.fn(async () => jsonResponse({ features: [] }));
        const adapter = createAdapter(fetchStub);

        await adapter.close();
        await adapter.close();

        await expect(adapter.get('search', { q: 'Paris' })).rejects.toThrow('HTTP session is closed');
        expect(fetchStub).not.toHaveBeenCalled();
    });

    it('should abort a request in flight when closed', async () => {
        const stub = hangingFetch();
        const adapter = createAdapter(stub.fetch, 5000);

        const pending = adapter.get('search', { q: 'Paris' }).catch((e: unknown) => e);
        await stub.started;
        await adapter.close();
        const error = await pending;

        expect(error).toBeInstanceOf(HttpRequestError);
        expect(error).not.toBeInstanceOf(TimeoutExceededError);
        expect(error).toHaveProperty('message', 'Request to search failed: aborted');
    });
});
