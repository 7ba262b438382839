import { AddressError, AddressNotFoundError, type AddressFeature, type AddressResponseBody } from './types';

function isResponseBody(value: unknown): value is AddressResponseBody {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEmpty(value: unknown): boolean {
    if (Array.isArray(value)) {
        return value.length === 0;
    }
    if (isResponseBody(value)) {
        return Object.keys(value).length === 0;
    }
    return !value;
}

function describeError(error: unknown): string {
    return typeof error === 'string' ? error : JSON.stringify(error);
}

/**
 * Check a decoded service body and extract its features
 *
 * A non-empty object carrying `features` always wins, whatever other keys it has.
 *
 * @param body - Decoded JSON body from the search or reverse endpoint
 * @returns The `features` array, unchanged
 * @throws {AddressNotFoundError} If `features` is present but empty
 * @throws {AddressError} If the body is missing, malformed, or carries an `error`
 */
export function checkResponse(body: unknown): AddressFeature[] {
    if (isResponseBody(body) && !isEmpty(body) && 'features' in body) {
        const features = body.features;

        if (isEmpty(features)) {
            throw new AddressNotFoundError('No addresses found for the given query.');
        }
        if (!Array.isArray(features)) {
            throw new AddressError('Invalid features in response from address service.');
        }
        return features;
    }

    if (!isResponseBody(body) || isEmpty(body)) {
        throw new AddressError('Invalid response from address service.');
    }
    if ('error' in body) {
        throw new AddressError(`Error in response: ${describeError(body.error)}`);
    }

    // `features` is necessarily absent here
    throw new AddressError('No features found in the response.');
}
