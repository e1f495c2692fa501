/**
 * Destination validation for remote delivery.
 */

import { ConfigurationError } from '@logrelay/sdk';

/**
 * Parse a collector address. It must be absolute, with both a scheme
 * and a host; anything else is a configuration error.
 */
export function parseDestination(address: string | undefined): URL {
	if (address === undefined || address.trim() === '') {
		throw new ConfigurationError('Remote logging endpoint must be provided (url or LOG_HTTP_URL)');
	}

	let url: URL;
	try {
		url = new URL(address.trim());
	} catch (err) {
		throw new ConfigurationError(`Invalid remote logging endpoint URL: ${address}`, { cause: err });
	}

	if (url.protocol === ':' || url.hostname === '') {
		throw new ConfigurationError(`Invalid remote logging endpoint URL: ${address}`);
	}

	return url;
}

/** Whether an address would be accepted by parseDestination */
export function isValidDestination(address: string): boolean {
	try {
		parseDestination(address);
		return true;
	} catch {
		return false;
	}
}
