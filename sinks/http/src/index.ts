/**
 * @logrelay/sink-http: registration entry point.
 */

import type { SinkRegistration } from '@logrelay/sdk';
import { HttpSink, type HttpSinkOptions } from './http-sink.js';

export function register(): SinkRegistration<HttpSinkOptions> {
	return {
		id: 'http',
		create: (options) => new HttpSink(options),
		configSchema: {
			type: 'object',
			required: ['url'],
			properties: {
				url: {
					type: 'string',
					description: 'Collector endpoint (scheme and host required).',
				},
				token: {
					type: 'string',
					description: 'Bearer token sent in the Authorization header.',
				},
				timeout: {
					type: 'number',
					description: 'Seconds per attempt.',
					exclusiveMinimum: 0,
					default: 5,
				},
				maxRetries: {
					type: 'integer',
					description: 'Retries after the first attempt.',
					minimum: 0,
					default: 3,
				},
				backoffFactor: {
					type: 'number',
					description: 'Backoff multiplier in seconds.',
					minimum: 0,
					default: 0.3,
				},
				level: {
					type: 'string',
					description: 'Minimum level delivered; names are case-insensitive.',
					default: 'debug',
				},
			},
			additionalProperties: false,
		},
	};
}

export {
	DEFAULT_BACKOFF_FACTOR,
	DEFAULT_MAX_RETRIES,
	DEFAULT_TIMEOUT_SECONDS,
	HttpSink,
	type DeliveryResult,
	type HttpSinkOptions,
} from './http-sink.js';
export { isValidDestination, parseDestination } from './destination.js';
export {
	BACKOFF_MAX_MS,
	RETRY_AFTER_STATUSES,
	TRANSIENT_STATUSES,
	backoffDelay,
	createRetryPolicy,
	nextState,
	parseRetryAfter,
	type AttemptOutcome,
	type RetryPolicy,
	type RetryState,
} from './retry.js';
