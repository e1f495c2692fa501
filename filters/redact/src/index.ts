/**
 * @logrelay/filter-redact: registration entry point.
 */

import type { FilterRegistration } from '@logrelay/sdk';
import { RedactFilter, type RedactOptions } from './redact-filter.js';

export function register(): FilterRegistration<RedactOptions> {
	return {
		id: 'redact',
		create: (options) => new RedactFilter(options),
		configSchema: {
			type: 'object',
			required: ['fields'],
			properties: {
				fields: {
					type: 'array',
					items: { type: 'string' },
					description: 'Field names to redact.',
				},
				replacement: {
					type: 'string',
					description: 'Placeholder written over redacted values.',
					default: '[REDACTED]',
				},
				deep: {
					type: 'boolean',
					description: 'Redact matching keys inside structured extras.',
					default: true,
				},
			},
			additionalProperties: false,
		},
	};
}

export {
	REDACTED,
	RedactFilter,
	createRule,
	redactJson,
	redactRecord,
	type RedactOptions,
	type RedactionRule,
} from './redact-filter.js';
