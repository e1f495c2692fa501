/**
 * @logrelay/sink-console: registration entry point.
 */

import type { SinkRegistration } from '@logrelay/sdk';
import { ConsoleSink, type ConsoleSinkOptions } from './console-sink.js';

export function register(): SinkRegistration<ConsoleSinkOptions> {
	return {
		id: 'console',
		create: (options) => new ConsoleSink(options),
		configSchema: {
			type: 'object',
			properties: {
				level: {
					type: 'string',
					description: 'Minimum level to display; names are case-insensitive.',
					default: 'debug',
				},
				stream: {
					type: 'string',
					enum: ['stdout', 'stderr'],
					default: 'stdout',
				},
				color: {
					type: 'boolean',
					description: 'Use ANSI colors in output.',
					default: false,
				},
			},
			additionalProperties: false,
		},
	};
}

export { ConsoleSink, type ConsoleSinkOptions, type ConsoleStream } from './console-sink.js';
export { colorize } from './format.js';
