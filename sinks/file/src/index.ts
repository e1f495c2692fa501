/**
 * @logrelay/sink-file: registration entry point.
 */

import type { SchemaObject, SinkRegistration } from '@logrelay/sdk';
import { FileSink, type FileSinkOptions } from './file-sink.js';

/** Schema of a size or time rotation policy; unset fields take their defaults */
export const ROTATION_SCHEMA: SchemaObject = {
	type: 'object',
	properties: {
		type: { type: 'string', enum: ['size', 'time'], default: 'size' },
		maxBytes: {
			type: 'integer',
			description: 'Roll over before the file reaches this size; 0 never rolls over (size rotation).',
			minimum: 0,
			default: 10485760,
		},
		backupCount: {
			type: 'integer',
			description: 'Keep at most N rotated files; 0 never rolls over (size) or keeps all (time).',
			minimum: 0,
			default: 7,
		},
		when: {
			type: 'string',
			enum: ['s', 'm', 'h', 'd', 'midnight'],
			description: 'Rotation unit (time rotation).',
			default: 'midnight',
		},
		interval: { type: 'integer', description: 'Units per rotation period', minimum: 1, default: 1 },
	},
	additionalProperties: false,
};

export function register(): SinkRegistration<FileSinkOptions> {
	return {
		id: 'file',
		create: (options) => new FileSink(options),
		configSchema: {
			type: 'object',
			required: ['path'],
			properties: {
				path: {
					type: 'string',
					description: 'Log file path; parent directories are created.',
				},
				level: {
					type: 'string',
					description: 'Minimum level written; names are case-insensitive.',
					default: 'debug',
				},
				rotation: ROTATION_SCHEMA,
			},
			additionalProperties: false,
		},
	};
}

export {
	DEFAULT_BACKUP_COUNT,
	DEFAULT_MAX_BYTES,
	DEFAULT_ROTATION,
	FileSink,
	type FileSinkOptions,
} from './file-sink.js';
export {
	ROTATION_WHENS,
	listTimeBackups,
	needsSizeRotation,
	nextRolloverAt,
	periodMs,
	rotateBySize,
	rotateByTime,
	rotationSuffix,
	type RotationPolicy,
	type RotationWhen,
	type SizeRotation,
	type TimeRotation,
} from './rotation.js';
