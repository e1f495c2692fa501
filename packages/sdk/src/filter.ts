/**
 * Filter interface: pre-sink gates applied once per record.
 *
 * Filters run before rendering, so every sink sees the same
 * (possibly modified) record.
 */

import type { SchemaObject } from 'ajv';
import type { LogRecord } from './types.js';

export interface Filter {
	/** Unique filter ID */
	readonly id: string;

	/**
	 * Inspect or modify a record in place.
	 * Return false to drop the record for every sink.
	 */
	apply(record: LogRecord): boolean;
}

/**
 * Filter registration: what a filter package exports.
 */
export interface FilterRegistration<TOptions> {
	/** Unique filter ID */
	id: string;
	create(options: TOptions): Filter;
	/** JSON Schema the options are validated against before create() */
	configSchema?: SchemaObject;
}
