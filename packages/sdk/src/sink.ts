/**
 * Sink interface: destinations that receive rendered log records.
 *
 * The pipeline filters and renders each record once, then hands the
 * record and its rendered text to every sink whose level admits it.
 */

import type { SchemaObject } from 'ajv';
import type { LogLevel, LogRecord } from './types.js';

/** Services the pipeline provides to a sink */
export interface SinkContext {
	/**
	 * Report a failure that must not reach the emitting code.
	 * Listeners on the pipeline's `sink_error` event receive it.
	 */
	reportError(error: Error, record?: LogRecord): void;
}

/**
 * Sink interface.
 *
 * Implement this to create a new log destination.
 * Sinks are called for every admitted record: they must not block.
 */
export interface Sink {
	/** Unique sink ID */
	readonly id: string;

	/** Minimum level this sink accepts */
	readonly level: LogLevel;

	/** Attach to a pipeline */
	init(context: SinkContext): Promise<void>;

	/**
	 * Called for every admitted record.
	 * Should not throw: delivery errors go through SinkContext.reportError.
	 */
	write(record: LogRecord, rendered: string): Promise<void>;

	/** Wait for buffered or in-flight records */
	flush(): Promise<void>;

	/** Clean shutdown (flush + close). Safe to call more than once. */
	shutdown(): Promise<void>;
}

/**
 * Sink registration: what a sink package exports.
 */
export interface SinkRegistration<TOptions> {
	/** Unique sink ID */
	id: string;
	/** Build a sink from resolved options */
	create(options: TOptions): Sink;
	/** JSON Schema the options are validated against before create() */
	configSchema?: SchemaObject;
}
