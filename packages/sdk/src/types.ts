/**
 * Core types for logrelay: levels, records, and extra-field values.
 */

// ─── Levels ───────────────────────────────────────────────────────────────────

/** Log levels, lowest severity first */
export type LogLevel = 'debug' | 'info' | 'warning' | 'error' | 'critical';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warning', 'error', 'critical'];

/** Numeric severity per level */
export const LEVEL_VALUES: Readonly<Record<LogLevel, number>> = {
	debug: 10,
	info: 20,
	warning: 30,
	error: 40,
	critical: 50,
};

// ─── Extra fields ─────────────────────────────────────────────────────────────

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * A value attached to a record under an extra-field key.
 * Scalars keep their own tag; anything structured is carried as JSON.
 */
export type ExtraValue =
	| { kind: 'string'; value: string }
	| { kind: 'number'; value: number }
	| { kind: 'boolean'; value: boolean }
	| { kind: 'null' }
	| { kind: 'json'; value: JsonValue };

/** Ordered extra-field mapping (insertion order is rendering order) */
export type Extras = Map<string, ExtraValue>;

// ─── Records ──────────────────────────────────────────────────────────────────

/** Error context captured from a thrown value */
export interface ErrorContext {
	name: string;
	message: string;
	stack?: string;
}

/**
 * A single log record. Created per log call and handed to every
 * attached sink; filters may mutate it before rendering.
 */
export interface LogRecord {
	/** ISO 8601 creation time */
	timestamp: string;
	level: LogLevel;
	/** Source identifier (logger name) */
	name: string;
	message: string;
	extra: Extras;
	error?: ErrorContext;
}

/** Output format of the pipeline's formatter */
export type LogFormat = 'json' | 'text';

export const LOG_FORMATS: readonly LogFormat[] = ['json', 'text'];
