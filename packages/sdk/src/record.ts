/**
 * Record builder and level helpers.
 */

import type { ErrorContext, ExtraValue, Extras, JsonValue, LogLevel, LogRecord } from './types.js';
import { LEVEL_VALUES, LOG_LEVELS } from './types.js';

// ─── Levels ───────────────────────────────────────────────────────────────────

const LEVEL_ALIASES: Record<string, LogLevel> = {
	warn: 'warning',
	fatal: 'critical',
};

/**
 * Parse a level name case-insensitively.
 * Returns undefined for unknown names.
 */
export function parseLevel(raw: string): LogLevel | undefined {
	const name = raw.trim().toLowerCase();
	const level = LOG_LEVELS.find((l) => l === name);
	return level ?? LEVEL_ALIASES[name];
}

/** Whether a record at `level` passes a `threshold` */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
	return LEVEL_VALUES[level] >= LEVEL_VALUES[threshold];
}

/** Upper-case display name (`WARNING`, `INFO`, ...) */
export function levelName(level: LogLevel): string {
	return level.toUpperCase();
}

// ─── Extra values ─────────────────────────────────────────────────────────────

/**
 * Convert an arbitrary value to JSON.
 * Functions and symbols are dropped, cycles become "[Circular]".
 */
export function toJsonValue(value: unknown, seen: Set<object> = new Set()): JsonValue {
	if (value === null || value === undefined) return null;
	if (typeof value === 'string' || typeof value === 'boolean') return value;
	if (typeof value === 'number') return Number.isFinite(value) ? value : String(value);
	if (typeof value === 'bigint') return value.toString();
	if (typeof value !== 'object') return null;
	if (value instanceof Date) return value.toISOString();
	if (value instanceof Error) return { name: value.name, message: value.message };
	if (seen.has(value)) return '[Circular]';

	seen.add(value);
	try {
		if (Array.isArray(value)) {
			return value.map((item) => toJsonValue(item, seen));
		}
		const result: { [key: string]: JsonValue } = {};
		for (const [key, item] of Object.entries(value)) {
			if (typeof item === 'function' || typeof item === 'symbol' || item === undefined) continue;
			result[key] = toJsonValue(item, seen);
		}
		return result;
	} finally {
		seen.delete(value);
	}
}

/** Tag a value for storage in a record's extra mapping */
export function toExtraValue(value: unknown): ExtraValue {
	if (value === null || value === undefined) return { kind: 'null' };
	if (typeof value === 'string') return { kind: 'string', value };
	if (typeof value === 'boolean') return { kind: 'boolean', value };
	if (typeof value === 'number' && Number.isFinite(value)) return { kind: 'number', value };
	const json = toJsonValue(value);
	if (typeof json === 'string') return { kind: 'string', value: json };
	return { kind: 'json', value: json };
}

/** Unwrap an extra value back to plain JSON */
export function extraToJson(extra: ExtraValue): JsonValue {
	return extra.kind === 'null' ? null : extra.value;
}

/** Build an ordered extra mapping from a plain object */
export function toExtras(fields: Record<string, unknown> | undefined): Extras {
	const extras: Extras = new Map();
	if (!fields) return extras;
	for (const [key, value] of Object.entries(fields)) {
		extras.set(key, toExtraValue(value));
	}
	return extras;
}

/** Capture name, message and stack from a thrown value */
export function toErrorContext(err: unknown): ErrorContext {
	if (err instanceof Error) {
		return { name: err.name, message: err.message, stack: err.stack };
	}
	return { name: 'Error', message: String(err) };
}

// ─── Builder ──────────────────────────────────────────────────────────────────

/** Options for building a record */
export interface BuildRecordOptions {
	level: LogLevel;
	message: string;
	name?: string;
	extra?: Record<string, unknown> | Extras;
	error?: unknown;
	timestamp?: string;
}

/**
 * Build a well-formed record.
 * Fills in defaults for name and timestamp.
 */
export function buildRecord(options: BuildRecordOptions): LogRecord {
	const extra = options.extra instanceof Map ? new Map(options.extra) : toExtras(options.extra);
	const record: LogRecord = {
		timestamp: options.timestamp ?? new Date().toISOString(),
		level: options.level,
		name: options.name ?? 'root',
		message: options.message,
		extra,
	};
	if (options.error !== undefined) {
		record.error = toErrorContext(options.error);
	}
	return record;
}
