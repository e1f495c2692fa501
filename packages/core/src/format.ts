/**
 * Record formatters. The pipeline renders each record once and hands the
 * same text to every sink.
 */

import type { ExtraValue, JsonValue, LogFormat, LogRecord } from '@logrelay/sdk';
import { extraToJson, levelName } from '@logrelay/sdk';

export type Formatter = (record: LogRecord) => string;

/** Top-level JSON fields that extras may not overwrite */
export const RESERVED_FIELDS: ReadonlySet<string> = new Set(['timestamp', 'level', 'name', 'message', 'error']);

const NEEDS_QUOTES = /[\s"=]/;

function textValue(extra: ExtraValue): string {
	switch (extra.kind) {
		case 'string':
			return extra.value === '' || NEEDS_QUOTES.test(extra.value) ? JSON.stringify(extra.value) : extra.value;
		case 'number':
		case 'boolean':
			return String(extra.value);
		case 'null':
			return 'null';
		case 'json':
			return JSON.stringify(extra.value);
	}
}

/**
 * `<timestamp> <LEVEL> <name> <message> key=value …`, followed by the
 * error stack (or `Name: message`) on the next lines.
 */
export function formatText(record: LogRecord): string {
	let line = `${record.timestamp} ${levelName(record.level)} ${record.name} ${record.message}`;
	for (const [key, extra] of record.extra) {
		line += ` ${key}=${textValue(extra)}`;
	}
	if (record.error) {
		line += `\n${record.error.stack ?? `${record.error.name}: ${record.error.message}`}`;
	}
	return line;
}

/**
 * One JSON object per record. Extras are flattened in order; an extra
 * whose key is a reserved field is written as `extra_<key>`.
 */
export function formatJson(record: LogRecord): string {
	const output: { [key: string]: JsonValue } = {
		timestamp: record.timestamp,
		level: levelName(record.level),
		name: record.name,
		message: record.message,
	};
	for (const [key, extra] of record.extra) {
		output[RESERVED_FIELDS.has(key) ? `extra_${key}` : key] = extraToJson(extra);
	}
	if (record.error) {
		const error: { [key: string]: JsonValue } = { name: record.error.name, message: record.error.message };
		if (record.error.stack !== undefined) error.stack = record.error.stack;
		output.error = error;
	}
	return JSON.stringify(output);
}

export function createFormatter(format: LogFormat): Formatter {
	return format === 'text' ? formatText : formatJson;
}
