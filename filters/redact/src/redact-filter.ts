/**
 * Redaction filter: replaces sensitive fields before any sink renders them.
 *
 * A field name matches the record's `message`, `name`, `timestamp` or
 * `error` attribute, or a key of its extras. The level cannot be redacted. With `deep` on, keys inside structured extras are
 * matched at any depth. Applying the filter twice changes nothing.
 */

import type { ExtraValue, Filter, JsonValue, LogRecord } from '@logrelay/sdk';

export const REDACTED = '[REDACTED]';

export interface RedactOptions {
	/** Field names to redact */
	fields: Iterable<string>;
	/** Placeholder (default: [REDACTED]) */
	replacement?: string;
	/** Redact matching keys inside structured extras (default: true) */
	deep?: boolean;
}

/** Resolved redaction rule */
export interface RedactionRule {
	fields: ReadonlySet<string>;
	replacement: string;
	deep: boolean;
}

export function createRule(options: RedactOptions): RedactionRule {
	return {
		fields: new Set([...options.fields].map((field) => field.trim()).filter(Boolean)),
		replacement: options.replacement ?? REDACTED,
		deep: options.deep ?? true,
	};
}

/** Copy of `value` with every matching key replaced, at any depth */
export function redactJson(value: JsonValue, rule: RedactionRule): JsonValue {
	if (Array.isArray(value)) {
		return value.map((item) => redactJson(item, rule));
	}
	if (value === null || typeof value !== 'object') {
		return value;
	}
	const result: { [key: string]: JsonValue } = {};
	for (const [key, item] of Object.entries(value)) {
		result[key] = rule.fields.has(key) ? rule.replacement : redactJson(item, rule);
	}
	return result;
}

/** Redact a record in place */
export function redactRecord(record: LogRecord, rule: RedactionRule): void {
	if (rule.fields.has('message')) record.message = rule.replacement;
	if (rule.fields.has('name')) record.name = rule.replacement;
	if (rule.fields.has('timestamp')) record.timestamp = rule.replacement;
	// The stack repeats the message, so it goes too
	if (rule.fields.has('error') && record.error) {
		record.error = { name: rule.replacement, message: rule.replacement };
	}

	for (const [key, extra] of record.extra) {
		if (rule.fields.has(key)) {
			record.extra.set(key, { kind: 'string', value: rule.replacement });
		} else if (rule.deep && extra.kind === 'json') {
			const redacted: ExtraValue = { kind: 'json', value: redactJson(extra.value, rule) };
			record.extra.set(key, redacted);
		}
	}
}

export class RedactFilter implements Filter {
	readonly id = 'redact';
	readonly rule: RedactionRule;

	constructor(options: RedactOptions) {
		this.rule = createRule(options);
	}

	apply(record: LogRecord): boolean {
		if (this.rule.fields.size > 0) {
			redactRecord(record, this.rule);
		}
		return true;
	}
}
