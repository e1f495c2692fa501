/**
 * Validation of structured configuration (objects and parsed files).
 *
 * The top level is checked against CONFIG_SCHEMA, each sink entry
 * against its registration's configSchema. Errors name the offending
 * setting by its dotted path, e.g. `sinks.http.timeout`.
 */

import {
	type LogFormat,
	type LogLevel,
	type SchemaObject,
	InvalidSettingError,
	LOG_FORMATS,
	LOG_LEVELS,
	MissingSettingError,
	levelName,
	parseLevel,
} from '@logrelay/sdk';
import { DEFAULT_BACKUP_COUNT, DEFAULT_MAX_BYTES, type RotationPolicy } from '@logrelay/sink-file';
import { parseDestination } from '@logrelay/sink-http';
import { validators } from '../registry.js';
import { checkSettings, compileSettings, isMapping, withoutNulls } from './schema.js';
import type {
	ConsoleSinkConfig,
	FileSinkConfig,
	HttpSinkConfig,
	PipelineConfig,
	RotationSettings,
	SinksConfig,
} from './types.js';

export const DEFAULT_ENV = 'production';
export const DEFAULT_LEVEL: LogLevel = 'info';
export const DEFAULT_FORMAT: LogFormat = 'json';

interface RawSinks {
	console?: unknown;
	file?: unknown;
	http?: unknown;
}

interface RawConfig {
	env?: string;
	level?: string;
	format?: string;
	redactFields?: string | string[];
	sinks?: RawSinks;
}

// Level and format names are matched case-insensitively after validation
const CONFIG_SCHEMA: SchemaObject = {
	type: 'object',
	properties: {
		env: { type: 'string', description: 'Deployment label.' },
		level: { type: 'string', description: 'Root minimum level.' },
		format: { type: 'string', description: 'json or text.' },
		redactFields: {
			type: ['string', 'array'],
			items: { type: 'string' },
			description: 'Field names to redact, as a list or a comma-separated string.',
		},
		sinks: {
			type: 'object',
			properties: { console: {}, file: {}, http: {} },
			additionalProperties: false,
		},
	},
	additionalProperties: false,
};

const validateConfig = compileSettings<RawConfig>(CONFIG_SCHEMA);

// ─── Value checks ─────────────────────────────────────────────────────────────

/** Match a string against a fixed set of choices */
export function pickChoice<T extends string>(setting: string, raw: string, choices: readonly T[]): T {
	const wanted = raw.trim().toLowerCase();
	const match = choices.find((choice) => choice === wanted);
	if (match === undefined) {
		throw new InvalidSettingError(setting, raw, `expected one of ${choices.join(', ')}`);
	}
	return match;
}

/** Parse a level name, naming the setting on failure */
export function requireLevel(setting: string, raw: string): LogLevel {
	const level = parseLevel(raw);
	if (level === undefined) {
		throw new InvalidSettingError(setting, raw, `expected one of ${LOG_LEVELS.map(levelName).join(', ')}`);
	}
	return level;
}

function optionalLevel(setting: string, raw: string | undefined): LogLevel | undefined {
	return raw === undefined ? undefined : requireLevel(setting, raw);
}

function fieldList(value: string | string[] | undefined): string[] {
	if (value === undefined) return [];
	if (typeof value === 'string') {
		return value
			.split(',')
			.map((item) => item.trim())
			.filter(Boolean);
	}
	return value.map((item) => item.trim());
}

/** Top-level keys set to null count as unset */
function presentEntries(raw: unknown): unknown {
	if (!isMapping(raw)) return raw;
	return Object.fromEntries(Object.entries(raw).filter(([, value]) => value !== null));
}

// ─── Sinks ────────────────────────────────────────────────────────────────────

/** Fill the defaults of a validated rotation policy */
export function toRotationPolicy(settings: RotationSettings): RotationPolicy {
	const backupCount = settings.backupCount ?? DEFAULT_BACKUP_COUNT;
	if ((settings.type ?? 'size') === 'size') {
		return { type: 'size', maxBytes: settings.maxBytes ?? DEFAULT_MAX_BYTES, backupCount };
	}
	return { type: 'time', when: settings.when ?? 'midnight', interval: settings.interval ?? 1, backupCount };
}

function parseConsole(value: unknown): ConsoleSinkConfig {
	if (value === null || value === true) return {};
	const settings = checkSettings(validators.console, withoutNulls(value), 'sinks.console');
	return {
		level: optionalLevel('sinks.console.level', settings.level),
		stream: settings.stream,
		color: settings.color,
	};
}

function parseFile(value: unknown): FileSinkConfig {
	const settings = checkSettings(validators.file, withoutNulls(value), 'sinks.file');
	if (!settings.path.trim()) {
		throw new MissingSettingError('sinks.file.path');
	}
	return {
		path: settings.path,
		level: optionalLevel('sinks.file.level', settings.level),
		rotation: settings.rotation === undefined ? undefined : toRotationPolicy(settings.rotation),
	};
}

function parseHttp(value: unknown): HttpSinkConfig {
	const settings = checkSettings(validators.http, withoutNulls(value), 'sinks.http');
	if (!settings.url.trim()) {
		throw new MissingSettingError('sinks.http.url');
	}
	parseDestination(settings.url);
	return {
		url: settings.url,
		token: settings.token,
		timeout: settings.timeout,
		maxRetries: settings.maxRetries,
		backoffFactor: settings.backoffFactor,
		level: optionalLevel('sinks.http.level', settings.level),
	};
}

function parseSinks(raw: RawSinks): SinksConfig {
	const sinks: SinksConfig = {};
	if (raw.console !== undefined && raw.console !== false) {
		sinks.console = parseConsole(raw.console);
	}
	if (raw.file !== undefined) {
		sinks.file = parseFile(raw.file);
	}
	if (raw.http !== undefined) {
		sinks.http = parseHttp(raw.http);
	}
	return sinks;
}

// ─── Root ─────────────────────────────────────────────────────────────────────

export interface ParseOptions {
	/** Require `level` to be present */
	strict?: boolean;
}

/**
 * Validate a structured configuration object.
 *
 * Without `sinks`, only the console sink is configured. A console entry
 * of `null` or `true` takes the defaults; `false` leaves it out.
 *
 * @throws MissingSettingError for absent required settings
 * @throws InvalidSettingError naming the first offending setting
 */
export function parseConfigObject(raw: unknown, options: ParseOptions = {}): PipelineConfig {
	const config = checkSettings(validateConfig, presentEntries(raw), '');

	const level = optionalLevel('level', config.level);
	if (level === undefined && options.strict) {
		throw new MissingSettingError('level');
	}

	return {
		env: config.env ?? DEFAULT_ENV,
		level: level ?? DEFAULT_LEVEL,
		format: config.format === undefined ? DEFAULT_FORMAT : pickChoice('format', config.format, LOG_FORMATS),
		redactFields: fieldList(config.redactFields),
		sinks: config.sinks === undefined ? { console: {} } : parseSinks(config.sinks),
	};
}
