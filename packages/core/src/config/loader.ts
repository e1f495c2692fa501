/**
 * Config loader: resolves a PipelineConfig from the highest-precedence
 * source available:
 *
 *   1. a structured object (`config`)
 *   2. a JSON or YAML file (`configFile`)
 *   3. discrete settings, each falling back to its LOG_* variable,
 *      then to its default
 */

import { existsSync, readFileSync } from 'node:fs';
import { extname } from 'node:path';
import yaml from 'js-yaml';
import {
	ConfigFileNotFoundError,
	ConfigurationError,
	LOG_FORMATS,
	type LogFormat,
	type LogLevel,
	MissingSettingError,
	UnsupportedFormatError,
	toError,
} from '@logrelay/sdk';
import {
	DEFAULT_BACKUP_COUNT,
	DEFAULT_MAX_BYTES,
	ROTATION_WHENS,
	type RotationPolicy,
} from '@logrelay/sink-file';
import {
	DEFAULT_BACKOFF_FACTOR,
	DEFAULT_MAX_RETRIES,
	DEFAULT_TIMEOUT_SECONDS,
	parseDestination,
} from '@logrelay/sink-http';
import { getEnvVar, readEnv, splitList } from './env.js';
import { validators } from '../registry.js';
import { DEFAULT_ENV, parseConfigObject, pickChoice, requireLevel } from './parse.js';
import { checkSettings } from './schema.js';
import {
	type ConfigureOptions,
	type EnvSource,
	type HttpSinkConfig,
	type PipelineConfig,
	SINK_NAMES,
	type SinkName,
	type SinksConfig,
} from './types.js';

const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);
const ROTATION_TYPES = ['size', 'time'] as const;

// ─── Files ────────────────────────────────────────────────────────────────────

/**
 * Read a configuration file. The extension decides the parser and is
 * checked before the file is looked up.
 *
 * @throws UnsupportedFormatError for anything but .json, .yaml or .yml
 * @throws ConfigFileNotFoundError when the file does not exist
 * @throws ConfigurationError when the content does not parse
 */
export function loadConfigFile(path: string): unknown {
	const ext = extname(path).toLowerCase();
	const isYaml = YAML_EXTENSIONS.has(ext);
	if (!isYaml && ext !== '.json') {
		throw new UnsupportedFormatError(path);
	}
	if (!existsSync(path)) {
		throw new ConfigFileNotFoundError(path);
	}

	const content = readFileSync(path, 'utf-8');
	try {
		return isYaml ? yaml.load(content) : JSON.parse(content);
	} catch (err) {
		throw new ConfigurationError(`Could not parse config file ${path}: ${toError(err).message}`, {
			cause: err,
		});
	}
}

// ─── Discrete settings ────────────────────────────────────────────────────────

function resolveLevel(options: ConfigureOptions, env: EnvSource): LogLevel {
	if (options.level !== undefined) {
		return requireLevel('level', options.level);
	}
	const raw = readEnv('LOG_LEVEL', env);
	if (raw === undefined) {
		if (options.strict) throw new MissingSettingError('LOG_LEVEL');
		return 'info';
	}
	return requireLevel('LOG_LEVEL', raw);
}

function resolveFormat(options: ConfigureOptions, env: EnvSource): LogFormat {
	if (options.format !== undefined) {
		return pickChoice('format', options.format, LOG_FORMATS);
	}
	return envChoice('LOG_FORMAT', 'json', LOG_FORMATS, env);
}

function envChoice<T extends string>(name: string, fallback: T, choices: readonly T[], env: EnvSource): T {
	const raw = readEnv(name, env);
	return raw === undefined ? fallback : pickChoice(name, raw, choices);
}

function resolveRotation(options: ConfigureOptions, env: EnvSource): RotationPolicy {
	const given = options.rotation ?? {};
	const type = given.type ?? envChoice('LOG_ROTATION_TYPE', 'size', ROTATION_TYPES, env);
	const backupCount =
		given.backupCount ?? getEnvVar('LOG_ROTATION_BACKUP_COUNT', 'int', { default: DEFAULT_BACKUP_COUNT, env });

	const policy: RotationPolicy =
		type === 'size'
			? {
					type,
					maxBytes:
						given.maxBytes ?? getEnvVar('LOG_ROTATION_MAX_BYTES', 'int', { default: DEFAULT_MAX_BYTES, env }),
					backupCount,
				}
			: {
					type,
					when: given.when ?? envChoice('LOG_ROTATION_WHEN', 'midnight', ROTATION_WHENS, env),
					interval: given.interval ?? getEnvVar('LOG_ROTATION_INTERVAL', 'int', { default: 1, env }),
					backupCount,
				};
	checkSettings(validators.rotation, policy, 'rotation');
	return policy;
}

function resolveHttp(options: ConfigureOptions, env: EnvSource, url: string): HttpSinkConfig {
	parseDestination(url);
	const given = options.http ?? {};
	const config: HttpSinkConfig = {
		url,
		token: given.token ?? readEnv('LOG_HTTP_TOKEN', env),
		timeout: given.timeout ?? getEnvVar('LOG_HTTP_TIMEOUT', 'float', { default: DEFAULT_TIMEOUT_SECONDS, env }),
		maxRetries:
			given.maxRetries ?? getEnvVar('LOG_HTTP_MAX_RETRIES', 'int', { default: DEFAULT_MAX_RETRIES, env }),
		backoffFactor:
			given.backoffFactor ?? getEnvVar('LOG_HTTP_BACKOFF_FACTOR', 'float', { default: DEFAULT_BACKOFF_FACTOR, env }),
	};
	checkSettings(validators.http, config, 'http');
	return config;
}

function resolveSelection(options: ConfigureOptions, env: EnvSource): SinkName[] | undefined {
	if (options.sinks !== undefined) {
		return options.sinks.map((name) => pickChoice('sinks', name, SINK_NAMES));
	}
	const raw = readEnv('LOG_SINKS', env);
	return raw === undefined ? undefined : splitList(raw).map((name) => pickChoice('LOG_SINKS', name, SINK_NAMES));
}

function defaultSelection(logFile: string | undefined, url: string | undefined): SinkName[] {
	const names: SinkName[] = ['console'];
	if (logFile) names.push('file');
	if (url) names.push('http');
	return names;
}

/**
 * Resolve discrete settings. Console is always available; file and
 * remote sinks join when a path or URL is configured. An explicit sink
 * selection narrows the set, and selecting a sink without its required
 * setting is an error.
 */
export function resolveDiscrete(options: ConfigureOptions, env: EnvSource = process.env): PipelineConfig {
	const level = resolveLevel(options, env);
	const format = resolveFormat(options, env);
	const logFile = options.logFile ?? readEnv('LOG_FILE', env);
	const url = options.http?.url ?? readEnv('LOG_HTTP_URL', env);
	const redactFields = options.redactFields ?? splitList(readEnv('LOG_REDACT_FIELDS', env) ?? '');

	const selected = resolveSelection(options, env) ?? defaultSelection(logFile, url);

	const sinks: SinksConfig = {};
	if (selected.includes('console')) {
		sinks.console = {};
	}
	if (selected.includes('file')) {
		if (!logFile) throw new MissingSettingError('LOG_FILE');
		sinks.file = { path: logFile, rotation: resolveRotation(options, env) };
	}
	if (selected.includes('http')) {
		if (!url) throw new MissingSettingError('LOG_HTTP_URL');
		sinks.http = resolveHttp(options, env, url);
	}

	return {
		env: options.env ?? getEnvVar('LOG_ENV', 'string', { default: DEFAULT_ENV, env }),
		level,
		format,
		redactFields,
		sinks,
	};
}

// ─── Entry point ──────────────────────────────────────────────────────────────

/**
 * Resolve the pipeline configuration.
 *
 * @throws ConfigurationError (or a subclass) for missing or invalid settings
 * @throws UnsupportedFormatError for a config file of unknown type
 */
export function loadConfig(options: ConfigureOptions = {}): PipelineConfig {
	const strict = options.strict ?? false;
	if (options.config !== undefined) {
		return parseConfigObject(options.config, { strict });
	}
	if (options.configFile !== undefined) {
		return parseConfigObject(loadConfigFile(options.configFile), { strict });
	}
	return resolveDiscrete(options, options.environment ?? process.env);
}
