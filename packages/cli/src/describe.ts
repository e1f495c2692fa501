/**
 * Presentation helpers for resolved configuration and CLI arguments.
 */

import type { PipelineConfig } from '@logrelay/core';
import { InvalidSettingError, levelName } from '@logrelay/sdk';
import { DEFAULT_BACKOFF_FACTOR, DEFAULT_MAX_RETRIES, DEFAULT_TIMEOUT_SECONDS } from '@logrelay/sink-http';

export interface ConfigRow {
	setting: string;
	value: string;
}

/** Hide all but the last four characters of a credential */
export function maskToken(token: string): string {
	return token.length >= 8 ? `****${token.slice(-4)}` : '****';
}

/** Copy of `config` safe to print */
export function toPublicConfig(config: PipelineConfig): PipelineConfig {
	const { http } = config.sinks;
	if (!http?.token) return config;
	return { ...config, sinks: { ...config.sinks, http: { ...http, token: maskToken(http.token) } } };
}

/** One row per setting and configured sink */
export function describeConfig(config: PipelineConfig): ConfigRow[] {
	const rows: ConfigRow[] = [
		{ setting: 'env', value: config.env },
		{ setting: 'level', value: levelName(config.level) },
		{ setting: 'format', value: config.format },
		{ setting: 'redact', value: config.redactFields.length > 0 ? config.redactFields.join(', ') : '(none)' },
	];

	const { console: consoleSink, file, http } = config.sinks;
	if (consoleSink) {
		const color = consoleSink.color ? ', color' : '';
		rows.push({
			setting: 'sink console',
			value: `${consoleSink.stream ?? 'stdout'}${color} (min ${levelName(consoleSink.level ?? 'debug')})`,
		});
	}
	if (file) {
		const rotation = file.rotation;
		let policy = 'default rotation';
		if (rotation?.type === 'size') {
			policy = `rotate at ${rotation.maxBytes} bytes, keep ${rotation.backupCount}`;
		} else if (rotation?.type === 'time') {
			policy = `rotate every ${rotation.interval} ${rotation.when}, keep ${rotation.backupCount}`;
		}
		rows.push({ setting: 'sink file', value: `${file.path} (${policy})` });
	}
	if (http) {
		const parts = [
			`timeout ${http.timeout ?? DEFAULT_TIMEOUT_SECONDS}s`,
			`retries ${http.maxRetries ?? DEFAULT_MAX_RETRIES}`,
			`backoff ${http.backoffFactor ?? DEFAULT_BACKOFF_FACTOR}`,
		];
		if (http.token) parts.push(`token ${maskToken(http.token)}`);
		rows.push({ setting: 'sink http', value: `${http.url} (${parts.join(', ')})` });
	}
	return rows;
}

/** Parse repeated `key=value` arguments; the first `=` separates */
export function parseExtraPairs(pairs: readonly string[]): Record<string, string> {
	const extra: Record<string, string> = {};
	for (const pair of pairs) {
		const index = pair.indexOf('=');
		if (index <= 0) {
			throw new InvalidSettingError('--extra', pair, 'expected key=value');
		}
		extra[pair.slice(0, index).trim()] = pair.slice(index + 1);
	}
	return extra;
}
