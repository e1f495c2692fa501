/**
 * Resolved pipeline configuration and configure() inputs.
 */

import type { LogFormat, LogLevel } from '@logrelay/sdk';
import type { ConsoleStream } from '@logrelay/sink-console';
import type { RotationPolicy, RotationWhen } from '@logrelay/sink-file';

// ─── Resolved ─────────────────────────────────────────────────────────────────

export type SinkName = 'console' | 'file' | 'http';

export const SINK_NAMES: readonly SinkName[] = ['console', 'file', 'http'];

export interface ConsoleSinkConfig {
	level?: LogLevel;
	stream?: ConsoleStream;
	color?: boolean;
}

export interface FileSinkConfig {
	path: string;
	level?: LogLevel;
	rotation?: RotationPolicy;
}

export interface HttpSinkConfig {
	url: string;
	token?: string;
	/** Seconds per attempt */
	timeout?: number;
	maxRetries?: number;
	backoffFactor?: number;
	level?: LogLevel;
}

export interface SinksConfig {
	console?: ConsoleSinkConfig;
	file?: FileSinkConfig;
	http?: HttpSinkConfig;
}

/**
 * Everything needed to build a pipeline. Built once per configuration
 * call and never mutated afterwards.
 */
export interface PipelineConfig {
	/** Deployment label */
	env: string;
	/** Root minimum level */
	level: LogLevel;
	format: LogFormat;
	redactFields: string[];
	sinks: SinksConfig;
}

// ─── Inputs ───────────────────────────────────────────────────────────────────

/** Rotation given as discrete settings; unset parts come from the environment */
export interface RotationSettings {
	type?: 'size' | 'time';
	maxBytes?: number;
	backupCount?: number;
	when?: RotationWhen;
	interval?: number;
}

export interface HttpSettings {
	url?: string;
	token?: string;
	timeout?: number;
	maxRetries?: number;
	backoffFactor?: number;
}

// ─── Structured settings ──────────────────────────────────────────────────────

/** Sink settings as written in a config object or file; levels are still names */
export interface ConsoleSinkSettings {
	level?: string;
	stream?: ConsoleStream;
	color?: boolean;
}

export interface FileSinkSettings {
	path: string;
	level?: string;
	rotation?: RotationSettings;
}

export interface HttpSinkSettings extends HttpSettings {
	url: string;
	level?: string;
}

/** Variables consulted for discrete settings */
export type EnvSource = Readonly<Record<string, string | undefined>>;

export interface ConfigureOptions {
	/** Structured configuration; wins over every other source */
	config?: Record<string, unknown>;
	/** JSON or YAML configuration file; wins over discrete settings */
	configFile?: string;

	// Discrete settings, each falling back to its LOG_* variable
	env?: string;
	level?: LogLevel | string;
	format?: LogFormat | string;
	logFile?: string;
	rotation?: RotationSettings;
	redactFields?: string[];
	sinks?: SinkName[];
	http?: HttpSettings;

	/** Require the level to be set explicitly (default: false) */
	strict?: boolean;
	/** Variable source (default: process.env) */
	environment?: EnvSource;
}
