/**
 * Pipeline assembly and the process-wide active pipeline.
 *
 * assemble() turns a resolved config into a pipeline without touching
 * global state; configure() loads, assembles, initializes and installs,
 * replacing whatever was installed before.
 */

import type { Filter, Sink } from '@logrelay/sdk';
import { loadConfig } from './config/loader.js';
import { checkSettings } from './config/schema.js';
import type { ConfigureOptions, PipelineConfig } from './config/types.js';
import { Pipeline } from './pipeline.js';
import { consoleSinks, fileSinks, httpSinks, redactFilters, validators } from './registry.js';

export interface AssembleOptions {
	/** Sinks added after the configured ones (tests, custom destinations) */
	extraSinks?: Sink[];
	/** Filters added after redaction */
	extraFilters?: Filter[];
}

/**
 * Build the sinks and filters a config describes. Each plugin's options
 * are checked against its configSchema before it is created.
 *
 * @throws ConfigurationError when a sink rejects its settings
 */
export function assemble(config: PipelineConfig, options: AssembleOptions = {}): Pipeline {
	const sinks: Sink[] = [];
	if (config.sinks.console) {
		checkSettings(validators.console, config.sinks.console, 'sinks.console');
		sinks.push(consoleSinks.create(config.sinks.console));
	}
	if (config.sinks.file) {
		checkSettings(validators.file, config.sinks.file, 'sinks.file');
		sinks.push(fileSinks.create(config.sinks.file));
	}
	if (config.sinks.http) {
		checkSettings(validators.http, config.sinks.http, 'sinks.http');
		sinks.push(httpSinks.create(config.sinks.http));
	}
	sinks.push(...(options.extraSinks ?? []));

	const filters: Filter[] = [];
	if (config.redactFields.length > 0) {
		const redact = { fields: config.redactFields };
		checkSettings(validators.redact, redact, 'filters.redact');
		filters.push(redactFilters.create(redact));
	}
	filters.push(...(options.extraFilters ?? []));

	return new Pipeline({ level: config.level, format: config.format, filters, sinks });
}

// ─── Active pipeline ──────────────────────────────────────────────────────────

let active: Pipeline | null = null;

export function getActivePipeline(): Pipeline | null {
	return active;
}

/**
 * Make `pipeline` the active one. Returns the previously active pipeline,
 * which the caller now owns.
 */
export function install(pipeline: Pipeline): Pipeline | null {
	const previous = active;
	active = pipeline;
	return previous;
}

/** Remove the active pipeline and shut it down */
export async function uninstall(): Promise<void> {
	const previous = active;
	active = null;
	await previous?.shutdown();
}

/**
 * Resolve settings, build and initialize a pipeline, and install it.
 * The previous pipeline is shut down only after the new one is ready,
 * so a configuration error leaves it in place.
 *
 * @throws ConfigurationError for missing or invalid settings
 * @throws UnsupportedFormatError for a config file of unknown type
 */
export async function configure(options: ConfigureOptions = {}, assembleOptions?: AssembleOptions): Promise<Pipeline> {
	const pipeline = assemble(loadConfig(options), assembleOptions);
	await pipeline.init();
	const previous = install(pipeline);
	if (previous && previous !== pipeline) {
		await previous.shutdown();
	}
	return pipeline;
}
