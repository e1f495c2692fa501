/**
 * Built-in sink and filter registrations, with their settings validators.
 */

import { type RedactOptions, register as registerRedact } from '@logrelay/filter-redact';
import { register as registerConsole } from '@logrelay/sink-console';
import { ROTATION_SCHEMA, register as registerFile } from '@logrelay/sink-file';
import { register as registerHttp } from '@logrelay/sink-http';
import { compileSettings, settingsValidator } from './config/schema.js';
import type { ConsoleSinkSettings, FileSinkSettings, HttpSinkSettings, RotationSettings } from './config/types.js';

export const consoleSinks = registerConsole();
export const fileSinks = registerFile();
export const httpSinks = registerHttp();
export const redactFilters = registerRedact();

/** Schema validators; each names the setting path of the first problem */
export const validators = {
	console: settingsValidator<ConsoleSinkSettings>(consoleSinks),
	file: settingsValidator<FileSinkSettings>(fileSinks),
	http: settingsValidator<HttpSinkSettings>(httpSinks),
	redact: settingsValidator<RedactOptions>(redactFilters),
	rotation: compileSettings<RotationSettings>(ROTATION_SCHEMA),
};

/** IDs of the sinks and filters assemble() can build */
export function builtinPlugins(): { sinks: string[]; filters: string[] } {
	return {
		sinks: [consoleSinks.id, fileSinks.id, httpSinks.id],
		filters: [redactFilters.id],
	};
}
