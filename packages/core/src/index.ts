/**
 * @logrelay/core: configuration, pipeline and logger facade.
 *
 * Library-first API:
 *   await configure({ level: 'info', logFile: 'app.log' });
 *   getLogger('app').info('started', { port: 8080 });
 *   await uninstall();
 */

export {
	assemble,
	configure,
	getActivePipeline,
	install,
	uninstall,
	type AssembleOptions,
} from './assemble.js';
export { coerce, getEnvVar, readEnv, splitList, type EnvVarOptions, type EnvVarType, type EnvVarTypes } from './config/env.js';
export { loadConfig, loadConfigFile, resolveDiscrete } from './config/loader.js';
export {
	DEFAULT_ENV,
	DEFAULT_FORMAT,
	DEFAULT_LEVEL,
	parseConfigObject,
	toRotationPolicy,
	type ParseOptions,
} from './config/parse.js';
export { checkSettings, compileSettings, settingsValidator, toSettingError } from './config/schema.js';
export {
	SINK_NAMES,
	type ConfigureOptions,
	type ConsoleSinkConfig,
	type ConsoleSinkSettings,
	type EnvSource,
	type FileSinkConfig,
	type FileSinkSettings,
	type HttpSettings,
	type HttpSinkConfig,
	type HttpSinkSettings,
	type PipelineConfig,
	type RotationSettings,
	type SinkName,
	type SinksConfig,
} from './config/types.js';
export { builtinPlugins } from './registry.js';
export { RESERVED_FIELDS, createFormatter, formatJson, formatText, type Formatter } from './format.js';
export { Logger, getLogger, type LogFields } from './logger.js';
export {
	Pipeline,
	type FilterErrorEvent,
	type PipelineEvents,
	type PipelineOptions,
	type SinkErrorEvent,
} from './pipeline.js';
