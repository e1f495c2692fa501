/**
 * @logrelay/sdk: contracts shared by the pipeline, sinks and filters.
 */

export * from './types.js';
export {
	buildRecord,
	extraToJson,
	isLevelEnabled,
	levelName,
	parseLevel,
	toErrorContext,
	toExtraValue,
	toExtras,
	toJsonValue,
	type BuildRecordOptions,
} from './record.js';
export type { Sink, SinkContext, SinkRegistration } from './sink.js';
export type { Filter, FilterRegistration } from './filter.js';
export type { SchemaObject } from 'ajv';
export {
	ConfigFileNotFoundError,
	ConfigurationError,
	DeliveryError,
	InvalidSettingError,
	LogRelayError,
	MissingSettingError,
	UnsupportedFormatError,
	toError,
} from './errors.js';
export {
	closeHttpAgent,
	createFetchWithKeepAlive,
	createHttpAgent,
	type FetchLike,
	type HttpAgent,
	type HttpAgentOptions,
	type HttpRequestInit,
	type HttpResponse,
} from './http.js';
