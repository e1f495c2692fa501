/**
 * JSON Schema validation of settings, shared by the config parser,
 * the discrete resolver and assemble().
 *
 * Schemas come from the plugin registrations (`configSchema`); ajv
 * errors are turned into MissingSettingError / InvalidSettingError
 * naming the dotted setting path, e.g. `sinks.http.timeout`.
 */

import AjvModule from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import { InvalidSettingError, MissingSettingError } from '@logrelay/sdk';

const Ajv = AjvModule.default;

// verbose: errors carry the offending data and the schema that rejected it
const ajv = new Ajv({ allErrors: true, allowUnionTypes: true, verbose: true });

type Mapping = Record<string, unknown>;

export function isMapping(value: unknown): value is Mapping {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ─── Compilation ──────────────────────────────────────────────────────────────

export function compileSettings<T>(schema: SchemaObject): ValidateFunction<T> {
	return ajv.compile<T>(schema);
}

/** Validator for a sink or filter registration; no schema accepts anything */
export function settingsValidator<T>(registration: { configSchema?: SchemaObject }): ValidateFunction<T> {
	return compileSettings<T>(registration.configSchema ?? {});
}

// ─── Errors ───────────────────────────────────────────────────────────────────

const TYPE_NAMES: Record<string, string> = {
	object: 'a mapping',
	array: 'a list',
	integer: 'an integer',
	number: 'a number',
	string: 'a string',
	boolean: 'a boolean',
	null: 'null',
};

function child(path: string, key: string): string {
	if (/^\d+$/.test(key)) return `${path}[${key}]`;
	return path ? `${path}.${key}` : key;
}

/** `/rotation/interval` under `sinks.file` is `sinks.file.rotation.interval` */
function settingPath(prefix: string, instancePath: string): string {
	return instancePath
		.split('/')
		.slice(1)
		.map((segment) => segment.replace(/~1/g, '/').replace(/~0/g, '~'))
		.reduce(child, prefix);
}

function named(path: string): string {
	return path || 'config';
}

function describeTypes(types: unknown): string {
	const list = Array.isArray(types) ? types : [types];
	return list.map((type) => TYPE_NAMES[String(type)] ?? String(type)).join(' or ');
}

function numberKind(parentSchema: unknown): string {
	return isMapping(parentSchema) && parentSchema.type === 'integer' ? 'an integer' : 'a number';
}

/** Turn one ajv error into the setting error it stands for */
export function toSettingError(error: ErrorObject, prefix: string): Error {
	const path = settingPath(prefix, error.instancePath);
	const setting = named(path);
	const params: Mapping = error.params;

	switch (error.keyword) {
		case 'required':
			return new MissingSettingError(child(path, String(params.missingProperty)));
		case 'additionalProperties': {
			const key = String(params.additionalProperty);
			const value = isMapping(error.data) ? error.data[key] : undefined;
			return new InvalidSettingError(child(path, key), value, 'unknown setting');
		}
		case 'type':
			return new InvalidSettingError(setting, error.data, `expected ${describeTypes(params.type)}`);
		case 'enum': {
			const allowed = Array.isArray(params.allowedValues) ? params.allowedValues : [];
			return new InvalidSettingError(setting, error.data, `expected one of ${allowed.map(String).join(', ')}`);
		}
		case 'minimum':
			return new InvalidSettingError(
				setting,
				error.data,
				`expected ${numberKind(error.parentSchema)} >= ${String(params.limit)}`,
			);
		case 'exclusiveMinimum':
			return new InvalidSettingError(
				setting,
				error.data,
				`expected ${numberKind(error.parentSchema)} > ${String(params.limit)}`,
			);
		default:
			return new InvalidSettingError(setting, error.data, error.message ?? 'invalid value');
	}
}

/**
 * Validate `value` and return it typed.
 *
 * @throws MissingSettingError or InvalidSettingError for the first problem found
 */
export function checkSettings<T>(validate: ValidateFunction<T>, value: unknown, prefix: string): T {
	if (validate(value)) {
		return value;
	}
	const [first] = validate.errors ?? [];
	if (first === undefined) {
		throw new InvalidSettingError(named(prefix), value, 'rejected by its schema');
	}
	throw toSettingError(first, prefix);
}

// ─── Nulls ────────────────────────────────────────────────────────────────────

/** Drop null entries from mappings, recursively; YAML writes unset keys as null */
export function withoutNulls(value: unknown): unknown {
	if (Array.isArray(value)) {
		return value.map(withoutNulls);
	}
	if (!isMapping(value)) {
		return value;
	}
	const result: Mapping = {};
	for (const [key, entry] of Object.entries(value)) {
		if (entry !== null) {
			result[key] = withoutNulls(entry);
		}
	}
	return result;
}
