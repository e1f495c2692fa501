/**
 * Typed environment variable access.
 *
 * Blank values count as unset. Values that are set but fail coercion or
 * validation raise InvalidSettingError naming the variable.
 */

import { InvalidSettingError, MissingSettingError } from '@logrelay/sdk';
import type { EnvSource } from './types.js';

export type EnvVarType = 'string' | 'int' | 'float' | 'bool';

export interface EnvVarTypes {
	string: string;
	int: number;
	float: number;
	bool: boolean;
}

export interface EnvVarOptions<T extends EnvVarType> {
	/** Throw MissingSettingError when unset */
	required?: boolean;
	/** Value when unset and not required */
	default?: EnvVarTypes[T];
	/** Return a reason to reject the coerced value */
	validate?: (value: EnvVarTypes[T]) => string | undefined;
	/** Variable source (default: process.env) */
	env?: EnvSource;
}

const TRUE_WORDS = new Set(['true', '1', 'yes', 'on']);
const FALSE_WORDS = new Set(['false', '0', 'no', 'off']);

type Coercers = { [K in EnvVarType]: (raw: string) => EnvVarTypes[K] | undefined };

const COERCERS: Coercers = {
	string: (raw) => raw,
	int: (raw) => (/^[+-]?\d+$/.test(raw) ? Number.parseInt(raw, 10) : undefined),
	float: (raw) => {
		const value = Number(raw);
		return Number.isFinite(value) ? value : undefined;
	},
	bool: (raw) => {
		const word = raw.toLowerCase();
		if (TRUE_WORDS.has(word)) return true;
		if (FALSE_WORDS.has(word)) return false;
		return undefined;
	},
};

const TYPE_NAMES: Record<EnvVarType, string> = {
	string: 'a string',
	int: 'an integer',
	float: 'a number',
	bool: 'a boolean (true/false, 1/0, yes/no, on/off)',
};

/** Coerce a raw string, or explain why it cannot be */
export function coerce<T extends EnvVarType>(name: string, type: T, raw: string): EnvVarTypes[T] {
	const convert: (raw: string) => EnvVarTypes[T] | undefined = COERCERS[type];
	const value = convert(raw.trim());
	if (value === undefined) {
		throw new InvalidSettingError(name, raw, `expected ${TYPE_NAMES[type]}`);
	}
	return value;
}

/** Raw value of a variable, or undefined when unset or blank */
export function readEnv(name: string, env: EnvSource = process.env): string | undefined {
	const raw = env[name];
	return raw === undefined || raw.trim() === '' ? undefined : raw;
}

/**
 * Read and coerce an environment variable.
 *
 * @throws MissingSettingError when required and unset
 * @throws InvalidSettingError when set but not coercible, or rejected by `validate`
 */
export function getEnvVar<T extends EnvVarType>(
	name: string,
	type: T,
	options: EnvVarOptions<T> & ({ required: true } | { default: EnvVarTypes[T] }),
): EnvVarTypes[T];
export function getEnvVar<T extends EnvVarType>(
	name: string,
	type: T,
	options?: EnvVarOptions<T>,
): EnvVarTypes[T] | undefined;
export function getEnvVar<T extends EnvVarType>(
	name: string,
	type: T,
	options: EnvVarOptions<T> = {},
): EnvVarTypes[T] | undefined {
	const raw = readEnv(name, options.env);
	if (raw === undefined) {
		if (options.required) throw new MissingSettingError(name);
		return options.default;
	}

	const value = coerce(name, type, raw);
	const reason = options.validate?.(value);
	if (reason !== undefined) {
		throw new InvalidSettingError(name, raw, reason);
	}
	return value;
}

/** Split a comma-separated list, dropping blanks */
export function splitList(raw: string): string[] {
	return raw
		.split(',')
		.map((item) => item.trim())
		.filter(Boolean);
}
