import { InvalidSettingError, MissingSettingError } from '@logrelay/sdk';
import { describe, expect, it } from 'vitest';
import { getEnvVar, readEnv, splitList } from '../config/env.js';

describe('getEnvVar', () => {
	it('returns the raw string', () => {
		expect(getEnvVar('LOG_ENV', 'string', { env: { LOG_ENV: 'staging' } })).toBe('staging');
	});

	it('returns the default when unset or blank', () => {
		expect(getEnvVar('LOG_ENV', 'string', { default: 'production', env: {} })).toBe('production');
		expect(getEnvVar('LOG_ENV', 'string', { default: 'production', env: { LOG_ENV: '  ' } })).toBe('production');
		expect(getEnvVar('LOG_FILE', 'string', { env: {} })).toBeUndefined();
	});

	it('throws MissingSettingError when required and unset', () => {
		expect(() => getEnvVar('LOG_LEVEL', 'string', { required: true, env: {} })).toThrow(MissingSettingError);
		expect(() => getEnvVar('LOG_LEVEL', 'string', { required: true, env: {} })).toThrow(
			'Missing required setting: LOG_LEVEL',
		);
	});

	it('coerces integers and floats', () => {
		const env = { RETRIES: ' 4 ', FACTOR: '0.5' };
		expect(getEnvVar('RETRIES', 'int', { env })).toBe(4);
		expect(getEnvVar('FACTOR', 'float', { env })).toBe(0.5);
	});

	it('rejects values that do not coerce', () => {
		expect(() => getEnvVar('RETRIES', 'int', { env: { RETRIES: '2.5' } })).toThrow(
			'Invalid setting RETRIES="2.5": expected an integer',
		);
		expect(() => getEnvVar('FACTOR', 'float', { env: { FACTOR: 'fast' } })).toThrow(InvalidSettingError);
	});

	it('accepts the usual boolean words', () => {
		for (const word of ['true', 'TRUE', '1', 'yes', 'on']) {
			expect(getEnvVar('FLAG', 'bool', { env: { FLAG: word } })).toBe(true);
		}
		for (const word of ['false', '0', 'no', 'Off']) {
			expect(getEnvVar('FLAG', 'bool', { env: { FLAG: word } })).toBe(false);
		}
		expect(() => getEnvVar('FLAG', 'bool', { env: { FLAG: 'maybe' } })).toThrow(InvalidSettingError);
	});

	it('applies the validator to coerced values', () => {
		const validate = (value: number) => (value > 10 ? 'expected at most 10' : undefined);
		expect(getEnvVar('N', 'int', { env: { N: '7' }, validate })).toBe(7);
		expect(() => getEnvVar('N', 'int', { env: { N: '11' }, validate })).toThrow(
			'Invalid setting N="11": expected at most 10',
		);
	});
});

describe('readEnv', () => {
	it('treats blank values as unset', () => {
		expect(readEnv('A', { A: '' })).toBeUndefined();
		expect(readEnv('A', { A: 'x' })).toBe('x');
	});
});

describe('splitList', () => {
	it('splits on commas and drops blanks', () => {
		expect(splitList('password, token,,ssn ')).toEqual(['password', 'token', 'ssn']);
		expect(splitList('')).toEqual([]);
	});
});
