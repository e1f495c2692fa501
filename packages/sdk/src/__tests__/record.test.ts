import { describe, expect, it } from 'vitest';
import {
	buildRecord,
	extraToJson,
	isLevelEnabled,
	levelName,
	parseLevel,
	toErrorContext,
	toExtraValue,
	toExtras,
	toJsonValue,
} from '../record.js';

describe('parseLevel', () => {
	it('parses level names case-insensitively', () => {
		expect(parseLevel('DEBUG')).toBe('debug');
		expect(parseLevel('Info')).toBe('info');
		expect(parseLevel(' warning ')).toBe('warning');
		expect(parseLevel('CRITICAL')).toBe('critical');
	});

	it('accepts warn and fatal aliases', () => {
		expect(parseLevel('WARN')).toBe('warning');
		expect(parseLevel('fatal')).toBe('critical');
	});

	it('returns undefined for unknown names', () => {
		expect(parseLevel('INVALID')).toBeUndefined();
		expect(parseLevel('')).toBeUndefined();
	});
});

describe('isLevelEnabled', () => {
	it('admits levels at or above the threshold', () => {
		expect(isLevelEnabled('info', 'info')).toBe(true);
		expect(isLevelEnabled('error', 'warning')).toBe(true);
		expect(isLevelEnabled('debug', 'info')).toBe(false);
		expect(isLevelEnabled('warning', 'critical')).toBe(false);
	});
});

describe('levelName', () => {
	it('renders upper-case names', () => {
		expect(levelName('warning')).toBe('WARNING');
		expect(levelName('debug')).toBe('DEBUG');
	});
});

describe('toExtraValue', () => {
	it('tags scalars', () => {
		expect(toExtraValue('alice')).toEqual({ kind: 'string', value: 'alice' });
		expect(toExtraValue(42)).toEqual({ kind: 'number', value: 42 });
		expect(toExtraValue(false)).toEqual({ kind: 'boolean', value: false });
		expect(toExtraValue(null)).toEqual({ kind: 'null' });
		expect(toExtraValue(undefined)).toEqual({ kind: 'null' });
	});

	it('stores non-finite numbers and bigints as strings', () => {
		expect(toExtraValue(Number.NaN)).toEqual({ kind: 'string', value: 'NaN' });
		expect(toExtraValue(10n)).toEqual({ kind: 'string', value: '10' });
	});

	it('stores dates as ISO strings', () => {
		const date = new Date('2024-01-15T10:30:45.123Z');
		expect(toExtraValue(date)).toEqual({ kind: 'string', value: '2024-01-15T10:30:45.123Z' });
	});

	it('stores objects and arrays as json', () => {
		expect(toExtraValue({ id: 7, tags: ['a'] })).toEqual({
			kind: 'json',
			value: { id: 7, tags: ['a'] },
		});
	});
});

describe('toJsonValue', () => {
	it('drops functions and undefined members', () => {
		expect(toJsonValue({ a: 1, fn: () => 1, missing: undefined })).toEqual({ a: 1 });
	});

	it('replaces cycles with a marker', () => {
		const node: Record<string, unknown> = { id: 1 };
		node.self = node;
		expect(toJsonValue(node)).toEqual({ id: 1, self: '[Circular]' });
	});

	it('keeps repeated (non-cyclic) references', () => {
		const shared = { x: 1 };
		expect(toJsonValue({ a: shared, b: shared })).toEqual({ a: { x: 1 }, b: { x: 1 } });
	});

	it('reduces errors to name and message', () => {
		expect(toJsonValue(new TypeError('bad'))).toEqual({ name: 'TypeError', message: 'bad' });
	});
});

describe('toExtras', () => {
	it('preserves insertion order', () => {
		const extras = toExtras({ b: 1, a: 'x', c: true });
		expect([...extras.keys()]).toEqual(['b', 'a', 'c']);
	});

	it('returns an empty map for undefined', () => {
		expect(toExtras(undefined).size).toBe(0);
	});
});

describe('extraToJson', () => {
	it('unwraps tagged values', () => {
		expect(extraToJson({ kind: 'null' })).toBeNull();
		expect(extraToJson({ kind: 'number', value: 3 })).toBe(3);
		expect(extraToJson({ kind: 'json', value: [1, 2] })).toEqual([1, 2]);
	});
});

describe('toErrorContext', () => {
	it('captures Error fields', () => {
		const err = new RangeError('out of range');
		const ctx = toErrorContext(err);
		expect(ctx.name).toBe('RangeError');
		expect(ctx.message).toBe('out of range');
		expect(ctx.stack).toContain('out of range');
	});

	it('stringifies non-Error values', () => {
		expect(toErrorContext('boom')).toEqual({ name: 'Error', message: 'boom' });
	});
});

describe('buildRecord', () => {
	it('creates a well-formed record with defaults', () => {
		const record = buildRecord({ level: 'info', message: 'hello' });
		expect(record.name).toBe('root');
		expect(record.level).toBe('info');
		expect(record.message).toBe('hello');
		expect(record.extra.size).toBe(0);
		expect(record.error).toBeUndefined();
		expect(Number.isNaN(Date.parse(record.timestamp))).toBe(false);
	});

	it('allows overriding name and timestamp', () => {
		const record = buildRecord({
			level: 'error',
			message: 'failed',
			name: 'billing',
			timestamp: '2026-01-01T00:00:00.000Z',
		});
		expect(record.name).toBe('billing');
		expect(record.timestamp).toBe('2026-01-01T00:00:00.000Z');
	});

	it('copies a Map of extras instead of sharing it', () => {
		const extras = toExtras({ user: 'alice' });
		const record = buildRecord({ level: 'info', message: 'm', extra: extras });
		record.extra.set('user', { kind: 'string', value: 'bob' });
		expect(extras.get('user')).toEqual({ kind: 'string', value: 'alice' });
	});

	it('captures error context', () => {
		const record = buildRecord({ level: 'error', message: 'm', error: new Error('db down') });
		expect(record.error?.message).toBe('db down');
	});
});
