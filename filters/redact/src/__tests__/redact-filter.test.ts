import { buildRecord } from '@logrelay/sdk';
import { makeRecord } from '@logrelay/sdk/testing';
import { describe, expect, it } from 'vitest';
import { REDACTED, RedactFilter, createRule, redactJson } from '../redact-filter.js';
import { register } from '../index.js';

function recordWith(extra: Record<string, unknown>) {
	return buildRecord({ level: 'info', message: 'login', name: 'auth', extra, timestamp: '2024-01-15T10:30:45.123Z' });
}

describe('RedactFilter', () => {
	it('replaces matching extras and keeps the rest', () => {
		const filter = new RedactFilter({ fields: ['password', 'token'] });
		const record = recordWith({ user: 'alice', password: 'test-secret', attempts: 2 });

		expect(filter.apply(record)).toBe(true);

		expect([...record.extra]).toEqual([
			['user', { kind: 'string', value: 'alice' }],
			['password', { kind: 'string', value: REDACTED }],
			['attempts', { kind: 'number', value: 2 }],
		]);
		expect(record.message).toBe('login');
	});

	it('redacts the message and name attributes', () => {
		const filter = new RedactFilter({ fields: ['message', 'name'] });
		const record = makeRecord();

		filter.apply(record);

		expect(record.message).toBe(REDACTED);
		expect(record.name).toBe(REDACTED);
	});

	it('redacts the error context, stack included', () => {
		const filter = new RedactFilter({ fields: ['error'] });
		const record = buildRecord({
			level: 'error',
			message: 'login failed',
			name: 'auth',
			error: new Error('password test-secret rejected'),
			timestamp: '2024-01-15T10:30:45.123Z',
		});

		filter.apply(record);
		filter.apply(record);

		expect(record.error).toEqual({ name: REDACTED, message: REDACTED });
		expect(record.message).toBe('login failed');
	});

	it('leaves records without an error context alone', () => {
		const record = makeRecord();
		new RedactFilter({ fields: ['error'] }).apply(record);
		expect(record.error).toBeUndefined();
	});

	it('is a no-op when no field matches', () => {
		const filter = new RedactFilter({ fields: ['ssn'] });
		const record = recordWith({ user: 'alice', nested: { id: 1 } });
		const before = new Map(record.extra);

		filter.apply(record);

		expect(record.extra).toEqual(before);
		expect(record.message).toBe('login');
	});

	it('is idempotent', () => {
		const filter = new RedactFilter({ fields: ['password', 'message'] });
		const record = recordWith({ password: 'test-secret', body: { password: 'test-secret' } });

		filter.apply(record);
		const once = { message: record.message, extra: new Map(record.extra) };
		filter.apply(record);

		expect(record.message).toBe(once.message);
		expect(record.extra).toEqual(once.extra);
	});

	it('redacts nested keys when deep', () => {
		const filter = new RedactFilter({ fields: ['token'] });
		const record = recordWith({ request: { headers: { token: 'test-token', accept: 'json' }, items: [{ token: 'x' }] } });

		filter.apply(record);

		expect(record.extra.get('request')).toEqual({
			kind: 'json',
			value: { headers: { token: REDACTED, accept: 'json' }, items: [{ token: REDACTED }] },
		});
	});

	it('leaves nested keys alone when not deep', () => {
		const filter = new RedactFilter({ fields: ['token'], deep: false });
		const record = recordWith({ request: { token: 'test-token' } });

		filter.apply(record);

		expect(record.extra.get('request')).toEqual({ kind: 'json', value: { token: 'test-token' } });
	});

	it('uses a custom replacement', () => {
		const filter = new RedactFilter({ fields: ['password'], replacement: '***' });
		const record = recordWith({ password: 'test-secret' });

		filter.apply(record);

		expect(record.extra.get('password')).toEqual({ kind: 'string', value: '***' });
	});
});

describe('createRule', () => {
	it('trims and drops blank field names', () => {
		const rule = createRule({ fields: [' password ', '', 'token'] });
		expect([...rule.fields]).toEqual(['password', 'token']);
		expect(rule.replacement).toBe(REDACTED);
		expect(rule.deep).toBe(true);
	});
});

describe('redactJson', () => {
	it('passes scalars through', () => {
		const rule = createRule({ fields: ['a'] });
		expect(redactJson('a', rule)).toBe('a');
		expect(redactJson(null, rule)).toBeNull();
		expect(redactJson([1, { a: 2 }], rule)).toEqual([1, { a: REDACTED }]);
	});
});

describe('register', () => {
	it('creates redact filters from options', () => {
		const registration = register();
		expect(registration.id).toBe('redact');
		expect(registration.create({ fields: ['password'] })).toBeInstanceOf(RedactFilter);
	});
});
