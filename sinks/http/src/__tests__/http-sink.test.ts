import {
	ConfigurationError,
	DeliveryError,
	type FetchLike,
	type HttpRequestInit,
	type HttpResponse,
	InvalidSettingError,
	type SinkContext,
} from '@logrelay/sdk';
import { makeRecord } from '@logrelay/sdk/testing';
import { type Mock, afterEach, describe, expect, it, vi } from 'vitest';
import { HttpSink, type HttpSinkOptions } from '../http-sink.js';

// ─── Test Helpers ────────────────────────────────────────────────────────────

const URL_ = 'https://logs.example.test/ingest';

const STATUS_TEXT: Record<number, string> = {
	200: 'OK',
	400: 'Bad Request',
	429: 'Too Many Requests',
	500: 'Internal Server Error',
	503: 'Service Unavailable',
};

function respond(status: number, headers: Record<string, string> = {}): HttpResponse {
	return {
		ok: status >= 200 && status < 300,
		status,
		statusText: STATUS_TEXT[status] ?? '',
		headers: { get: (name: string) => headers[name.toLowerCase()] ?? null },
	};
}

function timeoutError(): Error {
	const err = new Error('The operation was aborted due to timeout');
	err.name = 'TimeoutError';
	return err;
}

interface Harness {
	sink: HttpSink;
	fetchMock: Mock<FetchLike>;
	sleep: Mock<(ms: number) => Promise<void>>;
	lines: string[];
}

function createSink(fetchImpl: FetchLike, options: Partial<HttpSinkOptions> = {}): Harness {
	const fetchMock = vi.fn<FetchLike>(fetchImpl);
	const sleep = vi.fn<(ms: number) => Promise<void>>(async () => {});
	const lines: string[] = [];
	const sink = new HttpSink({
		url: URL_,
		fetch: fetchMock,
		sleep,
		diagnostics: (line) => lines.push(line),
		...options,
	});
	return { sink, fetchMock, sleep, lines };
}

function requestOf(harness: Harness, call = 0): HttpRequestInit {
	return harness.fetchMock.mock.calls[call][1];
}

const sinks: HttpSink[] = [];

afterEach(async () => {
	for (const sink of sinks) {
		await sink.shutdown();
	}
	sinks.length = 0;
});

function track(harness: Harness): Harness {
	sinks.push(harness.sink);
	return harness;
}

// ─── Construction ────────────────────────────────────────────────────────────

describe('HttpSink construction', () => {
	it('accepts addresses with a scheme and a host', () => {
		for (const url of [
			'https://log.api/ingest',
			'http://127.0.0.1:8080',
			'http://localhost:9000/logs?tenant=a',
			'https://user@collector.internal/v1',
		]) {
			const sink = new HttpSink({ url });
			sinks.push(sink);
			expect(sink.destination.href.startsWith(url.split('?')[0])).toBe(true);
		}
	});

	it('rejects addresses missing a scheme or host', () => {
		for (const url of [
			'invalid-url',
			'log.api/ingest',
			'localhost:8080',
			'file:///var/log/x',
			'mailto:ops@example.test',
			'http://',
		]) {
			expect(() => new HttpSink({ url })).toThrow(ConfigurationError);
		}
	});

	it('rejects a missing address', () => {
		expect(() => new HttpSink({})).toThrow('Remote logging endpoint must be provided');
		expect(() => new HttpSink({ url: '  ' })).toThrow(ConfigurationError);
	});

	it('names the bad address in the error', () => {
		expect(() => new HttpSink({ url: 'invalid-url' })).toThrow(
			'Invalid remote logging endpoint URL: invalid-url',
		);
	});

	it('pre-attaches the bearer credential', () => {
		const { sink } = track(createSink(async () => respond(200), { token: 'test-token' }));
		expect(sink.requestHeaders).toEqual({
			'Content-Type': 'application/json',
			Authorization: 'Bearer test-token',
		});
	});

	it('omits Authorization without a token', () => {
		const { sink } = track(createSink(async () => respond(200)));
		expect(sink.requestHeaders).toEqual({ 'Content-Type': 'application/json' });
	});

	it('applies defaults', () => {
		const { sink } = track(createSink(async () => respond(200)));
		expect(sink.timeoutMs).toBe(5000);
		expect(sink.policy.maxRetries).toBe(3);
		expect(sink.policy.backoffFactor).toBe(0.3);
		expect(sink.level).toBe('debug');
	});

	it('rejects invalid numeric settings', () => {
		expect(() => new HttpSink({ url: URL_, maxRetries: -1 })).toThrow(InvalidSettingError);
		expect(() => new HttpSink({ url: URL_, maxRetries: 1.5 })).toThrow(InvalidSettingError);
		expect(() => new HttpSink({ url: URL_, timeout: Number.NaN })).toThrow(InvalidSettingError);
		expect(() => new HttpSink({ url: URL_, backoffFactor: -0.1 })).toThrow(ConfigurationError);
	});

	it('rejects a zero timeout', () => {
		expect(() => new HttpSink({ url: URL_, timeout: 0 })).toThrow(
			'Invalid setting timeout=0: expected a positive number',
		);
		expect(() => new HttpSink({ url: URL_, timeout: -1 })).toThrow(InvalidSettingError);
	});
});

// ─── deliver() ───────────────────────────────────────────────────────────────

describe('HttpSink.deliver', () => {
	it('posts the envelope once on 200', async () => {
		const harness = track(createSink(async () => respond(200), { token: 'test-token', timeout: 10 }));

		const result = await harness.sink.deliver('2024-01-15 INFO app hello');

		expect(result).toEqual({ status: 'delivered', attempts: 1, httpStatus: 200 });
		expect(harness.fetchMock).toHaveBeenCalledOnce();
		expect(harness.fetchMock.mock.calls[0][0]).toBe(URL_);
		const init = requestOf(harness);
		expect(init.method).toBe('POST');
		expect(init.headers.Authorization).toBe('Bearer test-token');
		expect(init.headers['Content-Type']).toBe('application/json');
		expect(JSON.parse(init.body)).toEqual({ message: '2024-01-15 INFO app hello' });
		expect(init.signal).toBeInstanceOf(AbortSignal);
		expect(harness.sleep).not.toHaveBeenCalled();
		expect(harness.lines).toEqual([]);
	});

	it('makes exactly 1 + maxRetries attempts against a failing collector', async () => {
		const harness = track(createSink(async () => respond(500), { maxRetries: 2 }));

		const result = await harness.sink.deliver('m');

		expect(harness.fetchMock).toHaveBeenCalledTimes(3);
		expect(result.status).toBe('failed');
		expect(result.attempts).toBe(3);
		if (result.status === 'failed') {
			expect(result.error).toBeInstanceOf(DeliveryError);
			expect(result.error.status).toBe(500);
			expect(result.error.message).toBe('Collector responded 500 Internal Server Error');
		}
		expect(harness.sleep.mock.calls.map(([ms]) => ms)).toEqual([300, 600]);
		expect(harness.lines).toEqual([
			`[logrelay:http] Error sending log to ${URL_}: Collector responded 500 Internal Server Error`,
		]);
	});

	it('makes exactly 1 + maxRetries attempts when every attempt times out', async () => {
		const harness = track(
			createSink(
				async () => {
					throw timeoutError();
				},
				{ maxRetries: 2, timeout: 1 },
			),
		);

		const result = await harness.sink.deliver('m');

		expect(harness.fetchMock).toHaveBeenCalledTimes(3);
		expect(result.status).toBe('failed');
		if (result.status === 'failed') {
			expect(result.error.message).toBe('Timed out after 3 attempt(s)');
			expect(result.error.status).toBeUndefined();
		}
		expect(harness.lines).toEqual([`[logrelay:http] Timeout sending log to ${URL_}`]);
	});

	it('recovers when a transient failure clears', async () => {
		const harness = track(createSink(async () => respond(200)));
		harness.fetchMock.mockResolvedValueOnce(respond(503));

		const result = await harness.sink.deliver('m');

		expect(result).toEqual({ status: 'delivered', attempts: 2, httpStatus: 200 });
		expect(harness.sleep.mock.calls.map(([ms]) => ms)).toEqual([300]);
		expect(harness.lines).toEqual([]);
	});

	it('does not retry permanent failures', async () => {
		const harness = track(createSink(async () => respond(400)));

		const result = await harness.sink.deliver('m');

		expect(harness.fetchMock).toHaveBeenCalledOnce();
		expect(result.status).toBe('failed');
		if (result.status === 'failed') {
			expect(result.error.status).toBe(400);
		}
	});

	it('waits as long as Retry-After asks', async () => {
		const harness = track(createSink(async () => respond(200)));
		harness.fetchMock.mockResolvedValueOnce(respond(429, { 'retry-after': '2' }));

		await harness.sink.deliver('m');

		expect(harness.sleep.mock.calls.map(([ms]) => ms)).toEqual([2000]);
	});

	it('retries connection errors', async () => {
		const harness = track(
			createSink(
				async () => {
					throw new TypeError('fetch failed');
				},
				{ maxRetries: 1 },
			),
		);

		const result = await harness.sink.deliver('m');

		expect(harness.fetchMock).toHaveBeenCalledTimes(2);
		if (result.status === 'failed') {
			expect(result.error.message).toBe('Connection failed: fetch failed');
		}
		expect(harness.lines).toEqual([
			`[logrelay:http] Error sending log to ${URL_}: Connection failed: fetch failed`,
		]);
	});

	it('contains unexpected errors without retrying', async () => {
		const harness = track(
			createSink(async () => {
				throw new Error('boom');
			}),
		);

		const result = await harness.sink.deliver('m');

		expect(harness.fetchMock).toHaveBeenCalledOnce();
		expect(result.status).toBe('failed');
		expect(harness.lines).toEqual(['[logrelay:http] Unexpected error: boom']);
	});

	it('contains errors thrown by the backoff timer', async () => {
		const harness = track(createSink(async () => respond(500)));
		harness.sleep.mockRejectedValueOnce(new Error('timer broke'));

		const result = await harness.sink.deliver('m');

		expect(result.status).toBe('failed');
		expect(result.attempts).toBe(1);
		expect(harness.lines).toEqual(['[logrelay:http] Unexpected error: timer broke']);
	});

	it('makes a single attempt with maxRetries 0', async () => {
		const harness = track(createSink(async () => respond(503), { maxRetries: 0 }));
		await harness.sink.deliver('m');
		expect(harness.fetchMock).toHaveBeenCalledOnce();
	});
});

// ─── write() / lifecycle ─────────────────────────────────────────────────────

describe('HttpSink.write', () => {
	function contextSpy(): { reportError: Mock<SinkContext['reportError']> } {
		return { reportError: vi.fn<SinkContext['reportError']>() };
	}

	it('reports failed deliveries to the side channel and resolves', async () => {
		const harness = track(createSink(async () => respond(500), { maxRetries: 1 }));
		const context = contextSpy();
		await harness.sink.init(context);
		const record = makeRecord();

		await expect(harness.sink.write(record, 'rendered')).resolves.toBeUndefined();

		expect(context.reportError).toHaveBeenCalledOnce();
		const [error, reported] = context.reportError.mock.calls[0];
		expect(error).toBeInstanceOf(DeliveryError);
		expect(reported).toBe(record);
	});

	it('does not report successful deliveries', async () => {
		const harness = track(createSink(async () => respond(200)));
		const context = contextSpy();
		await harness.sink.init(context);

		await harness.sink.write(makeRecord(), 'rendered');

		expect(context.reportError).not.toHaveBeenCalled();
	});

	it('delivers records one after another in emission order', async () => {
		let release: () => void = () => {};
		const gate = new Promise<void>((resolve) => {
			release = resolve;
		});
		const harness = track(createSink(async () => respond(200)));
		harness.fetchMock.mockImplementationOnce(async () => {
			await gate;
			return respond(200);
		});
		await harness.sink.init(contextSpy());

		void harness.sink.write(makeRecord(), 'first');
		void harness.sink.write(makeRecord(), 'second');
		await new Promise((resolve) => setTimeout(resolve, 10));

		expect(harness.fetchMock).toHaveBeenCalledOnce();

		release();
		await harness.sink.flush();

		const bodies = harness.fetchMock.mock.calls.map(([, init]) => JSON.parse(init.body).message);
		expect(bodies).toEqual(['first', 'second']);
	});

	it('keeps delivering after an error listener throws', async () => {
		const harness = track(createSink(async () => respond(200)));
		harness.fetchMock.mockImplementationOnce(async () => respond(400));
		const context = contextSpy();
		context.reportError.mockImplementationOnce(() => {
			throw new Error('listener failed');
		});
		await harness.sink.init(context);

		await expect(harness.sink.write(makeRecord(), 'a')).resolves.toBeUndefined();
		await expect(harness.sink.write(makeRecord(), 'b')).resolves.toBeUndefined();

		expect(harness.fetchMock).toHaveBeenCalledTimes(2);
		expect(context.reportError).toHaveBeenCalledOnce();
		expect(harness.lines.at(-1)).toBe('[logrelay:http] Error listener failed: listener failed');
		await expect(harness.sink.flush()).resolves.toBeUndefined();
	});

	it('drops and reports writes after shutdown', async () => {
		const harness = createSink(async () => respond(200));
		const context = contextSpy();
		await harness.sink.init(context);
		await harness.sink.shutdown();

		await harness.sink.write(makeRecord(), 'late');

		expect(harness.fetchMock).not.toHaveBeenCalled();
		expect(context.reportError).toHaveBeenCalledOnce();
		expect(harness.lines).toEqual([`[logrelay:http] Dropped log for ${URL_}: sink is shut down`]);
	});

	it('shutdown is idempotent', async () => {
		const harness = createSink(async () => respond(200));
		await harness.sink.shutdown();
		await expect(harness.sink.shutdown()).resolves.toBeUndefined();
		expect(harness.sink.isClosed).toBe(true);
	});

	it('shutdown waits for queued deliveries', async () => {
		const harness = createSink(async () => respond(200));
		await harness.sink.init(contextSpy());

		void harness.sink.write(makeRecord(), 'queued');
		await harness.sink.shutdown();

		expect(harness.fetchMock).toHaveBeenCalledOnce();
	});
});
