/**
 * HTTP sink: delivers each rendered record to a remote collector.
 *
 * Wire format: POST {"message": "<rendered>"} with
 * Content-Type: application/json and, when a token is configured,
 * Authorization: Bearer <token>.
 *
 * Delivery failures never reach the emitting code. They are reported to
 * the pipeline's sink_error channel and written as a diagnostic line to
 * stderr, which the pipeline never writes records to.
 */

import {
	type FetchLike,
	type HttpAgent,
	type HttpAgentOptions,
	type HttpResponse,
	type LogLevel,
	type LogRecord,
	type Sink,
	type SinkContext,
	DeliveryError,
	InvalidSettingError,
	closeHttpAgent,
	createFetchWithKeepAlive,
	createHttpAgent,
	toError,
} from '@logrelay/sdk';
import { parseDestination } from './destination.js';
import {
	type AttemptOutcome,
	type RetryPolicy,
	type RetryState,
	RETRY_AFTER_STATUSES,
	createRetryPolicy,
	nextState,
	parseRetryAfter,
} from './retry.js';

export const DEFAULT_TIMEOUT_SECONDS = 5;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BACKOFF_FACTOR = 0.3;

const DIAGNOSTIC_PREFIX = '[logrelay:http]';

export interface HttpSinkOptions {
	/** Collector address; must carry a scheme and a host */
	url?: string;
	/** Bearer credential */
	token?: string;
	/** Per-attempt timeout in seconds (default: 5) */
	timeout?: number;
	/** Retries after the first attempt (default: 3) */
	maxRetries?: number;
	/** Backoff multiplier in seconds (default: 0.3) */
	backoffFactor?: number;
	/** Minimum level delivered (default: debug) */
	level?: LogLevel;
	/** Connection pool settings for the keep-alive agent */
	agent?: HttpAgentOptions;
	/** Replaces the agent-backed fetch (tests) */
	fetch?: FetchLike;
	/** Replaces the backoff timer (tests) */
	sleep?: (ms: number) => Promise<void>;
	/** Receives diagnostic lines (default: process.stderr) */
	diagnostics?: (line: string) => void;
}

export type DeliveryResult =
	| { status: 'delivered'; attempts: number; httpStatus: number }
	| { status: 'failed'; attempts: number; error: DeliveryError };

function defaultSleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

function writeStderr(line: string): void {
	process.stderr.write(`${line}\n`);
}

function isTimeout(err: unknown): boolean {
	if (typeof err !== 'object' || err === null || !('name' in err)) return false;
	return err.name === 'TimeoutError' || err.name === 'AbortError';
}

interface NumberRule {
	integer?: boolean;
	/** Reject zero as well as negatives */
	positive?: boolean;
}

function requireNumber(name: string, value: number, rule: NumberRule = {}): number {
	const tooLow = rule.positive ? value <= 0 : value < 0;
	if (!Number.isFinite(value) || tooLow || (rule.integer && !Number.isInteger(value))) {
		const sign = rule.positive ? 'positive' : 'non-negative';
		throw new InvalidSettingError(name, value, `expected a ${sign} ${rule.integer ? 'integer' : 'number'}`);
	}
	return value;
}

async function discardBody(response: HttpResponse): Promise<void> {
	try {
		await response.body?.cancel();
	} catch {
		// Connection already torn down; nothing left to release
	}
}

export class HttpSink implements Sink {
	readonly id = 'http';
	readonly level: LogLevel;
	readonly destination: URL;
	readonly timeoutMs: number;
	readonly policy: RetryPolicy;
	private readonly headers: Record<string, string>;
	private readonly agent: HttpAgent;
	private readonly send: FetchLike;
	private readonly sleep: (ms: number) => Promise<void>;
	private readonly diagnostics: (line: string) => void;
	private context: SinkContext | null = null;
	private queue: Promise<void> = Promise.resolve();
	private closed = false;

	/**
	 * @throws ConfigurationError when the url is missing or lacks a scheme or host
	 */
	constructor(options: HttpSinkOptions) {
		this.destination = parseDestination(options.url);
		this.level = options.level ?? 'debug';

		// A zero timeout would abort every attempt before it is sent
		const timeout = requireNumber('timeout', options.timeout ?? DEFAULT_TIMEOUT_SECONDS, { positive: true });
		this.timeoutMs = Math.max(1, Math.round(timeout * 1000));
		this.policy = createRetryPolicy({
			maxRetries: requireNumber('maxRetries', options.maxRetries ?? DEFAULT_MAX_RETRIES, { integer: true }),
			backoffFactor: requireNumber('backoffFactor', options.backoffFactor ?? DEFAULT_BACKOFF_FACTOR),
		});

		this.headers = { 'Content-Type': 'application/json' };
		if (options.token) {
			this.headers.Authorization = `Bearer ${options.token}`;
		}

		this.agent = createHttpAgent(options.agent);
		this.send = options.fetch ?? createFetchWithKeepAlive(this.agent);
		this.sleep = options.sleep ?? defaultSleep;
		this.diagnostics = options.diagnostics ?? writeStderr;
	}

	/** Headers sent with every request (credential included) */
	get requestHeaders(): Readonly<Record<string, string>> {
		return this.headers;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	async init(context: SinkContext): Promise<void> {
		this.context = context;
	}

	/**
	 * Queue delivery of one record. Deliveries from this sink run in
	 * emission order; the returned promise settles when this one is done
	 * and never rejects.
	 */
	write(record: LogRecord, rendered: string): Promise<void> {
		if (this.closed) {
			const error = new DeliveryError(this.id, 'Sink is shut down', { attempts: 0 });
			this.diagnose(`${DIAGNOSTIC_PREFIX} Dropped log for ${this.destination.href}: sink is shut down`);
			this.report(error, record);
			return Promise.resolve();
		}

		const task = this.queue.then(async () => {
			const result = await this.deliver(rendered);
			if (result.status === 'failed') {
				this.report(result.error, record);
			}
		});
		// A rejected task must not stall the deliveries queued behind it
		this.queue = task.catch((err: unknown) => {
			this.diagnose(`${DIAGNOSTIC_PREFIX} Unexpected error: ${toError(err).message}`);
		});
		return task;
	}

	/**
	 * Deliver one rendered record, retrying transient failures.
	 * Always resolves; failures are described by the result.
	 */
	async deliver(rendered: string): Promise<DeliveryResult> {
		const body = JSON.stringify({ message: rendered });
		let state: RetryState = { state: 'attempting', attempt: 1 };
		try {
			for (;;) {
				switch (state.state) {
					case 'attempting': {
						const outcome = await this.attempt(body);
						state = nextState(this.policy, state.attempt, outcome);
						break;
					}
					case 'retryable':
						await this.sleep(state.delayMs);
						state = { state: 'attempting', attempt: state.attempt + 1 };
						break;
					case 'success':
						return { status: 'delivered', attempts: state.attempt, httpStatus: state.status };
					case 'exhausted':
					case 'failed':
						return this.fail(state.outcome, state.attempt);
				}
			}
		} catch (err) {
			return this.fail({ kind: 'unexpected', error: toError(err) }, state.attempt);
		}
	}

	async flush(): Promise<void> {
		await this.queue;
	}

	async shutdown(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		await this.queue;
		await closeHttpAgent(this.agent);
	}

	// ─── Internal ────────────────────────────────────────────────────────────

	private async attempt(body: string): Promise<AttemptOutcome> {
		try {
			const response = await this.send(this.destination.href, {
				method: 'POST',
				headers: this.headers,
				body,
				signal: AbortSignal.timeout(this.timeoutMs),
			});
			await discardBody(response);
			return {
				kind: 'response',
				status: response.status,
				statusText: response.statusText,
				retryAfterMs: RETRY_AFTER_STATUSES.has(response.status)
					? parseRetryAfter(response.headers.get('retry-after'))
					: undefined,
			};
		} catch (err) {
			if (isTimeout(err)) return { kind: 'timeout', error: toError(err) };
			if (err instanceof TypeError) return { kind: 'network', error: err };
			return { kind: 'unexpected', error: toError(err) };
		}
	}

	private fail(outcome: AttemptOutcome, attempts: number): DeliveryResult {
		const { error, line } = this.describeFailure(outcome, attempts);
		this.diagnose(`${DIAGNOSTIC_PREFIX} ${line}`);
		return { status: 'failed', attempts, error };
	}

	private describeFailure(
		outcome: AttemptOutcome,
		attempts: number,
	): { error: DeliveryError; line: string } {
		const url = this.destination.href;
		switch (outcome.kind) {
			case 'response': {
				const message = `Collector responded ${outcome.status} ${outcome.statusText}`.trimEnd();
				return {
					error: new DeliveryError(this.id, message, { attempts, status: outcome.status }),
					line: `Error sending log to ${url}: ${message}`,
				};
			}
			case 'timeout':
				return {
					error: new DeliveryError(this.id, `Timed out after ${attempts} attempt(s)`, { attempts }, {
						cause: outcome.error,
					}),
					line: `Timeout sending log to ${url}`,
				};
			case 'network': {
				const message = `Connection failed: ${outcome.error.message}`;
				return {
					error: new DeliveryError(this.id, message, { attempts }, { cause: outcome.error }),
					line: `Error sending log to ${url}: ${message}`,
				};
			}
			case 'unexpected':
				return {
					error: new DeliveryError(this.id, `Unexpected error: ${outcome.error.message}`, { attempts }, {
						cause: outcome.error,
					}),
					line: `Unexpected error: ${outcome.error.message}`,
				};
		}
	}

	/** Hand a failure to the pipeline; a throwing listener must not break the delivery chain */
	private report(error: Error, record: LogRecord): void {
		try {
			this.context?.reportError(error, record);
		} catch (err) {
			this.diagnose(`${DIAGNOSTIC_PREFIX} Error listener failed: ${toError(err).message}`);
		}
	}

	private diagnose(line: string): void {
		try {
			this.diagnostics(line);
		} catch {
			// Nowhere left to report to
		}
	}
}
