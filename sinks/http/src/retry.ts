/**
 * Retry policy as an explicit state machine.
 *
 *   Attempting(n) → Success
 *                 → Retryable(delay) → Attempting(n+1)
 *                 → Exhausted        (transient failure, no attempts left)
 *                 → Failed           (permanent failure)
 *
 * Kept free of I/O so any HTTP client can drive it.
 */

/** Statuses worth retrying */
export const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);

/** Statuses whose Retry-After header overrides the computed backoff */
export const RETRY_AFTER_STATUSES: ReadonlySet<number> = new Set([429, 503]);

/** Upper bound on any single backoff delay */
export const BACKOFF_MAX_MS = 120_000;

export interface RetryPolicy {
	/** Retries after the first attempt; total attempts = 1 + maxRetries */
	maxRetries: number;
	/** Delay multiplier in seconds */
	backoffFactor: number;
	transientStatuses: ReadonlySet<number>;
	backoffMaxMs: number;
}

export function createRetryPolicy(
	options: Partial<RetryPolicy> & Pick<RetryPolicy, 'maxRetries' | 'backoffFactor'>,
): RetryPolicy {
	return {
		transientStatuses: TRANSIENT_STATUSES,
		backoffMaxMs: BACKOFF_MAX_MS,
		...options,
	};
}

/** What a single attempt produced */
export type AttemptOutcome =
	| { kind: 'response'; status: number; statusText: string; retryAfterMs?: number }
	| { kind: 'timeout'; error: Error }
	| { kind: 'network'; error: Error }
	| { kind: 'unexpected'; error: Error };

export type RetryState =
	| { state: 'attempting'; attempt: number }
	| { state: 'success'; attempt: number; status: number }
	| { state: 'retryable'; attempt: number; delayMs: number; outcome: AttemptOutcome }
	| { state: 'exhausted'; attempt: number; outcome: AttemptOutcome }
	| { state: 'failed'; attempt: number; outcome: AttemptOutcome };

/**
 * Delay after failed attempt `attempt` (1-based):
 * backoffFactor × 2^(attempt−1) seconds, capped at backoffMaxMs.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
	const seconds = policy.backoffFactor * 2 ** (attempt - 1);
	return Math.min(Math.round(seconds * 1000), policy.backoffMaxMs);
}

function isRetryable(policy: RetryPolicy, outcome: AttemptOutcome): boolean {
	switch (outcome.kind) {
		case 'response':
			return policy.transientStatuses.has(outcome.status);
		case 'timeout':
		case 'network':
			return true;
		case 'unexpected':
			return false;
	}
}

/**
 * Transition out of Attempting(attempt) given the attempt's outcome.
 */
export function nextState(policy: RetryPolicy, attempt: number, outcome: AttemptOutcome): RetryState {
	if (outcome.kind === 'response' && outcome.status >= 200 && outcome.status < 300) {
		return { state: 'success', attempt, status: outcome.status };
	}

	if (!isRetryable(policy, outcome)) {
		return { state: 'failed', attempt, outcome };
	}

	if (attempt >= 1 + policy.maxRetries) {
		return { state: 'exhausted', attempt, outcome };
	}

	const delayMs =
		outcome.kind === 'response' && outcome.retryAfterMs !== undefined
			? Math.min(outcome.retryAfterMs, policy.backoffMaxMs)
			: backoffDelay(policy, attempt);

	return { state: 'retryable', attempt, delayMs, outcome };
}

/**
 * Parse a Retry-After header: delta-seconds or an HTTP date.
 * Returns undefined when absent or unparseable.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
	if (header === null) return undefined;
	const trimmed = header.trim();
	if (/^\d+$/.test(trimmed)) {
		return Number.parseInt(trimmed, 10) * 1000;
	}
	const date = Date.parse(trimmed);
	if (Number.isNaN(date)) return undefined;
	return Math.max(0, date - now);
}
