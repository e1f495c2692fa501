/**
 * HTTP connection management for remote sinks.
 *
 * Provides keep-alive connection pooling via undici Agent.
 * Each sink should create its own agent when constructed and
 * close it during shutdown().
 */

import { Agent, type Dispatcher, fetch } from 'undici';

/**
 * Opaque handle for an HTTP connection pool agent.
 * Sinks store this and pass it to closeHttpAgent() on shutdown.
 */
export type HttpAgent = Dispatcher;

/** Options for creating an HTTP agent with connection pooling */
export interface HttpAgentOptions {
	/** Max connections per origin (default: 4) */
	connections?: number;
	/** Keep-alive timeout in milliseconds (default: 30000) */
	keepAliveTimeout?: number;
	/** Max keep-alive timeout in milliseconds (default: 60000) */
	keepAliveMaxTimeout?: number;
}

const DEFAULTS: Required<HttpAgentOptions> = {
	connections: 4,
	keepAliveTimeout: 30_000,
	keepAliveMaxTimeout: 60_000,
};

/** The subset of a fetch Response that sinks read */
export interface HttpResponse {
	ok: boolean;
	status: number;
	statusText: string;
	headers: { get(name: string): string | null };
	body?: { cancel(): Promise<void> } | null;
}

/** Request options sinks pass to a FetchLike */
export interface HttpRequestInit {
	method: 'POST' | 'PUT';
	headers: Record<string, string>;
	body: string;
	signal?: AbortSignal;
}

/** Minimal fetch signature; lets tests substitute a double */
export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

/**
 * Create an undici Agent with keep-alive connection pooling.
 *
 * Usage:
 * ```ts
 * const agent = createHttpAgent({ connections: 2 });
 * const send = createFetchWithKeepAlive(agent);
 * await send(url, { method: 'POST', headers, body });
 * // On shutdown:
 * await closeHttpAgent(agent);
 * ```
 */
export function createHttpAgent(options?: HttpAgentOptions): HttpAgent {
	const opts = { ...DEFAULTS, ...options };
	return new Agent({
		keepAliveTimeout: opts.keepAliveTimeout,
		keepAliveMaxTimeout: opts.keepAliveMaxTimeout,
		connections: opts.connections,
	});
}

/**
 * Create a fetch function that sends every request through the given agent.
 */
export function createFetchWithKeepAlive(agent: HttpAgent): FetchLike {
	return (url, init) => fetch(url, { ...init, dispatcher: agent });
}

/**
 * Gracefully close an HTTP agent, draining active connections.
 * undici rejects a second close, so callers track their own state.
 */
export async function closeHttpAgent(agent: HttpAgent): Promise<void> {
	await agent.close();
}
