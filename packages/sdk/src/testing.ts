/**
 * Test harness for logrelay sink and filter authors.
 *
 * Provides in-memory sinks and record helpers for testing
 * pipelines in isolation.
 */

import { buildRecord } from './record.js';
import type { Sink, SinkContext } from './sink.js';
import type { LogLevel, LogRecord } from './types.js';

// ─── Memory Sink ──────────────────────────────────────────────────────────────

/**
 * Sink that keeps every record and rendering for assertion.
 * Records are snapshotted (extras copied) at write time.
 */
export class MemorySink implements Sink {
	readonly id: string;
	readonly level: LogLevel;
	readonly records: LogRecord[] = [];
	readonly lines: string[] = [];
	context: SinkContext | null = null;
	flushCount = 0;
	shutdownCount = 0;

	constructor(id = 'memory', level: LogLevel = 'debug') {
		this.id = id;
		this.level = level;
	}

	async init(context: SinkContext): Promise<void> {
		this.context = context;
	}

	async write(record: LogRecord, rendered: string): Promise<void> {
		this.records.push({ ...record, extra: new Map(record.extra) });
		this.lines.push(rendered);
	}

	async flush(): Promise<void> {
		this.flushCount++;
	}

	async shutdown(): Promise<void> {
		this.shutdownCount++;
	}
}

// ─── Failing Sink ─────────────────────────────────────────────────────────────

/**
 * Sink whose writes always reject, for exercising error isolation.
 */
export class FailingSink implements Sink {
	readonly id: string;
	readonly level: LogLevel = 'debug';
	attempts = 0;

	constructor(id = 'failing') {
		this.id = id;
	}

	async init(_context: SinkContext): Promise<void> {}

	async write(_record: LogRecord, _rendered: string): Promise<void> {
		this.attempts++;
		throw new Error(`${this.id} write failed`);
	}

	async flush(): Promise<void> {}

	async shutdown(): Promise<void> {}
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

/** Build a record with fixed defaults, for deterministic assertions */
export function makeRecord(overrides: Partial<LogRecord> = {}): LogRecord {
	return {
		...buildRecord({
			level: 'info',
			message: 'user signed in',
			name: 'app',
			timestamp: '2024-01-15T10:30:45.123Z',
		}),
		...overrides,
	};
}
