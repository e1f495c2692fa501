/**
 * Pipeline: level gate, filters, one rendering, fan-out to sinks.
 *
 *   const pipeline = new Pipeline({ level: 'info', format: 'json', sinks });
 *   await pipeline.init();
 *   pipeline.dispatch(record);
 *   await pipeline.shutdown();
 *
 * dispatch() is synchronous. Sinks that write synchronously have finished
 * when it returns; asynchronous writes are tracked and awaited by flush().
 * A failing filter or sink never reaches the caller: it is reported as a
 * `filter_error` or `sink_error` event.
 */

import { EventEmitter } from 'node:events';
import type { Filter, LogFormat, LogLevel, LogRecord, Sink } from '@logrelay/sdk';
import { isLevelEnabled, toError } from '@logrelay/sdk';
import { type Formatter, createFormatter } from './format.js';

const DIAGNOSTIC_PREFIX = '[logrelay]';

// ─── Options ──────────────────────────────────────────────────────────────────

export interface PipelineOptions {
	/** Root minimum level (default: info) */
	level?: LogLevel;
	/** Output format (default: json) */
	format?: LogFormat;
	/** Overrides `format` */
	formatter?: Formatter;
	/** Applied in order before rendering */
	filters?: Filter[];
	sinks?: Sink[];
}

// ─── Events ───────────────────────────────────────────────────────────────────

export interface SinkErrorEvent {
	sink: string;
	error: Error;
	record?: LogRecord;
}

export interface FilterErrorEvent {
	filter: string;
	error: Error;
	record: LogRecord;
}

export interface PipelineEvents {
	sink_error: [SinkErrorEvent];
	filter_error: [FilterErrorEvent];
}

// ─── Pipeline Class ───────────────────────────────────────────────────────────

export class Pipeline extends EventEmitter<PipelineEvents> {
	readonly level: LogLevel;
	readonly format: LogFormat;
	private readonly formatter: Formatter;
	private readonly filters: Filter[];
	private readonly sinks: Sink[];
	private readonly pending = new Set<Promise<void>>();
	private closing: Promise<void> | null = null;

	constructor(options: PipelineOptions = {}) {
		super();
		this.level = options.level ?? 'info';
		this.format = options.format ?? 'json';
		this.formatter = options.formatter ?? createFormatter(this.format);
		this.filters = [...(options.filters ?? [])];
		this.sinks = [...(options.sinks ?? [])];
	}

	get sinkIds(): string[] {
		return this.sinks.map((sink) => sink.id);
	}

	get filterIds(): string[] {
		return this.filters.map((filter) => filter.id);
	}

	get isClosed(): boolean {
		return this.closing !== null;
	}

	/**
	 * Attach every sink. If one fails, every sink is shut down, the
	 * pipeline is closed and the error propagates.
	 */
	async init(): Promise<void> {
		try {
			for (const sink of this.sinks) {
				await sink.init({
					reportError: (error, record) => this.reportSinkError(sink.id, error, record),
				});
			}
		} catch (err) {
			await this.shutdown();
			throw err;
		}
	}

	/** Whether a record at `level` would reach at least one sink */
	isEnabledFor(level: LogLevel): boolean {
		return isLevelEnabled(level, this.level) && this.sinks.some((sink) => isLevelEnabled(level, sink.level));
	}

	/**
	 * Filter, render and fan out one record. Records dispatched after
	 * shutdown are dropped.
	 */
	dispatch(record: LogRecord): void {
		if (this.closing !== null || !isLevelEnabled(record.level, this.level)) return;

		for (const filter of this.filters) {
			try {
				if (!filter.apply(record)) return;
			} catch (err) {
				this.reportFilterError(filter.id, toError(err), record);
				return;
			}
		}

		const rendered = this.formatter(record);
		for (const sink of this.sinks) {
			if (!isLevelEnabled(record.level, sink.level)) continue;
			try {
				this.track(
					sink.write(record, rendered).catch((err: unknown) => {
						this.reportSinkError(sink.id, toError(err), record);
					}),
				);
			} catch (err) {
				this.reportSinkError(sink.id, toError(err), record);
			}
		}
	}

	/** Wait for in-flight writes, then flush every sink */
	async flush(): Promise<void> {
		while (this.pending.size > 0) {
			await Promise.all([...this.pending]);
		}
		for (const sink of this.sinks) {
			try {
				await sink.flush();
			} catch (err) {
				this.reportSinkError(sink.id, toError(err));
			}
		}
	}

	/** Flush, then release every sink. Later calls return the first call's promise. */
	shutdown(): Promise<void> {
		if (this.closing === null) {
			this.closing = this.close();
		}
		return this.closing;
	}

	// ─── Internal ────────────────────────────────────────────────────────────

	private async close(): Promise<void> {
		await this.flush();
		for (const sink of this.sinks) {
			await this.shutdownSink(sink);
		}
	}

	private async shutdownSink(sink: Sink): Promise<void> {
		try {
			await sink.shutdown();
		} catch (err) {
			this.reportSinkError(sink.id, toError(err));
		}
	}

	private track(write: Promise<void>): void {
		const tracked: Promise<void> = write.finally(() => {
			this.pending.delete(tracked);
		});
		this.pending.add(tracked);
	}

	private reportSinkError(sink: string, error: Error, record?: LogRecord): void {
		const event: SinkErrorEvent = { sink, error, record };
		this.notify(() => this.emit('sink_error', event));
	}

	private reportFilterError(filter: string, error: Error, record: LogRecord): void {
		const event: FilterErrorEvent = { filter, error, record };
		this.notify(() => this.emit('filter_error', event));
	}

	/** Listeners run inside dispatch() and flush(); a throwing one is reported on stderr */
	private notify(emit: () => void): void {
		try {
			emit();
		} catch (err) {
			process.stderr.write(`${DIAGNOSTIC_PREFIX} Error listener failed: ${toError(err).message}\n`);
		}
	}
}
