/**
 * Console sink: one rendered line per record.
 *
 * Writes to process.stdout unless configured for stderr.
 */

import type { LogLevel, LogRecord, Sink, SinkContext } from '@logrelay/sdk';
import { toError } from '@logrelay/sdk';
import { colorize } from './format.js';

export type ConsoleStream = 'stdout' | 'stderr';

export interface ConsoleSinkOptions {
	/** Minimum level written (default: debug) */
	level?: LogLevel;
	/** Target stream (default: stdout) */
	stream?: ConsoleStream;
	/** Color lines by level (default: false) */
	color?: boolean;
}

export class ConsoleSink implements Sink {
	readonly id = 'console';
	readonly level: LogLevel;
	readonly stream: ConsoleStream;
	private readonly useColor: boolean;
	private context: SinkContext | null = null;

	constructor(options: ConsoleSinkOptions = {}) {
		this.level = options.level ?? 'debug';
		this.stream = options.stream ?? 'stdout';
		this.useColor = options.color ?? false;
	}

	async init(context: SinkContext): Promise<void> {
		this.context = context;
	}

	async write(record: LogRecord, rendered: string): Promise<void> {
		const line = this.useColor ? colorize(rendered, record.level) : rendered;
		try {
			process[this.stream].write(`${line}\n`);
		} catch (err) {
			this.context?.reportError(toError(err), record);
		}
	}

	async flush(): Promise<void> {
		// Console output is unbuffered: nothing to flush
	}

	async shutdown(): Promise<void> {
		// Standard streams stay open for the rest of the process
	}
}
