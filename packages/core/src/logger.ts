/**
 * Logger facade.
 *
 * Loggers look up the active pipeline on every call, so a logger obtained
 * before configure() (or before a reconfigure) writes to whatever pipeline
 * is installed when it is used. With none installed, records are dropped.
 */

import type { Extras, LogLevel } from '@logrelay/sdk';
import { buildRecord, toExtras } from '@logrelay/sdk';
import { getActivePipeline } from './assemble.js';

export type LogFields = Record<string, unknown>;

export class Logger {
	readonly name: string;
	private readonly context: Extras;

	constructor(name = 'root', context: Extras = new Map()) {
		this.name = name;
		this.context = context;
	}

	debug(message: string, extra?: LogFields): void {
		this.log('debug', message, extra);
	}

	info(message: string, extra?: LogFields): void {
		this.log('info', message, extra);
	}

	warning(message: string, extra?: LogFields): void {
		this.log('warning', message, extra);
	}

	error(message: string, extra?: LogFields): void {
		this.log('error', message, extra);
	}

	critical(message: string, extra?: LogFields): void {
		this.log('critical', message, extra);
	}

	/** Log at error level with the thrown value's name, message and stack */
	exception(message: string, error: unknown, extra?: LogFields): void {
		this.log('error', message, extra, error);
	}

	log(level: LogLevel, message: string, extra?: LogFields, error?: unknown): void {
		const pipeline = getActivePipeline();
		if (!pipeline) return;

		const fields = new Map(this.context);
		for (const [key, value] of toExtras(extra)) {
			fields.set(key, value);
		}
		pipeline.dispatch(buildRecord({ level, message, name: this.name, extra: fields, error }));
	}

	isEnabledFor(level: LogLevel): boolean {
		return getActivePipeline()?.isEnabledFor(level) ?? false;
	}

	/**
	 * Child logger whose records carry `context` as extras. Fields passed
	 * to a log call win over bound ones.
	 */
	bind(context: LogFields): Logger {
		const merged = new Map(this.context);
		for (const [key, value] of toExtras(context)) {
			merged.set(key, value);
		}
		return new Logger(this.name, merged);
	}
}

const loggers = new Map<string, Logger>();

/** Named logger; the same instance is returned for the same name */
export function getLogger(name = 'root'): Logger {
	let logger = loggers.get(name);
	if (!logger) {
		logger = new Logger(name);
		loggers.set(name, logger);
	}
	return logger;
}
