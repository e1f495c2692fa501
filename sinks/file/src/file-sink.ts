/**
 * File sink: appends one rendered line per record, rotating by size or time.
 *
 * Writes are synchronous so a record is on disk (or reported) by the time
 * the log call returns.
 */

import { closeSync, fstatSync, mkdirSync, openSync, statSync, writeSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import {
	type LogLevel,
	type LogRecord,
	type Sink,
	type SinkContext,
	DeliveryError,
	InvalidSettingError,
	MissingSettingError,
	toError,
} from '@logrelay/sdk';
import {
	type RotationPolicy,
	ROTATION_WHENS,
	needsSizeRotation,
	nextRolloverAt,
	periodMs,
	rotateBySize,
	rotateByTime,
} from './rotation.js';

export const DEFAULT_MAX_BYTES = 10 * 1024 * 1024;
export const DEFAULT_BACKUP_COUNT = 7;

export const DEFAULT_ROTATION: RotationPolicy = {
	type: 'size',
	maxBytes: DEFAULT_MAX_BYTES,
	backupCount: DEFAULT_BACKUP_COUNT,
};

export interface FileSinkOptions {
	/** Log file path; parent directories are created */
	path?: string;
	/** Minimum level written (default: debug) */
	level?: LogLevel;
	/** Rotation policy (default: 10 MiB, 7 backups) */
	rotation?: RotationPolicy;
	/** Clock for time rotation (tests) */
	now?: () => number;
}

function requireCount(name: string, value: number, min: number): void {
	if (!Number.isInteger(value) || value < min) {
		throw new InvalidSettingError(name, value, `expected an integer >= ${min}`);
	}
}

function validateRotation(rotation: RotationPolicy): void {
	requireCount('rotation.backupCount', rotation.backupCount, 0);
	if (rotation.type === 'size') {
		requireCount('rotation.maxBytes', rotation.maxBytes, 0);
		return;
	}
	if (!ROTATION_WHENS.includes(rotation.when)) {
		throw new InvalidSettingError('rotation.when', rotation.when, `expected one of ${ROTATION_WHENS.join(', ')}`);
	}
	requireCount('rotation.interval', rotation.interval, 1);
}

export class FileSink implements Sink {
	readonly id = 'file';
	readonly level: LogLevel;
	readonly path: string;
	readonly rotation: RotationPolicy;
	private readonly now: () => number;
	private context: SinkContext | null = null;
	private fd: number | null = null;
	private size = 0;
	private rolloverAt = 0;
	private closed = false;

	/**
	 * @throws MissingSettingError when no path is given
	 * @throws InvalidSettingError for a malformed rotation policy
	 */
	constructor(options: FileSinkOptions) {
		if (!options.path?.trim()) {
			throw new MissingSettingError('path');
		}
		this.path = resolve(options.path);
		this.level = options.level ?? 'debug';
		this.rotation = options.rotation ?? DEFAULT_ROTATION;
		this.now = options.now ?? Date.now;
		validateRotation(this.rotation);
	}

	async init(context: SinkContext): Promise<void> {
		this.context = context;
		this.open();
	}

	async write(record: LogRecord, rendered: string): Promise<void> {
		if (this.closed) {
			this.context?.reportError(new DeliveryError(this.id, 'Sink is shut down', { attempts: 0 }), record);
			return;
		}
		const line = `${rendered}\n`;
		const bytes = Buffer.byteLength(line);
		try {
			if (this.shouldRollover(bytes)) {
				this.rollover();
			}
			writeSync(this.ensureOpen(), line);
			this.size += bytes;
		} catch (err) {
			this.context?.reportError(toError(err), record);
		}
	}

	async flush(): Promise<void> {
		// Writes are synchronous: nothing buffered
	}

	async shutdown(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		this.close();
	}

	// ─── Internal ────────────────────────────────────────────────────────────

	private open(): number {
		mkdirSync(dirname(this.path), { recursive: true });
		const fd = openSync(this.path, 'a');
		this.fd = fd;
		this.size = fstatSync(fd).size;
		if (this.rotation.type === 'time' && this.rolloverAt === 0) {
			// An existing file's period starts at its last modification
			const from = this.size > 0 ? statSync(this.path).mtimeMs : this.now();
			this.rolloverAt = nextRolloverAt(this.rotation.when, this.rotation.interval, from);
		}
		return fd;
	}

	private ensureOpen(): number {
		return this.fd ?? this.open();
	}

	private close(): void {
		if (this.fd === null) return;
		closeSync(this.fd);
		this.fd = null;
	}

	private shouldRollover(lineBytes: number): boolean {
		this.ensureOpen();
		if (this.rotation.type === 'size') {
			// Without backups there is nowhere to roll over to: keep appending
			return this.rotation.backupCount > 0 && needsSizeRotation(this.size, lineBytes, this.rotation.maxBytes);
		}
		return this.now() >= this.rolloverAt;
	}

	private rollover(): void {
		this.close();
		const rotation = this.rotation;
		if (rotation.type === 'size') {
			rotateBySize(this.path, rotation.backupCount);
			this.open();
			return;
		}

		const now = this.now();
		rotateByTime(this.path, rotation, this.rolloverAt - periodMs(rotation.when, rotation.interval));
		this.rolloverAt = nextRolloverAt(rotation.when, rotation.interval, now);
		this.open();
	}
}
