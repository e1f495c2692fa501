/**
 * Rotation policies for the file sink.
 *
 * Size rotation keeps `<path>.1` … `<path>.<backupCount>`, newest first.
 * Time rotation renames the active file to `<path>.<period start>` with
 * the period start formatted in UTC, and prunes the oldest of those.
 */

import { existsSync, readdirSync, renameSync, rmSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';

export type RotationWhen = 's' | 'm' | 'h' | 'd' | 'midnight';

export const ROTATION_WHENS: readonly RotationWhen[] = ['s', 'm', 'h', 'd', 'midnight'];

export interface SizeRotation {
	type: 'size';
	/** Roll over before a write would reach this size; 0 disables rotation */
	maxBytes: number;
	/** Rotated files kept; 0 never rolls over */
	backupCount: number;
}

export interface TimeRotation {
	type: 'time';
	when: RotationWhen;
	/** Multiplier on the unit */
	interval: number;
	/** Rotated files kept; 0 keeps all */
	backupCount: number;
}

export type RotationPolicy = SizeRotation | TimeRotation;

const UNIT_MS: Record<RotationWhen, number> = {
	s: 1000,
	m: 60_000,
	h: 3_600_000,
	d: 86_400_000,
	midnight: 86_400_000,
};

// ─── Size ─────────────────────────────────────────────────────────────────────

/**
 * Whether appending `lineBytes` to a file of `currentSize` should roll
 * over first. An empty file never rolls over, so a single oversized
 * line still lands somewhere.
 */
export function needsSizeRotation(currentSize: number, lineBytes: number, maxBytes: number): boolean {
	if (maxBytes <= 0 || currentSize === 0) return false;
	return currentSize + lineBytes >= maxBytes;
}

/**
 * Shift numbered backups up by one and move the active file to `.1`.
 * The backup at `.backupCount` is overwritten.
 */
export function rotateBySize(path: string, backupCount: number): void {
	if (backupCount <= 0) return;
	for (let i = backupCount - 1; i >= 1; i--) {
		const from = `${path}.${i}`;
		if (existsSync(from)) {
			renameSync(from, `${path}.${i + 1}`);
		}
	}
	if (existsSync(path)) {
		renameSync(path, `${path}.1`);
	}
}

// ─── Time ─────────────────────────────────────────────────────────────────────

/** Length of one rotation period */
export function periodMs(when: RotationWhen, interval: number): number {
	return UNIT_MS[when] * interval;
}

/**
 * First rollover instant after `fromMs`. `midnight` aligns to the next
 * UTC midnight; other units count from `fromMs`.
 */
export function nextRolloverAt(when: RotationWhen, interval: number, fromMs: number): number {
	if (when !== 'midnight') {
		return fromMs + periodMs(when, interval);
	}
	const day = UNIT_MS.midnight;
	const nextMidnight = (Math.floor(fromMs / day) + 1) * day;
	return nextMidnight + (interval - 1) * day;
}

function pad(value: number): string {
	return String(value).padStart(2, '0');
}

/** UTC suffix for a rotated file, precise to the rotation unit */
export function rotationSuffix(when: RotationWhen, atMs: number): string {
	const d = new Date(atMs);
	const date = `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
	switch (when) {
		case 's':
			return `${date}_${pad(d.getUTCHours())}-${pad(d.getUTCMinutes())}-${pad(d.getUTCSeconds())}`;
		case 'm':
			return `${date}_${pad(d.getUTCHours())}-${pad(d.getUTCMinutes())}`;
		case 'h':
			return `${date}_${pad(d.getUTCHours())}`;
		case 'd':
		case 'midnight':
			return date;
	}
}

const SUFFIX_PATTERNS: Record<RotationWhen, RegExp> = {
	s: /^\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}$/,
	m: /^\d{4}-\d{2}-\d{2}_\d{2}-\d{2}$/,
	h: /^\d{4}-\d{2}-\d{2}_\d{2}$/,
	d: /^\d{4}-\d{2}-\d{2}$/,
	midnight: /^\d{4}-\d{2}-\d{2}$/,
};

/** Rotated files for `path`, oldest first */
export function listTimeBackups(path: string, when: RotationWhen): string[] {
	const dir = dirname(path);
	const prefix = `${basename(path)}.`;
	return readdirSync(dir)
		.filter((name) => name.startsWith(prefix) && SUFFIX_PATTERNS[when].test(name.slice(prefix.length)))
		.sort()
		.map((name) => join(dir, name));
}

/**
 * Move the active file aside under the suffix for `periodStartMs` and
 * delete the oldest backups beyond `backupCount`.
 */
export function rotateByTime(path: string, policy: TimeRotation, periodStartMs: number): void {
	if (existsSync(path)) {
		const target = `${path}.${rotationSuffix(policy.when, periodStartMs)}`;
		rmSync(target, { force: true });
		renameSync(path, target);
	}
	if (policy.backupCount <= 0) return;
	const backups = listTimeBackups(path, policy.when);
	for (const stale of backups.slice(0, Math.max(0, backups.length - policy.backupCount))) {
		rmSync(stale, { force: true });
	}
}
