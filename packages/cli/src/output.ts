/**
 * Terminal output for the logrelay CLI.
 *
 * Human output goes through chalk and is silenced by --quiet; --json
 * replaces it with one JSON document per command on stdout.
 */

import type { LogLevel } from '@logrelay/sdk';
import { levelName } from '@logrelay/sdk';
import chalk, { type ChalkInstance } from 'chalk';
import ora, { type Ora } from 'ora';

// ─── Mode ────────────────────────────────────────────────────────────────────

let jsonMode = false;
let quietMode = false;

export function setJsonMode(enabled: boolean): void {
	jsonMode = enabled;
}

export function setQuietMode(enabled: boolean): void {
	quietMode = enabled;
}

export function isJsonMode(): boolean {
	return jsonMode;
}

function humanOutput(): boolean {
	return !quietMode && !jsonMode;
}

// ─── Messages ────────────────────────────────────────────────────────────────

export function info(message: string): void {
	if (humanOutput()) console.log(message);
}

export function success(message: string): void {
	if (humanOutput()) console.log(chalk.green(`  ✓ ${message}`));
}

/** Printed in quiet mode too */
export function error(message: string): void {
	if (!jsonMode) console.error(chalk.red(`  ✗ ${message}`));
}

export function heading(text: string): void {
	if (humanOutput()) console.log(chalk.bold(text));
}

export function blank(): void {
	if (humanOutput()) console.log();
}

const LEVEL_STYLES: Record<LogLevel, ChalkInstance> = {
	debug: chalk.dim,
	info: chalk.cyan,
	warning: chalk.yellow,
	error: chalk.red,
	critical: chalk.bold.red,
};

/** Upper-case level name in its terminal colour */
export function levelBadge(level: LogLevel): string {
	return LEVEL_STYLES[level](levelName(level));
}

// ─── JSON ────────────────────────────────────────────────────────────────────

export function json(data: unknown): void {
	console.log(JSON.stringify(data, null, 2));
}

/**
 * Report a command failure: `{ ok: false, error }` in JSON mode, a red
 * line otherwise. Sets exit code 1.
 */
export function fail(err: Error): void {
	if (jsonMode) {
		json({ ok: false, error: { name: err.name, message: err.message } });
	}
	error(err.message);
	process.exitCode = 1;
}

// ─── Tables ──────────────────────────────────────────────────────────────────

export interface TableColumn<T> {
	header: string;
	key: keyof T & string;
	width?: number;
}

export function table<T extends { [K in keyof T]: string }>(columns: TableColumn<T>[], rows: readonly T[]): void {
	if (!humanOutput()) return;

	const widths = columns.map(
		(col) => col.width ?? rows.reduce((max, row) => Math.max(max, row[col.key].length), col.header.length) + 2,
	);
	const render = (cells: string[]): string =>
		cells
			.map((cell, i) => cell.padEnd(widths[i]))
			.join('')
			.trimEnd();

	console.log(chalk.dim(`  ${render(columns.map((col) => col.header))}`));
	for (const row of rows) {
		console.log(`  ${render(columns.map((col) => row[col.key]))}`);
	}
}

// ─── Spinner ─────────────────────────────────────────────────────────────────

/** Started on stderr, or silent when stdout is reserved for JSON or quiet */
export function spinner(text: string): Ora {
	if (!humanOutput()) {
		return ora({ text, isSilent: true });
	}
	return ora({ text, color: 'cyan', stream: process.stderr }).start();
}
