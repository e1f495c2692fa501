/**
 * ANSI coloring for console output.
 */

import type { LogLevel } from '@logrelay/sdk';

// ─── ANSI Colors ──────────────────────────────────────────────────────────────

export const RESET = '\x1b[0m';
export const BOLD = '\x1b[1m';
export const DIM = '\x1b[2m';
export const RED = '\x1b[31m';
export const YELLOW = '\x1b[33m';

const LEVEL_COLORS: Record<LogLevel, string> = {
	debug: DIM,
	info: '',
	warning: YELLOW,
	error: RED,
	critical: `${BOLD}${RED}`,
};

/** Wrap a rendered line in its level's color. Info stays uncolored. */
export function colorize(line: string, level: LogLevel): string {
	const code = LEVEL_COLORS[level];
	return code ? `${code}${line}${RESET}` : line;
}
