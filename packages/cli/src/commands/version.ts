/**
 * logrelay version: CLI version, runtime and built-in plugins.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { builtinPlugins } from '@logrelay/core';
import type { Command } from 'commander';
import * as output from '../output.js';

const PACKAGE_JSON = fileURLToPath(new URL('../../package.json', import.meta.url));

export function readCliVersion(path: string = PACKAGE_JSON): string {
	const pkg: unknown = JSON.parse(readFileSync(path, 'utf-8'));
	if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
		return pkg.version;
	}
	return 'unknown';
}

export function registerVersionCommand(program: Command): void {
	program
		.command('version')
		.description('Print version, runtime and built-in sinks')
		.action(() => {
			const plugins = builtinPlugins();
			const report = {
				logrelay: readCliVersion(),
				node: process.version,
				platform: `${process.platform}-${process.arch}`,
				sinks: plugins.sinks,
				filters: plugins.filters,
			};

			if (output.isJsonMode()) {
				output.json(report);
				return;
			}

			output.heading(`logrelay ${report.logrelay}`);
			output.info(`  runtime  node ${report.node} (${report.platform})`);
			output.info(`  sinks    ${report.sinks.join(', ')}`);
			output.info(`  filters  ${report.filters.join(', ')}`);
		});
}
