/**
 * logrelay check: Resolve and print the pipeline configuration.
 *
 * Exits 1 when the configuration cannot be resolved.
 */

import { loadConfig } from '@logrelay/core';
import { toError } from '@logrelay/sdk';
import type { Command } from 'commander';
import { describeConfig, toPublicConfig } from '../describe.js';
import * as output from '../output.js';

interface CheckOptions {
	strict?: boolean;
}

export function registerCheckCommand(program: Command): void {
	program
		.command('check')
		.description('Resolve the logging configuration and print it')
		.option('--strict', 'Require LOG_LEVEL (or level) to be set')
		.action((opts: CheckOptions, cmd: Command) => {
			const globalOpts = cmd.parent?.opts<{ config?: string }>() ?? {};
			try {
				const config = loadConfig({ configFile: globalOpts.config, strict: opts.strict });

				if (output.isJsonMode()) {
					output.json({ ok: true, config: toPublicConfig(config) });
					return;
				}

				output.heading(`logrelay: ${globalOpts.config ?? 'environment'}`);
				output.table(
					[
						{ header: 'SETTING', key: 'setting', width: 16 },
						{ header: 'VALUE', key: 'value' },
					],
					describeConfig(config),
				);
				output.blank();
				output.success('Configuration is valid');
			} catch (err) {
				output.fail(toError(err));
			}
		});
}
