/**
 * logrelay command line.
 */

import { Command } from 'commander';
import { registerCheckCommand } from './commands/check.js';
import { registerSendCommand } from './commands/send.js';
import { registerVersionCommand } from './commands/version.js';
import * as output from './output.js';

interface GlobalOptions {
	json?: boolean;
	quiet?: boolean;
}

export function createProgram(): Command {
	const program = new Command();
	program
		.name('logrelay')
		.description('Check logging configuration and send records through it')
		.option('-c, --config <path>', 'JSON or YAML config file (default: LOG_* environment variables)')
		.option('--json', 'Machine-readable output')
		.option('-q, --quiet', 'Only print errors')
		.hook('preAction', (thisCommand) => {
			const opts = thisCommand.opts<GlobalOptions>();
			output.setJsonMode(opts.json ?? false);
			output.setQuietMode(opts.quiet ?? false);
		});

	registerCheckCommand(program);
	registerSendCommand(program);
	registerVersionCommand(program);
	return program;
}

export { describeConfig, maskToken, parseExtraPairs, toPublicConfig, type ConfigRow } from './describe.js';
