/**
 * logrelay send: Emit one record through the configured pipeline.
 *
 * Configures the pipeline, logs the message, waits for delivery and
 * shuts down. Sink failures are printed and set exit code 1.
 */

import { type SinkErrorEvent, configure, getLogger, uninstall } from '@logrelay/core';
import { type LogLevel, InvalidSettingError, LOG_LEVELS, levelName, parseLevel, toError } from '@logrelay/sdk';
import type { Command } from 'commander';
import { parseExtraPairs } from '../describe.js';
import * as output from '../output.js';

interface SendOptions {
	level: string;
	name: string;
	extra: string[];
}

function collect(value: string, previous: string[]): string[] {
	return [...previous, value];
}

function requireLevel(raw: string): LogLevel {
	const level = parseLevel(raw);
	if (level === undefined) {
		throw new InvalidSettingError('--level', raw, `expected one of ${LOG_LEVELS.map(levelName).join(', ')}`);
	}
	return level;
}

export function registerSendCommand(program: Command): void {
	program
		.command('send <message>')
		.description('Send one log record through the configured sinks')
		.option('-l, --level <level>', 'Record level', 'info')
		.option('-n, --name <name>', 'Logger name', 'logrelay')
		.option('-e, --extra <key=value>', 'Extra field (repeatable)', collect, [])
		.action(async (message: string, opts: SendOptions, cmd: Command) => {
			const globalOpts = cmd.parent?.opts<{ config?: string }>() ?? {};
			const failures: SinkErrorEvent[] = [];
			const spin = output.spinner('Sending record...');
			try {
				const level = requireLevel(opts.level);
				const extra = parseExtraPairs(opts.extra);
				const pipeline = await configure({ configFile: globalOpts.config });
				pipeline.on('sink_error', (event: SinkErrorEvent) => failures.push(event));

				getLogger(opts.name).log(level, message, extra);
				await pipeline.flush();
				await uninstall();

				if (failures.length > 0) {
					spin.fail('Record was not delivered everywhere');
					for (const failure of failures) {
						output.error(`${failure.sink}: ${failure.error.message}`);
					}
					process.exitCode = 1;
				} else {
					spin.succeed(`${output.levelBadge(level)} record sent to ${pipeline.sinkIds.join(', ')}`);
				}

				if (output.isJsonMode()) {
					output.json({
						ok: failures.length === 0,
						sinks: pipeline.sinkIds,
						failures: failures.map((f) => ({ sink: f.sink, error: f.error.message })),
					});
				}
			} catch (err) {
				spin.fail('Send failed');
				output.fail(toError(err));
			}
		});
}
