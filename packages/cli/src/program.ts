/**
 * Command tree for the logsink CLI.
 */

import { Command } from 'commander';
import { registerLockCommand } from './commands/lock.js';
import { registerVersionCommand } from './commands/version.js';
import { registerWriteCommand } from './commands/write.js';
import * as output from './output.js';

interface GlobalOptions {
	json?: boolean;
	quiet?: boolean;
	verbose?: boolean;
}

export function createProgram(): Command {
	const program = new Command();

	program
		.name('logsink')
		.description('Append-only log file writers')
		.option('--json', 'Machine-readable output')
		.option('-q, --quiet', 'Only print errors')
		.option('-v, --verbose', 'Show writer diagnostics down to debug level')
		.hook('preAction', (thisCommand) => {
			const opts: GlobalOptions = thisCommand.opts();
			output.setJsonMode(opts.json === true);
			output.setQuietMode(opts.quiet === true);
			output.setVerboseMode(opts.verbose === true);
		});

	registerWriteCommand(program);
	registerLockCommand(program);
	registerVersionCommand(program);

	return program;
}
