/**
 * logsink lock — Show the cross-process lock used for a file in mutex mode.
 */

import { NamedLock } from '@logsink/core';
import type { Command } from 'commander';
import * as output from '../output.js';

export function registerLockCommand(program: Command): void {
	program
		.command('lock')
		.description('Show the shared lock for a file')
		.argument('<file>', 'Destination file')
		.option('--lock-directory <dir>', 'Directory for lock files')
		.action(async (file: string, opts: { lockDirectory?: string }) => {
			try {
				const state = await NamedLock.forPath(file, { directory: opts.lockDirectory }).inspect();

				if (output.isJsonMode()) {
					output.json(state);
					return;
				}

				output.field('Name:', state.name);
				output.field('File:', state.file);
				if (state.holder === null) {
					output.field('Holder:', 'none');
					return;
				}
				const status = state.alive ? 'alive' : 'abandoned';
				output.field('Holder:', `pid ${state.holder.pid} on ${state.holder.hostname} (${status})`);
				output.field('Since:', state.holder.acquiredAt);
			} catch (err) {
				output.error(`Could not inspect lock: ${output.describeError(err)}`);
				process.exitCode = 1;
			}
		});
}
