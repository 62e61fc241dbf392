/**
 * Variant selection — one writer per configuration, chosen by `mode`.
 */

import type { FileWriter, WriterConfig } from '@logsink/sdk';
import { InvalidArgumentError } from '@logsink/sdk';
import { AtomicAppendFileWriter } from './atomic-append-writer.js';
import { ExclusiveFileWriter } from './exclusive-writer.js';
import { MutexFileWriter } from './mutex-writer.js';

/**
 * Open the writer variant named by `config.mode`.
 *
 *   const writer = await createFileWriter({ mode: 'mutex', path, formatter });
 *   if (!(await writer.emitOrOverflow(entry))) roll();
 */
export function createFileWriter<TEntry>(config: WriterConfig<TEntry>): Promise<FileWriter<TEntry>> {
	if (config === undefined || config === null) {
		throw new InvalidArgumentError('config', 'writer configuration is required');
	}

	const mode: string = config.mode;
	switch (config.mode) {
		case 'exclusive':
			return ExclusiveFileWriter.open(config);
		case 'atomic-append':
			return AtomicAppendFileWriter.open(config);
		case 'mutex':
			return MutexFileWriter.open(config);
		default:
			throw new InvalidArgumentError('mode', `unknown writer mode "${mode}"`);
	}
}
