#!/usr/bin/env node
/**
 * logsink CLI entry point.
 */

import { createProgram } from './program.js';
import { describeError } from './output.js';

createProgram()
	.parseAsync(process.argv)
	.catch((err: unknown) => {
		console.error(describeError(err));
		process.exit(1);
	});
