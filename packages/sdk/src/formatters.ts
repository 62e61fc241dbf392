/**
 * Stock formatters. Deployments normally bring their own.
 */

import type { TextFormatter } from './types.js';

/** Writes the entry verbatim followed by a newline. */
export const lineFormatter: TextFormatter<string> = {
	format(entry, output) {
		output.write(entry);
		output.write('\n');
	},
};

/** One JSON document per line. */
export const jsonLinesFormatter: TextFormatter<unknown> = {
	format(entry, output) {
		output.write(JSON.stringify(entry));
		output.write('\n');
	},
};
