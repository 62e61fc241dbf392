/**
 * Filesystem helpers shared by the writers.
 */

import { mkdir, stat } from 'node:fs/promises';
import { dirname } from 'node:path';

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && 'code' in err;
}

export function isNotFound(err: unknown): boolean {
	return isErrnoException(err) && err.code === 'ENOENT';
}

/** Create the destination's parent directory if it is missing. */
export async function prepareDestination(path: string): Promise<void> {
	await mkdir(dirname(path), { recursive: true });
}

/** True when the file does not exist or has zero length. */
export async function isMissingOrEmpty(path: string): Promise<boolean> {
	try {
		const info = await stat(path);
		return info.size === 0;
	} catch (err) {
		if (isNotFound(err)) return true;
		throw err;
	}
}
