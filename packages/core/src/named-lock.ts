/**
 * Named cross-process lock, backed by an exclusive-create lock file.
 *
 * Any process that computes the same name contends for the same file:
 *
 *   <directory>/<sha256(name)[0..32]>.lock   ← JSON LockRecord of the holder
 *
 * Acquisition polls `open(file, 'wx')` until it succeeds or the timeout
 * passes. A lock file left behind by a process that no longer exists is
 * inherited rather than waited on: the caller gets the lock, and learns
 * that it did so from the `inherited` status.
 *
 * Liveness is only knowable for holders on this host. A holder on another
 * host is always treated as alive.
 */

import { createHash, randomUUID } from 'node:crypto';
import { type FileHandle, mkdir, open, readFile, stat, unlink } from 'node:fs/promises';
import { hostname, tmpdir } from 'node:os';
import { dirname, join, resolve, sep } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { LogSinkError } from '@logsink/sdk';
import { isErrnoException, isNotFound } from './files.js';

export const LOCK_NAME_SUFFIX = '.logsink';
export const DEFAULT_POLL_INTERVAL_MS = 15;

/** A lock file that never received its record is abandoned after this long. */
const UNREADABLE_GRACE_MS = 2000;

// ─── Naming ───────────────────────────────────────────────────────────────────

/**
 * Deterministic lock identity for a destination file: the absolute path with
 * separators replaced by ':' plus a suffix.
 */
export function lockNameFor(path: string): string {
	return resolve(path).split(sep).join(':') + LOCK_NAME_SUFFIX;
}

// ─── Types ────────────────────────────────────────────────────────────────────

export interface LockRecord {
	pid: number;
	hostname: string;
	/** Distinguishes holders within one process */
	token: string;
	acquiredAt: string;
	name: string;
}

export type LockAcquisition =
	| { status: 'acquired' }
	| { status: 'inherited'; previous: LockRecord | null }
	| { status: 'timeout'; holder: LockRecord | null; waitedMs: number };

export interface LockState {
	name: string;
	file: string;
	/** null when the lock is free */
	holder: LockRecord | null;
	/** false when a lock file exists but its holder is gone */
	alive: boolean;
}

export interface NamedLockOptions {
	/** Default os.tmpdir() */
	directory?: string;
	pollIntervalMs?: number;
}

type HolderState =
	| { kind: 'free' }
	| { kind: 'live'; record: LockRecord | null }
	| { kind: 'abandoned'; record: LockRecord | null };

// ─── NamedLock ────────────────────────────────────────────────────────────────

export class NamedLock {
	readonly name: string;
	readonly file: string;
	private readonly pollIntervalMs: number;
	private readonly token = randomUUID();
	private held = false;

	constructor(name: string, options: NamedLockOptions = {}) {
		this.name = name;
		const digest = createHash('sha256').update(name).digest('hex').substring(0, 32);
		this.file = join(options.directory ?? tmpdir(), `${digest}.lock`);
		this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
	}

	static forPath(path: string, options?: NamedLockOptions): NamedLock {
		return new NamedLock(lockNameFor(path), options);
	}

	get isHeld(): boolean {
		return this.held;
	}

	/**
	 * Wait up to `timeoutMs` for the lock. Never throws for contention:
	 * a timeout is reported in the result. Filesystem errors propagate.
	 */
	async acquire(timeoutMs: number): Promise<LockAcquisition> {
		if (this.held) {
			throw new LogSinkError(`Lock ${this.name} is already held by this instance`);
		}

		const startedAt = Date.now();
		const deadline = startedAt + timeoutMs;
		await mkdir(dirname(this.file), { recursive: true });

		for (;;) {
			if (await this.tryCreate()) {
				return { status: 'acquired' };
			}

			const state = await this.readHolder();
			if (state.kind === 'abandoned') {
				await this.removeIfUnchanged(state.record);
				if (await this.tryCreate()) {
					return { status: 'inherited', previous: state.record };
				}
				// Another contender took it first; fall through to wait
			}

			const now = Date.now();
			if (now >= deadline) {
				return {
					status: 'timeout',
					holder: state.kind === 'live' ? state.record : null,
					waitedMs: now - startedAt,
				};
			}
			// Released between our attempt and the read: retry without sleeping
			if (state.kind === 'free') continue;
			await delay(Math.min(this.pollIntervalMs, deadline - now));
		}
	}

	/** Give the lock back. Only removes the file if it still carries this holder's token. */
	async release(): Promise<void> {
		if (!this.held) return;
		this.held = false;

		const current = await this.readRecord();
		if (current.kind === 'record' && current.record.token === this.token) {
			await unlinkIfPresent(this.file);
		}
	}

	/** Current holder of the lock, as seen from this process. */
	async inspect(): Promise<LockState> {
		const state = await this.readHolder();
		return {
			name: this.name,
			file: this.file,
			holder: state.kind === 'free' ? null : state.record,
			alive: state.kind === 'live',
		};
	}

	// ─── Internal ─────────────────────────────────────────────────────────────

	private async tryCreate(): Promise<boolean> {
		let handle: FileHandle;
		try {
			handle = await open(this.file, 'wx');
		} catch (err) {
			if (isErrnoException(err) && err.code === 'EEXIST') return false;
			throw err;
		}

		const record: LockRecord = {
			pid: process.pid,
			hostname: hostname(),
			token: this.token,
			acquiredAt: new Date().toISOString(),
			name: this.name,
		};
		try {
			await handle.writeFile(JSON.stringify(record), 'utf-8');
		} catch (err) {
			await handle.close();
			await unlinkIfPresent(this.file);
			throw err;
		}
		await handle.close();
		this.held = true;
		return true;
	}

	private async readHolder(): Promise<HolderState> {
		const current = await this.readRecord();
		switch (current.kind) {
			case 'missing':
				return { kind: 'free' };
			case 'unreadable':
				// Holder may still be writing its record; only an old file counts as abandoned
				return current.ageMs > UNREADABLE_GRACE_MS
					? { kind: 'abandoned', record: null }
					: { kind: 'live', record: null };
			case 'record':
				return isHolderAlive(current.record)
					? { kind: 'live', record: current.record }
					: { kind: 'abandoned', record: current.record };
		}
	}

	private async readRecord(): Promise<
		| { kind: 'missing' }
		| { kind: 'unreadable'; ageMs: number }
		| { kind: 'record'; record: LockRecord }
	> {
		let content: string;
		try {
			content = await readFile(this.file, 'utf-8');
		} catch (err) {
			if (isNotFound(err)) return { kind: 'missing' };
			throw err;
		}

		const record = parseLockRecord(content);
		if (record) return { kind: 'record', record };

		try {
			const info = await stat(this.file);
			return { kind: 'unreadable', ageMs: Date.now() - info.mtimeMs };
		} catch (err) {
			if (isNotFound(err)) return { kind: 'missing' };
			throw err;
		}
	}

	private async removeIfUnchanged(expected: LockRecord | null): Promise<void> {
		const current = await this.readRecord();
		if (current.kind === 'missing') return;
		const unchanged =
			expected === null
				? current.kind === 'unreadable'
				: current.kind === 'record' && current.record.token === expected.token;
		if (unchanged) {
			await unlinkIfPresent(this.file);
		}
	}
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function parseLockRecord(content: string): LockRecord | null {
	let value: unknown;
	try {
		value = JSON.parse(content);
	} catch {
		return null;
	}
	if (typeof value !== 'object' || value === null) return null;

	const fields = new Map<string, unknown>(Object.entries(value));
	const pid = fields.get('pid');
	const host = fields.get('hostname');
	const token = fields.get('token');
	const acquiredAt = fields.get('acquiredAt');
	const name = fields.get('name');
	if (
		typeof pid !== 'number' ||
		typeof host !== 'string' ||
		typeof token !== 'string' ||
		typeof acquiredAt !== 'string' ||
		typeof name !== 'string'
	) {
		return null;
	}
	return { pid, hostname: host, token, acquiredAt, name };
}

function isHolderAlive(record: LockRecord): boolean {
	if (record.hostname !== hostname()) return true;
	return isProcessAlive(record.pid);
}

export function isProcessAlive(pid: number): boolean {
	if (!Number.isInteger(pid) || pid <= 0) return false;
	try {
		process.kill(pid, 0);
		return true;
	} catch (err) {
		// EPERM: the process exists but belongs to someone else
		return isErrnoException(err) && err.code === 'EPERM';
	}
}

async function unlinkIfPresent(file: string): Promise<void> {
	try {
		await unlink(file);
	} catch (err) {
		if (!isNotFound(err)) throw err;
	}
}
