import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { Logger, NoopLogger } from '../diagnostics/logger';
import { LockContentionError } from '../errors/labErrors';
import { isMissingFileError } from '../report/csvTable';
import { Clock, SystemClock } from '../scheduler/clock';

export const DEFAULT_LOCK_POLL_MS = 250;

export interface AdapterLockOptions {
	lockDir: string;
	/** Adapter identifier (BLE address or adapter name) the lock is scoped to. */
	adapter: string;
	/** 0 fails fast; otherwise poll until this much time has passed. */
	waitMs?: number;
	pollMs?: number;
	clock?: Clock;
	logger?: Logger;
	pid?: number;
	isProcessAlive?: (pid: number) => boolean;
}

interface LockContent {
	pid: number;
	host: string;
	acquiredAt: string;
}

export function lockFilePath(lockDir: string, adapter: string): string {
	return path.join(lockDir, `${adapter.replace(/[^A-Za-z0-9_.-]/g, '_')}.lock`);
}

function isErrorCode(error: unknown, code: string): boolean {
	return error instanceof Error && 'code' in error && error.code === code;
}

export function isProcessAlive(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch (error) {
		// EPERM: the process exists but belongs to someone else.
		return !isErrorCode(error, 'ESRCH');
	}
}

function parseLockContent(text: string): Partial<LockContent> {
	try {
		const parsed: unknown = JSON.parse(text);
		if (typeof parsed !== 'object' || parsed === null) {
			return {};
		}
		const pid = 'pid' in parsed && typeof parsed.pid === 'number' ? parsed.pid : undefined;
		const host = 'host' in parsed && typeof parsed.host === 'string' ? parsed.host : undefined;
		return { pid, host };
	} catch {
		return {};
	}
}

/**
 * Cross-process exclusive lock on one radio adapter: a file created with `O_EXCL`
 * holding the owner's pid. A lock left behind by a dead process on this host is
 * reclaimed.
 */
export class AdapterLock {
	public readonly filePath: string;
	private readonly waitMs: number;
	private readonly pollMs: number;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly pid: number;
	private readonly alive: (pid: number) => boolean;
	private held = false;

	public constructor(private readonly options: AdapterLockOptions) {
		this.filePath = lockFilePath(options.lockDir, options.adapter);
		this.waitMs = Math.max(0, options.waitMs ?? 0);
		this.pollMs = Math.max(1, options.pollMs ?? DEFAULT_LOCK_POLL_MS);
		this.clock = options.clock ?? new SystemClock();
		this.logger = options.logger ?? new NoopLogger();
		this.pid = options.pid ?? process.pid;
		this.alive = options.isProcessAlive ?? isProcessAlive;
	}

	public isHeld(): boolean {
		return this.held;
	}

	public async acquire(signal?: AbortSignal): Promise<void> {
		if (this.held) {
			return;
		}
		await fs.mkdir(this.options.lockDir, { recursive: true });
		const startedAt = this.clock.now();

		for (;;) {
			if (await this.tryCreate()) {
				this.held = true;
				this.logger.debug('Adapter lock acquired', { lock: this.filePath });
				return;
			}

			const holder = await this.readHolder();
			if (!holder) {
				// Released between our create and read.
				continue;
			}
			if (holder.pid !== undefined && holder.host === os.hostname() && !this.alive(holder.pid)) {
				this.logger.warn('Reclaiming stale adapter lock', { lock: this.filePath, pid: holder.pid });
				await this.reclaimStale(holder.pid);
				continue;
			}

			const waited = this.clock.now() - startedAt;
			if (waited >= this.waitMs) {
				const label = holder.pid !== undefined ? `pid ${holder.pid}${holder.host ? ` on ${holder.host}` : ''}` : undefined;
				throw new LockContentionError(this.filePath, label);
			}
			await this.clock.sleep(Math.min(this.pollMs, this.waitMs - waited), signal);
		}
	}

	public async release(): Promise<void> {
		if (!this.held) {
			return;
		}
		this.held = false;
		await this.removeFile();
		this.logger.debug('Adapter lock released', { lock: this.filePath });
	}

	private async tryCreate(): Promise<boolean> {
		const content: LockContent = { pid: this.pid, host: os.hostname(), acquiredAt: new Date().toISOString() };
		let handle: fs.FileHandle;
		try {
			handle = await fs.open(this.filePath, 'wx');
		} catch (error) {
			if (isErrorCode(error, 'EEXIST')) {
				return false;
			}
			throw error;
		}
		try {
			await handle.writeFile(JSON.stringify(content), 'utf8');
		} finally {
			await handle.close();
		}
		return true;
	}

	private async readHolder(): Promise<Partial<LockContent> | undefined> {
		try {
			return parseLockContent(await fs.readFile(this.filePath, 'utf8'));
		} catch (error) {
			if (isMissingFileError(error)) {
				return undefined;
			}
			throw error;
		}
	}

	/**
	 * Parks the lock file under a name only this process uses, then deletes it if it still
	 * belongs to `stalePid`. A lock another contender created after our read is linked back.
	 */
	private async reclaimStale(stalePid: number): Promise<void> {
		const parked = `${this.filePath}.${this.pid}.${Date.now()}.stale`;
		try {
			await fs.rename(this.filePath, parked);
		} catch (error) {
			if (isMissingFileError(error)) {
				return;
			}
			throw error;
		}

		try {
			const parkedHolder = parseLockContent(await fs.readFile(parked, 'utf8'));
			if (parkedHolder.pid !== stalePid) {
				await fs.link(parked, this.filePath);
			}
		} catch (error) {
			if (!isErrorCode(error, 'EEXIST')) {
				throw error;
			}
			this.logger.warn('Adapter lock was taken while a fresh one was being restored', { lock: this.filePath });
		} finally {
			await fs.unlink(parked);
		}
	}

	private async removeFile(): Promise<void> {
		try {
			await fs.unlink(this.filePath);
		} catch (error) {
			if (!isMissingFileError(error)) {
				throw error;
			}
		}
	}
}
