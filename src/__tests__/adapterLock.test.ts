import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import test from 'node:test';
import { LockContentionError, TrialAbortedError } from '../errors/labErrors';
import { AdapterLock, lockFilePath } from '../sweep/adapterLock';
import { createCapturingLogger, makeTempDir, removeDir, sleep, VirtualClock } from './testHelpers';

async function fileExists(filePath: string): Promise<boolean> {
	return fs.stat(filePath).then(
		() => true,
		() => false
	);
}

async function waitForTimer(clock: VirtualClock): Promise<void> {
	for (let round = 0; round < 500 && clock.pendingTimers === 0; round += 1) {
		await sleep(2);
	}
}

test('adapterLock: lock files are named after the adapter', () => {
	assert.equal(lockFilePath(path.join('locks'), 'AA:BB:CC:DD:EE:FF'), path.join('locks', 'AA_BB_CC_DD_EE_FF.lock'));
});

test('adapterLock: acquire writes the owner and release removes the file', async () => {
	const dir = await makeTempDir('lock');
	try {
		const lock = new AdapterLock({ lockDir: path.join(dir, 'locks'), adapter: 'hci0', pid: 4242 });
		await lock.acquire();
		assert.equal(lock.isHeld(), true);

		const content: unknown = JSON.parse(await fs.readFile(lock.filePath, 'utf8'));
		assert.ok(typeof content === 'object' && content !== null);
		assert.equal('pid' in content ? content.pid : undefined, 4242);
		assert.equal('host' in content ? content.host : undefined, os.hostname());

		await lock.release();
		assert.equal(lock.isHeld(), false);
		assert.equal(await fileExists(lock.filePath), false);
		await lock.release();
	} finally {
		await removeDir(dir);
	}
});

test('adapterLock: a live holder makes a second acquire fail fast', async () => {
	const dir = await makeTempDir('lock-contention');
	try {
		const holder = new AdapterLock({ lockDir: dir, adapter: 'hci0', pid: 111 });
		await holder.acquire();
		const contender = new AdapterLock({ lockDir: dir, adapter: 'hci0', pid: 222, isProcessAlive: () => true });

		await assert.rejects(contender.acquire(), (error: unknown) => {
			assert.ok(error instanceof LockContentionError);
			assert.equal(error.holder, `pid 111 on ${os.hostname()}`);
			assert.equal(error.lockPath, holder.filePath);
			return true;
		});
		assert.equal(contender.isHeld(), false);
		assert.equal(await fileExists(holder.filePath), true);
		await holder.release();
	} finally {
		await removeDir(dir);
	}
});

test('adapterLock: a lock left by a dead process on this host is reclaimed', async () => {
	const dir = await makeTempDir('lock-stale');
	try {
		const filePath = lockFilePath(dir, 'hci0');
		await fs.writeFile(filePath, JSON.stringify({ pid: 999_999, host: os.hostname(), acquiredAt: 'earlier' }), 'utf8');
		const { logger, lines } = createCapturingLogger();
		const lock = new AdapterLock({ lockDir: dir, adapter: 'hci0', pid: 333, isProcessAlive: () => false, logger });

		await lock.acquire();
		assert.equal(lock.isHeld(), true);
		assert.ok(lines.some((line) => line.includes('Reclaiming stale adapter lock')));
		await lock.release();
	} finally {
		await removeDir(dir);
	}
});

test('adapterLock: a lock from another host is never reclaimed', async () => {
	const dir = await makeTempDir('lock-remote');
	try {
		await fs.writeFile(lockFilePath(dir, 'hci0'), JSON.stringify({ pid: 5, host: 'other-host' }), 'utf8');
		const lock = new AdapterLock({ lockDir: dir, adapter: 'hci0', isProcessAlive: () => false });
		await assert.rejects(lock.acquire(), { code: 'LOCK_CONTENTION' });
	} finally {
		await removeDir(dir);
	}
});

test('adapterLock: waits for the holder to release within the wait budget', async () => {
	const dir = await makeTempDir('lock-wait');
	try {
		const clock = new VirtualClock();
		const holder = new AdapterLock({ lockDir: dir, adapter: 'hci0', pid: 1 });
		await holder.acquire();
		const waiter = new AdapterLock({
			lockDir: dir,
			adapter: 'hci0',
			pid: 2,
			waitMs: 1000,
			pollMs: 100,
			clock,
			isProcessAlive: () => true
		});

		const pending = waiter.acquire();
		await waitForTimer(clock);
		assert.equal(clock.pendingTimers, 1);
		await holder.release();
		await clock.advance(100);
		await pending;

		assert.equal(waiter.isHeld(), true);
		assert.equal(clock.now(), 100);
		await waiter.release();
	} finally {
		await removeDir(dir);
	}
});

test('adapterLock: gives up once the wait budget is spent', async () => {
	const dir = await makeTempDir('lock-timeout');
	try {
		const clock = new VirtualClock();
		const holder = new AdapterLock({ lockDir: dir, adapter: 'hci0', pid: 1 });
		await holder.acquire();
		const waiter = new AdapterLock({
			lockDir: dir,
			adapter: 'hci0',
			waitMs: 250,
			pollMs: 100,
			clock,
			isProcessAlive: () => true
		});

		await assert.rejects(clock.run(waiter.acquire()), LockContentionError);
		assert.equal(clock.now(), 250);
		await holder.release();
	} finally {
		await removeDir(dir);
	}
});

test('adapterLock: an abort ends the wait', async () => {
	const dir = await makeTempDir('lock-abort');
	try {
		const clock = new VirtualClock();
		const holder = new AdapterLock({ lockDir: dir, adapter: 'hci0', pid: 1 });
		await holder.acquire();
		const controller = new AbortController();
		const waiter = new AdapterLock({ lockDir: dir, adapter: 'hci0', waitMs: 10_000, clock, isProcessAlive: () => true });

		const pending = waiter.acquire(controller.signal);
		await waitForTimer(clock);
		controller.abort();
		await assert.rejects(pending, TrialAbortedError);
		await holder.release();
	} finally {
		await removeDir(dir);
	}
});

test('adapterLock: contenders reclaiming the same stale lock end with one holder', async () => {
	const dir = await makeTempDir('lock-stale-race');
	try {
		const filePath = lockFilePath(dir, 'hci0');
		await fs.writeFile(filePath, JSON.stringify({ pid: 111, host: os.hostname(), acquiredAt: 'earlier' }), 'utf8');
		const isAlive = (pid: number) => pid !== 111;
		const first = new AdapterLock({ lockDir: dir, adapter: 'hci0', pid: 201, isProcessAlive: isAlive });
		const second = new AdapterLock({ lockDir: dir, adapter: 'hci0', pid: 202, isProcessAlive: isAlive });

		const outcomes = await Promise.allSettled([first.acquire(), second.acquire()]);
		const fulfilled = outcomes.filter((outcome) => outcome.status === 'fulfilled');
		assert.equal(fulfilled.length, 1);
		const rejected = outcomes.find((outcome) => outcome.status === 'rejected');
		assert.ok(rejected?.status === 'rejected' && rejected.reason instanceof LockContentionError);

		const winner = first.isHeld() ? first : second;
		assert.equal(first.isHeld() !== second.isHeld(), true);
		const content: unknown = JSON.parse(await fs.readFile(filePath, 'utf8'));
		assert.ok(typeof content === 'object' && content !== null && 'pid' in content);
		assert.equal(content.pid, winner === first ? 201 : 202);
		assert.deepEqual(await fs.readdir(dir), ['hci0.lock']);
		await winner.release();
	} finally {
		await removeDir(dir);
	}
});
