import assert from 'node:assert/strict';
import test from 'node:test';
import { TrialAbortedError } from '../errors/labErrors';
import { linkAbort, SystemClock, withDeadline } from '../scheduler/clock';
import { VirtualClock } from './testHelpers';

test('clock: withDeadline returns the value when the operation wins', async () => {
	const clock = new VirtualClock();
	const outcome = await withDeadline(clock, 1000, Promise.resolve(42));
	assert.deepEqual(outcome, { timedOut: false, value: 42 });
	assert.equal(clock.pendingTimers, 0);
});

test('clock: withDeadline times out and ignores a late rejection', async () => {
	const clock = new VirtualClock();
	let rejectLate: (error: Error) => void = () => undefined;
	const operation = new Promise<number>((_resolve, reject) => {
		rejectLate = reject;
	});

	const outcome = await clock.run(withDeadline(clock, 500, operation));
	assert.deepEqual(outcome, { timedOut: true });
	assert.equal(clock.now(), 500);
	rejectLate(new Error('late'));
	await assert.rejects(operation, /late/);
});

test('clock: withDeadline propagates operation errors', async () => {
	const clock = new VirtualClock();
	await assert.rejects(withDeadline(clock, 500, Promise.reject(new Error('connect refused'))), /connect refused/);
});

test('clock: withDeadline rejects once the caller aborts', async () => {
	const clock = new VirtualClock();
	const controller = new AbortController();
	const pending = withDeadline(clock, 500, new Promise<number>(() => undefined), controller.signal);
	controller.abort();
	await assert.rejects(pending, TrialAbortedError);
});

test('clock: linkAbort forwards until detached', () => {
	const source = new AbortController();
	const first = new AbortController();
	const second = new AbortController();
	linkAbort(source.signal, first);
	const detach = linkAbort(source.signal, second);
	detach();
	source.abort();
	assert.equal(first.signal.aborted, true);
	assert.equal(second.signal.aborted, false);

	const late = new AbortController();
	linkAbort(source.signal, late);
	assert.equal(late.signal.aborted, true);
});

test('clock: system sleep waits and can be aborted', async () => {
	const clock = new SystemClock();
	const before = clock.now();
	await clock.sleep(5);
	assert.ok(clock.now() - before >= 4);

	const controller = new AbortController();
	const pending = clock.sleep(10_000, controller.signal);
	controller.abort();
	await assert.rejects(pending, TrialAbortedError);
	await assert.rejects(clock.sleep(1, controller.signal), TrialAbortedError);
});

test('clock: a virtual run that rejects after a timer leaves no unhandled rejection', async () => {
	const unhandled: unknown[] = [];
	const onUnhandled = (reason: unknown) => {
		unhandled.push(reason);
	};
	process.on('unhandledRejection', onUnhandled);
	try {
		const clock = new VirtualClock();
		const work = clock.sleep(50).then(() => {
			throw new Error('late failure');
		});
		await assert.rejects(clock.run(work), /late failure/);
		await new Promise<void>((resolve) => setImmediate(resolve));
		assert.deepEqual(unhandled, []);
	} finally {
		process.off('unhandledRejection', onUnhandled);
	}
});
