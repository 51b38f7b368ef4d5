import assert from 'node:assert/strict';
import test from 'node:test';
import { CommandProcessor } from '../mock/commandProcessor';
import { FaultInjector } from '../mock/faultInjector';
import { FaultProfile, resolveFaultProfile } from '../mock/faultProfile';
import { NotificationScheduler } from '../mock/notificationScheduler';
import { ScriptedRandomSource } from '../mock/randomSource';
import { CommandOpcodes, encodeCommand } from '../protocol/controlCommand';
import { VirtualClock } from './testHelpers';

function createProcessor(overrides: Partial<FaultProfile> = {}, opcodes?: CommandOpcodes) {
	const clock = new VirtualClock();
	const values: Uint8Array[] = [];
	const injector = new FaultInjector(resolveFaultProfile('best', overrides), new ScriptedRandomSource([]), {
		baseIntervalMs: 25
	});
	const scheduler = new NotificationScheduler({
		sink: {
			notify: (value) => {
				values.push(value);
				return Promise.resolve();
			},
			disconnect: () => undefined
		},
		clock,
		injector,
		intervalMs: 25,
		defaultPayloadBytes: 20
	});
	const processor = new CommandProcessor({ scheduler, injector, opcodes });
	return { clock, scheduler, processor, values };
}

test('commandProcessor: reset, start and stop drive the scheduler', async () => {
	const { clock, scheduler, processor, values } = createProcessor();

	assert.equal(processor.handleWrite(encodeCommand({ kind: 'reset' })).status, 'applied');
	assert.equal(scheduler.getState(), 'armed');

	const started = processor.handleWrite(encodeCommand({ kind: 'start', payloadBytes: 60, packetCount: 0 }));
	assert.deepEqual(started, { status: 'applied', command: { kind: 'start', payloadBytes: 60, packetCount: 0 } });
	assert.equal(scheduler.getState(), 'streaming');
	assert.equal(values[0].length, 64);

	processor.handleWrite(encodeCommand({ kind: 'stop' }));
	assert.equal(scheduler.getState(), 'idle');
	await clock.run(scheduler.whenIdle());
	assert.deepEqual(processor.getCounters(), { applied: 3, ignored: 0, rejected: 0 });
});

test('commandProcessor: an empty write is ignored', () => {
	const { processor } = createProcessor();
	assert.deepEqual(processor.handleWrite(new Uint8Array()), { status: 'ignored', reason: 'empty' });
	assert.deepEqual(processor.getCounters(), { applied: 0, ignored: 1, rejected: 0 });
});

test('commandProcessor: unknown opcodes are rejected without touching the stream', () => {
	const { scheduler, processor } = createProcessor();
	scheduler.reset();

	const outcome = processor.handleWrite(Uint8Array.of(0x7f));
	assert.equal(outcome.status, 'rejected');
	if (outcome.status === 'rejected') {
		assert.equal(outcome.error.code, 'PROTOCOL_VIOLATION');
		assert.equal(outcome.error.message, 'Unknown command opcode 0x7f.');
	}
	assert.equal(scheduler.getState(), 'armed');
});

test('commandProcessor: a simulated missed write leaves the scheduler untouched', () => {
	const { scheduler, processor } = createProcessor({ commandIgnoreChance: 100 });
	assert.deepEqual(processor.handleWrite(encodeCommand({ kind: 'reset' })), { status: 'ignored', reason: 'fault' });
	assert.equal(scheduler.getState(), 'idle');
});

test('commandProcessor: start before reset is decoded but does not stream', () => {
	const { scheduler, processor, values } = createProcessor();
	assert.equal(processor.handleWrite(encodeCommand({ kind: 'start', payloadBytes: 20, packetCount: 5 })).status, 'applied');
	assert.equal(scheduler.getState(), 'idle');
	assert.equal(values.length, 0);
});

test('commandProcessor: configured opcodes replace the defaults', () => {
	const { scheduler, processor } = createProcessor({}, { start: 0x10, stop: 0x11, reset: 0x12 });
	assert.equal(processor.handleWrite(Uint8Array.of(0x03)).status, 'rejected');
	assert.equal(processor.handleWrite(Uint8Array.of(0x12)).status, 'applied');
	assert.equal(scheduler.getState(), 'armed');
});
