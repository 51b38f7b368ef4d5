import assert from 'node:assert/strict';
import test from 'node:test';
import { resolveFaultProfile } from '../mock/faultProfile';
import { GattHostLink, notifyIntervalMs, PeripheralRuntime, PeripheralSessionOptions } from '../mock/peripheralSession';
import { ScriptedRandomSource } from '../mock/randomSource';
import { RssiSynthesizer } from '../mock/rssiSynth';
import { encodeCommand } from '../protocol/controlCommand';
import { decodeNotification } from '../protocol/throughputPacket';
import { LoopbackLink } from '../transport/loopbackLink';
import { flushMicrotasks, VirtualClock } from './testHelpers';

class FakeHostLink implements GattHostLink {
	public readonly values: Uint8Array[] = [];
	public readonly disconnects: string[] = [];

	public constructor(private readonly hardwareRssi?: number) {}

	public notify(value: Uint8Array): Promise<void> {
		this.values.push(value);
		return Promise.resolve();
	}

	public disconnect(reason: string): void {
		this.disconnects.push(reason);
	}

	public readHardwareRssi(): number | undefined {
		return this.hardwareRssi;
	}
}

function sessionOptions(clock: VirtualClock, overrides: Partial<PeripheralSessionOptions> = {}): PeripheralSessionOptions {
	return {
		profile: resolveFaultProfile('best'),
		notifyHz: 40,
		defaultPayloadBytes: 20,
		random: new ScriptedRandomSource([]),
		clock,
		...overrides
	};
}

const RESET = encodeCommand({ kind: 'reset' });

test('peripheralSession: notify rate maps to a whole-millisecond interval', () => {
	assert.equal(notifyIntervalMs(40), 25);
	assert.equal(notifyIntervalMs(3), 333);
	assert.equal(notifyIntervalMs(5000), 1);
});

test('peripheralSession: packets reach the central only while it is subscribed', async () => {
	const clock = new VirtualClock();
	const runtime = new PeripheralRuntime(sessionOptions(clock));
	const host = new FakeHostLink();
	const session = runtime.openSession(host);

	session.handleWrite(RESET);
	session.handleWrite(encodeCommand({ kind: 'start', payloadBytes: 20, packetCount: 1 }));
	await clock.run(session.scheduler.whenIdle());
	assert.equal(session.getStats().transmitted, 1);
	assert.equal(host.values.length, 0);

	session.setSubscribed(true);
	session.handleWrite(RESET);
	session.handleWrite(encodeCommand({ kind: 'start', payloadBytes: 20, packetCount: 1 }));
	await clock.run(session.scheduler.whenIdle());
	assert.equal(host.values.length, 1);
	assert.equal(decodeNotification(host.values[0])?.sequence, 0);
});

test('peripheralSession: a new central replaces the previous session', () => {
	const clock = new VirtualClock();
	const runtime = new PeripheralRuntime(sessionOptions(clock));
	const first = runtime.openSession(new FakeHostLink());
	first.handleWrite(RESET);

	const second = runtime.openSession(new FakeHostLink());
	assert.equal(first.isDisposed(), true);
	assert.equal(first.handleWrite(RESET), undefined);
	assert.equal(runtime.getSession(), second);
	assert.equal(second.scheduler.getState(), 'idle');

	runtime.closeSession();
	assert.equal(runtime.getSession(), undefined);
	assert.equal(second.isDisposed(), true);
});

test('peripheralSession: a hardware RSSI reading wins over the synthesised one', () => {
	const clock = new VirtualClock();
	const runtime = new PeripheralRuntime(sessionOptions(clock));
	assert.equal(runtime.openSession(new FakeHostLink(-40.4)).readRssi(), -40);
	assert.equal(runtime.openSession(new FakeHostLink()).readRssi(), -55);
});

test('rssiSynth: wave, drift and clamping', () => {
	const wave = new RssiSynthesizer({ rssiBaseDbm: -55, rssiWaveAmplitude: 3, rssiWavePeriodS: 4, rssiDriftDbm: 0 }, 0);
	assert.equal(wave.read(0), -55);
	assert.equal(wave.read(1000), -52);
	assert.equal(wave.read(3000), -58);

	const drift = new RssiSynthesizer({ rssiBaseDbm: -55, rssiWaveAmplitude: 0, rssiWavePeriodS: 0, rssiDriftDbm: -1 }, 5000);
	assert.equal(drift.read(15_000), -65);
	assert.equal(drift.read(1000), -55);

	const weak = new RssiSynthesizer({ rssiBaseDbm: -200, rssiWaveAmplitude: 0, rssiWavePeriodS: 0, rssiDriftDbm: 0 }, 0);
	assert.equal(weak.read(0), -127);
	assert.equal(weak.read(0, Number.NaN), -127);
});

test('loopbackLink: notifications arrive asynchronously and in order', async () => {
	const clock = new VirtualClock();
	const runtime = new PeripheralRuntime(sessionOptions(clock));
	const link = new LoopbackLink('loopback', runtime, { clock });
	const received: number[] = [];

	await link.connect({ timeoutMs: 1000 });
	await link.subscribe((value) => received.push(decodeNotification(value)?.sequence ?? -1));
	await link.write(RESET);
	await link.write(encodeCommand({ kind: 'start', payloadBytes: 20, packetCount: 3 }));
	await flushMicrotasks();
	assert.deepEqual(received, [0]);

	const session = runtime.getSession();
	assert.ok(session);
	await clock.run(session.scheduler.whenIdle());
	await flushMicrotasks();
	assert.deepEqual(received, [0, 1, 2]);
	assert.equal(link.writes.length, 2);
});

test('loopbackLink: MTU requests are clamped to the ATT range', async () => {
	const clock = new VirtualClock();
	const link = new LoopbackLink('loopback', new PeripheralRuntime(sessionOptions(clock)), { clock });
	await link.connect({ timeoutMs: 1000 });
	assert.equal(await link.requestMtu(517), 247);
	assert.equal(await link.requestMtu(10), 23);
	await link.requestPhy('coded');
	assert.equal(link.negotiatedPhy, 'coded');
});

test('loopbackLink: only a peripheral-side drop notifies disconnect listeners', async () => {
	const clock = new VirtualClock();
	const runtime = new PeripheralRuntime(
		sessionOptions(clock, { profile: resolveFaultProfile('best', { disconnectChance: 100 }) })
	);
	const link = new LoopbackLink('loopback', runtime, { clock });
	const reasons: string[] = [];
	link.onDisconnect((reason) => reasons.push(reason));

	await link.connect({ timeoutMs: 1000 });
	await link.disconnect();
	assert.deepEqual(reasons, []);

	await link.connect({ timeoutMs: 1000 });
	await link.write(RESET);
	await link.write(encodeCommand({ kind: 'start', payloadBytes: 20, packetCount: 0 }));
	assert.deepEqual(reasons, ['simulated disconnect']);
	assert.equal(link.isConnected(), false);
	assert.equal(runtime.getSession(), undefined);
	await assert.rejects(link.write(RESET), /not connected/);
});

test('loopbackLink: a connect slower than the timeout fails', async () => {
	const clock = new VirtualClock();
	const link = new LoopbackLink('loopback', new PeripheralRuntime(sessionOptions(clock)), {
		clock,
		connectDelayMs: 500
	});
	await assert.rejects(clock.run(link.connect({ timeoutMs: 100 })), /timed out/);
	assert.equal(clock.now(), 100);
	assert.equal(link.isConnected(), false);
});
