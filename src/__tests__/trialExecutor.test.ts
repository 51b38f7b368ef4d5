import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import test from 'node:test';
import { ConnectionManager } from '../client/connectionManager';
import { createConfigSource, readSweepConfig } from '../config/harnessConfig';
import { FaultProfile, resolveFaultProfile } from '../mock/faultProfile';
import { PeripheralRuntime } from '../mock/peripheralSession';
import { RandomSource, ScriptedRandomSource } from '../mock/randomSource';
import { latencyPayloadBytes, LinkTrialExecutor } from '../sweep/trialExecutor';
import { createLoopbackLinkFactory } from '../transport/loopbackLink';
import { makeTempDir, removeDir, VirtualClock } from './testHelpers';

const NOW = new Date(Date.UTC(2026, 2, 4, 5, 6, 7));

function createExecutor(outDir: string, overrides: Partial<FaultProfile> = {}, random: RandomSource = new ScriptedRandomSource([])) {
	const config = readSweepConfig(
		createConfigSource(
			{},
			{
				sweep: { transport: 'loopback', durationS: 1, outDir, payloads: [20, 60], note: 'bench A' },
				latency: { iterations: 2, timeoutS: 1, interDelayS: 0 },
				rssi: { samples: 2, intervalS: 1 }
			}
		)
	);
	const clock = new VirtualClock();
	const runtime = new PeripheralRuntime({
		profile: resolveFaultProfile('best', overrides),
		notifyHz: 40,
		defaultPayloadBytes: 120,
		random,
		clock
	});
	const manager = new ConnectionManager({ factory: createLoopbackLinkFactory(runtime, { clock }), clock });
	const executor = new LinkTrialExecutor({ config, manager, clock, now: () => NOW });
	return { clock, runtime, manager, executor };
}

test('trialExecutor: latency trials use the largest swept payload within ATT limits', () => {
	assert.equal(latencyPayloadBytes([20, 60, 120]), 120);
	assert.equal(latencyPayloadBytes([]), 20);
	assert.equal(latencyPayloadBytes([300]), 244);
});

test('trialExecutor: a throughput trial becomes a table row with its raw logs', async () => {
	const dir = await makeTempDir('executor');
	try {
		const { clock, runtime, manager, executor } = createExecutor(dir);
		const signal = new AbortController().signal;

		const { row, linkLost } = await clock.run(
			executor.runThroughput({ scenario: 'baseline', phy: 'coded', payloadBytes: 20, trial: 1, signal })
		);
		const baseName = path.join(dir, '20260304_050607_ble_throughput_baseline_coded_p20_t1');
		assert.equal(linkLost, false);
		assert.deepEqual(row, {
			scenario: 'baseline',
			phy: 'coded',
			payload_bytes: 20,
			trial: 1,
			packets: 40,
			estimated_lost_packets: 0,
			duration_s: 1,
			throughput_kbps: 7.68,
			notification_rate_per_s: 40,
			connection_attempts_used: 1,
			command_errors: 0,
			log_json: `${baseName}.json`,
			log_csv: `${baseName}.csv`,
			notes: 'bench A'
		});
		assert.equal(manager.getLink(), undefined);
		assert.equal(runtime.getSession(), undefined);

		const csvLines = (await fs.readFile(row.log_csv, 'utf8')).trim().split('\n');
		assert.equal(csvLines[0], 'seq,dut_ts,arrival_ms,payload_len,raw_len,malformed');
		assert.equal(csvLines[1], '0,100,100,20,24,false');
		assert.equal(csvLines.length, 41);
	} finally {
		await removeDir(dir);
	}
});

test('trialExecutor: a dropped link is flagged and noted on the row', async () => {
	const dir = await makeTempDir('executor-lost');
	try {
		const { clock, executor } = createExecutor(dir, { disconnectChance: 50 }, new ScriptedRandomSource([0.9, 0.1]));
		const signal = new AbortController().signal;

		const { row, linkLost } = await clock.run(
			executor.runThroughput({ scenario: 'pocket', phy: 'auto', payloadBytes: 60, trial: 2, signal })
		);
		assert.equal(linkLost, true);
		assert.equal(row.packets, 1);
		assert.equal(row.notes, 'bench A; link lost: simulated disconnect');
	} finally {
		await removeDir(dir);
	}
});

test('trialExecutor: latency and RSSI trials produce their rows', async () => {
	const dir = await makeTempDir('executor-latency');
	try {
		const { clock, executor } = createExecutor(dir);
		const signal = new AbortController().signal;

		const latency = await clock.run(executor.runLatency({ scenario: 'baseline', phy: 'auto', trial: 1, signal }));
		assert.equal(latency.linkLost, false);
		assert.equal(latency.row.mode, 'start');
		assert.equal(latency.row.samples, 2);
		assert.equal(latency.row.timeouts, 0);
		assert.equal(latency.row.avg_latency_s, 0);
		assert.equal(latency.row.log_json, path.join(dir, '20260304_050607_ble_latency_baseline_auto_t1.json'));

		const rssi = await clock.run(executor.runRssi({ scenario: 'baseline', phy: 'auto', trial: 1, signal }));
		assert.deepEqual(
			{ ...rssi.row, log_json: path.basename(rssi.row.log_json), log_csv: path.basename(rssi.row.log_csv) },
			{
				scenario: 'baseline',
				phy: 'auto',
				trial: 1,
				samples_collected: 2,
				rssi_available: true,
				log_json: '20260304_050607_ble_rssi_baseline_auto_t1.json',
				log_csv: '20260304_050607_ble_rssi_baseline_auto_t1.csv',
				notes: 'bench A'
			}
		);

		const blob: unknown = JSON.parse(await fs.readFile(latency.row.log_json, 'utf8'));
		assert.ok(typeof blob === 'object' && blob !== null && 'metadata' in blob);
		const metadata = blob.metadata;
		assert.ok(typeof metadata === 'object' && metadata !== null && 'payload_bytes' in metadata);
		assert.equal(metadata.payload_bytes, 60);
	} finally {
		await removeDir(dir);
	}
});
