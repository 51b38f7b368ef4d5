#!/usr/bin/env node
import { ConnectionManager } from '../client/connectionManager';
import {
	ConfigSource,
	loadConfigSource,
	readPeripheralConfig,
	readSweepConfig,
	SweepConfigSnapshot
} from '../config/harnessConfig';
import { createStderrLogger, Logger } from '../diagnostics/logger';
import { formatErrorWithHint } from '../errors/labErrors';
import { PeripheralRuntime } from '../mock/peripheralSession';
import { toSessionOptions } from '../mock/runPeripheral';
import { Clock, SystemClock } from '../scheduler/clock';
import type { BleLinkFactory } from '../transport/bleLink';
import { createLoopbackLinkFactory } from '../transport/loopbackLink';
import { createNobleLinkFactory } from '../transport/nobleLink';
import { LinkTrialExecutor } from './trialExecutor';
import { SweepPlan, SweepResult, TrialOrchestrator } from './trialOrchestrator';

export function toSweepPlan(config: SweepConfigSnapshot): SweepPlan {
	return {
		address: config.target,
		adapter: config.adapter,
		scenarios: config.scenarios,
		phys: config.phys,
		payloads: config.payloads,
		repeats: config.repeats,
		resume: config.resume,
		throughput: config.throughput,
		latency: config.latency.enabled,
		rssi: config.rssi.enabled,
		lockDir: config.lockDir,
		lockWaitMs: config.lockWaitMs,
		resultsDir: config.resultsDir,
		outDir: config.outDir,
		manifestDir: config.manifestDir,
		args: {
			note: config.note,
			mtu: config.connection.mtu,
			connect_timeout_s: config.connection.timeoutS,
			connect_attempts: config.connection.maxAttempts,
			connect_retry_delay_s: config.connection.retryDelayS,
			duration_s: config.durationS,
			resume: config.resume
		}
	};
}

/**
 * Radio link factory for the configured transport. `loopback` runs the simulated
 * peripheral in this process, configured from the same source.
 */
export async function createLinkFactory(
	config: SweepConfigSnapshot,
	cfg: ConfigSource,
	clock: Clock,
	logger: Logger
): Promise<BleLinkFactory> {
	if (config.transport === 'loopback') {
		const peripheral = await readPeripheralConfig(cfg);
		const runtime = new PeripheralRuntime({ ...toSessionOptions(peripheral, logger), clock });
		return createLoopbackLinkFactory(runtime, { clock, logger });
	}
	return createNobleLinkFactory({
		serviceUuid: config.gatt.serviceUuid,
		txUuid: config.gatt.txUuid,
		rxUuid: config.gatt.rxUuid,
		logger
	});
}

export function sweepExitCode(result: SweepResult): number {
	if (result.interrupted) {
		return 130;
	}
	return result.manifest.status === 'completed' ? 0 : 1;
}

export async function main(env: NodeJS.ProcessEnv = process.env): Promise<number> {
	const cfg = await loadConfigSource(env);
	const config = readSweepConfig(cfg);
	const logger = createStderrLogger(config.logLevel, 'sweep');
	const clock = new SystemClock();
	const manager = new ConnectionManager({
		factory: await createLinkFactory(config, cfg, clock, logger.child('link')),
		clock,
		logger: logger.child('connect')
	});
	const orchestrator = new TrialOrchestrator({
		executor: new LinkTrialExecutor({ config, manager, clock, logger }),
		logger
	});

	const controller = new AbortController();
	const onSigint = () => {
		logger.warn('Interrupt received; finishing the current step');
		controller.abort();
	};
	process.on('SIGINT', onSigint);

	try {
		const result = await orchestrator.run(toSweepPlan(config), controller.signal);
		for (const error of result.manifest.errors) {
			logger.warn(error);
		}
		logger.info('Manifest written', { path: result.manifestPath, status: result.manifest.status });
		return sweepExitCode(result);
	} finally {
		process.off('SIGINT', onSigint);
		await manager.disconnect();
	}
}

if (require.main === module) {
	void main().then(
		(code) => {
			process.exitCode = code;
		},
		(error: unknown) => {
			console.error(`[SWEEP] ${formatErrorWithHint(error)}`);
			process.exitCode = 1;
		}
	);
}
