#!/usr/bin/env node
import { loadConfigSource, PeripheralConfigSnapshot, readPeripheralConfig } from '../config/harnessConfig';
import { createStderrLogger, Logger } from '../diagnostics/logger';
import { formatErrorWithHint } from '../errors/labErrors';
import { BlenoHost, describeSession } from '../transport/blenoHost';
import { PeripheralRuntime, PeripheralSessionOptions } from './peripheralSession';
import { MathRandomSource, SeededRandomSource } from './randomSource';

const STATUS_INTERVAL_MS = 5000;

export function toSessionOptions(config: PeripheralConfigSnapshot, logger: Logger): PeripheralSessionOptions {
	return {
		profile: config.profile,
		notifyHz: config.notifyHz,
		defaultPayloadBytes: config.defaultPayloadBytes,
		backlogLimit: config.backlogLimit,
		phyProfile: config.phyProfile,
		opcodes: config.gatt.opcodes,
		random: config.seed === undefined ? new MathRandomSource() : new SeededRandomSource(config.seed),
		logger
	};
}

function waitForShutdown(runForS: number): Promise<string> {
	return new Promise<string>((resolve) => {
		const finish = (reason: string) => {
			process.off('SIGINT', onSigint);
			process.off('SIGTERM', onSigterm);
			clearTimeout(timer);
			resolve(reason);
		};
		const onSigint = () => finish('SIGINT');
		const onSigterm = () => finish('SIGTERM');
		process.on('SIGINT', onSigint);
		process.on('SIGTERM', onSigterm);
		const timer = runForS > 0 ? setTimeout(() => finish(`ran for ${runForS}s`), runForS * 1000) : undefined;
	});
}

export async function main(env: NodeJS.ProcessEnv = process.env): Promise<number> {
	const config = await readPeripheralConfig(await loadConfigSource(env));
	const logger = createStderrLogger(config.logLevel, 'peripheral');
	logger.info('Simulated peripheral starting', {
		name: config.name,
		preset: config.preset,
		notifyHz: config.notifyHz,
		payloadBytes: config.defaultPayloadBytes,
		backlogLimit: config.backlogLimit,
		seed: config.seed
	});

	const runtime = new PeripheralRuntime(toSessionOptions(config, logger));
	const host = new BlenoHost(runtime, {
		name: config.name,
		serviceUuid: config.gatt.serviceUuid,
		txUuid: config.gatt.txUuid,
		rxUuid: config.gatt.rxUuid,
		rssiUuid: config.gatt.rssiUuid,
		logger: logger.child('gatt')
	});

	await host.start();
	const status = setInterval(() => {
		logger.info('Status', describeSession(runtime.getSession()));
	}, STATUS_INTERVAL_MS);

	try {
		const reason = await waitForShutdown(config.runForS);
		logger.info('Shutting down', { reason });
	} finally {
		clearInterval(status);
		await host.stop();
	}
	return 0;
}

if (require.main === module) {
	void main().then(
		(code) => {
			process.exitCode = code;
		},
		(error: unknown) => {
			console.error(`[PERIPHERAL] ${formatErrorWithHint(error)}`);
			process.exitCode = 1;
		}
	);
}
