import { Logger, NoopLogger } from '../diagnostics/logger';
import { LinkLostError, toErrorMessage, TrialAbortedError } from '../errors/labErrors';
import type { CommandOpcodes } from '../protocol/controlCommand';
import { decodeNotification } from '../protocol/throughputPacket';
import type { Clock } from '../scheduler/clock';
import type { BleLink } from '../transport/bleLink';
import { NotificationChannel } from '../transport/notificationChannel';
import { CommandLogEntry, ControlWriter } from './controlWriter';
import { LatencyAccumulator, LatencySummary } from './metricsEngine';
import { DEFAULT_SETTLE_MS } from './throughputTrial';

export type LatencyMode = 'start' | 'trigger';

export const LATENCY_MODES: readonly LatencyMode[] = ['start', 'trigger'];

export interface LatencyTrialOptions {
	payloadBytes: number;
	iterations: number;
	mode: LatencyMode;
	/** Start count in `start` mode; `trigger` always asks for one packet. */
	packetCount?: number;
	timeoutS: number;
	interDelayS: number;
	settleMs?: number;
	opcodes?: CommandOpcodes;
	clock: Clock;
	logger?: Logger;
	signal?: AbortSignal;
}

export interface LatencySample {
	[column: string]: string | number;
	iteration: number;
	mode: LatencyMode;
	start_time: string;
	notification_time: string;
	latency_s: number;
	seq: number;
	dut_ts: number;
}

export const LATENCY_SAMPLE_COLUMNS = [
	'iteration',
	'mode',
	'start_time',
	'notification_time',
	'latency_s',
	'seq',
	'dut_ts'
] as const;

export interface LatencyTrialResult {
	summary: LatencySummary;
	samples: readonly LatencySample[];
	commandLog: readonly CommandLogEntry[];
	commandErrors: number;
	linkLost: boolean;
}

/**
 * Start-to-first-notification latency, one Reset/Start/Stop cycle per iteration. A
 * timed-out iteration is logged with `latency_s` equal to the timeout and counted
 * separately; the remaining iterations still run.
 */
export async function runLatencyTrial(link: BleLink, options: LatencyTrialOptions): Promise<LatencyTrialResult> {
	const { clock, signal } = options;
	const logger = options.logger ?? new NoopLogger();
	const channel = new NotificationChannel<{ value: Uint8Array; arrivalMs: number }>(clock);
	const writer = new ControlWriter(link, options.opcodes, logger);
	const accumulator = new LatencyAccumulator();
	const samples: LatencySample[] = [];
	const timeoutMs = options.timeoutS * 1000;
	const requested = options.mode === 'trigger' ? 1 : Math.max(0, Math.floor(options.packetCount ?? 0));
	let linkLost = false;

	const detachDisconnect = link.onDisconnect((reason) => {
		linkLost = true;
		channel.close(new LinkLostError(reason));
	});

	try {
		await link.subscribe((value) => {
			channel.push({ value, arrivalMs: clock.now() });
		});

		try {
			for (let iteration = 1; iteration <= options.iterations && !linkLost; iteration += 1) {
				channel.clear();
				await writer.send({ kind: 'reset' });
				await clock.sleep(options.settleMs ?? DEFAULT_SETTLE_MS, signal);
				channel.clear();

				const startTime = new Date().toISOString();
				const startedAt = clock.now();
				await writer.send({ kind: 'start', payloadBytes: options.payloadBytes, packetCount: requested });

				let arrival: { value: Uint8Array; arrivalMs: number } | undefined;
				try {
					arrival = await channel.next(timeoutMs, signal);
				} catch (error) {
					if (error instanceof LinkLostError) {
						break;
					}
					throw error;
				}

				if (arrival) {
					const latencyS = (arrival.arrivalMs - startedAt) / 1000;
					const decoded = decodeNotification(arrival.value);
					accumulator.addSample(latencyS);
					samples.push({
						iteration,
						mode: options.mode,
						start_time: startTime,
						notification_time: new Date().toISOString(),
						latency_s: latencyS,
						seq: decoded?.sequence ?? -1,
						dut_ts: decoded?.timestamp ?? -1
					});
				} else {
					accumulator.addTimeout();
					samples.push({
						iteration,
						mode: options.mode,
						start_time: startTime,
						notification_time: 'timeout',
						latency_s: options.timeoutS,
						seq: -1,
						dut_ts: -1
					});
					logger.info('Latency iteration timed out', { iteration, timeoutS: options.timeoutS });
				}

				await writer.send({ kind: 'stop' }, false);
				await clock.sleep(options.interDelayS * 1000, signal);
			}
		} catch (error) {
			// Writes fail once the link is gone; the iterations already measured stand.
			if (!linkLost || error instanceof TrialAbortedError) {
				throw error;
			}
			logger.info('Link lost during latency trial', { error: toErrorMessage(error) });
		}
	} finally {
		detachDisconnect();
		channel.close();
		if (link.isConnected()) {
			try {
				await link.unsubscribe();
			} catch (error) {
				logger.debug('Unsubscribe failed', { error: toErrorMessage(error) });
			}
		}
	}

	return {
		summary: accumulator.summary(),
		samples,
		commandLog: writer.log,
		commandErrors: writer.commandErrors,
		linkLost
	};
}
