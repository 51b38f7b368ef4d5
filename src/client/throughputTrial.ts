import { Logger, NoopLogger } from '../diagnostics/logger';
import { LinkLostError, toErrorMessage, TrialAbortedError } from '../errors/labErrors';
import type { CommandOpcodes } from '../protocol/controlCommand';
import type { Clock } from '../scheduler/clock';
import type { BleLink } from '../transport/bleLink';
import { NotificationChannel } from '../transport/notificationChannel';
import { CommandLogEntry, ControlWriter } from './controlWriter';
import { MetricsEngine, MetricsSummary, NotificationRecord } from './metricsEngine';

export const DEFAULT_SETTLE_MS = 100;

export interface ThroughputTrialOptions {
	payloadBytes: number;
	durationS: number;
	/** Stop collecting after this many packets; 0 collects for the full duration. */
	packetCount?: number;
	settleMs?: number;
	opcodes?: CommandOpcodes;
	clock: Clock;
	logger?: Logger;
	signal?: AbortSignal;
}

export interface ThroughputTrialResult {
	summary: MetricsSummary;
	records: readonly NotificationRecord[];
	commandLog: readonly CommandLogEntry[];
	commandErrors: number;
	linkLost: boolean;
	linkLostReason?: string;
}

interface Arrival {
	value: Uint8Array;
	arrivalMs: number;
}

/**
 * One throughput measurement on an open link: subscribe, Reset, settle, Start, collect
 * until the deadline, then Stop and unsubscribe. Arrivals at or after the deadline are
 * not counted. A link loss ends collection early with the data gathered so far.
 */
export async function runThroughputTrial(link: BleLink, options: ThroughputTrialOptions): Promise<ThroughputTrialResult> {
	const { clock, signal } = options;
	const logger = options.logger ?? new NoopLogger();
	const packetLimit = Math.max(0, Math.floor(options.packetCount ?? 0));
	const channel = new NotificationChannel<Arrival>(clock);
	const engine = new MetricsEngine({ expectedPayloadBytes: options.payloadBytes, expectedFirstSequence: 0 });
	const writer = new ControlWriter(link, options.opcodes, logger);
	let linkLostReason: string | undefined;

	const detachDisconnect = link.onDisconnect((reason) => {
		linkLostReason = reason;
		channel.close(new LinkLostError(reason));
	});

	const measure = async (): Promise<void> => {
		await link.subscribe((value) => {
			channel.push({ value, arrivalMs: clock.now() });
		});
		await writer.send({ kind: 'reset' });
		await clock.sleep(options.settleMs ?? DEFAULT_SETTLE_MS, signal);
		channel.clear();

		const startedAt = clock.now();
		const deadline = startedAt + options.durationS * 1000;
		engine.markStart(startedAt);
		await writer.send({ kind: 'start', payloadBytes: options.payloadBytes, packetCount: packetLimit });

		while (clock.now() < deadline) {
			if (packetLimit > 0 && engine.packetCount >= packetLimit) {
				break;
			}
			let arrival: Arrival | undefined;
			try {
				arrival = await channel.next(deadline - clock.now(), signal);
			} catch (error) {
				if (error instanceof LinkLostError) {
					break;
				}
				throw error;
			}
			if (!arrival || arrival.arrivalMs >= deadline) {
				break;
			}
			engine.record(arrival.value, arrival.arrivalMs);
		}
		engine.markEnd(Math.min(clock.now(), deadline));
	};

	try {
		await measure();
	} catch (error) {
		// Writes fail once the link is gone; that is the link loss, not a command fault.
		if (linkLostReason === undefined || error instanceof TrialAbortedError) {
			throw error;
		}
	} finally {
		detachDisconnect();
		channel.close();
		if (link.isConnected()) {
			await writer.send({ kind: 'stop' }, false);
			try {
				await link.unsubscribe();
			} catch (error) {
				logger.debug('Unsubscribe failed', { error: toErrorMessage(error) });
			}
		}
	}

	if (linkLostReason !== undefined) {
		logger.warn('Link lost mid-stream; keeping partial data', { reason: linkLostReason, packets: engine.packetCount });
	}

	return {
		summary: engine.summary(),
		records: engine.getRecords(),
		commandLog: writer.log,
		commandErrors: writer.commandErrors,
		linkLost: linkLostReason !== undefined,
		linkLostReason
	};
}
