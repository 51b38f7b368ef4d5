import type { ConnectionManager } from '../client/connectionManager';
import type { ConnectionResult, ConnectOptions } from '../client/connectionTypes';
import { LATENCY_SAMPLE_COLUMNS, runLatencyTrial } from '../client/latencyTrial';
import { runRssiTrial, RSSI_RECORD_COLUMNS } from '../client/rssiTrial';
import { runThroughputTrial } from '../client/throughputTrial';
import type { SweepConfigSnapshot } from '../config/harnessConfig';
import { MIN_SWEEP_PAYLOAD } from '../config/harnessConfig';
import { Logger, NoopLogger } from '../diagnostics/logger';
import { MAX_PAYLOAD_BYTES } from '../protocol/throughputPacket';
import { writeTrialLogs } from '../report/trialLogs';
import type { Clock } from '../scheduler/clock';
import type { PhyMode } from '../transport/bleLink';
import {
	ExecutedTrial,
	joinNotes,
	LatencyRow,
	RssiRow,
	ThroughputRequest,
	ThroughputRow,
	TrialExecutor,
	TrialRequest
} from './sweepRecords';

interface PacketRow {
	[column: string]: number | boolean;
	seq: number;
	dut_ts: number;
	arrival_ms: number;
	payload_len: number;
	raw_len: number;
	malformed: boolean;
}

const PACKET_COLUMNS = ['seq', 'dut_ts', 'arrival_ms', 'payload_len', 'raw_len', 'malformed'] as const;

export interface LinkTrialExecutorOptions {
	config: SweepConfigSnapshot;
	manager: ConnectionManager;
	clock: Clock;
	logger?: Logger;
	/** Wall clock for log file names. */
	now?: () => Date;
}

function describeConnection(connection: ConnectionResult): Record<string, unknown> {
	return {
		attempts_used: connection.attemptsUsed,
		attempts: connection.attempts,
		mtu: connection.mtu,
		phy: connection.phy,
		warnings: connection.warnings
	};
}

function roundMs(value: number): number {
	return Math.round(value * 1000) / 1000;
}

/** Latency trials reuse the largest swept payload, kept inside the ATT limits. */
export function latencyPayloadBytes(payloads: readonly number[]): number {
	const last = payloads[payloads.length - 1] ?? MIN_SWEEP_PAYLOAD;
	return Math.min(MAX_PAYLOAD_BYTES, Math.max(MIN_SWEEP_PAYLOAD, last));
}

/**
 * Runs each trial on its own connection from the `ConnectionManager` and writes the raw
 * JSON/CSV logs the aggregate rows point to.
 */
export class LinkTrialExecutor implements TrialExecutor {
	private readonly config: SweepConfigSnapshot;
	private readonly manager: ConnectionManager;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly now: () => Date;

	public constructor(options: LinkTrialExecutorOptions) {
		this.config = options.config;
		this.manager = options.manager;
		this.clock = options.clock;
		this.logger = options.logger ?? new NoopLogger();
		this.now = options.now ?? (() => new Date());
	}

	public async runThroughput(request: ThroughputRequest): Promise<ExecutedTrial<ThroughputRow>> {
		const { config } = this;
		const { connection, result } = await this.manager.withConnection(
			config.target,
			this.connectOptions(request.phy, request.signal),
			async (connection) => ({
				connection,
				result: await runThroughputTrial(connection.link, {
					payloadBytes: request.payloadBytes,
					durationS: config.durationS,
					packetCount: config.packetCount,
					opcodes: config.gatt.opcodes,
					clock: this.clock,
					logger: this.logger,
					signal: request.signal
				})
			})
		);

		const rows: PacketRow[] = result.records.map((record) => ({
			seq: record.seq,
			dut_ts: record.dutTs,
			arrival_ms: roundMs(record.arrivalMs),
			payload_len: record.payloadLen,
			raw_len: record.rawLen,
			malformed: record.malformed
		}));
		const logs = await writeTrialLogs(
			config.outDir,
			'throughput',
			{
				metadata: {
					scenario: request.scenario,
					phy: request.phy,
					payload_bytes: request.payloadBytes,
					trial: request.trial,
					address: config.target,
					duration_s: config.durationS,
					packet_count: config.packetCount,
					connection: describeConnection(connection),
					link_lost: result.linkLost,
					link_lost_reason: result.linkLostReason ?? null,
					note: config.note
				},
				commandLog: result.commandLog,
				summary: { ...result.summary },
				columns: PACKET_COLUMNS,
				rows
			},
			{ label: `${request.scenario}_${request.phy}_p${request.payloadBytes}_t${request.trial}`, now: this.now() }
		);

		const { summary } = result;
		const row: ThroughputRow = {
			scenario: request.scenario,
			phy: request.phy,
			payload_bytes: request.payloadBytes,
			trial: request.trial,
			packets: summary.packets,
			estimated_lost_packets: summary.estimatedLostPackets,
			duration_s: summary.durationS,
			throughput_kbps: summary.throughputKbps,
			notification_rate_per_s: summary.notificationRatePerS,
			connection_attempts_used: connection.attemptsUsed,
			command_errors: result.commandErrors,
			log_json: logs.jsonPath,
			log_csv: logs.csvPath,
			notes: joinNotes(
				config.note,
				result.linkLost ? `link lost: ${result.linkLostReason ?? 'unknown'}` : undefined,
				...connection.warnings
			)
		};
		return { row, linkLost: result.linkLost };
	}

	public async runLatency(request: TrialRequest): Promise<ExecutedTrial<LatencyRow>> {
		const { config } = this;
		const payloadBytes = latencyPayloadBytes(config.payloads);
		const { connection, result } = await this.manager.withConnection(
			config.target,
			this.connectOptions(request.phy, request.signal),
			async (connection) => ({
				connection,
				result: await runLatencyTrial(connection.link, {
					payloadBytes,
					iterations: config.latency.iterations,
					mode: config.latency.mode,
					packetCount: config.packetCount,
					timeoutS: config.latency.timeoutS,
					interDelayS: config.latency.interDelayS,
					opcodes: config.gatt.opcodes,
					clock: this.clock,
					logger: this.logger,
					signal: request.signal
				})
			})
		);

		const logs = await writeTrialLogs(
			config.outDir,
			'latency',
			{
				metadata: {
					scenario: request.scenario,
					phy: request.phy,
					trial: request.trial,
					address: config.target,
					payload_bytes: payloadBytes,
					mode: config.latency.mode,
					iterations: config.latency.iterations,
					timeout_s: config.latency.timeoutS,
					connection: describeConnection(connection),
					link_lost: result.linkLost,
					note: config.note
				},
				commandLog: result.commandLog,
				summary: { ...result.summary },
				columns: LATENCY_SAMPLE_COLUMNS,
				rows: result.samples
			},
			{ label: `${request.scenario}_${request.phy}_t${request.trial}`, now: this.now() }
		);

		const row: LatencyRow = {
			scenario: request.scenario,
			phy: request.phy,
			trial: request.trial,
			mode: config.latency.mode,
			avg_latency_s: result.summary.avgLatencyS,
			min_latency_s: result.summary.minLatencyS,
			max_latency_s: result.summary.maxLatencyS,
			samples: result.summary.samples,
			timeouts: result.summary.timeouts,
			log_json: logs.jsonPath,
			log_csv: logs.csvPath,
			notes: joinNotes(config.note, result.linkLost ? 'link lost' : undefined)
		};
		return { row, linkLost: result.linkLost };
	}

	public async runRssi(request: TrialRequest): Promise<ExecutedTrial<RssiRow>> {
		const { config } = this;
		const { connection, result } = await this.manager.withConnection(
			config.target,
			this.connectOptions(request.phy, request.signal),
			async (connection) => ({
				connection,
				result: await runRssiTrial(connection.link, {
					samples: config.rssi.samples,
					intervalS: config.rssi.intervalS,
					clock: this.clock,
					logger: this.logger,
					signal: request.signal
				})
			})
		);

		const logs = await writeTrialLogs(
			config.outDir,
			'rssi',
			{
				metadata: {
					scenario: request.scenario,
					phy: request.phy,
					trial: request.trial,
					address: config.target,
					samples: config.rssi.samples,
					interval_s: config.rssi.intervalS,
					connection: describeConnection(connection),
					note: config.note
				},
				commandLog: [],
				summary: { samples_collected: result.samplesCollected, rssi_available: result.rssiAvailable },
				columns: RSSI_RECORD_COLUMNS,
				rows: result.records
			},
			{ label: `${request.scenario}_${request.phy}_t${request.trial}`, now: this.now() }
		);

		const row: RssiRow = {
			scenario: request.scenario,
			phy: request.phy,
			trial: request.trial,
			samples_collected: result.samplesCollected,
			rssi_available: result.rssiAvailable,
			log_json: logs.jsonPath,
			log_csv: logs.csvPath,
			notes: joinNotes(config.note, ...result.notes)
		};
		return { row, linkLost: false };
	}

	private connectOptions(phy: PhyMode, signal: AbortSignal): ConnectOptions {
		const { connection } = this.config;
		return {
			timeoutS: connection.timeoutS,
			maxAttempts: connection.maxAttempts,
			retryDelayS: connection.retryDelayS,
			mtu: connection.mtu,
			phy,
			signal
		};
	}
}
