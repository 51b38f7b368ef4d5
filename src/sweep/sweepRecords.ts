import type { PhyMode } from '../transport/bleLink';

export const THROUGHPUT_COLUMNS = [
	'scenario',
	'phy',
	'payload_bytes',
	'trial',
	'packets',
	'estimated_lost_packets',
	'duration_s',
	'throughput_kbps',
	'notification_rate_per_s',
	'connection_attempts_used',
	'command_errors',
	'log_json',
	'log_csv',
	'notes'
] as const;

export const LATENCY_COLUMNS = [
	'scenario',
	'phy',
	'trial',
	'mode',
	'avg_latency_s',
	'min_latency_s',
	'max_latency_s',
	'samples',
	'timeouts',
	'log_json',
	'log_csv',
	'notes'
] as const;

export const RSSI_COLUMNS = [
	'scenario',
	'phy',
	'trial',
	'samples_collected',
	'rssi_available',
	'log_json',
	'log_csv',
	'notes'
] as const;

export type ThroughputColumn = (typeof THROUGHPUT_COLUMNS)[number];
export type LatencyColumn = (typeof LATENCY_COLUMNS)[number];
export type RssiColumn = (typeof RSSI_COLUMNS)[number];

export interface ThroughputRow {
	scenario: string;
	phy: string;
	payload_bytes: number;
	trial: number;
	packets: number;
	estimated_lost_packets: number;
	duration_s: number;
	throughput_kbps: number;
	notification_rate_per_s: number;
	connection_attempts_used: number;
	command_errors: number;
	log_json: string;
	log_csv: string;
	notes: string;
}

export interface LatencyRow {
	scenario: string;
	phy: string;
	trial: number;
	mode: string;
	avg_latency_s: number | null;
	min_latency_s: number | null;
	max_latency_s: number | null;
	samples: number;
	timeouts: number;
	log_json: string;
	log_csv: string;
	notes: string;
}

export interface RssiRow {
	scenario: string;
	phy: string;
	trial: number;
	samples_collected: number;
	rssi_available: boolean;
	log_json: string;
	log_csv: string;
	notes: string;
}

export interface TrialRequest {
	scenario: string;
	phy: PhyMode;
	trial: number;
	signal: AbortSignal;
}

export interface ThroughputRequest extends TrialRequest {
	payloadBytes: number;
}

export interface ExecutedTrial<Row> {
	row: Row;
	/** The link dropped mid-measurement; the row holds partial data. */
	linkLost: boolean;
}

/**
 * Runs single trials against the device under test. The orchestrator owns ordering,
 * locking and bookkeeping; an executor only measures and writes raw logs.
 */
export interface TrialExecutor {
	runThroughput(request: ThroughputRequest): Promise<ExecutedTrial<ThroughputRow>>;
	runLatency(request: TrialRequest): Promise<ExecutedTrial<LatencyRow>>;
	runRssi(request: TrialRequest): Promise<ExecutedTrial<RssiRow>>;
}

export function joinNotes(...notes: Array<string | undefined>): string {
	return notes.filter((note): note is string => note !== undefined && note.length > 0).join('; ');
}
