import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { ThroughputRow } from './sweepRecords';

export type ManifestStatus = 'completed' | 'completed_with_errors';
export type TrialOutcome = 'recorded' | 'partial' | 'failed' | 'skipped';
export type ManifestTrialKind = 'throughput' | 'latency' | 'rssi';

export interface ManifestTrialEntry {
	kind: ManifestTrialKind;
	scenario: string;
	phy: string;
	payload_bytes?: number;
	trial: number;
	outcome: TrialOutcome;
	error_kind?: string;
	error?: string;
	log_json?: string;
}

export interface ScenarioSummary {
	avg_throughput_kbps: number;
	total_packets: number;
	total_loss: number;
	total_trials: number;
	retry_trials: number;
	error_trials: number;
}

export interface ManifestOutputs {
	throughput_csv: string;
	latency_csv: string;
	rssi_csv: string;
	logs_dir: string;
}

export interface ManifestArgs {
	note: string;
	mtu: number;
	connect_timeout_s: number;
	connect_attempts: number;
	connect_retry_delay_s: number;
	duration_s: number;
	resume: boolean;
}

export interface ManifestHeader {
	run_id: string;
	address: string;
	scenarios: readonly string[];
	phys: readonly string[];
	payloads: readonly number[];
	repeats: number;
	started_at: string;
	outputs: ManifestOutputs;
	args: ManifestArgs;
}

export interface RunManifest extends ManifestHeader {
	type: 'full_matrix';
	ended_at: string | null;
	status: ManifestStatus;
	errors: string[];
	summary: Record<string, ScenarioSummary>;
	trials: ManifestTrialEntry[];
	progress: { planned: number; recorded: number; skipped: number; failed: number };
	interrupted: boolean;
}

/** Aggregate over the throughput rows of one (scenario, phy); `undefined` when there are none. */
export function summarizeThroughput(rows: readonly ThroughputRow[]): ScenarioSummary | undefined {
	const valid = rows.filter((row) => Number.isFinite(row.throughput_kbps));
	if (valid.length === 0) {
		return undefined;
	}
	return {
		avg_throughput_kbps: valid.reduce((sum, row) => sum + row.throughput_kbps, 0) / valid.length,
		total_packets: valid.reduce((sum, row) => sum + row.packets, 0),
		total_loss: valid.reduce((sum, row) => sum + row.estimated_lost_packets, 0),
		total_trials: valid.length,
		retry_trials: valid.filter((row) => row.connection_attempts_used > 1).length,
		error_trials: valid.filter((row) => row.command_errors > 0).length
	};
}

export function manifestFilePath(manifestDir: string, runId: string): string {
	return path.join(manifestDir, `${runId}_manifest.json`);
}

/**
 * In-memory run manifest, persisted with an atomic replace after every change the
 * orchestrator reports. A reader never sees a half-written file.
 */
export class SweepManifest {
	private readonly errors: string[] = [];
	private readonly trials: ManifestTrialEntry[] = [];
	private readonly summary: Record<string, ScenarioSummary> = {};
	private endedAt: string | null = null;
	private interrupted = false;

	public constructor(
		public readonly filePath: string,
		private readonly header: ManifestHeader,
		private readonly planned: number
	) {}

	public addTrial(entry: ManifestTrialEntry): void {
		this.trials.push(entry);
	}

	public addError(message: string): void {
		this.errors.push(message);
	}

	public setSummary(scenario: string, phy: string, summary: ScenarioSummary | undefined): void {
		const key = `${scenario}|${phy}`;
		if (summary) {
			this.summary[key] = summary;
		} else {
			delete this.summary[key];
		}
	}

	public markInterrupted(): void {
		this.interrupted = true;
	}

	public finish(endedAt: string): void {
		this.endedAt = endedAt;
	}

	public get errorCount(): number {
		return this.errors.length;
	}

	public snapshot(): RunManifest {
		const count = (outcome: TrialOutcome) =>
			this.trials.filter((entry) => entry.kind === 'throughput' && entry.outcome === outcome).length;
		return {
			...this.header,
			type: 'full_matrix',
			ended_at: this.endedAt,
			status: this.errors.length > 0 ? 'completed_with_errors' : 'completed',
			errors: [...this.errors],
			summary: { ...this.summary },
			trials: this.trials.map((entry) => ({ ...entry })),
			progress: {
				planned: this.planned,
				recorded: count('recorded') + count('partial'),
				skipped: count('skipped'),
				failed: count('failed')
			},
			interrupted: this.interrupted
		};
	}

	public async flush(): Promise<void> {
		await fs.mkdir(path.dirname(this.filePath), { recursive: true });
		const tmpPath = `${this.filePath}.tmp`;
		await fs.writeFile(tmpPath, `${JSON.stringify(this.snapshot(), null, '\t')}\n`, 'utf8');
		await fs.rename(tmpPath, this.filePath);
	}
}
