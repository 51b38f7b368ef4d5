import * as path from 'node:path';
import { Logger, NoopLogger } from '../diagnostics/logger';
import { toErrorKind, toErrorMessage, TrialAbortedError } from '../errors/labErrors';
import { CsvTable } from '../report/csvTable';
import { timestampTag } from '../report/trialLogs';
import type { PhyMode } from '../transport/bleLink';
import { AdapterLock } from './adapterLock';
import { ManifestArgs, manifestFilePath, ManifestTrialKind, RunManifest, summarizeThroughput, SweepManifest } from './manifest';
import { ResumeIndex } from './resumeIndex';
import {
	LATENCY_COLUMNS,
	LatencyColumn,
	RSSI_COLUMNS,
	RssiColumn,
	THROUGHPUT_COLUMNS,
	ThroughputColumn,
	ThroughputRow,
	TrialExecutor
} from './sweepRecords';

export const THROUGHPUT_CSV = 'full_matrix_throughput.csv';
export const LATENCY_CSV = 'full_matrix_latency.csv';
export const RSSI_CSV = 'full_matrix_rssi.csv';

export interface SweepPlan {
	/** Target identifier recorded in the manifest. */
	address: string;
	/** Lock key of the radio adapter. */
	adapter: string;
	scenarios: readonly string[];
	phys: readonly PhyMode[];
	payloads: readonly number[];
	repeats: number;
	resume: boolean;
	throughput: boolean;
	latency: boolean;
	rssi: boolean;
	lockDir: string;
	lockWaitMs: number;
	resultsDir: string;
	outDir: string;
	manifestDir: string;
	args: ManifestArgs;
}

export interface TrialOrchestratorOptions {
	executor: TrialExecutor;
	logger?: Logger;
	/** Builds the adapter lock; replaced in tests to control timing. */
	createLock?: (plan: SweepPlan) => AdapterLock;
	now?: () => Date;
}

export interface SweepResult {
	manifest: RunManifest;
	manifestPath: string;
	rows: readonly ThroughputRow[];
	interrupted: boolean;
}

type StepResult = 'done' | 'interrupted';

/**
 * Runs the scenario × PHY × payload × repeat sweep one trial at a time. The adapter lock
 * is taken once before the first trial and held until the manifest is finalised, so two
 * sweeps on one adapter never interleave. Trial failures are itemised and the sweep goes
 * on; failing to get the lock ends it before any trial runs.
 */
export class TrialOrchestrator {
	private readonly executor: TrialExecutor;
	private readonly logger: Logger;
	private readonly createLock: (plan: SweepPlan) => AdapterLock;
	private readonly now: () => Date;

	public constructor(options: TrialOrchestratorOptions) {
		this.executor = options.executor;
		this.logger = options.logger ?? new NoopLogger();
		this.createLock =
			options.createLock ??
			((plan) => new AdapterLock({ lockDir: plan.lockDir, adapter: plan.adapter, waitMs: plan.lockWaitMs, logger: this.logger }));
		this.now = options.now ?? (() => new Date());
	}

	public async run(plan: SweepPlan, signal: AbortSignal = new AbortController().signal): Promise<SweepResult> {
		const startedAt = this.now();
		const runId = timestampTag(startedAt);
		const throughputTable = new CsvTable<ThroughputColumn>(path.join(plan.resultsDir, THROUGHPUT_CSV), THROUGHPUT_COLUMNS);
		const latencyTable = new CsvTable<LatencyColumn>(path.join(plan.resultsDir, LATENCY_CSV), LATENCY_COLUMNS);
		const rssiTable = new CsvTable<RssiColumn>(path.join(plan.resultsDir, RSSI_CSV), RSSI_COLUMNS);

		const planned = plan.throughput
			? plan.scenarios.length * plan.phys.length * plan.payloads.length * plan.repeats
			: 0;
		const manifest = new SweepManifest(
			manifestFilePath(plan.manifestDir, runId),
			{
				run_id: runId,
				address: plan.address,
				scenarios: plan.scenarios,
				phys: plan.phys,
				payloads: plan.payloads,
				repeats: plan.repeats,
				started_at: startedAt.toISOString(),
				outputs: {
					throughput_csv: throughputTable.filePath,
					latency_csv: latencyTable.filePath,
					rssi_csv: rssiTable.filePath,
					logs_dir: plan.outDir
				},
				args: plan.args
			},
			planned
		);
		await manifest.flush();

		const lock = this.createLock(plan);
		const rows: ThroughputRow[] = [];
		let resumeIndex = new ResumeIndex();

		/** Runs one trial and persists its outcome; 'interrupted' when the operator aborted. */
		const step = async (
			kind: ManifestTrialKind,
			context: { scenario: string; phy: PhyMode; trial: number; payloadBytes?: number },
			work: () => Promise<{ logJson: string; partial: boolean }>
		): Promise<StepResult> => {
			const entry = {
				kind,
				scenario: context.scenario,
				phy: context.phy,
				payload_bytes: context.payloadBytes,
				trial: context.trial
			};
			try {
				const { logJson, partial } = await work();
				manifest.addTrial({ ...entry, outcome: partial ? 'partial' : 'recorded', log_json: logJson });
				await manifest.flush();
				return 'done';
			} catch (error) {
				if (error instanceof TrialAbortedError || signal.aborted) {
					manifest.markInterrupted();
					await manifest.flush();
					return 'interrupted';
				}
				const kindLabel = context.payloadBytes === undefined ? kind : `${kind} payload=${context.payloadBytes}`;
				const message = `${context.scenario}|${context.phy} ${kindLabel} trial=${context.trial}: [${toErrorKind(error)}] ${toErrorMessage(error)}`;
				manifest.addError(message);
				manifest.addTrial({ ...entry, outcome: 'failed', error_kind: toErrorKind(error), error: toErrorMessage(error) });
				await manifest.flush();
				this.logger.error('Trial failed', { error: message });
				return 'done';
			}
		};

		const finish = async (interrupted: boolean): Promise<SweepResult> => {
			manifest.finish(this.now().toISOString());
			await manifest.flush();
			const snapshot = manifest.snapshot();
			this.logger.info(interrupted ? 'Sweep interrupted' : 'Sweep finished', {
				status: snapshot.status,
				errors: snapshot.errors.length,
				manifest: manifest.filePath
			});
			return { manifest: snapshot, manifestPath: manifest.filePath, rows, interrupted };
		};

		const runTrials = async (): Promise<SweepResult> => {
			const comboTotal = plan.scenarios.length * plan.phys.length;
			let comboIndex = 0;
			for (const scenario of plan.scenarios) {
				for (const phy of plan.phys) {
					comboIndex += 1;
					this.logger.info(`Scenario ${comboIndex}/${comboTotal}`, { scenario, phy });

					if (plan.throughput) {
						for (const payloadBytes of plan.payloads) {
							for (let trial = 1; trial <= plan.repeats; trial += 1) {
								if (signal.aborted) {
									manifest.markInterrupted();
									return finish(true);
								}
								if (resumeIndex.has({ scenario, phy, payloadBytes, trial })) {
									this.logger.info('Skipping recorded trial', { scenario, phy, payloadBytes, trial });
									manifest.addTrial({ kind: 'throughput', scenario, phy, payload_bytes: payloadBytes, trial, outcome: 'skipped' });
									continue;
								}
								const result = await step('throughput', { scenario, phy, trial, payloadBytes }, async () => {
									const { row, linkLost } = await this.executor.runThroughput({ scenario, phy, payloadBytes, trial, signal });
									await throughputTable.append(row);
									rows.push(row);
									resumeIndex.add({ scenario, phy, payloadBytes, trial });
									manifest.setSummary(
										scenario,
										phy,
										summarizeThroughput(rows.filter((entry) => entry.scenario === scenario && entry.phy === phy))
									);
									return { logJson: row.log_json, partial: linkLost };
								});
								if (result === 'interrupted') {
									return finish(true);
								}
							}
						}
					}

					if (plan.latency) {
						const result = await step('latency', { scenario, phy, trial: 1 }, async () => {
							const { row, linkLost } = await this.executor.runLatency({ scenario, phy, trial: 1, signal });
							await latencyTable.append(row);
							return { logJson: row.log_json, partial: linkLost };
						});
						if (result === 'interrupted') {
							return finish(true);
						}
					}

					if (plan.rssi) {
						const result = await step('rssi', { scenario, phy, trial: 1 }, async () => {
							const { row, linkLost } = await this.executor.runRssi({ scenario, phy, trial: 1, signal });
							await rssiTable.append(row);
							return { logJson: row.log_json, partial: linkLost };
						});
						if (result === 'interrupted') {
							return finish(true);
						}
					}
				}
			}

			return finish(false);
		};

		try {
			await lock.acquire(signal);
		} catch (error) {
			if (error instanceof TrialAbortedError || signal.aborted) {
				manifest.markInterrupted();
				return finish(true);
			}
			manifest.addError(`adapter ${plan.adapter}: [${toErrorKind(error)}] ${toErrorMessage(error)}`);
			manifest.finish(this.now().toISOString());
			await manifest.flush();
			throw error;
		}

		try {
			// Tables are only touched under the lock; a waiting sweep must not truncate a running one's.
			if (plan.resume) {
				resumeIndex = await ResumeIndex.load(throughputTable.filePath);
				this.logger.info('Resuming sweep', { recordedTrials: resumeIndex.size });
			}
			const truncate = !plan.resume;
			await throughputTable.open(truncate);
			await latencyTable.open(truncate);
			await rssiTable.open(truncate);
			return await runTrials();
		} finally {
			await lock.release();
		}
	}
}
