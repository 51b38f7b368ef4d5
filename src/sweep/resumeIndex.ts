import { readCsvObjects } from '../report/csvTable';

export interface TrialKey {
	scenario: string;
	phy: string;
	payloadBytes: number;
	trial: number;
}

export function formatTrialKey(key: TrialKey): string {
	return `${key.scenario}|${key.phy}|${key.payloadBytes}|${key.trial}`;
}

/**
 * Throughput trials already recorded in the aggregate table. Loaded once at sweep start;
 * rows that do not parse are ignored.
 */
export class ResumeIndex {
	private readonly keys = new Set<string>();

	public constructor(entries: Iterable<TrialKey> = []) {
		for (const entry of entries) {
			this.add(entry);
		}
	}

	public static async load(csvPath: string): Promise<ResumeIndex> {
		const rows = await readCsvObjects(csvPath);
		const index = new ResumeIndex();
		for (const row of rows) {
			const payloadBytes = Number.parseInt(row.payload_bytes ?? '', 10);
			const trial = Number.parseInt(row.trial ?? '', 10);
			if (!row.scenario || !row.phy || !Number.isInteger(payloadBytes) || !Number.isInteger(trial)) {
				continue;
			}
			index.add({ scenario: row.scenario, phy: row.phy, payloadBytes, trial });
		}
		return index;
	}

	public get size(): number {
		return this.keys.size;
	}

	public has(key: TrialKey): boolean {
		return this.keys.has(formatTrialKey(key));
	}

	public add(key: TrialKey): void {
		this.keys.add(formatTrialKey(key));
	}
}
