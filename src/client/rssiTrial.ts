import { Logger, NoopLogger } from '../diagnostics/logger';
import { toErrorMessage } from '../errors/labErrors';
import type { Clock } from '../scheduler/clock';
import type { BleLink } from '../transport/bleLink';

export interface RssiRecord {
	[column: string]: string | number | null;
	index: number;
	timestamp: string;
	rssi_dbm: number | null;
}

export const RSSI_RECORD_COLUMNS = ['index', 'timestamp', 'rssi_dbm'] as const;

export interface RssiTrialOptions {
	samples: number;
	intervalS: number;
	clock: Clock;
	logger?: Logger;
	signal?: AbortSignal;
}

export interface RssiTrialResult {
	samplesCollected: number;
	rssiAvailable: boolean;
	records: readonly RssiRecord[];
	notes: readonly string[];
}

/**
 * Samples link RSSI at a fixed cadence. A link that cannot report RSSI yields `null`
 * entries and a note instead of an error.
 */
export async function runRssiTrial(link: BleLink, options: RssiTrialOptions): Promise<RssiTrialResult> {
	const logger = options.logger ?? new NoopLogger();
	const records: RssiRecord[] = [];
	const notes = new Set<string>();

	for (let index = 1; index <= options.samples; index += 1) {
		let value: number | undefined;
		if (!link.readRssi) {
			notes.add('RSSI not exposed by this link');
		} else {
			try {
				value = await link.readRssi();
				if (value === undefined) {
					notes.add('RSSI not reported for some samples');
				}
			} catch (error) {
				notes.add(`RSSI read failed: ${toErrorMessage(error)}`);
				logger.debug('RSSI read failed', { index, error: toErrorMessage(error) });
			}
		}
		records.push({ index, timestamp: new Date().toISOString(), rssi_dbm: value ?? null });
		if (index < options.samples) {
			await options.clock.sleep(options.intervalS * 1000, options.signal);
		}
	}

	return {
		samplesCollected: records.length,
		rssiAvailable: records.some((record) => record.rssi_dbm !== null),
		records,
		notes: [...notes].sort()
	};
}
