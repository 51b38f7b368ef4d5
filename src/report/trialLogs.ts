import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { CsvValue, formatCsvRow } from './csvTable';

export type TrialKind = 'throughput' | 'latency' | 'rssi';

export interface TrialLogPaths {
	jsonPath: string;
	csvPath: string;
}

export interface TrialLogContent<Row extends Record<string, CsvValue>> {
	metadata: Record<string, unknown>;
	commandLog: readonly Record<string, unknown>[];
	summary: Record<string, unknown>;
	columns: readonly (keyof Row & string)[];
	rows: readonly Row[];
}

/** `YYYYMMDD_HHMMSS` in UTC. */
export function timestampTag(date: Date): string {
	const iso = date.toISOString();
	return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
}

export function sanitizeLabel(value: string): string {
	return value.replace(/[^A-Za-z0-9_.-]/g, '_');
}

/**
 * Writes `<tag>_ble_<kind>[_<label>].json` (metadata, command log, summary, rows) and the
 * matching `.csv` of rows. The JSON metadata points at the CSV under `records_file`.
 */
export async function writeTrialLogs<Row extends Record<string, CsvValue>>(
	outDir: string,
	kind: TrialKind,
	content: TrialLogContent<Row>,
	options: { label?: string; now?: Date } = {}
): Promise<TrialLogPaths> {
	await fs.mkdir(outDir, { recursive: true });
	const suffix = options.label ? `_${sanitizeLabel(options.label)}` : '';
	const baseName = `${timestampTag(options.now ?? new Date())}_ble_${kind}${suffix}`;
	const jsonPath = path.join(outDir, `${baseName}.json`);
	const csvPath = path.join(outDir, `${baseName}.csv`);

	const csvLines = [formatCsvRow(content.columns), ...content.rows.map((row) => formatCsvRow(content.columns.map((column) => row[column])))];
	await fs.writeFile(csvPath, `${csvLines.join('\n')}\n`, 'utf8');

	const blob = {
		metadata: {
			...content.metadata,
			summary: content.summary,
			command_log: content.commandLog,
			records_file: { csv: csvPath }
		},
		records: content.rows
	};
	await fs.writeFile(jsonPath, `${JSON.stringify(blob, null, '\t')}\n`, 'utf8');
	return { jsonPath, csvPath };
}
