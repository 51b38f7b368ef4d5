import * as fs from 'node:fs/promises';
import * as path from 'node:path';

export function isMissingFileError(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export type CsvValue = string | number | boolean | null | undefined;

export function formatCsvField(value: CsvValue): string {
	if (value === null || value === undefined) {
		return '';
	}
	const text = String(value);
	return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatCsvRow(values: readonly CsvValue[]): string {
	return values.map(formatCsvField).join(',');
}

/**
 * RFC 4180 reader: quoted fields may hold commas, doubled quotes and line breaks.
 */
export function parseCsv(text: string): string[][] {
	const rows: string[][] = [];
	let row: string[] = [];
	let field = '';
	let quoted = false;

	for (let index = 0; index < text.length; index += 1) {
		const char = text[index];
		if (quoted) {
			if (char === '"' && text[index + 1] === '"') {
				field += '"';
				index += 1;
			} else if (char === '"') {
				quoted = false;
			} else {
				field += char;
			}
			continue;
		}

		if (char === '"') {
			quoted = true;
		} else if (char === ',') {
			row.push(field);
			field = '';
		} else if (char === '\n' || char === '\r') {
			if (char === '\r' && text[index + 1] === '\n') {
				index += 1;
			}
			row.push(field);
			rows.push(row);
			row = [];
			field = '';
		} else {
			field += char;
		}
	}

	if (field.length > 0 || row.length > 0) {
		row.push(field);
		rows.push(row);
	}
	return rows.filter((entry) => !(entry.length === 1 && entry[0] === ''));
}

/** Rows keyed by header; a missing file reads as empty. */
export async function readCsvObjects(filePath: string): Promise<Record<string, string>[]> {
	let text: string;
	try {
		text = await fs.readFile(filePath, 'utf8');
	} catch (error) {
		if (isMissingFileError(error)) {
			return [];
		}
		throw error;
	}

	const [header, ...rows] = parseCsv(text);
	if (!header) {
		return [];
	}
	return rows.map((cells) => {
		const entry: Record<string, string> = {};
		header.forEach((name, index) => {
			entry[name.trim()] = cells[index] ?? '';
		});
		return entry;
	});
}

/**
 * Append-only CSV file with a fixed column order. Each row is written as soon as it is
 * appended, so an interrupted sweep keeps every finished row.
 */
export class CsvTable<Column extends string> {
	public constructor(
		public readonly filePath: string,
		public readonly columns: readonly Column[]
	) {}

	/** Writes the header when the file is missing or empty, or always when `truncate` is set. */
	public async open(truncate: boolean): Promise<void> {
		await fs.mkdir(path.dirname(this.filePath), { recursive: true });
		if (!truncate) {
			const existing = await fs.stat(this.filePath).catch((error: unknown) => {
				if (isMissingFileError(error)) {
					return undefined;
				}
				throw error;
			});
			if (existing && existing.size > 0) {
				return;
			}
		}
		await fs.writeFile(this.filePath, `${formatCsvRow(this.columns)}\n`, 'utf8');
	}

	public async append(row: Partial<Record<Column, CsvValue>>): Promise<void> {
		const line = formatCsvRow(this.columns.map((column) => row[column]));
		await fs.appendFile(this.filePath, `${line}\n`, 'utf8');
	}
}
