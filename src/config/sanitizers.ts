/**
 * Generic configuration sanitizer helpers shared across config modules.
 */

export function sanitizeBoolean(value: unknown, fallback: boolean): boolean {
	if (typeof value === 'boolean') {
		return value;
	}
	if (typeof value === 'string') {
		const normalized = value.trim().toLowerCase();
		if (/^(1|true|yes|on)$/.test(normalized)) {
			return true;
		}
		if (/^(0|false|no|off)$/.test(normalized)) {
			return false;
		}
	}
	return fallback;
}

function toFiniteNumber(value: unknown): number | undefined {
	if (typeof value === 'string' && value.trim().length > 0) {
		const trimmed = value.trim();
		const parsed = /^0x[0-9a-f]+$/i.test(trimmed) ? Number.parseInt(trimmed, 16) : Number(trimmed);
		return Number.isFinite(parsed) ? parsed : undefined;
	}
	if (typeof value !== 'number' || Number.isNaN(value) || !Number.isFinite(value)) {
		return undefined;
	}
	return value;
}

export function sanitizeNumber(value: unknown, fallback: number, min: number): number {
	const parsed = toFiniteNumber(value);
	if (parsed === undefined) {
		return fallback;
	}
	return Math.max(min, parsed);
}

export function sanitizeInteger(value: unknown, fallback: number, min: number): number {
	const parsed = toFiniteNumber(value);
	if (parsed === undefined) {
		return fallback;
	}
	return Math.max(min, Math.floor(parsed));
}

export function sanitizeEnum<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
	if (typeof value !== 'string') {
		return fallback;
	}
	const match = allowed.find((entry) => entry === value.trim());
	return match ?? fallback;
}

export function sanitizeString(value: unknown, fallback: string): string {
	if (typeof value !== 'string') {
		return fallback;
	}
	const trimmed = value.trim();
	return trimmed.length > 0 ? trimmed : fallback;
}

/**
 * Accepts either an array or a comma-separated string.
 */
export function sanitizeStringList(value: unknown): string[] {
	const entries = typeof value === 'string' ? value.split(',') : value;
	if (!Array.isArray(entries)) {
		return [];
	}

	return entries
		.filter((entry): entry is string => typeof entry === 'string')
		.map((entry) => entry.trim())
		.filter((entry) => entry.length > 0);
}

export function sanitizeIntegerList(value: unknown): number[] {
	const entries: unknown[] = typeof value === 'string' ? value.split(',') : Array.isArray(value) ? value : [];
	const result: number[] = [];
	for (const entry of entries) {
		const parsed = toFiniteNumber(entry);
		if (parsed !== undefined) {
			result.push(Math.floor(parsed));
		}
	}
	return result;
}
