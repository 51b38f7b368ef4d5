import { ConfigError } from '../errors/labErrors';

// ---------------------------------------------------------------------------
// Fault profile: probabilistic impairments applied by the simulated peripheral
// ---------------------------------------------------------------------------

export interface FaultProfile {
	/** Chance (0–100 %) that a scheduled packet is dropped. */
	dropPercent: number;
	/** Chance (0–100 %) that a packet starts a drop burst. */
	dropBurstPercent: number;
	/** Packets dropped unconditionally after the one that triggers a burst. */
	dropBurstLen: number;
	/** Nominal interval is perturbed by ±intervalJitterMs. */
	intervalJitterMs: number;
	latencySpikeMs: number;
	latencySpikeChance: number;
	malformedChance: number;
	disconnectChance: number;
	commandIgnoreChance: number;
	rssiBaseDbm: number;
	rssiWaveAmplitude: number;
	/** 0 disables the wave. */
	rssiWavePeriodS: number;
	/** Linear RSSI drift in dBm per second. */
	rssiDriftDbm: number;
	/** Per-packet drop probabilities (0.0–1.0), cycled; replaces `dropPercent` when set. */
	dropProfile?: readonly number[];
	/** Per-packet intervals (ms), cycled; replaces the nominal interval when set. */
	intervalProfileMs?: readonly number[];
	/** Below this synthesised RSSI, `rssiDropExtraPercent` is added to the drop chance. */
	rssiDropThresholdDbm?: number;
	rssiDropExtraPercent?: number;
}

export type FaultPresetName = 'best' | 'typical' | 'body_block' | 'pocket' | 'worst';

export const FAULT_PRESET_NAMES: readonly FaultPresetName[] = ['best', 'typical', 'body_block', 'pocket', 'worst'];

export const DEFAULT_FAULT_PRESET: FaultPresetName = 'typical';

const CALM: FaultProfile = {
	dropPercent: 0,
	dropBurstPercent: 0,
	dropBurstLen: 0,
	intervalJitterMs: 0,
	latencySpikeMs: 0,
	latencySpikeChance: 0,
	malformedChance: 0,
	disconnectChance: 0,
	commandIgnoreChance: 0,
	rssiBaseDbm: -55,
	rssiWaveAmplitude: 0,
	rssiWavePeriodS: 0,
	rssiDriftDbm: 0
};

export const FAULT_PRESETS: Readonly<Record<FaultPresetName, Readonly<FaultProfile>>> = {
	best: CALM,
	typical: {
		...CALM,
		dropPercent: 1,
		dropBurstPercent: 1,
		dropBurstLen: 2,
		intervalJitterMs: 3,
		latencySpikeMs: 10,
		latencySpikeChance: 2,
		rssiWaveAmplitude: 3,
		rssiWavePeriodS: 5
	},
	body_block: {
		...CALM,
		dropPercent: 3,
		dropBurstPercent: 5,
		dropBurstLen: 3,
		intervalJitterMs: 5,
		latencySpikeMs: 15,
		latencySpikeChance: 5,
		rssiBaseDbm: -68,
		rssiWaveAmplitude: 6,
		rssiWavePeriodS: 4
	},
	pocket: {
		...CALM,
		dropPercent: 2,
		dropBurstPercent: 3,
		dropBurstLen: 2,
		intervalJitterMs: 4,
		latencySpikeMs: 12,
		latencySpikeChance: 3,
		rssiBaseDbm: -63,
		rssiWaveAmplitude: 4,
		rssiWavePeriodS: 6
	},
	worst: {
		...CALM,
		dropPercent: 5,
		dropBurstPercent: 10,
		dropBurstLen: 4,
		intervalJitterMs: 8,
		latencySpikeMs: 25,
		latencySpikeChance: 8,
		disconnectChance: 0.5,
		rssiBaseDbm: -78,
		rssiWaveAmplitude: 8,
		rssiWavePeriodS: 3
	}
};

const PERCENT_FIELDS = [
	'dropPercent',
	'dropBurstPercent',
	'latencySpikeChance',
	'malformedChance',
	'disconnectChance',
	'commandIgnoreChance',
	'rssiDropExtraPercent'
] as const;

const NON_NEGATIVE_FIELDS = [
	'dropBurstLen',
	'intervalJitterMs',
	'latencySpikeMs',
	'rssiWaveAmplitude',
	'rssiWavePeriodS'
] as const;

const SIGNED_FIELDS = ['rssiBaseDbm', 'rssiDriftDbm', 'rssiDropThresholdDbm'] as const;

function isFaultPresetName(value: string): value is FaultPresetName {
	return (FAULT_PRESET_NAMES as readonly string[]).includes(value);
}

function requireFinite(field: string, value: number): void {
	if (typeof value !== 'number' || !Number.isFinite(value)) {
		throw new ConfigError(`Fault profile field "${field}" must be a finite number.`, field);
	}
}

export function validateFaultProfile(profile: FaultProfile): void {
	for (const field of PERCENT_FIELDS) {
		const value = profile[field];
		if (value === undefined) {
			continue;
		}
		requireFinite(field, value);
		if (value < 0 || value > 100) {
			throw new ConfigError(`Fault profile field "${field}" must be within 0–100 %, got ${value}.`, field);
		}
	}

	for (const field of NON_NEGATIVE_FIELDS) {
		const value = profile[field];
		requireFinite(field, value);
		if (value < 0) {
			throw new ConfigError(`Fault profile field "${field}" must not be negative, got ${value}.`, field);
		}
	}

	for (const field of SIGNED_FIELDS) {
		const value = profile[field];
		if (value !== undefined) {
			requireFinite(field, value);
		}
	}

	if (profile.rssiBaseDbm < -127 || profile.rssiBaseDbm > -1) {
		throw new ConfigError(`rssiBaseDbm must be within -127..-1 dBm, got ${profile.rssiBaseDbm}.`, 'rssiBaseDbm');
	}

	profile.dropProfile?.forEach((value) => {
		requireFinite('dropProfile', value);
		if (value < 0 || value > 1) {
			throw new ConfigError(`dropProfile entries must be within 0.0–1.0, got ${value}.`, 'dropProfile');
		}
	});

	profile.intervalProfileMs?.forEach((value) => {
		requireFinite('intervalProfileMs', value);
		if (value < 1) {
			throw new ConfigError(`intervalProfileMs entries must be at least 1 ms, got ${value}.`, 'intervalProfileMs');
		}
	});
}

/**
 * Resolves a preset and applies explicit overrides field by field. Unset override
 * fields keep the preset value. The result is frozen.
 */
export function resolveFaultProfile(
	preset: string = DEFAULT_FAULT_PRESET,
	overrides: Partial<FaultProfile> = {}
): Readonly<FaultProfile> {
	const name = preset.trim().toLowerCase();
	if (!isFaultPresetName(name)) {
		throw new ConfigError(
			`Unknown fault preset "${preset}". Expected one of: ${FAULT_PRESET_NAMES.join(', ')}.`,
			'preset'
		);
	}

	const merged: FaultProfile = { ...FAULT_PRESETS[name] };
	for (const [key, value] of Object.entries(overrides)) {
		if (value !== undefined) {
			Object.assign(merged, { [key]: value });
		}
	}

	validateFaultProfile(merged);
	return Object.freeze({
		...merged,
		dropProfile: merged.dropProfile ? Object.freeze([...merged.dropProfile]) : undefined,
		intervalProfileMs: merged.intervalProfileMs ? Object.freeze([...merged.intervalProfileMs]) : undefined
	});
}
