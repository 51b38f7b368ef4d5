import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { LOG_LEVELS, LogLevel } from '../diagnostics/logger';
import { ConfigError, toErrorMessage } from '../errors/labErrors';
import { LATENCY_MODES, LatencyMode } from '../client/latencyTrial';
import { PhyProfile } from '../mock/faultInjector';
import { DEFAULT_FAULT_PRESET, FaultProfile, resolveFaultProfile } from '../mock/faultProfile';
import { CommandOpcodes, DEFAULT_OPCODES } from '../protocol/controlCommand';
import { MAX_PAYLOAD_BYTES } from '../protocol/throughputPacket';
import { PHY_MODES, PhyMode } from '../transport/bleLink';
import {
	sanitizeBoolean,
	sanitizeEnum,
	sanitizeInteger,
	sanitizeIntegerList,
	sanitizeNumber,
	sanitizeString,
	sanitizeStringList
} from './sanitizers';

/**
 * Keyed configuration lookup. Keys are dotted (`sweep.payloads`); the environment
 * variable for a key is `BLE_LAB_` + the key upper-cased with dots as underscores
 * (`BLE_LAB_SWEEP_PAYLOADS`) and wins over the config file.
 */
export interface ConfigSource {
	get(key: string): unknown;
}

export const CONFIG_FILE_ENV = 'BLE_LAB_CONFIG';

export function toEnvName(key: string): string {
	return `BLE_LAB_${key.replace(/([a-z0-9])([A-Z])/g, '$1_$2').replace(/\./g, '_').toUpperCase()}`;
}

function lookupPath(values: Record<string, unknown>, key: string): unknown {
	let current: unknown = values;
	for (const segment of key.split('.')) {
		if (!current || typeof current !== 'object' || Array.isArray(current)) {
			return undefined;
		}
		current = Object.getOwnPropertyDescriptor(current, segment)?.value;
	}
	return current;
}

export function createConfigSource(env: NodeJS.ProcessEnv = {}, fileValues: Record<string, unknown> = {}): ConfigSource {
	return {
		get(key: string): unknown {
			const fromEnv = env[toEnvName(key)];
			if (fromEnv !== undefined && fromEnv.trim().length > 0) {
				return fromEnv;
			}
			return lookupPath(fileValues, key);
		}
	};
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function readJsonFile(filePath: string): Promise<unknown> {
	let text: string;
	try {
		text = await fs.readFile(filePath, 'utf8');
	} catch (error) {
		throw new ConfigError(`Cannot read ${filePath}: ${toErrorMessage(error)}`);
	}
	try {
		return JSON.parse(text);
	} catch (error) {
		throw new ConfigError(`${filePath} is not valid JSON: ${toErrorMessage(error)}`);
	}
}

/** Config source from the JSON file named by `BLE_LAB_CONFIG` (if any) and the environment. */
export async function loadConfigSource(env: NodeJS.ProcessEnv = process.env): Promise<ConfigSource> {
	const filePath = env[CONFIG_FILE_ENV]?.trim();
	if (!filePath) {
		return createConfigSource(env);
	}
	const parsed = await readJsonFile(filePath);
	if (!isRecord(parsed)) {
		throw new ConfigError(`${filePath} must contain a JSON object.`);
	}
	return createConfigSource(env, parsed);
}

// ---------------------------------------------------------------------------
// GATT layout
// ---------------------------------------------------------------------------

export interface GattConfigSnapshot {
	serviceUuid: string;
	txUuid: string;
	rxUuid: string;
	rssiUuid: string;
	opcodes: CommandOpcodes;
}

export const DEFAULT_SERVICE_UUID = '12345678-1234-5678-1234-56789abcdef0';
export const DEFAULT_TX_UUID = '12345678-1234-5678-1234-56789abcdef1';
export const DEFAULT_RX_UUID = '12345678-1234-5678-1234-56789abcdef2';
export const DEFAULT_RSSI_UUID = '12345678-1234-5678-1234-56789abcdef3';

const UUID_PATTERN = /^[0-9a-fA-F-]{16,36}$/;

function readUuid(cfg: ConfigSource, key: string, fallback: string): string {
	const value = sanitizeString(cfg.get(key), fallback);
	if (!UUID_PATTERN.test(value)) {
		throw new ConfigError(`${key} does not look like a UUID: ${value}`, key);
	}
	return value;
}

function readOpcode(cfg: ConfigSource, key: string, fallback: number): number {
	const value = sanitizeInteger(cfg.get(key), fallback, 0);
	if (value > 0xff) {
		throw new ConfigError(`${key} must fit in one byte, got ${value}.`, key);
	}
	return value;
}

export function readGattConfig(cfg: ConfigSource): GattConfigSnapshot {
	const opcodes: CommandOpcodes = {
		start: readOpcode(cfg, 'gatt.startOpcode', DEFAULT_OPCODES.start),
		stop: readOpcode(cfg, 'gatt.stopOpcode', DEFAULT_OPCODES.stop),
		reset: readOpcode(cfg, 'gatt.resetOpcode', DEFAULT_OPCODES.reset)
	};
	if (new Set([opcodes.start, opcodes.stop, opcodes.reset]).size !== 3) {
		throw new ConfigError('Start, Stop and Reset opcodes must be distinct.', 'gatt');
	}

	return {
		serviceUuid: readUuid(cfg, 'gatt.serviceUuid', DEFAULT_SERVICE_UUID),
		txUuid: readUuid(cfg, 'gatt.txUuid', DEFAULT_TX_UUID),
		rxUuid: readUuid(cfg, 'gatt.rxUuid', DEFAULT_RX_UUID),
		rssiUuid: readUuid(cfg, 'gatt.rssiUuid', DEFAULT_RSSI_UUID),
		opcodes
	};
}

// ---------------------------------------------------------------------------
// Simulated peripheral
// ---------------------------------------------------------------------------

export interface PeripheralConfigSnapshot {
	name: string;
	gatt: GattConfigSnapshot;
	notifyHz: number;
	defaultPayloadBytes: number;
	backlogLimit: number;
	phyProfile: PhyProfile;
	preset: string;
	profile: Readonly<FaultProfile>;
	/** Fixed seed for reproducible fault patterns. */
	seed?: number;
	/** Auto-stop after this many seconds; 0 runs until interrupted. */
	runForS: number;
	logLevel: LogLevel;
}

const PHY_PROFILES: readonly PhyProfile[] = ['fixed', 'varying'];

const PROFILE_NUMBER_KEYS: ReadonlyArray<keyof FaultProfile> = [
	'dropPercent',
	'dropBurstPercent',
	'dropBurstLen',
	'intervalJitterMs',
	'latencySpikeMs',
	'latencySpikeChance',
	'malformedChance',
	'disconnectChance',
	'commandIgnoreChance',
	'rssiBaseDbm',
	'rssiWaveAmplitude',
	'rssiWavePeriodS',
	'rssiDriftDbm',
	'rssiDropThresholdDbm',
	'rssiDropExtraPercent'
];

function readOverrideNumber(cfg: ConfigSource, key: string): number | undefined {
	const raw = cfg.get(key);
	if (raw === undefined || raw === null || raw === '') {
		return undefined;
	}
	const value = typeof raw === 'string' ? Number(raw.trim()) : raw;
	if (typeof value !== 'number' || !Number.isFinite(value)) {
		throw new ConfigError(`${key} must be a number, got ${JSON.stringify(raw)}.`, key);
	}
	return value;
}

async function readCurve(cfg: ConfigSource, key: string): Promise<number[] | undefined> {
	const inline = cfg.get(key);
	const fileKey = `${key}File`;
	const filePath = sanitizeString(cfg.get(fileKey), '');
	const source: unknown = filePath ? await readJsonFile(filePath) : inline;
	if (source === undefined || source === null || source === '') {
		return undefined;
	}
	if (typeof source !== 'string' && !Array.isArray(source)) {
		throw new ConfigError(`${filePath ? fileKey : key} must be a list of numbers.`, key);
	}
	const values = typeof source === 'string' ? source.split(',').map((entry) => Number(entry.trim())) : source;
	const numbers = values.filter((entry): entry is number => typeof entry === 'number');
	if (numbers.length !== values.length || numbers.length === 0) {
		throw new ConfigError(`${filePath ? fileKey : key} must be a non-empty list of numbers.`, key);
	}
	return numbers;
}

export async function readFaultOverrides(cfg: ConfigSource): Promise<Partial<FaultProfile>> {
	const overrides: Partial<FaultProfile> = {};
	for (const field of PROFILE_NUMBER_KEYS) {
		const value = readOverrideNumber(cfg, `peripheral.fault.${field}`);
		if (value !== undefined) {
			Object.assign(overrides, { [field]: value });
		}
	}
	overrides.dropProfile = await readCurve(cfg, 'peripheral.fault.dropProfile');
	overrides.intervalProfileMs = await readCurve(cfg, 'peripheral.fault.intervalProfileMs');
	return overrides;
}

export async function readPeripheralConfig(cfg: ConfigSource): Promise<PeripheralConfigSnapshot> {
	const preset = sanitizeString(cfg.get('peripheral.preset'), DEFAULT_FAULT_PRESET);
	const profile = resolveFaultProfile(preset, await readFaultOverrides(cfg));
	const seedRaw = cfg.get('peripheral.seed');

	return Object.freeze({
		name: sanitizeString(cfg.get('peripheral.name'), 'ThroughputLab'),
		gatt: readGattConfig(cfg),
		notifyHz: sanitizeNumber(cfg.get('peripheral.notifyHz'), 40, 0.1),
		defaultPayloadBytes: Math.min(MAX_PAYLOAD_BYTES, sanitizeInteger(cfg.get('peripheral.payloadBytes'), 120, 1)),
		backlogLimit: sanitizeInteger(cfg.get('peripheral.backlogLimit'), 0, 0),
		phyProfile: sanitizeEnum(cfg.get('peripheral.phyProfile'), PHY_PROFILES, 'fixed'),
		preset,
		profile,
		seed: seedRaw === undefined ? undefined : sanitizeInteger(seedRaw, 0, 0),
		runForS: sanitizeNumber(cfg.get('peripheral.runForS'), 0, 0),
		logLevel: sanitizeEnum(cfg.get('logging.level'), LOG_LEVELS, 'info')
	});
}

// ---------------------------------------------------------------------------
// Sweep
// ---------------------------------------------------------------------------

export type SweepTransport = 'ble' | 'loopback';

export interface ConnectionConfigSnapshot {
	timeoutS: number;
	maxAttempts: number;
	retryDelayS: number;
	mtu: number;
}

export interface SweepConfigSnapshot {
	transport: SweepTransport;
	target: string;
	/** Lock key; defaults to the target. */
	adapter: string;
	scenarios: string[];
	phys: PhyMode[];
	payloads: number[];
	repeats: number;
	durationS: number;
	packetCount: number;
	resume: boolean;
	lockWaitMs: number;
	lockDir: string;
	outDir: string;
	resultsDir: string;
	manifestDir: string;
	note: string;
	throughput: boolean;
	latency: { enabled: boolean; mode: LatencyMode; iterations: number; timeoutS: number; interDelayS: number };
	rssi: { enabled: boolean; samples: number; intervalS: number };
	connection: ConnectionConfigSnapshot;
	gatt: GattConfigSnapshot;
	logLevel: LogLevel;
}

export const DEFAULT_SCENARIOS = ['baseline', 'hand_behind_body', 'phone_in_pocket', 'phone_in_backpack'];
export const DEFAULT_PAYLOADS = [20, 60, 120, 180, 244];
export const DEFAULT_PHYS: PhyMode[] = ['coded', 'auto'];
export const MIN_SWEEP_PAYLOAD = 20;

export function validatePayloads(payloads: readonly number[]): void {
	for (const payload of payloads) {
		if (!Number.isInteger(payload) || payload < MIN_SWEEP_PAYLOAD || payload > MAX_PAYLOAD_BYTES) {
			throw new ConfigError(
				`Payload ${payload} is outside ${MIN_SWEEP_PAYLOAD}-${MAX_PAYLOAD_BYTES} bytes (ATT constraints).`,
				'payloads'
			);
		}
	}
}

function readPhys(cfg: ConfigSource): PhyMode[] {
	const raw = sanitizeStringList(cfg.get('sweep.phys'));
	if (raw.length === 0) {
		return [...DEFAULT_PHYS];
	}
	return raw.map((entry) => {
		const phy = PHY_MODES.find((mode) => mode === entry.toLowerCase());
		if (!phy) {
			throw new ConfigError(`Unknown PHY "${entry}". Expected one of: ${PHY_MODES.join(', ')}.`, 'sweep.phys');
		}
		return phy;
	});
}

export function readSweepConfig(cfg: ConfigSource): SweepConfigSnapshot {
	const transport = sanitizeEnum<SweepTransport>(cfg.get('sweep.transport'), ['ble', 'loopback'], 'ble');
	const target = sanitizeString(cfg.get('sweep.target'), transport === 'loopback' ? 'loopback' : '');
	if (!target) {
		throw new ConfigError('sweep.target (BLE address or name of the peripheral) is required.', 'sweep.target');
	}

	const payloadList = sanitizeIntegerList(cfg.get('sweep.payloads'));
	const payloads = payloadList.length > 0 ? payloadList : [...DEFAULT_PAYLOADS];
	validatePayloads(payloads);
	const scenarioList = sanitizeStringList(cfg.get('sweep.scenarios'));

	return Object.freeze({
		transport,
		target,
		adapter: sanitizeString(cfg.get('sweep.adapter'), target),
		scenarios: scenarioList.length > 0 ? scenarioList : [...DEFAULT_SCENARIOS],
		phys: readPhys(cfg),
		payloads,
		repeats: sanitizeInteger(cfg.get('sweep.repeats'), 2, 1),
		durationS: sanitizeNumber(cfg.get('sweep.durationS'), 30, 0.1),
		packetCount: sanitizeInteger(cfg.get('sweep.packetCount'), 0, 0),
		resume: sanitizeBoolean(cfg.get('sweep.resume'), false),
		lockWaitMs: sanitizeInteger(cfg.get('sweep.lockWaitMs'), 0, 0),
		lockDir: sanitizeString(cfg.get('sweep.lockDir'), path.join(os.tmpdir(), 'ble_runner_locks')),
		outDir: sanitizeString(cfg.get('sweep.outDir'), path.join('logs', 'ble')),
		resultsDir: sanitizeString(cfg.get('sweep.resultsDir'), path.join('results', 'tables')),
		manifestDir: sanitizeString(cfg.get('sweep.manifestDir'), path.join('results', 'manifests')),
		note: sanitizeString(cfg.get('sweep.note'), ''),
		throughput: !sanitizeBoolean(cfg.get('sweep.skipThroughput'), false),
		latency: {
			enabled: !sanitizeBoolean(cfg.get('sweep.skipLatency'), false),
			mode: sanitizeEnum(cfg.get('latency.mode'), LATENCY_MODES, 'start'),
			iterations: sanitizeInteger(cfg.get('latency.iterations'), 5, 1),
			timeoutS: sanitizeNumber(cfg.get('latency.timeoutS'), 5, 0.1),
			interDelayS: sanitizeNumber(cfg.get('latency.interDelayS'), 0.5, 0)
		},
		rssi: {
			enabled: !sanitizeBoolean(cfg.get('sweep.skipRssi'), false),
			samples: sanitizeInteger(cfg.get('rssi.samples'), 20, 1),
			intervalS: sanitizeNumber(cfg.get('rssi.intervalS'), 1, 0)
		},
		connection: {
			timeoutS: sanitizeNumber(cfg.get('connection.timeoutS'), 20, 0.1),
			maxAttempts: sanitizeInteger(cfg.get('connection.attempts'), 3, 1),
			retryDelayS: sanitizeNumber(cfg.get('connection.retryDelayS'), 2, 0),
			mtu: sanitizeInteger(cfg.get('connection.mtu'), 247, 23)
		},
		gatt: readGattConfig(cfg),
		logLevel: sanitizeEnum(cfg.get('logging.level'), LOG_LEVELS, 'info')
	});
}
