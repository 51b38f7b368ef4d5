import { Logger, NoopLogger } from '../diagnostics/logger';
import { toErrorMessage } from '../errors/labErrors';
import type { PeripheralRuntime, PeripheralSession } from '../mock/peripheralSession';

type ResultCallback = (result: number, data?: Buffer) => void;

interface BlenoCharacteristicOptions {
	uuid: string;
	properties: string[];
	onSubscribe?: (maxValueSize: number, updateValueCallback: (data: Buffer) => void) => void;
	onUnsubscribe?: () => void;
	onNotify?: () => void;
	onWriteRequest?: (data: Buffer, offset: number, withoutResponse: boolean, callback: (result: number) => void) => void;
	onReadRequest?: (offset: number, callback: ResultCallback) => void;
}

interface BlenoCharacteristicCtor {
	new (options: BlenoCharacteristicOptions): object;
	RESULT_SUCCESS: number;
	RESULT_UNLIKELY_ERROR: number;
}

interface BlenoModuleLike {
	state: string;
	Characteristic: BlenoCharacteristicCtor;
	PrimaryService: new (options: { uuid: string; characteristics: object[] }) => object;
	on(event: 'stateChange', listener: (state: string) => void): this;
	on(event: 'accept' | 'disconnect', listener: (clientAddress: string) => void): this;
	on(event: 'rssiUpdate', listener: (rssi: number) => void): this;
	removeAllListeners(event?: string): this;
	setServices(services: object[], callback: (error?: Error | null) => void): void;
	startAdvertising(name: string, serviceUuids: string[], callback: (error?: Error | null) => void): void;
	stopAdvertising(callback?: () => void): void;
	updateRssi(callback?: (error: Error | null, rssi: number) => void): void;
	disconnect(): void;
}

export interface BlenoHostOptions {
	name: string;
	serviceUuid: string;
	txUuid: string;
	rxUuid: string;
	rssiUuid?: string;
	logger?: Logger;
}

function loadBleno(): BlenoModuleLike {
	try {
		// eslint-disable-next-line @typescript-eslint/no-var-requires
		const mod = require('@abandonware/bleno') as Partial<BlenoModuleLike>;
		if (!mod || typeof mod.setServices !== 'function' || typeof mod.Characteristic !== 'function') {
			throw new Error('Invalid bleno module shape.');
		}
		return mod as BlenoModuleLike;
	} catch (error) {
		const detail = error instanceof Error ? error.message : String(error);
		throw new Error(`Simulated peripheral requires package "@abandonware/bleno". (${detail})`);
	}
}

function toBlenoUuid(uuid: string): string {
	return uuid.replace(/-/g, '').toLowerCase();
}

function fromCallback(register: (callback: (error?: Error | null) => void) => void): Promise<void> {
	return new Promise<void>((resolve, reject) => {
		register((error) => (error ? reject(error) : resolve()));
	});
}

/**
 * GATT server for the throughput service on the host adapter. Each accepted central gets
 * a fresh session from the runtime; TX sends resolve when bleno reports them sent.
 */
export class BlenoHost {
	private readonly logger: Logger;
	private bleno?: BlenoModuleLike;
	private updateValue?: (data: Buffer) => void;
	private readonly pendingSends: Array<() => void> = [];
	private hardwareRssi?: number;

	public constructor(
		private readonly runtime: PeripheralRuntime,
		private readonly options: BlenoHostOptions
	) {
		this.logger = options.logger ?? new NoopLogger();
	}

	public async start(): Promise<void> {
		const bleno = loadBleno();
		this.bleno = bleno;
		await this.waitPoweredOn(bleno);

		bleno.on('accept', (clientAddress) => this.handleAccept(bleno, clientAddress));
		bleno.on('disconnect', (clientAddress) => this.handleDisconnect(clientAddress));
		bleno.on('rssiUpdate', (rssi) => {
			this.hardwareRssi = rssi;
		});

		const service = new bleno.PrimaryService({
			uuid: toBlenoUuid(this.options.serviceUuid),
			characteristics: this.createCharacteristics(bleno)
		});
		await fromCallback((callback) => bleno.setServices([service], callback));
		await fromCallback((callback) =>
			bleno.startAdvertising(this.options.name, [toBlenoUuid(this.options.serviceUuid)], callback)
		);
		this.logger.info('Advertising throughput service', { name: this.options.name });
	}

	public async stop(): Promise<void> {
		const bleno = this.bleno;
		if (!bleno) {
			return;
		}
		this.bleno = undefined;
		this.runtime.closeSession();
		this.flushPendingSends();
		await new Promise<void>((resolve) => bleno.stopAdvertising(() => resolve()));
		bleno.disconnect();
		bleno.removeAllListeners();
		this.logger.info('Peripheral stopped');
	}

	private createCharacteristics(bleno: BlenoModuleLike): object[] {
		const { Characteristic } = bleno;
		const characteristics: object[] = [
			new Characteristic({
				uuid: toBlenoUuid(this.options.txUuid),
				properties: ['notify'],
				onSubscribe: (_maxValueSize, updateValueCallback) => {
					this.updateValue = updateValueCallback;
					this.runtime.getSession()?.setSubscribed(true);
				},
				onUnsubscribe: () => {
					this.updateValue = undefined;
					this.runtime.getSession()?.setSubscribed(false);
					this.flushPendingSends();
				},
				onNotify: () => {
					this.pendingSends.shift()?.();
				}
			}),
			new Characteristic({
				uuid: toBlenoUuid(this.options.rxUuid),
				properties: ['write', 'writeWithoutResponse'],
				onWriteRequest: (data, _offset, _withoutResponse, callback) => {
					const outcome = this.runtime.getSession()?.handleWrite(new Uint8Array(data));
					if (outcome?.status === 'rejected') {
						this.logger.warn('RX write rejected', { error: outcome.error.message });
					}
					callback(Characteristic.RESULT_SUCCESS);
				}
			})
		];

		if (this.options.rssiUuid) {
			characteristics.push(
				new Characteristic({
					uuid: toBlenoUuid(this.options.rssiUuid),
					properties: ['read'],
					onReadRequest: (_offset, callback) => {
						const session = this.runtime.getSession();
						if (!session) {
							callback(Characteristic.RESULT_UNLIKELY_ERROR);
							return;
						}
						const value = Buffer.alloc(1);
						value.writeInt8(session.readRssi(), 0);
						callback(Characteristic.RESULT_SUCCESS, value);
					}
				})
			);
		}

		return characteristics;
	}

	private handleAccept(bleno: BlenoModuleLike, clientAddress: string): void {
		this.hardwareRssi = undefined;
		this.runtime.openSession({
			notify: (value) => this.send(value),
			disconnect: (reason) => {
				this.logger.info('Dropping central', { clientAddress, reason });
				bleno.disconnect();
			},
			readHardwareRssi: () => this.hardwareRssi
		});
		bleno.updateRssi((error, rssi) => {
			if (error) {
				this.logger.debug('Adapter RSSI unavailable', { error: toErrorMessage(error) });
				return;
			}
			this.hardwareRssi = rssi;
		});
		this.logger.info('Central accepted', { clientAddress });
	}

	private handleDisconnect(clientAddress: string): void {
		this.updateValue = undefined;
		this.flushPendingSends();
		this.runtime.closeSession();
		this.logger.info('Central disconnected', { clientAddress });
	}

	private send(value: Uint8Array): Promise<void> {
		const updateValue = this.updateValue;
		if (!updateValue) {
			return Promise.resolve();
		}
		return new Promise<void>((resolve) => {
			this.pendingSends.push(resolve);
			updateValue(Buffer.from(value));
		});
	}

	private flushPendingSends(): void {
		for (const resolve of this.pendingSends.splice(0)) {
			resolve();
		}
	}

	private waitPoweredOn(bleno: BlenoModuleLike): Promise<void> {
		if (bleno.state === 'poweredOn') {
			return Promise.resolve();
		}
		return new Promise<void>((resolve) => {
			bleno.on('stateChange', (state) => {
				if (state === 'poweredOn') {
					resolve();
				}
			});
		});
	}
}

export function describeSession(session: PeripheralSession | undefined): Record<string, unknown> {
	if (!session) {
		return { connected: false };
	}
	return { connected: true, subscribed: session.isSubscribed(), ...session.getStats() };
}
