import { Logger, NoopLogger } from '../diagnostics/logger';
import { toErrorMessage, TrialAbortedError } from '../errors/labErrors';
import type { BleLink, BleLinkConnectOptions, BleLinkFactory, NotificationListener } from './bleLink';

interface NobleCharacteristicLike {
	uuid: string;
	writeAsync(data: Buffer, withoutResponse: boolean): Promise<void>;
	subscribeAsync(): Promise<void>;
	unsubscribeAsync(): Promise<void>;
	on(event: 'data', listener: (data: Buffer, isNotification: boolean) => void): this;
	removeAllListeners(event?: string): this;
}

interface NoblePeripheralLike {
	id: string;
	address: string;
	advertisement?: { localName?: string };
	connectAsync(): Promise<void>;
	disconnectAsync(): Promise<void>;
	cancelConnect?(): void;
	updateRssiAsync(): Promise<number>;
	discoverSomeServicesAndCharacteristicsAsync(
		serviceUuids: string[],
		characteristicUuids: string[]
	): Promise<{ characteristics: NobleCharacteristicLike[] }>;
	once(event: 'disconnect', listener: (reason?: unknown) => void): this;
	removeAllListeners(event?: string): this;
}

interface NobleModuleLike {
	state: string;
	startScanningAsync(serviceUuids?: string[], allowDuplicates?: boolean): Promise<void>;
	stopScanningAsync(): Promise<void>;
	on(event: 'discover', listener: (peripheral: NoblePeripheralLike) => void): this;
	on(event: 'stateChange', listener: (state: string) => void): this;
	removeListener(event: 'discover', listener: (peripheral: NoblePeripheralLike) => void): this;
	removeListener(event: 'stateChange', listener: (state: string) => void): this;
}

export interface NobleLinkOptions {
	serviceUuid: string;
	txUuid: string;
	rxUuid: string;
	logger?: Logger;
}

let cachedNoble: NobleModuleLike | undefined;

function loadNoble(): NobleModuleLike {
	if (cachedNoble) {
		return cachedNoble;
	}
	try {
		// eslint-disable-next-line @typescript-eslint/no-var-requires
		const mod = require('@abandonware/noble') as Partial<NobleModuleLike>;
		if (!mod || typeof mod.startScanningAsync !== 'function' || typeof mod.on !== 'function') {
			throw new Error('Invalid noble module shape.');
		}
		cachedNoble = mod as NobleModuleLike;
		return cachedNoble;
	} catch (error) {
		const detail = error instanceof Error ? error.message : String(error);
		throw new Error(`BLE central requires package "@abandonware/noble". (${detail})`);
	}
}

/** Noble reports UUIDs lower-case without dashes. */
export function toNobleUuid(uuid: string): string {
	return uuid.replace(/-/g, '').toLowerCase();
}

function matchesTarget(peripheral: NoblePeripheralLike, target: string): boolean {
	const wanted = target.trim().toLowerCase();
	return (
		peripheral.address.toLowerCase() === wanted ||
		peripheral.id.toLowerCase() === wanted.replace(/:/g, '') ||
		peripheral.advertisement?.localName?.toLowerCase() === wanted
	);
}

function abortable<T>(work: Promise<T>, signal: AbortSignal | undefined, onAbort: () => void): Promise<T> {
	if (!signal) {
		return work;
	}
	return new Promise<T>((resolve, reject) => {
		const handleAbort = () => {
			onAbort();
			reject(new TrialAbortedError('Connect aborted.'));
		};
		if (signal.aborted) {
			handleAbort();
			return;
		}
		signal.addEventListener('abort', handleAbort, { once: true });
		void work.then(
			(value) => {
				signal.removeEventListener('abort', handleAbort);
				resolve(value);
			},
			(error: unknown) => {
				signal.removeEventListener('abort', handleAbort);
				reject(error);
			}
		);
	});
}

/**
 * Central link over the host Bluetooth stack. MTU and PHY are negotiated by the stack
 * itself, so those optional operations are left out and reported as unsupported.
 */
export class NobleLink implements BleLink {
	private readonly logger: Logger;
	private peripheral?: NoblePeripheralLike;
	private tx?: NobleCharacteristicLike;
	private rx?: NobleCharacteristicLike;
	private closingLocally = false;
	private readonly disconnectListeners = new Set<(reason: string) => void>();

	public constructor(
		public readonly target: string,
		private readonly options: NobleLinkOptions
	) {
		this.logger = options.logger ?? new NoopLogger();
	}

	public async connect(options: BleLinkConnectOptions): Promise<void> {
		if (this.peripheral) {
			return;
		}
		const noble = loadNoble();
		await abortable(this.waitPoweredOn(noble), options.signal, () => undefined);
		const peripheral = await abortable(this.scan(noble), options.signal, () => {
			void noble.stopScanningAsync().catch((error: unknown) => {
				this.logger.debug('Stop scanning failed', { error: toErrorMessage(error) });
			});
		});

		await abortable(peripheral.connectAsync(), options.signal, () => peripheral.cancelConnect?.());
		const serviceUuid = toNobleUuid(this.options.serviceUuid);
		const txUuid = toNobleUuid(this.options.txUuid);
		const rxUuid = toNobleUuid(this.options.rxUuid);
		const { characteristics } = await peripheral.discoverSomeServicesAndCharacteristicsAsync(
			[serviceUuid],
			[txUuid, rxUuid]
		);
		const tx = characteristics.find((entry) => entry.uuid === txUuid);
		const rx = characteristics.find((entry) => entry.uuid === rxUuid);
		if (!tx || !rx) {
			await peripheral.disconnectAsync().catch((error: unknown) => {
				this.logger.debug('Disconnect after failed discovery failed', { error: toErrorMessage(error) });
			});
			throw new Error(`Throughput service characteristics not found on ${this.target}.`);
		}

		this.peripheral = peripheral;
		this.tx = tx;
		this.rx = rx;
		this.closingLocally = false;
		peripheral.once('disconnect', (reason) => this.handleDisconnect(reason));
		this.logger.info('Connected', { target: this.target, address: peripheral.address });
	}

	public async disconnect(): Promise<void> {
		const peripheral = this.peripheral;
		if (!peripheral) {
			return;
		}
		this.closingLocally = true;
		this.tx?.removeAllListeners('data');
		this.peripheral = undefined;
		this.tx = undefined;
		this.rx = undefined;
		try {
			await peripheral.disconnectAsync();
		} finally {
			peripheral.removeAllListeners('disconnect');
		}
	}

	public isConnected(): boolean {
		return this.peripheral !== undefined;
	}

	public async write(data: Uint8Array): Promise<void> {
		const rx = this.requireCharacteristic(this.rx);
		await rx.writeAsync(Buffer.from(data), true);
	}

	public async subscribe(listener: NotificationListener): Promise<void> {
		const tx = this.requireCharacteristic(this.tx);
		tx.removeAllListeners('data');
		tx.on('data', (data) => listener(new Uint8Array(data)));
		await tx.subscribeAsync();
	}

	public async unsubscribe(): Promise<void> {
		const tx = this.tx;
		if (!tx) {
			return;
		}
		tx.removeAllListeners('data');
		await tx.unsubscribeAsync();
	}

	public onDisconnect(listener: (reason: string) => void): () => void {
		this.disconnectListeners.add(listener);
		return () => this.disconnectListeners.delete(listener);
	}

	public async readRssi(): Promise<number | undefined> {
		if (!this.peripheral) {
			return undefined;
		}
		const value = await this.peripheral.updateRssiAsync();
		return Number.isFinite(value) ? value : undefined;
	}

	private requireCharacteristic(characteristic: NobleCharacteristicLike | undefined): NobleCharacteristicLike {
		if (!characteristic) {
			throw new Error(`BLE link to ${this.target} is not connected.`);
		}
		return characteristic;
	}

	private waitPoweredOn(noble: NobleModuleLike): Promise<void> {
		if (noble.state === 'poweredOn') {
			return Promise.resolve();
		}
		return new Promise<void>((resolve) => {
			const onState = (state: string) => {
				if (state === 'poweredOn') {
					noble.removeListener('stateChange', onState);
					resolve();
				}
			};
			noble.on('stateChange', onState);
		});
	}

	private async scan(noble: NobleModuleLike): Promise<NoblePeripheralLike> {
		const found = new Promise<NoblePeripheralLike>((resolve) => {
			const onDiscover = (peripheral: NoblePeripheralLike) => {
				if (matchesTarget(peripheral, this.target)) {
					noble.removeListener('discover', onDiscover);
					resolve(peripheral);
				}
			};
			noble.on('discover', onDiscover);
		});
		await noble.startScanningAsync([], false);
		const peripheral = await found;
		await noble.stopScanningAsync();
		return peripheral;
	}

	private handleDisconnect(reason: unknown): void {
		if (this.closingLocally) {
			return;
		}
		this.peripheral = undefined;
		this.tx = undefined;
		this.rx = undefined;
		const detail = reason === undefined ? 'peripheral disconnected' : String(reason);
		this.logger.warn('Link lost', { target: this.target, reason: detail });
		for (const listener of [...this.disconnectListeners]) {
			listener(detail);
		}
	}
}

export function createNobleLinkFactory(options: NobleLinkOptions): BleLinkFactory {
	return (target) => new NobleLink(target, options);
}
