import { Logger, NoopLogger } from '../diagnostics/logger';
import type { CommandOpcodes } from '../protocol/controlCommand';
import { Clock, SystemClock } from '../scheduler/clock';
import { CommandOutcome, CommandProcessor } from './commandProcessor';
import { FaultInjector, PhyProfile } from './faultInjector';
import type { FaultProfile } from './faultProfile';
import { NotificationScheduler, StreamStats } from './notificationScheduler';
import { MathRandomSource, RandomSource } from './randomSource';
import { RssiSynthesizer } from './rssiSynth';

/**
 * The connected central as seen from the GATT server (bleno or the in-process loopback).
 */
export interface GattHostLink {
	/** Resolves once the value left the (simulated) controller. */
	notify(value: Uint8Array): Promise<void>;
	disconnect(reason: string): void;
	/** Connection RSSI measured by the adapter, when the host exposes one. */
	readHardwareRssi?(): number | undefined;
}

export interface PeripheralSessionOptions {
	profile: Readonly<FaultProfile>;
	notifyHz: number;
	defaultPayloadBytes: number;
	backlogLimit?: number;
	phyProfile?: PhyProfile;
	opcodes?: CommandOpcodes;
	random?: RandomSource;
	clock?: Clock;
	logger?: Logger;
}

export function notifyIntervalMs(notifyHz: number): number {
	return Math.max(1, Math.round(1000 / Math.max(0.001, notifyHz)));
}

/**
 * Stream state for one connected central. Created when the central connects and
 * disposed when it leaves; nothing survives into the next session.
 */
export class PeripheralSession {
	public readonly scheduler: NotificationScheduler;
	public readonly processor: CommandProcessor;
	private readonly rssi: RssiSynthesizer;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private subscribed = false;
	private disposed = false;

	public constructor(
		private readonly link: GattHostLink,
		options: PeripheralSessionOptions
	) {
		this.clock = options.clock ?? new SystemClock();
		this.logger = options.logger ?? new NoopLogger();
		this.rssi = new RssiSynthesizer(options.profile, this.clock.now());

		const injector = new FaultInjector(options.profile, options.random ?? new MathRandomSource(), {
			baseIntervalMs: notifyIntervalMs(options.notifyHz),
			phyProfile: options.phyProfile,
			readRssi: () => this.readRssi()
		});

		this.scheduler = new NotificationScheduler({
			sink: {
				notify: (value) => (this.subscribed && !this.disposed ? this.link.notify(value) : Promise.resolve()),
				disconnect: (reason) => this.link.disconnect(reason)
			},
			clock: this.clock,
			injector,
			intervalMs: notifyIntervalMs(options.notifyHz),
			defaultPayloadBytes: options.defaultPayloadBytes,
			backlogLimit: options.backlogLimit,
			logger: this.logger
		});

		this.processor = new CommandProcessor({
			scheduler: this.scheduler,
			injector,
			opcodes: options.opcodes,
			logger: this.logger
		});
	}

	public handleWrite(data: Uint8Array): CommandOutcome | undefined {
		if (this.disposed) {
			return undefined;
		}
		return this.processor.handleWrite(data);
	}

	/** CCCD write: values are only pushed to the central while notifications are enabled. */
	public setSubscribed(enabled: boolean): void {
		if (this.subscribed === enabled) {
			return;
		}
		this.subscribed = enabled;
		this.logger.debug(enabled ? 'Notifications enabled' : 'Notifications disabled');
	}

	public isSubscribed(): boolean {
		return this.subscribed;
	}

	public readRssi(): number {
		return this.rssi.read(this.clock.now(), this.link.readHardwareRssi?.());
	}

	public getStats(): StreamStats {
		return this.scheduler.getStats();
	}

	public isDisposed(): boolean {
		return this.disposed;
	}

	public dispose(): void {
		if (this.disposed) {
			return;
		}
		this.scheduler.dispose();
		this.subscribed = false;
		this.disposed = true;
	}
}

/**
 * Owns at most one session. Opening a session for a new central tears the previous one
 * down first.
 */
export class PeripheralRuntime {
	private current?: PeripheralSession;
	private readonly logger: Logger;

	public constructor(private readonly options: PeripheralSessionOptions) {
		this.logger = options.logger ?? new NoopLogger();
	}

	public openSession(link: GattHostLink): PeripheralSession {
		this.closeSession();
		this.current = new PeripheralSession(link, this.options);
		this.logger.info('Central connected; session opened');
		return this.current;
	}

	public closeSession(): void {
		if (!this.current) {
			return;
		}
		const stats = this.current.getStats();
		this.current.dispose();
		this.current = undefined;
		this.logger.info('Session closed', { scheduled: stats.scheduled, dropped: stats.dropped });
	}

	public getSession(): PeripheralSession | undefined {
		return this.current;
	}
}
