import { Logger, NoopLogger } from '../diagnostics/logger';
import type { PeripheralRuntime, PeripheralSession } from '../mock/peripheralSession';
import { Clock, SystemClock } from '../scheduler/clock';
import type { BleLink, BleLinkConnectOptions, BleLinkFactory, NotificationListener, PhyMode } from './bleLink';

export const LOOPBACK_MAX_MTU = 247;

export interface LoopbackLinkOptions {
	clock?: Clock;
	/** Simulated time the connection setup takes. */
	connectDelayMs?: number;
	logger?: Logger;
}

/**
 * In-process link from the measurement client to a simulated peripheral. Values are
 * delivered on a microtask, so the client sees them asynchronously, in send order.
 */
export class LoopbackLink implements BleLink {
	public readonly writes: Uint8Array[] = [];
	public negotiatedPhy: PhyMode = 'auto';

	private readonly clock: Clock;
	private readonly connectDelayMs: number;
	private readonly logger: Logger;
	private session?: PeripheralSession;
	private listener?: NotificationListener;
	private readonly disconnectListeners = new Set<(reason: string) => void>();

	public constructor(
		public readonly target: string,
		private readonly runtime: PeripheralRuntime,
		options: LoopbackLinkOptions = {}
	) {
		this.clock = options.clock ?? new SystemClock();
		this.connectDelayMs = Math.max(0, options.connectDelayMs ?? 0);
		this.logger = options.logger ?? new NoopLogger();
	}

	public async connect(options: BleLinkConnectOptions): Promise<void> {
		if (this.session) {
			return;
		}
		if (this.connectDelayMs > 0) {
			await this.clock.sleep(Math.min(this.connectDelayMs, options.timeoutMs), options.signal);
		}
		if (this.connectDelayMs > options.timeoutMs) {
			throw new Error(`Loopback connect to ${this.target} timed out.`);
		}

		const session = this.runtime.openSession({
			notify: (value) => this.deliver(session, value),
			disconnect: (reason) => this.handleRemoteDisconnect(session, reason)
		});
		this.session = session;
		this.logger.debug('Loopback connected', { target: this.target });
	}

	public async disconnect(): Promise<void> {
		const session = this.session;
		if (!session) {
			return;
		}
		this.session = undefined;
		this.listener = undefined;
		if (this.runtime.getSession() === session) {
			this.runtime.closeSession();
		}
	}

	public isConnected(): boolean {
		return this.session !== undefined && !this.session.isDisposed();
	}

	public async write(data: Uint8Array): Promise<void> {
		const session = this.requireSession();
		this.writes.push(data.slice());
		session.handleWrite(data.slice());
	}

	public async subscribe(listener: NotificationListener): Promise<void> {
		const session = this.requireSession();
		this.listener = listener;
		session.setSubscribed(true);
	}

	public async unsubscribe(): Promise<void> {
		this.listener = undefined;
		this.session?.setSubscribed(false);
	}

	public onDisconnect(listener: (reason: string) => void): () => void {
		this.disconnectListeners.add(listener);
		return () => this.disconnectListeners.delete(listener);
	}

	public async requestMtu(mtu: number): Promise<number> {
		this.requireSession();
		return Math.max(23, Math.min(LOOPBACK_MAX_MTU, Math.floor(mtu)));
	}

	public async requestPhy(phy: PhyMode): Promise<void> {
		this.requireSession();
		this.negotiatedPhy = phy;
	}

	public async readRssi(): Promise<number | undefined> {
		return this.requireSession().readRssi();
	}

	private requireSession(): PeripheralSession {
		if (!this.session || this.session.isDisposed()) {
			throw new Error(`Loopback link to ${this.target} is not connected.`);
		}
		return this.session;
	}

	private async deliver(session: PeripheralSession, value: Uint8Array): Promise<void> {
		await Promise.resolve();
		if (this.session !== session) {
			return;
		}
		this.listener?.(value.slice());
	}

	private handleRemoteDisconnect(session: PeripheralSession, reason: string): void {
		if (this.session !== session) {
			return;
		}
		this.session = undefined;
		this.listener = undefined;
		this.runtime.closeSession();
		this.logger.info('Loopback link dropped by peripheral', { target: this.target, reason });
		for (const listener of [...this.disconnectListeners]) {
			listener(reason);
		}
	}
}

export function createLoopbackLinkFactory(runtime: PeripheralRuntime, options: LoopbackLinkOptions = {}): BleLinkFactory {
	return (target) => new LoopbackLink(target, runtime, options);
}
