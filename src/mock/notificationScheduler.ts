import { Logger, NoopLogger } from '../diagnostics/logger';
import { TrialAbortedError } from '../errors/labErrors';
import { Clock, withDeadline } from '../scheduler/clock';
import { deviceTimestamp, nextSequence } from '../protocol/sequence';
import { encodeNotification, MAX_PAYLOAD_BYTES, truncateNotification } from '../protocol/throughputPacket';
import type { FaultInjector } from './faultInjector';

export type StreamState = 'idle' | 'armed' | 'streaming';

/**
 * Where scheduled packets go. `notify` resolves once the (simulated) controller has
 * transmitted the value; `disconnect` drops the link to the central.
 */
export interface NotificationSink {
	notify(value: Uint8Array): Promise<void>;
	disconnect(reason: string): void;
}

export interface NotificationSchedulerOptions {
	sink: NotificationSink;
	clock: Clock;
	injector: FaultInjector;
	intervalMs: number;
	defaultPayloadBytes: number;
	/**
	 * Maximum sends awaiting transmission. 0 means strict flow control: each packet waits
	 * for the previous one to go out. Above 0, a packet waits only until its pacing slot and
	 * is dropped as backlog loss when the limit is already reached.
	 */
	backlogLimit?: number;
	logger?: Logger;
}

export interface StreamStats {
	sequence: number;
	scheduled: number;
	transmitted: number;
	dropped: number;
	backlogDropped: number;
	malformed: number;
	latencySpikes: number;
	disconnects: number;
	inFlight: number;
}

export type StreamEndReason = 'completed' | 'stopped' | 'reset' | 'disconnected' | 'failed';

function emptyStats(): Omit<StreamStats, 'sequence' | 'inFlight'> {
	return {
		scheduled: 0,
		transmitted: 0,
		dropped: 0,
		backlogDropped: 0,
		malformed: 0,
		latencySpikes: 0,
		disconnects: 0
	};
}

export function clampPayloadBytes(value: number | undefined, fallback: number): number {
	if (value === undefined || !Number.isFinite(value) || value <= 0) {
		return Math.max(1, Math.min(MAX_PAYLOAD_BYTES, Math.floor(fallback)));
	}
	return Math.max(1, Math.min(MAX_PAYLOAD_BYTES, Math.floor(value)));
}

/**
 * Owns the outgoing packet stream: sequence counter, pacing clock and fault shaping.
 *
 * Sequence numbers are consumed per scheduled packet, so drops of any kind leave gaps
 * the client can count. A packet count limit counts scheduled packets, dropped ones
 * included.
 *
 * Before the next packet is scheduled the stream waits for the previous transmission,
 * which models the controller's buffer: never more than `backlogLimit` sends are in flight.
 */
export class NotificationScheduler {
	private readonly sink: NotificationSink;
	private readonly clock: Clock;
	private readonly injector: FaultInjector;
	private readonly intervalMs: number;
	private readonly defaultPayloadBytes: number;
	private readonly backlogLimit: number;
	private readonly logger: Logger;

	private state: StreamState = 'idle';
	private sequence = 0;
	private stats = emptyStats();
	private inFlight = 0;
	private generation = 0;
	private pendingSend?: Promise<void>;
	private payloadBytes: number;
	private packetLimit = 0;
	private streamAbort?: AbortController;
	private streamDone: Promise<StreamEndReason> = Promise.resolve('stopped');
	private lastEndReason?: StreamEndReason;

	public constructor(options: NotificationSchedulerOptions) {
		this.sink = options.sink;
		this.clock = options.clock;
		this.injector = options.injector;
		this.intervalMs = Math.max(1, Math.floor(options.intervalMs));
		this.defaultPayloadBytes = clampPayloadBytes(options.defaultPayloadBytes, options.defaultPayloadBytes);
		this.payloadBytes = this.defaultPayloadBytes;
		this.backlogLimit = Math.max(0, Math.floor(options.backlogLimit ?? 0));
		this.logger = options.logger ?? new NoopLogger();
	}

	public getState(): StreamState {
		return this.state;
	}

	public getStats(): StreamStats {
		return { ...this.stats, sequence: this.sequence, inFlight: this.inFlight };
	}

	public getLastEndReason(): StreamEndReason | undefined {
		return this.lastEndReason;
	}

	/** Resolves when the current (or most recent) stream has ended. */
	public whenIdle(): Promise<StreamEndReason> {
		return this.streamDone;
	}

	public reset(): void {
		this.cancelStream('reset');
		this.sequence = 0;
		this.stats = emptyStats();
		this.inFlight = 0;
		this.generation += 1;
		this.pendingSend = undefined;
		this.injector.reset();
		this.state = 'armed';
		this.logger.info('Stream armed', { sequence: this.sequence });
	}

	public start(payloadBytes: number | undefined, packetCount: number): boolean {
		if (this.state === 'streaming') {
			this.logger.debug('Start ignored: already streaming');
			return false;
		}
		if (this.state !== 'armed') {
			this.logger.warn('Start ignored: stream is not armed (send Reset first)');
			return false;
		}

		this.payloadBytes = clampPayloadBytes(payloadBytes, this.defaultPayloadBytes);
		this.packetLimit = Math.max(0, Math.floor(packetCount));
		this.state = 'streaming';
		this.lastEndReason = undefined;

		const controller = new AbortController();
		this.streamAbort = controller;
		this.streamDone = this.runStream(controller);
		this.logger.info('Stream started', {
			payloadBytes: this.payloadBytes,
			packetCount: this.packetLimit,
			intervalMs: this.intervalMs
		});
		return true;
	}

	public stop(): void {
		if (this.state === 'idle') {
			return;
		}
		this.cancelStream('stopped');
		this.state = 'idle';
		this.logger.info('Stream stopped', { scheduled: this.stats.scheduled, sequence: this.sequence });
	}

	public dispose(): void {
		this.stop();
		this.generation += 1;
		this.inFlight = 0;
		this.pendingSend = undefined;
	}

	private cancelStream(reason: StreamEndReason): void {
		const controller = this.streamAbort;
		if (!controller) {
			return;
		}
		this.streamAbort = undefined;
		this.lastEndReason = reason;
		controller.abort();
	}

	private async runStream(controller: AbortController): Promise<StreamEndReason> {
		const signal = controller.signal;
		try {
			while (!signal.aborted) {
				if (this.isLimitReached()) {
					return this.finishStream(controller, 'completed');
				}

				const fate = this.injector.decide();
				const sequence = this.sequence;
				const timestamp = deviceTimestamp(this.clock.now());
				this.sequence = nextSequence(sequence);
				this.stats.scheduled += 1;

				if (fate.drop) {
					this.stats.dropped += 1;
				} else if (this.backlogLimit > 0 && this.inFlight >= this.backlogLimit) {
					this.stats.backlogDropped += 1;
					this.logger.debug('Backlog full; packet dropped', { sequence, inFlight: this.inFlight });
				} else {
					let value = encodeNotification(sequence, timestamp, this.payloadBytes);
					if (fate.malform) {
						value = truncateNotification(value);
						this.stats.malformed += 1;
					}
					if (fate.spikeMs > 0) {
						this.stats.latencySpikes += 1;
						await this.clock.sleep(fate.spikeMs, signal);
					}
					this.transmit(value);
				}

				if (fate.disconnect) {
					this.stats.disconnects += 1;
					this.logger.info('Simulating disconnect', { sequence });
					const reason = this.finishStream(controller, 'disconnected');
					this.sink.disconnect('simulated disconnect');
					return reason;
				}

				if (this.isLimitReached()) {
					return this.finishStream(controller, 'completed');
				}

				const slotAt = this.clock.now() + fate.nextIntervalMs;
				await this.awaitPreviousSend(slotAt, signal);
				const remaining = slotAt - this.clock.now();
				if (remaining > 0) {
					await this.clock.sleep(remaining, signal);
				}
			}
			return this.lastEndReason ?? 'stopped';
		} catch (error) {
			if (signal.aborted) {
				return this.lastEndReason ?? 'stopped';
			}
			this.logger.error('Stream failed', { error: error instanceof Error ? error.message : String(error) });
			return this.finishStream(controller, 'failed');
		}
	}

	private async awaitPreviousSend(slotAt: number, signal: AbortSignal): Promise<void> {
		const send = this.pendingSend;
		if (!send) {
			return;
		}
		if (this.backlogLimit === 0) {
			await untilSent(send, signal);
			return;
		}
		const result = await withDeadline(this.clock, Math.max(0, slotAt - this.clock.now()), send, signal);
		if (result.timedOut) {
			this.logger.trace('Previous send still pending at the next slot', { inFlight: this.inFlight });
		}
	}

	private isLimitReached(): boolean {
		return this.packetLimit > 0 && this.stats.scheduled >= this.packetLimit;
	}

	private finishStream(controller: AbortController, reason: StreamEndReason): StreamEndReason {
		if (this.streamAbort === controller) {
			this.streamAbort = undefined;
			this.state = 'idle';
			this.lastEndReason = reason;
			this.logger.info('Stream ended', { reason, scheduled: this.stats.scheduled });
		}
		return reason;
	}

	private transmit(value: Uint8Array): void {
		const generation = this.generation;
		this.inFlight += 1;
		this.stats.transmitted += 1;

		const settle = () => {
			if (generation === this.generation) {
				this.inFlight = Math.max(0, this.inFlight - 1);
				if (this.pendingSend === send) {
					this.pendingSend = undefined;
				}
			}
		};

		const send: Promise<void> = this.sink.notify(value).then(settle, (error: unknown) => {
			settle();
			this.logger.warn('Notification send failed', {
				error: error instanceof Error ? error.message : String(error)
			});
		});
		this.pendingSend = send;
	}
}

/** Waits for a send that never rejects, giving up only when the stream is cancelled. */
function untilSent(send: Promise<void>, signal: AbortSignal): Promise<void> {
	if (signal.aborted) {
		return Promise.reject(new TrialAbortedError('Wait aborted before it started.'));
	}
	return new Promise<void>((resolve, reject) => {
		const onAbort = () => reject(new TrialAbortedError('Wait aborted.'));
		signal.addEventListener('abort', onAbort, { once: true });
		void send.then(() => {
			signal.removeEventListener('abort', onAbort);
			resolve();
		});
	});
}
