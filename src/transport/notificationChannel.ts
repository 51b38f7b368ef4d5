import { TrialAbortedError } from '../errors/labErrors';
import type { Clock } from '../scheduler/clock';

interface Waiter<T> {
	resolve(value: T | undefined): void;
	reject(error: unknown): void;
	timer: AbortController;
}

export const DEFAULT_CHANNEL_CAPACITY = 4096;

/**
 * Bounded FIFO between a link's notification callback and a single consumer. Items
 * keep arrival order; a full channel drops the newest item and counts it.
 */
export class NotificationChannel<T> {
	private readonly queue: T[] = [];
	private waiter?: Waiter<T>;
	private closed = false;
	private closeError?: unknown;
	private dropped = 0;

	public constructor(
		private readonly clock: Clock,
		private readonly capacity = DEFAULT_CHANNEL_CAPACITY
	) {}

	public get size(): number {
		return this.queue.length;
	}

	public get droppedCount(): number {
		return this.dropped;
	}

	public isClosed(): boolean {
		return this.closed;
	}

	public push(item: T): boolean {
		if (this.closed) {
			return false;
		}

		const waiter = this.waiter;
		if (waiter) {
			this.waiter = undefined;
			waiter.timer.abort();
			waiter.resolve(item);
			return true;
		}

		if (this.queue.length >= this.capacity) {
			this.dropped += 1;
			return false;
		}

		this.queue.push(item);
		return true;
	}

	/**
	 * Next item, or `undefined` after `timeoutMs` without one. Once closed, queued items
	 * still drain; after that the close error is thrown, or `undefined` returned.
	 */
	public next(timeoutMs: number, signal?: AbortSignal): Promise<T | undefined> {
		if (signal?.aborted) {
			return Promise.reject(new TrialAbortedError());
		}
		if (this.queue.length > 0) {
			return Promise.resolve(this.queue.shift());
		}
		if (this.closed) {
			return this.closeError === undefined ? Promise.resolve(undefined) : Promise.reject(this.closeError);
		}
		if (this.waiter) {
			return Promise.reject(new Error('NotificationChannel supports a single consumer.'));
		}
		if (timeoutMs <= 0) {
			return Promise.resolve(undefined);
		}

		return new Promise<T | undefined>((resolve, reject) => {
			const timer = new AbortController();
			const waiter: Waiter<T> = { resolve, reject, timer };
			this.waiter = waiter;

			const onAbort = () => {
				if (this.waiter === waiter) {
					this.waiter = undefined;
					timer.abort();
					reject(new TrialAbortedError());
				}
			};
			signal?.addEventListener('abort', onAbort, { once: true });

			void this.clock.sleep(timeoutMs, timer.signal).then(
				() => {
					signal?.removeEventListener('abort', onAbort);
					if (this.waiter === waiter) {
						this.waiter = undefined;
						resolve(undefined);
					}
				},
				() => {
					signal?.removeEventListener('abort', onAbort);
				}
			);
		});
	}

	public close(error?: unknown): void {
		if (this.closed) {
			return;
		}
		this.closed = true;
		this.closeError = error;

		const waiter = this.waiter;
		if (!waiter) {
			return;
		}
		this.waiter = undefined;
		waiter.timer.abort();
		if (error === undefined) {
			waiter.resolve(undefined);
		} else {
			waiter.reject(error);
		}
	}

	public clear(): void {
		this.queue.length = 0;
	}
}
