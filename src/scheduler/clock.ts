import { performance } from 'node:perf_hooks';
import { TrialAbortedError } from '../errors/labErrors';

/**
 * Monotonic time source shared by pacing, timeouts and retry waits.
 * Every wait takes an optional signal and rejects with `TrialAbortedError` once it fires.
 */
export interface Clock {
	now(): number;
	sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class SystemClock implements Clock {
	public now(): number {
		return performance.now();
	}

	public sleep(ms: number, signal?: AbortSignal): Promise<void> {
		if (signal?.aborted) {
			return Promise.reject(new TrialAbortedError('Wait aborted before it started.'));
		}

		return new Promise<void>((resolve, reject) => {
			const onAbort = () => {
				clearTimeout(handle);
				reject(new TrialAbortedError('Wait aborted.'));
			};
			const handle = setTimeout(() => {
				signal?.removeEventListener('abort', onAbort);
				resolve();
			}, Math.max(0, ms));
			signal?.addEventListener('abort', onAbort, { once: true });
		});
	}
}

/**
 * Races `operation` against a clock deadline. Resolves `{ timedOut: true }` when the
 * deadline passes first; the operation keeps running and its late result, or late
 * rejection, is absorbed by the race.
 */
export async function withDeadline<T>(
	clock: Clock,
	timeoutMs: number,
	operation: Promise<T>,
	signal?: AbortSignal
): Promise<{ timedOut: false; value: T } | { timedOut: true }> {
	const timer = new AbortController();
	const detach = linkAbort(signal, timer);
	const deadline = clock.sleep(timeoutMs, timer.signal).then(
		() => ({ timedOut: true as const }),
		() => undefined
	);

	try {
		const winner = await Promise.race([
			operation.then((value) => ({ timedOut: false as const, value })),
			deadline.then((result) => {
				if (result) {
					return result;
				}
				throw new TrialAbortedError();
			})
		]);
		return winner;
	} finally {
		detach();
		timer.abort();
	}
}

export function linkAbort(signal: AbortSignal | undefined, target: AbortController): () => void {
	if (!signal) {
		return () => undefined;
	}

	if (signal.aborted) {
		target.abort(signal.reason);
		return () => undefined;
	}

	const onAbort = () => {
		target.abort(signal.reason);
	};

	signal.addEventListener('abort', onAbort, { once: true });
	return () => signal.removeEventListener('abort', onAbort);
}
