import { Logger, NoopLogger } from '../diagnostics/logger';
import { ConnectionExhaustedError, toErrorMessage, TrialAbortedError } from '../errors/labErrors';
import { Clock, linkAbort, SystemClock, withDeadline } from '../scheduler/clock';
import type { BleLink, BleLinkFactory, PhyMode } from '../transport/bleLink';
import type { ConnectionAttempt, ConnectionResult, ConnectOptions, MtuResult, PhyResult } from './connectionTypes';

export const PHY_REQUEST_ATTEMPTS = 3;

export interface ConnectionManagerOptions {
	factory: BleLinkFactory;
	clock?: Clock;
	logger?: Logger;
}

/**
 * Retry loop around the physical connect, plus one-time MTU/PHY negotiation. Holds at
 * most one link; `disconnect()` may be called at any point and never throws.
 */
export class ConnectionManager {
	private readonly factory: BleLinkFactory;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private link?: BleLink;

	public constructor(options: ConnectionManagerOptions) {
		this.factory = options.factory;
		this.clock = options.clock ?? new SystemClock();
		this.logger = options.logger ?? new NoopLogger();
	}

	public getLink(): BleLink | undefined {
		return this.link;
	}

	public async connect(target: string, options: ConnectOptions): Promise<ConnectionResult> {
		await this.disconnect();

		const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
		const timeoutMs = Math.max(1, options.timeoutS * 1000);
		const attempts: ConnectionAttempt[] = [];
		let lastError: unknown;

		for (let attemptIndex = 1; attemptIndex <= maxAttempts; attemptIndex += 1) {
			if (options.signal?.aborted) {
				throw new TrialAbortedError();
			}

			const link = this.factory(target);
			const attemptAbort = new AbortController();
			const detach = linkAbort(options.signal, attemptAbort);
			const startedAt = this.clock.now();
			const elapsedS = () => (this.clock.now() - startedAt) / 1000;

			try {
				const outcome = await withDeadline(
					this.clock,
					timeoutMs,
					link.connect({ timeoutMs, signal: attemptAbort.signal }),
					options.signal
				);
				if (outcome.timedOut) {
					attemptAbort.abort();
					lastError = new Error(`Connect timed out after ${options.timeoutS}s.`);
					attempts.push({
						attemptIndex,
						timeoutS: options.timeoutS,
						outcome: 'timeout',
						elapsedS: elapsedS(),
						error: toErrorMessage(lastError)
					});
				} else {
					attempts.push({ attemptIndex, timeoutS: options.timeoutS, outcome: 'success', elapsedS: elapsedS() });
					this.link = link;
					this.logger.info('Connected', { target, attempt: attemptIndex, maxAttempts });
					return await this.negotiate(link, options, attempts);
				}
			} catch (error) {
				if (error instanceof TrialAbortedError || options.signal?.aborted) {
					attemptAbort.abort();
					await this.closeLink(link);
					this.link = undefined;
					throw error instanceof TrialAbortedError ? error : new TrialAbortedError();
				}
				lastError = error;
				attempts.push({
					attemptIndex,
					timeoutS: options.timeoutS,
					outcome: 'error',
					elapsedS: elapsedS(),
					error: toErrorMessage(error)
				});
			} finally {
				detach();
			}

			await this.closeLink(link);
			this.logger.warn('Connection attempt failed', {
				target,
				attempt: attemptIndex,
				maxAttempts,
				error: toErrorMessage(lastError)
			});
			if (attemptIndex < maxAttempts) {
				await this.clock.sleep(options.retryDelayS * 1000, options.signal);
			}
		}

		throw new ConnectionExhaustedError(target, attempts, lastError);
	}

	public async disconnect(): Promise<void> {
		const link = this.link;
		this.link = undefined;
		if (link) {
			await this.closeLink(link);
		}
	}

	/**
	 * Runs `fn` on a fresh connection and disconnects on every exit path.
	 */
	public async withConnection<T>(
		target: string,
		options: ConnectOptions,
		fn: (connection: ConnectionResult) => Promise<T>
	): Promise<T> {
		try {
			const connection = await this.connect(target, options);
			return await fn(connection);
		} finally {
			await this.disconnect();
		}
	}

	private async negotiate(
		link: BleLink,
		options: ConnectOptions,
		attempts: ConnectionAttempt[]
	): Promise<ConnectionResult> {
		const warnings: string[] = [];
		const mtu = options.mtu === undefined ? undefined : await this.requestMtu(link, options.mtu, warnings);
		const phy = await this.requestPhy(link, options.phy ?? 'auto', warnings);
		for (const warning of warnings) {
			this.logger.warn(warning, { target: link.target });
		}
		return { link, attemptsUsed: attempts.length, attempts, mtu, phy, warnings };
	}

	private async requestMtu(link: BleLink, requested: number, warnings: string[]): Promise<MtuResult> {
		if (!link.requestMtu) {
			warnings.push(`MTU request (${requested}) unsupported by this link.`);
			return { requested, status: 'unsupported' };
		}
		try {
			const negotiated = await link.requestMtu(requested);
			return { requested, status: 'success', negotiated };
		} catch (error) {
			warnings.push(`MTU request (${requested}) failed: ${toErrorMessage(error)}`);
			return { requested, status: 'failed', error: toErrorMessage(error) };
		}
	}

	private async requestPhy(link: BleLink, requested: PhyMode, warnings: string[]): Promise<PhyResult> {
		if (requested === 'auto') {
			return { requested, applied: 'auto', status: 'skipped', requestsMade: 0 };
		}
		if (!link.requestPhy) {
			warnings.push(`PHY request (${requested}) unsupported by this link; using auto.`);
			return { requested, applied: 'auto', status: 'unsupported', requestsMade: 0 };
		}

		let lastError = '';
		for (let request = 1; request <= PHY_REQUEST_ATTEMPTS; request += 1) {
			try {
				await link.requestPhy(requested);
				return { requested, applied: requested, status: 'success', requestsMade: request };
			} catch (error) {
				lastError = toErrorMessage(error);
			}
		}

		warnings.push(`PHY request (${requested}) failed ${PHY_REQUEST_ATTEMPTS} times (${lastError}); falling back to auto.`);
		return {
			requested,
			applied: 'auto',
			status: 'failed',
			requestsMade: PHY_REQUEST_ATTEMPTS,
			error: lastError
		};
	}

	private async closeLink(link: BleLink): Promise<void> {
		try {
			await link.disconnect();
		} catch (error) {
			this.logger.debug('Disconnect failed', { target: link.target, error: toErrorMessage(error) });
		}
	}
}
