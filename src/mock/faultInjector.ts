import type { FaultProfile } from './faultProfile';
import { chance, RandomSource, symmetricInt } from './randomSource';

export type PhyProfile = 'fixed' | 'varying';

export interface PacketFate {
	drop: boolean;
	dropCause?: 'random' | 'burst';
	malform: boolean;
	/** Extra delay before this packet's emission (ms). */
	spikeMs: number;
	/** Delay until the next packet is scheduled (ms). */
	nextIntervalMs: number;
	disconnect: boolean;
}

export interface FaultInjectorOptions {
	baseIntervalMs: number;
	phyProfile?: PhyProfile;
	/** Current synthesised RSSI; consulted only when an RSSI drop threshold is set. */
	readRssi?: () => number;
}

/**
 * Decides the fate of each scheduled packet from a fault profile.
 *
 * Evaluation order per packet: drop (burst, then random, then burst trigger), malform,
 * latency spike, interval jitter, disconnect. A random draw is taken only for decisions
 * whose probability is non-zero, so a scripted source maps one-to-one onto decisions.
 */
export class FaultInjector {
	private burstRemaining = 0;
	private dropCursor = 0;
	private intervalCursor = 0;
	private phyTick = 0;

	public constructor(
		private readonly profile: Readonly<FaultProfile>,
		private readonly random: RandomSource,
		private readonly options: FaultInjectorOptions
	) {}

	public decide(): PacketFate {
		const { drop, dropCause } = this.decideDrop();
		const malform = !drop && chance(this.random, this.profile.malformedChance);
		const spikeMs =
			!drop && this.profile.latencySpikeMs > 0 && chance(this.random, this.profile.latencySpikeChance)
				? this.profile.latencySpikeMs
				: 0;
		const nextIntervalMs = this.decideInterval();
		const disconnect = chance(this.random, this.profile.disconnectChance);

		return { drop, dropCause, malform, spikeMs, nextIntervalMs, disconnect };
	}

	public shouldIgnoreCommand(): boolean {
		return chance(this.random, this.profile.commandIgnoreChance);
	}

	public reset(): void {
		this.burstRemaining = 0;
		this.dropCursor = 0;
		this.intervalCursor = 0;
		this.phyTick = 0;
	}

	private decideDrop(): { drop: boolean; dropCause?: 'random' | 'burst' } {
		if (this.burstRemaining > 0) {
			this.burstRemaining -= 1;
			return { drop: true, dropCause: 'burst' };
		}

		if (chance(this.random, this.currentDropPercent())) {
			return { drop: true, dropCause: 'random' };
		}

		if (this.profile.dropBurstLen > 0 && chance(this.random, this.profile.dropBurstPercent)) {
			this.burstRemaining = Math.floor(this.profile.dropBurstLen);
			return { drop: true, dropCause: 'burst' };
		}

		return { drop: false };
	}

	private currentDropPercent(): number {
		let percent = this.profile.dropPercent;
		const curve = this.profile.dropProfile;
		if (curve && curve.length > 0) {
			percent = curve[this.dropCursor % curve.length] * 100;
			this.dropCursor += 1;
		}

		const threshold = this.profile.rssiDropThresholdDbm;
		const extra = this.profile.rssiDropExtraPercent ?? 0;
		if (threshold !== undefined && extra > 0 && this.options.readRssi && this.options.readRssi() < threshold) {
			percent += extra;
		}
		return Math.min(100, percent);
	}

	private decideInterval(): number {
		let delay = this.options.baseIntervalMs;
		const curve = this.profile.intervalProfileMs;
		if (curve && curve.length > 0) {
			delay = curve[this.intervalCursor % curve.length];
			this.intervalCursor += 1;
		}

		if (this.profile.intervalJitterMs > 0) {
			delay = Math.max(1, delay + symmetricInt(this.random, this.profile.intervalJitterMs));
		}

		if (this.options.phyProfile === 'varying') {
			this.phyTick = (this.phyTick + 1) % 100;
			if (this.phyTick === 0) {
				delay = Math.floor(delay * 1.5);
			} else if (this.phyTick % 10 === 0) {
				delay = Math.max(1, Math.floor(delay * 0.8));
			}
		}

		return delay;
	}
}
