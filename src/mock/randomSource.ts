/**
 * Single source of every probabilistic decision the peripheral makes, so a run can be
 * replayed with a scripted sequence.
 */
export interface RandomSource {
	/** Uniform value in [0, 1). */
	next(): number;
}

export class MathRandomSource implements RandomSource {
	public next(): number {
		return Math.random();
	}
}

/**
 * Mulberry32 generator; the same seed always yields the same fault pattern.
 */
export class SeededRandomSource implements RandomSource {
	private state: number;

	public constructor(seed: number) {
		this.state = seed >>> 0;
	}

	public next(): number {
		this.state = (this.state + 0x6d2b79f5) >>> 0;
		let t = this.state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4_294_967_296;
	}
}

/**
 * Replays a fixed list of draws, then keeps returning `fallback`.
 */
export class ScriptedRandomSource implements RandomSource {
	private index = 0;

	public constructor(
		private readonly values: readonly number[],
		private readonly fallback = 0.999
	) {}

	public next(): number {
		const value = this.index < this.values.length ? this.values[this.index] : this.fallback;
		this.index += 1;
		return value;
	}

	public get consumed(): number {
		return this.index;
	}
}

export function chance(random: RandomSource, percent: number): boolean {
	if (percent <= 0) {
		return false;
	}
	return random.next() < percent / 100;
}

/**
 * Integer in [-span, +span], inclusive.
 */
export function symmetricInt(random: RandomSource, span: number): number {
	const bound = Math.max(0, Math.floor(span));
	if (bound === 0) {
		return 0;
	}
	return Math.min(bound, Math.floor(random.next() * (2 * bound + 1)) - bound);
}
