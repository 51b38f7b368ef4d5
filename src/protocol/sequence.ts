export const SEQUENCE_SPACE = 0x1_0000;
const MAX_UINT16 = 0xffff;
const HALF_SPACE = 0x8000;

export function nextSequence(sequence: number): number {
	return (sequence + 1) & MAX_UINT16;
}

/**
 * Forward distance from `from` to `to` on the 16-bit ring.
 */
export function sequenceDistance(from: number, to: number): number {
	return (to - from) & MAX_UINT16;
}

/**
 * True when `candidate` lies ahead of `reference` (within half the ring).
 */
export function isAhead(reference: number, candidate: number): boolean {
	const distance = sequenceDistance(reference, candidate);
	return distance > 0 && distance < HALF_SPACE;
}

export function deviceTimestamp(nowMs: number): number {
	return Math.floor(nowMs) & MAX_UINT16;
}
