export interface NotificationPacket {
	sequence: number;
	timestamp: number;
	payload: Uint8Array;
}

/** `[SEQ_LO][SEQ_HI][TS_LO][TS_HI]` */
export const NOTIFICATION_HEADER_BYTES = 4;

/** Largest DATA section the peripheral streams (ATT value limit at MTU 247). */
export const MAX_PAYLOAD_BYTES = 244;

export const PAYLOAD_FILLER = 0xaa;

export function encodeNotification(sequence: number, timestamp: number, payloadBytes: number): Uint8Array {
	const out = new Uint8Array(NOTIFICATION_HEADER_BYTES + Math.max(0, payloadBytes));
	const view = new DataView(out.buffer);

	view.setUint16(0, sequence & 0xffff, true);
	view.setUint16(2, timestamp & 0xffff, true);
	out.fill(PAYLOAD_FILLER, NOTIFICATION_HEADER_BYTES);
	return out;
}

/**
 * Decodes as much of a notification as is present. Returns `undefined` when the value is
 * too short to carry a sequence number; `timestamp` is `undefined` below 4 bytes.
 */
export function decodeNotification(
	value: Uint8Array
): { sequence: number; timestamp?: number; payload: Uint8Array } | undefined {
	if (value.length < 2) {
		return undefined;
	}

	const view = new DataView(value.buffer, value.byteOffset, value.byteLength);
	const sequence = view.getUint16(0, true);
	if (value.length < NOTIFICATION_HEADER_BYTES) {
		return { sequence, payload: new Uint8Array() };
	}

	return {
		sequence,
		timestamp: view.getUint16(2, true),
		payload: value.subarray(NOTIFICATION_HEADER_BYTES)
	};
}

/**
 * Corrupts a notification the way a truncated over-the-air value looks: half its
 * length, never below two bytes so the sequence stays readable.
 */
export function truncateNotification(value: Uint8Array): Uint8Array {
	return value.slice(0, Math.max(2, Math.floor(value.length / 2)));
}
