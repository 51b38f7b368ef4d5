import { ProtocolError } from '../errors/labErrors';

export type ControlCommand =
	| { kind: 'reset' }
	| { kind: 'start'; payloadBytes?: number; packetCount: number }
	| { kind: 'stop' };

export interface CommandOpcodes {
	start: number;
	stop: number;
	reset: number;
}

export const DEFAULT_OPCODES: Readonly<CommandOpcodes> = Object.freeze({
	start: 0x01,
	stop: 0x02,
	reset: 0x03
});

/** Packet count value meaning "stream until Stop". */
export const UNBOUNDED_PACKET_COUNT = 0;

/**
 * RX layout: `[opcode]` for Stop/Reset, `[opcode][payload_bytes u8][packet_count u16 LE]`
 * for Start. Both Start fields are optional on the wire.
 */
export function encodeCommand(command: ControlCommand, opcodes: CommandOpcodes = DEFAULT_OPCODES): Uint8Array {
	if (command.kind === 'start') {
		const out = new Uint8Array(4);
		out[0] = opcodes.start & 0xff;
		out[1] = Math.max(0, Math.min(0xff, command.payloadBytes ?? 0));
		new DataView(out.buffer).setUint16(2, Math.max(0, Math.min(0xffff, command.packetCount)), true);
		return out;
	}

	return new Uint8Array([(command.kind === 'stop' ? opcodes.stop : opcodes.reset) & 0xff]);
}

export function decodeCommand(data: Uint8Array, opcodes: CommandOpcodes = DEFAULT_OPCODES): ControlCommand {
	if (data.length === 0) {
		throw new ProtocolError('Empty command write.');
	}

	const opcode = data[0];
	if (opcode === opcodes.start) {
		const payloadBytes = data.length > 1 && data[1] > 0 ? data[1] : undefined;
		const packetCount = data.length >= 4 ? data[2] | (data[3] << 8) : data.length === 3 ? data[2] : UNBOUNDED_PACKET_COUNT;
		return { kind: 'start', payloadBytes, packetCount };
	}
	if (opcode === opcodes.stop) {
		return { kind: 'stop' };
	}
	if (opcode === opcodes.reset) {
		return { kind: 'reset' };
	}

	throw new ProtocolError(`Unknown command opcode 0x${opcode.toString(16).padStart(2, '0')}.`);
}
