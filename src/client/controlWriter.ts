import { Logger, NoopLogger } from '../diagnostics/logger';
import { CommandWriteError, toErrorMessage } from '../errors/labErrors';
import { CommandOpcodes, ControlCommand, DEFAULT_OPCODES, encodeCommand } from '../protocol/controlCommand';
import type { BleLink } from '../transport/bleLink';

export type CommandLogEntry = {
	ts: string;
	name: ControlCommand['kind'];
	command_id: number;
	payload_hex: string;
	status: 'sent' | 'error';
	error?: string;
};

function toHex(bytes: Uint8Array): string {
	return Buffer.from(bytes).toString('hex');
}

/**
 * Writes control commands to the RX characteristic and keeps the command log. A strict
 * write failure throws; a lenient one (teardown) is logged and counted.
 */
export class ControlWriter {
	public readonly log: CommandLogEntry[] = [];
	private errors = 0;
	private readonly logger: Logger;

	public constructor(
		private readonly link: BleLink,
		private readonly opcodes: CommandOpcodes = DEFAULT_OPCODES,
		logger?: Logger
	) {
		this.logger = logger ?? new NoopLogger();
	}

	public get commandErrors(): number {
		return this.errors;
	}

	public async send(command: ControlCommand, strict = true): Promise<boolean> {
		const bytes = encodeCommand(command, this.opcodes);
		const entry: CommandLogEntry = {
			ts: new Date().toISOString(),
			name: command.kind,
			command_id: bytes[0],
			payload_hex: toHex(bytes.subarray(1)),
			status: 'sent'
		};

		try {
			await this.link.write(bytes);
		} catch (error) {
			entry.status = 'error';
			entry.error = toErrorMessage(error);
			this.log.push(entry);
			if (strict) {
				throw new CommandWriteError(command.kind, error);
			}
			this.errors += 1;
			this.logger.warn('Command failed but continuing', { command: command.kind, error: entry.error });
			return false;
		}

		this.log.push(entry);
		return true;
	}
}
