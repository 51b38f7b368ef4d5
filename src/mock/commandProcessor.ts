import { Logger, NoopLogger } from '../diagnostics/logger';
import { ProtocolError } from '../errors/labErrors';
import { CommandOpcodes, ControlCommand, decodeCommand, DEFAULT_OPCODES } from '../protocol/controlCommand';
import type { FaultInjector } from './faultInjector';
import type { NotificationScheduler } from './notificationScheduler';

export type CommandOutcome =
	| { status: 'applied'; command: ControlCommand }
	| { status: 'ignored'; reason: 'empty' | 'fault' }
	| { status: 'rejected'; error: ProtocolError };

export interface CommandProcessorOptions {
	scheduler: NotificationScheduler;
	injector: FaultInjector;
	opcodes?: CommandOpcodes;
	logger?: Logger;
}

/**
 * Turns RX writes into scheduler transitions. Writes are fire-and-forget, so nothing is
 * ever reported back to the sender: missed and rejected commands only show up in the log.
 */
export class CommandProcessor {
	private readonly scheduler: NotificationScheduler;
	private readonly injector: FaultInjector;
	private readonly opcodes: CommandOpcodes;
	private readonly logger: Logger;
	private readonly counters = { applied: 0, ignored: 0, rejected: 0 };

	public constructor(options: CommandProcessorOptions) {
		this.scheduler = options.scheduler;
		this.injector = options.injector;
		this.opcodes = options.opcodes ?? DEFAULT_OPCODES;
		this.logger = options.logger ?? new NoopLogger();
	}

	public getCounters(): { applied: number; ignored: number; rejected: number } {
		return { ...this.counters };
	}

	public handleWrite(data: Uint8Array): CommandOutcome {
		if (data.length === 0) {
			this.counters.ignored += 1;
			return { status: 'ignored', reason: 'empty' };
		}

		if (this.injector.shouldIgnoreCommand()) {
			this.counters.ignored += 1;
			this.logger.info('Command ignored (simulated missed write)', { opcode: data[0] });
			return { status: 'ignored', reason: 'fault' };
		}

		let command: ControlCommand;
		try {
			command = decodeCommand(data, this.opcodes);
		} catch (error) {
			if (!(error instanceof ProtocolError)) {
				throw error;
			}
			this.counters.rejected += 1;
			this.logger.warn('Command rejected', { error: error.message });
			return { status: 'rejected', error };
		}

		this.apply(command);
		this.counters.applied += 1;
		return { status: 'applied', command };
	}

	private apply(command: ControlCommand): void {
		switch (command.kind) {
			case 'reset':
				this.scheduler.reset();
				return;
			case 'start':
				this.scheduler.start(command.payloadBytes, command.packetCount);
				return;
			case 'stop':
				this.scheduler.stop();
				return;
		}
	}
}
