import { LabError } from './LabError';
import type { ConnectionAttempt } from '../client/connectionTypes';

/**
 * Error codes raised by the peripheral, the measurement client and the sweep runner.
 */
export type LabErrorCode =
	| 'CONFIG_INVALID'
	| 'CONNECTION_EXHAUSTED'
	| 'PROTOCOL_VIOLATION'
	| 'LINK_LOST'
	| 'LOCK_CONTENTION'
	| 'ABORTED'
	| 'COMMAND_FAILED';

/**
 * Recommended operator action for recovery.
 */
export type LabRecoveryAction =
	| 'fix-config'
	| 'check-peripheral'
	| 'rerun-trial'
	| 'wait-for-lock'
	| 'none';

export class ConfigError extends LabError {
	public readonly field?: string;

	public constructor(message: string, field?: string) {
		super('CONFIG_INVALID', message);
		this.name = 'ConfigError';
		this.field = field;
	}
}

export class ConnectionExhaustedError extends LabError {
	public readonly target: string;
	public readonly attempts: readonly ConnectionAttempt[];

	public constructor(target: string, attempts: readonly ConnectionAttempt[], cause?: unknown) {
		const last = attempts[attempts.length - 1];
		const detail = last?.error ? ` (${last.error})` : '';
		super(
			'CONNECTION_EXHAUSTED',
			`Failed to connect to ${target} after ${attempts.length} attempt(s)${detail}.`,
			cause
		);
		this.name = 'ConnectionExhaustedError';
		this.target = target;
		this.attempts = attempts;
	}
}

export class ProtocolError extends LabError {
	public constructor(message: string) {
		super('PROTOCOL_VIOLATION', message);
		this.name = 'ProtocolError';
	}
}

export class LinkLostError extends LabError {
	public readonly reason: string;

	public constructor(reason: string) {
		super('LINK_LOST', `Link lost during measurement: ${reason}.`);
		this.name = 'LinkLostError';
		this.reason = reason;
	}
}

export class LockContentionError extends LabError {
	public readonly lockPath: string;
	public readonly holder?: string;

	public constructor(lockPath: string, holder?: string) {
		super(
			'LOCK_CONTENTION',
			`Another run appears to be using this adapter; lock ${lockPath} is held${holder ? ` by ${holder}` : ''}.`
		);
		this.name = 'LockContentionError';
		this.lockPath = lockPath;
		this.holder = holder;
	}
}

export class TrialAbortedError extends LabError {
	public constructor(message = 'Trial aborted by operator.') {
		super('ABORTED', message);
		this.name = 'TrialAbortedError';
	}
}

export class CommandWriteError extends LabError {
	public readonly command: string;

	public constructor(command: string, cause: unknown) {
		super('COMMAND_FAILED', `Command "${command}" could not be written: ${toErrorMessage(cause)}`, cause);
		this.name = 'CommandWriteError';
		this.command = command;
	}
}

export const LAB_ERROR_HINTS: Record<LabErrorCode, { message: string; action: LabRecoveryAction }> = {
	CONFIG_INVALID: {
		message: 'A parameter or fault profile value is outside its valid range.',
		action: 'fix-config'
	},
	CONNECTION_EXHAUSTED: {
		message: 'Every connection attempt failed. The peripheral may be off, out of range or still bonded elsewhere.',
		action: 'check-peripheral'
	},
	PROTOCOL_VIOLATION: {
		message: 'A command or packet did not match the throughput service layout.',
		action: 'none'
	},
	LINK_LOST: {
		message: 'The link dropped mid-stream; the trial was recorded with partial data.',
		action: 'rerun-trial'
	},
	LOCK_CONTENTION: {
		message: 'Another sweep holds the adapter lock.',
		action: 'wait-for-lock'
	},
	ABORTED: {
		message: 'The operator interrupted the run.',
		action: 'none'
	},
	COMMAND_FAILED: {
		message: 'A control write to the RX characteristic failed.',
		action: 'rerun-trial'
	}
};

function isLabErrorCode(code: string): code is LabErrorCode {
	return Object.prototype.hasOwnProperty.call(LAB_ERROR_HINTS, code);
}

export function toErrorKind(error: unknown): LabErrorCode | 'UNKNOWN' {
	if (error instanceof LabError && isLabErrorCode(error.code)) {
		return error.code;
	}
	return 'UNKNOWN';
}

export function toErrorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}

/** Message plus the operator hint for lab errors; foreign errors keep their message. */
export function formatErrorWithHint(error: unknown): string {
	const kind = toErrorKind(error);
	const message = toErrorMessage(error);
	return kind === 'UNKNOWN' ? message : `${message} (${LAB_ERROR_HINTS[kind].message})`;
}
