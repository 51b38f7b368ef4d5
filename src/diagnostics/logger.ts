export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogMeta = Record<string, unknown>;

export interface Logger {
	error(message: string, meta?: LogMeta): void;
	warn(message: string, meta?: LogMeta): void;
	info(message: string, meta?: LogMeta): void;
	debug(message: string, meta?: LogMeta): void;
	trace(message: string, meta?: LogMeta): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

const LEVEL_RANK: Record<LogLevel, number> = {
	error: 0,
	warn: 1,
	info: 2,
	debug: 3,
	trace: 4
};

/** Errors serialise as `Name: message`; bigints as decimal strings. */
function metaReplacer(_key: string, value: unknown): unknown {
	if (value instanceof Error) {
		return `${value.name}: ${value.message}`;
	}
	if (typeof value === 'bigint') {
		return value.toString();
	}
	return value;
}

function serializeMeta(meta: LogMeta): string {
	try {
		return JSON.stringify(meta, metaReplacer);
	} catch {
		return '{"meta":"unserializable"}';
	}
}

export class NoopLogger implements Logger {
	public error(_message: string, _meta?: LogMeta): void {}
	public warn(_message: string, _meta?: LogMeta): void {}
	public info(_message: string, _meta?: LogMeta): void {}
	public debug(_message: string, _meta?: LogMeta): void {}
	public trace(_message: string, _meta?: LogMeta): void {}
}

export interface LineLoggerOptions {
	level?: LogLevel;
	/** Tag printed after the level, e.g. `sweep` or `peripheral`. */
	scope?: string;
	now?: () => Date;
}

/**
 * Formats `[timestamp] [level] [scope] message {meta}` lines and hands them to a sink:
 * stderr for the CLIs, an array in tests.
 */
export class LineLogger implements Logger {
	private readonly appendLine: (line: string) => void;
	private readonly options: LineLoggerOptions;
	private readonly maxRank: number;

	public constructor(appendLine: (line: string) => void, options: LineLoggerOptions = {}) {
		this.appendLine = appendLine;
		this.options = options;
		this.maxRank = LEVEL_RANK[options.level ?? 'info'];
	}

	/** Same sink and level, nested scope (`sweep/lock`). */
	public child(scope: string): LineLogger {
		const parent = this.options.scope;
		return new LineLogger(this.appendLine, { ...this.options, scope: parent ? `${parent}/${scope}` : scope });
	}

	public isEnabled(level: LogLevel): boolean {
		return LEVEL_RANK[level] <= this.maxRank;
	}

	public error(message: string, meta?: LogMeta): void {
		this.write('error', message, meta);
	}

	public warn(message: string, meta?: LogMeta): void {
		this.write('warn', message, meta);
	}

	public info(message: string, meta?: LogMeta): void {
		this.write('info', message, meta);
	}

	public debug(message: string, meta?: LogMeta): void {
		this.write('debug', message, meta);
	}

	public trace(message: string, meta?: LogMeta): void {
		this.write('trace', message, meta);
	}

	private write(level: LogLevel, message: string, meta?: LogMeta): void {
		if (!this.isEnabled(level)) {
			return;
		}
		const timestamp = (this.options.now ?? (() => new Date()))().toISOString();
		const scope = this.options.scope ? ` [${this.options.scope}]` : '';
		const suffix = meta && Object.keys(meta).length > 0 ? ` ${serializeMeta(meta)}` : '';
		this.appendLine(`[${timestamp}] [${level}]${scope} ${message}${suffix}`);
	}
}

export function createStderrLogger(level: LogLevel = 'info', scope?: string): LineLogger {
	return new LineLogger((line) => process.stderr.write(`${line}\n`), { level, scope });
}
