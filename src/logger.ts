/**
 * Where the engine and the blog nodes report progress: graph compilation,
 * each node start and finish, skipped topics and failed model calls.
 */
export interface ILogger {
	debug: (message: string, meta?: Record<string, unknown>) => void
	info: (message: string, meta?: Record<string, unknown>) => void
	warn: (message: string, meta?: Record<string, unknown>) => void
	error: (message: string, meta?: Record<string, unknown>) => void
}

/** Discards everything. Compiled graphs use it unless given a logger. */
export class NullLogger implements ILogger {
	debug() { /* no-op */ }
	info() { /* no-op */ }
	warn() { /* no-op */ }
	error() { /* no-op */ }
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[]

/** The console methods a `ConsoleLogger` writes through. */
export type LogOutput = Pick<Console, LogLevel>

const levelPriorities: Record<LogLevel, number> = {
	debug: 1,
	info: 2,
	warn: 3,
	error: 4,
}

export interface ConsoleLoggerOptions {
	/** Lowest level written. Defaults to 'info'. */
	level?: LogLevel
	/**
	 * Defaults to the global `console`. The CLI passes one bound to stderr so
	 * that generated posts and JSON on stdout stay clean.
	 */
	output?: LogOutput
}

/** Writes `[LEVEL] message` lines, dropping anything below the configured level. */
export class ConsoleLogger implements ILogger {
	private readonly minLevel: LogLevel
	private readonly output: LogOutput

	constructor(options: ConsoleLoggerOptions = {}) {
		this.minLevel = options.level ?? 'info'
		this.output = options.output ?? console
	}

	private log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
		if (levelPriorities[level] < levelPriorities[this.minLevel]) {
			return
		}

		const line = `[${level.toUpperCase()}] ${message}`
		if (meta && Object.keys(meta).length > 0) {
			this.output[level](line, meta)
		}
		else {
			this.output[level](line)
		}
	}

	debug(message: string, meta?: Record<string, unknown>) { this.log('debug', message, meta) }
	info(message: string, meta?: Record<string, unknown>) { this.log('info', message, meta) }
	warn(message: string, meta?: Record<string, unknown>) { this.log('warn', message, meta) }
	error(message: string, meta?: Record<string, unknown>) { this.log('error', message, meta) }
}
