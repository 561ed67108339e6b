/**
 * JSON logging for the planner
 *
 * Structured JSON lines written to a sink. The default sink is stderr so that
 * stdout stays reserved for the reassignment plan.
 */

/**
 * Log levels supported by the logger
 * 'silent' disables all logging
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug'

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug']

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
	silent: -1,
	error: 0,
	warn: 1,
	info: 2,
	debug: 3,
}

/**
 * Receives one serialized log line (without trailing newline)
 */
export type LogSink = (line: string) => void

/**
 * Logger interface for structured logging
 */
export interface Logger {
	error(message: string, context?: Record<string, unknown>): void
	warn(message: string, context?: Record<string, unknown>): void
	info(message: string, context?: Record<string, unknown>): void
	debug(message: string, context?: Record<string, unknown>): void

	/**
	 * Create a child logger with additional default context
	 */
	child(defaultContext: Record<string, unknown>): Logger
}

export const stderrSink: LogSink = line => {
	process.stderr.write(`${line}\n`)
}

class JsonLogger implements Logger {
	private readonly level: LogLevel
	private readonly defaultContext: Record<string, unknown>
	private readonly sink: LogSink

	constructor(level: LogLevel, defaultContext: Record<string, unknown>, sink: LogSink) {
		this.level = level
		this.defaultContext = defaultContext
		this.sink = sink
	}

	private shouldLog(level: LogLevel): boolean {
		return LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[this.level]
	}

	private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
		if (!this.shouldLog(level)) {
			return
		}

		this.sink(
			JSON.stringify({
				level,
				message,
				timestamp: new Date().toISOString(),
				...this.defaultContext,
				...context,
			})
		)
	}

	error(message: string, context?: Record<string, unknown>): void {
		this.log('error', message, context)
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.log('warn', message, context)
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.log('info', message, context)
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.log('debug', message, context)
	}

	child(defaultContext: Record<string, unknown>): Logger {
		return new JsonLogger(this.level, { ...this.defaultContext, ...defaultContext }, this.sink)
	}
}

class NoopLogger implements Logger {
	error(): void {
		// no-op
	}

	warn(): void {
		// no-op
	}

	info(): void {
		// no-op
	}

	debug(): void {
		// no-op
	}

	child(): Logger {
		return this
	}
}

/**
 * Create a JSON logger
 *
 * @param level - Minimum log level to output (default: 'info')
 * @param defaultContext - Default context to include in all log entries
 * @param sink - Where serialized lines go (default: stderr)
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug', { command: 'scale' })
 * logger.warn('partition left unchanged', { topic: 'orders', partition: 3 })
 * // stderr: {"level":"warn","message":"partition left unchanged","timestamp":"...","command":"scale","topic":"orders","partition":3}
 * ```
 */
export function createLogger(
	level: LogLevel = 'info',
	defaultContext: Record<string, unknown> = {},
	sink: LogSink = stderrSink
): Logger {
	return new JsonLogger(level, defaultContext, sink)
}

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some(level => level === value)
}

/**
 * No-op logger instance for when logging is disabled
 */
export const noopLogger: Logger = new NoopLogger()
