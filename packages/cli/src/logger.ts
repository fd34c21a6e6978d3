/**
 * Module logger for the command line
 * Info lines go to stdout as they are, everything else is tagged with level and module.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

interface LogContext {
	[key: string]: unknown
}

const LOG_LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
}

let currentLevel: LogLevel = 'info'

/**
 * Set the minimum log level
 */
export function setLogLevel(level: LogLevel): void {
	currentLevel = level
}

export interface Logger {
	debug(message: string, context?: LogContext): void
	info(message: string, context?: LogContext): void
	warn(message: string, context?: LogContext): void
	error(message: string, context?: LogContext): void
}

/**
 * Create a logger for a specific module
 */
export function createLogger(module: string): Logger {
	const log = (level: LogLevel, message: string, context?: LogContext) => {
		if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) return

		const line = level === 'info' ? message : `[${level.toUpperCase()}] [${module}] ${message}`

		const logFn =
			level === 'error' ? console.error : level === 'warn' ? console.warn : level === 'debug' ? console.debug : console.log

		if (context && Object.keys(context).length > 0) {
			logFn(line, context)
		} else {
			logFn(line)
		}
	}

	return {
		debug: (message, context) => log('debug', message, context),
		info: (message, context) => log('info', message, context),
		warn: (message, context) => log('warn', message, context),
		error: (message, context) => log('error', message, context),
	}
}
