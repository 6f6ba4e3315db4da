/**
 * Logger used across the catalog server.
 *
 * Writes to stderr: stdout is reserved for the MCP protocol when running
 * over stdio.
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

export type LogFn = (message: string, meta?: Record<string, unknown>) => void

export interface Logger {
	debug: LogFn
	info: LogFn
	warn: LogFn
	error: LogFn
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

function write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
	const tag = `[${level.toUpperCase()}]`
	if (meta && Object.keys(meta).length > 0) {
		console.error(tag, message, JSON.stringify(meta))
	} else {
		console.error(tag, message)
	}
}

export function createLogger(level: LogLevel = "info"): Logger {
	const threshold = LEVEL_ORDER[level]
	const at = (l: LogLevel): LogFn =>
		LEVEL_ORDER[l] >= threshold ? (message, meta) => write(l, message, meta) : () => {}
	return {
		debug: at("debug"),
		info: at("info"),
		warn: at("warn"),
		error: at("error"),
	}
}

/** No-op logger for pure call sites and tests. */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
}
