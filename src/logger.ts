/**
 * @file Leveled logger shared by the builder's execution layer.
 */

/**
 * Available log levels in order of priority (from lowest to highest).
 */
export enum LogLevel {
	/** Log all messages */
	ALL = 0,
	DEBUG = 10,
	INFO = 20,
	WARN = 30,
	ERROR = 40,
	/** Disable all logging */
	OFF = 50
}

/**
 * Structured payload attached to a log entry.
 */
export type LogData = Record<string, unknown>;

export interface LogEntry {
	timestamp: Date;
	level: LogLevel;
	message: string;
	context?: string;
	data?: LogData;
}

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
	/** The minimum log level to output (default: INFO) */
	level?: LogLevel;
	/** Whether to output logs to console (default: true) */
	console?: boolean;
	/** Custom log formatter function */
	formatter?: (entry: LogEntry) => string;
	/** Custom log handler function; replaces console output */
	handler?: (entry: LogEntry) => void;
}

/**
 * Logger bound to a fixed context, as returned by `getLogger`.
 */
export interface ContextLogger {
	debug(message: string, data?: LogData): void;
	info(message: string, data?: LogData): void;
	warn(message: string, data?: LogData): void;
	error(message: string, data?: LogData): void;
}

/**
 * Formats an entry as `<ISO time> <LEVEL> [context] message {data}`.
 */
export const defaultFormatter = (entry: LogEntry): string => {
	const timestamp = entry.timestamp.toISOString();
	const level = LogLevel[entry.level].padEnd(5);
	const context = entry.context ? `[${entry.context}] ` : '';
	const data = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
	return `${timestamp} ${level} ${context}${entry.message}${data}`;
};

export class Logger {
	private config: Required<LoggerConfig>;

	constructor(config: LoggerConfig = {}) {
		this.config = {
			level: config.level ?? LogLevel.INFO,
			console: config.console ?? true,
			formatter: config.formatter ?? defaultFormatter,
			handler: config.handler ?? ((entry: LogEntry) => this.writeToConsole(entry))
		};
	}

	/**
	 * Updates the logger configuration. Omitted options keep their values.
	 */
	configure(config: Partial<LoggerConfig>): void {
		this.config = {
			level: config.level ?? this.config.level,
			console: config.console ?? this.config.console,
			formatter: config.formatter ?? this.config.formatter,
			handler: config.handler ?? this.config.handler
		};
	}

	getLevel(): LogLevel {
		return this.config.level;
	}

	setLevel(level: LogLevel): void {
		this.config.level = level;
	}

	/**
	 * Whether a message at `level` would be emitted.
	 */
	isEnabled(level: LogLevel): boolean {
		return this.config.level !== LogLevel.OFF && level >= this.config.level;
	}

	private writeToConsole(entry: LogEntry): void {
		if (!this.config.console) return;

		const formatted = this.config.formatter(entry);

		switch (entry.level) {
			case LogLevel.ERROR:
				console.error(formatted);
				break;
			case LogLevel.WARN:
				console.warn(formatted);
				break;
			case LogLevel.DEBUG:
				console.debug(formatted);
				break;
			default:
				console.log(formatted);
				break;
		}
	}

	private log(level: LogLevel, message: string, context?: string, data?: LogData): void {
		if (!this.isEnabled(level)) return;

		this.config.handler({
			timestamp: new Date(),
			level,
			message,
			context,
			data
		});
	}

	debug(message: string, context?: string, data?: LogData): void {
		this.log(LogLevel.DEBUG, message, context, data);
	}

	info(message: string, context?: string, data?: LogData): void {
		this.log(LogLevel.INFO, message, context, data);
	}

	warn(message: string, context?: string, data?: LogData): void {
		this.log(LogLevel.WARN, message, context, data);
	}

	error(message: string, context?: string, data?: LogData): void {
		this.log(LogLevel.ERROR, message, context, data);
	}
}

/**
 * Process-wide logger; configure it to change library log output.
 */
export const globalLogger = new Logger();

/**
 * Returns a facade over `globalLogger` that tags every entry with `context`.
 */
export function getLogger(context?: string): ContextLogger {
	return {
		debug: (message, data) => globalLogger.debug(message, context, data),
		info: (message, data) => globalLogger.info(message, context, data),
		warn: (message, data) => globalLogger.warn(message, context, data),
		error: (message, data) => globalLogger.error(message, context, data)
	};
}
