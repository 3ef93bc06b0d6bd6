/**
 * Logging
 *
 * pino loggers writing to up to two sinks at once, each with its own level:
 * - console: JSON lines on stdout, or pino-pretty output for development
 * - file: JSON lines in a file rotated by size through pino-roll
 *
 * The logger itself runs at the lowest sink level; each sink drops what is
 * below its own.
 */

import { join, parse } from 'node:path';
import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export const LogLevel = {
	TRACE: 'trace',
	DEBUG: 'debug',
	INFO: 'info',
	WARN: 'warn',
	ERROR: 'error',
	FATAL: 'fatal',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/** Levels from most to least verbose */
const LEVEL_ORDER: readonly LogLevel[] = Object.values(LogLevel);

export const DEFAULT_ROTATION_SIZE = '100m';

export interface ConsoleSink {
	level: LogLevel;
	/** Human-readable output through pino-pretty */
	pretty?: boolean;
	/** Colour pretty output (default: true) */
	colorize?: boolean;
	/** Stream receiving JSON lines instead of stdout; `pretty` is ignored */
	stream?: DestinationStream;
}

export interface FileSink {
	level: LogLevel;
	/** Log file path; rolled files get a sequence number before the extension */
	path: string;
	/** Size that starts a new file, in pino-roll units (`10k`, `100m`, `1g`) */
	rotationSize?: string;
}

export interface LoggerConfig {
	/** Service name for structured logs */
	serviceName: string;
	/** Additional base context */
	base?: Record<string, unknown>;
	/** Console sink; `false` turns it off (default: info on stdout) */
	console?: ConsoleSink | false;
	/** File sink; off when absent */
	file?: FileSink;
}

interface SinkStream {
	level: LogLevel;
	stream: DestinationStream;
}

/**
 * Create a configured pino logger writing to the configured sinks.
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *     serviceName: 'billing',
 *     console: { level: 'debug', pretty: true },
 *     file: { level: 'info', path: 'logs/billing.log' },
 * });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const sinks = [...consoleStreams(config.console), ...fileStreams(config.file)];
	const options: LoggerOptions = {
		level: sinks.length === 0 ? 'silent' : lowestLevel(sinks.map((sink) => sink.level)),
		base: {
			service: config.serviceName,
			...config.base,
		},
		timestamp: pino.stdTimeFunctions.isoTime,
		formatters: {
			level: (label) => ({ level: label }),
		},
	};

	if (sinks.length === 0) {
		return pino(options);
	}
	return pino(options, pino.multistream(sinks));
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
	return parent.child(bindings);
}

export function lowestLevel(levels: readonly LogLevel[]): LogLevel {
	let lowest: LogLevel = LogLevel.FATAL;
	for (const level of levels) {
		if (LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(lowest)) {
			lowest = level;
		}
	}
	return lowest;
}

function consoleStreams(sink: ConsoleSink | false | undefined): SinkStream[] {
	if (sink === false) {
		return [];
	}
	const { level, pretty = false, colorize = true, stream } = sink ?? { level: LogLevel.INFO };

	if (stream) {
		return [{ level, stream }];
	}
	if (pretty) {
		const prettyStream = pino.transport({
			target: 'pino-pretty',
			options: {
				colorize,
				translateTime: 'SYS:standard',
				ignore: 'pid,hostname',
				destination: 1,
			},
		});
		return [{ level, stream: prettyStream }];
	}
	return [{ level, stream: pino.destination(1) }];
}

function fileStreams(sink: FileSink | undefined): SinkStream[] {
	if (!sink) {
		return [];
	}
	const { dir, name, ext } = parse(sink.path);
	const stream = pino.transport({
		target: 'pino-roll',
		options: {
			file: join(dir, name),
			extension: ext,
			size: sink.rotationSize ?? DEFAULT_ROTATION_SIZE,
			mkdir: true,
		},
	});
	return [{ level: sink.level, stream }];
}

let defaultLogger: Logger = createLogger({ serviceName: 'app' });

export function setDefaultLogger(logger: Logger): void {
	defaultLogger = logger;
}

/**
 * Process default logger, used where no logger is passed in
 */
export function getLogger(): Logger {
	return defaultLogger;
}
