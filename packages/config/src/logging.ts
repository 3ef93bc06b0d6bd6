import { z } from 'zod/v4';
import { CommonEnvSchemas, parseEnv } from './env.js';

type Level = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface ConsoleLoggingSettings {
	readonly level: Level;
	readonly pretty: boolean;
	readonly colorize: boolean;
}

export interface FileLoggingSettings {
	readonly level: Level;
	readonly path: string;
	/** pino-roll size: digits and a `k`, `m` or `g` unit */
	readonly rotationSize: string;
}

export interface LoggingSettings {
	/** `false` when console output is turned off */
	readonly console: ConsoleLoggingSettings | false;
	/** Present only when file output is turned on */
	readonly file?: FileLoggingSettings;
}

export const DEFAULT_LOG_FILE_PATH = 'logs/app.log';

export const loggingEnvSchema = z.object({
	LOG_CONSOLE_ENABLE: CommonEnvSchemas.boolean.prefault('true'),
	LOG_CONSOLE_LEVEL: CommonEnvSchemas.logLevel,
	LOG_CONSOLE_PRETTY: CommonEnvSchemas.boolean,
	LOG_CONSOLE_COLOR: CommonEnvSchemas.boolean.prefault('true'),
	LOG_FILE_ENABLE: CommonEnvSchemas.boolean,
	LOG_FILE_PATH: CommonEnvSchemas.nonEmptyString.default(DEFAULT_LOG_FILE_PATH),
	LOG_FILE_LEVEL: CommonEnvSchemas.logLevel,
	LOG_FILE_ROTATION: z
		.string()
		.trim()
		.toLowerCase()
		.regex(/^\d+[kmg]$/, 'must be a size such as 10k, 100m or 1g')
		.default('100m'),
});

/**
 * Load sink settings from `LOG_CONSOLE_*` and `LOG_FILE_*` environment
 * variables. The result spreads straight into `createLogger` alongside a
 * service name.
 */
export function loadLoggingSettings(env: Record<string, string | undefined> = process.env): LoggingSettings {
	const parsed = parseEnv(loggingEnvSchema, env);

	const consoleSink: ConsoleLoggingSettings | false = parsed.LOG_CONSOLE_ENABLE
		? { level: parsed.LOG_CONSOLE_LEVEL, pretty: parsed.LOG_CONSOLE_PRETTY, colorize: parsed.LOG_CONSOLE_COLOR }
		: false;

	if (!parsed.LOG_FILE_ENABLE) {
		return { console: consoleSink };
	}
	return {
		console: consoleSink,
		file: { level: parsed.LOG_FILE_LEVEL, path: parsed.LOG_FILE_PATH, rotationSize: parsed.LOG_FILE_ROTATION },
	};
}
