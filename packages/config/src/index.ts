/**
 * @tablekit/config
 *
 * Environment-driven settings. Every loader validates with zod and throws a
 * single error listing each invalid variable.
 */

export { z } from 'zod/v4';

export { parseEnv, parseWith, CommonEnvSchemas, type ConfigType } from './env.js';

export {
	createDatabaseSettings,
	loadDatabaseSettings,
	databaseEnvSchema,
	type DatabaseSettings,
	type DatabaseSettingsInput,
} from './database.js';

export {
	validateAppVersion,
	loadAppSettings,
	appEnvSchema,
	VERSION_PATTERN,
	MIN_VERSION_YEAR,
	type AppSettings,
	type VersionError,
} from './app.js';

export {
	DEFAULT_LOG_FILE_PATH,
	loadLoggingSettings,
	loggingEnvSchema,
	type ConsoleLoggingSettings,
	type FileLoggingSettings,
	type LoggingSettings,
} from './logging.js';
