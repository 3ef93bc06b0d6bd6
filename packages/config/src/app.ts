import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod/v4';
import { CommonEnvSchemas, parseEnv } from './env.js';

/** YEAR.MONTH.PATCH, e.g. 2025.12.1 */
export const VERSION_PATTERN = /^\d{4}\.\d{1,2}\.\d+$/;

/** First year a release may carry */
export const MIN_VERSION_YEAR = 2025;

export type VersionError =
	| { readonly type: 'invalid_format'; readonly version: string; readonly message: string }
	| {
			readonly type: 'invalid_year';
			readonly version: string;
			readonly minYear: number;
			readonly maxYear: number;
			readonly message: string;
	  }
	| { readonly type: 'invalid_month'; readonly version: string; readonly message: string };

/**
 * Check a calendar version. The year may run at most one past `currentYear`.
 */
export function validateAppVersion(
	version: string,
	currentYear: number = new Date().getFullYear(),
): Result<string, VersionError> {
	if (!VERSION_PATTERN.test(version)) {
		return err({
			type: 'invalid_format',
			version,
			message: 'Version must have the YEAR.MONTH.PATCH format (for example 2025.12.1)',
		});
	}

	const [yearPart = '', monthPart = ''] = version.split('.');
	const year = Number.parseInt(yearPart, 10);
	const month = Number.parseInt(monthPart, 10);
	const maxYear = currentYear + 1;

	if (year < MIN_VERSION_YEAR || year > maxYear) {
		return err({
			type: 'invalid_year',
			version,
			minYear: MIN_VERSION_YEAR,
			maxYear,
			message: `Version year must be between ${MIN_VERSION_YEAR} and ${maxYear}`,
		});
	}

	if (month < 1 || month > 12) {
		return err({ type: 'invalid_month', version, message: 'Version month must be between 1 and 12' });
	}

	return ok(version);
}

export interface AppSettings {
	readonly name: string;
	readonly version: string;
	readonly debug: boolean;
}

/**
 * Environment variables read by {@link loadAppSettings}.
 */
export function appEnvSchema(currentYear: number = new Date().getFullYear()) {
	return z.object({
		APP_NAME: CommonEnvSchemas.nonEmptyString,
		APP_VERSION: z.string().superRefine((value, ctx) => {
			const result = validateAppVersion(value, currentYear);
			if (result.isErr()) {
				ctx.addIssue({ code: 'custom', message: result.error.message, input: value });
			}
		}),
		APP_DEBUG: CommonEnvSchemas.boolean,
	});
}

/**
 * Load application identity from `APP_*` environment variables.
 */
export function loadAppSettings(
	env: Record<string, string | undefined> = process.env,
	currentYear: number = new Date().getFullYear(),
): AppSettings {
	const parsed = parseEnv(appEnvSchema(currentYear), env);
	return Object.freeze({ name: parsed.APP_NAME, version: parsed.APP_VERSION, debug: parsed.APP_DEBUG });
}
