import 'dotenv/config';
import { z } from 'zod/v4';

/**
 * Validate input against a schema, throwing one error that lists every
 * failing field.
 */
export function parseWith<T extends z.ZodType>(schema: T, input: unknown, context: string): z.output<T> {
	const result = schema.safeParse(input);

	if (!result.success) {
		const errors = result.error.issues.map((issue) => {
			const key = issue.path.map(String).join('.') || '(root)';
			return `  ${key}: ${issue.message}`;
		});

		throw new Error(`${context} validation failed:\n${errors.join('\n')}`);
	}

	return result.data;
}

/**
 * Parse environment variables with Zod schema validation.
 * Throws a descriptive error if validation fails.
 */
export function parseEnv<T extends z.ZodRawShape>(
	schema: z.ZodObject<T>,
	env: Record<string, string | undefined> = process.env,
): z.infer<z.ZodObject<T>> {
	return parseWith(schema, env, 'Environment');
}

/**
 * Common environment variable schemas for reuse.
 *
 * Note: In zod v4, .default() on a transformed schema expects the OUTPUT type.
 * Use .prefault() to provide an INPUT default (applied before parsing).
 */
export const CommonEnvSchemas = {
	/** Log level enum */
	logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

	/** Port number */
	port: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().min(1).max(65535)),

	/** Boolean from string */
	boolean: z
		.string()
		.transform((v) => v === 'true' || v === '1')
		.prefault('false'),

	/** Positive integer from string */
	positiveInt: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().positive()),

	/** Trimmed string that must not be blank */
	nonEmptyString: z.string().trim().min(1, 'must not be empty'),
};

/**
 * Type helper to extract config type from schema
 */
export type ConfigType<T extends z.ZodObject<z.ZodRawShape>> = z.infer<T>;
