import { describe, it, expect } from 'vitest';
import { loadAppSettings, validateAppVersion } from '../index.js';

describe('validateAppVersion', () => {
	it('should accept a version in the current year', () => {
		const result = validateAppVersion('2025.12.1', 2025);

		expect(result.isOk()).toBe(true);
		expect(result._unsafeUnwrap()).toBe('2025.12.1');
	});

	it('should accept a version one year ahead', () => {
		expect(validateAppVersion('2026.1.0', 2025).isOk()).toBe(true);
	});

	it('should reject malformed versions', () => {
		for (const version of ['v1.2.3', '2025.1', '25.1.0', '2025.123.0', '2025.1.0-beta']) {
			const result = validateAppVersion(version, 2025);
			expect(result._unsafeUnwrapErr().type).toBe('invalid_format');
		}
	});

	it('should reject a year before the first release year', () => {
		const error = validateAppVersion('2024.5.0', 2025)._unsafeUnwrapErr();

		expect(error.type).toBe('invalid_year');
		expect(error.message).toBe('Version year must be between 2025 and 2026');
	});

	it('should reject a year more than one ahead', () => {
		const error = validateAppVersion('2027.1.0', 2025)._unsafeUnwrapErr();

		expect(error).toMatchObject({ type: 'invalid_year', minYear: 2025, maxYear: 2026 });
	});

	it('should reject months outside 1 to 12', () => {
		expect(validateAppVersion('2025.0.1', 2025)._unsafeUnwrapErr().type).toBe('invalid_month');
		expect(validateAppVersion('2025.13.1', 2025)._unsafeUnwrapErr().type).toBe('invalid_month');
	});
});

describe('loadAppSettings', () => {
	it('should load name, version and debug flag', () => {
		const settings = loadAppSettings({ APP_NAME: 'inventory', APP_VERSION: '2025.3.2', APP_DEBUG: '1' }, 2025);

		expect(settings).toEqual({ name: 'inventory', version: '2025.3.2', debug: true });
	});

	it('should default debug to false', () => {
		expect(loadAppSettings({ APP_NAME: 'inventory', APP_VERSION: '2025.3.2' }, 2025).debug).toBe(false);
	});

	it('should report an invalid version against its variable', () => {
		expect(() => loadAppSettings({ APP_NAME: 'inventory', APP_VERSION: '2025.13.0' }, 2025)).toThrow(
			'Environment validation failed:\n  APP_VERSION: Version month must be between 1 and 12',
		);
	});
});
