/**
 * Data Access Errors
 *
 * Discriminated union of the conditions raised by the connection manager,
 * sessions and repositories. Recoverable kinds travel as `Result` errors;
 * wiring faults are thrown as a {@link DataAccessException} carrying the same
 * object.
 */

import { AppException, HttpStatus } from '@tablekit/errors';

export interface PayloadIssue {
	readonly path: string;
	readonly message: string;
}

export type NotInitializedError = { readonly type: 'not_initialized'; readonly message: string };

export type EmptySessionError = { readonly type: 'empty_session'; readonly message: string };

export type NoModelError = { readonly type: 'no_model'; readonly message: string };

export type SessionClosedError = { readonly type: 'session_closed'; readonly message: string };

export type NotFoundError = {
	readonly type: 'not_found';
	readonly model: string;
	readonly field: 'id' | 'uuid';
	readonly value: number | string;
	readonly message: string;
};

export type NoUuidSupportError = { readonly type: 'no_uuid_support'; readonly model: string; readonly message: string };

export type NoPrimaryKeyError = { readonly type: 'no_primary_key'; readonly model: string; readonly message: string };

export type DeactivationNotSupportedError = {
	readonly type: 'deactivation_not_supported';
	readonly model: string;
	readonly message: string;
};

export type InvalidPayloadError = {
	readonly type: 'invalid_payload';
	readonly model: string;
	readonly issues: readonly PayloadIssue[];
	readonly message: string;
};

export type DataAccessError =
	| NotInitializedError
	| EmptySessionError
	| NoModelError
	| SessionClosedError
	| NotFoundError
	| NoUuidSupportError
	| NoPrimaryKeyError
	| DeactivationNotSupportedError
	| InvalidPayloadError;

export type DataAccessErrorType = DataAccessError['type'];

const DATA_ACCESS_ERROR_TYPES: ReadonlySet<string> = new Set<DataAccessErrorType>([
	'not_initialized',
	'empty_session',
	'no_model',
	'session_closed',
	'not_found',
	'no_uuid_support',
	'no_primary_key',
	'deactivation_not_supported',
	'invalid_payload',
]);

/**
 * Factory functions for data access errors.
 */
export const DataAccessErrors = {
	notInitialized(): NotInitializedError {
		return { type: 'not_initialized', message: 'Connection manager is not initialized' };
	},

	emptySession(): EmptySessionError {
		return { type: 'empty_session', message: 'Repository requires a database session' };
	},

	noModel(): NoModelError {
		return { type: 'no_model', message: 'Repository requires an entity model' };
	},

	sessionClosed(): SessionClosedError {
		return { type: 'session_closed', message: 'Session is closed' };
	},

	notFound(model: string, field: 'id' | 'uuid', value: number | string): NotFoundError {
		return { type: 'not_found', model, field, value, message: `${model} with ${field} ${value} not found` };
	},

	noUuidSupport(model: string): NoUuidSupportError {
		return { type: 'no_uuid_support', model, message: `${model} has no uuid field` };
	},

	noPrimaryKey(model: string): NoPrimaryKeyError {
		return { type: 'no_primary_key', model, message: `Update of ${model} requires an id or uuid` };
	},

	deactivationNotSupported(model: string): DeactivationNotSupportedError {
		return { type: 'deactivation_not_supported', model, message: `${model} does not support deactivation` };
	},

	invalidPayload(model: string, issues: readonly PayloadIssue[]): InvalidPayloadError {
		return { type: 'invalid_payload', model, issues, message: `Invalid ${model} payload` };
	},

	/**
	 * Status code a caller would surface for the error.
	 */
	httpStatus(error: DataAccessError): HttpStatus {
		switch (error.type) {
			case 'not_found':
				return HttpStatus.NOT_FOUND;
			case 'no_primary_key':
				return HttpStatus.BAD_REQUEST;
			case 'invalid_payload':
				return HttpStatus.UNPROCESSABLE_ENTITY;
			case 'no_uuid_support':
			case 'deactivation_not_supported':
				return HttpStatus.NOT_IMPLEMENTED;
			case 'not_initialized':
			case 'empty_session':
			case 'no_model':
			case 'session_closed':
				return HttpStatus.INTERNAL_SERVER_ERROR;
		}
	},

	isDataAccessError(value: unknown): value is DataAccessError {
		return (
			typeof value === 'object' &&
			value !== null &&
			'type' in value &&
			typeof value.type === 'string' &&
			DATA_ACCESS_ERROR_TYPES.has(value.type) &&
			'message' in value &&
			typeof value.message === 'string'
		);
	},

	toException(error: DataAccessError): DataAccessException {
		return new DataAccessException(error);
	},
};

function detailsOf(error: DataAccessError): Record<string, unknown> {
	const details: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(error)) {
		if (key !== 'type' && key !== 'message') {
			details[key] = value;
		}
	}
	return details;
}

/**
 * Thrown form of a data access error.
 */
export class DataAccessException extends AppException {
	constructor(public readonly error: DataAccessError) {
		super(error.message, DataAccessErrors.httpStatus(error), error.type.toUpperCase(), detailsOf(error));
		this.name = 'DataAccessException';
	}
}
