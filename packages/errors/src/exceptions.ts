/**
 * Application Exceptions
 *
 * Exception hierarchy for failures that should surface to a caller with an
 * HTTP-like status. Each subclass fixes the status and error code and carries
 * a default message, so most call sites only pass context details.
 *
 * HTTP Status Mapping:
 * - BadRequestException → 400
 * - UnauthorizedException → 401
 * - ForbiddenException → 403
 * - NotFoundException → 404
 * - MethodNotAllowedException → 405
 * - ConflictException → 409
 * - UnprocessableEntityException → 422
 * - TooManyRequestsException → 429
 * - InternalServerErrorException → 500
 * - NotImplementedException → 501
 * - ServiceUnavailableException → 503
 */

/**
 * Status codes used by the exception hierarchy.
 */
export const HttpStatus = {
	BAD_REQUEST: 400,
	UNAUTHORIZED: 401,
	FORBIDDEN: 403,
	NOT_FOUND: 404,
	METHOD_NOT_ALLOWED: 405,
	CONFLICT: 409,
	UNPROCESSABLE_ENTITY: 422,
	TOO_MANY_REQUESTS: 429,
	INTERNAL_SERVER_ERROR: 500,
	NOT_IMPLEMENTED: 501,
	SERVICE_UNAVAILABLE: 503,
} as const;

export type HttpStatus = (typeof HttpStatus)[keyof typeof HttpStatus];

/**
 * Serialized form of an exception, suitable for a response body.
 */
export interface ExceptionBody {
	readonly code: string;
	readonly message: string;
	readonly details?: Record<string, unknown>;
}

const DEFAULTS: Record<HttpStatus, { code: string; message: string }> = {
	400: { code: 'BAD_REQUEST', message: 'The request is malformed' },
	401: { code: 'UNAUTHORIZED', message: 'Authentication is required to access this resource' },
	403: { code: 'FORBIDDEN', message: 'Insufficient permissions to access this resource' },
	404: { code: 'NOT_FOUND', message: 'No resource matches the given parameters' },
	405: { code: 'METHOD_NOT_ALLOWED', message: 'This method is not supported for the resource' },
	409: { code: 'CONFLICT', message: 'A resource with these parameters already exists' },
	422: { code: 'UNPROCESSABLE_ENTITY', message: 'The data has an invalid format' },
	429: { code: 'TOO_MANY_REQUESTS', message: 'Too many requests, try again later' },
	500: { code: 'INTERNAL_SERVER_ERROR', message: 'Internal server error' },
	501: { code: 'NOT_IMPLEMENTED', message: 'The requested resource is not implemented' },
	503: { code: 'SERVICE_UNAVAILABLE', message: 'The service is unavailable' },
};

/**
 * Base class for all application exceptions.
 */
export class AppException extends Error {
	constructor(
		message: string,
		public readonly status: HttpStatus,
		public readonly code: string = DEFAULTS[status].code,
		public readonly details: Record<string, unknown> = {},
	) {
		super(message || DEFAULTS[status].message);
		this.name = 'AppException';
	}

	/**
	 * Response body for this exception. Details are omitted when empty.
	 */
	toJSON(): ExceptionBody {
		if (Object.keys(this.details).length === 0) {
			return { code: this.code, message: this.message };
		}
		return { code: this.code, message: this.message, details: this.details };
	}

	/**
	 * Check if an unknown value is an AppException.
	 */
	static isAppException(value: unknown): value is AppException {
		return value instanceof AppException;
	}
}

export class BadRequestException extends AppException {
	constructor(message: string = DEFAULTS[400].message, details: Record<string, unknown> = {}) {
		super(message, HttpStatus.BAD_REQUEST, DEFAULTS[400].code, details);
		this.name = 'BadRequestException';
	}
}

export class UnauthorizedException extends AppException {
	constructor(message: string = DEFAULTS[401].message, details: Record<string, unknown> = {}) {
		super(message, HttpStatus.UNAUTHORIZED, DEFAULTS[401].code, details);
		this.name = 'UnauthorizedException';
	}
}

export class ForbiddenException extends AppException {
	constructor(message: string = DEFAULTS[403].message, details: Record<string, unknown> = {}) {
		super(message, HttpStatus.FORBIDDEN, DEFAULTS[403].code, details);
		this.name = 'ForbiddenException';
	}
}

export class NotFoundException extends AppException {
	constructor(message: string = DEFAULTS[404].message, details: Record<string, unknown> = {}) {
		super(message, HttpStatus.NOT_FOUND, DEFAULTS[404].code, details);
		this.name = 'NotFoundException';
	}
}

export class MethodNotAllowedException extends AppException {
	constructor(message: string = DEFAULTS[405].message, details: Record<string, unknown> = {}) {
		super(message, HttpStatus.METHOD_NOT_ALLOWED, DEFAULTS[405].code, details);
		this.name = 'MethodNotAllowedException';
	}
}

export class ConflictException extends AppException {
	constructor(message: string = DEFAULTS[409].message, details: Record<string, unknown> = {}) {
		super(message, HttpStatus.CONFLICT, DEFAULTS[409].code, details);
		this.name = 'ConflictException';
	}
}

export class UnprocessableEntityException extends AppException {
	constructor(message: string = DEFAULTS[422].message, details: Record<string, unknown> = {}) {
		super(message, HttpStatus.UNPROCESSABLE_ENTITY, DEFAULTS[422].code, details);
		this.name = 'UnprocessableEntityException';
	}
}

export class TooManyRequestsException extends AppException {
	constructor(message: string = DEFAULTS[429].message, details: Record<string, unknown> = {}) {
		super(message, HttpStatus.TOO_MANY_REQUESTS, DEFAULTS[429].code, details);
		this.name = 'TooManyRequestsException';
	}
}

export class InternalServerErrorException extends AppException {
	constructor(message: string = DEFAULTS[500].message, details: Record<string, unknown> = {}) {
		super(message, HttpStatus.INTERNAL_SERVER_ERROR, DEFAULTS[500].code, details);
		this.name = 'InternalServerErrorException';
	}
}

export class NotImplementedException extends AppException {
	constructor(message: string = DEFAULTS[501].message, details: Record<string, unknown> = {}) {
		super(message, HttpStatus.NOT_IMPLEMENTED, DEFAULTS[501].code, details);
		this.name = 'NotImplementedException';
	}
}

export class ServiceUnavailableException extends AppException {
	constructor(message: string = DEFAULTS[503].message, details: Record<string, unknown> = {}) {
		super(message, HttpStatus.SERVICE_UNAVAILABLE, DEFAULTS[503].code, details);
		this.name = 'ServiceUnavailableException';
	}
}

/**
 * Build the exception subclass matching a status.
 *
 * @example
 * ```typescript
 * throw exceptionForStatus(404, 'Widget 7 not found', { id: 7 });
 * ```
 */
export function exceptionForStatus(
	status: HttpStatus,
	message?: string,
	details: Record<string, unknown> = {},
): AppException {
	switch (status) {
		case 400:
			return new BadRequestException(message, details);
		case 401:
			return new UnauthorizedException(message, details);
		case 403:
			return new ForbiddenException(message, details);
		case 404:
			return new NotFoundException(message, details);
		case 405:
			return new MethodNotAllowedException(message, details);
		case 409:
			return new ConflictException(message, details);
		case 422:
			return new UnprocessableEntityException(message, details);
		case 429:
			return new TooManyRequestsException(message, details);
		case 500:
			return new InternalServerErrorException(message, details);
		case 501:
			return new NotImplementedException(message, details);
		case 503:
			return new ServiceUnavailableException(message, details);
	}
}
