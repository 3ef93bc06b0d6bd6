/**
 * @tablekit/errors
 *
 * Exception hierarchy shared by every tablekit package. Each exception carries
 * an HTTP-like status and a stable error code so callers can map failures to
 * their own external representation.
 *
 * @example
 * ```typescript
 * import { NotFoundException, AppException } from '@tablekit/errors';
 *
 * try {
 *     throw new NotFoundException('Widget 7 not found', { id: 7 });
 * } catch (error) {
 *     if (AppException.isAppException(error)) {
 *         reply.status(error.status).send(error.toJSON());
 *     }
 * }
 * ```
 */

export {
	HttpStatus,
	AppException,
	BadRequestException,
	UnauthorizedException,
	ForbiddenException,
	NotFoundException,
	MethodNotAllowedException,
	ConflictException,
	UnprocessableEntityException,
	TooManyRequestsException,
	InternalServerErrorException,
	NotImplementedException,
	ServiceUnavailableException,
	exceptionForStatus,
	type ExceptionBody,
} from './exceptions.js';
