/**
 * @tablekit/persistence
 *
 * Data access over PostgreSQL with Drizzle:
 * - Column sets and entity models with capability detection
 * - Engine, sessions and the connection manager
 * - Generic repository and validated entity service
 * - Data access error taxonomy
 */

// Schema
export {
	timestampColumn,
	idColumns,
	uuidColumns,
	timestampColumns,
	softDeleteColumns,
	deactivationColumns,
} from './schema/index.js';

// Models
export {
	defineModel,
	hasCapability,
	toEntityView,
	type Capability,
	type EntityFlags,
	type EntityModel,
	type EntityRecord,
	type ModelColumns,
} from './model.js';

// Errors
export {
	DataAccessErrors,
	DataAccessException,
	type DataAccessError,
	type DataAccessErrorType,
	type NotInitializedError,
	type EmptySessionError,
	type NoModelError,
	type SessionClosedError,
	type NotFoundError,
	type NoUuidSupportError,
	type NoPrimaryKeyError,
	type DeactivationNotSupportedError,
	type InvalidPayloadError,
	type PayloadIssue,
} from './errors.js';

// Engine & sessions
export {
	createPostgresEngine,
	type Connection,
	type Engine,
	type EngineFactory,
	type EngineSettings,
	type SessionDatabase,
} from './engine.js';
export { EngineSession, type Session, type SessionFactory } from './session.js';
export { ConnectionManager, type ConnectionManagerOptions } from './manager.js';

// Repository & service
export {
	Repository,
	createRepository,
	type EntityPayload,
	type ListFilters,
	type Pagination,
	type Sorting,
	type SortDirection,
	type RepositoryOptions,
	type GetByUuidError,
	type UpdateError,
	type ToggleDeactivateError,
} from './repository.js';
export { EntityService, type EntitySchemas } from './service.js';
