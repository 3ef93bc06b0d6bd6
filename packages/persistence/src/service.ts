/**
 * Entity Service
 *
 * Validates create and update input with zod before handing the parsed
 * fields to a repository. Keys the schema does not declare never reach the
 * database.
 */

import { createChildLogger, getLogger, type Logger } from '@tablekit/logging';
import { errAsync, type ResultAsync } from 'neverthrow';
import type { z } from 'zod/v4';
import { DataAccessErrors, type InvalidPayloadError, type NotFoundError, type PayloadIssue } from './errors.js';
import type { EntityModel, EntityRecord } from './model.js';
import {
	Repository,
	type EntityPayload,
	type GetByUuidError,
	type ListFilters,
	type Pagination,
	type RepositoryOptions,
	type Sorting,
	type UpdateError,
} from './repository.js';
import type { Session } from './session.js';

export interface EntitySchemas<TCreate, TUpdate> {
	readonly create: z.ZodType<TCreate>;
	readonly update: z.ZodType<TUpdate>;
}

function issuesOf(error: z.ZodError): PayloadIssue[] {
	return error.issues.map((issue) => ({
		path: issue.path.map(String).join('.'),
		message: issue.message,
	}));
}

export class EntityService<
	TEntity extends EntityRecord,
	TCreate extends EntityPayload<TEntity>,
	TUpdate extends EntityPayload<TEntity>,
> {
	protected readonly repository: Repository<TEntity>;
	protected readonly logger: Logger;

	constructor(
		session: Session | null | undefined,
		protected readonly model: EntityModel<TEntity>,
		private readonly schemas: EntitySchemas<TCreate, TUpdate>,
		options: RepositoryOptions = {},
	) {
		this.repository = new Repository(session, model, options);
		this.logger = createChildLogger(options.logger ?? getLogger(), { component: 'EntityService', model: model.name });
	}

	create(input: unknown): ResultAsync<TEntity, InvalidPayloadError> {
		const parsed = this.schemas.create.safeParse(input);
		if (!parsed.success) {
			return this.rejectPayload(parsed.error);
		}
		return this.repository.create(parsed.data);
	}

	update(input: unknown): ResultAsync<TEntity, InvalidPayloadError | UpdateError> {
		const parsed = this.schemas.update.safeParse(input);
		if (!parsed.success) {
			return this.rejectPayload(parsed.error);
		}
		return this.repository.update(parsed.data);
	}

	get(id: number): ResultAsync<TEntity, NotFoundError> {
		return this.repository.get(id);
	}

	getByUuid(uuid: string): ResultAsync<TEntity, GetByUuidError> {
		return this.repository.getByUuid(uuid);
	}

	delete(id: number): ResultAsync<boolean, NotFoundError> {
		return this.repository.delete(id);
	}

	list(filters?: ListFilters, pagination?: Pagination, sorting?: Sorting): ResultAsync<TEntity[], never> {
		return this.repository.list(filters, pagination, sorting);
	}

	private rejectPayload(error: z.ZodError): ResultAsync<never, InvalidPayloadError> {
		const issues = issuesOf(error);
		this.logger.debug({ issues }, 'Rejected invalid payload');
		return errAsync(DataAccessErrors.invalidPayload(this.model.name, issues));
	}
}
