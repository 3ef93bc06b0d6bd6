/**
 * Generic Repository
 *
 * CRUD and list queries for one entity model over a borrowed session. The
 * repository never opens or closes the session; it commits after every
 * mutation.
 *
 * Expected conditions (missing rows, unsupported capabilities) are returned
 * as `Result` errors. Storage failures reject the returned promise as thrown
 * by the driver.
 */

import { randomUUID } from 'node:crypto';
import { createChildLogger, getLogger, type Logger } from '@tablekit/logging';
import { and, asc, desc, eq, inArray, isNotNull, isNull, type SQL } from 'drizzle-orm';
import { err, errAsync, ok, ResultAsync, type Result } from 'neverthrow';
import {
	DataAccessErrors,
	type DeactivationNotSupportedError,
	type NoPrimaryKeyError,
	type NotFoundError,
	type NoUuidSupportError,
} from './errors.js';
import type { EntityModel, EntityRecord } from './model.js';
import type { Session } from './session.js';

/**
 * Create or update input. Keys the model does not know are ignored.
 */
export type EntityPayload<TEntity> = { readonly [K in keyof TEntity]?: TEntity[K] | null } & Readonly<
	Record<string, unknown>
>;

export interface ListFilters {
	/** Primary key membership; ignored when empty */
	readonly ids?: readonly number[];
	/** Uuid membership; ignored when empty or when the model has no uuid */
	readonly uuids?: readonly string[];
	/** Only soft-deleted rows (wins over `withDeleted`) */
	readonly onlyDeleted?: boolean;
	/** Deleted and active rows */
	readonly withDeleted?: boolean;
	/** Only deactivated rows (wins over `withDeactivated`) */
	readonly onlyDeactivated?: boolean;
	/** Deactivated and active rows */
	readonly withDeactivated?: boolean;
}

export interface Pagination {
	readonly limit?: number;
	readonly offset?: number;
}

export type SortDirection = 'asc' | 'desc';

export interface Sorting {
	/** Property name of a model column; unknown names are ignored */
	readonly field: string;
	readonly direction: SortDirection;
}

export interface RepositoryOptions {
	/** Source of generated timestamps (default: current time) */
	readonly clock?: () => Date;
	/** Page size when `list` is given no limit (default: 100) */
	readonly defaultLimit?: number;
	/** Parent logger (default: the process default logger) */
	readonly logger?: Logger;
}

export type GetByUuidError = NoUuidSupportError | NotFoundError;
export type UpdateError = NoPrimaryKeyError | GetByUuidError;
export type ToggleDeactivateError = DeactivationNotSupportedError | NotFoundError;

const DEFAULT_LIMIT = 100;

/** Fields an update never rewrites */
const IMMUTABLE_FIELDS = ['id', 'uuid', 'createdAt', 'updatedAt'] as const;

export class Repository<TEntity extends EntityRecord> {
	private readonly session: Session;
	private readonly model: EntityModel<TEntity>;
	private readonly clock: () => Date;
	private readonly defaultLimit: number;
	private readonly logger: Logger;

	/**
	 * @throws DataAccessException `empty_session` without a session, `no_model` without a model
	 */
	constructor(
		session: Session | null | undefined,
		model: EntityModel<TEntity> | null | undefined,
		options: RepositoryOptions = {},
	) {
		if (!session) {
			throw DataAccessErrors.toException(DataAccessErrors.emptySession());
		}
		if (!model) {
			throw DataAccessErrors.toException(DataAccessErrors.noModel());
		}

		this.session = session;
		this.model = model;
		this.clock = options.clock ?? (() => new Date());
		this.defaultLimit = options.defaultLimit ?? DEFAULT_LIMIT;
		this.logger = createChildLogger(options.logger ?? getLogger(), { component: 'Repository', model: model.name });
		this.logger.debug('Repository initialized');
	}

	/**
	 * Insert a new entity. Generates the uuid and timestamps the payload lacks.
	 */
	create(payload: EntityPayload<TEntity>): ResultAsync<TEntity, never> {
		return ResultAsync.fromSafePromise(this.insertEntity(payload));
	}

	get(id: number): ResultAsync<TEntity, NotFoundError> {
		this.logger.info({ id }, 'Getting entity by id');
		return new ResultAsync(this.findOne('id', id));
	}

	getByUuid(uuid: string): ResultAsync<TEntity, GetByUuidError> {
		this.logger.info({ uuid }, 'Getting entity by uuid');
		if (!this.model.columns.uuid) {
			return errAsync(DataAccessErrors.noUuidSupport(this.model.name));
		}
		return new ResultAsync(this.findOne('uuid', uuid));
	}

	/**
	 * Apply the payload to the entity identified by its `id`, or by its `uuid`
	 * when no id is given.
	 */
	update(payload: EntityPayload<TEntity>): ResultAsync<TEntity, UpdateError> {
		return new ResultAsync(this.updateEntity(payload));
	}

	/**
	 * Soft delete when the model supports it and the entity is not yet deleted;
	 * otherwise remove the row.
	 */
	delete(id: number): ResultAsync<boolean, NotFoundError> {
		return new ResultAsync(this.deleteEntity(id));
	}

	deleteByUuid(uuid: string): ResultAsync<boolean, GetByUuidError> {
		this.logger.info({ uuid }, 'Deleting entity by uuid');
		return this.getByUuid(uuid).andThen((entity) => this.delete(this.idOf(entity)));
	}

	/**
	 * Deactivate an active entity or reactivate a deactivated one.
	 */
	toggleDeactivate(id: number): ResultAsync<TEntity, ToggleDeactivateError> {
		return new ResultAsync(this.toggleEntity(id));
	}

	/**
	 * Entities matching the filters. Without visibility flags only active rows
	 * are returned. Filters and sort apply before limit and offset.
	 */
	list(filters: ListFilters = {}, pagination: Pagination = {}, sorting?: Sorting): ResultAsync<TEntity[], never> {
		return ResultAsync.fromSafePromise(this.listEntities(filters, pagination, sorting));
	}

	private async insertEntity(payload: EntityPayload<TEntity>): Promise<TEntity> {
		this.logger.info('Creating entity');
		const values = this.recognizedFields(payload);
		delete values['id'];

		const { uuid, timestamps } = this.model.columns;
		if (uuid && values['uuid'] == null) {
			values['uuid'] = randomUUID();
			this.logger.debug('Generated uuid');
		}
		if (timestamps) {
			const now = this.clock();
			if (values['createdAt'] == null) values['createdAt'] = now;
			if (values['updatedAt'] == null) values['updatedAt'] = now;
		}

		const db = await this.session.db();
		const rows = await db.insert(this.model.table).values(values).returning();
		await this.session.commit();

		const entity = this.toEntity(rows[0]);
		this.logger.info({ id: entity['id'] }, 'Entity created');
		return entity;
	}

	private async findOne(field: 'id' | 'uuid', value: number | string): Promise<Result<TEntity, NotFoundError>> {
		const column = field === 'id' ? this.model.columns.id : this.model.columns.uuid;
		const db = await this.session.db();
		const rows = column ? await db.select().from(this.model.table).where(eq(column, value)).limit(1) : [];

		const row = rows[0];
		if (!row) {
			return err(DataAccessErrors.notFound(this.model.name, field, value));
		}
		return ok(this.toEntity(row));
	}

	private async updateEntity(payload: EntityPayload<TEntity>): Promise<Result<TEntity, UpdateError>> {
		this.logger.info('Updating entity');
		const input: Readonly<Record<string, unknown>> = payload;
		const id = input['id'];
		const uuid = input['uuid'];

		let found: Result<TEntity, UpdateError>;
		if (typeof id === 'number') {
			found = await this.get(id);
		} else if (typeof uuid === 'string' && uuid !== '') {
			found = await this.getByUuid(uuid);
		} else {
			return err(DataAccessErrors.noPrimaryKey(this.model.name));
		}
		if (found.isErr()) {
			return err(found.error);
		}

		const entity = found.value;
		const changes = this.recognizedFields(payload);
		for (const field of IMMUTABLE_FIELDS) {
			delete changes[field];
		}

		// An updatedAt key, whatever its value, asks for the row to be touched
		const touch = this.model.columns.timestamps !== undefined && 'updatedAt' in input;
		if (Object.keys(changes).length === 0 && !touch) {
			this.logger.debug({ id: entity['id'] }, 'Nothing to update');
			return ok(entity);
		}

		const row = await this.write(entity['id'], changes);
		this.logger.info({ id: entity['id'], fields: Object.keys(changes) }, 'Entity updated');
		return ok(row);
	}

	private async deleteEntity(id: number): Promise<Result<boolean, NotFoundError>> {
		this.logger.info({ id }, 'Deleting entity');
		const found = await this.get(id);
		if (found.isErr()) {
			return err(found.error);
		}

		if (this.model.columns.deletedAt && found.value['deletedAt'] == null) {
			await this.write(id, { deletedAt: this.clock() });
			this.logger.info({ id }, 'Entity soft deleted');
			return ok(true);
		}

		const db = await this.session.db();
		await db.delete(this.model.table).where(eq(this.model.columns.id, id));
		await this.session.commit();
		this.logger.info({ id }, 'Entity physically deleted');
		return ok(true);
	}

	private async toggleEntity(id: number): Promise<Result<TEntity, ToggleDeactivateError>> {
		this.logger.info({ id }, 'Toggling deactivation');
		if (!this.model.columns.deactivatedAt) {
			return err(DataAccessErrors.deactivationNotSupported(this.model.name));
		}

		const found = await this.get(id);
		if (found.isErr()) {
			return err(found.error);
		}

		const deactivated = found.value['deactivatedAt'] != null;
		const entity = await this.write(id, { deactivatedAt: deactivated ? null : this.clock() });
		this.logger.info({ id, deactivated: !deactivated }, deactivated ? 'Entity reactivated' : 'Entity deactivated');
		return ok(entity);
	}

	private async listEntities(filters: ListFilters, pagination: Pagination, sorting?: Sorting): Promise<TEntity[]> {
		this.logger.info('Listing entities');
		const { id, uuid, deletedAt, deactivatedAt } = this.model.columns;
		const conditions: SQL[] = [];

		if (filters.ids && filters.ids.length > 0) {
			conditions.push(inArray(id, filters.ids));
		}
		if (filters.uuids && filters.uuids.length > 0) {
			if (uuid) {
				conditions.push(inArray(uuid, filters.uuids));
			} else {
				this.logger.debug('Ignoring uuid filter, model has no uuid');
			}
		}
		if (deletedAt) {
			if (filters.onlyDeleted) {
				conditions.push(isNotNull(deletedAt));
			} else if (!filters.withDeleted) {
				conditions.push(isNull(deletedAt));
			}
		}
		if (deactivatedAt) {
			if (filters.onlyDeactivated) {
				conditions.push(isNotNull(deactivatedAt));
			} else if (!filters.withDeactivated) {
				conditions.push(isNull(deactivatedAt));
			}
		}

		const limit = pagination.limit ?? this.defaultLimit;
		const offset = pagination.offset ?? 0;
		this.logger.debug({ conditions: conditions.length, limit, offset }, 'Applying list filters');

		const db = await this.session.db();
		let query = db
			.select()
			.from(this.model.table)
			.where(and(...conditions))
			.$dynamic();

		if (sorting) {
			const column = this.model.fields.get(sorting.field);
			if (column) {
				query = query.orderBy(sorting.direction === 'desc' ? desc(column) : asc(column));
			} else {
				this.logger.warn({ field: sorting.field }, 'Ignoring sort on unknown field');
			}
		}

		const rows = await query.limit(limit).offset(offset);
		return rows.map((row) => this.toEntity(row));
	}

	/**
	 * Update one row by id, refreshing `updatedAt`, and commit.
	 */
	private async write(id: unknown, changes: EntityRecord): Promise<TEntity> {
		const values: EntityRecord = { ...changes };
		if (this.model.columns.timestamps) {
			values['updatedAt'] = this.clock();
		}

		const db = await this.session.db();
		const rows = await db.update(this.model.table).set(values).where(eq(this.model.columns.id, id)).returning();
		await this.session.commit();
		return this.toEntity(rows[0]);
	}

	/**
	 * Payload entries whose key is a model field; undefined values are skipped.
	 */
	private recognizedFields(payload: Readonly<Record<string, unknown>>): EntityRecord {
		const values: EntityRecord = {};
		for (const [key, value] of Object.entries(payload)) {
			if (!this.model.fields.has(key)) {
				this.logger.debug({ field: key }, 'Ignoring field unknown to model');
				continue;
			}
			if (value !== undefined) {
				values[key] = value;
			}
		}
		return values;
	}

	private toEntity(row: EntityRecord | undefined): TEntity {
		if (!row || !this.model.isEntity(row)) {
			throw new Error(`Query on ${this.model.tableName} returned no ${this.model.name} row`);
		}
		return row;
	}

	private idOf(entity: TEntity): number {
		const id = entity['id'];
		if (typeof id !== 'number') {
			throw new Error(`${this.model.name} has a non-numeric id`);
		}
		return id;
	}
}

/**
 * Create a repository for a model over a session.
 */
export function createRepository<TEntity extends EntityRecord>(
	session: Session | null | undefined,
	model: EntityModel<TEntity> | null | undefined,
	options: RepositoryOptions = {},
): Repository<TEntity> {
	return new Repository(session, model, options);
}
