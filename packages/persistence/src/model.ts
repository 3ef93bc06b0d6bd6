/**
 * Entity Models
 *
 * An entity model pairs a name with a Drizzle table and the capabilities its
 * columns provide. Capabilities are resolved once, when the model is defined,
 * and never change afterwards.
 */

import { getTableColumns, getTableName, type InferSelectModel } from 'drizzle-orm';
import type { PgColumn, PgTable } from 'drizzle-orm/pg-core';

/**
 * Optional structural features an entity type may declare.
 */
export type Capability = 'uuid' | 'timestamps' | 'softDelete' | 'deactivation';

/**
 * A row as read from or written to the store, keyed by column property name.
 */
export type EntityRecord = Record<string, unknown>;

/**
 * Lifecycle columns found on the table.
 */
export interface ModelColumns {
	readonly id: PgColumn;
	readonly uuid?: PgColumn;
	readonly timestamps?: { readonly createdAt: PgColumn; readonly updatedAt: PgColumn };
	readonly deletedAt?: PgColumn;
	readonly deactivatedAt?: PgColumn;
}

export interface EntityModel<TEntity> {
	readonly name: string;
	readonly table: PgTable;
	readonly tableName: string;
	readonly columns: ModelColumns;
	/** Every column by property name */
	readonly fields: ReadonlyMap<string, PgColumn>;
	readonly capabilities: ReadonlySet<Capability>;
	/** True when the row carries every column of the model */
	isEntity(row: EntityRecord): row is EntityRecord & TEntity;
}

/**
 * Define an entity model from a Drizzle table.
 *
 * @throws Error when the table has no `id` column
 *
 * @example
 * ```typescript
 * const Widget = defineModel('Widget', widgets);
 * hasCapability(Widget, 'softDelete'); // true
 * ```
 */
export function defineModel<TTable extends PgTable>(
	name: string,
	table: TTable,
): EntityModel<InferSelectModel<TTable>> {
	const tableName = getTableName(table);
	const fields = new Map<string, PgColumn>(Object.entries(getTableColumns<PgTable>(table)));

	const id = fields.get('id');
	if (!id) {
		throw new Error(`Model ${name} (table ${tableName}) has no id column`);
	}

	const uuid = fields.get('uuid');
	const createdAt = fields.get('createdAt');
	const updatedAt = fields.get('updatedAt');
	const deletedAt = fields.get('deletedAt');
	const deactivatedAt = fields.get('deactivatedAt');

	const columns: ModelColumns = {
		id,
		...(uuid ? { uuid } : {}),
		...(createdAt && updatedAt ? { timestamps: { createdAt, updatedAt } } : {}),
		...(deletedAt ? { deletedAt } : {}),
		...(deactivatedAt ? { deactivatedAt } : {}),
	};

	const capabilities = new Set<Capability>();
	if (columns.uuid) capabilities.add('uuid');
	if (columns.timestamps) capabilities.add('timestamps');
	if (columns.deletedAt) capabilities.add('softDelete');
	if (columns.deactivatedAt) capabilities.add('deactivation');

	const keys = [...fields.keys()];

	return Object.freeze({
		name,
		table,
		tableName,
		columns: Object.freeze(columns),
		fields,
		capabilities,
		isEntity(row: EntityRecord): row is EntityRecord & InferSelectModel<TTable> {
			return keys.every((key) => key in row);
		},
	});
}

export function hasCapability<TEntity>(model: EntityModel<TEntity>, capability: Capability): boolean {
	return model.capabilities.has(capability);
}

/**
 * Lifecycle flags derived from an entity's fields. A flag is present only
 * when the model has the matching capability.
 */
export interface EntityFlags {
	/** Never modified since creation */
	readonly isCreated?: boolean;
	readonly isDeleted?: boolean;
	readonly isDeactivated?: boolean;
}

export function toEntityView<TEntity extends EntityRecord>(
	model: EntityModel<TEntity>,
	entity: TEntity,
): TEntity & EntityFlags {
	const flags: { isCreated?: boolean; isDeleted?: boolean; isDeactivated?: boolean } = {};

	if (model.columns.timestamps) {
		const createdAt = entity['createdAt'];
		const updatedAt = entity['updatedAt'];
		flags.isCreated =
			createdAt instanceof Date && updatedAt instanceof Date && createdAt.getTime() === updatedAt.getTime();
	}
	if (model.columns.deletedAt) {
		flags.isDeleted = entity['deletedAt'] != null;
	}
	if (model.columns.deactivatedAt) {
		flags.isDeactivated = entity['deactivatedAt'] != null;
	}

	return { ...entity, ...flags };
}
