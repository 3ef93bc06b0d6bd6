/**
 * Column Sets
 *
 * Drizzle column definitions for the lifecycle fields an entity may carry.
 * Spread them into a `pgTable` definition; `defineModel` detects each set by
 * its property keys.
 *
 * @example
 * ```typescript
 * const widgets = pgTable('widget', {
 *     ...idColumns,
 *     ...uuidColumns,
 *     ...timestampColumns,
 *     ...softDeleteColumns,
 *     name: text('name').notNull(),
 * });
 * ```
 */

import { serial, timestamp, uuid } from 'drizzle-orm/pg-core';

/**
 * Standard timestamp column with timezone.
 */
export const timestampColumn = (name: string) => timestamp(name, { withTimezone: true, mode: 'date' });

/**
 * Serial integer primary key. Every entity has one.
 */
export const idColumns = {
	id: serial('id').primaryKey(),
};

/**
 * Unique uuid, generated at creation when absent.
 */
export const uuidColumns = {
	uuid: uuid('uuid').notNull().unique().defaultRandom(),
};

/**
 * Creation and last-modification time.
 */
export const timestampColumns = {
	createdAt: timestampColumn('created_at').notNull().defaultNow(),
	updatedAt: timestampColumn('updated_at').notNull().defaultNow(),
};

/**
 * Soft delete marker. Null while the row is active.
 */
export const softDeleteColumns = {
	deletedAt: timestampColumn('deleted_at'),
};

/**
 * Deactivation marker. Null while the row is active.
 */
export const deactivationColumns = {
	deactivatedAt: timestampColumn('deactivated_at'),
};
