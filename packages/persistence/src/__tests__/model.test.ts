import { pgTable, text } from 'drizzle-orm/pg-core';
import { describe, expect, it } from 'vitest';
import { defineModel, hasCapability, toEntityView } from '../model.js';
import { idColumns, timestampColumn } from '../schema/columns.js';
import { Account, Log, Widget } from './support/pglite.js';

describe('defineModel', () => {
	it('should detect capabilities from the columns', () => {
		expect([...Widget.capabilities]).toEqual(['uuid', 'timestamps', 'softDelete']);
		expect([...Log.capabilities]).toEqual([]);
		expect([...Account.capabilities]).toEqual(['deactivation']);
	});

	it('should expose the table and its fields', () => {
		expect(Widget.name).toBe('Widget');
		expect(Widget.tableName).toBe('widget');
		expect([...Log.fields.keys()]).toEqual(['id', 'msg']);
		expect(Widget.columns.timestamps?.createdAt.name).toBe('created_at');
		expect(Account.columns.deactivatedAt?.name).toBe('deactivated_at');
	});

	it('should require both timestamp columns for the timestamps capability', () => {
		const halfStamped = pgTable('half_stamped', {
			...idColumns,
			createdAt: timestampColumn('created_at'),
		});

		const model = defineModel('HalfStamped', halfStamped);

		expect(hasCapability(model, 'timestamps')).toBe(false);
		expect(model.columns.timestamps).toBeUndefined();
	});

	it('should reject a table without an id column', () => {
		const noId = pgTable('no_id', { name: text('name') });

		expect(() => defineModel('NoId', noId)).toThrow('Model NoId (table no_id) has no id column');
	});

	it('should recognize complete rows', () => {
		expect(Log.isEntity({ id: 1, msg: 'x' })).toBe(true);
		expect(Log.isEntity({ id: 1 })).toBe(false);
	});
});

describe('hasCapability', () => {
	it('should answer per capability', () => {
		expect(hasCapability(Widget, 'uuid')).toBe(true);
		expect(hasCapability(Widget, 'deactivation')).toBe(false);
		expect(hasCapability(Log, 'softDelete')).toBe(false);
	});
});

describe('toEntityView', () => {
	const created = new Date('2025-03-01T10:00:00.000Z');

	it('should derive flags for the capabilities the model has', () => {
		const view = toEntityView(Widget, {
			id: 1,
			uuid: '3f2b8c1e-5d4a-4e6f-9a7b-1c2d3e4f5a6b',
			createdAt: created,
			updatedAt: created,
			deletedAt: null,
			name: 'a',
			size: null,
		});

		expect(view.isCreated).toBe(true);
		expect(view.isDeleted).toBe(false);
		expect(view).not.toHaveProperty('isDeactivated');
	});

	it('should mark modified and deleted entities', () => {
		const later = new Date('2025-03-02T10:00:00.000Z');
		const view = toEntityView(Widget, {
			id: 1,
			uuid: '3f2b8c1e-5d4a-4e6f-9a7b-1c2d3e4f5a6b',
			createdAt: created,
			updatedAt: later,
			deletedAt: later,
			name: 'a',
			size: 2,
		});

		expect(view.isCreated).toBe(false);
		expect(view.isDeleted).toBe(true);
	});

	it('should add the deactivation flag only', () => {
		expect(toEntityView(Account, { id: 1, email: 'a@example.com', deactivatedAt: created })).toEqual({
			id: 1,
			email: 'a@example.com',
			deactivatedAt: created,
			isDeactivated: true,
		});
	});

	it('should add nothing for a model without capabilities', () => {
		expect(toEntityView(Log, { id: 1, msg: 'x' })).toEqual({ id: 1, msg: 'x' });
	});
});
