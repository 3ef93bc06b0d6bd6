export {
	timestampColumn,
	idColumns,
	uuidColumns,
	timestampColumns,
	softDeleteColumns,
	deactivationColumns,
} from './columns.js';
