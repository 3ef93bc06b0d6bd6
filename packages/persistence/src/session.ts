/**
 * Sessions
 *
 * A session is one unit of work: a dedicated connection with an open
 * transaction. The connection is acquired and the transaction begun on first
 * use; `commit` ends it and the next use begins another.
 */

import type { Logger } from '@tablekit/logging';
import { sql } from 'drizzle-orm';
import type { Connection, Engine, SessionDatabase } from './engine.js';
import { DataAccessErrors } from './errors.js';

export interface Session {
	/** True once `close` has been called */
	readonly isClosed: boolean;
	/** True while a transaction is open */
	readonly inTransaction: boolean;
	/**
	 * Database handle bound to the session's transaction.
	 * Connects and begins a transaction when none is open.
	 */
	db(): Promise<SessionDatabase>;
	/** Commit the open transaction; no-op when none is open */
	commit(): Promise<void>;
	/** Roll back the open transaction; no-op when none is open */
	rollback(): Promise<void>;
	/** Roll back uncommitted work and release the connection. Idempotent. */
	close(): Promise<void>;
}

export type SessionFactory = () => Session;

/**
 * Session backed by an engine connection.
 */
export class EngineSession implements Session {
	private connection: Connection | undefined;
	private transaction: Promise<SessionDatabase> | undefined;
	private closed = false;

	constructor(
		private readonly engine: Engine,
		private readonly logger: Logger,
	) {}

	get isClosed(): boolean {
		return this.closed;
	}

	get inTransaction(): boolean {
		return this.transaction !== undefined;
	}

	async db(): Promise<SessionDatabase> {
		this.assertOpen();
		const transaction = (this.transaction ??= this.begin());

		try {
			return await transaction;
		} catch (error) {
			if (this.transaction === transaction) {
				this.transaction = undefined;
			}
			throw error;
		}
	}

	async commit(): Promise<void> {
		this.assertOpen();
		const db = await this.end();
		if (db) {
			await db.execute(sql`commit`);
			this.logger.debug('Transaction committed');
		}
	}

	async rollback(): Promise<void> {
		this.assertOpen();
		const db = await this.end();
		if (db) {
			await db.execute(sql`rollback`);
			this.logger.debug('Transaction rolled back');
		}
	}

	async close(): Promise<void> {
		if (this.closed) {
			return;
		}
		this.closed = true;

		try {
			const db = await this.end();
			if (db) {
				await db.execute(sql`rollback`);
				this.logger.debug('Uncommitted transaction rolled back on close');
			}
		} finally {
			const connection = this.connection;
			this.connection = undefined;
			if (connection) {
				await connection.release();
				this.logger.debug('Connection released');
			}
		}
	}

	private async begin(): Promise<SessionDatabase> {
		if (!this.connection) {
			this.connection = await this.engine.connect();
			this.logger.debug('Connection acquired');
		}
		await this.connection.db.execute(sql`begin`);
		return this.connection.db;
	}

	/**
	 * Detach the open transaction, if any, and return its handle.
	 */
	private async end(): Promise<SessionDatabase | undefined> {
		const transaction = this.transaction;
		this.transaction = undefined;
		return transaction;
	}

	private assertOpen(): void {
		if (this.closed) {
			throw DataAccessErrors.toException(DataAccessErrors.sessionClosed());
		}
	}
}
