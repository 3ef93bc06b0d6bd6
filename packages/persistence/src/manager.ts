/**
 * Connection Manager
 *
 * Owns the engine and session factory for a process. Construct one at startup
 * and pass it to whatever needs sessions.
 *
 * Lifecycle:
 * - `init` builds the engine once; repeated calls are ignored until `close`
 * - `getSession` / `withSession` hand out sessions
 * - `close` disposes the engine, after which `init` may run again
 */

import { createChildLogger, getLogger, type Logger } from '@tablekit/logging';
import { createPostgresEngine, type Engine, type EngineFactory, type EngineSettings } from './engine.js';
import { DataAccessErrors } from './errors.js';
import { EngineSession, type Session, type SessionFactory } from './session.js';

export interface ConnectionManagerOptions {
	/** Parent logger (default: the process default logger) */
	readonly logger?: Logger;
	/** Builds the engine on `init` (default: pooled PostgreSQL) */
	readonly engineFactory?: EngineFactory;
}

interface ManagerState {
	readonly engine: Engine;
	readonly sessionFactory: SessionFactory;
	readonly settings: EngineSettings;
}

export class ConnectionManager {
	private readonly logger: Logger;
	private readonly parentLogger: Logger;
	private readonly engineFactory: EngineFactory;
	private state: ManagerState | undefined;

	constructor(options: ConnectionManagerOptions = {}) {
		const parent = options.logger ?? getLogger();
		this.logger = createChildLogger(parent, { component: 'ConnectionManager' });
		this.parentLogger = parent;
		this.engineFactory = options.engineFactory ?? createPostgresEngine;
	}

	get isInitialized(): boolean {
		return this.state !== undefined;
	}

	/**
	 * Build the engine and session factory. No-op when already initialized.
	 */
	init(settings: EngineSettings): void {
		if (this.state) {
			this.logger.warn('Connection manager already initialized, ignoring init');
			return;
		}

		const engine = this.engineFactory(settings, this.parentLogger);
		const sessionLogger = createChildLogger(this.parentLogger, { component: 'Session' });
		this.state = {
			engine,
			settings,
			sessionFactory: () => new EngineSession(engine, sessionLogger),
		};

		this.logger.info(
			{ echo: settings.echo, maxConnections: settings.maxConnections ?? 10 },
			'Connection manager initialized',
		);
	}

	get engine(): Engine {
		return this.requireState().engine;
	}

	get sessionFactory(): SessionFactory {
		return this.requireState().sessionFactory;
	}

	/** Settings passed to the `init` call in effect */
	get settings(): EngineSettings {
		return this.requireState().settings;
	}

	/**
	 * New session; the caller must close it.
	 */
	getSession(): Session {
		return this.requireState().sessionFactory();
	}

	/**
	 * Run `fn` with a new session. On error the session is rolled back, closed
	 * and the error rethrown; otherwise it is closed without committing.
	 *
	 * @example
	 * ```typescript
	 * const widget = await manager.withSession(async (session) => {
	 *     const repository = createRepository(session, Widget);
	 *     return repository.get(1);
	 * });
	 * ```
	 */
	async withSession<T>(fn: (session: Session) => Promise<T>): Promise<T> {
		const session = this.getSession();

		try {
			return await fn(session);
		} catch (error) {
			if (!session.isClosed) {
				await session.rollback();
			}
			throw error;
		} finally {
			await session.close();
		}
	}

	/**
	 * Round trip to the database. Never throws; false when uninitialized or
	 * when the round trip fails.
	 */
	async healthCheck(): Promise<boolean> {
		if (!this.state) {
			return false;
		}

		try {
			await this.state.engine.ping();
			return true;
		} catch (error) {
			this.logger.warn({ err: error }, 'Database health check failed');
			return false;
		}
	}

	/**
	 * Dispose the engine. No-op when never initialized.
	 */
	async close(): Promise<void> {
		const state = this.state;
		if (!state) {
			return;
		}

		this.state = undefined;
		await state.engine.dispose();
		this.logger.info('Connection manager closed');
	}

	private requireState(): ManagerState {
		if (!this.state) {
			throw DataAccessErrors.toException(DataAccessErrors.notInitialized());
		}
		return this.state;
	}
}
