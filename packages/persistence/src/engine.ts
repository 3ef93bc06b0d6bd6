/**
 * Database Engine
 *
 * An engine hands out dedicated connections for sessions. The PostgreSQL
 * engine keeps a postgres.js pool and reserves one pooled connection per
 * session, so a session's transaction never spans connections.
 */

import { createChildLogger, type Logger } from '@tablekit/logging';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';

/**
 * Drizzle database bound to one connection.
 */
export type SessionDatabase = PgDatabase<PgQueryResultHKT>;

/**
 * Connection held by a session until it is released.
 */
export interface Connection {
	readonly db: SessionDatabase;
	release(): Promise<void>;
}

export interface Engine {
	connect(): Promise<Connection>;
	/** Round trip to the server; rejects when it is unreachable */
	ping(): Promise<void>;
	/** Close every pooled connection */
	dispose(): Promise<void>;
}

/**
 * Settings the engine is built from.
 */
export interface EngineSettings {
	connectionUrl(): string;
	/** Log every SQL statement */
	readonly echo: boolean;
	/** Maximum number of connections in pool (default: 10) */
	readonly maxConnections?: number;
	/** Idle timeout in seconds (default: 20) */
	readonly idleTimeout?: number;
	/** Connection timeout in seconds (default: 30) */
	readonly connectTimeout?: number;
}

export type EngineFactory = (settings: EngineSettings, logger: Logger) => Engine;

/**
 * Create a pooled PostgreSQL engine.
 *
 * @example
 * ```typescript
 * const engine = createPostgresEngine(loadDatabaseSettings(), logger);
 * const connection = await engine.connect();
 * await connection.db.select().from(widgets);
 * await connection.release();
 * await engine.dispose();
 * ```
 */
export function createPostgresEngine(settings: EngineSettings, logger: Logger): Engine {
	const options: postgres.Options<Record<string, never>> = {
		max: settings.maxConnections ?? 10,
		idle_timeout: settings.idleTimeout ?? 20,
		connect_timeout: settings.connectTimeout ?? 30,
	};

	if (settings.echo) {
		const sqlLogger = createChildLogger(logger, { component: 'SQL' });
		options.debug = (_connection, query, params) => {
			sqlLogger.info({ params }, query);
		};
	}

	const client = postgres(settings.connectionUrl(), options);

	return {
		async connect() {
			const reserved = await client.reserve();
			return {
				db: drizzle(reserved),
				async release() {
					reserved.release();
				},
			};
		},
		async ping() {
			await client`select 1`;
		},
		async dispose() {
			await client.end();
		},
	};
}

