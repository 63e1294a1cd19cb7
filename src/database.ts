import { Client } from "pg";
import { PGlite } from "@electric-sql/pglite";
import type { DbClient } from "./schemaExtractor";

/**
 * An open database the introspection commands read table definitions from.
 */
export class DatabaseConnection {
	private constructor(
		readonly client: DbClient,
		private readonly _close: () => Promise<void>
	) { }

	/**
	 * Connection string formats:
	 * - `pglite:` or `pglite::memory:` - In-memory PGLite database
	 * - `pglite:/path/to/dir` - PGLite database persisted to filesystem
	 * - `postgresql://...` or other - PostgreSQL connection string
	 */
	static async connect(connectionString: string): Promise<DatabaseConnection> {
		if (connectionString.startsWith("pglite:")) {
			const pglitePath = connectionString.slice("pglite:".length);
			const db = new PGlite(pglitePath === "" || pglitePath === ":memory:" ? undefined : pglitePath);
			await db.waitReady;
			return new DatabaseConnection(db, () => db.close());
		}

		const client = new Client({ connectionString });
		await client.connect();
		return new DatabaseConnection(client, () => client.end());
	}

	close(): Promise<void> {
		return this._close();
	}
}
