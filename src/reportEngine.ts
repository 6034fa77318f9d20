import { Client } from "pg";
import { PGlite } from "@electric-sql/pglite";
import type {
	EnhancedColumn,
	JoinSuggestion,
	QueryResult,
	ReportConfig,
	ReportConfigDraft,
} from "./model";
import type { DbClient } from "./schemaExtractor";
import { SchemaCatalog, type CatalogOptions } from "./schemaCatalog";
import {
	buildParameterizedQuery,
	buildQuery,
	escapeIdentifier,
	type SqlStatement,
} from "./queryBuilder";
import {
	assertQuerySafe,
	validateConfig,
	validateQuerySafety,
	type SafetyVerdict,
} from "./queryValidator";
import { QueryExecutor, type ExecuteOptions, type ExecutorOptions } from "./queryExecutor";
import { toCsv, toSpreadsheet, type SpreadsheetOptions } from "./resultExporter";
import { suggestJoins } from "./joinAdvisor";
import { ConfigValidationError } from "./errors";

export interface ReportEngineOptions {
	readonly catalog?: CatalogOptions;
	readonly executor?: ExecutorOptions;
}

export interface RunReportOptions extends ExecuteOptions {
	/** Inline filter values as literals instead of binding them as parameters */
	readonly inlineLiterals?: boolean;
}

export interface TableInfo {
	readonly table: string;
	readonly displayName: string;
	readonly columns: readonly EnhancedColumn[];
	readonly rowCount: number;
}

/**
 * Entry point of the report engine.
 * Coordinates the schema catalog, query building, the safety gate, execution and export.
 */
export class ReportEngine {
	private constructor(
		private readonly _client: DbClient,
		private _catalog: SchemaCatalog,
		private readonly _executor: QueryExecutor,
		private readonly _close: () => Promise<void>
	) { }

	/**
	 * Create a ReportEngine connected to a database.
	 *
	 * Connection string formats:
	 * - `pglite:` or `pglite::memory:` - In-memory PGLite database
	 * - `pglite:/path/to/dir` - PGLite database persisted to filesystem
	 * - `postgresql://...` or other - PostgreSQL connection string
	 *
	 * PostgreSQL connections get a server-side `statement_timeout` matching the executor deadline.
	 */
	static async connect(connectionString: string, options: ReportEngineOptions = {}): Promise<ReportEngine> {
		if (connectionString.startsWith("pglite:")) {
			const pglitePath = connectionString.slice("pglite:".length);
			const db = new PGlite(pglitePath || undefined);
			return ReportEngine._create(db, options, () => db.close());
		}

		const client = new Client({
			connectionString,
			statement_timeout: options.executor?.timeoutMs ?? 30_000,
		});
		await client.connect();

		return ReportEngine._create(client, options, () => client.end());
	}

	/**
	 * Create a ReportEngine from an existing client (useful for testing with PGLite).
	 * The caller keeps ownership of the client; `close()` does not close it.
	 */
	static async fromClient(client: DbClient, options: ReportEngineOptions = {}): Promise<ReportEngine> {
		return ReportEngine._create(client, options, async () => { });
	}

	private static async _create(
		client: DbClient,
		options: ReportEngineOptions,
		close: () => Promise<void>
	): Promise<ReportEngine> {
		const catalog = await SchemaCatalog.introspect(client, options.catalog);
		const executor = new QueryExecutor(client, options.executor);
		return new ReportEngine(client, catalog, executor, close);
	}

	get catalog(): SchemaCatalog {
		return this._catalog;
	}

	/**
	 * Introspect the database again and swap in the new catalog snapshot.
	 * Readers holding the previous snapshot keep a consistent view.
	 */
	async refresh(): Promise<SchemaCatalog> {
		this._catalog = await this._catalog.refresh();
		return this._catalog;
	}

	listTables(): Record<string, string> {
		return this._catalog.listTables();
	}

	getColumns(table: string): string[] {
		return this._catalog.getColumns(table);
	}

	getEnhancedColumns(table: string): readonly EnhancedColumn[] {
		return this._catalog.getEnhancedColumns(table);
	}

	/**
	 * Columns of a table together with its current row count.
	 */
	async getTableInfo(table: string): Promise<TableInfo> {
		const catalog = this._catalog;
		const columns = catalog.getEnhancedColumns(table);
		const result = await this._client.query<{ count: unknown }>(
			`SELECT COUNT(*) AS count FROM ${escapeIdentifier(table)}`
		);
		return {
			table,
			displayName: catalog.displayName(table),
			columns,
			rowCount: Number(result.rows[0]?.count ?? 0),
		};
	}

	buildQuery(config: ReportConfig): string {
		return buildQuery(this._catalog, config);
	}

	buildParameterizedQuery(config: ReportConfig): SqlStatement {
		return buildParameterizedQuery(this._catalog, config);
	}

	validateConfig(config: ReportConfigDraft): string[] {
		return validateConfig(config);
	}

	validateSafety(sql: string): SafetyVerdict {
		return validateQuerySafety(sql);
	}

	/**
	 * Run SQL through the safety gate, then execute it.
	 * @throws SafetyRejectionError - the query is never sent to the database
	 */
	async execute(query: string | SqlStatement, options: ExecuteOptions = {}): Promise<QueryResult> {
		assertQuerySafe(typeof query === "string" ? query : query.sql);
		return this._executor.execute(query, options);
	}

	/**
	 * Validate, build, check and execute a report.
	 * Filter values are bound as parameters unless `inlineLiterals` is set.
	 *
	 * @throws ConfigValidationError, UnknownTableError, ColumnNotFoundError, QueryBuildError, SafetyRejectionError
	 */
	async runReport(config: ReportConfig, options: RunReportOptions = {}): Promise<QueryResult> {
		const errors = validateConfig(config);
		if (errors.length > 0) {
			throw new ConfigValidationError(errors);
		}

		const { inlineLiterals, ...executeOptions } = options;
		const query = inlineLiterals
			? buildQuery(this._catalog, config)
			: buildParameterizedQuery(this._catalog, config);

		return this.execute(query, executeOptions);
	}

	exportCsv(result: QueryResult): string {
		return toCsv(result);
	}

	exportSpreadsheet(result: QueryResult, options?: SpreadsheetOptions): Promise<Buffer> {
		return toSpreadsheet(result, options);
	}

	suggestJoins(tableA: string, tableB: string): JoinSuggestion[] {
		return suggestJoins(this._catalog, tableA, tableB);
	}

	/**
	 * Close the database connection, if the engine opened it.
	 */
	async close(): Promise<void> {
		await this._close();
	}
}
