import { describe, test, expect, beforeEach } from "vitest";
import type { PGlite } from "@electric-sql/pglite";
import { ReportEngine } from "./reportEngine";
import type { ReportConfig } from "./model";
import {
	ColumnNotFoundError,
	ConfigValidationError,
	SafetyRejectionError,
	UnknownTableError,
} from "./errors";
import { createFixtureDb, parseCsv } from "./testSupport";

describe("ReportEngine", () => {
	let db: PGlite;
	let engine: ReportEngine;

	beforeEach(async () => {
		db = await createFixtureDb();
		engine = await ReportEngine.fromClient(db);
	});

	const highPriority: ReportConfig = {
		primaryTable: "workorders",
		columns: ["id", "title"],
		filters: [{ column: "priority", operator: "eq", value: "HIGH" }],
		limit: 10,
	};

	describe("schema", () => {
		test("lists tables and columns", () => {
			expect(engine.listTables()).toEqual({ statuses: "Statuses", users: "Users", workorders: "Workorders" });
			expect(engine.getColumns("statuses")).toEqual(["id", "name", "color"]);
		});

		test("getTableInfo counts rows", async () => {
			const info = await engine.getTableInfo("users");

			expect(info.table).toBe("users");
			expect(info.displayName).toBe("Users");
			expect(info.rowCount).toBe(2);
			expect(info.columns.map(c => c.name)).toEqual(["id", "username", "email"]);
		});

		test("getTableInfo rejects an unknown table", async () => {
			await expect(engine.getTableInfo("invoices")).rejects.toThrow(UnknownTableError);
		});

		test("refresh picks up new tables", async () => {
			const before = engine.catalog;
			await db.exec("CREATE TABLE priorities (id SERIAL PRIMARY KEY, name TEXT, level INTEGER)");

			await engine.refresh();

			expect(engine.catalog).not.toBe(before);
			expect(engine.listTables()).toHaveProperty("priorities", "Priorities");
			expect(before.hasTable("priorities")).toBe(false);
		});
	});

	describe("runReport", () => {
		test("builds the inlined statement when asked to", async () => {
			const result = await engine.runReport(highPriority, { inlineLiterals: true });

			expect(result.success).toBe(true);
			expect(result.sql).toBe(
				"SELECT workorders.id, workorders.title FROM workorders WHERE priority = 'HIGH' LIMIT 10"
			);
			expect(result.rowCount).toBe(2);
		});

		test("binds filter values by default", async () => {
			const result = await engine.runReport({ ...highPriority, sorting: { column: "id" } });

			expect(result.sql).toBe(
				"SELECT workorders.id, workorders.title FROM workorders WHERE priority = $1 ORDER BY workorders.id ASC LIMIT 10"
			);
			expect(result.records).toEqual([
				{ id: 1, title: "Replace rotor" },
				{ id: 3, title: "Calibrate sensors" },
			]);
		});

		test("resolves columns through foreign keys", async () => {
			const result = await engine.runReport({
				primaryTable: "workorders",
				columns: ["id", "status_name", "assigned_to_username", "created_by_username"],
				sorting: { column: "id" },
			});

			expect(result.columns).toEqual(["id", "status_name", "assigned_to_username", "created_by_username"]);
			expect(result.records).toEqual([
				{ id: 1, status_name: "Open", assigned_to_username: "bob", created_by_username: "alice" },
				{ id: 2, status_name: "Closed", assigned_to_username: null, created_by_username: "alice" },
				{ id: 3, status_name: "Open", assigned_to_username: "alice", created_by_username: "bob" },
			]);
		});

		test("filters on a date range", async () => {
			const result = await engine.runReport({
				primaryTable: "workorders",
				columns: ["id"],
				filters: [{ column: "created_at", operator: "between", value: "2024-01-01", value2: "2024-02-28" }],
				sorting: { column: "id" },
			}, { inlineLiterals: true });

			expect(result.records).toEqual([{ id: 1 }, { id: 2 }]);
		});

		test("groups by a projected column", async () => {
			const result = await engine.runReport({
				primaryTable: "workorders",
				columns: ["status_name"],
				groupBy: ["statuses.name"],
				orderBy: "statuses.name",
			});

			expect(result.records).toEqual([{ status_name: "Closed" }, { status_name: "Open" }]);
		});

		test("applies an explicit join", async () => {
			const result = await engine.runReport({
				primaryTable: "workorders",
				columns: ["id"],
				joins: [{ type: "INNER", table: "users", condition: "workorders.created_by_id = users.id" }],
				filters: [{ column: "users.username", operator: "eq", value: "bob" }],
			});

			expect(result.records).toEqual([{ id: 3 }]);
		});

		test("returns stored timestamps unshifted", async () => {
			await db.exec(`
				CREATE TABLE visits (id SERIAL PRIMARY KEY, seen_at TIMESTAMP);
				INSERT INTO visits (seen_at) VALUES ('2024-01-05 10:00:00');
			`);
			await engine.refresh();

			const result = await engine.runReport({ primaryTable: "visits", columns: ["seen_at"] });

			expect(result.records).toEqual([{ seen_at: "2024-01-05 10:00:00" }]);
		});

		test("reports on columns named after reserved words", async () => {
			await db.exec(`
				CREATE TABLE shipments (id SERIAL PRIMARY KEY, "order" INTEGER, "createdBy" TEXT);
				INSERT INTO shipments ("order", "createdBy") VALUES (3, 'alice'), (7, 'bob'), (9, 'carol');
			`);
			await engine.refresh();

			const result = await engine.runReport({
				primaryTable: "shipments",
				columns: ["id", "order", "createdBy"],
				filters: [{ column: "order", operator: "gt", value: 5 }],
				sorting: { column: "order", order: "desc" },
			});

			expect(result.sql).toBe(
				`SELECT shipments.id, shipments."order", shipments."createdBy" FROM shipments WHERE "order" > $1 ORDER BY shipments."order" DESC`
			);
			expect(result.records).toEqual([
				{ id: 3, order: 9, createdBy: "carol" },
				{ id: 2, order: 7, createdBy: "bob" },
			]);
		});

		test("rejects an invalid config before building", async () => {
			await expect(engine.runReport({
				primaryTable: "workorders",
				columns: ["id"],
				filters: [{ column: "created_at", operator: "between", value: "2024-01-01" }],
			})).rejects.toThrow(ConfigValidationError);
		});

		test("rejects an unknown column", async () => {
			await expect(engine.runReport({ primaryTable: "workorders", columns: ["bogus_col"] }))
				.rejects.toThrow(ColumnNotFoundError);
		});

		test("reports a database failure in the result", async () => {
			const result = await engine.runReport({
				primaryTable: "workorders",
				columns: ["id"],
				joins: [{ type: "INNER", table: "users", condition: "users.nope = workorders.id" }],
			});

			expect(result.success).toBe(false);
			expect(result.error).toContain("nope");
			expect(result.records).toEqual([]);
		});
	});

	describe("execute", () => {
		test("never sends an unsafe statement", async () => {
			await expect(engine.execute("SELECT 1; DROP TABLE workorders")).rejects.toThrow(SafetyRejectionError);

			const info = await engine.getTableInfo("workorders");
			expect(info.rowCount).toBe(3);
		});

		test("runs a safe statement", async () => {
			const result = await engine.execute({ sql: "SELECT id FROM users WHERE username = $1", params: ["bob"] });

			expect(result.records).toEqual([{ id: 2 }]);
		});
	});

	describe("export", () => {
		test.each<[string, ReportConfig]>([
			["no rows", { ...highPriority, filters: [{ column: "priority", operator: "eq", value: "NONE" }] }],
			["some rows", highPriority],
			["all rows with nulls", { primaryTable: "workorders", columns: ["title", "assigned_to_username"] }],
		])("CSV of %s reads back to the same columns and row count", async (_, config) => {
			const result = await engine.runReport(config);
			const rows = parseCsv(engine.exportCsv(result));

			expect(rows[0]).toEqual(result.columns);
			expect(rows.length - 1).toBe(result.rowCount);
		});

		test("exports a workbook", async () => {
			const buffer = await engine.exportSpreadsheet(await engine.runReport(highPriority));

			expect(buffer.subarray(0, 2).toString("latin1")).toBe("PK");
		});
	});

	test("suggestJoins uses the catalog", () => {
		expect(engine.suggestJoins("workorders", "statuses").map(s => s.condition)).toEqual([
			"workorders.status_id = statuses.id",
		]);
	});

	test("connect opens an in-memory database", async () => {
		const memory = await ReportEngine.connect("pglite:");
		try {
			expect(memory.listTables()).toEqual({});
		} finally {
			await memory.close();
		}
	});
});
