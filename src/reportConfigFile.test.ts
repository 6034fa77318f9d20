import { describe, test, expect } from "vitest";
import Ajv from "ajv";
import { generateReportConfigSchema, parseReportConfig, reportConfigSchema } from "./reportConfigFile";
import { ConfigValidationError } from "./errors";
import { FILTER_OPERATORS } from "./model";
import { fixtureCatalog } from "./testSupport";

function parseErrors(json: string): readonly string[] {
	try {
		parseReportConfig(json);
	} catch (error) {
		if (error instanceof ConfigValidationError) {
			return error.errors;
		}
		throw error;
	}
	return [];
}

describe("parseReportConfig", () => {
	test("parses a config and drops the $schema reference", () => {
		const config = parseReportConfig(JSON.stringify({
			$schema: "./report.schema.json",
			primaryTable: "workorders",
			columns: ["id", "title"],
			filters: [{ column: "priority", operator: "eq", value: "HIGH" }],
			limit: 10,
		}));

		expect(config).toEqual({
			primaryTable: "workorders",
			columns: ["id", "title"],
			filters: [{ column: "priority", operator: "eq", value: "HIGH" }],
			limit: 10,
		});
	});

	test("reports invalid JSON", () => {
		const errors = parseErrors("{ primaryTable: ");

		expect(errors).toHaveLength(1);
		expect(errors[0]).toMatch(/^Invalid JSON: /);
	});

	test("reports missing required properties", () => {
		expect(parseErrors(`{"primaryTable":"workorders"}`)).toEqual([
			"(root) must have required property 'columns'",
		]);
	});

	test("lists the allowed operators for an unknown one", () => {
		expect(parseErrors(`{"primaryTable":"workorders","columns":["id"],"filters":[{"column":"id","operator":"contains"}]}`)).toEqual([
			`/filters/0/operator must be equal to one of the allowed values: ${FILTER_OPERATORS.join(",")}`,
		]);
	});

	test("matches join types and directions case-sensitively", () => {
		const errors = parseErrors(JSON.stringify({
			primaryTable: "workorders",
			columns: ["id"],
			joins: [{ type: "left", table: "users", condition: "workorders.created_by_id = users.id" }],
			sorting: { column: "title", order: "DESC" },
		}));

		expect([...errors].sort()).toEqual([
			"/joins/0/type must be equal to one of the allowed values: INNER,LEFT,RIGHT,FULL",
			"/sorting/order must be equal to one of the allowed values: asc,desc",
		]);
	});

	test("reports every structural problem at once", () => {
		const errors = parseErrors(`{"primaryTable":"workorders","columns":["id"],"limit":2.5,"colour":"red"}`);

		expect([...errors].sort()).toEqual([
			"(root) must NOT have additional properties",
			"/limit must be integer",
		]);
	});
});

describe("generateReportConfigSchema", () => {
	const schema = generateReportConfigSchema(fixtureCatalog());
	const validate = new Ajv({ strict: false, allErrors: true }).compile(schema);

	test("restricts the primary table to catalog tables", () => {
		expect(schema.properties.primaryTable).toEqual({
			enum: ["statuses", "users", "workorders"],
			description: "statuses: Statuses\nusers: Users\nworkorders: Workorders",
		});
		expect(validate({ primaryTable: "invoices", columns: ["id"] })).toBe(false);
	});

	test("accepts base and projected columns of the chosen table", () => {
		expect(validate({
			primaryTable: "workorders",
			columns: ["id", "workorders.title", "status_name", "statuses.color", "assigned_to_username"],
		})).toBe(true);
	});

	test("rejects columns of another table", () => {
		expect(validate({ primaryTable: "workorders", columns: ["bogus_col"] })).toBe(false);
		expect(validate({ primaryTable: "statuses", columns: ["status_name"] })).toBe(false);
	});

	test("keeps the structural rules", () => {
		expect(schema.definitions).toEqual(reportConfigSchema.definitions);
		expect(validate({ primaryTable: "users", columns: ["username"], limit: "ten" })).toBe(false);
	});
});
