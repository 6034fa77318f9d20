import Ajv, { type ErrorObject } from "ajv";
import { FILTER_OPERATORS, JOIN_TYPES, type ReportConfig } from "./model";
import type { SchemaCatalog } from "./schemaCatalog";
import { ConfigValidationError, errorMessage } from "./errors";

export type JsonSchema = {
	readonly $schema: string;
	readonly type: string;
	readonly properties: Record<string, unknown>;
	readonly required?: readonly string[];
	readonly definitions?: Record<string, unknown>;
	readonly allOf?: readonly unknown[];
	readonly additionalProperties?: boolean;
};

/**
 * A report config file: the config itself plus an optional `$schema`
 * reference for editor autocomplete.
 */
export interface ReportConfigFile extends ReportConfig {
	readonly $schema?: string;
}

const filterValueSchema = { type: ["string", "number", "boolean"] };

/**
 * Structural JSON Schema of a report config file.
 */
export const reportConfigSchema: JsonSchema = {
	$schema: "http://json-schema.org/draft-07/schema#",
	type: "object",
	required: ["primaryTable", "columns"],
	additionalProperties: false,
	properties: {
		$schema: { type: "string" },
		primaryTable: { type: "string", minLength: 1 },
		columns: { type: "array", minItems: 1, items: { type: "string", minLength: 1 } },
		filters: { type: "array", items: { $ref: "#/definitions/filter" } },
		joins: { type: "array", items: { $ref: "#/definitions/join" } },
		groupBy: { type: "array", items: { type: "string" } },
		orderBy: { type: "string" },
		direction: { enum: ["asc", "desc"] },
		sorting: {
			type: "object",
			required: ["column"],
			additionalProperties: false,
			properties: {
				column: { type: "string" },
				order: { enum: ["asc", "desc"] },
			},
		},
		limit: { type: "integer" },
	},
	definitions: {
		filter: {
			type: "object",
			required: ["column", "operator"],
			additionalProperties: false,
			properties: {
				column: { type: "string" },
				operator: { enum: [...FILTER_OPERATORS] },
				value: filterValueSchema,
				value2: filterValueSchema,
			},
		},
		join: {
			type: "object",
			required: ["type", "table", "condition"],
			additionalProperties: false,
			properties: {
				type: { enum: [...JOIN_TYPES] },
				table: { type: "string" },
				condition: { type: "string" },
			},
		},
	},
};

const ajv = new Ajv({ strict: false, allErrors: true });
const validateStructure = ajv.compile<ReportConfigFile>(reportConfigSchema);

/**
 * Parse a report config file.
 * Checks structure only; run `validateConfig` for the semantic rules.
 * @throws ConfigValidationError listing every structural problem
 */
export function parseReportConfig(json: string): ReportConfig {
	let obj: unknown;
	try {
		obj = JSON.parse(json);
	} catch (error) {
		throw new ConfigValidationError([`Invalid JSON: ${errorMessage(error)}`]);
	}

	if (!validateStructure(obj)) {
		throw new ConfigValidationError((validateStructure.errors ?? []).map(formatAjvError));
	}

	const { $schema: _schema, ...config } = obj;
	return config;
}

/**
 * Catalog-aware schema: restricts `primaryTable` to known tables and,
 * per table, `columns` to the names the column resolver accepts.
 */
export function generateReportConfigSchema(catalog: SchemaCatalog): JsonSchema {
	const tables = [...catalog.tables.keys()];

	const allOf = tables.map(table => {
		const names = new Set<string>();
		for (const column of catalog.getEnhancedColumns(table)) {
			names.add(column.name);
			names.add(column.expression);
		}
		return {
			if: { properties: { primaryTable: { const: table } } },
			then: { properties: { columns: { items: { enum: [...names] } } } },
		};
	});

	return {
		...reportConfigSchema,
		properties: {
			...reportConfigSchema.properties,
			primaryTable: {
				enum: tables,
				description: tables.map(t => `${t}: ${catalog.displayName(t)}`).join("\n"),
			},
		},
		allOf,
	};
}

function formatAjvError(error: ErrorObject): string {
	const path = error.instancePath || "(root)";
	if (error.keyword === "enum" && "allowedValues" in error.params) {
		return `${path} ${error.message ?? "is invalid"}: ${String(error.params.allowedValues)}`;
	}
	return `${path} ${error.message ?? "is invalid"}`;
}
