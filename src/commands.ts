import { Command, InvalidArgumentError, Option } from "commander";
import * as fs from "fs";
import { ReportEngine, type ReportEngineOptions } from "./reportEngine";
import { parseReportConfig, generateReportConfigSchema } from "./reportConfigFile";
import { validateConfig } from "./queryValidator";
import { ConfigValidationError } from "./errors";
import type { ReportConfig } from "./model";

interface ConnectionOptions {
	connection: string;
}

async function withEngine<T>(
	connection: string,
	action: (engine: ReportEngine) => Promise<T>,
	options: ReportEngineOptions = {}
): Promise<T> {
	const engine = await ReportEngine.connect(connection, options);
	try {
		return await action(engine);
	} finally {
		await engine.close();
	}
}

function loadConfig(file: string): ReportConfig {
	const config = parseReportConfig(fs.readFileSync(file, "utf-8"));
	const errors = validateConfig(config);
	if (errors.length > 0) {
		throw new ConfigValidationError(errors);
	}
	return config;
}

function parseInteger(value: string): number {
	const parsed = Number.parseInt(value, 10);
	if (Number.isNaN(parsed)) {
		throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
	}
	return parsed;
}

/**
 * Build the `report-engine` command line program.
 * Output goes to the console; failures reject `parseAsync`.
 */
export function createProgram(): Command {
	const program = new Command();

	program
		.name("report-engine")
		.description("Build, check and run ad hoc reports against a PostgreSQL database")
		.version("1.0.0");

	program
		.command("tables")
		.description("List the tables available for reporting")
		.requiredOption("-c, --connection <string>", "PostgreSQL connection string")
		.action(async (options: ConnectionOptions) => {
			await withEngine(options.connection, async (engine) => {
				for (const [table, displayName] of Object.entries(engine.listTables())) {
					console.log(`${table}\t${displayName}`);
				}
				for (const [table, message] of engine.catalog.introspectionErrors) {
					console.error(`warning: could not introspect ${table}: ${message}`);
				}
			});
		});

	program
		.command("columns")
		.description("List the columns of a table")
		.requiredOption("-c, --connection <string>", "PostgreSQL connection string")
		.requiredOption("-t, --table <name>", "Table name")
		.option("--enhanced", "Include columns reachable through foreign keys")
		.action(async (options: ConnectionOptions & { table: string; enhanced?: boolean }) => {
			await withEngine(options.connection, async (engine) => {
				if (!options.enhanced) {
					for (const column of engine.getColumns(options.table)) {
						console.log(column);
					}
					return;
				}
				for (const column of engine.getEnhancedColumns(options.table)) {
					const via = column.join ? `\tvia ${column.join.targetTable}.${column.join.foreignKey}` : "";
					console.log(`${column.name}\t${column.displayName}\t${column.type}${via}`);
				}
			});
		});

	program
		.command("info")
		.description("Show a table's columns and row count")
		.requiredOption("-c, --connection <string>", "PostgreSQL connection string")
		.requiredOption("-t, --table <name>", "Table name")
		.action(async (options: ConnectionOptions & { table: string }) => {
			await withEngine(options.connection, async (engine) => {
				const info = await engine.getTableInfo(options.table);
				console.log(`${info.displayName} (${info.table})`);
				console.log(`Rows: ${info.rowCount}`);
				console.log(`Columns: ${info.columns.map(c => c.name).join(", ")}`);
			});
		});

	program
		.command("build")
		.description("Print the SQL a report config produces, without running it")
		.requiredOption("-c, --connection <string>", "PostgreSQL connection string")
		.requiredOption("-f, --file <file>", "Report config JSON file")
		.option("--inline", "Inline filter values instead of binding parameters")
		.action(async (options: ConnectionOptions & { file: string; inline?: boolean }) => {
			const config = loadConfig(options.file);
			await withEngine(options.connection, async (engine) => {
				if (options.inline) {
					console.log(engine.buildQuery(config));
					return;
				}
				const statement = engine.buildParameterizedQuery(config);
				console.log(statement.sql);
				if (statement.params.length > 0) {
					console.log(`-- params: ${JSON.stringify(statement.params)}`);
				}
			});
		});

	program
		.command("run")
		.description("Run a report and export the result")
		.requiredOption("-c, --connection <string>", "PostgreSQL connection string")
		.requiredOption("-f, --file <file>", "Report config JSON file")
		.addOption(new Option("--format <format>", "Export format").choices(["csv", "xlsx"]).default("csv"))
		.option("-o, --output <file>", "Output file (defaults to stdout for csv)")
		.option("--timeout <ms>", "Query deadline in milliseconds", parseInteger)
		.option("--inline", "Inline filter values instead of binding parameters")
		.action(async (options: ConnectionOptions & {
			file: string;
			format: "csv" | "xlsx";
			output?: string;
			timeout?: number;
			inline?: boolean;
		}) => {
			if (options.format === "xlsx" && !options.output) {
				throw new Error("--output is required for xlsx exports");
			}
			const config = loadConfig(options.file);

			await withEngine(options.connection, async (engine) => {
				const result = await engine.runReport(config, { inlineLiterals: options.inline });
				if (!result.success) {
					console.error(`Query failed: ${result.error ?? "unknown error"}`);
					process.exitCode = 1;
					return;
				}

				if (options.format === "xlsx" && options.output) {
					fs.writeFileSync(options.output, await engine.exportSpreadsheet(result, { sheetName: config.primaryTable }));
				} else if (options.output) {
					fs.writeFileSync(options.output, engine.exportCsv(result));
				} else {
					process.stdout.write(engine.exportCsv(result));
					return;
				}
				console.log(`Exported ${result.rowCount} row(s) to ${options.output} in ${result.executionTimeMs.toFixed(1)} ms`);
			}, { executor: { timeoutMs: options.timeout } });
		});

	program
		.command("joins")
		.description("Suggest join conditions between two tables")
		.requiredOption("-c, --connection <string>", "PostgreSQL connection string")
		.argument("<tableA>", "First table")
		.argument("<tableB>", "Second table")
		.action(async (tableA: string, tableB: string, options: ConnectionOptions) => {
			await withEngine(options.connection, async (engine) => {
				const suggestions = engine.suggestJoins(tableA, tableB);
				if (suggestions.length === 0) {
					console.log(`No foreign keys link ${tableA} and ${tableB}.`);
					return;
				}
				for (const suggestion of suggestions) {
					console.log(`${suggestion.type} JOIN ${tableB} ON ${suggestion.condition}`);
					console.log(`  ${suggestion.description}`);
				}
			});
		});

	program
		.command("schema")
		.description("Export a JSON Schema for report config files of this database")
		.requiredOption("-c, --connection <string>", "PostgreSQL connection string")
		.option("-o, --output <file>", "Output file (defaults to stdout)")
		.action(async (options: ConnectionOptions & { output?: string }) => {
			await withEngine(options.connection, async (engine) => {
				const schema = JSON.stringify(generateReportConfigSchema(engine.catalog), null, "\t");
				if (options.output) {
					fs.writeFileSync(options.output, schema);
					console.log(`Exported to ${options.output}`);
				} else {
					console.log(schema);
				}
			});
		});

	return program;
}
