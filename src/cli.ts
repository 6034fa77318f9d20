#!/usr/bin/env node
import { createProgram } from "./commands";
import { ConfigValidationError, errorMessage } from "./errors";

createProgram().parseAsync().catch((error: unknown) => {
	if (error instanceof ConfigValidationError) {
		console.error("Invalid report configuration:");
		for (const message of error.errors) {
			console.error(`  - ${message}`);
		}
	} else {
		console.error(errorMessage(error));
	}
	process.exitCode = 1;
});
