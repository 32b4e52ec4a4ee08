// Shared test helpers

import assert from "node:assert/strict";

import { SchemaError } from "../src/errors.ts";
import type { Logger } from "../src/logger.ts";
import type { VariableSpec } from "../src/types.ts";

/** Run `fn` and return the SchemaError it throws. */
export function catchSchemaError(fn: () => unknown): SchemaError {
	try {
		fn();
	} catch (err) {
		if (err instanceof SchemaError) return err;
		throw err;
	}
	return assert.fail("expected a SchemaError to be thrown");
}

/** A variable record with the extractor's defaults filled in. */
export function variable(overrides: Partial<VariableSpec> & { name: string }): VariableSpec {
	return {
		rawType: "string",
		sensitive: false,
		nullable: true,
		ephemeral: false,
		validations: [],
		...overrides,
	};
}

export interface RecordingLogger extends Logger {
	lines: string[];
}

/** Logger that keeps `level: message` lines for assertions. */
export function recordingLogger(): RecordingLogger {
	const lines: string[] = [];
	return {
		lines,
		debug(message) { lines.push("debug: " + message); },
		info(message) { lines.push("info: " + message); },
		warn(message) { lines.push("warn: " + message); },
		error(message) { lines.push("error: " + message); },
	};
}
