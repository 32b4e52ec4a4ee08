// Schema Document Self-Check
// Two-phase validation: Zod safeParse for structure, then semantic checks
// that the structural schema cannot express.

import { z } from "zod/v4";
import {
	invalidResult,
	type ValidationError,
	type ValidationResult,
	validResult,
} from "./errors.ts";
import type { SchemaDocument } from "./types.ts";
import { SchemaDocumentSchema } from "./zod-schemas.ts";

//==============================================================================
// Zod-to-ValidationError Conversion
//==============================================================================

function zodToValidationErrors(error: z.ZodError): ValidationError[] {
	return error.issues.map(issue => {
		const segments = issue.path.map(String);
		return { path: segments.join(".") || "$", segments, message: issue.message };
	});
}

//==============================================================================
// Validation State (for semantic checks)
//==============================================================================

interface CheckState {
	errors: ValidationError[];
	path: string[];
}

function addError(state: CheckState, message: string, value?: unknown): void {
	state.errors.push({
		path: state.path.length > 0 ? state.path.join(".") : "$",
		segments: [...state.path],
		message,
		value,
	});
}

function within(state: CheckState, segments: string[], check: () => void): void {
	state.path.push(...segments);
	check();
	state.path.length -= segments.length;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

//==============================================================================
// Semantic Checks
//==============================================================================

/** Every name in `required` must be a declared property, listed once. */
function checkRequired(state: CheckState, node: Record<string, unknown>): void {
	const required = node.required;
	if (!Array.isArray(required)) return;
	const properties = isRecord(node.properties) ? node.properties : {};
	const seen = new Set<string>();

	within(state, ["required"], () => {
		for (const name of required) {
			if (typeof name !== "string") continue;
			if (!Object.hasOwn(properties, name)) {
				addError(state, "Required property is not declared: " + name, name);
			}
			if (seen.has(name)) {
				addError(state, "Property listed as required more than once: " + name, name);
			}
			seen.add(name);
		}
	});
}

function checkBounds(state: CheckState, node: Record<string, unknown>, lower: string, upper: string): void {
	const min = node[lower];
	const max = node[upper];
	if (typeof min === "number" && typeof max === "number" && min > max) {
		addError(state, lower + " (" + String(min) + ") exceeds " + upper + " (" + String(max) + ")");
	}
}

function checkNode(state: CheckState, node: unknown): void {
	if (!isRecord(node)) return;

	const type = node.type;
	if (Array.isArray(type) && new Set(type).size !== type.length) {
		addError(state, "Type list contains duplicates", type);
	}

	checkRequired(state, node);
	checkBounds(state, node, "minItems", "maxItems");
	checkBounds(state, node, "minLength", "maxLength");
	checkBounds(state, node, "minProperties", "maxProperties");
	checkBounds(state, node, "minimum", "maximum");

	if (typeof node.pattern === "string") {
		try {
			new RegExp(node.pattern, "u");
		} catch (err) {
			const reason = err instanceof Error ? err.message : String(err);
			addError(state, "Pattern is not a valid regular expression: " + reason, node.pattern);
		}
	}

	const items = node.items;
	if (Array.isArray(items)) {
		// Positional items describe a tuple, whose length is fixed
		if (node.minItems !== items.length || node.maxItems !== items.length) {
			addError(state, "Tuple bounds must equal the number of positional items (" + String(items.length) + ")");
		}
		items.forEach((item, i) => {
			within(state, ["items", String(i)], () => { checkNode(state, item); });
		});
	} else {
		within(state, ["items"], () => { checkNode(state, items); });
	}

	within(state, ["additionalProperties"], () => { checkNode(state, node.additionalProperties); });

	if (isRecord(node.properties)) {
		for (const [name, child] of Object.entries(node.properties)) {
			within(state, ["properties", name], () => { checkNode(state, child); });
		}
	}
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Check that a generated document is a well-formed variables schema.
 *
 * This is a self-check of the generator's output, not a Draft 7 meta-schema
 * validation; that remains the job of an external validator.
 */
export function checkDocument(doc: unknown): ValidationResult<SchemaDocument> {
	const parsed = SchemaDocumentSchema.safeParse(doc);
	if (!parsed.success) {
		return invalidResult(zodToValidationErrors(parsed.error));
	}

	// Semantic phase reads the input itself so property names survive untouched
	const state: CheckState = { errors: [], path: [] };
	checkNode(state, doc);

	if (state.errors.length > 0) {
		return invalidResult(state.errors);
	}
	return validResult(parsed.data);
}
