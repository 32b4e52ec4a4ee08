// Default value normalization
// Converts literal defaults into the Value domain expected by their declared
// type, reporting (but keeping) anything that does not fit.

import { defaultMismatch, exhaustive, type Diagnostic } from "./errors.ts";
import { canonicalize } from "./serialize.ts";
import {
	defineEntry,
	formatType,
	isValueRecord,
	type ObjectType,
	type PrimitiveName,
	type TypeExpression,
	type Value,
	type ValueRecord,
} from "./types.ts";
import { appendPointer } from "./utils/json-pointer.ts";

export interface NormalizedDefault {
	value: Value;
	diagnostics: Diagnostic[];
}

const NUMERIC = /^-?[0-9]+(\.[0-9]+)?([eE][+-]?[0-9]+)?$/;

/**
 * Normalize `value` against `type`.
 *
 * Applies the declaration language's safe conversions (numbers and bools to
 * strings, numeric strings to numbers, "true"/"false" to bools), de-duplicates
 * set elements and fills absent optional attributes that declare a default.
 * Mismatches become DefaultTypeMismatch warnings located at `pointer`; the
 * offending part of the value is carried through unchanged.
 */
export function normalizeDefault(
	value: Value,
	type: TypeExpression,
	pointer = "",
): NormalizedDefault {
	const diagnostics: Diagnostic[] = [];
	const normalized = normalize(value, type, pointer, diagnostics);
	return { value: normalized, diagnostics };
}

function normalize(
	value: Value,
	type: TypeExpression,
	pointer: string,
	diagnostics: Diagnostic[],
): Value {
	if (value === null) return null;

	switch (type.kind) {
	case "any":
	case "unresolved":
		return value;
	case "primitive": {
		const converted = convertPrimitive(value, type.name);
		if (converted === undefined) {
			diagnostics.push(mismatch(value, type, pointer));
			return value;
		}
		return converted;
	}
	case "list":
	case "set": {
		if (!Array.isArray(value)) {
			diagnostics.push(mismatch(value, type, pointer));
			return value;
		}
		const items = value.map((item, i) => normalize(item, type.of, appendPointer(pointer, String(i)), diagnostics));
		return type.kind === "set" ? uniqueValues(items) : items;
	}
	case "tuple": {
		if (!Array.isArray(value)) {
			diagnostics.push(mismatch(value, type, pointer));
			return value;
		}
		if (value.length !== type.elements.length) {
			diagnostics.push(defaultMismatch(
				"default has " + String(value.length) + " elements but " + formatType(type) +
					" expects " + String(type.elements.length),
				formatType(type),
				pointer,
			));
			return value;
		}
		return value.map((item, i) => normalize(item, type.elements[i], appendPointer(pointer, String(i)), diagnostics));
	}
	case "map": {
		if (!isValueRecord(value)) {
			diagnostics.push(mismatch(value, type, pointer));
			return value;
		}
		const result: ValueRecord = {};
		for (const [key, item] of Object.entries(value)) {
			defineEntry(result, key, normalize(item, type.of, appendPointer(pointer, key), diagnostics));
		}
		return result;
	}
	case "object":
		if (!isValueRecord(value)) {
			diagnostics.push(mismatch(value, type, pointer));
			return value;
		}
		return normalizeObject(value, type, pointer, diagnostics);
	default:
		return exhaustive(type);
	}
}

function normalizeObject(
	value: ValueRecord,
	type: ObjectType,
	pointer: string,
	diagnostics: Diagnostic[],
): ValueRecord {
	const result: ValueRecord = {};

	for (const [name, attr] of type.fields) {
		const present = Object.hasOwn(value, name) ? value[name] : undefined;
		if (attr.default !== undefined && (present === undefined || present === null)) {
			// The attribute's own default is reported where the attribute schema is compiled
			defineEntry(result, name, normalize(attr.default, attr.type, appendPointer(pointer, name), []));
		} else if (present !== undefined) {
			defineEntry(result, name, normalize(present, attr.type, appendPointer(pointer, name), diagnostics));
		} else if (!attr.optional) {
			diagnostics.push(defaultMismatch(
				"default is missing required attribute " + JSON.stringify(name),
				formatType(type),
				pointer,
			));
		}
	}

	for (const [key, item] of Object.entries(value)) {
		if (type.fields.has(key)) continue;
		diagnostics.push(defaultMismatch(
			"default has attribute " + JSON.stringify(key) + " not declared in " + formatType(type),
			formatType(type),
			appendPointer(pointer, key),
		));
		defineEntry(result, key, item);
	}

	return result;
}

function convertPrimitive(value: Value, name: PrimitiveName): Value | undefined {
	switch (name) {
	case "string":
		if (typeof value === "string") return value;
		if (typeof value === "number" || typeof value === "boolean") return String(value);
		return undefined;
	case "number":
		if (typeof value === "number") return value;
		if (typeof value === "string" && NUMERIC.test(value)) return Number(value);
		return undefined;
	case "bool":
		if (typeof value === "boolean") return value;
		if (value === "true") return true;
		if (value === "false") return false;
		return undefined;
	}
}

function uniqueValues(items: Value[]): Value[] {
	const seen = new Set<string>();
	return items.filter((item) => {
		const key = canonicalize(item);
		if (seen.has(key)) return false;
		seen.add(key);
		return true;
	});
}

function mismatch(value: Value, type: TypeExpression, pointer: string): Diagnostic {
	return defaultMismatch(
		"default " + describeValue(value) + " is not compatible with " + formatType(type),
		formatType(type),
		pointer,
	);
}

function describeValue(value: Value): string {
	if (Array.isArray(value)) return "list";
	if (isValueRecord(value)) return "object";
	return JSON.stringify(value);
}
