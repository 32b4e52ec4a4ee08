// Validation rule translation
// Recognises the common shapes of variable validation conditions and turns
// them into Draft 7 keywords on the variable's schema node. Anything else is
// reported back as ignored; conditions are never evaluated.

import { SchemaError } from "./errors.ts";
import { parseLiteral } from "./parser/parser.ts";
import { canonicalize } from "./serialize.ts";
import { baseType, type SchemaNode, type ValidationRule, type Value } from "./types.ts";

//==============================================================================
// Constraints
//==============================================================================

type Comparison = ">=" | ">" | "<=" | "<" | "==";

type Constraint =
	| { kind: "enum"; values: Value[] }
	| { kind: "pattern"; pattern: string }
	| { kind: "length"; op: Comparison; bound: number }
	| { kind: "range"; op: Comparison; bound: number };

type LowerKey = "minLength" | "minItems" | "minProperties" | "minimum" | "exclusiveMinimum";
type UpperKey = "maxLength" | "maxItems" | "maxProperties" | "maximum" | "exclusiveMaximum";

export interface RuleTranslation {
	node: SchemaNode;
	ignored: ValidationRule[];
}

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\-]/g, "\\$&");
}

//==============================================================================
// Condition Splitting
//==============================================================================

/**
 * Split a condition on top-level `&&`, or return undefined when it has a
 * top-level `||` (a disjunction has no keyword form).
 */
function splitConjunction(condition: string): string[] | undefined {
	const parts: string[] = [];
	let depth = 0;
	let inString = false;
	let start = 0;

	for (let i = 0; i < condition.length; i++) {
		const ch = condition[i];
		if (inString) {
			if (ch === "\\") i++;
			else if (ch === "\"") inString = false;
			continue;
		}
		if (ch === "\"") inString = true;
		else if (ch === "(" || ch === "[" || ch === "{") depth++;
		else if (ch === ")" || ch === "]" || ch === "}") depth--;
		else if (depth === 0 && condition.startsWith("||", i)) return undefined;
		else if (depth === 0 && condition.startsWith("&&", i)) {
			parts.push(condition.slice(start, i));
			start = i + 2;
			i++;
		}
	}
	parts.push(condition.slice(start));
	return parts.map(stripParens);
}

function stripParens(part: string): string {
	let text = part.trim();
	while (text.startsWith("(") && text.endsWith(")") && closesAtEnd(text)) {
		text = text.slice(1, -1).trim();
	}
	return text;
}

/** True when the opening paren at 0 is matched by the final character. */
function closesAtEnd(text: string): boolean {
	let depth = 0;
	for (let i = 0; i < text.length; i++) {
		if (text[i] === "(") depth++;
		if (text[i] === ")") depth--;
		if (depth === 0) return i === text.length - 1;
	}
	return false;
}

//==============================================================================
// Recognition
//==============================================================================

function recognize(part: string, variable: string): Constraint | undefined {
	const ref = "var\\." + escapeRegExp(variable);

	const contains = new RegExp("^contains\\(\\s*(\\[[\\s\\S]*\\])\\s*,\\s*" + ref + "\\s*\\)$").exec(part);
	if (contains !== null) {
		const values = literal(contains[1]);
		if (Array.isArray(values) && values.every(isScalar)) {
			return { kind: "enum", values };
		}
		return undefined;
	}

	const regex = new RegExp("^can\\(\\s*regex\\(\\s*(\"(?:[^\"\\\\]|\\\\.)*\")\\s*,\\s*" + ref + "\\s*\\)\\s*\\)$").exec(part);
	if (regex !== null) {
		const pattern = literal(regex[1]);
		return typeof pattern === "string" && isPortablePattern(pattern) ? { kind: "pattern", pattern } : undefined;
	}

	const length = new RegExp("^length\\(\\s*" + ref + "\\s*\\)\\s*(>=|<=|==|>|<)\\s*([0-9]+)$").exec(part);
	if (length !== null) {
		return { kind: "length", op: comparison(length[1]), bound: Number(length[2]) };
	}

	const range = new RegExp("^" + ref + "\\s*(>=|<=|>|<)\\s*(-?[0-9]+(?:\\.[0-9]+)?)$").exec(part);
	if (range !== null) {
		return { kind: "range", op: comparison(range[1]), bound: Number(range[2]) };
	}

	return undefined;
}

function literal(text: string): Value | undefined {
	try {
		return parseLiteral(text);
	} catch (err) {
		if (err instanceof SchemaError) return undefined;
		throw err;
	}
}

/** Draft 7 patterns are ECMA-262 regular expressions; RE2-only syntax such as `(?i)` is skipped. */
function isPortablePattern(pattern: string): boolean {
	try {
		new RegExp(pattern, "u");
		return true;
	} catch (err) {
		if (err instanceof SyntaxError) return false;
		throw err;
	}
}

function isScalar(value: Value): boolean {
	return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function comparison(op: string): Comparison {
	switch (op) {
	case ">=":
	case ">":
	case "<=":
	case "<":
	case "==":
		return op;
	default:
		throw new Error(`Unexpected comparison operator: ${op}`);
	}
}

//==============================================================================
// Application
//==============================================================================

function tighten(node: SchemaNode, key: LowerKey | UpperKey, bound: number, lower: boolean): SchemaNode {
	const current = node[key];
	const patch: Partial<Record<LowerKey | UpperKey, number>> = {};
	patch[key] = current === undefined ? bound : lower ? Math.max(current, bound) : Math.min(current, bound);
	return { ...node, ...patch };
}

function applyBounds(node: SchemaNode, op: Comparison, bound: number, lowerKey: LowerKey, upperKey: UpperKey): SchemaNode {
	switch (op) {
	case ">=":
		return tighten(node, lowerKey, bound, true);
	case ">":
		return tighten(node, lowerKey, bound + 1, true);
	case "<=":
		return tighten(node, upperKey, bound, false);
	case "<":
		return tighten(node, upperKey, Math.max(0, bound - 1), false);
	case "==":
		return tighten(tighten(node, lowerKey, bound, true), upperKey, bound, false);
	}
}

function applyConstraint(node: SchemaNode, constraint: Constraint, nullable: boolean): SchemaNode | undefined {
	const base = baseType(node);

	switch (constraint.kind) {
	case "enum": {
		if (base !== "string" && base !== "number" && base !== "boolean") return undefined;
		let values = constraint.values;
		if (node.enum !== undefined) {
			const allowed = new Set(node.enum.map(canonicalize));
			values = values.filter((v) => allowed.has(canonicalize(v)));
		}
		if (nullable && !values.includes(null)) values = [...values, null];
		return { ...node, enum: values };
	}
	case "pattern":
		return base === "string" ? { ...node, pattern: constraint.pattern } : undefined;
	case "length":
		if (base === "string") return applyBounds(node, constraint.op, constraint.bound, "minLength", "maxLength");
		if (base === "object") return applyBounds(node, constraint.op, constraint.bound, "minProperties", "maxProperties");
		// Tuples already fix their length
		if (base === "array" && !Array.isArray(node.items)) {
			return applyBounds(node, constraint.op, constraint.bound, "minItems", "maxItems");
		}
		return undefined;
	case "range":
		if (base !== "number") return undefined;
		switch (constraint.op) {
		case ">":
			return tighten(node, "exclusiveMinimum", constraint.bound, true);
		case "<":
			return tighten(node, "exclusiveMaximum", constraint.bound, false);
		default:
			return applyBounds(node, constraint.op, constraint.bound, "minimum", "maximum");
		}
	}
}

/**
 * Fold a variable's validation rules into its top-level schema node.
 * A rule is ignored unless at least one of its `&&` parts is recognised.
 */
export function applyValidationRules(
	node: SchemaNode,
	variable: string,
	rules: readonly ValidationRule[],
	nullable: boolean,
): RuleTranslation {
	let result = node;
	const ignored: ValidationRule[] = [];

	for (const rule of rules) {
		const parts = splitConjunction(rule.condition);
		let applied = false;
		for (const part of parts ?? []) {
			const constraint = recognize(part, variable);
			const next = constraint !== undefined ? applyConstraint(result, constraint, nullable) : undefined;
			if (next !== undefined) {
				result = next;
				applied = true;
			}
		}
		if (!applied) ignored.push(rule);
	}

	return { node: result, ignored };
}
