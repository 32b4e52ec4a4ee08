// Schema Compiler
// Lowers type expression ASTs into JSON Schema Draft 7 subtrees and
// decorates a variable's top-level node with its declaration attributes.

import { normalizeDefault } from "./defaults.ts";
import {
	ErrorCodes,
	SchemaError,
	exhaustive,
	type Diagnostic,
} from "./errors.ts";
import { silentLogger, type Logger } from "./logger.ts";
import type { ParseCache } from "./parser/cache.ts";
import {
	DEFAULT_MAX_DEPTH,
	parseTypeExpression,
	type UnknownConstructorPolicy,
} from "./parser/parser.ts";
import {
	ANY_TYPES,
	anyType,
	formatType,
	type JsonSchemaType,
	type ObjectType,
	type PrimitiveName,
	type SchemaNode,
	type TypeExpression,
	type VariableSpec,
} from "./types.ts";
import { appendPointer } from "./utils/json-pointer.ts";
import { applyValidationRules } from "./validation-rules.ts";

//==============================================================================
// Options
//==============================================================================

export interface CompileOptions {
	unknownConstructors?: UnknownConstructorPolicy;
	maxDepth?: number;
}

export interface CompileVariableOptions extends CompileOptions {
	cache?: ParseCache | undefined;
	validationKeywords?: boolean;
	logger?: Logger;
}

export interface CompiledType {
	node: SchemaNode;
	diagnostics: Diagnostic[];
}

export interface CompiledVariable {
	name: string;
	node: SchemaNode;
	/** True when the variable has no usable default */
	required: boolean;
	diagnostics: Diagnostic[];
}

const PRIMITIVE_SCHEMA_TYPES: Record<PrimitiveName, JsonSchemaType> = {
	string: "string",
	number: "number",
	bool: "boolean",
};

//==============================================================================
// Type Lowering
//==============================================================================

interface LoweringState {
	policy: UnknownConstructorPolicy;
	maxDepth: number;
	diagnostics: Diagnostic[];
}

function lower(type: TypeExpression, depth: number, pointer: string, state: LoweringState): SchemaNode {
	if (depth > state.maxDepth) {
		throw SchemaError.maxNestingDepth(state.maxDepth, formatType(type));
	}

	switch (type.kind) {
	case "primitive":
		return { type: PRIMITIVE_SCHEMA_TYPES[type.name] };
	case "any":
		return { type: [...ANY_TYPES] };
	case "list":
		return {
			type: "array",
			items: lower(type.of, depth + 1, appendPointer(pointer, "items"), state),
		};
	case "set":
		return {
			type: "array",
			items: lower(type.of, depth + 1, appendPointer(pointer, "items"), state),
			uniqueItems: true,
		};
	case "tuple": {
		const size = type.elements.length;
		// Draft 7 requires a non-empty items array; an empty tuple is bounded by length alone
		if (size === 0) {
			return { type: "array", minItems: 0, maxItems: 0 };
		}
		return {
			type: "array",
			items: type.elements.map((element, i) =>
				lower(element, depth + 1, appendPointer(pointer, "items", String(i)), state),
			),
			minItems: size,
			maxItems: size,
		};
	}
	case "map":
		return {
			type: "object",
			additionalProperties: lower(type.of, depth + 1, appendPointer(pointer, "additionalProperties"), state),
		};
	case "object":
		return lowerObject(type, depth, pointer, state);
	case "unresolved":
		if (state.policy === "error") {
			throw SchemaError.unknownConstructor(type.name, type.source);
		}
		state.diagnostics.push({
			code: ErrorCodes.UnknownTypeConstructor,
			severity: "warning",
			message: "Unknown type constructor " + type.name + " compiled as any",
			fragment: type.source,
			pointer,
		});
		return { type: [...ANY_TYPES] };
	default:
		return exhaustive(type);
	}
}

function lowerObject(type: ObjectType, depth: number, pointer: string, state: LoweringState): SchemaNode {
	const properties: [string, SchemaNode][] = [];
	const required: string[] = [];

	for (const [name, attr] of type.fields) {
		const fieldPointer = appendPointer(pointer, "properties", name);
		let node = lower(attr.type, depth + 1, fieldPointer, state);
		if (attr.default !== undefined) {
			const normalized = normalizeDefault(attr.default, attr.type, appendPointer(fieldPointer, "default"));
			state.diagnostics.push(...normalized.diagnostics);
			node = { ...node, default: normalized.value };
		}
		properties.push([name, node]);
		if (!attr.optional) required.push(name);
	}

	// fromEntries defines own keys, so attribute names like "__proto__" survive
	const node: SchemaNode = { type: "object", properties: Object.fromEntries(properties) };
	return required.length > 0 ? { ...node, required } : node;
}

/**
 * Compile a type expression into its schema subtree.
 *
 * `pointer` locates the subtree in the final document and is only used to
 * place diagnostics.
 */
export function compileType(
	type: TypeExpression,
	options: CompileOptions = {},
	pointer = "",
): CompiledType {
	const state: LoweringState = {
		policy: options.unknownConstructors ?? "error",
		maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
		diagnostics: [],
	};
	const node = lower(type, 1, pointer, state);
	return { node, diagnostics: state.diagnostics };
}

//==============================================================================
// Variables
//==============================================================================

/**
 * A variable must be supplied unless it has a default. A null default only
 * counts when the variable accepts null.
 */
export function isRequired(declaration: Pick<VariableSpec, "default" | "nullable">): boolean {
	return declaration.default === undefined || (declaration.default === null && !declaration.nullable);
}

function widenNullable(type: SchemaNode["type"]): SchemaNode["type"] {
	if (typeof type === "string") return [type, "null"];
	return type.includes("null") ? type : [...type, "null"];
}

/** Parse a variable's raw type text; an absent type constraint accepts anything. */
export function resolveVariableType(rawType: string, options: CompileVariableOptions = {}): TypeExpression {
	if (rawType.trim() === "") return anyType();
	const parseOptions = {
		unknownConstructors: options.unknownConstructors ?? "error",
		maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
	};
	return options.cache !== undefined
		? options.cache.parse(rawType, parseOptions)
		: parseTypeExpression(rawType, parseOptions);
}

/**
 * Compile one variable declaration into its top-level schema node.
 *
 * Nullable variables have `null` added to their type, sensitive ones are
 * marked writeOnly, and the description and default are attached. Nested
 * nodes never inherit these. Errors are rethrown attributed to the variable.
 */
export function compileVariable(
	declaration: VariableSpec,
	options: CompileVariableOptions = {},
): CompiledVariable {
	const logger = options.logger ?? silentLogger;
	const pointer = appendPointer("", "properties", declaration.name);

	try {
		const type = resolveVariableType(declaration.rawType, options);
		const compiled = compileType(type, options, pointer);
		const diagnostics = compiled.diagnostics;

		let node: SchemaNode = declaration.nullable
			? { ...compiled.node, type: widenNullable(compiled.node.type) }
			: compiled.node;

		if (declaration.description !== undefined && declaration.description !== "") {
			node = { ...node, description: declaration.description };
		}

		if (declaration.default !== undefined && !isRequired(declaration)) {
			const normalized = normalizeDefault(declaration.default, type, appendPointer(pointer, "default"));
			diagnostics.push(...normalized.diagnostics);
			node = { ...node, default: normalized.value };
		}

		if (declaration.sensitive) {
			node = { ...node, writeOnly: true };
		}

		if (options.validationKeywords ?? true) {
			const translated = applyValidationRules(node, declaration.name, declaration.validations, declaration.nullable);
			for (const rule of translated.ignored) {
				logger.debug("Variable " + declaration.name + ": no schema keyword for validation " + JSON.stringify(rule.condition));
			}
			node = translated.node;
		}

		return {
			name: declaration.name,
			node,
			required: isRequired(declaration),
			diagnostics: diagnostics.map((d) => ({ ...d, variable: declaration.name })),
		};
	} catch (err) {
		if (err instanceof SchemaError) {
			throw err.withVariable(declaration.name);
		}
		throw err;
	}
}
