// Document Assembler
// Compiles each variable record independently, then merges the results into
// one Draft 7 document in declaration order.

import { checkDocument } from "./schema-check.ts";
import { compileVariable, isRequired, type CompiledVariable } from "./compiler.ts";
import { resolveOptions, type ConvertOptions, type ResolvedOptions } from "./config.ts";
import {
	ErrorCodes,
	SchemaError,
	formatDiagnostic,
	isFatal,
	type Diagnostic,
} from "./errors.ts";
import {
	ANY_TYPES,
	DRAFT_07,
	type SchemaDocument,
	type SchemaNode,
	type VariableSpec,
} from "./types.ts";
import { buildPointer } from "./utils/json-pointer.ts";
import { VariableSpecSchema } from "./zod-schemas.ts";

//==============================================================================
// Types
//==============================================================================

/** Result of the map step for one record, tagged with its declaration index. */
export interface VariableOutcome {
	index: number;
	name: string;
	/** The validated record; undefined when the record itself was rejected */
	declaration: VariableSpec | undefined;
	/** Undefined when the variable is left out of the document */
	compiled: CompiledVariable | undefined;
	diagnostics: Diagnostic[];
}

export type ConversionResult =
	| { valid: true; document: SchemaDocument; diagnostics: Diagnostic[] }
	| { valid: false; diagnostics: Diagnostic[] };

export interface DocumentHeader {
	title: string;
	description: string;
}

//==============================================================================
// Map Step
//==============================================================================

function recordName(record: unknown, index: number): string {
	if (typeof record === "object" && record !== null) {
		const name: unknown = Reflect.get(record, "name");
		if (typeof name === "string" && name !== "") return name;
	}
	return "#" + String(index);
}

/** The lenient stand-in for a variable whose type could not be compiled. */
function degradeToAny(declaration: VariableSpec): CompiledVariable {
	let node: SchemaNode = { type: [...ANY_TYPES] };
	if (declaration.description !== undefined && declaration.description !== "") {
		node = { ...node, description: declaration.description };
	}
	if (declaration.default !== undefined && !isRequired(declaration)) {
		node = { ...node, default: declaration.default };
	}
	if (declaration.sensitive) {
		node = { ...node, writeOnly: true };
	}
	return { name: declaration.name, node, required: isRequired(declaration), diagnostics: [] };
}

function compileRecord(record: unknown, index: number, options: ResolvedOptions): VariableOutcome {
	const parsed = VariableSpecSchema.safeParse(record);
	if (!parsed.success) {
		const name = recordName(record, index);
		const diagnostics = parsed.error.issues.map((issue) => {
			const path = issue.path.map(String).join(".") || "$";
			return SchemaError.invalidVariableSpec(name, path, issue.message).toDiagnostic();
		});
		return { index, name, declaration: undefined, compiled: undefined, diagnostics };
	}

	const declaration: VariableSpec = parsed.data;
	try {
		const compiled = compileVariable(declaration, options);
		return { index, name: declaration.name, declaration, compiled, diagnostics: compiled.diagnostics };
	} catch (err) {
		if (!(err instanceof SchemaError)) throw err;
		const outcome: VariableOutcome = {
			index,
			name: declaration.name,
			declaration,
			compiled: undefined,
			diagnostics: [err.toDiagnostic()],
		};
		return options.mode === "lenient" ? applyFallback(outcome, options) : outcome;
	}
}

/** Replace a failed outcome's node per the lenient fallback policy. */
function applyFallback(outcome: VariableOutcome, options: ResolvedOptions): VariableOutcome {
	const compiled = options.fallback === "any" && outcome.declaration !== undefined
		? degradeToAny(outcome.declaration)
		: undefined;
	return { ...outcome, compiled };
}

/**
 * Compile every record on its own. Outcomes do not depend on each other, so
 * they may be produced in any order and merged with assembleDocument.
 */
export function compileVariables(
	records: readonly unknown[],
	options: ResolvedOptions,
): VariableOutcome[] {
	return records.map((record, index) => compileRecord(record, index, options));
}

//==============================================================================
// Reduce Step
//==============================================================================

/**
 * Merge compiled variables into a document. Properties and `required` follow
 * declaration index, whatever order the outcomes arrive in.
 */
export function assembleDocument(
	outcomes: readonly VariableOutcome[],
	header: DocumentHeader,
): SchemaDocument {
	const ordered = [...outcomes].sort((a, b) => a.index - b.index);
	const properties: [string, SchemaNode][] = [];
	const required: string[] = [];

	for (const outcome of ordered) {
		if (outcome.compiled === undefined) continue;
		properties.push([outcome.compiled.name, outcome.compiled.node]);
		if (outcome.compiled.required) required.push(outcome.compiled.name);
	}

	return {
		$schema: DRAFT_07,
		title: header.title,
		description: header.description,
		type: "object",
		properties: Object.fromEntries(properties),
		required,
	};
}

//==============================================================================
// Conversion
//==============================================================================

function verificationDiagnostics(document: SchemaDocument): Diagnostic[] {
	const result = checkDocument(document);
	return result.errors.map((error): Diagnostic => {
		const diagnostic: Diagnostic = {
			code: ErrorCodes.InvalidDocument,
			severity: "error",
			message: "Generated document failed its self-check: " + error.message,
			pointer: buildPointer(error.segments),
		};
		// Anything below /properties/<name> belongs to that variable
		const [head, name] = error.segments;
		if (head === "properties" && name !== undefined) diagnostic.variable = name;
		return diagnostic;
	});
}

/**
 * Convert extracted variable records into a JSON Schema Draft 7 document.
 *
 * Records are validated first; each one is then compiled on its own. In strict
 * mode any error-severity diagnostic fails the conversion. In lenient mode
 * failed variables are degraded to `any` or omitted, per `fallback`. Warnings
 * never fail a conversion and are always returned.
 *
 * @throws SchemaError with code InvalidConfiguration for bad options
 */
export function convertVariables(
	records: readonly unknown[],
	options: ConvertOptions = {},
): ConversionResult {
	const resolved = resolveOptions(options);
	const { logger } = resolved;

	const report = (diagnostics: Diagnostic[]): void => {
		for (const diagnostic of diagnostics) {
			if (isFatal(diagnostic)) logger.error(formatDiagnostic(diagnostic));
			else logger.warn(formatDiagnostic(diagnostic));
		}
	};

	if (records.length === 0) {
		const diagnostics = [SchemaError.emptyVariableSet().toDiagnostic()];
		report(diagnostics);
		return { valid: false, diagnostics };
	}

	const hitsBefore = resolved.cache?.hits ?? 0;
	let outcomes = compileVariables(records, resolved);
	const diagnostics = outcomes.flatMap((outcome) => outcome.diagnostics);
	report(diagnostics);

	if (resolved.mode === "strict" && diagnostics.some(isFatal)) {
		return { valid: false, diagnostics };
	}

	const emptyResult = (): ConversionResult => {
		const empty = SchemaError.emptyVariableSet().toDiagnostic();
		report([empty]);
		return { valid: false, diagnostics: [...diagnostics, empty] };
	};

	if (outcomes.every((outcome) => outcome.compiled === undefined)) {
		return emptyResult();
	}

	let document = assembleDocument(outcomes, resolved);

	if (resolved.verify) {
		const problems = verificationDiagnostics(document);
		if (problems.length > 0) {
			report(problems);
			diagnostics.push(...problems);
			const failed = new Set<string>();
			for (const problem of problems) {
				if (problem.variable !== undefined) failed.add(problem.variable);
			}
			// Only variable-scoped problems can be repaired, and only in lenient mode
			if (resolved.mode === "strict" || problems.some((problem) => problem.variable === undefined)) {
				return { valid: false, diagnostics };
			}
			outcomes = outcomes.map((outcome) =>
				outcome.compiled !== undefined && failed.has(outcome.compiled.name)
					? applyFallback(outcome, resolved)
					: outcome,
			);
			if (outcomes.every((outcome) => outcome.compiled === undefined)) {
				return emptyResult();
			}
			document = assembleDocument(outcomes, resolved);
			const remaining = verificationDiagnostics(document);
			if (remaining.length > 0) {
				report(remaining);
				return { valid: false, diagnostics: [...diagnostics, ...remaining] };
			}
		}
	}

	const omitted = outcomes.filter((outcome) => outcome.compiled === undefined).length;
	logger.debug(
		"Converted " + String(outcomes.length - omitted) + " of " + String(outcomes.length) +
			" variables (" + String(diagnostics.length) + " diagnostics, " +
			String((resolved.cache?.hits ?? 0) - hitsBefore) + " parse cache hits)",
	);

	return { valid: true, document, diagnostics };
}

/**
 * Like convertVariables, but throws the first fatal diagnostic as a
 * SchemaError instead of returning it.
 */
export function convertVariablesOrThrow(
	records: readonly unknown[],
	options: ConvertOptions = {},
): SchemaDocument {
	const result = convertVariables(records, options);
	if (result.valid) {
		return result.document;
	}
	const fatal = result.diagnostics.find(isFatal) ?? result.diagnostics[0];
	throw SchemaError.fromDiagnostic(fatal);
}
