// Terraform Variable Schema Errors
// Error domain for parsing, default normalization and document assembly

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Type expression errors
	TypeSyntaxError: "TypeSyntaxError",
	UnknownTypeConstructor: "UnknownTypeConstructor",
	MaxNestingDepthExceeded: "MaxNestingDepthExceeded",

	// Default value diagnostics
	DefaultTypeMismatch: "DefaultTypeMismatch",

	// Assembly errors
	EmptyVariableSet: "EmptyVariableSet",
	InvalidVariableSpec: "InvalidVariableSpec",
	InvalidDocument: "InvalidDocument",

	// Configuration errors
	InvalidConfiguration: "InvalidConfiguration",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type Severity = "error" | "warning";

//==============================================================================
// Diagnostics
//==============================================================================

/**
 * A user-visible problem report. `fragment` is the offending slice of the
 * raw type text and `pointer` locates the affected node in the output document.
 */
export interface Diagnostic {
	code: ErrorCode;
	severity: Severity;
	message: string;
	variable?: string | undefined;
	fragment?: string | undefined;
	pointer?: string | undefined;
}

export function isFatal(diagnostic: Diagnostic): boolean {
	return diagnostic.severity === "error";
}

/**
 * Render a diagnostic as a single line, e.g.
 * `error TypeSyntaxError [vpc_cidrs] near "list(": unexpected end of input`
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
	let line = diagnostic.severity + " " + diagnostic.code;
	if (diagnostic.variable !== undefined) line += " [" + diagnostic.variable + "]";
	if (diagnostic.fragment !== undefined && diagnostic.fragment !== "") {
		line += " near " + JSON.stringify(diagnostic.fragment);
	}
	return line + ": " + diagnostic.message;
}

//==============================================================================
// Schema Error Class
//==============================================================================

export interface SchemaErrorDetails {
	variable?: string | undefined;
	fragment?: string | undefined;
	offset?: number | undefined;
	pointer?: string | undefined;
}

export class SchemaError extends Error {
	readonly code: ErrorCode;
	readonly variable?: string;
	readonly fragment?: string;
	readonly offset?: number;
	readonly pointer?: string;

	constructor(code: ErrorCode, message: string, details: SchemaErrorDetails = {}) {
		super(message);
		this.name = "SchemaError";
		this.code = code;
		// Only assign present details; exactOptionalPropertyTypes forbids undefined
		if (details.variable !== undefined) this.variable = details.variable;
		if (details.fragment !== undefined) this.fragment = details.fragment;
		if (details.offset !== undefined) this.offset = details.offset;
		if (details.pointer !== undefined) this.pointer = details.pointer;
	}

	/**
	 * Copy of this error attributed to a variable
	 */
	withVariable(variable: string): SchemaError {
		return new SchemaError(this.code, this.message, {
			variable,
			fragment: this.fragment,
			offset: this.offset,
			pointer: this.pointer,
		});
	}

	toDiagnostic(): Diagnostic {
		const diagnostic: Diagnostic = {
			code: this.code,
			severity: "error",
			message: this.message,
		};
		if (this.variable !== undefined) diagnostic.variable = this.variable;
		if (this.fragment !== undefined) diagnostic.fragment = this.fragment;
		if (this.pointer !== undefined) diagnostic.pointer = this.pointer;
		return diagnostic;
	}

	/**
	 * Create a TypeSyntaxError
	 */
	static typeSyntax(reason: string, fragment: string, offset?: number): SchemaError {
		const at = offset !== undefined ? " at column " + String(offset + 1) : "";
		return new SchemaError(
			ErrorCodes.TypeSyntaxError,
			"Invalid type expression" + at + ": " + reason,
			{ fragment, offset },
		);
	}

	/**
	 * Create an UnknownTypeConstructor error
	 */
	static unknownConstructor(name: string, fragment: string, offset?: number): SchemaError {
		return new SchemaError(
			ErrorCodes.UnknownTypeConstructor,
			"Unknown type constructor: " + name,
			{ fragment, offset },
		);
	}

	/**
	 * Create a MaxNestingDepthExceeded error
	 */
	static maxNestingDepth(limit: number, fragment: string, offset?: number): SchemaError {
		return new SchemaError(
			ErrorCodes.MaxNestingDepthExceeded,
			"Type nesting exceeds the maximum depth of " + String(limit),
			{ fragment, offset },
		);
	}

	/**
	 * Create an EmptyVariableSet error
	 */
	static emptyVariableSet(): SchemaError {
		return new SchemaError(
			ErrorCodes.EmptyVariableSet,
			"No variables to convert",
		);
	}

	/**
	 * Create an InvalidVariableSpec error
	 */
	static invalidVariableSpec(variable: string, path: string, message: string): SchemaError {
		return new SchemaError(
			ErrorCodes.InvalidVariableSpec,
			"Invalid variable record at " + path + ": " + message,
			{ variable },
		);
	}

	/**
	 * Create an InvalidConfiguration error
	 */
	static invalidConfiguration(path: string, message: string): SchemaError {
		return new SchemaError(
			ErrorCodes.InvalidConfiguration,
			"Invalid option " + path + ": " + message,
		);
	}

	/**
	 * Rebuild a SchemaError from a fatal diagnostic
	 */
	static fromDiagnostic(diagnostic: Diagnostic): SchemaError {
		return new SchemaError(diagnostic.code, diagnostic.message, {
			variable: diagnostic.variable,
			fragment: diagnostic.fragment,
			pointer: diagnostic.pointer,
		});
	}
}

/**
 * Build a DefaultTypeMismatch warning. These never abort a conversion.
 */
export function defaultMismatch(
	message: string,
	fragment: string,
	pointer: string,
): Diagnostic {
	return {
		code: ErrorCodes.DefaultTypeMismatch,
		severity: "warning",
		message,
		fragment,
		pointer,
	};
}

//==============================================================================
// Validation Result Type
//==============================================================================

export interface ValidationError {
	/** Dotted form of `segments`, "$" at the root */
	path: string;
	segments: string[];
	message: string;
	value?: unknown;
}

export interface ValidationResult<T> {
	valid: boolean;
	errors: ValidationError[];
	value?: T;
}

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T): ValidationResult<T> {
	return { valid: true, errors: [], value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<T>(
	errors: ValidationError[],
): ValidationResult<T> {
	return { valid: false, errors };
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 *
 * @example
 * switch (type.kind) {
 *   case "list": return ...;
 *   case "map": return ...;
 *   default:
 *     exhaustive(type); // Type error if a kind is missing
 * }
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}
