// tf-variable-schema - Terraform variable declarations to JSON Schema Draft 7
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	AnyType, FieldSpec, ListType, MapType, ObjectType, PrimitiveName, PrimitiveType,
	SetType, TupleType, TypeExpression, UnresolvedType,
	Value, ValueRecord,
	ValidationRule, VariableSpec,
	JsonSchemaType, SchemaDocument, SchemaNode,
} from "./types.ts";

export type {
	Diagnostic, ErrorCode, Severity, ValidationError, ValidationResult,
} from "./errors.ts";

//==============================================================================
// Type Constructors
//==============================================================================

export {
	anyType, boolType, field, listType, mapType, numberType, objectType,
	optionalField, setType, stringType, tupleType, unresolvedType,
	formatType, baseType, isValueRecord,
	ANY_TYPES, DRAFT_07,
} from "./types.ts";

//==============================================================================
// Errors
//==============================================================================

export {
	ErrorCodes, SchemaError, formatDiagnostic, isFatal,
} from "./errors.ts";

//==============================================================================
// Parsing
//==============================================================================

export {
	parseLiteral, parseTypeExpression,
	DEFAULT_MAX_DEPTH,
	type ParseOptions, type UnknownConstructorPolicy,
} from "./parser/parser.ts";

export { tokenize, type Token, type TokenType } from "./parser/lexer.ts";

export { DEFAULT_CACHE_CAPACITY, ParseCache } from "./parser/cache.ts";

//==============================================================================
// Compilation
//==============================================================================

export { normalizeDefault, type NormalizedDefault } from "./defaults.ts";

export {
	compileType, compileVariable, isRequired, resolveVariableType,
	type CompileOptions, type CompileVariableOptions, type CompiledType, type CompiledVariable,
} from "./compiler.ts";

export { applyValidationRules, type RuleTranslation } from "./validation-rules.ts";

//==============================================================================
// Assembly
//==============================================================================

export {
	assembleDocument, compileVariables, convertVariables, convertVariablesOrThrow,
	type ConversionResult, type DocumentHeader, type VariableOutcome,
} from "./assembler.ts";

export {
	resolveOptions, sharedParseCache,
	DEFAULT_DESCRIPTION, DEFAULT_TITLE,
	type ConversionMode, type ConvertOptions, type FallbackPolicy, type ResolvedOptions,
} from "./config.ts";

export { createLogger, silentLogger, type Logger, type LogLevel } from "./logger.ts";

//==============================================================================
// Validation
//==============================================================================

export { checkDocument } from "./schema-check.ts";

export {
	SchemaDocumentSchema, SchemaNodeSchema, ValueSchema, VariableSpecSchema,
} from "./zod-schemas.ts";

//==============================================================================
// Serialization
//==============================================================================

export { canonicalize, documentDigest, toJSON } from "./serialize.ts";

export {
	appendPointer, buildPointer, navigate, parseJsonPointer,
} from "./utils/json-pointer.ts";
