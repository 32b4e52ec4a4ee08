// Terraform Variable Schema Type Definitions
// Type expression AST, literal value domain and JSON Schema output shapes

//==============================================================================
// Value Domain (normalized literals)
//==============================================================================

export type Value = null | boolean | number | string | Value[] | ValueRecord;

export interface ValueRecord {
	[key: string]: Value;
}

export function isValueRecord(value: Value | undefined): value is ValueRecord {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Set an own entry, including keys such as "__proto__" that plain assignment mishandles. */
export function defineEntry(record: ValueRecord, key: string, value: Value): void {
	Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true });
}

//==============================================================================
// Type Expression Domain (AST)
//==============================================================================

export type PrimitiveName = "string" | "number" | "bool";

export type TypeExpression =
	| PrimitiveType
	| AnyType
	| ListType
	| SetType
	| MapType
	| TupleType
	| ObjectType
	| UnresolvedType;

export interface PrimitiveType {
	readonly kind: "primitive";
	readonly name: PrimitiveName;
}

export interface AnyType {
	readonly kind: "any";
}

export interface ListType {
	readonly kind: "list";
	readonly of: TypeExpression;
}

export interface SetType {
	readonly kind: "set";
	readonly of: TypeExpression;
}

export interface MapType {
	readonly kind: "map";
	readonly of: TypeExpression;
}

export interface TupleType {
	readonly kind: "tuple";
	readonly elements: readonly TypeExpression[];
}

export interface ObjectType {
	readonly kind: "object";
	readonly fields: ReadonlyMap<string, FieldSpec>;
}

/** A constructor the parser did not recognise, kept when the policy is "any". */
export interface UnresolvedType {
	readonly kind: "unresolved";
	readonly name: string;
	readonly source: string;
}

export interface FieldSpec {
	readonly type: TypeExpression;
	readonly optional: boolean;
	readonly default?: Value | undefined;
}

//==============================================================================
// Type Constructors
//==============================================================================

export const stringType = (): PrimitiveType => ({ kind: "primitive", name: "string" });
export const numberType = (): PrimitiveType => ({ kind: "primitive", name: "number" });
export const boolType = (): PrimitiveType => ({ kind: "primitive", name: "bool" });
export const anyType = (): AnyType => ({ kind: "any" });

export const listType = (of: TypeExpression): ListType => ({ kind: "list", of });
export const setType = (of: TypeExpression): SetType => ({ kind: "set", of });
export const mapType = (of: TypeExpression): MapType => ({ kind: "map", of });

export const tupleType = (elements: readonly TypeExpression[]): TupleType => ({
	kind: "tuple",
	elements,
});

export function objectType(
	fields: Iterable<readonly [string, FieldSpec]>,
): ObjectType {
	return { kind: "object", fields: new Map(fields) };
}

export function field(type: TypeExpression): FieldSpec {
	return { type, optional: false };
}

/** A null default is the same as no default. */
export function optionalField(type: TypeExpression, defaultValue?: Value): FieldSpec {
	if (defaultValue === undefined || defaultValue === null) {
		return { type, optional: true };
	}
	return { type, optional: true, default: defaultValue };
}

export const unresolvedType = (name: string, source: string): UnresolvedType => ({
	kind: "unresolved",
	name,
	source,
});

//==============================================================================
// Formatting
//==============================================================================

/**
 * Render a type expression back into declaration syntax.
 * Used for diagnostics, so it is stable and single-line.
 */
export function formatType(t: TypeExpression): string {
	switch (t.kind) {
	case "primitive":
		return t.name;
	case "any":
		return "any";
	case "list":
	case "set":
	case "map":
		return t.kind + "(" + formatType(t.of) + ")";
	case "tuple":
		return "tuple([" + t.elements.map(formatType).join(", ") + "])";
	case "object": {
		const parts: string[] = [];
		for (const [name, attr] of t.fields) {
			parts.push(name + " = " + formatField(attr));
		}
		return "object({" + parts.join(", ") + "})";
	}
	case "unresolved":
		return t.source;
	}
}

function formatField(attr: FieldSpec): string {
	if (!attr.optional) return formatType(attr.type);
	if (attr.default === undefined) return "optional(" + formatType(attr.type) + ")";
	return "optional(" + formatType(attr.type) + ", " + JSON.stringify(attr.default) + ")";
}

//==============================================================================
// Input Records
//==============================================================================

export interface ValidationRule {
	condition: string;
	errorMessage: string;
}

/**
 * One declared variable, as handed over by the declaration extractor.
 * `default` is absent when the declaration has none; `null` is a real default.
 */
export interface VariableSpec {
	name: string;
	rawType: string;
	description?: string | undefined;
	default?: Value | undefined;
	required?: boolean | undefined;
	sensitive: boolean;
	nullable: boolean;
	ephemeral: boolean;
	validations: ValidationRule[];
}

//==============================================================================
// JSON Schema Output
//==============================================================================

export const DRAFT_07 = "http://json-schema.org/draft-07/schema#";

export type JsonSchemaType = "string" | "number" | "boolean" | "object" | "array" | "null";

export const ANY_TYPES: readonly JsonSchemaType[] = [
	"string",
	"number",
	"boolean",
	"object",
	"array",
	"null",
];

export interface SchemaNode {
	readonly type: JsonSchemaType | readonly JsonSchemaType[];
	readonly description?: string | undefined;
	readonly default?: Value | undefined;
	readonly enum?: readonly Value[] | undefined;
	readonly properties?: Readonly<Record<string, SchemaNode>> | undefined;
	readonly additionalProperties?: SchemaNode | undefined;
	readonly required?: readonly string[] | undefined;
	readonly items?: SchemaNode | readonly SchemaNode[] | undefined;
	readonly minItems?: number | undefined;
	readonly maxItems?: number | undefined;
	readonly uniqueItems?: boolean | undefined;
	readonly minProperties?: number | undefined;
	readonly maxProperties?: number | undefined;
	readonly minimum?: number | undefined;
	readonly maximum?: number | undefined;
	readonly exclusiveMinimum?: number | undefined;
	readonly exclusiveMaximum?: number | undefined;
	readonly minLength?: number | undefined;
	readonly maxLength?: number | undefined;
	readonly pattern?: string | undefined;
	readonly writeOnly?: boolean | undefined;
}

export interface SchemaDocument {
	readonly $schema: typeof DRAFT_07;
	readonly title: string;
	readonly description: string;
	readonly type: "object";
	readonly properties: Readonly<Record<string, SchemaNode>>;
	readonly required: readonly string[];
}

/** The non-null JSON type a node describes, or undefined for `any`. */
export function baseType(node: SchemaNode): JsonSchemaType | undefined {
	if (typeof node.type === "string") return node.type;
	const concrete = node.type.filter((t) => t !== "null");
	return concrete.length === 1 ? concrete[0] : undefined;
}
