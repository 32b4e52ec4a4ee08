// Terraform Variable Schema Zod Schemas
// Runtime shapes for extractor input records and the generated document.
//
// The TypeScript interfaces live in types.ts; recursive schemas are annotated
// with z.ZodType<ExplicitType> so their inferred types are not erased.

import { z } from "zod/v4";
import {
	DRAFT_07,
	defineEntry,
	type JsonSchemaType,
	type SchemaDocument,
	type SchemaNode,
	type ValidationRule,
	type Value,
	type ValueRecord,
} from "./types.ts";

//==============================================================================
// Values
//==============================================================================

/** A JSON value; non-finite numbers are rejected. */
export const ValueSchema: z.ZodType<Value> = z.lazy(() =>
	z.union([
		z.null(),
		z.boolean(),
		z.number(),
		z.string(),
		z.array(ValueSchema),
		ValueRecordSchema,
	]),
);

// z.record rebuilds by assignment, which loses a "__proto__" key
const ValueRecordSchema = z
	.custom<object>((value) => typeof value === "object" && value !== null && !Array.isArray(value))
	.transform((input, ctx): ValueRecord => {
		const record: ValueRecord = {};
		for (const [key, item] of Object.entries(input)) {
			const parsed = ValueSchema.safeParse(item);
			if (!parsed.success) {
				for (const issue of parsed.error.issues) {
					ctx.addIssue({ code: "custom", message: issue.message, path: [key, ...issue.path] });
				}
				return z.NEVER;
			}
			defineEntry(record, key, parsed.data);
		}
		return record;
	});

//==============================================================================
// Input Records
//==============================================================================

export const ValidationRuleSchema: z.ZodType<ValidationRule> = z.object({
	condition: z.string(),
	errorMessage: z.string(),
});

export const VariableSpecSchema = z.object({
	name: z.string().min(1, "variable name must not be empty"),
	rawType: z.string().default(""),
	description: z.string().optional(),
	default: ValueSchema.optional(),
	required: z.boolean().optional(),
	sensitive: z.boolean().default(false),
	nullable: z.boolean().default(true),
	ephemeral: z.boolean().default(false),
	validations: z.array(ValidationRuleSchema).default([]),
}).meta({
	id: "VariableSpec",
	title: "Variable Specification",
	description: "One variable declaration as delivered by the declaration extractor",
});

//==============================================================================
// Output Document
//==============================================================================

export const JsonSchemaTypeSchema: z.ZodType<JsonSchemaType> = z.enum([
	"string",
	"number",
	"boolean",
	"object",
	"array",
	"null",
]);

const Count = z.number().int().nonnegative();

export const SchemaNodeSchema: z.ZodType<SchemaNode> = z.strictObject({
	type: z.union([JsonSchemaTypeSchema, z.array(JsonSchemaTypeSchema).min(1)]),
	description: z.string().optional(),
	default: ValueSchema.optional(),
	enum: z.array(ValueSchema).min(1).optional(),
	get properties() { return z.record(z.string(), SchemaNodeSchema).optional(); },
	get additionalProperties() { return SchemaNodeSchema.optional(); },
	required: z.array(z.string()).optional(),
	get items() { return z.union([SchemaNodeSchema, z.array(SchemaNodeSchema).min(1)]).optional(); },
	minItems: Count.optional(),
	maxItems: Count.optional(),
	uniqueItems: z.boolean().optional(),
	minProperties: Count.optional(),
	maxProperties: Count.optional(),
	minimum: z.number().optional(),
	maximum: z.number().optional(),
	exclusiveMinimum: z.number().optional(),
	exclusiveMaximum: z.number().optional(),
	minLength: Count.optional(),
	maxLength: Count.optional(),
	pattern: z.string().optional(),
	writeOnly: z.boolean().optional(),
});

export const SchemaDocumentSchema: z.ZodType<SchemaDocument> = z.strictObject({
	$schema: z.literal(DRAFT_07),
	title: z.string(),
	description: z.string(),
	type: z.literal("object"),
	properties: z.record(z.string(), SchemaNodeSchema),
	required: z.array(z.string()),
}).meta({
	id: "SchemaDocument",
	title: "Variables Schema Document",
	description: "JSON Schema Draft 7 document describing a module's input variables",
});
