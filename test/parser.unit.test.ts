// Type Expression Parser - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { ErrorCodes } from "../src/errors.ts";
import { parseLiteral, parseTypeExpression } from "../src/parser/parser.ts";
import {
	anyType,
	boolType,
	field,
	listType,
	mapType,
	numberType,
	objectType,
	optionalField,
	setType,
	stringType,
	tupleType,
	unresolvedType,
} from "../src/types.ts";
import { catchSchemaError } from "./helpers.ts";

//==============================================================================
// Primitives and collections
//==============================================================================

describe("parseTypeExpression - primitives", () => {
	it("parses each primitive", () => {
		assert.deepEqual(parseTypeExpression("string"), stringType());
		assert.deepEqual(parseTypeExpression("number"), numberType());
		assert.deepEqual(parseTypeExpression("bool"), boolType());
		assert.deepEqual(parseTypeExpression("any"), anyType());
	});

	it("ignores surrounding whitespace and comments", () => {
		assert.deepEqual(parseTypeExpression("  list( # element type\n string )  "), listType(stringType()));
	});
});

describe("parseTypeExpression - collections", () => {
	it("parses nested collections", () => {
		assert.deepEqual(parseTypeExpression("map(list(number))"), mapType(listType(numberType())));
		assert.deepEqual(parseTypeExpression("set(string)"), setType(stringType()));
	});

	it("parses tuples", () => {
		assert.deepEqual(
			parseTypeExpression("tuple([string, number, bool])"),
			tupleType([stringType(), numberType(), boolType()]),
		);
	});

	it("accepts a trailing comma in a tuple", () => {
		assert.deepEqual(parseTypeExpression("tuple([string,])"), tupleType([stringType()]));
	});

	it("parses an empty tuple", () => {
		assert.deepEqual(parseTypeExpression("tuple([])"), tupleType([]));
	});
});

//==============================================================================
// Objects
//==============================================================================

describe("parseTypeExpression - objects", () => {
	it("parses required and optional attributes", () => {
		const parsed = parseTypeExpression(
			"object({name = string, port = optional(number), tags = optional(map(string), {})})",
		);
		assert.deepEqual(parsed, objectType([
			["name", field(stringType())],
			["port", optionalField(numberType())],
			["tags", optionalField(mapType(stringType()), {})],
		]));
	});

	it("keeps attribute declaration order", () => {
		const parsed = parseTypeExpression("object({b = string, a = string, c = string})");
		assert.equal(parsed.kind, "object");
		if (parsed.kind === "object") {
			assert.deepEqual([...parsed.fields.keys()], ["b", "a", "c"]);
		}
	});

	it("accepts newline separators, colons and quoted names", () => {
		const parsed = parseTypeExpression("object({\n  a = string\n  b: number\n  \"my-key\" = bool\n})");
		assert.deepEqual(parsed, objectType([
			["a", field(stringType())],
			["b", field(numberType())],
			["my-key", field(boolType())],
		]));
	});

	it("parses structured optional defaults", () => {
		const parsed = parseTypeExpression("object({ports = optional(list(number), [80, 443])})");
		assert.deepEqual(parsed, objectType([
			["ports", optionalField(listType(numberType()), [80, 443])],
		]));
	});

	it("rejects duplicate attributes", () => {
		const err = catchSchemaError(() => parseTypeExpression("object({a = string, a = number})"));
		assert.equal(err.code, ErrorCodes.TypeSyntaxError);
		assert.equal(err.message, "Invalid type expression at column 21: duplicate attribute \"a\"");
		assert.equal(err.fragment, "a");
	});

	it("requires a separator between attributes on one line", () => {
		const err = catchSchemaError(() => parseTypeExpression("object({a = string b = number})"));
		assert.equal(
			err.message,
			"Invalid type expression at column 20: expected ',' or a new line between attributes, found \"b\"",
		);
	});
});

//==============================================================================
// Errors
//==============================================================================

describe("parseTypeExpression - syntax errors", () => {
	it("rejects an empty expression", () => {
		const err = catchSchemaError(() => parseTypeExpression("   "));
		assert.equal(err.message, "Invalid type expression at column 1: empty type expression");
	});

	it("reports an unclosed constructor", () => {
		const err = catchSchemaError(() => parseTypeExpression("list(string"));
		assert.equal(
			err.message,
			"Invalid type expression at column 12: unexpected end of input (expected ')' to close list()",
		);
		assert.equal(err.fragment, "list(string");
	});

	it("rejects a second collection argument", () => {
		const err = catchSchemaError(() => parseTypeExpression("list(string, number)"));
		assert.equal(err.message, "Invalid type expression at column 12: list() takes exactly one argument");
	});

	it("rejects an empty collection argument", () => {
		const err = catchSchemaError(() => parseTypeExpression("list()"));
		assert.equal(err.message, "Invalid type expression at column 6: list() requires exactly one element type");
	});

	it("rejects a constructor without arguments", () => {
		const err = catchSchemaError(() => parseTypeExpression("list"));
		assert.equal(err.message, "Invalid type expression at column 1: list requires an element type, e.g. list(string)");
		assert.equal(err.fragment, "list");
	});

	it("rejects arguments on a primitive", () => {
		const err = catchSchemaError(() => parseTypeExpression("string(number)"));
		assert.equal(err.message, "Invalid type expression at column 1: string is not a type constructor");
	});

	it("rejects optional outside an object attribute", () => {
		const err = catchSchemaError(() => parseTypeExpression("list(optional(string))"));
		assert.equal(
			err.message,
			"Invalid type expression at column 6: optional() is only valid as an object attribute type",
		);
	});

	it("rejects trailing input", () => {
		const err = catchSchemaError(() => parseTypeExpression("string string"));
		assert.equal(err.message, "Invalid type expression at column 8: unexpected trailing input, found \"string\"");
	});
});

describe("parseTypeExpression - unknown constructors", () => {
	it("fails under the error policy", () => {
		const err = catchSchemaError(() => parseTypeExpression("list(foo(string))"));
		assert.equal(err.code, ErrorCodes.UnknownTypeConstructor);
		assert.equal(err.message, "Unknown type constructor: foo");
		assert.equal(err.fragment, "foo(string)");
		assert.equal(err.offset, 5);
	});

	it("keeps the fragment under the any policy", () => {
		const parsed = parseTypeExpression("list(foo(string))", { unknownConstructors: "any" });
		assert.deepEqual(parsed, listType(unresolvedType("foo", "foo(string)")));
	});

	it("treats a misspelled primitive as unknown", () => {
		const err = catchSchemaError(() => parseTypeExpression("map(strng)"));
		assert.equal(err.code, ErrorCodes.UnknownTypeConstructor);
		assert.equal(err.fragment, "strng");
	});
});

describe("parseTypeExpression - nesting depth", () => {
	it("fails past the configured depth", () => {
		const err = catchSchemaError(() => parseTypeExpression("list(list(string))", { maxDepth: 2 }));
		assert.equal(err.code, ErrorCodes.MaxNestingDepthExceeded);
		assert.equal(err.message, "Type nesting exceeds the maximum depth of 2");
	});

	it("accepts nesting at the limit", () => {
		assert.deepEqual(
			parseTypeExpression("list(list(string))", { maxDepth: 3 }),
			listType(listType(stringType())),
		);
	});

	it("counts object attributes as a level", () => {
		const err = catchSchemaError(() => parseTypeExpression("object({a = string})", { maxDepth: 1 }));
		assert.equal(err.code, ErrorCodes.MaxNestingDepthExceeded);
	});

	it("stops adversarial input with the default limit", () => {
		const deep = "list(".repeat(200) + "string" + ")".repeat(200);
		const err = catchSchemaError(() => parseTypeExpression(deep));
		assert.equal(err.code, ErrorCodes.MaxNestingDepthExceeded);
		assert.equal(err.message, "Type nesting exceeds the maximum depth of 32");
	});
});

//==============================================================================
// Literals
//==============================================================================

describe("parseLiteral", () => {
	it("parses nested literal values", () => {
		assert.deepEqual(
			parseLiteral("{ a = [1, \"x\", true, null], b = { c = -2.5 } }"),
			{ a: [1, "x", true, null], b: { c: -2.5 } },
		);
	});

	it("accepts newline separated object entries", () => {
		assert.deepEqual(parseLiteral("{\n  a = 1\n  b = 2\n}"), { a: 1, b: 2 });
	});

	it("keeps a __proto__ key as data", () => {
		const value = parseLiteral("{ \"__proto__\" = 1 }");
		assert.equal(typeof value === "object" && value !== null && Object.hasOwn(value, "__proto__"), true);
	});

	it("rejects expressions", () => {
		const err = catchSchemaError(() => parseLiteral("foo"));
		assert.equal(err.message, "Invalid type expression at column 1: expressions are not supported in literal values");
	});

	it("rejects a number that overflows to infinity", () => {
		const err = catchSchemaError(() => parseLiteral("[1, 1e999]"));
		assert.equal(err.code, ErrorCodes.TypeSyntaxError);
		assert.equal(err.message, "Invalid type expression at column 5: number literal out of range");
		assert.equal(err.fragment, "1e999");
	});

	it("rejects an out of range optional attribute default", () => {
		const err = catchSchemaError(() => parseTypeExpression("object({ a = optional(set(number), [1e999]) })"));
		assert.equal(err.message, "Invalid type expression at column 37: number literal out of range");
	});

	it("rejects duplicate keys", () => {
		const err = catchSchemaError(() => parseLiteral("{ a = 1, a = 2 }"));
		assert.equal(err.message, "Invalid type expression at column 10: duplicate key \"a\"");
	});
});
