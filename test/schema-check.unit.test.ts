// Schema Document Self-Check - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { checkDocument } from "../src/schema-check.ts";
import { DRAFT_07 } from "../src/types.ts";

function documentWith(properties: Record<string, unknown>, required: string[] = []): Record<string, unknown> {
	return {
		$schema: DRAFT_07,
		title: "Test",
		description: "Test document",
		type: "object",
		properties,
		required,
	};
}

//==============================================================================
// Structural phase
//==============================================================================

describe("checkDocument - structure", () => {
	it("accepts a well-formed document", () => {
		const doc = documentWith({
			name: { type: ["string", "null"], description: "Name" },
			pair: { type: "array", items: [{ type: "string" }, { type: "number" }], minItems: 2, maxItems: 2 },
		}, ["name"]);
		const result = checkDocument(doc);
		assert.equal(result.valid, true);
		assert.deepEqual(result.errors, []);
		assert.deepEqual(result.value, doc);
	});

	it("rejects another draft", () => {
		const result = checkDocument({ ...documentWith({}), $schema: "https://json-schema.org/draft/2020-12/schema" });
		assert.equal(result.valid, false);
		assert.equal(result.errors[0].path, "$schema");
	});

	it("rejects keywords the generator never emits", () => {
		const result = checkDocument(documentWith({ name: { type: "string", format: "email" } }));
		assert.equal(result.valid, false);
		assert.equal(result.errors[0].path, "properties.name");
	});

	it("rejects an unknown type name", () => {
		const result = checkDocument(documentWith({ n: { type: "integer" } }));
		assert.equal(result.valid, false);
		assert.equal(result.errors[0].path, "properties.n.type");
	});

	it("rejects a non-object input", () => {
		const result = checkDocument("not a document");
		assert.equal(result.valid, false);
		assert.equal(result.errors[0].path, "$");
	});
});

//==============================================================================
// Semantic phase
//==============================================================================

describe("checkDocument - semantics", () => {
	it("requires required names to be declared", () => {
		const result = checkDocument(documentWith({ a: { type: "string" } }, ["a", "b"]));
		assert.deepEqual(result.errors, [{
			path: "required",
			message: "Required property is not declared: b",
			value: "b",
		}]);
	});

	it("rejects repeated required names", () => {
		const result = checkDocument(documentWith({ a: { type: "string" } }, ["a", "a"]));
		assert.deepEqual(result.errors.map((e) => e.message), ["Property listed as required more than once: a"]);
	});

	it("checks required lists of nested objects", () => {
		const result = checkDocument(documentWith({
			o: { type: "object", properties: { x: { type: "string" } }, required: ["y"] },
		}));
		assert.equal(result.errors.length, 1);
		assert.equal(result.errors[0].path, "properties.o.required");
	});

	it("requires tuple bounds to match the items", () => {
		const result = checkDocument(documentWith({
			t: { type: "array", items: [{ type: "string" }], minItems: 1, maxItems: 2 },
		}));
		assert.deepEqual(result.errors.map((e) => [e.path, e.message]), [
			["properties.t", "Tuple bounds must equal the number of positional items (1)"],
		]);
	});

	it("rejects duplicate types", () => {
		const result = checkDocument(documentWith({ a: { type: ["string", "string"] } }));
		assert.equal(result.errors[0].message, "Type list contains duplicates");
		assert.equal(result.errors[0].path, "properties.a");
	});

	it("rejects crossed bounds", () => {
		const result = checkDocument(documentWith({ s: { type: "string", minLength: 5, maxLength: 2 } }));
		assert.equal(result.errors[0].message, "minLength (5) exceeds maxLength (2)");
	});

	it("rejects an invalid pattern", () => {
		const result = checkDocument(documentWith({ s: { type: "string", pattern: "(" } }));
		assert.equal(result.valid, false);
		assert.match(result.errors[0].message, /^Pattern is not a valid regular expression: /);
	});

	it("keeps attribute names containing dots as single segments", () => {
		const result = checkDocument(documentWith({
			o: { type: "object", properties: { "a.b": { type: "number", minimum: 3, maximum: 1 } } },
		}));
		assert.equal(result.errors[0].path, "properties.o.properties.a.b");
		assert.deepEqual(result.errors[0].segments, ["properties", "o", "properties", "a.b"]);
	});

	it("walks map values and list items", () => {
		const result = checkDocument(documentWith({
			m: { type: "object", additionalProperties: { type: "array", items: { type: "string", minItems: 3, maxItems: 1 } } },
		}));
		assert.equal(result.errors[0].path, "properties.m.additionalProperties.items");
	});
});
