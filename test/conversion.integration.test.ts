// End-to-end conversion - Integration Tests
// Converts extractor records loaded from fixtures and checks the complete
// document, its self-check and its serialized forms.

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { readFileSync } from "node:fs";

import {
	ErrorCodes,
	ParseCache,
	assembleDocument,
	checkDocument,
	compileVariables,
	convertVariables,
	documentDigest,
	resolveOptions,
	silentLogger,
	toJSON,
	type ConversionResult,
	type SchemaDocument,
} from "../src/index.ts";

//==============================================================================
// Fixtures
//==============================================================================

function loadFixture(name: string): unknown {
	return JSON.parse(readFileSync(new URL("./fixtures/" + name, import.meta.url), "utf8"));
}

function loadRecords(name: string): unknown[] {
	const records = loadFixture(name);
	assert.ok(Array.isArray(records));
	return records;
}

function documentOf(result: ConversionResult): SchemaDocument {
	if (!result.valid) {
		return assert.fail("conversion failed: " + JSON.stringify(result.diagnostics));
	}
	return result.document;
}

const records = loadRecords("network.variables.json");
const expected = loadFixture("network.schema.json");

//==============================================================================
// Full document
//==============================================================================

describe("Conversion of a network module", () => {
	it("produces the expected document without diagnostics", () => {
		const result = convertVariables(records, { logger: silentLogger });
		assert.equal(result.valid, true);
		assert.deepEqual(result.diagnostics, []);
		assert.deepEqual(documentOf(result), expected);
	});

	it("passes its own self-check", () => {
		const doc = documentOf(convertVariables(records, { logger: silentLogger }));
		const check = checkDocument(doc);
		assert.equal(check.valid, true);
		assert.deepEqual(check.errors, []);
	});

	it("lists properties in declaration order", () => {
		const doc = documentOf(convertVariables(records, { logger: silentLogger }));
		assert.deepEqual(Object.keys(doc.properties), [
			"region",
			"vpc_cidr",
			"subnets",
			"instance_count",
			"ports",
			"admin_password",
			"endpoint",
			"tags",
		]);
	});

	it("round-trips through its JSON text", () => {
		const doc = documentOf(convertVariables(records, { logger: silentLogger }));
		assert.deepEqual(JSON.parse(toJSON(doc)), expected);
	});

	it("reassembles to the same digest in any completion order", () => {
		const options = resolveOptions({ logger: silentLogger, cache: false });
		const outcomes = compileVariables(records, options);
		const shuffled = [outcomes[3], outcomes[7], outcomes[0], outcomes[5], outcomes[1], outcomes[6], outcomes[2], outcomes[4]];
		const doc = documentOf(convertVariables(records, { logger: silentLogger }));
		assert.equal(documentDigest(assembleDocument(shuffled, options)), documentDigest(doc));
	});

	it("reuses parsed types across conversions", () => {
		const cache = new ParseCache();
		convertVariables(records, { logger: silentLogger, cache });
		const size = cache.size;
		convertVariables(records, { logger: silentLogger, cache });
		assert.equal(cache.size, size);
		// Seven declared types; "string" repeats twice in the first run and every type hits in the second
		assert.equal(size, 5);
		assert.equal(cache.hits, 9);
	});
});

//==============================================================================
// Mixed-quality input
//==============================================================================

describe("Conversion with faulty declarations", () => {
	const faulty = [
		{ name: "good", rawType: "list(string)", default: [] },
		{ name: "typo", rawType: "map(strin)" },
		{ name: "deep", rawType: "list(".repeat(40) + "string" + ")".repeat(40) },
		{ name: "mismatch", rawType: "object({a = number})", default: { a: "x" } },
	];

	it("reports every problem with its variable in strict mode", () => {
		const result = convertVariables(faulty, { logger: silentLogger });
		assert.equal(result.valid, false);
		assert.deepEqual(result.diagnostics.map((d) => [d.variable, d.code, d.severity]), [
			["typo", ErrorCodes.UnknownTypeConstructor, "error"],
			["deep", ErrorCodes.MaxNestingDepthExceeded, "error"],
			["mismatch", ErrorCodes.DefaultTypeMismatch, "warning"],
		]);
		assert.deepEqual(result.diagnostics[0], {
			code: ErrorCodes.UnknownTypeConstructor,
			severity: "error",
			message: "Unknown type constructor: strin",
			variable: "typo",
			fragment: "strin",
		});
	});

	it("keeps a usable document in lenient mode", () => {
		const doc = documentOf(convertVariables(faulty, { logger: silentLogger, mode: "lenient" }));
		assert.deepEqual(Object.keys(doc.properties), ["good", "typo", "deep", "mismatch"]);
		assert.deepEqual(doc.properties.mismatch.default, { a: "x" });
		assert.deepEqual(doc.required, ["typo", "deep"]);
		assert.equal(checkDocument(doc).valid, true);
	});

	it("accepts unknown constructors as any when configured", () => {
		const result = convertVariables([faulty[1]], { logger: silentLogger, unknownConstructors: "any" });
		const doc = documentOf(result);
		assert.deepEqual(doc.properties.typo, {
			type: ["object", "null"],
			additionalProperties: { type: ["string", "number", "boolean", "object", "array", "null"] },
		});
		assert.deepEqual(result.diagnostics.map((d) => [d.code, d.severity, d.pointer]), [
			[ErrorCodes.UnknownTypeConstructor, "warning", "/properties/typo/additionalProperties"],
		]);
	});
});
