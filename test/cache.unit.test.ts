// Parse Cache - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { ErrorCodes } from "../src/errors.ts";
import { ParseCache } from "../src/parser/cache.ts";
import { catchSchemaError } from "./helpers.ts";

describe("ParseCache", () => {
	it("returns the same tree for repeated type text", () => {
		const cache = new ParseCache();
		const first = cache.parse("map(list(string))");
		const second = cache.parse("map(list(string))");
		assert.equal(first, second);
		assert.equal(cache.size, 1);
		assert.equal(cache.hits, 1);
	});

	it("keys entries by parse options", () => {
		const cache = new ParseCache();
		cache.parse("string");
		cache.parse("string", { maxDepth: 5 });
		cache.parse("string", { unknownConstructors: "any" });
		assert.equal(cache.size, 3);
		assert.equal(cache.hits, 0);
	});

	it("drops the oldest entry past its capacity", () => {
		const cache = new ParseCache(2);
		const list = cache.parse("list(string)");
		cache.parse("map(string)");
		cache.parse("set(string)");
		assert.equal(cache.size, 2);
		assert.notEqual(cache.parse("list(string)"), list);
		assert.equal(cache.hits, 0);
		cache.parse("set(string)");
		assert.equal(cache.hits, 1);
	});

	it("rejects a capacity below one", () => {
		assert.throws(() => new ParseCache(0), RangeError);
	});

	it("does not cache failures", () => {
		const cache = new ParseCache();
		const first = catchSchemaError(() => cache.parse("list("));
		const second = catchSchemaError(() => cache.parse("list("));
		assert.equal(first.code, ErrorCodes.TypeSyntaxError);
		assert.equal(second.code, ErrorCodes.TypeSyntaxError);
		assert.equal(cache.size, 0);
		assert.equal(cache.hits, 0);
	});

	it("caches unresolved constructors only under the any policy", () => {
		const cache = new ParseCache();
		cache.parse("custom(string)", { unknownConstructors: "any" });
		const err = catchSchemaError(() => cache.parse("custom(string)"));
		assert.equal(err.code, ErrorCodes.UnknownTypeConstructor);
		assert.equal(cache.size, 1);
	});
});
