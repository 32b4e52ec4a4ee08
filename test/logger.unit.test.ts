// Console Logger - Unit Tests

import { afterEach, describe, it, mock } from "node:test";
import assert from "node:assert/strict";

import { createLogger, silentLogger } from "../src/logger.ts";

describe("createLogger", () => {
	afterEach(() => {
		mock.restoreAll();
	});

	it("prefixes lines with the scope", () => {
		const warn = mock.method(console, "warn", () => undefined);
		createLogger("schema").warn("careful");
		assert.equal(warn.mock.callCount(), 1);
		assert.deepEqual(warn.mock.calls[0].arguments, ["[schema] careful"]);
	});

	it("drops messages below the level", () => {
		const debug = mock.method(console, "debug", () => undefined);
		const info = mock.method(console, "info", () => undefined);
		const logger = createLogger("schema", "warn");
		logger.debug("hidden");
		logger.info("hidden");
		assert.equal(debug.mock.callCount(), 0);
		assert.equal(info.mock.callCount(), 0);
	});

	it("writes debug output at the debug level", () => {
		const debug = mock.method(console, "debug", () => undefined);
		createLogger("schema", "debug").debug("visible");
		assert.deepEqual(debug.mock.calls[0].arguments, ["[schema] visible"]);
	});

	it("silences everything at the silent level", () => {
		const error = mock.method(console, "error", () => undefined);
		createLogger("schema", "silent").error("hidden");
		silentLogger.error("hidden");
		assert.equal(error.mock.callCount(), 0);
	});
});
