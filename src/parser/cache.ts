// Bounded memo table for parsed type expressions.
// Entries are never replaced, so a cached AST can be shared between variables
// (and between concurrent compiles) without copying. Past `capacity` the
// oldest entry is dropped.

import type { TypeExpression } from "../types.ts";
import {
	DEFAULT_MAX_DEPTH,
	parseTypeExpression,
	type ParseOptions,
} from "./parser.ts";

export const DEFAULT_CACHE_CAPACITY = 1024;

export class ParseCache {
	private readonly entries = new Map<string, TypeExpression>();
	private hitCount = 0;

	constructor(readonly capacity: number = DEFAULT_CACHE_CAPACITY) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError("ParseCache capacity must be a positive integer, got " + String(capacity));
		}
	}

	get size(): number {
		return this.entries.size;
	}

	get hits(): number {
		return this.hitCount;
	}

	/**
	 * Parse `source`, reusing an earlier result for the same text and options.
	 * Failures are not cached; they are rethrown on every call.
	 */
	parse(source: string, options: ParseOptions = {}): TypeExpression {
		const key = cacheKey(source, options);
		const cached = this.entries.get(key);
		if (cached !== undefined) {
			this.hitCount++;
			return cached;
		}
		const parsed = parseTypeExpression(source, options);
		// First writer wins; a racing duplicate parse is discarded
		if (!this.entries.has(key)) {
			if (this.entries.size >= this.capacity) {
				const oldest = this.entries.keys().next();
				if (oldest.done !== true) this.entries.delete(oldest.value);
			}
			this.entries.set(key, parsed);
		}
		return this.entries.get(key) ?? parsed;
	}
}

/** The parse result depends on the policy and depth limit as well as the text. */
function cacheKey(source: string, options: ParseOptions): string {
	const policy = options.unknownConstructors ?? "error";
	const depth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
	return policy + "|" + String(depth) + "|" + source;
}
