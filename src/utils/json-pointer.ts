// JSON Pointer Utilities
// RFC 6901 pointers locating nodes inside a compiled schema document
// See: https://www.rfc-editor.org/rfc/rfc6901.html

//==============================================================================
// Types
//==============================================================================

/**
 * Result type for fallible operations
 */
export type Result<T> =
	| { success: true; value: T }
	| { success: false; error: string };

//==============================================================================
// Escaping (RFC 6901)
//==============================================================================

/**
 * Escape a reference token for use in a JSON Pointer
 * Replaces: ~ → ~0, / → ~1
 */
export function escapeToken(token: string): string {
	return token.replace(/~/g, "~0").replace(/\//g, "~1");
}

/**
 * Unescape a reference token from a JSON Pointer
 * Replaces: ~0 → ~, ~1 → /
 */
export function unescapeToken(token: string): string {
	return token.replace(/~1/g, "/").replace(/~0/g, "~");
}

//==============================================================================
// Building
//==============================================================================

/**
 * Build a pointer from unescaped tokens. The root document is "".
 *
 * @example
 * buildPointer(["properties", "a/b"]) // "/properties/a~1b"
 */
export function buildPointer(tokens: readonly string[]): string {
	return tokens.map((t) => "/" + escapeToken(t)).join("");
}

/** Extend a pointer by one or more unescaped tokens. */
export function appendPointer(base: string, ...tokens: string[]): string {
	return base + buildPointer(tokens);
}

//==============================================================================
// Parsing and Navigation
//==============================================================================

/**
 * Split a pointer into its decoded tokens
 */
export function parseJsonPointer(pointer: string): Result<string[]> {
	const working = pointer.startsWith("#") ? pointer.slice(1) : pointer;
	if (working === "") {
		return { success: true, value: [] };
	}
	if (!working.startsWith("/")) {
		return {
			success: false,
			error: `Invalid JSON Pointer "${pointer}": must start with "/" or "#"`,
		};
	}
	return { success: true, value: working.slice(1).split("/").map(unescapeToken) };
}

function isObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Resolve a pointer against a JSON value
 *
 * @example
 * navigate({ foo: { bar: 42 } }, "/foo/bar") // { success: true, value: 42 }
 */
export function navigate(root: unknown, pointer: string): Result<unknown> {
	const parsed = parseJsonPointer(pointer);
	if (!parsed.success) {
		return parsed;
	}

	let current: unknown = root;
	for (const token of parsed.value) {
		if (Array.isArray(current)) {
			const index = Number(token);
			if (!Number.isInteger(index) || index < 0 || index >= current.length) {
				return {
					success: false,
					error: `Array index ${token} out of bounds in pointer "${pointer}"`,
				};
			}
			current = current[index];
		} else if (isObject(current) && token in current) {
			current = current[token];
		} else {
			return {
				success: false,
				error: `Property "${token}" not found in pointer "${pointer}"`,
			};
		}
	}
	return { success: true, value: current };
}
