// Schema Document Serialization
// Pretty output for writers, plus RFC 8785 (JCS) canonical form for
// comparisons, digests and value de-duplication.

import { createHash, type Hash } from "node:crypto";
import type { SchemaDocument } from "./types.ts";

//==============================================================================
// JCS Serialization (RFC 8785)
//==============================================================================

/** Serialize a number per RFC 8785 / ECMAScript Number.toString(). */
function jcsNumber(value: number): string {
	if (!Number.isFinite(value)) {
		throw new Error(`JCS: non-finite number ${value} cannot be serialized`);
	}
	if (Object.is(value, -0)) return "0";
	return JSON.stringify(value);
}

function isRecord(val: unknown): val is Record<string, unknown> {
	return val !== null && typeof val === "object" && !Array.isArray(val);
}

/** Serialize an object with keys sorted by UTF-16 code unit comparison. */
function jcsObject(obj: Record<string, unknown>): string {
	const keys = Object.keys(obj).sort();
	const entries: string[] = [];
	for (const key of keys) {
		const val = obj[key];
		if (val === undefined) continue;
		entries.push(JSON.stringify(key) + ":" + jcsSerialize(val));
	}
	return "{" + entries.join(",") + "}";
}

function jcsSerialize(value: unknown): string {
	if (value === null || value === undefined) return "null";
	if (typeof value === "boolean") return value ? "true" : "false";
	if (typeof value === "number") return jcsNumber(value);
	if (typeof value === "string") return JSON.stringify(value);
	if (Array.isArray(value)) return "[" + value.map(jcsSerialize).join(",") + "]";
	if (isRecord(value)) return jcsObject(value);
	throw new Error(`JCS: unsupported type ${typeof value}`);
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Produce the RFC 8785 canonical JSON string of any JSON value.
 *
 * - Objects: keys sorted by UTF-16 code unit lexicographic order
 * - Arrays: element order preserved
 * - No whitespace between tokens
 */
export function canonicalize(value: unknown): string {
	return jcsSerialize(value);
}

/**
 * Pretty-print a schema document for an external writer.
 */
export function toJSON(doc: SchemaDocument, indent = 2): string {
	return JSON.stringify(doc, null, indent);
}

/**
 * Compute the content digest of a schema document.
 *
 * @param algorithm - Hash algorithm (default: "sha256")
 * @returns Digest string in the format `{algorithm}:{hex}`
 */
export function documentDigest(
	doc: SchemaDocument,
	algorithm = "sha256",
): string {
	const hash: Hash = createHash(algorithm);
	hash.update(canonicalize(doc), "utf8");
	return `${algorithm}:${hash.digest("hex")}`;
}
