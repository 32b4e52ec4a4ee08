// Conversion options
// Caller-facing options validated with zod and merged over defaults.

import { z } from "zod/v4";
import { SchemaError } from "./errors.ts";
import { createLogger, type Logger, type LogLevel } from "./logger.ts";
import { ParseCache } from "./parser/cache.ts";
import { DEFAULT_MAX_DEPTH, type UnknownConstructorPolicy } from "./parser/parser.ts";

//==============================================================================
// Types
//==============================================================================

/** strict: any variable error aborts the document. lenient: failed variables are degraded or omitted. */
export type ConversionMode = "strict" | "lenient";

/** How lenient mode treats a variable that failed to compile. */
export type FallbackPolicy = "any" | "omit";

export interface ConvertOptions {
	mode?: ConversionMode;
	fallback?: FallbackPolicy;
	unknownConstructors?: UnknownConstructorPolicy;
	maxDepth?: number;
	title?: string;
	description?: string;
	/** Translate recognised validation conditions into schema keywords */
	validationKeywords?: boolean;
	/** Run checkDocument on the assembled document */
	verify?: boolean;
	/** Parse memo table; false disables memoization */
	cache?: ParseCache | false;
	logger?: Logger;
	logLevel?: LogLevel;
}

export interface ResolvedOptions {
	mode: ConversionMode;
	fallback: FallbackPolicy;
	unknownConstructors: UnknownConstructorPolicy;
	maxDepth: number;
	title: string;
	description: string;
	validationKeywords: boolean;
	verify: boolean;
	cache: ParseCache | undefined;
	logger: Logger;
}

export const DEFAULT_TITLE = "Terraform Variables Schema";
export const DEFAULT_DESCRIPTION = "Generated JSON Schema from Terraform variable definitions";

export const LOGGER_SCOPE = "tf-variable-schema";

/** Shared by every conversion that does not bring its own cache. */
export const sharedParseCache = new ParseCache();

//==============================================================================
// Validation
//==============================================================================

function isLogger(value: unknown): value is Logger {
	if (typeof value !== "object" || value === null) return false;
	return ["debug", "info", "warn", "error"].every(
		(method) => method in value && typeof Reflect.get(value, method) === "function",
	);
}

const ConvertOptionsSchema = z.object({
	mode: z.enum(["strict", "lenient"]).default("strict"),
	fallback: z.enum(["any", "omit"]).default("any"),
	unknownConstructors: z.enum(["error", "any"]).default("error"),
	maxDepth: z.number().int().min(1).default(DEFAULT_MAX_DEPTH),
	title: z.string().default(DEFAULT_TITLE),
	description: z.string().default(DEFAULT_DESCRIPTION),
	validationKeywords: z.boolean().default(true),
	verify: z.boolean().default(true),
	cache: z.union([z.instanceof(ParseCache), z.literal(false)]).optional(),
	logger: z.custom<Logger>(isLogger, "expected an object with debug, info, warn and error methods").optional(),
	logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("warn"),
});

/**
 * Validate caller options and fill in defaults.
 * Throws an InvalidConfiguration SchemaError naming the first bad option.
 */
export function resolveOptions(options: ConvertOptions = {}): ResolvedOptions {
	const parsed = ConvertOptionsSchema.safeParse(options);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const path = issue.path.map(String).join(".") || "$";
		throw SchemaError.invalidConfiguration(path, issue.message);
	}

	const { cache, logger, logLevel, ...rest } = parsed.data;
	return {
		...rest,
		cache: cache === false ? undefined : cache ?? sharedParseCache,
		logger: logger ?? createLogger(LOGGER_SCOPE, logLevel),
	};
}
