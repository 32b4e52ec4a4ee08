// Recursive descent parser for type expressions and literal defaults
//
// type     := primitive | "any" | ctor
// ctor     := ("list" | "set" | "map") "(" type ")"
//           | "tuple" "(" "[" (type ("," type)* ","?)? "]" ")"
//           | "object" "(" "{" (attr (sep attr)* sep?)? "}" ")"
// attr     := (IDENT | STRING) ("=" | ":") attrType
// attrType := "optional" "(" type ("," literal)? ")" | type
// sep      := "," | newline

import { SchemaError } from "../errors.ts";
import {
	anyType,
	boolType,
	defineEntry,
	field,
	listType,
	mapType,
	numberType,
	optionalField,
	setType,
	stringType,
	tupleType,
	unresolvedType,
	type FieldSpec,
	type TypeExpression,
	type Value,
	type ValueRecord,
} from "../types.ts";
import { tokenize, type Token, type TokenType } from "./lexer.ts";

//==============================================================================
// Options
//==============================================================================

/** What to do with a constructor name the grammar does not know. */
export type UnknownConstructorPolicy = "error" | "any";

export interface ParseOptions {
	unknownConstructors?: UnknownConstructorPolicy;
	maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 32;

const EXCERPT_LENGTH = 40;

//==============================================================================
// Parser
//==============================================================================

class TypeParser {
	private pos = 0;
	private readonly tokens: Token[];
	private readonly policy: UnknownConstructorPolicy;
	private readonly maxDepth: number;

	constructor(
		private readonly source: string,
		options: ParseOptions,
	) {
		this.tokens = tokenize(source);
		this.policy = options.unknownConstructors ?? "error";
		this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
	}

	parseTypeRoot(): TypeExpression {
		if (this.check("EOF")) {
			throw SchemaError.typeSyntax("empty type expression", "", 0);
		}
		const type = this.parseType(1);
		this.expectEnd();
		return type;
	}

	parseLiteralRoot(): Value {
		if (this.check("EOF")) {
			throw SchemaError.typeSyntax("empty literal", "", 0);
		}
		const value = this.parseValue(1);
		this.expectEnd();
		return value;
	}

	// type := primitive | "any" | ctor
	private parseType(depth: number): TypeExpression {
		const token = this.peek();
		this.enter(depth, token);
		if (token.type !== "Ident") {
			throw this.unexpected(token, "expected a type");
		}
		this.advance();

		switch (token.value) {
		case "string":
			return this.bare(token, stringType());
		case "number":
			return this.bare(token, numberType());
		case "bool":
			return this.bare(token, boolType());
		case "any":
			return this.bare(token, anyType());
		case "list":
			return listType(this.parseElementType(token, depth));
		case "set":
			return setType(this.parseElementType(token, depth));
		case "map":
			return mapType(this.parseElementType(token, depth));
		case "tuple":
			return this.parseTuple(token, depth);
		case "object":
			return this.parseObject(token, depth);
		case "optional":
			throw this.error(token, "optional() is only valid as an object attribute type");
		default:
			return this.parseUnknown(token);
		}
	}

	private bare<T extends TypeExpression>(token: Token, type: T): T {
		if (this.check("LParen")) {
			throw this.error(token, token.value + " is not a type constructor");
		}
		return type;
	}

	// ("list" | "set" | "map") "(" type ")"
	private parseElementType(ctor: Token, depth: number): TypeExpression {
		this.expectAfter(ctor, "LParen", ctor.value + " requires an element type, e.g. " + ctor.value + "(string)");
		if (this.check("RParen")) {
			throw this.error(this.peek(), ctor.value + "() requires exactly one element type");
		}
		const of = this.parseType(depth + 1);
		if (this.check("Comma")) {
			throw this.error(this.peek(), ctor.value + "() takes exactly one argument");
		}
		this.expect("RParen", "expected ')' to close " + ctor.value + "(");
		return of;
	}

	// "tuple" "(" "[" types "]" ")"
	private parseTuple(ctor: Token, depth: number): TypeExpression {
		this.expectAfter(ctor, "LParen", "tuple requires a list of element types, e.g. tuple([string])");
		this.expect("LBracket", "tuple() takes a bracketed list of element types");
		const elements: TypeExpression[] = [];
		while (!this.check("RBracket")) {
			elements.push(this.parseType(depth + 1));
			if (!this.match("Comma")) break;
		}
		this.expect("RBracket", "expected ',' or ']' in tuple element list");
		this.expect("RParen", "expected ')' to close tuple(");
		return tupleType(elements);
	}

	// "object" "(" "{" attrs "}" ")"
	private parseObject(ctor: Token, depth: number): TypeExpression {
		this.expectAfter(ctor, "LParen", "object requires an attribute map, e.g. object({ name = string })");
		this.expect("LBrace", "object() takes a brace-delimited attribute map");
		const fields = new Map<string, FieldSpec>();

		while (!this.check("RBrace")) {
			const key = this.peek();
			if (key.type !== "Ident" && key.type !== "String") {
				throw this.unexpected(key, "expected an attribute name");
			}
			this.advance();
			if (fields.has(key.value)) {
				throw this.error(key, "duplicate attribute " + JSON.stringify(key.value));
			}
			this.expectOneOf(["Equals", "Colon"], "expected '=' after attribute name " + JSON.stringify(key.value));
			fields.set(key.value, this.parseAttributeType(depth + 1));

			if (this.match("Comma") || this.check("RBrace") || this.peek().newlineBefore) continue;
			throw this.unexpected(this.peek(), "expected ',' or a new line between attributes");
		}

		this.expect("RBrace", "expected '}' to close the attribute map");
		this.expect("RParen", "expected ')' to close object(");
		return { kind: "object", fields };
	}

	// attrType := "optional" "(" type ("," literal)? ")" | type
	private parseAttributeType(depth: number): FieldSpec {
		const token = this.peek();
		if (token.type !== "Ident" || token.value !== "optional" || this.peekAt(1).type !== "LParen") {
			return field(this.parseType(depth));
		}
		this.advance();
		this.advance();
		if (this.check("RParen")) {
			throw this.error(this.peek(), "optional() requires an attribute type");
		}
		const type = this.parseType(depth);
		let defaultValue: Value | undefined;
		if (this.match("Comma") && !this.check("RParen")) {
			defaultValue = this.parseValue(depth);
			this.match("Comma");
		}
		this.expect("RParen", "optional() takes at most two arguments");
		return optionalField(type, defaultValue);
	}

	private parseUnknown(name: Token): TypeExpression {
		let last = name;
		if (this.check("LParen")) {
			last = this.skipBalanced();
		}
		const fragment = this.source.slice(name.start, last.end);
		if (this.policy === "error") {
			throw SchemaError.unknownConstructor(name.value, fragment, name.start);
		}
		return unresolvedType(name.value, fragment);
	}

	/** Consume a bracketed argument list, returning its closing token. */
	private skipBalanced(): Token {
		let open = 0;
		for (;;) {
			const token = this.peek();
			if (token.type === "EOF") {
				throw this.unexpected(token, "unbalanced brackets");
			}
			this.advance();
			if (token.type === "LParen" || token.type === "LBrace" || token.type === "LBracket") open++;
			if (token.type === "RParen" || token.type === "RBrace" || token.type === "RBracket") open--;
			if (open === 0) return token;
		}
	}

	//==========================================================================
	// Literals
	//==========================================================================

	private parseValue(depth: number): Value {
		const token = this.peek();
		this.enter(depth, token);

		switch (token.type) {
		case "String":
			this.advance();
			return token.value;
		case "Number": {
			this.advance();
			const value = Number(token.value);
			if (!Number.isFinite(value)) throw this.error(token, "number literal out of range");
			return value;
		}
		case "Ident":
			this.advance();
			if (token.value === "true") return true;
			if (token.value === "false") return false;
			if (token.value === "null") return null;
			throw this.error(token, "expressions are not supported in literal values");
		case "LBracket":
			return this.parseTupleValue(depth);
		case "LBrace":
			return this.parseObjectValue(depth);
		default:
			throw this.unexpected(token, "expected a literal value");
		}
	}

	private parseTupleValue(depth: number): Value[] {
		this.advance();
		const items: Value[] = [];
		while (!this.check("RBracket")) {
			items.push(this.parseValue(depth + 1));
			if (!this.match("Comma")) break;
		}
		this.expect("RBracket", "expected ',' or ']' in list value");
		return items;
	}

	private parseObjectValue(depth: number): ValueRecord {
		this.advance();
		const result: ValueRecord = {};
		while (!this.check("RBrace")) {
			const key = this.peek();
			if (key.type !== "Ident" && key.type !== "String") {
				throw this.unexpected(key, "expected an object key");
			}
			this.advance();
			if (Object.hasOwn(result, key.value)) {
				throw this.error(key, "duplicate key " + JSON.stringify(key.value));
			}
			this.expectOneOf(["Equals", "Colon"], "expected '=' after object key " + JSON.stringify(key.value));
			defineEntry(result, key.value, this.parseValue(depth + 1));

			if (this.match("Comma") || this.check("RBrace") || this.peek().newlineBefore) continue;
			throw this.unexpected(this.peek(), "expected ',' or a new line between object entries");
		}
		this.expect("RBrace", "expected '}' to close the object value");
		return result;
	}

	//==========================================================================
	// Token helpers
	//==========================================================================

	private enter(depth: number, token: Token): void {
		if (depth > this.maxDepth) {
			throw SchemaError.maxNestingDepth(this.maxDepth, this.excerpt(token.start), token.start);
		}
	}

	private peek(): Token {
		return this.tokens[this.pos];
	}

	private peekAt(offset: number): Token {
		return this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
	}

	private advance(): Token {
		const token = this.peek();
		if (token.type !== "EOF") this.pos++;
		return token;
	}

	private check(type: TokenType): boolean {
		return this.peek().type === type;
	}

	private match(type: TokenType): boolean {
		if (this.check(type)) {
			this.advance();
			return true;
		}
		return false;
	}

	private expect(type: TokenType, reason: string): Token {
		if (this.check(type)) {
			return this.advance();
		}
		throw this.unexpected(this.peek(), reason);
	}

	private expectOneOf(types: TokenType[], reason: string): Token {
		if (types.includes(this.peek().type)) {
			return this.advance();
		}
		throw this.unexpected(this.peek(), reason);
	}

	/** Like expect, but points at the constructor name when the argument list is missing. */
	private expectAfter(ctor: Token, type: TokenType, reason: string): Token {
		if (this.check(type)) {
			return this.advance();
		}
		throw this.error(ctor, reason);
	}

	private expectEnd(): void {
		if (!this.check("EOF")) {
			throw this.unexpected(this.peek(), "unexpected trailing input");
		}
	}

	private unexpected(token: Token, reason: string): SchemaError {
		if (token.type === "EOF") {
			return SchemaError.typeSyntax(
				"unexpected end of input (" + reason + ")",
				this.excerpt(0),
				token.start,
			);
		}
		return this.error(token, reason + ", found " + JSON.stringify(this.source.slice(token.start, token.end)));
	}

	private error(token: Token, reason: string): SchemaError {
		return SchemaError.typeSyntax(reason, this.source.slice(token.start, token.end), token.start);
	}

	private excerpt(start: number): string {
		const text = this.source.slice(start).trim();
		return text.length > EXCERPT_LENGTH ? text.slice(0, EXCERPT_LENGTH) + "..." : text;
	}
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Parse a raw type expression such as `map(object({ port = number }))`.
 *
 * Throws a SchemaError with code TypeSyntaxError, UnknownTypeConstructor
 * (policy "error") or MaxNestingDepthExceeded.
 */
export function parseTypeExpression(source: string, options: ParseOptions = {}): TypeExpression {
	return new TypeParser(source, options).parseTypeRoot();
}

/**
 * Parse a literal value written in declaration syntax, e.g. `{ a = [1, 2] }`.
 */
export function parseLiteral(source: string, options: ParseOptions = {}): Value {
	return new TypeParser(source, options).parseLiteralRoot();
}
