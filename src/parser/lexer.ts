// Type expression tokenizer

import { SchemaError } from "../errors.ts";

export type TokenType =
	| "Ident"
	| "String"
	| "Number"
	| "LParen" // (
	| "RParen" // )
	| "LBrace" // {
	| "RBrace" // }
	| "LBracket" // [
	| "RBracket" // ]
	| "Comma" // ,
	| "Equals" // =
	| "Colon" // :
	| "EOF";

export interface Token {
	type: TokenType;
	/** Decoded text: escapes resolved for strings, raw source otherwise */
	value: string;
	/** Offset of the first character in the source */
	start: number;
	/** Offset one past the last character */
	end: number;
	/** A line break separates this token from the previous one */
	newlineBefore: boolean;
}

const PUNCTUATION: Record<string, TokenType> = {
	"(": "LParen",
	")": "RParen",
	"{": "LBrace",
	"}": "RBrace",
	"[": "LBracket",
	"]": "RBracket",
	",": "Comma",
	"=": "Equals",
	":": "Colon",
};

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_-]/;
const DIGIT = /[0-9]/;
const NUMBER = /^-?[0-9]+(\.[0-9]+)?([eE][+-]?[0-9]+)?/;

const SIMPLE_ESCAPES: Record<string, string> = {
	n: "\n",
	r: "\r",
	t: "\t",
	"\"": "\"",
	"\\": "\\",
};

/**
 * Split a type expression (or literal) into tokens.
 * Whitespace and comments are dropped; line breaks are recorded on the
 * following token so object fields can be newline-separated.
 */
export function tokenize(source: string): Token[] {
	const tokens: Token[] = [];
	let pos = 0;
	let newlineBefore = false;

	const fail = (reason: string, at: number, length = 1): never => {
		throw SchemaError.typeSyntax(reason, source.slice(at, at + length), at);
	};

	const push = (type: TokenType, value: string, start: number, end: number): void => {
		tokens.push({ type, value, start, end, newlineBefore });
		newlineBefore = false;
		pos = end;
	};

	while (pos < source.length) {
		const ch = source[pos];

		if (ch === "\n") {
			newlineBefore = true;
			pos++;
			continue;
		}
		if (ch === " " || ch === "\t" || ch === "\r") {
			pos++;
			continue;
		}

		// Comments
		if (ch === "#" || (ch === "/" && source[pos + 1] === "/")) {
			while (pos < source.length && source[pos] !== "\n") pos++;
			continue;
		}
		if (ch === "/" && source[pos + 1] === "*") {
			const close = source.indexOf("*/", pos + 2);
			if (close === -1) fail("unterminated comment", pos, 2);
			if (source.slice(pos, close).includes("\n")) newlineBefore = true;
			pos = close + 2;
			continue;
		}

		const punct = PUNCTUATION[ch];
		if (punct !== undefined) {
			push(punct, ch, pos, pos + 1);
			continue;
		}

		if (ch === "\"") {
			const { value, end } = readString(source, pos, fail);
			push("String", value, pos, end);
			continue;
		}

		if (DIGIT.test(ch) || (ch === "-" && DIGIT.test(source[pos + 1] ?? ""))) {
			const match = NUMBER.exec(source.slice(pos));
			if (match === null) fail("malformed number", pos);
			else push("Number", match[0], pos, pos + match[0].length);
			continue;
		}

		if (IDENT_START.test(ch)) {
			let end = pos + 1;
			while (end < source.length && IDENT_PART.test(source[end])) end++;
			push("Ident", source.slice(pos, end), pos, end);
			continue;
		}

		fail("unexpected character " + JSON.stringify(ch), pos);
	}

	tokens.push({ type: "EOF", value: "", start: source.length, end: source.length, newlineBefore });
	return tokens;
}

function readString(
	source: string,
	start: number,
	fail: (reason: string, at: number, length?: number) => never,
): { value: string; end: number } {
	let value = "";
	let pos = start + 1;

	while (pos < source.length) {
		const ch = source[pos];

		if (ch === "\"") {
			return { value, end: pos + 1 };
		}
		if (ch === "\n") {
			break;
		}
		if (ch === "\\") {
			const esc = source[pos + 1] ?? "";
			const simple = SIMPLE_ESCAPES[esc];
			if (simple !== undefined) {
				value += simple;
				pos += 2;
				continue;
			}
			if (esc === "u" || esc === "U") {
				const width = esc === "u" ? 4 : 8;
				const hex = source.slice(pos + 2, pos + 2 + width);
				const codePoint = parseInt(hex, 16);
				if (!/^[0-9A-Fa-f]+$/.test(hex) || hex.length !== width || codePoint > 0x10ffff) {
					fail("invalid unicode escape", pos, 2 + width);
				}
				value += String.fromCodePoint(codePoint);
				pos += 2 + width;
				continue;
			}
			fail("invalid escape sequence", pos, 2);
		}
		// Literal "$${" and "%%{" stand for "${" and "%{"; bare ones are templates
		if ((ch === "$" || ch === "%") && source[pos + 1] === ch && source[pos + 2] === "{") {
			value += ch + "{";
			pos += 3;
			continue;
		}
		if ((ch === "$" || ch === "%") && source[pos + 1] === "{") {
			fail("template sequences are not allowed in literals", pos, 2);
		}
		value += ch;
		pos++;
	}

	return fail("unterminated string", start, pos - start);
}
