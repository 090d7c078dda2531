import { Either } from "effect";

import { Identifier } from "../../type/codec/identifier";
import { GrammarError } from "./error";
import { Locator, type Span } from "./locate";

export type TokenIdent = { kind: "ident"; value: Identifier; span: Span };
export type TokenArrow = { kind: "arrow"; span: Span };
export type TokenString = {
	kind: "string";
	/** decoded contents */
	value: string;
	/** as written, including quotes */
	raw: string;
	span: Span;
};
export type TokenPunct = { kind: "punct"; value: string; span: Span };

export type Token = TokenIdent | TokenArrow | TokenString | TokenPunct;
export type TokenKind = Token["kind"];

export type Tokens = {
	tokens: Token[];
	/** position right after the last character of the tokenized range */
	end: Span;
};

export type Range = { start: number; end: number };

const whitespace = /\s+/y;
const identifier = /[\p{ID_Start}_$][\p{ID_Continue}$]*/uy;
const hex = /^[0-9a-fA-F]{1,6}$/;
const continuation = new Set([" ", "\t", "\n", "\r"]);

const escapes = new Map([
	["\\", "\\"],
	['"', '"'],
	["'", "'"],
	["n", "\n"],
	["r", "\r"],
	["t", "\t"],
	["0", "\0"],
]);

export const describeToken = (token: Token | undefined): string => {
	if (typeof token === "undefined") {
		return "end of input";
	}

	switch (token.kind) {
		case "ident":
			return `identifier \`${token.value}\``;
		case "arrow":
			return "`=>`";
		case "string":
			return `string literal ${token.raw}`;
		case "punct":
			return `\`${token.value}\``;
	}
};

/** fixed-width hex digits at `from`, `NaN` when any is missing */
const digits = (
	source: string,
	from: number,
	length: number,
	end: number,
): number => {
	const text = from + length <= end ? source.slice(from, from + length) : "";
	return /^[0-9a-fA-F]+$/.test(text) && text.length === length
		? parseInt(text, 16)
		: NaN;
};

const string = (
	source: string,
	start: number,
	end: number,
	locator: Locator,
): Either.Either<[token: TokenString, next: number], GrammarError> => {
	let value = "";
	let cursor = start + 1;

	while (cursor < end) {
		const char = source[cursor];

		if (char === '"') {
			const token: TokenString = {
				kind: "string",
				value,
				raw: source.slice(start, cursor + 1),
				span: locator.locate(start),
			};
			return Either.right<[TokenString, number]>([token, cursor + 1]);
		}

		if (char !== "\\") {
			value += char;
			cursor++;
			continue;
		}

		const next = cursor + 1 < end ? source[cursor + 1] : undefined;

		if (next === "\n" || (next === "\r" && source[cursor + 2] === "\n")) {
			cursor += next === "\n" ? 2 : 3;
			while (cursor < end && continuation.has(source[cursor])) {
				cursor++;
			}
			continue;
		}

		if (next === "x") {
			const codePoint = digits(source, cursor + 2, 2, end);
			if (Number.isNaN(codePoint)) {
				return Either.left(
					new GrammarError(
						"malformed hex escape",
						["`\\x` with 2 hex digits"],
						locator.locate(cursor),
					),
				);
			}

			value += String.fromCharCode(codePoint);
			cursor += 4;
			continue;
		}

		if (next === "u" && source[cursor + 2] !== "{") {
			const codeUnit = digits(source, cursor + 2, 4, end);
			if (Number.isNaN(codeUnit)) {
				return Either.left(
					new GrammarError(
						"malformed unicode escape",
						["`\\uXXXX` with 4 hex digits"],
						locator.locate(cursor),
					),
				);
			}

			value += String.fromCharCode(codeUnit);
			cursor += 6;
			continue;
		}

		if (next === "u") {
			const close = source.indexOf("}", cursor + 3);
			const braced =
				close !== -1 && close < end ? source.slice(cursor + 3, close) : "";
			const codePoint = hex.test(braced) ? parseInt(braced, 16) : NaN;
			if (Number.isNaN(codePoint) || codePoint > 0x10ffff) {
				return Either.left(
					new GrammarError(
						"malformed unicode escape",
						["`\\u{…}` with 1 to 6 hex digits"],
						locator.locate(cursor),
					),
				);
			}

			value += String.fromCodePoint(codePoint);
			cursor = close + 1;
			continue;
		}

		const escaped = typeof next === "undefined" ? undefined : escapes.get(next);
		if (typeof escaped === "undefined") {
			return Either.left(
				new GrammarError(
					`escape \`\\${next ?? ""}\``,
					[],
					locator.locate(cursor),
				),
			);
		}

		value += escaped;
		cursor += 2;
	}

	return Either.left(
		new GrammarError(
			"unterminated string literal",
			['closing `"`'],
			locator.locate(start),
		),
	);
};

/**
 * splits invocation text into tokens
 *
 * positions are reported against the whole `source`, even when only `range`
 * is tokenized, so an invocation embedded in a file points into that file
 */
export const tokenize = (
	source: string,
	range: Range = { start: 0, end: source.length },
	locator: Locator = new Locator(source),
): Either.Either<Tokens, GrammarError> => {
	const tokens: Token[] = [];
	const { end } = range;
	let cursor = range.start;

	while (cursor < end) {
		whitespace.lastIndex = cursor;
		if (whitespace.test(source)) {
			cursor = Math.min(whitespace.lastIndex, end);
			continue;
		}

		identifier.lastIndex = cursor;
		const matched = identifier.exec(source);
		if (matched !== null && cursor + matched[0].length <= end) {
			tokens.push({
				kind: "ident",
				value: Identifier.make(matched[0]),
				span: locator.locate(cursor),
			});
			cursor += matched[0].length;
			continue;
		}

		const char = source[cursor];

		if (char === '"') {
			const scanned = string(source, cursor, end, locator);
			if (Either.isLeft(scanned)) {
				return Either.left(scanned.left);
			}

			const [token, next] = scanned.right;
			tokens.push(token);
			cursor = next;
			continue;
		}

		if (char === "=" && cursor + 1 < end && source[cursor + 1] === ">") {
			tokens.push({ kind: "arrow", span: locator.locate(cursor) });
			cursor += 2;
			continue;
		}

		const codePoint = source.codePointAt(cursor) ?? 0;
		const value = String.fromCodePoint(codePoint);
		tokens.push({ kind: "punct", value, span: locator.locate(cursor) });
		cursor += value.length;
	}

	return Either.right({ tokens, end: locator.locate(end) });
};
