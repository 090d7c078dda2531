import { Either } from "effect";

import { logger } from "../../logger";
import { GrammarError } from "../grammar/error";
import { Locator, type Span } from "../grammar/locate";
import type { Range } from "../grammar/token";
import { expandMap, expandToUppercase } from "../macro";
import { describeFinding, ValidationMode, validate } from "../validate";

export type Severity = "error" | "warning";

export type Diagnostic = {
	severity: Severity;
	message: string;
	span: Span;
};

export type ExpandResult = {
	code: string;
	diagnostics: Diagnostic[];
	/** amount of invocations replaced */
	expanded: number;
};

export type ExpanderOptions = {
	validation?: ValidationMode;
};

const macros = ["map", "to_uppercase"] as const;
type Macro = (typeof macros)[number];

const isMacro = (name: string): name is Macro =>
	(macros as readonly string[]).includes(name);

const invocation = /([a-z_]+)!\(/y;
const boundary = /[\p{ID_Continue}$.]/u;

export const formatDiagnostic = (
	file: string,
	{ severity, message, span }: Diagnostic,
): string => `${file}:${span.line}:${span.column}: ${severity}: ${message}`;

const fromGrammarError = (error: GrammarError): Diagnostic => ({
	severity: "error",
	message: error.reason,
	span: error.span,
});

/** offset after the closing quote, or where an unterminated literal stops */
const skipQuoted = (source: string, start: number, multiline: boolean) => {
	const quote = source[start];
	let cursor = start + 1;

	while (cursor < source.length) {
		const char = source[cursor];
		if (char === "\\") {
			cursor += 2;
			continue;
		}
		if (char === quote) {
			return cursor + 1;
		}
		if (char === "\n" && !multiline) {
			return cursor;
		}
		cursor++;
	}

	return source.length;
};

type TemplateChunk = { next: number; substitution: boolean };

/**
 * scans template literal text starting at `start`, right after a backtick or
 * the `}` closing a substitution, up to the closing backtick or the next `${`
 */
const templateChunk = (source: string, start: number): TemplateChunk => {
	let cursor = start;

	while (cursor < source.length) {
		const char = source[cursor];
		if (char === "\\") {
			cursor += 2;
			continue;
		}
		if (char === "`") {
			return { next: cursor + 1, substitution: false };
		}
		if (char === "$" && source[cursor + 1] === "{") {
			return { next: cursor + 2, substitution: true };
		}
		cursor++;
	}

	return { next: source.length, substitution: false };
};

/** offset of the `)` balancing an already consumed `(`, -1 if there is none */
const closingParen = (source: string, open: number): number => {
	let depth = 1;
	let cursor = open;

	while (cursor < source.length) {
		const char = source[cursor];
		if (char === '"') {
			cursor = skipQuoted(source, cursor, true);
			continue;
		}

		if (char === "(") {
			depth++;
		} else if (char === ")") {
			depth--;
			if (depth === 0) {
				return cursor;
			}
		}
		cursor++;
	}

	return -1;
};

type Site = {
	macro: Macro;
	source: string;
	span: Span;
	range: Range;
	locator: Locator;
};

/**
 * replaces `map!(…)` and `to_uppercase!(…)` invocations in a source text
 * with the code they generate
 *
 * invocations inside string literals and comments are left alone, those in
 * template literal substitutions expand; a failing invocation is reported and
 * kept as written, the remaining ones still expand
 */
export class Expander {
	private validation: ValidationMode;

	constructor({ validation = ValidationMode.Off }: ExpanderOptions = {}) {
		this.validation = validation;
	}

	expand(source: string): ExpandResult {
		const locator = new Locator(source);
		const diagnostics: Diagnostic[] = [];

		let code = "";
		let copied = 0;
		let expanded = 0;
		let cursor = 0;
		// open brace count of each template substitution the cursor is in
		const substitutions: number[] = [];

		while (cursor < source.length) {
			const char = source[cursor];
			const next = source[cursor + 1];

			if (char === "/" && next === "/") {
				const newline = source.indexOf("\n", cursor);
				cursor = newline === -1 ? source.length : newline;
				continue;
			}
			if (char === "/" && next === "*") {
				const close = source.indexOf("*/", cursor + 2);
				cursor = close === -1 ? source.length : close + 2;
				continue;
			}
			if (char === '"' || char === "'") {
				cursor = skipQuoted(source, cursor, false);
				continue;
			}
			if (
				char === "`" ||
				(char === "}" && substitutions[substitutions.length - 1] === 0)
			) {
				if (char === "}") {
					substitutions.pop();
				}
				const chunk = templateChunk(source, cursor + 1);
				if (chunk.substitution) {
					substitutions.push(0);
				}
				cursor = chunk.next;
				continue;
			}
			if (substitutions.length > 0 && (char === "{" || char === "}")) {
				substitutions[substitutions.length - 1] += char === "{" ? 1 : -1;
				cursor++;
				continue;
			}

			invocation.lastIndex = cursor;
			const matched = invocation.exec(source);
			const name = matched === null ? undefined : matched[1];
			if (
				matched === null ||
				typeof name === "undefined" ||
				!isMacro(name) ||
				(cursor > 0 && boundary.test(source[cursor - 1]))
			) {
				cursor++;
				continue;
			}

			const macro = name;
			const span = locator.locate(cursor);
			const open = cursor + matched[0].length;
			const close = closingParen(source, open);
			if (close === -1) {
				const expected = `\`)\` closing \`${macro}!(\``;
				diagnostics.push(
					fromGrammarError(new GrammarError("end of input", [expected], span)),
				);
				break;
			}

			const replacement = this.site(
				{ macro, source, span, range: { start: open, end: close }, locator },
				diagnostics,
			);
			if (typeof replacement !== "undefined") {
				code += source.slice(copied, cursor) + replacement;
				copied = close + 1;
				expanded++;
			}

			cursor = close + 1;
		}

		code += source.slice(copied);

		return { code, diagnostics, expanded };
	}

	private site(
		{ macro, source, span, range, locator }: Site,
		diagnostics: Diagnostic[],
	): string | undefined {
		switch (macro) {
			case "to_uppercase": {
				const expansion = expandToUppercase(source, range, locator);
				if (Either.isLeft(expansion)) {
					diagnostics.push(fromGrammarError(expansion.left));
					return undefined;
				}

				logger.debug("expanded invocation", {
					macro,
					line: span.line,
					column: span.column,
				});
				return expansion.right;
			}
			case "map": {
				const expansion = expandMap(source, range, locator);
				if (Either.isLeft(expansion)) {
					diagnostics.push(fromGrammarError(expansion.left));
					return undefined;
				}

				if (this.validation !== ValidationMode.Off) {
					const severity: Severity =
						this.validation === ValidationMode.Error ? "error" : "warning";
					const findings = validate(expansion.right.parsed);
					for (const finding of findings) {
						diagnostics.push({ severity, ...describeFinding(finding) });
					}

					if (severity === "error" && findings.length > 0) {
						return undefined;
					}
				}

				logger.debug("expanded invocation", {
					macro,
					decision: expansion.right.decision,
					line: span.line,
					column: span.column,
				});
				return expansion.right.code;
			}
		}
	}
}
