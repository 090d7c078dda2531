import { Either } from "effect";

import type { Identifier } from "../../type/codec/identifier";
import { GrammarError } from "./error";
import type { Span } from "./locate";
import { describeToken, type Token, type Tokens } from "./token";

export const BindingMode = {
	/** `:name`, bound by value */
	Value: "value",
	/** `#name`, bound by reference (out parameters, arrays) */
	Reference: "reference",
} as const;
export type BindingMode = (typeof BindingMode)[keyof typeof BindingMode];

const markers = new Map<string, BindingMode>([
	[":", BindingMode.Value],
	["#", BindingMode.Reference],
]);

export type DeclaredParameter = {
	identifier: Identifier;
	position: number;
	span: Span;
};

export type SegmentLiteral = { kind: "literal"; text: string; span: Span };
export type SegmentPlaceholder = {
	kind: "placeholder";
	mode: BindingMode;
	identifier: Identifier;
	span: Span;
};
export type Segment = SegmentLiteral | SegmentPlaceholder;

export type ParsedMap = {
	parameters: DeclaredParameter[];
	template: Segment[];
	/** placeholder identifiers in template order, duplicates retained */
	references: Identifier[];
};

export const references = (template: readonly Segment[]): Identifier[] =>
	template.flatMap((segment) =>
		segment.kind === "placeholder" ? [segment.identifier] : [],
	);

const unexpected = (
	token: Token | undefined,
	end: Span,
	...expected: string[]
): Either.Either<never, GrammarError> =>
	Either.left(
		new GrammarError(describeToken(token), expected, token?.span ?? end),
	);

type State = "header" | "body";

/**
 * parses `ident* => ("literal" ((":" | "#") ident)?)*`
 *
 * header: identifiers up to `=>`
 * body: a literal, then optionally a marker and an identifier, repeated until
 * input is exhausted right after a literal
 */
export const parseMap = ({
	tokens,
	end,
}: Tokens): Either.Either<ParsedMap, GrammarError> => {
	const parameters: DeclaredParameter[] = [];
	const template: Segment[] = [];

	let state: State = "header";
	let cursor = 0;

	scan: while (true) {
		const token: Token | undefined = tokens[cursor];

		switch (state) {
			case "header": {
				if (token?.kind === "arrow") {
					state = "body";
					cursor++;
					continue scan;
				}

				if (token?.kind !== "ident") {
					return unexpected(token, end, "identifier", "`=>`");
				}

				parameters.push({
					identifier: token.value,
					position: parameters.length,
					span: token.span,
				});
				cursor++;
				continue scan;
			}
			case "body": {
				if (typeof token === "undefined") {
					break scan;
				}

				if (token.kind !== "string") {
					return unexpected(token, end, "string literal");
				}

				template.push({ kind: "literal", text: token.value, span: token.span });
				cursor++;

				const marker: Token | undefined = tokens[cursor];
				if (typeof marker === "undefined") {
					break scan;
				}

				const mode =
					marker.kind === "punct" ? markers.get(marker.value) : undefined;
				if (typeof mode === "undefined") {
					return unexpected(marker, end, "`:`", "`#`");
				}
				cursor++;

				const reference: Token | undefined = tokens[cursor];
				if (reference?.kind !== "ident") {
					return unexpected(reference, end, "identifier");
				}

				template.push({
					kind: "placeholder",
					mode,
					identifier: reference.value,
					span: reference.span,
				});
				cursor++;
			}
		}
	}

	return Either.right({
		parameters,
		template,
		references: references(template),
	});
};

/** parses a single identifier and nothing else */
export const parseIdentifier = ({
	tokens,
	end,
}: Tokens): Either.Either<Identifier, GrammarError> => {
	const first: Token | undefined = tokens[0];
	if (first?.kind !== "ident") {
		return unexpected(first, end, "identifier");
	}

	const trailing: Token | undefined = tokens[1];
	if (typeof trailing !== "undefined") {
		return unexpected(trailing, end, "end of input");
	}

	return Either.right(first.value);
};
