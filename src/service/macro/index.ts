import { Either } from "effect";

import type { GrammarError } from "../grammar/error";
import { parseIdentifier, parseMap, type ParsedMap } from "../grammar";
import type { Locator } from "../grammar/locate";
import { type Range, tokenize } from "../grammar/token";
import { type Decision, type Expression, map } from "../mapping";
import { render, renderString } from "../mapping/render";
import { canonicalName } from "../normalize";

export type MapExpansion = {
	code: string;
	parsed: ParsedMap;
	decision: Decision;
	expression: Expression;
};

/** `map(a1 a2 => "… " :a1 " … " #a2)` */
export const expandMap = (
	source: string,
	range?: Range,
	locator?: Locator,
): Either.Either<MapExpansion, GrammarError> => {
	const tokenized = tokenize(source, range, locator);
	if (Either.isLeft(tokenized)) {
		return Either.left(tokenized.left);
	}

	const parsed = parseMap(tokenized.right);
	if (Either.isLeft(parsed)) {
		return Either.left(parsed.left);
	}

	const { decision, expression } = map(
		parsed.right.parameters.map((parameter) => parameter.identifier),
		parsed.right.references,
	);

	return Either.right({
		code: render(expression),
		parsed: parsed.right,
		decision,
		expression,
	});
};

/** `to_uppercase(param_name)` → `"PARAM_NAME"` */
export const expandToUppercase = (
	source: string,
	range?: Range,
	locator?: Locator,
): Either.Either<string, GrammarError> => {
	const tokenized = tokenize(source, range, locator);
	if (Either.isLeft(tokenized)) {
		return Either.left(tokenized.left);
	}

	const identifier = parseIdentifier(tokenized.right);
	if (Either.isLeft(identifier)) {
		return Either.left(identifier.left);
	}

	return Either.right(renderString(canonicalName(identifier.right)));
};
