import type { Identifier } from "../../type/codec/identifier";
import { canonicalName } from "../normalize";

export const Decision = {
	/** single parameter, bound as is */
	Direct: "direct",
	/** parameters referenced once each, in declaration order */
	Positional: "positional",
	/** positional with exactly two values, padded to three */
	PositionalPad: "positional-pad",
	/** parameters referenced repeatedly, partially or out of order */
	Named: "named",
} as const;
export type Decision = (typeof Decision)[keyof typeof Decision];

export type PositionalElement =
	| { kind: "value"; value: Identifier }
	| { kind: "unit" };

export type NamedPair = { name: string; value: Identifier };

export type ExpressionDirect = { kind: "direct"; value: Identifier };
export type ExpressionPositional = {
	kind: "positional";
	elements: PositionalElement[];
};
export type ExpressionNamed = { kind: "named"; pairs: NamedPair[] };

export type Expression =
	| ExpressionDirect
	| ExpressionPositional
	| ExpressionNamed;

const sameSequence = (
	left: readonly Identifier[],
	right: readonly Identifier[],
): boolean =>
	left.length === right.length &&
	left.every((identifier, idx) => identifier === right[idx]);

export const decide = (
	parameters: readonly Identifier[],
	references: readonly Identifier[],
): Decision => {
	if (parameters.length === 1) {
		return Decision.Direct;
	}

	if (sameSequence(parameters, references)) {
		return parameters.length === 2
			? Decision.PositionalPad
			: Decision.Positional;
	}

	return Decision.Named;
};

const positional = (
	parameters: readonly Identifier[],
): ExpressionPositional => ({
	kind: "positional",
	elements: parameters.map(
		(value): PositionalElement => ({ kind: "value", value }),
	),
});

/** the binder takes two positional values only as a triple ending in unit */
export const pad = (
	expression: ExpressionPositional,
): ExpressionPositional => ({
	kind: "positional",
	elements: [...expression.elements, { kind: "unit" }],
});

const named = (parameters: readonly Identifier[]): ExpressionNamed => ({
	kind: "named",
	pairs: parameters.map((value) => ({ name: canonicalName(value), value })),
});

export const build = (
	parameters: readonly Identifier[],
	decision: Decision,
): Expression => {
	switch (decision) {
		case Decision.Direct: {
			const [value] = parameters;
			return { kind: "direct", value };
		}
		case Decision.Positional:
			return positional(parameters);
		case Decision.PositionalPad:
			return pad(positional(parameters));
		case Decision.Named:
			return named(parameters);
	}
};

/** decides the shape for the given parameters and references and builds it */
export const map = (
	parameters: readonly Identifier[],
	references: readonly Identifier[],
): { decision: Decision; expression: Expression } => {
	const decision = decide(parameters, references);
	return { decision, expression: build(parameters, decision) };
};
