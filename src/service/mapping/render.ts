import type { Expression, PositionalElement } from ".";

/** the empty marker value padding a two-value positional tuple */
export const UNIT = "[]";

export const renderString = (value: string): string => JSON.stringify(value);

const renderElement = (element: PositionalElement): string =>
	element.kind === "unit" ? UNIT : element.value;

/** prints an expression as TypeScript source */
export const render = (expression: Expression): string => {
	switch (expression.kind) {
		case "direct":
			return expression.value;
		case "positional":
			return `[${expression.elements.map(renderElement).join(", ")}]`;
		case "named":
			return `[${expression.pairs
				.map(({ name, value }) => `[${renderString(name)}, ${value}]`)
				.join(", ")}]`;
	}
};
