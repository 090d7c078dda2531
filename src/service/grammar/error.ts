import type { Span } from "./locate";

export class GrammarError extends Error {
	/** message without the position suffix */
	public readonly reason: string;

	constructor(
		public found: string,
		public expected: readonly string[],
		public span: Span,
	) {
		const reason =
			expected.length > 0
				? `unexpected ${found}, expected ${expected.join(" or ")}`
				: `unexpected ${found}`;
		super(`${reason} at ${span.line}:${span.column}`);
		this.reason = reason;
		Object.setPrototypeOf(this, GrammarError.prototype);
	}
}
