import type { Identifier } from "../../type/codec/identifier";

/** uppercase form of an identifier, used as the bind name of named arguments */
export const canonicalName = (identifier: Identifier): string =>
	identifier.toUpperCase();
