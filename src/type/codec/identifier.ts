import { Schema } from "effect";

export const Identifier = Schema.String.pipe(
	Schema.pattern(/^[\p{ID_Start}_$][\p{ID_Continue}$]*$/u),
	Schema.brand("Identifier"),
);
export type Identifier = typeof Identifier.Type;
