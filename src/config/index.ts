import { Schema } from "effect";

import { ValidationMode } from "../service/validate";
import { envChoice, envString, required } from "./utility";

/* c8 ignore start */
export const config = () =>
	({
		logLevel: envString(required("LOG_LEVEL", "info")),
		/** cross-check declared parameters against template placeholders */
		validation: envChoice(Schema.Enums(ValidationMode))(
			required("SQL_ARGS_VALIDATE", ValidationMode.Off),
		),
	}) as const;
/* c8 ignore stop */

export type Config = ReturnType<typeof config>;
