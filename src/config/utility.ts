import { Schema } from "effect";

const RequiredSymbol = Symbol("RequiredSymbol");
type KeyRequired<T> = {
	[RequiredSymbol]: {
		key: string;
		defaultValue?: T | undefined;
	};
};

type Env<K> =
	| { kind: "sourced"; value: string }
	| { kind: "default"; value: K };

/* node:coverage disable */
const environment = <K>(key: KeyRequired<K>): Env<K> => {
	const peeked = key[RequiredSymbol];
	const result = process.env[peeked.key];

	if (typeof result !== "undefined") {
		return { kind: "sourced", value: result };
	}

	if (typeof peeked.defaultValue !== "undefined") {
		return { kind: "default", value: peeked.defaultValue };
	}

	console.error(`environment variable '${peeked.key}' not set`);
	process.exit(1);
};
/* node:coverage enable */

export const required = <T>(key: string, defaultValue?: T): KeyRequired<T> => ({
	[RequiredSymbol]: { key, defaultValue },
});

export const envString = (key: KeyRequired<string>): string =>
	environment(key).value;

/** validates the variable against `choices`, exits on anything else */
export const envChoice =
	<T extends { [key: string]: string }>(choices: Schema.Enums<T>) =>
	(key: KeyRequired<T[keyof T]>): T[keyof T] => {
		const env = environment(key);
		if (env.kind === "default") {
			return env.value;
		}

		const guard = Schema.is(choices);
		if (!guard(env.value)) {
			console.error(
				`invalid choice for environment variable '${key[RequiredSymbol].key}' (allowed: ${Object.values(choices.enums).join(", ")})`,
			);
			process.exit(1);
		}

		return env.value;
	};
