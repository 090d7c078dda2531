import { type TestContext, test } from "node:test";

import { config } from ".";

const withEnv = <T>(
	env: Record<string, string | undefined>,
	fn: () => T,
): T => {
	const previous = Object.fromEntries(
		Object.keys(env).map((key) => [key, process.env[key]]),
	);
	const assign = (values: Record<string, string | undefined>) => {
		for (const [key, value] of Object.entries(values)) {
			if (typeof value === "undefined") {
				delete process.env[key];
			} else {
				process.env[key] = value;
			}
		}
	};

	assign(env);
	try {
		return fn();
	} finally {
		assign(previous);
	}
};

test("config defaults", (t: TestContext) => {
	const c = withEnv(
		{ LOG_LEVEL: undefined, SQL_ARGS_VALIDATE: undefined },
		config,
	);

	t.assert.deepStrictEqual(c, { logLevel: "info", validation: "off" });
});

test("config sourced", (t: TestContext) => {
	const c = withEnv(
		{ LOG_LEVEL: "debug", SQL_ARGS_VALIDATE: "warn" },
		config,
	);

	t.assert.deepStrictEqual(c, { logLevel: "debug", validation: "warn" });
});
