#!/usr/bin/env node
/** biome-ignore-all lint/suspicious/noConsole: is a tool */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { parseArgs } from "node:util";

import { Schema } from "effect";

import { config as _config } from "./config";
import { logger } from "./logger";
import { Expander, formatDiagnostic } from "./service/expand";
import { ValidationMode } from "./service/validate";

const isValidationMode = Schema.is(Schema.Enums(ValidationMode));

async function main(): Promise<void> {
	const config = _config();

	// finalize logger configuration here to not make main logger
	// setup depend on environment
	logger.level = config.logLevel;

	const { values, positionals } = parseArgs({
		options: {
			out: { type: "string", short: "o" },
			validate: { type: "string" },
		},
		allowPositionals: true,
	});

	if (positionals.length !== 1) {
		console.error(
			"expected exactly one positional parameter (source file to expand)",
		);
		process.exit(1);
	}
	const [input] = positionals;

	let validation = config.validation;
	if (typeof values.validate !== "undefined") {
		if (!isValidationMode(values.validate)) {
			console.error(
				`invalid validation mode <${values.validate}> (supported: ${Object.values(ValidationMode).join(", ")})`,
			);
			process.exit(1);
		}

		validation = values.validate;
	}

	const source = await readFile(input, "utf8");
	const { code, diagnostics, expanded } = new Expander({ validation }).expand(
		source,
	);

	let failed = false;
	for (const diagnostic of diagnostics) {
		if (diagnostic.severity === "error") {
			failed = true;
			logger.error(formatDiagnostic(input, diagnostic));
		} else {
			logger.warn(formatDiagnostic(input, diagnostic));
		}
	}

	if (failed) {
		process.exitCode = 1;
		return;
	}

	if (typeof values.out === "undefined") {
		process.stdout.write(code);
	} else {
		await mkdir(dirname(values.out), { recursive: true });
		await writeFile(values.out, code);
	}

	logger.info("expanded", { input, out: values.out ?? "-", expanded });
}

main().catch((e) => {
	logger.error("fatal error");
	console.error(e);

	process.exit(1);
});
