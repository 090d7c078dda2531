import { type TestContext, test } from "node:test";

import { Either } from "effect";

import { parseMap } from "../grammar";
import { tokenize } from "../grammar/token";
import { describeFinding, type Finding, validate } from ".";

const findings = (source: string) =>
	validate(Either.getOrThrow(parseMap(Either.getOrThrow(tokenize(source)))));

const summarize = (finding: Finding) =>
	finding.kind === "undeclared"
		? [finding.kind, finding.placeholder.identifier]
		: [finding.kind, finding.parameter.identifier];

test("validate / consistent", (t: TestContext) => {
	t.assert.deepStrictEqual(
		findings(`a b => "x = " :a " AND y IN (" #b ")"`),
		[],
	);
	// repetition and reordering are fine
	t.assert.deepStrictEqual(findings(`a b => "x" :b "y" :a "z" :b`), []);
});

test("validate / mismatches", (t: TestContext) => {
	t.assert.deepStrictEqual(
		findings(`a1 a2 a3 => "x" :a1 " y " :a2 " z " :a4`).map(summarize),
		[
			["unreferenced", "a3"],
			["undeclared", "a4"],
		],
	);
});

test("validate / duplicate parameter", (t: TestContext) => {
	const found = findings(`a a b => "x" :a "y" :b`);

	t.assert.deepStrictEqual(found.map(summarize), [
		["duplicate-parameter", "a"],
	]);
	t.assert.deepStrictEqual(describeFinding(found[0]), {
		message: "parameter `a` declared more than once",
		span: { offset: 2, line: 1, column: 3 },
	});
});

test("validate / every undeclared occurrence", (t: TestContext) => {
	const found = findings(`a => "x" :a "y" :b "z" :b`);

	t.assert.deepStrictEqual(
		found.map((finding) => describeFinding(finding)),
		[
			{
				message: "placeholder `b` names no declared parameter",
				span: { offset: 17, line: 1, column: 18 },
			},
			{
				message: "placeholder `b` names no declared parameter",
				span: { offset: 24, line: 1, column: 25 },
			},
		],
	);
});
