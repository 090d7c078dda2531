import { type TestContext, test } from "node:test";

import { Either } from "effect";

import { parseIdentifier, parseMap } from ".";
import { tokenize } from "./token";

const parse = (source: string) => parseMap(Either.getOrThrow(tokenize(source)));
const parseError = (source: string) =>
	Either.getOrThrow(Either.flip(parse(source)));

test("parse", (t: TestContext) => {
	const parsed = Either.getOrThrow(
		parse(
			`a1 a2 a3 => "UPDATE xxx SET a = " :a1 ", :b = " :a2 " WHERE c IN (" #a3 ")"`,
		),
	);

	t.assert.deepStrictEqual(
		parsed.parameters.map(({ identifier, position }) => [identifier, position]),
		[
			["a1", 0],
			["a2", 1],
			["a3", 2],
		],
	);
	t.assert.deepStrictEqual(
		parsed.template.map((segment) =>
			segment.kind === "literal"
				? ["literal", segment.text]
				: ["placeholder", segment.mode, segment.identifier],
		),
		[
			["literal", "UPDATE xxx SET a = "],
			["placeholder", "value", "a1"],
			["literal", ", :b = "],
			["placeholder", "value", "a2"],
			["literal", " WHERE c IN ("],
			["placeholder", "reference", "a3"],
			["literal", ")"],
		],
	);
	t.assert.deepStrictEqual(parsed.references, ["a1", "a2", "a3"]);
});

test("parse / duplicates and order preserved", (t: TestContext) => {
	const parsed = Either.getOrThrow(
		parse(
			`id name data => "a = " :name ", b = " :name ", c = " :data " WHERE i = " :id " OR ( x = " :name " AND i != " :id ")"`,
		),
	);

	t.assert.deepStrictEqual(
		parsed.parameters.map(({ identifier }) => identifier),
		["id", "name", "data"],
	);
	t.assert.deepStrictEqual(parsed.references, [
		"name",
		"name",
		"data",
		"id",
		"name",
		"id",
	]);
});

test("parse / template ending in placeholder", (t: TestContext) => {
	const parsed = Either.getOrThrow(parse(`a => "x = " #a`));

	t.assert.strictEqual(parsed.template.length, 2);
	t.assert.deepStrictEqual(parsed.template[1], {
		kind: "placeholder",
		mode: "reference",
		identifier: "a",
		span: { offset: 13, line: 1, column: 14 },
	});
});

test("parse / empty body", (t: TestContext) => {
	const parsed = Either.getOrThrow(parse("a =>"));

	t.assert.deepStrictEqual(parsed.template, []);
	t.assert.deepStrictEqual(parsed.references, []);
});

test("parse / no parameters", (t: TestContext) => {
	const parsed = Either.getOrThrow(parse(`=> "SELECT 1"`));

	t.assert.deepStrictEqual(parsed.parameters, []);
	t.assert.deepStrictEqual(parsed.template, [
		{
			kind: "literal",
			text: "SELECT 1",
			span: { offset: 3, line: 1, column: 4 },
		},
	]);
});

test("parse / missing separator", (t: TestContext) => {
	const error = parseError("a b");

	t.assert.strictEqual(error.found, "end of input");
	t.assert.deepStrictEqual(error.expected, ["identifier", "`=>`"]);
	t.assert.deepStrictEqual(error.span, { offset: 3, line: 1, column: 4 });
});

test("parse / literal in header", (t: TestContext) => {
	const error = parseError(`a "x" => "y"`);

	t.assert.strictEqual(error.found, `string literal "x"`);
	t.assert.strictEqual(error.span.offset, 2);
});

test("parse / unknown marker", (t: TestContext) => {
	const error = parseError(`a => "x" @a`);

	t.assert.strictEqual(
		error.message,
		"unexpected `@`, expected `:` or `#` at 1:10",
	);
});

test("parse / marker without identifier", (t: TestContext) => {
	{
		const error = parseError(`a => "x" :`);
		t.assert.strictEqual(error.found, "end of input");
		t.assert.deepStrictEqual(error.expected, ["identifier"]);
		t.assert.deepStrictEqual(error.span, {
			offset: 10,
			line: 1,
			column: 11,
		});
	}

	{
		const error = parseError(`a => "x" : "y"`);
		t.assert.strictEqual(error.found, `string literal "y"`);
		t.assert.strictEqual(error.span.offset, 11);
	}
});

test("parse / body without literal", (t: TestContext) => {
	const error = parseError("a => a");

	t.assert.strictEqual(
		error.reason,
		"unexpected identifier `a`, expected string literal",
	);
	t.assert.strictEqual(error.span.offset, 5);
});

test("parse / consecutive literals", (t: TestContext) => {
	const error = parseError(`a => "x" "y"`);

	t.assert.strictEqual(error.found, `string literal "y"`);
	t.assert.deepStrictEqual(error.expected, ["`:`", "`#`"]);
});

test("parse identifier", (t: TestContext) => {
	const identifier = (source: string) =>
		parseIdentifier(Either.getOrThrow(tokenize(source)));

	t.assert.strictEqual(
		Either.getOrThrow(identifier(" param_name ")),
		"param_name",
	);

	t.assert.strictEqual(
		Either.getOrThrow(Either.flip(identifier(""))).found,
		"end of input",
	);
	t.assert.strictEqual(
		Either.getOrThrow(Either.flip(identifier(`"a"`))).found,
		`string literal "a"`,
	);

	const trailing = Either.getOrThrow(Either.flip(identifier("a b")));
	t.assert.strictEqual(trailing.found, "identifier `b`");
	t.assert.deepStrictEqual(trailing.expected, ["end of input"]);
});
