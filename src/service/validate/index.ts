import type { Identifier } from "../../type/codec/identifier";
import type { Span } from "../grammar/locate";
import type {
	DeclaredParameter,
	ParsedMap,
	SegmentPlaceholder,
} from "../grammar";

export const ValidationMode = {
	Off: "off",
	Warn: "warn",
	Error: "error",
} as const;
export type ValidationMode =
	(typeof ValidationMode)[keyof typeof ValidationMode];

export type FindingDuplicateParameter = {
	kind: "duplicate-parameter";
	parameter: DeclaredParameter;
};
export type FindingUnreferenced = {
	kind: "unreferenced";
	parameter: DeclaredParameter;
};
export type FindingUndeclared = {
	kind: "undeclared";
	placeholder: SegmentPlaceholder;
};

export type Finding =
	| FindingDuplicateParameter
	| FindingUnreferenced
	| FindingUndeclared;

/**
 * cross-checks declared parameters against template placeholders
 *
 * the mapping itself never needs this, mismatches otherwise only surface when
 * the generated code is compiled
 */
export const validate = ({ parameters, template }: ParsedMap): Finding[] => {
	const findings: Finding[] = [];

	const declared = new Set<Identifier>();
	for (const parameter of parameters) {
		if (declared.has(parameter.identifier)) {
			findings.push({ kind: "duplicate-parameter", parameter });
		}
		declared.add(parameter.identifier);
	}

	const placeholders = template.filter(
		(segment): segment is SegmentPlaceholder => segment.kind === "placeholder",
	);
	const referenced = new Set(
		placeholders.map((placeholder) => placeholder.identifier),
	);

	for (const parameter of parameters) {
		if (!referenced.has(parameter.identifier)) {
			findings.push({ kind: "unreferenced", parameter });
		}
	}

	for (const placeholder of placeholders) {
		if (!declared.has(placeholder.identifier)) {
			findings.push({ kind: "undeclared", placeholder });
		}
	}

	return findings;
};

export const describeFinding = (
	finding: Finding,
): { message: string; span: Span } => {
	switch (finding.kind) {
		case "duplicate-parameter":
			return {
				message: `parameter \`${finding.parameter.identifier}\` declared more than once`,
				span: finding.parameter.span,
			};
		case "unreferenced":
			return {
				message: `parameter \`${finding.parameter.identifier}\` is never referenced in the template`,
				span: finding.parameter.span,
			};
		case "undeclared":
			return {
				message: `placeholder \`${finding.placeholder.identifier}\` names no declared parameter`,
				span: finding.placeholder.span,
			};
	}
};
