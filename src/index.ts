export { GrammarError } from "./service/grammar/error";
export {
	BindingMode,
	parseIdentifier,
	parseMap,
	references,
} from "./service/grammar";
export type {
	DeclaredParameter,
	ParsedMap,
	Segment,
	SegmentLiteral,
	SegmentPlaceholder,
} from "./service/grammar";
export { Locator } from "./service/grammar/locate";
export type { Span } from "./service/grammar/locate";
export { describeToken, tokenize } from "./service/grammar/token";
export type { Range, Token, Tokens } from "./service/grammar/token";
export { build, Decision, decide, map, pad } from "./service/mapping";
export type {
	Expression,
	NamedPair,
	PositionalElement,
} from "./service/mapping";
export { render, renderString, UNIT } from "./service/mapping/render";
export { canonicalName } from "./service/normalize";
export { expandMap, expandToUppercase } from "./service/macro";
export type { MapExpansion } from "./service/macro";
export { describeFinding, ValidationMode, validate } from "./service/validate";
export type { Finding } from "./service/validate";
export { Expander, formatDiagnostic } from "./service/expand";
export type {
	Diagnostic,
	ExpanderOptions,
	ExpandResult,
} from "./service/expand";
export { Identifier } from "./type/codec/identifier";
