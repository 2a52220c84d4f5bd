// mixscope - mixin-based configuration and dependency injection
// Resolution and evaluation engine

//==============================================================================
// References
//==============================================================================

export {
	absolute,
	formatReference,
	lexical,
	parseReference,
	qualifiedThis,
	relative,
} from "./references.ts";
export type {
	AbsoluteReference,
	LexicalReference,
	QualifiedThisReference,
	Reference,
	RelativeReference,
} from "./references.ts";

//==============================================================================
// Definitions
//==============================================================================

export {
	Dependencies,
	extern,
	given,
	isMerger,
	isPatcher,
	merge,
	patch,
	patches,
	resource,
	scope,
} from "./definitions.ts";
export type {
	Aggregator,
	Computation,
	Definition,
	DefinitionOptions,
	DependencyDeclaration,
	EvaluatorDefinition,
	MergerDefinition,
	PatcherDefinition,
	ResourceDefinition,
	ScopeDefinition,
} from "./definitions.ts";

//==============================================================================
// Symbol Tree and Resolution
//==============================================================================

export { MixinSymbol } from "./symbol-tree/symbol.ts";
export type { SymbolTreeOptions } from "./symbol-tree/symbol.ts";
export type { Election, EvaluatorSite, SymbolKind } from "./symbol-tree/election.ts";
export type { Contributor } from "./symbol-tree/linearization.ts";
export { ascend, navigate, resolveReference } from "./resolution/resolver.ts";
export type { ResolutionSite } from "./resolution/resolver.ts";

//==============================================================================
// Runtime
//==============================================================================

export { evaluate } from "./runtime/evaluate.ts";
export { Mixin } from "./runtime/mixin.ts";
export type { EvaluationContext, KwargsState } from "./runtime/mixin.ts";
export { InstanceScope, Scope, StaticScope } from "./runtime/scope.ts";

//==============================================================================
// Validation and Schemas
//==============================================================================

export { validateDefinitions, validateSymbolTree } from "./validator.ts";
export { isReferenceSchema, referenceSchema } from "./schemas.ts";
export {
	EndofunctionSchema,
	EvaluateOptionsSchema,
	KwargsSchema,
	ReferenceSchema,
	ValidateOptionsSchema,
} from "./zod-schemas.ts";
export type { EvaluateOptions, Kwargs, ValidateOptions } from "./zod-schemas.ts";

//==============================================================================
// Errors
//==============================================================================

export {
	annotateError,
	ErrorCodes,
	exhaustive,
	invalidResult,
	MixscopeError,
	validResult,
} from "./errors.ts";
export type { ErrorCode, ValidationError, ValidationResult } from "./errors.ts";
export {
	AnchorNotFoundError,
	AscentBeyondRootError,
	InvalidReferenceError,
	NoSuchChildError,
	ResolutionError,
	ResolutionErrorCode,
	UnresolvedReferenceError,
} from "./resolution/resolution-errors.ts";
