// mixscope Zod Schemas
// Single source of truth for serializable references and option objects.
//
// Reference interfaces are defined manually (not via z.infer) so the public
// types stay readable in editors; the schemas are annotated with the explicit
// types to keep both in sync.

import { z } from "zod/v4";

//==============================================================================
// Primitives
//==============================================================================

/** A single path segment: a child key in the symbol tree */
const Segment = z.string().min(1);

const Path = z.array(Segment).readonly();

//==============================================================================
// Reference Domain - Manual Interfaces
//==============================================================================

export interface AbsoluteReference { readonly kind: "absolute"; readonly path: readonly string[] }
export interface RelativeReference { readonly kind: "relative"; readonly ascend: number; readonly path: readonly string[] }
export interface LexicalReference { readonly kind: "lexical"; readonly path: readonly [string, ...string[]] }
export interface QualifiedThisReference { readonly kind: "qualifiedThis"; readonly anchor: string; readonly path: readonly string[] }

export type Reference =
	| AbsoluteReference
	| RelativeReference
	| LexicalReference
	| QualifiedThisReference;

export type ReferenceKind = Reference["kind"];

//==============================================================================
// Reference Domain - Schemas
//==============================================================================

export const AbsoluteReferenceSchema: z.ZodType<AbsoluteReference> = z.object({
	kind: z.literal("absolute"),
	path: Path,
}).readonly();

export const RelativeReferenceSchema: z.ZodType<RelativeReference> = z.object({
	kind: z.literal("relative"),
	ascend: z.number().int().nonnegative(),
	path: Path,
}).readonly();

export const LexicalReferenceSchema: z.ZodType<LexicalReference> = z.object({
	kind: z.literal("lexical"),
	path: z.tuple([Segment], Segment).readonly(),
}).readonly();

export const QualifiedThisReferenceSchema: z.ZodType<QualifiedThisReference> = z.object({
	kind: z.literal("qualifiedThis"),
	anchor: Segment,
	path: Path,
}).readonly();

export const ReferenceSchema: z.ZodType<Reference> = z.union([
	AbsoluteReferenceSchema,
	RelativeReferenceSchema,
	LexicalReferenceSchema,
	QualifiedThisReferenceSchema,
]).describe("Reference");

//==============================================================================
// Option Schemas
//==============================================================================

export const EvaluateOptionsSchema = z.object({
	/** Expose every top-level name of the root, as if each were declared public */
	modulesPublic: z.boolean().default(false),
	/** Log mixin evaluation and scope instantiation through console.debug */
	trace: z.boolean().default(false),
});

export type EvaluateOptions = z.input<typeof EvaluateOptionsSchema>;
export type ResolvedEvaluateOptions = z.output<typeof EvaluateOptionsSchema>;

export const ValidateOptionsSchema = z.object({
	/** Breadth-first depth limit; qualified-this recursion can make the tree infinite */
	maxDepth: z.number().int().positive().default(6),
	/** Report every validation error through console.warn */
	warn: z.boolean().default(false),
});

export type ValidateOptions = z.input<typeof ValidateOptionsSchema>;

/** Keyword arguments bound into an instance scope */
export const KwargsSchema = z.record(z.string(), z.unknown());

export type Kwargs = z.output<typeof KwargsSchema>;

//==============================================================================
// Runtime Value Schemas
//==============================================================================

export type Endofunction = (value: unknown) => unknown;

function isEndofunction(value: unknown): value is Endofunction {
	return typeof value === "function";
}

/** Patch folded over a base value */
export const EndofunctionSchema = z.custom<Endofunction>(isEndofunction, {
	message: "Expected a function",
});
