// mixscope Definitions
// Immutable per-origin contributions and the builders that produce them

import { z } from "zod/v4";
import { MixscopeError } from "./errors.ts";
import { lexical } from "./references.ts";
import type { Reference } from "./references.ts";

//==============================================================================
// Evaluator Definitions
//==============================================================================

export interface DependencyDeclaration {
	readonly name: string;
	readonly reference: Reference;
}

/**
 * A computation over named dependencies. `run` receives the evaluated
 * dependency values keyed by name; `resource` is the path of the resource
 * being evaluated, used in diagnostics.
 */
export interface Computation<T> {
	readonly dependencies: readonly DependencyDeclaration[];
	run(resource: string, values: ReadonlyMap<string, unknown>): T;
}

export type Aggregator = (patches: Iterable<unknown>) => unknown;

/** Functional merger: computes an aggregation over every patch */
export interface MergeEvaluator {
	readonly kind: "merge";
	readonly computation: Computation<Aggregator>;
}

/** Endofunction merger: computes a base value that patches are folded over */
export interface ResourceEvaluator {
	readonly kind: "resource";
	readonly computation: Computation<unknown>;
}

export interface PatchEvaluator {
	readonly kind: "patch";
	readonly computation: Computation<unknown>;
}

export interface PatchesEvaluator {
	readonly kind: "patches";
	readonly computation: Computation<Iterable<unknown>>;
}

export type EvaluatorDefinition =
	| MergeEvaluator
	| ResourceEvaluator
	| PatchEvaluator
	| PatchesEvaluator;

export type MergerDefinition = MergeEvaluator | ResourceEvaluator;
export type PatcherDefinition = PatchEvaluator | PatchesEvaluator;

export function isMerger(evaluator: EvaluatorDefinition): evaluator is MergerDefinition {
	return evaluator.kind === "merge" || evaluator.kind === "resource";
}

export function isPatcher(evaluator: EvaluatorDefinition): evaluator is PatcherDefinition {
	return evaluator.kind === "patch" || evaluator.kind === "patches";
}

//==============================================================================
// Definitions
//==============================================================================

interface DefinitionBase {
	readonly isPublic: boolean;
	readonly isEager: boolean;
	/** Inheritance references, resolved relative to the defining symbol */
	readonly bases: readonly Reference[];
}

export interface ScopeDefinition extends DefinitionBase {
	readonly kind: "scope";
	/** Several definitions under one key are separate origins of the same child */
	readonly children: ReadonlyMap<string, readonly Definition[]>;
}

export interface ResourceDefinition extends DefinitionBase {
	readonly kind: "resource";
	/** Empty for an extern: a placeholder that only receives patches */
	readonly evaluators: readonly EvaluatorDefinition[];
}

export type Definition = ScopeDefinition | ResourceDefinition;

export interface DefinitionOptions {
	readonly public?: boolean;
	readonly eager?: boolean;
	readonly extends?: Reference | readonly Reference[];
}

//==============================================================================
// Builders
//==============================================================================

function isReferenceList(value: Reference | readonly Reference[]): value is readonly Reference[] {
	return Array.isArray(value);
}

function isDefinitionList(value: Definition | readonly Definition[]): value is readonly Definition[] {
	return Array.isArray(value);
}

function baseFields(options: DefinitionOptions): DefinitionBase {
	const declared = options.extends ?? [];
	return {
		isPublic: options.public ?? false,
		isEager: options.eager ?? false,
		bases: Object.freeze(isReferenceList(declared) ? [...declared] : [declared]),
	};
}

function resourceDefinition(
	evaluators: readonly EvaluatorDefinition[],
	options: DefinitionOptions,
): ResourceDefinition {
	const definition: ResourceDefinition = { kind: "resource", ...baseFields(options), evaluators };
	return Object.freeze(definition);
}

/** A namespace of child definitions */
export function scope(
	children: Readonly<Record<string, Definition | readonly Definition[]>>,
	options: DefinitionOptions = {},
): ScopeDefinition {
	const table = new Map<string, readonly Definition[]>();
	for (const [key, value] of Object.entries(children)) {
		table.set(key, Object.freeze(isDefinitionList(value) ? [...value] : [value]));
	}
	const definition: ScopeDefinition = { kind: "scope", ...baseFields(options), children: table };
	return Object.freeze(definition);
}

/** A resource with no merger of its own; its base value comes from instance kwargs */
export function extern(options: DefinitionOptions = {}): ResourceDefinition {
	return resourceDefinition([], options);
}

interface Issue {
	readonly path: readonly PropertyKey[];
	readonly message: string;
}

function formatIssues(issues: readonly Issue[]): string {
	return issues
		.map((issue) => (issue.path.map(String).join(".") || "$") + ": " + issue.message)
		.join("; ");
}

/**
 * Check `value` against `schema` without adopting zod's output: the value
 * keeps its identity, prototype and extra fields. Failures go to `issues`.
 */
function conforms<S extends z.ZodType>(schema: S, value: unknown, issues: Issue[]): value is z.output<S> {
	const parsed = schema.safeParse(value);
	if (parsed.success) return true;
	issues.push(...parsed.error.issues);
	return false;
}

/**
 * Builder for evaluators with named dependencies. Each dependency is
 * checked against its zod schema before the computation sees it. Schemas
 * only check: the computation receives the injected values themselves, so
 * transforms and defaults in a schema do not apply. The reference defaults
 * to a lexical lookup of the dependency name.
 */
export class Dependencies<T extends z.ZodObject> {
	private readonly declarations: readonly DependencyDeclaration[];

	constructor(
		private readonly schema: T,
		references: Readonly<Record<string, Reference>> = {},
	) {
		const names = Object.keys(schema.shape);
		for (const name of Object.keys(references)) {
			if (!names.includes(name)) {
				throw MixscopeError.validation(name, "reference given for an undeclared dependency");
			}
		}
		this.declarations = Object.freeze(names.map((name) => ({
			name,
			reference: references[name] ?? lexical(name),
		})));
	}

	private computation<R>(body: (deps: z.output<T>) => R): Computation<R> {
		const schema = this.schema;
		return {
			dependencies: this.declarations,
			run(resource, values) {
				const deps = Object.fromEntries(values);
				const issues: Issue[] = [];
				if (!conforms(schema, deps, issues)) {
					throw MixscopeError.dependencyType(resource, formatIssues(issues));
				}
				return body(deps);
			},
		};
	}

	/** Endofunction merger: `compute` returns the base value */
	resource(compute: (deps: z.output<T>) => unknown, options: DefinitionOptions = {}): ResourceDefinition {
		return resourceDefinition([{ kind: "resource", computation: this.computation(compute) }], options);
	}

	/**
	 * Functional merger: `compute` returns an aggregation over every patch
	 * contributed to the resource. Patches are validated by `patchSchema`.
	 */
	merge<P, R>(
		patchSchema: z.ZodType<P>,
		compute: (deps: z.output<T>) => (patches: Iterable<P>) => R,
		options: DefinitionOptions = {},
	): ResourceDefinition {
		const computation = this.computation((deps): Aggregator => {
			const aggregate = compute(deps);
			return (patches) => aggregate(validatedPatches(patchSchema, patches));
		});
		return resourceDefinition([{ kind: "merge", computation }], options);
	}

	/** Patcher contributing exactly one patch */
	patch(compute: (deps: z.output<T>) => unknown, options: DefinitionOptions = {}): ResourceDefinition {
		return resourceDefinition([{ kind: "patch", computation: this.computation(compute) }], options);
	}

	/** Patcher contributing zero or more patches */
	patches(compute: (deps: z.output<T>) => Iterable<unknown>, options: DefinitionOptions = {}): ResourceDefinition {
		return resourceDefinition([{ kind: "patches", computation: this.computation(compute) }], options);
	}
}

function* validatedPatches<P>(schema: z.ZodType<P>, patches: Iterable<unknown>): Generator<P> {
	let index = 0;
	for (const patch of patches) {
		const issues: Issue[] = [];
		if (!conforms(schema, patch, issues)) {
			throw MixscopeError.validation("patch[" + index + "]", formatIssues(issues), patch);
		}
		index++;
		yield patch;
	}
}

/**
 * Declare dependencies for an evaluator.
 *
 * @example
 * given({ base: z.number() }).resource(({ base }) => base + 1)
 */
export function given<Shape extends Record<string, z.ZodType>>(
	shape: Shape,
	references: Readonly<Record<string, Reference>> = {},
) {
	return new Dependencies(z.object(shape), references);
}

const none = given({});

export function resource(compute: () => unknown, options: DefinitionOptions = {}): ResourceDefinition {
	return none.resource(compute, options);
}

export function merge<P, R>(
	patchSchema: z.ZodType<P>,
	compute: () => (patches: Iterable<P>) => R,
	options: DefinitionOptions = {},
): ResourceDefinition {
	return none.merge(patchSchema, compute, options);
}

export function patch(compute: () => unknown, options: DefinitionOptions = {}): ResourceDefinition {
	return none.patch(compute, options);
}

export function patches(compute: () => Iterable<unknown>, options: DefinitionOptions = {}): ResourceDefinition {
	return none.patches(compute, options);
}
