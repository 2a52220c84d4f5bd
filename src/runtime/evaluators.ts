// mixscope Resource Evaluation
// Merger election, patch collection and folding

import type { Computation } from "../definitions.ts";
import { exhaustive, MixscopeError } from "../errors.ts";
import { ResolutionError } from "../resolution/resolution-errors.ts";
import { resolveReference } from "../resolution/resolver.ts";
import type { MixinSymbol } from "../symbol-tree/symbol.ts";
import { EndofunctionSchema } from "../zod-schemas.ts";
import type { Mixin } from "./mixin.ts";

//==============================================================================
// Dependencies
//==============================================================================

function dependencyMixin(mixin: Mixin, site: MixinSymbol, target: MixinSymbol): Mixin {
	if (site === mixin.symbol) {
		const wired = mixin.sibling(target);
		if (wired !== undefined) return wired;
	}
	return mixin.findMixin(target);
}

/**
 * Run a computation declared at `site`, bound to `mixin`. Each dependency
 * resolves from (mixin.symbol, site); the first target wins.
 */
function run<T>(mixin: Mixin, site: MixinSymbol, computation: Computation<T>): T {
	const values = new Map<string, unknown>();
	for (const dependency of computation.dependencies) {
		let targets: readonly MixinSymbol[];
		try {
			targets = resolveReference(dependency.reference, { current: mixin.symbol, origin: site });
		} catch (error) {
			if (error instanceof ResolutionError) {
				throw MixscopeError.missingDependency(mixin.path, dependency.name, error);
			}
			throw error;
		}
		const [target] = targets;
		if (target === undefined) {
			throw MixscopeError.missingDependency(mixin.path, dependency.name);
		}
		values.set(dependency.name, dependencyMixin(mixin, site, target).evaluated);
	}
	return computation.run(mixin.path, values);
}

//==============================================================================
// Patches
//==============================================================================

/** Every patch contributed to the resource, in `[self, ...strictSuper]` order */
function* collectPatches(mixin: Mixin): Generator<unknown> {
	for (const { site, evaluator } of mixin.symbol.evaluatorSites) {
		switch (evaluator.kind) {
		case "patch":
			yield run(mixin, site, evaluator.computation);
			break;
		case "patches":
			yield* run(mixin, site, evaluator.computation);
			break;
		case "merge":
		case "resource":
			break;
		default:
			exhaustive(evaluator);
		}
	}
}

function fold(mixin: Mixin, base: unknown): unknown {
	let value = base;
	for (const patch of collectPatches(mixin)) {
		const parsed = EndofunctionSchema.safeParse(patch);
		if (!parsed.success) {
			throw MixscopeError.invalidPatch(mixin.path);
		}
		value = parsed.data(value);
	}
	return value;
}

//==============================================================================
// Resource Evaluation
//==============================================================================

export function evaluateResource(mixin: Mixin): unknown {
	const symbol = mixin.symbol;
	const election = symbol.election;
	switch (election.kind) {
	case "ambiguous":
		throw MixscopeError.ambiguousAggregation(
			mixin.path,
			election.contributors.map((contributor) => contributor.toString()),
		);
	case "elected": {
		const merger = election.merger;
		if (merger.kind === "merge") {
			const aggregate = run(mixin, election.site, merger.computation);
			return aggregate(collectPatches(mixin));
		}
		return fold(mixin, run(mixin, election.site, merger.computation));
	}
	case "patcherOnly": {
		const key = symbol.key ?? "";
		if (mixin.kwargs.kind !== "instance") {
			throw MixscopeError.missingBaseValue(mixin.path, key, false);
		}
		if (!Object.hasOwn(mixin.kwargs.values, key)) {
			throw MixscopeError.missingBaseValue(mixin.path, key, true);
		}
		return fold(mixin, mixin.kwargs.values[key]);
	}
	default:
		return exhaustive(election);
	}
}
