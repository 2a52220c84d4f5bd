// SPDX-License-Identifier: MIT
// Symbol kind, visibility and merger election

import { isMerger } from "../definitions.ts";
import type { Definition, EvaluatorDefinition, MergerDefinition } from "../definitions.ts";
import type { MixinSymbol } from "./symbol.ts";

export type SymbolKind = "scope" | "resource" | "conflict";

/** An evaluator together with the symbol whose definition declared it */
export interface EvaluatorSite {
	readonly site: MixinSymbol;
	readonly evaluator: EvaluatorDefinition;
}

export type Election =
	| { readonly kind: "elected"; readonly site: MixinSymbol; readonly merger: MergerDefinition }
	| { readonly kind: "patcherOnly" }
	| { readonly kind: "ambiguous"; readonly contributors: readonly MixinSymbol[] };

function* lineage(symbol: MixinSymbol): Generator<MixinSymbol> {
	yield symbol;
	yield* symbol.strictSuper;
}

function* lineageDefinitions(symbol: MixinSymbol): Generator<Definition> {
	for (const site of lineage(symbol)) {
		yield* site.origin;
	}
}

export function symbolKind(symbol: MixinSymbol): SymbolKind {
	let resourceShaped = false;
	for (const definition of lineageDefinitions(symbol)) {
		if (definition.kind === "resource") {
			resourceShaped = true;
			break;
		}
	}
	if (!resourceShaped) return "scope";
	return symbol.keys().length > 0 ? "conflict" : "resource";
}

export function hasFlag(symbol: MixinSymbol, flag: "isPublic" | "isEager"): boolean {
	for (const definition of lineageDefinitions(symbol)) {
		if (definition[flag]) return true;
	}
	return false;
}

/** Evaluator sites of `[symbol, ...strictSuper]`, in that order */
export function evaluatorSites(symbol: MixinSymbol): EvaluatorSite[] {
	const sites: EvaluatorSite[] = [];
	for (const site of lineage(symbol)) {
		for (const definition of site.origin) {
			if (definition.kind !== "resource") continue;
			for (const evaluator of definition.evaluators) {
				sites.push({ site, evaluator });
			}
		}
	}
	return sites;
}

export function elect(sites: readonly EvaluatorSite[]): Election {
	const mergers: { site: MixinSymbol; merger: MergerDefinition }[] = [];
	for (const { site, evaluator } of sites) {
		if (isMerger(evaluator)) mergers.push({ site, merger: evaluator });
	}
	const [first, ...rest] = mergers;
	if (first === undefined) return { kind: "patcherOnly" };
	if (rest.length === 0) return { kind: "elected", site: first.site, merger: first.merger };
	return { kind: "ambiguous", contributors: mergers.map((m) => m.site) };
}
