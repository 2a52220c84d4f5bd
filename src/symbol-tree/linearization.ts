// SPDX-License-Identifier: MIT
// Inheritance linearization for mixin symbols

import { MixscopeError } from "../errors.ts";
import { resolveReference } from "../resolution/resolver.ts";
import type { MixinSymbol } from "./symbol.ts";

//==============================================================================
// Types
//==============================================================================

/**
 * A direct contributor of a symbol. `base` contributors come from the
 * inheritance references of the symbol's own definitions; `outer`
 * contributors are same-key children of the enclosing symbol's supers.
 */
export interface Contributor {
	readonly symbol: MixinSymbol;
	readonly via: "base" | "outer";
}

export interface Linearization {
	readonly contributors: readonly Contributor[];
	/** Linearized ancestors, nearest first, without the symbol itself */
	readonly strictSuper: readonly MixinSymbol[];
	/** For each strict super, the direct contributors it was reached through */
	readonly reverseIndex: ReadonlyMap<MixinSymbol, readonly Contributor[]>;
}

//==============================================================================
// Linearization
//==============================================================================

export function directContributors(symbol: MixinSymbol): Contributor[] {
	const contributors: Contributor[] = [];
	const seen = new Set<MixinSymbol>();
	const add = (target: MixinSymbol, via: Contributor["via"]): void => {
		if (seen.has(target)) return;
		seen.add(target);
		contributors.push({ symbol: target, via });
	};

	const site = { current: symbol, origin: symbol };
	for (const definition of symbol.origin) {
		for (const base of definition.bases) {
			for (const target of resolveReference(base, site)) {
				add(target, "base");
			}
		}
	}

	const key = symbol.key;
	if (symbol.outer !== null && key !== undefined) {
		for (const enclosing of symbol.outer.strictSuper) {
			const inherited = enclosing.get(key);
			if (inherited !== undefined) add(inherited, "outer");
		}
	}
	return contributors;
}

/**
 * Depth-first, first-occurrence-wins merge of every contributor followed by
 * its own linearization.
 */
export function linearize(symbol: MixinSymbol): Linearization {
	const contributors = directContributors(symbol);
	const reverseIndex = new Map<MixinSymbol, Contributor[]>();

	for (const contributor of contributors) {
		for (const ancestor of [contributor.symbol, ...contributor.symbol.strictSuper]) {
			if (ancestor === symbol) {
				throw MixscopeError.inheritanceCycle(symbol.toString());
			}
			const routes = reverseIndex.get(ancestor);
			if (routes === undefined) {
				reverseIndex.set(ancestor, [contributor]);
			} else if (!routes.includes(contributor)) {
				routes.push(contributor);
			}
		}
	}

	return {
		contributors,
		strictSuper: [...reverseIndex.keys()],
		reverseIndex,
	};
}
