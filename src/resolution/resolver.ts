// SPDX-License-Identifier: MIT
// Reference resolution over the symbol tree
//
// A resolution site pairs the composition-site symbol (`current`) with the
// symbol whose definition declared the reference (`origin`). Ascending from
// an inherited origin follows the routes recorded in the reverse index, so
// references late-bind to the composing scope wherever inheritance came
// through an enclosing scope.

import type { Reference } from "../zod-schemas.ts";
import type { MixinSymbol } from "../symbol-tree/symbol.ts";
import {
	AnchorNotFoundError,
	AscentBeyondRootError,
	UnresolvedReferenceError,
} from "./resolution-errors.ts";

export interface ResolutionSite {
	readonly current: MixinSymbol;
	readonly origin: MixinSymbol;
}

//==============================================================================
// Site Helpers
//==============================================================================

function dedupe(sites: readonly ResolutionSite[]): ResolutionSite[] {
	const unique: ResolutionSite[] = [];
	for (const site of sites) {
		if (!unique.some((u) => u.current === site.current && u.origin === site.origin)) {
			unique.push(site);
		}
	}
	return unique;
}

function dedupeSymbols(symbols: readonly MixinSymbol[]): MixinSymbol[] {
	return [...new Set(symbols)];
}

/**
 * One lexical level up. Inherited origins may branch into several sites
 * when the same ancestor was reached along more than one route.
 */
export function ascend(site: ResolutionSite): ResolutionSite[] {
	const { current, origin } = site;
	if (origin === current) {
		if (current.outer === null) {
			throw new AscentBeyondRootError(current.toString());
		}
		return [{ current: current.outer, origin: current.outer }];
	}

	const routes = current.reverseIndex.get(origin) ?? [];
	const sites: ResolutionSite[] = [];
	for (const route of routes) {
		for (const above of ascend({ current: route.symbol, origin })) {
			if (route.via === "outer" && above.current === route.symbol.outer && current.outer !== null) {
				sites.push({ current: current.outer, origin: above.origin });
			} else {
				sites.push(above);
			}
		}
	}
	if (sites.length === 0) {
		throw new AscentBeyondRootError(current.toString());
	}
	return dedupe(sites);
}

function ascendAll(sites: readonly ResolutionSite[]): ResolutionSite[] {
	return dedupe(sites.flatMap((site) => ascend(site)));
}

/** Follow `path` down from `start`, one child per segment */
export function navigate(start: MixinSymbol, path: readonly string[]): MixinSymbol {
	let symbol = start;
	for (const segment of path) {
		symbol = symbol.child(segment);
	}
	return symbol;
}

//==============================================================================
// Reference Resolution
//==============================================================================

function resolveLexical(head: string, rest: readonly string[], site: ResolutionSite): MixinSymbol[] {
	let sites = ascend(site);
	if (head === site.current.key) {
		sites = ascendAll(sites.filter((s) => s.current.outer !== null));
	}
	for (;;) {
		const hits = sites.filter((s) => s.current.has(head));
		if (hits.length > 0) {
			return dedupeSymbols(hits.map((s) => navigate(s.current, [head, ...rest])));
		}
		const next = sites.filter((s) => s.current.outer !== null);
		if (next.length === 0) {
			throw new UnresolvedReferenceError(site.current.toString(), head);
		}
		sites = ascendAll(next);
	}
}

function resolveQualifiedThis(anchor: string, path: readonly string[], site: ResolutionSite): MixinSymbol[] {
	let sites = [site];
	for (;;) {
		const climbable = sites.filter((s) => s.current.outer !== null);
		if (climbable.length === 0) {
			throw new AnchorNotFoundError(site.current.toString(), anchor);
		}
		sites = ascendAll(climbable);
		const hits = sites.filter((s) => s.origin.key === anchor);
		if (hits.length > 0) {
			return dedupeSymbols(hits.map((s) => navigate(s.current, path)));
		}
	}
}

/**
 * Resolve `ref` declared at `site.origin` and composed at `site.current`.
 * Diamonds can yield more than one target; the result never contains
 * duplicates.
 */
export function resolveReference(ref: Reference, site: ResolutionSite): readonly MixinSymbol[] {
	switch (ref.kind) {
	case "absolute":
		return [navigate(site.current.root, ref.path)];
	case "relative": {
		let sites = ascend(site);
		for (let level = 0; level < ref.ascend; level++) {
			sites = ascendAll(sites);
		}
		return dedupeSymbols(sites.map((s) => navigate(s.current, ref.path)));
	}
	case "lexical": {
		const [head, ...rest] = ref.path;
		return resolveLexical(head, rest, site);
	}
	case "qualifiedThis":
		return resolveQualifiedThis(ref.anchor, ref.path, site);
	}
}
