// SPDX-License-Identifier: MIT
import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { z } from "zod/v4";

import { given, patch, resource, scope } from "../src/definitions.ts";
import { absolute, lexical, qualifiedThis, relative } from "../src/references.ts";
import {
	AnchorNotFoundError,
	AscentBeyondRootError,
	NoSuchChildError,
	UnresolvedReferenceError,
} from "../src/resolution/resolution-errors.ts";
import { ascend, navigate, resolveReference } from "../src/resolution/resolver.ts";
import type { ResolutionSite } from "../src/resolution/resolver.ts";
import { MixinSymbol } from "../src/symbol-tree/symbol.ts";

//==============================================================================
// Fixtures
//==============================================================================

function nested(): MixinSymbol {
	return MixinSymbol.root(scope({
		x: resource(() => 1),
		Outer: scope({
			x: resource(() => 2),
			Inner: scope({
				x: resource(() => 3),
				y: resource(() => 4),
			}),
		}),
	}));
}

function at(root: MixinSymbol, ...path: string[]): MixinSymbol {
	return navigate(root, path);
}

function self(symbol: MixinSymbol): ResolutionSite {
	return { current: symbol, origin: symbol };
}

//==============================================================================
// Reference Forms
//==============================================================================

describe("Absolute references", () => {
	it("navigate from the root", () => {
		const root = nested();
		const from = self(at(root, "Outer", "Inner", "y"));
		assert.deepEqual(resolveReference(absolute("Outer", "x"), from), [at(root, "Outer", "x")]);
	});

	it("fail on a missing segment", () => {
		const root = nested();
		assert.throws(() => resolveReference(absolute("Outer", "nope"), self(root)), NoSuchChildError);
	});
});

describe("Relative references", () => {
	it("level 0 is the enclosing scope", () => {
		const root = nested();
		const from = self(at(root, "Outer", "Inner", "y"));
		assert.deepEqual(resolveReference(relative(0, "x"), from), [at(root, "Outer", "Inner", "x")]);
		assert.deepEqual(resolveReference(relative(1, "x"), from), [at(root, "Outer", "x")]);
		assert.deepEqual(resolveReference(relative(2, "x"), from), [at(root, "x")]);
	});

	it("cannot ascend past the root", () => {
		const root = nested();
		const from = self(at(root, "Outer", "Inner", "y"));
		assert.throws(() => resolveReference(relative(3, "x"), from), AscentBeyondRootError);
	});
});

describe("Lexical references", () => {
	it("find the nearest enclosing definition", () => {
		const root = nested();
		const from = self(at(root, "Outer", "Inner", "y"));
		assert.deepEqual(resolveReference(lexical("x"), from), [at(root, "Outer", "Inner", "x")]);
		assert.deepEqual(resolveReference(lexical("Outer", "Inner"), from), [at(root, "Outer", "Inner")]);
	});

	it("skip the level that would resolve to the referencing symbol itself", () => {
		const root = nested();
		assert.deepEqual(resolveReference(lexical("x"), self(at(root, "Outer", "Inner", "x"))), [at(root, "Outer", "x")]);
		assert.deepEqual(resolveReference(lexical("x"), self(at(root, "Outer", "x"))), [at(root, "x")]);
	});

	it("fail when no enclosing scope defines the head", () => {
		const root = nested();
		assert.throws(
			() => resolveReference(lexical("nope"), self(at(root, "Outer", "Inner", "y"))),
			(error: unknown) =>
				error instanceof UnresolvedReferenceError &&
				error.message === "No enclosing scope of 'Outer.Inner.y' defines 'nope'",
		);
	});

	it("fail for a top-level self reference", () => {
		const root = nested();
		assert.throws(() => resolveReference(lexical("x"), self(at(root, "x"))), UnresolvedReferenceError);
	});
});

describe("Qualified this references", () => {
	it("bind to the nearest enclosing definition with the anchor name", () => {
		const root = nested();
		const from = self(at(root, "Outer", "Inner", "y"));
		assert.deepEqual(resolveReference(qualifiedThis("Outer", "x"), from), [at(root, "Outer", "x")]);
		assert.deepEqual(resolveReference(qualifiedThis("Inner"), from), [at(root, "Outer", "Inner")]);
	});

	it("fail without a matching anchor", () => {
		const root = nested();
		assert.throws(
			() => resolveReference(qualifiedThis("Missing"), self(at(root, "Outer", "x"))),
			(error: unknown) =>
				error instanceof AnchorNotFoundError &&
				error.message === "No enclosing definition of 'Outer.x' is named 'Missing'",
		);
	});
});

//==============================================================================
// Late Binding
//==============================================================================

describe("Inherited references", () => {
	function inherited(): MixinSymbol {
		return MixinSymbol.root(scope({
			Base: scope({
				value: resource(() => 1),
				doubled: given({ value: z.number() }).resource(({ value }) => value * 2),
			}),
			Derived: scope({ value: resource(() => 5) }, { extends: lexical("Base") }),
		}));
	}

	it("ascend from an inherited origin into the composing scope", () => {
		const root = inherited();
		const sites = ascend({ current: at(root, "Derived", "doubled"), origin: at(root, "Base", "doubled") });
		assert.deepEqual(sites, [{ current: at(root, "Derived"), origin: at(root, "Base") }]);
	});

	it("late-bind lexical references to the composing scope", () => {
		const root = inherited();
		const site = { current: at(root, "Derived", "doubled"), origin: at(root, "Base", "doubled") };
		assert.deepEqual(resolveReference(lexical("value"), site), [at(root, "Derived", "value")]);
	});

	it("ascend along base inheritance to the base's lexical scope", () => {
		const root = inherited();
		const sites = ascend({ current: at(root, "Derived"), origin: at(root, "Base") });
		assert.deepEqual(sites, [self(root)]);
	});

	it("merge the routes of a diamond into one site", () => {
		const base = () => scope({ A: scope({}), B: scope({}, { extends: lexical("A") }) });
		const root = MixinSymbol.root(scope({
			Base1: base(),
			Base2: base(),
			Left: scope({ B: scope({}) }, { extends: [lexical("Base1"), lexical("Base2")] }),
			Right: scope({ B: scope({}) }, { extends: [lexical("Base1"), lexical("Base2")] }),
			Derived: scope({ B: scope({}) }, { extends: [lexical("Left"), lexical("Right")] }),
		}));
		const sites = ascend({ current: at(root, "Derived", "B"), origin: at(root, "Base1", "A") });
		assert.deepEqual(sites, [{ current: at(root, "Derived"), origin: at(root, "Base1") }]);
	});
});

describe("Branching references", () => {
	// Other.X fixes its base to Base.X, so Outer.X reaches Base.X both
	// through Outer's own supers and through that fixed base.
	function branching(): MixinSymbol {
		return MixinSymbol.root(scope({
			Base: scope({
				k: resource(() => "base"),
				X: scope({ v: given({ k: z.string() }).resource(({ k }) => k) }),
			}),
			Other: scope({ X: scope({}, { extends: lexical("Base", "X") }) }),
			Outer: scope({
				k: patch(() => (k: string) => k + "+outer"),
			}, { extends: [lexical("Base"), lexical("Other")] }),
		}));
	}

	function inheritedV(root: MixinSymbol): ResolutionSite {
		return { current: at(root, "Outer", "X", "v"), origin: at(root, "Base", "X", "v") };
	}

	it("ascend into the composing scope and the fixed base's scope", () => {
		const root = branching();
		const sites = ascend({ current: at(root, "Outer", "X"), origin: at(root, "Base", "X") });
		assert.deepEqual(sites, [
			{ current: at(root, "Outer"), origin: at(root, "Base") },
			{ current: at(root, "Base"), origin: at(root, "Base") },
		]);
	});

	it("resolve a lexical reference to one target per branch, composing scope first", () => {
		const root = branching();
		assert.deepEqual(
			resolveReference(lexical("k"), inheritedV(root)),
			[at(root, "Outer", "k"), at(root, "Base", "k")],
		);
	});

	it("resolve a relative reference along every branch", () => {
		const root = branching();
		assert.deepEqual(
			resolveReference(relative(1, "k"), inheritedV(root)),
			[at(root, "Outer", "k"), at(root, "Base", "k")],
		);
	});
});

describe("Ascent", () => {
	it("moves to the outer symbol for an own origin", () => {
		const root = nested();
		assert.deepEqual(ascend(self(at(root, "Outer", "x"))), [self(at(root, "Outer"))]);
	});

	it("fails at the root", () => {
		assert.throws(() => ascend(self(nested())), AscentBeyondRootError);
	});
});
