// mixscope Runtime Mixins
// Pairs a symbol with its runtime position and memoizes its evaluation

import { annotateError, exhaustive, MixscopeError } from "../errors.ts";
import { NoSuchChildError } from "../resolution/resolution-errors.ts";
import type { MixinSymbol } from "../symbol-tree/symbol.ts";
import { Lazy } from "../utils/lazy.ts";
import type { Kwargs } from "../zod-schemas.ts";
import { evaluateResource } from "./evaluators.ts";
import { InstanceScope, Scope, StaticScope } from "./scope.ts";

//==============================================================================
// Types
//==============================================================================

export interface EvaluationContext {
	/** Log every evaluation through console.debug */
	readonly trace: boolean;
}

export type KwargsState =
	| { readonly kind: "static" }
	| { readonly kind: "instance"; readonly values: Kwargs };

const STATIC: KwargsState = Object.freeze({ kind: "static" });

//==============================================================================
// Mixin
//==============================================================================

export class Mixin {
	/** Wired once during phase 2 of the enclosing scope's construction */
	private _siblings: ReadonlyMap<MixinSymbol, Mixin> | undefined;
	/** Child table, present only while this scope is being constructed */
	private _constructing: ReadonlyMap<MixinSymbol, Mixin> | undefined;
	private readonly _evaluated: Lazy<unknown>;

	constructor(
		readonly symbol: MixinSymbol,
		readonly outer: Mixin | null,
		readonly kwargs: KwargsState,
		readonly context: EvaluationContext,
		private readonly staticCounterpart: Mixin | null = null,
	) {
		this._evaluated = new Lazy(
			() => this.evaluate(),
			() => MixscopeError.valueCycle(this.path),
		);
	}

	static root(symbol: MixinSymbol, context: EvaluationContext): Mixin {
		return new Mixin(symbol, null, STATIC, context);
	}

	get path(): string {
		return this.symbol.toString();
	}

	/** Resource value, or the Scope of a scope-kind mixin; computed once */
	get evaluated(): unknown {
		return this._evaluated.value;
	}

	asScope(): Scope {
		const value = this.evaluated;
		if (value instanceof Scope) return value;
		throw MixscopeError.notAScope(this.path);
	}

	private evaluate(): unknown {
		if (this.context.trace) {
			console.debug("[Mixin] evaluating " + this.path + " (" + this.symbol.kind + ", " + this.kwargs.kind + ")");
		}
		try {
			const kind = this.symbol.kind;
			switch (kind) {
			case "scope":
				return this.constructScope();
			case "resource":
				return evaluateResource(this);
			case "conflict":
				throw MixscopeError.structuralConflict(this.path);
			default:
				return exhaustive(kind);
			}
		} catch (error) {
			throw annotateError(error, this.path);
		}
	}

	//==========================================================================
	// Scope Construction
	//==========================================================================

	private constructScope(): Scope {
		// Phase 1: one child per key; resources share this mixin's kwargs
		const children = new Map<MixinSymbol, Mixin>();
		for (const key of this.symbol.keys()) {
			const child = this.symbol.child(key);
			const kwargs = child.kind === "scope" ? STATIC : this.kwargs;
			children.set(child, new Mixin(child, this, kwargs, this.context));
		}

		this._constructing = children;
		try {
			// Phase 2: sibling wiring
			for (const [symbol, mixin] of children) {
				const wired = new Map<MixinSymbol, Mixin>();
				for (const dependency of symbol.siblingDependencies) {
					const sibling = children.get(dependency);
					if (sibling !== undefined) wired.set(dependency, sibling);
				}
				mixin.wireSiblings(wired);
			}

			// Phase 3: eager children, in declaration order
			for (const [symbol, mixin] of children) {
				if (symbol.isEager) void mixin.evaluated;
			}

			// Phase 4: freeze
			return this.kwargs.kind === "static"
				? new StaticScope(this, children)
				: new InstanceScope(this, children);
		} finally {
			this._constructing = undefined;
		}
	}

	wireSiblings(siblings: ReadonlyMap<MixinSymbol, Mixin>): void {
		if (this._siblings !== undefined) {
			throw new Error("Siblings of '" + this.path + "' are already wired");
		}
		this._siblings = siblings;
	}

	sibling(symbol: MixinSymbol): Mixin | undefined {
		return this._siblings?.get(symbol);
	}

	/** Fresh instance of this scope with `values` bound as kwargs */
	instantiate(values: Kwargs): InstanceScope {
		if (this.kwargs.kind === "instance") {
			throw MixscopeError.instanceNotCallable(this.path);
		}
		const instance = new Mixin(this.symbol, this.outer, { kind: "instance", values }, this.context, this);
		const scope = instance.evaluated;
		if (scope instanceof InstanceScope) return scope;
		throw MixscopeError.notAScope(this.path);
	}

	//==========================================================================
	// Navigation
	//==========================================================================

	childMixin(symbol: MixinSymbol): Mixin {
		const child = this._constructing !== undefined
			? this._constructing.get(symbol)
			: this.asScope().childMixin(symbol);
		if (child === undefined) {
			throw new NoSuchChildError(this.path, symbol.key ?? "<root>");
		}
		return child;
	}

	/**
	 * Runtime mixin for `target`, found through the lowest common ancestor
	 * of this mixin's symbol and the target.
	 */
	findMixin(target: MixinSymbol): Mixin {
		const downward: MixinSymbol[] = [];
		let from: MixinSymbol = this.symbol;
		let to: MixinSymbol = target;
		let steps = 0;

		while (to.depth > from.depth && to.outer !== null) {
			downward.push(to);
			to = to.outer;
		}
		while (from.depth > to.depth && from.outer !== null) {
			from = from.outer;
			steps++;
		}
		while (from !== to) {
			if (from.outer === null || to.outer === null) {
				throw new Error("'" + target.toString() + "' is not in the tree of '" + this.path + "'");
			}
			downward.push(to);
			to = to.outer;
			from = from.outer;
			steps++;
		}

		let mixin = this.ancestor(steps);
		if (downward.length === 0 && mixin.staticCounterpart !== null) {
			mixin = mixin.staticCounterpart;
		}
		for (const symbol of downward.reverse()) {
			mixin = mixin.childMixin(symbol);
		}
		return mixin;
	}

	private ancestor(steps: number): Mixin {
		if (steps === 0) return this;
		if (this.outer === null) {
			throw new Error("Mixin '" + this.path + "' has no enclosing mixin");
		}
		return this.outer.ancestor(steps - 1);
	}
}
