// SPDX-License-Identifier: MIT
// Interned symbol tree: one symbol per (parent, key)

import type { Definition } from "../definitions.ts";
import { MixscopeError } from "../errors.ts";
import { resolveReference } from "../resolution/resolver.ts";
import { ResolutionError, NoSuchChildError } from "../resolution/resolution-errors.ts";
import { Lazy } from "../utils/lazy.ts";
import { elect, evaluatorSites, hasFlag, symbolKind } from "./election.ts";
import type { Election, EvaluatorSite, SymbolKind } from "./election.ts";
import { linearize } from "./linearization.ts";
import type { Contributor, Linearization } from "./linearization.ts";

export interface SymbolTreeOptions {
	/** Treat every top-level name as public */
	readonly modulesPublic?: boolean;
}

/**
 * Compile-time view of one position in the composed namespace. Symbols are
 * interned in their parent, built lazily and never mutated once built.
 */
export class MixinSymbol {
	readonly depth: number;
	readonly path: readonly string[];

	private readonly _children = new Map<string, MixinSymbol>();
	private readonly _linearization: Lazy<Linearization>;
	private readonly _keys: Lazy<readonly string[]>;
	private readonly _kind: Lazy<SymbolKind>;
	private readonly _sites: Lazy<readonly EvaluatorSite[]>;
	private readonly _election: Lazy<Election>;
	private readonly _siblings: Lazy<ReadonlySet<MixinSymbol>>;

	private constructor(
		readonly key: string | undefined,
		readonly outer: MixinSymbol | null,
		readonly origin: readonly Definition[],
		private readonly options: SymbolTreeOptions,
	) {
		this.depth = outer === null ? 0 : outer.depth + 1;
		this.path = outer === null || key === undefined ? [] : [...outer.path, key];

		// Linearization resolves base references, which may navigate back
		// into this symbol's keys; either slot re-entering means a cycle.
		const cycle = (): Error => MixscopeError.inheritanceCycle(this.toString());
		this._linearization = new Lazy(() => linearize(this), cycle);
		this._keys = new Lazy(() => this.collectKeys(), cycle);
		// These read only linearization and keys, never each other recursively
		const reentered = (property: string) => (): Error =>
			new Error("Symbol '" + this.toString() + "' re-entered the computation of its " + property);
		this._kind = new Lazy(() => symbolKind(this), reentered("kind"));
		this._sites = new Lazy(() => evaluatorSites(this), reentered("evaluator sites"));
		this._election = new Lazy(() => elect(this.evaluatorSites), reentered("election"));
		this._siblings = new Lazy(() => this.collectSiblings(), reentered("sibling dependencies"));
	}

	/** Compose the root symbol from one or more root definitions (union mount) */
	static root(definitions: Definition | readonly Definition[], options: SymbolTreeOptions = {}): MixinSymbol {
		const origin = isDefinitionList(definitions) ? [...definitions] : [definitions];
		return new MixinSymbol(undefined, null, Object.freeze(origin), options);
	}

	//==========================================================================
	// Navigation
	//==========================================================================

	get root(): MixinSymbol {
		return this.outer === null ? this : this.outer.root;
	}

	/** Own child keys followed by every inherited key, without duplicates */
	keys(): readonly string[] {
		return this._keys.value;
	}

	has(key: string): boolean {
		return this.keys().includes(key);
	}

	get(key: string): MixinSymbol | undefined {
		const interned = this._children.get(key);
		if (interned !== undefined) return interned;
		if (!this.has(key)) return undefined;

		const origin: Definition[] = [];
		for (const definition of this.origin) {
			if (definition.kind === "scope") {
				origin.push(...(definition.children.get(key) ?? []));
			}
		}
		const child = new MixinSymbol(key, this, Object.freeze(origin), this.options);
		this._children.set(key, child);
		return child;
	}

	child(key: string): MixinSymbol {
		const found = this.get(key);
		if (found === undefined) throw new NoSuchChildError(this.toString(), key);
		return found;
	}

	private collectKeys(): readonly string[] {
		const keys = new Set<string>();
		for (const definition of this.origin) {
			if (definition.kind !== "scope") continue;
			for (const key of definition.children.keys()) keys.add(key);
		}
		for (const ancestor of this.strictSuper) {
			for (const key of ancestor.keys()) keys.add(key);
		}
		return Object.freeze([...keys]);
	}

	//==========================================================================
	// Inheritance
	//==========================================================================

	get contributors(): readonly Contributor[] {
		return this._linearization.value.contributors;
	}

	get strictSuper(): readonly MixinSymbol[] {
		return this._linearization.value.strictSuper;
	}

	get reverseIndex(): ReadonlyMap<MixinSymbol, readonly Contributor[]> {
		return this._linearization.value.reverseIndex;
	}

	/** True when the position exists only through inheritance */
	get isSynthetic(): boolean {
		return this.origin.length === 0;
	}

	//==========================================================================
	// Classification
	//==========================================================================

	get kind(): SymbolKind {
		return this._kind.value;
	}

	get isPublic(): boolean {
		if (this.depth === 1 && this.options.modulesPublic === true) return true;
		return hasFlag(this, "isPublic");
	}

	get isEager(): boolean {
		return hasFlag(this, "isEager");
	}

	get evaluatorSites(): readonly EvaluatorSite[] {
		return this._sites.value;
	}

	get election(): Election {
		return this._election.value;
	}

	/**
	 * Same-scope symbols targeted by the dependencies of this symbol's own
	 * evaluators. Unresolvable dependencies are left for evaluation to report.
	 */
	get siblingDependencies(): ReadonlySet<MixinSymbol> {
		return this._siblings.value;
	}

	private collectSiblings(): ReadonlySet<MixinSymbol> {
		const siblings = new Set<MixinSymbol>();
		const site = { current: this, origin: this };
		for (const definition of this.origin) {
			if (definition.kind !== "resource") continue;
			for (const evaluator of definition.evaluators) {
				for (const dependency of evaluator.computation.dependencies) {
					let targets: readonly MixinSymbol[];
					try {
						targets = resolveReference(dependency.reference, site);
					} catch (error) {
						if (error instanceof ResolutionError) continue;
						throw error;
					}
					for (const target of targets) {
						if (target.outer === this.outer && target !== this) siblings.add(target);
					}
				}
			}
		}
		return siblings;
	}

	toString(): string {
		return this.path.length === 0 ? "<root>" : this.path.join(".");
	}
}

function isDefinitionList(value: Definition | readonly Definition[]): value is readonly Definition[] {
	return Array.isArray(value);
}
