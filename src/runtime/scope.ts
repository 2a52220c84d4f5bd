// mixscope Runtime Scopes
// Immutable containers produced by evaluating scope-kind mixins

import { MixscopeError } from "../errors.ts";
import type { MixinSymbol } from "../symbol-tree/symbol.ts";
import { KwargsSchema } from "../zod-schemas.ts";
import type { Kwargs } from "../zod-schemas.ts";
import type { Mixin } from "./mixin.ts";

//==============================================================================
// Scope
//==============================================================================

export abstract class Scope {
	constructor(
		protected readonly mixin: Mixin,
		private readonly children: ReadonlyMap<MixinSymbol, Mixin>,
	) {}

	get symbol(): MixinSymbol {
		return this.mixin.symbol;
	}

	get path(): string {
		return this.symbol.toString();
	}

	/** Public member names in declaration order */
	keys(): string[] {
		const visible: string[] = [];
		for (const child of this.children.keys()) {
			if (child.isPublic && child.key !== undefined) visible.push(child.key);
		}
		return visible;
	}

	has(name: string): boolean {
		return this.publicChild(name) !== undefined;
	}

	/** Value of a public resource, or a nested scope */
	get(name: string): unknown {
		const child = this.publicChild(name);
		if (child === undefined) {
			throw MixscopeError.notFound(this.path, name);
		}
		return child.evaluated;
	}

	/** Nested scope, or the scope a resource evaluates to */
	scope(name: string): Scope {
		const value = this.get(name);
		if (value instanceof Scope) return value;
		throw MixscopeError.notAScope(this.path + "." + name);
	}

	/** Runtime mixin of a child symbol, private children included */
	childMixin(symbol: MixinSymbol): Mixin | undefined {
		return this.children.get(symbol);
	}

	private publicChild(name: string): Mixin | undefined {
		const symbol = this.symbol.get(name);
		if (symbol === undefined || !symbol.isPublic) return undefined;
		return this.children.get(symbol);
	}

	abstract instantiate(kwargs: Readonly<Record<string, unknown>>): InstanceScope;
}

//==============================================================================
// Static and Instance Scopes
//==============================================================================

export class StaticScope extends Scope {
	/**
	 * Bind `kwargs` as base values of the scope's patcher-only resources.
	 * Every call builds a fresh, independent instance.
	 */
	override instantiate(kwargs: Readonly<Record<string, unknown>>): InstanceScope {
		const parsed = KwargsSchema.safeParse(kwargs);
		if (!parsed.success) {
			throw MixscopeError.validation(this.path, "keyword arguments must be a plain object", kwargs);
		}
		const values: Kwargs = parsed.data;
		if (this.mixin.context.trace) {
			console.debug("[Scope] instantiate " + this.path + " with " + Object.keys(values).join(", "));
		}
		return this.mixin.instantiate(values);
	}
}

export class InstanceScope extends Scope {
	override instantiate(): InstanceScope {
		throw MixscopeError.instanceNotCallable(this.path);
	}
}
