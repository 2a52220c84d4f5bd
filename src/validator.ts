// mixscope Validator
// Static checks over a composed symbol tree

import type { Definition } from "./definitions.ts";
import {
	invalidResult,
	MixscopeError,
	validResult,
	type ValidationError,
	type ValidationResult,
} from "./errors.ts";
import { formatReference } from "./references.ts";
import { ResolutionError } from "./resolution/resolution-errors.ts";
import { resolveReference } from "./resolution/resolver.ts";
import { MixinSymbol } from "./symbol-tree/symbol.ts";
import { ValidateOptionsSchema } from "./zod-schemas.ts";
import type { EvaluateOptions, ValidateOptions } from "./zod-schemas.ts";

//==============================================================================
// Validation State
//==============================================================================

interface ValidationState {
	errors: ValidationError[];
	warn: boolean;
}

function report(state: ValidationState, symbol: MixinSymbol, message: string): void {
	const error = { path: symbol.toString(), message };
	if (state.warn) {
		console.warn("[Validator] " + error.path + ": " + message);
	}
	state.errors.push(error);
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

//==============================================================================
// Per-symbol Checks
//==============================================================================

/** Linearization; false when the symbol's supers cannot be computed */
function checkInheritance(state: ValidationState, symbol: MixinSymbol): boolean {
	try {
		void symbol.strictSuper;
		return true;
	} catch (error) {
		if (error instanceof MixscopeError || error instanceof ResolutionError) {
			report(state, symbol, describe(error));
			return false;
		}
		throw error;
	}
}

function checkKind(state: ValidationState, symbol: MixinSymbol): void {
	const kind = symbol.kind;
	switch (kind) {
	case "conflict":
		report(state, symbol, "defined both as a scope and as a resource");
		return;
	case "resource": {
		const election = symbol.election;
		if (election.kind === "ambiguous") {
			report(
				state,
				symbol,
				"more than one merger: " + election.contributors.map((c) => c.toString()).join(", "),
			);
		}
		return;
	}
	case "scope":
		return;
	}
}

function checkDependencies(state: ValidationState, symbol: MixinSymbol): void {
	const site = { current: symbol, origin: symbol };
	for (const definition of symbol.origin) {
		if (definition.kind !== "resource") continue;
		for (const evaluator of definition.evaluators) {
			for (const dependency of evaluator.computation.dependencies) {
				try {
					resolveReference(dependency.reference, site);
				} catch (error) {
					if (!(error instanceof ResolutionError || error instanceof MixscopeError)) throw error;
					report(
						state,
						symbol,
						"dependency '" + dependency.name + "' (" + formatReference(dependency.reference) + ") does not resolve: " + error.message,
					);
				}
			}
		}
	}
}

//==============================================================================
// Tree Validation
//==============================================================================

/**
 * Breadth-first walk of the symbol tree, bounded by `maxDepth` since
 * qualified-this inheritance can make the tree infinite.
 */
export function validateSymbolTree(
	root: MixinSymbol,
	options: ValidateOptions = {},
): ValidationResult<MixinSymbol> {
	const parsed = ValidateOptionsSchema.safeParse(options);
	if (!parsed.success) {
		return invalidResult(parsed.error.issues.map((issue) => ({
			path: issue.path.map(String).join(".") || "$",
			message: issue.message,
		})));
	}
	const { maxDepth, warn } = parsed.data;
	const state: ValidationState = { errors: [], warn };

	let frontier: MixinSymbol[] = [root];
	while (frontier.length > 0) {
		const next: MixinSymbol[] = [];
		for (const symbol of frontier) {
			if (!checkInheritance(state, symbol)) continue;
			checkKind(state, symbol);
			checkDependencies(state, symbol);
			if (symbol.depth >= maxDepth) continue;
			for (const key of symbol.keys()) {
				next.push(symbol.child(key));
			}
		}
		frontier = next;
	}

	return state.errors.length > 0 ? invalidResult(state.errors) : validResult(root);
}

/** Compose `definitions` and validate the resulting tree */
export function validateDefinitions(
	definitions: Definition | readonly Definition[],
	options: ValidateOptions & Pick<EvaluateOptions, "modulesPublic"> = {},
): ValidationResult<MixinSymbol> {
	const { modulesPublic, ...validateOptions } = options;
	const root = MixinSymbol.root(definitions, modulesPublic === undefined ? {} : { modulesPublic });
	return validateSymbolTree(root, validateOptions);
}
