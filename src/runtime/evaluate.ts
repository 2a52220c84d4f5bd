// mixscope Evaluation Entry Point

import type { Definition } from "../definitions.ts";
import { MixscopeError } from "../errors.ts";
import { MixinSymbol } from "../symbol-tree/symbol.ts";
import { EvaluateOptionsSchema } from "../zod-schemas.ts";
import type { EvaluateOptions } from "../zod-schemas.ts";
import { Mixin } from "./mixin.ts";
import type { Scope } from "./scope.ts";

/**
 * Compose the root definitions (several are union-mounted into one root)
 * and evaluate the root scope. Eager resources have run when this returns.
 */
export function evaluate(
	definitions: Definition | readonly Definition[],
	options: EvaluateOptions = {},
): Scope {
	const parsed = EvaluateOptionsSchema.safeParse(options);
	if (!parsed.success) {
		throw MixscopeError.validation("options", parsed.error.issues.map((issue) => issue.message).join("; "));
	}
	const { modulesPublic, trace } = parsed.data;
	const root = MixinSymbol.root(definitions, { modulesPublic });
	if (trace) {
		console.debug("[Evaluate] root with " + root.keys().length + " top-level names");
	}
	return Mixin.root(root, { trace }).asScope();
}
