// mixscope References
// Constructors and formatting for the four reference forms

import type { z } from "zod/v4";
import { InvalidReferenceError } from "./resolution/resolution-errors.ts";
import {
	AbsoluteReferenceSchema,
	LexicalReferenceSchema,
	QualifiedThisReferenceSchema,
	ReferenceSchema,
	RelativeReferenceSchema,
} from "./zod-schemas.ts";
import type {
	AbsoluteReference,
	LexicalReference,
	QualifiedThisReference,
	Reference,
	RelativeReference,
} from "./zod-schemas.ts";

export type {
	AbsoluteReference,
	LexicalReference,
	QualifiedThisReference,
	Reference,
	RelativeReference,
} from "./zod-schemas.ts";

function parseWith<T>(schema: z.ZodType<T>, value: unknown): T {
	const parsed = schema.safeParse(value);
	if (!parsed.success) {
		const reason = parsed.error.issues
			.map((issue) => (issue.path.map(String).join(".") || "$") + ": " + issue.message)
			.join("; ");
		throw new InvalidReferenceError(reason);
	}
	return parsed.data;
}

/** Navigate `path` from the global root */
export function absolute(...path: string[]): AbsoluteReference {
	return parseWith(AbsoluteReferenceSchema, { kind: "absolute", path });
}

/**
 * Ascend `ascend` levels past the enclosing scope, then navigate `path`.
 * `relative(0, "x")` names a sibling of the declaring definition.
 */
export function relative(ascend: number, ...path: string[]): RelativeReference {
	return parseWith(RelativeReferenceSchema, { kind: "relative", ascend, path });
}

/**
 * Search outward for the first scope defining `head`. A reference whose head
 * equals the name of the definition it appears in starts one level further out.
 */
export function lexical(head: string, ...rest: string[]): LexicalReference {
	return parseWith(LexicalReferenceSchema, { kind: "lexical", path: [head, ...rest] });
}

/** Late-bound self reference: the nearest enclosing definition named `anchor` */
export function qualifiedThis(anchor: string, ...path: string[]): QualifiedThisReference {
	return parseWith(QualifiedThisReferenceSchema, { kind: "qualifiedThis", anchor, path });
}

/** Validate an untyped value (e.g. decoded JSON) as a Reference */
export function parseReference(value: unknown): Reference {
	return parseWith(ReferenceSchema, value);
}

export function formatReference(ref: Reference): string {
	switch (ref.kind) {
	case "absolute":
		return "/" + ref.path.join(".");
	case "relative":
		return "^".repeat(ref.ascend) + "." + ref.path.join(".");
	case "lexical":
		return ref.path.join(".");
	case "qualifiedThis":
		return ref.anchor + ".this" + ref.path.map((segment) => "." + segment).join("");
	}
}
