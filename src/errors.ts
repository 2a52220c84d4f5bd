// mixscope Error Types
// Error domain for composition and evaluation errors

import { inspect } from "node:util";

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Dependency errors
	MissingDependency: "MissingDependency",
	DependencyType: "DependencyType",

	// Aggregation errors
	AmbiguousAggregation: "AmbiguousAggregation",
	MissingBaseValue: "MissingBaseValue",
	InvalidPatch: "InvalidPatch",

	// Structural errors
	StructuralConflict: "StructuralConflict",
	InheritanceCycle: "InheritanceCycle",

	// Evaluation errors
	ValueCycle: "ValueCycle",
	EvaluationFailed: "EvaluationFailed",

	// Scope access errors
	InstanceNotCallable: "InstanceNotCallable",
	NotFound: "NotFound",
	NotAScope: "NotAScope",

	// Validation errors
	ValidationError: "ValidationError",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

//==============================================================================
// mixscope Error Class
//==============================================================================

export class MixscopeError extends Error {
	readonly code: ErrorCode;
	/** Symbol paths the error propagated through, innermost first */
	readonly trace: string[] = [];

	constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "MixscopeError";
		this.code = code;
	}

	/**
	 * Record that the error propagated out of the mixin at `path`.
	 * Consecutive duplicates are collapsed.
	 */
	annotate(path: string): this {
		if (this.trace[this.trace.length - 1] !== path) {
			this.trace.push(path);
		}
		return this;
	}

	static missingDependency(resource: string, dependency: string, cause?: unknown): MixscopeError {
		return new MixscopeError(
			ErrorCodes.MissingDependency,
			"Resource '" + resource + "' depends on '" + dependency + "', which cannot be resolved",
			{ cause },
		);
	}

	static dependencyType(resource: string, details: string): MixscopeError {
		return new MixscopeError(
			ErrorCodes.DependencyType,
			"Dependencies of '" + resource + "' have unexpected values: " + details,
		);
	}

	static ambiguousAggregation(resource: string, contributors: readonly string[]): MixscopeError {
		return new MixscopeError(
			ErrorCodes.AmbiguousAggregation,
			"Resource '" + resource + "' has more than one merger: " + contributors.join(", "),
		);
	}

	static missingBaseValue(resource: string, key: string, instance: boolean): MixscopeError {
		const hint = instance
			? "supply '" + key + "' when instantiating the scope"
			: "instantiate the enclosing scope with a value for it";
		return new MixscopeError(
			ErrorCodes.MissingBaseValue,
			"Patcher-only resource '" + resource + "' has no base value; " + hint,
		);
	}

	static invalidPatch(resource: string): MixscopeError {
		return new MixscopeError(
			ErrorCodes.InvalidPatch,
			"Resource '" + resource + "' folds its patches over a base value, but a patch is not a function",
		);
	}

	static structuralConflict(path: string): MixscopeError {
		return new MixscopeError(
			ErrorCodes.StructuralConflict,
			"'" + path + "' is defined both as a scope and as a resource",
		);
	}

	static inheritanceCycle(path: string): MixscopeError {
		return new MixscopeError(
			ErrorCodes.InheritanceCycle,
			"'" + path + "' inherits from itself",
		);
	}

	static valueCycle(path: string): MixscopeError {
		return new MixscopeError(
			ErrorCodes.ValueCycle,
			"Cyclic dependency while evaluating '" + path + "'",
		);
	}

	static evaluationFailed(path: string, cause: unknown): MixscopeError {
		const detail = cause instanceof Error ? cause.message : String(cause);
		return new MixscopeError(
			ErrorCodes.EvaluationFailed,
			"Evaluation of '" + path + "' failed: " + detail,
			{ cause },
		);
	}

	static instanceNotCallable(path: string): MixscopeError {
		return new MixscopeError(
			ErrorCodes.InstanceNotCallable,
			"Scope '" + path + "' is already an instance and cannot be instantiated again",
		);
	}

	static notFound(path: string, name: string): MixscopeError {
		return new MixscopeError(
			ErrorCodes.NotFound,
			"Scope '" + path + "' has no public member '" + name + "'",
		);
	}

	static notAScope(path: string): MixscopeError {
		return new MixscopeError(
			ErrorCodes.NotAScope,
			"'" + path + "' does not evaluate to a scope",
		);
	}

	/**
	 * Create a ValidationError
	 */
	static validation(
		path: string,
		message: string,
		value?: unknown,
	): MixscopeError {
		return new MixscopeError(
			ErrorCodes.ValidationError,
			"Validation error at " +
				path +
				": " +
				message +
				(value !== undefined ? " (value: " + formatValue(value) + ")" : ""),
		);
	}
}

/** JSON where it exists; BigInts, cycles and functions fall back to inspect */
function formatValue(value: unknown): string {
	try {
		const json = JSON.stringify(value);
		if (json !== undefined) return json;
	} catch (error) {
		if (!(error instanceof TypeError)) throw error;
	}
	return inspect(value);
}

/**
 * Attach `path` to an error leaving the mixin at `path`. Errors that did not
 * come from the engine are wrapped so the trace survives.
 */
export function annotateError(error: unknown, path: string): MixscopeError {
	if (error instanceof MixscopeError) {
		return error.annotate(path);
	}
	return MixscopeError.evaluationFailed(path, error).annotate(path);
}

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
	path: string;
	message: string;
	value?: unknown;
}

export interface ValidationResult<T> {
	valid: boolean;
	errors: ValidationError[];
	value?: T;
}

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T): ValidationResult<T> {
	return { valid: true, errors: [], value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<T>(
	errors: ValidationError[],
): ValidationResult<T> {
	return { valid: false, errors };
}

//==============================================================================
// Exhaustiveness Check
//==============================================================================

export function exhaustive(value: never): never {
	throw new Error("Unexpected value: " + String(value));
}
