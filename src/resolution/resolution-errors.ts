// SPDX-License-Identifier: MIT
// Resolution-specific Error Types for mixscope references

//==============================================================================
// Resolution Error Codes
//==============================================================================

export enum ResolutionErrorCode {
	/** No enclosing scope defines the head of a lexical reference */
	UnresolvedReference = "UnresolvedReference",

	/** Navigation reached a symbol without the requested child */
	NoSuchChild = "NoSuchChild",

	/** Ascent continued past the root symbol */
	AscentBeyondRoot = "AscentBeyondRoot",

	/** No enclosing definition carries the qualified-this anchor */
	AnchorNotFound = "AnchorNotFound",

	/** Reference value does not match the reference schema */
	InvalidReference = "InvalidReference",
}

//==============================================================================
// Resolution Error Classes
//==============================================================================

/** Base class for all resolution errors */
export class ResolutionError extends Error {
	constructor(
		message: string,
		public readonly resolutionCode: ResolutionErrorCode,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "ResolutionError";
	}
}

/** Error thrown when a lexical reference finds no binding */
export class UnresolvedReferenceError extends ResolutionError {
	constructor(from: string, name: string) {
		super(
			`No enclosing scope of '${from}' defines '${name}'`,
			ResolutionErrorCode.UnresolvedReference,
		);
		this.name = "UnresolvedReferenceError";
	}
}

/** Error thrown when a path segment does not exist */
export class NoSuchChildError extends ResolutionError {
	constructor(
		public readonly parent: string,
		public readonly key: string,
	) {
		super(
			`'${parent}' has no child '${key}'`,
			ResolutionErrorCode.NoSuchChild,
		);
		this.name = "NoSuchChildError";
	}
}

/** Error thrown when a reference ascends more levels than exist */
export class AscentBeyondRootError extends ResolutionError {
	constructor(from: string) {
		super(
			`Cannot ascend beyond the root from '${from}'`,
			ResolutionErrorCode.AscentBeyondRoot,
		);
		this.name = "AscentBeyondRootError";
	}
}

/** Error thrown when no enclosing definition has the anchor name */
export class AnchorNotFoundError extends ResolutionError {
	constructor(from: string, anchor: string) {
		super(
			`No enclosing definition of '${from}' is named '${anchor}'`,
			ResolutionErrorCode.AnchorNotFound,
		);
		this.name = "AnchorNotFoundError";
	}
}

/** Error thrown when a value is not a well-formed reference */
export class InvalidReferenceError extends ResolutionError {
	constructor(reason: string) {
		super(
			`Invalid reference: ${reason}`,
			ResolutionErrorCode.InvalidReference,
		);
		this.name = "InvalidReferenceError";
	}
}
