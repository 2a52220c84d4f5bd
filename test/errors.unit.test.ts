import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	annotateError,
	ErrorCodes,
	exhaustive,
	invalidResult,
	MixscopeError,
	validResult,
} from "../src/errors.ts";

describe("MixscopeError class", () => {
	it("constructor sets code, message, name and an empty trace", () => {
		const err = new MixscopeError(ErrorCodes.NotFound, "test msg");
		assert.equal(err.code, "NotFound");
		assert.equal(err.message, "test msg");
		assert.equal(err.name, "MixscopeError");
		assert.deepEqual(err.trace, []);
	});

	it("annotate appends paths and collapses repeats", () => {
		const err = MixscopeError.valueCycle("a");
		err.annotate("b").annotate("b").annotate("a");
		assert.deepEqual(err.trace, ["b", "a"]);
	});
});

describe("Static factories", () => {
	it("missingDependency names the resource and the dependency", () => {
		const err = MixscopeError.missingDependency("Service.broken", "nonexistent_dependency");
		assert.equal(err.code, ErrorCodes.MissingDependency);
		assert.equal(
			err.message,
			"Resource 'Service.broken' depends on 'nonexistent_dependency', which cannot be resolved",
		);
	});

	it("ambiguousAggregation lists the contributors", () => {
		const err = MixscopeError.ambiguousAggregation("Both.v", ["Left.v", "Right.v"]);
		assert.equal(err.message, "Resource 'Both.v' has more than one merger: Left.v, Right.v");
	});

	it("missingBaseValue hints at instantiation", () => {
		assert.equal(
			MixscopeError.missingBaseValue("Counter.start", "start", false).message,
			"Patcher-only resource 'Counter.start' has no base value; instantiate the enclosing scope with a value for it",
		);
		assert.equal(
			MixscopeError.missingBaseValue("Counter.start", "start", true).message,
			"Patcher-only resource 'Counter.start' has no base value; supply 'start' when instantiating the scope",
		);
	});

	it("evaluationFailed keeps the cause", () => {
		const cause = new Error("boom");
		const err = MixscopeError.evaluationFailed("x", cause);
		assert.equal(err.message, "Evaluation of 'x' failed: boom");
		assert.equal(err.cause, cause);
	});

	it("validation includes the offending value", () => {
		const err = MixscopeError.validation("options", "bad", { a: 1 });
		assert.equal(err.message, "Validation error at options: bad (value: {\"a\":1})");
	});

	it("validation formats values JSON cannot encode", () => {
		assert.equal(
			MixscopeError.validation("patch[0]", "bad", 10n).message,
			"Validation error at patch[0]: bad (value: 10n)",
		);
		const cyclic: Record<string, unknown> = { name: "loop" };
		cyclic.self = cyclic;
		assert.equal(
			MixscopeError.validation("patch[0]", "bad", cyclic).message,
			"Validation error at patch[0]: bad (value: <ref *1> { name: 'loop', self: [Circular *1] })",
		);
		assert.equal(
			MixscopeError.validation("patch[0]", "bad", () => 1).message,
			"Validation error at patch[0]: bad (value: [Function (anonymous)])",
		);
	});
});

describe("annotateError", () => {
	it("annotates engine errors in place", () => {
		const err = MixscopeError.structuralConflict("x");
		assert.equal(annotateError(err, "x"), err);
		assert.deepEqual(err.trace, ["x"]);
	});

	it("wraps foreign errors", () => {
		const cause = new TypeError("not a number");
		const err = annotateError(cause, "a.b");
		assert.equal(err.code, ErrorCodes.EvaluationFailed);
		assert.equal(err.cause, cause);
		assert.deepEqual(err.trace, ["a.b"]);
	});
});

describe("Validation results", () => {
	it("validResult carries the value", () => {
		assert.deepEqual(validResult(3), { valid: true, errors: [], value: 3 });
	});

	it("invalidResult carries the errors without a value", () => {
		assert.deepEqual(invalidResult([{ path: "a", message: "bad" }]), {
			valid: false,
			errors: [{ path: "a", message: "bad" }],
		});
	});
});

describe("exhaustive", () => {
	it("throws for an unexpected value", () => {
		assert.throws(() => Reflect.apply(exhaustive, undefined, ["other"]), { message: "Unexpected value: other" });
	});
});
