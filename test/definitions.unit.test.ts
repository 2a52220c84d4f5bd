import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { z } from "zod/v4";

import {
	extern,
	given,
	isMerger,
	isPatcher,
	merge,
	patch,
	patches,
	resource,
	scope,
} from "../src/definitions.ts";
import { ErrorCodes, MixscopeError } from "../src/errors.ts";
import { lexical, relative } from "../src/references.ts";

describe("scope", () => {
	it("collects children under their keys", () => {
		const child = resource(() => 1);
		const def = scope({ a: child });
		assert.equal(def.kind, "scope");
		assert.deepEqual([...def.children.keys()], ["a"]);
		assert.deepEqual(def.children.get("a"), [child]);
	});

	it("keeps several definitions under one key as separate origins", () => {
		const first = resource(() => 1);
		const second = patch(() => (n: number) => n + 1);
		const def = scope({ a: [first, second] });
		assert.equal(def.children.get("a")?.length, 2);
	});

	it("defaults to private, lazy and without bases", () => {
		const def = scope({});
		assert.equal(def.isPublic, false);
		assert.equal(def.isEager, false);
		assert.deepEqual(def.bases, []);
	});

	it("accepts a single base or a list of bases", () => {
		assert.deepEqual(scope({}, { extends: lexical("Base") }).bases, [lexical("Base")]);
		assert.deepEqual(
			scope({}, { extends: [lexical("Left"), lexical("Right")] }).bases,
			[lexical("Left"), lexical("Right")],
		);
	});

	it("returns frozen definitions", () => {
		assert.equal(Object.isFrozen(scope({}, { public: true })), true);
	});
});

describe("resource builders", () => {
	it("extern has no evaluators", () => {
		const def = extern({ public: true });
		assert.equal(def.kind, "resource");
		assert.deepEqual(def.evaluators, []);
		assert.equal(def.isPublic, true);
	});

	it("tags each evaluator with its kind", () => {
		assert.equal(resource(() => 1).evaluators[0]?.kind, "resource");
		assert.equal(merge(z.string(), () => (ps) => [...ps]).evaluators[0]?.kind, "merge");
		assert.equal(patch(() => "x").evaluators[0]?.kind, "patch");
		assert.equal(patches(() => ["x", "y"]).evaluators[0]?.kind, "patches");
	});

	it("classifies mergers and patchers", () => {
		const [merger] = resource(() => 1).evaluators;
		const [patcher] = patches(() => []).evaluators;
		assert.ok(merger !== undefined && patcher !== undefined);
		assert.equal(isMerger(merger), true);
		assert.equal(isPatcher(merger), false);
		assert.equal(isMerger(patcher), false);
		assert.equal(isPatcher(patcher), true);
	});
});

describe("given", () => {
	it("declares lexical references named after each dependency", () => {
		const [evaluator] = given({ host: z.string(), port: z.number() })
			.resource(({ host, port }) => host + ":" + port)
			.evaluators;
		assert.deepEqual(evaluator?.computation.dependencies, [
			{ name: "host", reference: lexical("host") },
			{ name: "port", reference: lexical("port") },
		]);
	});

	it("accepts explicit references", () => {
		const [evaluator] = given({ foo: z.number() }, { foo: relative(1, "foo") })
			.patch(({ foo }) => foo)
			.evaluators;
		assert.deepEqual(evaluator?.computation.dependencies, [
			{ name: "foo", reference: relative(1, "foo") },
		]);
	});

	it("rejects a reference for an undeclared dependency", () => {
		assert.throws(
			() => given({ foo: z.number() }, { bar: lexical("bar") }),
			(error: unknown) => error instanceof MixscopeError && error.code === ErrorCodes.ValidationError,
		);
	});

	it("passes validated dependency values to the computation", () => {
		const [evaluator] = given({ host: z.string(), port: z.number() })
			.resource(({ host, port }) => host + ":" + port)
			.evaluators;
		const values = new Map<string, unknown>([["host", "localhost"], ["port", 5432]]);
		assert.equal(evaluator?.computation.run("url", values), "localhost:5432");
	});

	it("passes the injected values themselves to the computation", () => {
		class Connection {
			constructor(readonly url: string) {}

			query(sql: string): string {
				return this.url + " " + sql;
			}
		}
		const db = new Connection("db://test");
		const [evaluator] = given({ db: z.object({ url: z.string() }) })
			.resource(({ db }) => db)
			.evaluators;
		const value = evaluator?.computation.run("repo", new Map([["db", db]]));
		assert.equal(value, db);
		assert.ok(value instanceof Connection);
		assert.equal(value.query("select 1"), "db://test select 1");
	});

	it("keeps fields the dependency schema does not name", () => {
		const [evaluator] = given({ settings: z.object({ name: z.string() }) })
			.resource(({ settings }) => settings)
			.evaluators;
		const settings = { name: "app", debug: true };
		assert.deepEqual(evaluator?.computation.run("cfg", new Map([["settings", settings]])), { name: "app", debug: true });
	});

	it("rejects dependency values of the wrong type", () => {
		const [evaluator] = given({ port: z.number() }).resource(({ port }) => port).evaluators;
		assert.throws(
			() => evaluator?.computation.run("url", new Map([["port", "5432"]])),
			(error: unknown) =>
				error instanceof MixscopeError &&
				error.code === ErrorCodes.DependencyType &&
				error.message.startsWith("Dependencies of 'url' have unexpected values: port: "),
		);
	});
});

describe("merge", () => {
	it("aggregates the patches themselves", () => {
		const [evaluator] = merge(z.object({ name: z.string() }), () => (ps) => [...ps]).evaluators;
		if (evaluator?.kind !== "merge") assert.fail("expected a merge evaluator");
		const tag = { name: "x", extra: true };
		const aggregated = evaluator.computation.run("tags", new Map())([tag]);
		assert.ok(Array.isArray(aggregated));
		assert.equal(aggregated[0], tag);
		assert.deepEqual(aggregated, [{ name: "x", extra: true }]);
	});

	it("validates every patch it aggregates", () => {
		const [evaluator] = merge(z.string(), () => (ps) => [...ps]).evaluators;
		if (evaluator?.kind !== "merge") assert.fail("expected a merge evaluator");
		const aggregate = evaluator.computation.run("tags", new Map());
		assert.deepEqual(aggregate(["a", "b"]), ["a", "b"]);
		assert.throws(
			() => aggregate(["a", 1]),
			(error: unknown) =>
				error instanceof MixscopeError &&
				error.code === ErrorCodes.ValidationError &&
				error.message.startsWith("Validation error at patch[1]: "),
		);
	});
});
