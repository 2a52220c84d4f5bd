// Generate JSON Schema files from Zod schemas
// Usage: tsx scripts/generate-schemas.ts

import { writeFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod/v4";
import { ReferenceSchema } from "../src/zod-schemas.ts";

const __dirname = dirname(fileURLToPath(import.meta.url));
const repoRoot = resolve(__dirname, "..");

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function generateSchema(
	schema: z.ZodType,
	title: string,
): Record<string, unknown> {
	const jsonSchema = z.toJSONSchema(schema, {
		target: "draft-2020-12",
	});

	return {
		$schema: jsonSchema.$schema,
		title,
		...jsonSchema,
	};
}

/**
 * JSON Schema key priority order.
 * Mirrors jsonSchemaKeyOrder from eslint.config.ts for *.schema.json files.
 */
const jsonSchemaKeyOrder = [
	"$schema", "$id", "$ref", "$defs",
	"title", "description", "type", "const", "enum", "default",
	"properties", "patternProperties", "additionalProperties", "required",
	"items", "additionalItems", "contains", "minItems", "maxItems", "uniqueItems",
	"oneOf", "anyOf", "allOf", "not", "if", "then", "else", "discriminator",
	"minimum", "maximum", "exclusiveMinimum", "exclusiveMaximum", "multipleOf",
	"minLength", "maxLength", "pattern", "format",
];

/**
 * Sort keys within a JSON Schema object according to the priority rules
 * from eslint.config.ts for *.schema.json files:
 * 1. Objects with "$ref" → "$ref" first, then alphabetical
 * 2. Objects with "type" or "$schema" → jsonSchemaKeyOrder, then alphabetical
 * 3. Default → alphabetical
 */
function sortObjectKeys(record: Record<string, unknown>): string[] {
	const keys = Object.keys(record);

	let priorityOrder: string[];
	if ("$ref" in record) {
		priorityOrder = ["$ref"];
	} else if ("type" in record || "$schema" in record) {
		priorityOrder = jsonSchemaKeyOrder;
	} else {
		priorityOrder = [];
	}

	const prioritySet = new Set(priorityOrder);
	const priorityKeys = priorityOrder.filter(k => keys.includes(k));
	const remainingKeys = keys.filter(k => !prioritySet.has(k)).sort();
	return [...priorityKeys, ...remainingKeys];
}

/** Recursively sort object keys for deterministic, lint-compliant output. */
function sortKeys(obj: unknown): unknown {
	if (Array.isArray(obj)) return obj.map(sortKeys);
	if (!isRecord(obj)) return obj;

	const sorted: Record<string, unknown> = {};
	for (const key of sortObjectKeys(obj)) {
		sorted[key] = sortKeys(obj[key]);
	}
	return sorted;
}

function writeSchema(name: string, schema: Record<string, unknown>): void {
	const filePath = resolve(repoRoot, `${name}.schema.json`);
	writeFileSync(filePath, JSON.stringify(sortKeys(schema), null, "\t") + "\n");
	console.log(`Generated ${name}.schema.json`);
}

writeSchema("reference", generateSchema(ReferenceSchema, "mixscope Reference"));
