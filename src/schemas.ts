// mixscope JSON Schemas
// Generated from Zod schemas via z.toJSONSchema()

import { z } from "zod/v4";
import { ReferenceSchema } from "./zod-schemas.ts";

//==============================================================================
// Generated JSON Schemas
//==============================================================================

export const referenceSchema = z.toJSONSchema(ReferenceSchema, { target: "draft-2020-12" });

//==============================================================================
// Schema Type Guards
//==============================================================================

function isSchemaWithDescription(obj: unknown, description: string): obj is Record<string, unknown> {
	return typeof obj === "object" && obj !== null && "$schema" in obj && "description" in obj && obj.description === description;
}

export function isReferenceSchema(obj: unknown): obj is Record<string, unknown> {
	return isSchemaWithDescription(obj, "Reference");
}
