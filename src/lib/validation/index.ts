/**
 * Validation wrapper — Zod schemas checked into Result<T, ValidationError>.
 *
 * Domain code imports `z` from here, never from "zod" directly.
 */

import { z } from "zod";
import { FailureCode, ValidationError, type ValidationIssue } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** Validate data against a schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
	label = "input",
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	const first = issues[0];
	const detail = first ? `: ${first.path.join(".") || "(root)"} ${first.message}` : "";
	return err(
		new ValidationError(FailureCode.SchemaInvalid, `Invalid ${label}${detail}`, { label }, issues),
	);
}

/** Schema for a wei amount given as bigint, safe integer, or decimal string. */
export const weiSchema = z.union([
	z.bigint(),
	z.number().int().nonnegative().transform((n) => BigInt(n)),
	z
		.string()
		.regex(/^\d+$/, "must be a non-negative integer string")
		.transform((s) => BigInt(s)),
]);

/** Schema for a lowercase-normalized 20-byte hex address string. */
export const addressSchema = z
	.string()
	.trim()
	.regex(/^0x[0-9a-fA-F]{40}$/, "must be a 0x-prefixed 20-byte hex address")
	.transform((s) => s.toLowerCase());
