/**
 * Validation wrapper — thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Domain code uses this instead of importing Zod directly.
 * Re-exports `z` so schemas can be built without a direct zod dependency.
 */

import { z } from "zod";
import { ValidationError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Extract the issues attached to a ValidationError produced by `validate`. */
export function issuesOf(error: ValidationError): readonly ValidationIssue[] {
	const issues = error.context["issues"];
	return Array.isArray(issues) ? issues.filter(isIssue) : [];
}

function isIssue(value: unknown): value is ValidationIssue {
	return typeof value === "object" && value !== null && "path" in value && "message" in value;
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path,
		message: i.message,
	}));
	const summary = issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
	return err(new ValidationError(`Validation failed: ${summary}`, { issues }));
}

// ── Shared schema pieces ────────────────────────────────────────────

/** Integer basis points in [0, 10000]. */
export const bpsSchema = z.number().int().min(0).max(10_000);

/** Strictly positive scaled amount. */
export const positiveAmountSchema = z.bigint().positive();

/** Strictly positive whole milliseconds. */
export const durationMsSchema = z.number().int().positive();
