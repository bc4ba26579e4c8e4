/**
 * Validation over zod, returning Result<T, ValidationError>.
 *
 * Wire payloads (REST responses, stream envelopes, kline rows) and the bot
 * configuration are all parsed through `validate`. Schemas are built with the
 * re-exported `z` so that zod is imported in one place.
 */

import { z } from "zod";
import { TradingError } from "../../shared/errors.js";
import { LibDecimal } from "../decimal/index.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A decimal given as a string or number on the wire, parsed to LibDecimal. */
export const decimalSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
	try {
		return LibDecimal.from(value);
	} catch {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a decimal: ${String(value)}` });
		return z.NEVER;
	}
});

export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

export class ValidationError extends TradingError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", "non_retryable", { issues: formatIssues(issues) });
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** `path.to.field: message; other: message` */
export function formatIssues(issues: readonly ValidationIssue[]): string {
	return issues
		.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
		.join("; ");
}

export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
	label = "payload",
): Result<T, ValidationError> {
	const parsed = schema.safeParse(data);
	if (parsed.success) return ok(parsed.data);
	const issues: ValidationIssue[] = parsed.error.issues.map((issue) => ({
		path: issue.path,
		message: issue.message,
	}));
	return err(new ValidationError(`Invalid ${label}`, issues));
}

/** Parse a JSON string, then validate it. Syntax errors become ValidationErrors too. */
export function validateJson<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	text: string,
	label = "payload",
): Result<T, ValidationError> {
	let data: unknown;
	try {
		data = JSON.parse(text);
	} catch (e) {
		const message = e instanceof Error ? e.message : String(e);
		return err(new ValidationError(`Invalid ${label}`, [{ path: [], message }]));
	}
	return validate(schema, data, label);
}
