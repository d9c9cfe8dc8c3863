import * as z from "zod"
import { ValidationError } from "@/utils/errors";

/**
 * Treat JSON null the same as an omitted argument. Assistants frequently
 * send `null` for optional fields they do not use.
 */
export const nullish = <T extends z.ZodTypeAny>(schema: T) =>
	z.preprocess((val) => (val === null ? undefined : val), schema);

export const optional = <T extends z.ZodTypeAny>(schema: T) => nullish(schema.optional());

export const withDefault = (schema: z.ZodNumber, value: number) => nullish(schema.default(value));

export const trimmedString = () => z.string().trim().min(1, "Cannot be empty");

function valueAt(data: unknown, path: (string | number)[]): unknown {
	let current: unknown = data;
	for (const key of path) {
		if (current === null || typeof current !== "object") {
			return undefined;
		}
		current = (current as Record<string | number, unknown>)[key];
	}
	return current;
}

/**
 * Validate raw tool arguments once, at the boundary.
 *
 * Every issue is listed in the message; the first one names the field in the
 * error context.
 */
export function parseToolArgs<S extends z.ZodTypeAny>(schema: S, args: unknown): z.output<S> {
	const parsed = schema.safeParse(args ?? {});
	if (parsed.success) {
		return parsed.data;
	}

	const issues = parsed.error.issues;
	const first = issues[0];
	const field = first && first.path.length > 0 ? first.path.join(".") : "arguments";
	const message = issues
		.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
		.join("; ");

	throw new ValidationError(
		`Invalid arguments: ${message}`,
		field,
		first ? valueAt(args, first.path) : args,
	);
}
