import type { ZodError } from "zod";

export interface ValidationErrorBody {
	error: string;
	details: Array<string>;
}

/**
 * Positive integer path parameter, or undefined.
 */
export function parseId(value: string): number | undefined {
	if (!/^\d+$/.test(value)) {
		return;
	}
	const id = Number(value);
	return Number.isSafeInteger(id) && id > 0 ? id : undefined;
}

export function validationError(error: ZodError): ValidationErrorBody {
	return {
		error: "Invalid request",
		details: error.issues.map(issue => `${issue.path.join(".") || "body"}: ${issue.message}`),
	};
}
