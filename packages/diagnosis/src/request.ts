import type { Atom, FactSet } from "@faultline/inference";
import { z } from "zod";
import { DiagnosisInputError } from "./errors.js";

export const ForwardRequestSchema = z.object({
	facts: z.array(z.string()),
});

export const BackwardRequestSchema = z.object({
	facts: z.array(z.string()),
	goal: z.string(),
});

export type ForwardRequest = z.infer<typeof ForwardRequestSchema>;
export type BackwardRequest = z.infer<typeof BackwardRequestSchema>;

export interface NormalizedForwardRequest {
	readonly facts: FactSet;
}

export interface NormalizedBackwardRequest {
	readonly facts: FactSet;
	readonly goal: Atom;
}

/**
 * Trims every atom and drops the blank ones; duplicates collapse.
 */
export function normalizeFacts(raw: readonly string[]): FactSet {
	const facts = new Set<Atom>();
	for (const atom of raw) {
		const trimmed = atom.trim();
		if (trimmed) facts.add(trimmed);
	}
	return facts;
}

/**
 * Trims the goal. A goal left empty is still a goal: it simply has no proof.
 */
export function normalizeGoal(raw: string): Atom {
	return raw.trim();
}

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map(
		(issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
	);
}

export function parseForwardRequest(input: unknown): NormalizedForwardRequest {
	const parsed = ForwardRequestSchema.safeParse(input);
	if (!parsed.success) {
		throw new DiagnosisInputError(formatIssues(parsed.error));
	}
	return { facts: normalizeFacts(parsed.data.facts) };
}

export function parseBackwardRequest(
	input: unknown,
): NormalizedBackwardRequest {
	const parsed = BackwardRequestSchema.safeParse(input);
	if (!parsed.success) {
		throw new DiagnosisInputError(formatIssues(parsed.error));
	}
	return {
		facts: normalizeFacts(parsed.data.facts),
		goal: normalizeGoal(parsed.data.goal),
	};
}
