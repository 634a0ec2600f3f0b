/**
 * Raised for a diagnosis request that cannot reach the inference core:
 * non-string atoms, a missing goal, facts that are not a list.
 */
export class DiagnosisInputError extends Error {
	constructor(readonly issues: readonly string[]) {
		super(`Invalid diagnosis request: ${issues.join("; ")}`);
		this.name = "DiagnosisInputError";
	}
}
