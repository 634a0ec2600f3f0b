/**
 * Raised when a rule set is built from ill-formed rules.
 */
export class RuleSetError extends Error {
	constructor(
		message: string,
		readonly ruleIndex: number,
	) {
		super(message);
		this.name = "RuleSetError";
	}
}
