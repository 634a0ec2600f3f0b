import type { Atom, ProofStep, Rule, RuleRecord } from "./types.js";

function fromRuleRecord(record: RuleRecord): Rule {
	return record.description === null
		? { antecedents: record.antecedents, consequent: record.consequent }
		: {
				antecedents: record.antecedents,
				consequent: record.consequent,
				description: record.description,
			};
}

const ruleKey = (rule: RuleRecord): string =>
	`${rule.antecedents.join("\u0000")}\u0001${rule.consequent}`;

/**
 * The rules a proof relies on, subproof rules before the rules that use them.
 * A rule used in several branches is listed once.
 */
export function proofRules(proof: readonly ProofStep[]): Rule[] {
	const seen = new Set<string>();
	const out: Rule[] = [];
	const visit = (steps: readonly ProofStep[]): void => {
		for (const step of steps) {
			if (step.type !== "inferred") continue;
			visit(step.subproof);
			const key = ruleKey(step.using);
			if (!seen.has(key)) {
				seen.add(key);
				out.push(fromRuleRecord(step.using));
			}
		}
	};
	visit(proof);
	return out;
}

/**
 * Atoms a proof takes as given, left to right.
 */
export function proofLeaves(proof: readonly ProofStep[]): Atom[] {
	const leaves: Atom[] = [];
	for (const step of proof) {
		if (step.type === "given") {
			leaves.push(step.goal);
		} else if (step.type === "inferred") {
			leaves.push(...proofLeaves(step.subproof));
		}
	}
	return leaves;
}

export function proofDepth(proof: readonly ProofStep[]): number {
	let depth = 0;
	for (const step of proof) {
		const below = step.type === "inferred" ? proofDepth(step.subproof) : 0;
		depth = Math.max(depth, below + 1);
	}
	return depth;
}

function describeStep(step: ProofStep): string {
	if (step.type !== "inferred") return `${step.goal} [${step.type}]`;

	let line = `${step.goal} [inferred]`;
	if (step.using.antecedents.length > 0) {
		line += ` <- ${step.using.antecedents.join(", ")}`;
	}
	if (step.using.description !== null) {
		line += ` (${step.using.description})`;
	}
	return line;
}

/**
 * Renders a proof as indented text, one step per line.
 */
export function formatProof(proof: readonly ProofStep[], indent = 0): string {
	const lines: string[] = [];
	for (const step of proof) {
		lines.push(`${"  ".repeat(indent)}${describeStep(step)}`);
		if (step.type === "inferred" && step.subproof.length > 0) {
			lines.push(formatProof(step.subproof, indent + 1));
		}
	}
	return lines.join("\n");
}
