import { toRuleRecord, type RuleSet } from "./rule-set.js";
import { ConfigurationManager } from "./shared/config.js";
import { getDefaultLogger, type Logger } from "./shared/logger.js";
import type { BackwardConfig } from "./shared/types.js";
import type { Atom, BackwardResult, FactSet, ProofStep, Rule } from "./types.js";

export interface BackwardOptions {
	logger?: Logger;
	config?: BackwardConfig;
}

interface Outcome {
	readonly ok: boolean;
	readonly step: ProofStep;
}

/**
 * A goal under expansion: which candidate rule is being tried, how far
 * through its antecedents we are, and the proofs gathered so far.
 */
interface Frame {
	readonly goal: Atom;
	readonly depth: number;
	readonly candidates: readonly Rule[];
	ruleIndex: number;
	antecedentIndex: number;
	subproof: ProofStep[];
}

/**
 * Depth-first backward chaining with first-success commit.
 *
 * The search keeps its own stack of frames instead of recursing, so proof
 * depth is bounded by memory rather than the call stack. `path` holds the
 * goals of the frames on that stack: a subgoal already on it is a cycle, while
 * sibling branches are free to prove the same atom again.
 */
export function backwardChain(
	goal: Atom,
	facts: FactSet,
	rules: RuleSet,
	options: BackwardOptions = {},
): BackwardResult {
	const logger = options.logger ?? getDefaultLogger();
	const { maxDepth } =
		options.config ?? ConfigurationManager.createDefault().backward;

	const path = new Set<Atom>();
	const cycles = new Set<Atom>();
	const stack: Frame[] = [];

	const resolveLeaf = (atom: Atom, depth: number): Outcome | null => {
		if (facts.has(atom)) {
			logger.log("BACKWARD_GOAL_GIVEN", { goal: atom, depth });
			return { ok: true, step: { goal: atom, type: "given" } };
		}
		if (path.has(atom)) {
			cycles.add(atom);
			logger.log("BACKWARD_GOAL_CYCLE", () => ({
				goal: atom,
				path: stack.map((f) => f.goal),
			}));
			return { ok: false, step: { goal: atom, type: "cycle" } };
		}
		if (depth > maxDepth) {
			logger.log("BACKWARD_GOAL_FAILED", { goal: atom, depth, maxDepth });
			return { ok: false, step: { goal: atom, type: "not-provable" } };
		}
		return null;
	};

	const enter = (atom: Atom, depth: number): void => {
		path.add(atom);
		stack.push({
			goal: atom,
			depth,
			candidates: rules.rulesFor(atom),
			ruleIndex: 0,
			antecedentIndex: 0,
			subproof: [],
		});
	};

	const leave = (frame: Frame): void => {
		stack.pop();
		path.delete(frame.goal);
	};

	const finish = (outcome: Outcome): BackwardResult => ({
		provable: outcome.ok,
		proof: [outcome.step],
		cycles: [...cycles],
	});

	let result = resolveLeaf(goal, 1);
	if (result) return finish(result);
	enter(goal, 1);

	// The stack is never empty here: popping the root frame returns.
	for (;;) {
		const frame = stack[stack.length - 1];
		if (result) {
			frame.subproof.push(result.step);
			if (result.ok) {
				frame.antecedentIndex++;
			} else {
				// Short-circuit this candidate and move on to the next one.
				frame.ruleIndex++;
				frame.antecedentIndex = 0;
				frame.subproof = [];
			}
			result = null;
		}

		const rule = frame.candidates[frame.ruleIndex];
		if (rule === undefined) {
			logger.log("BACKWARD_GOAL_FAILED", {
				goal: frame.goal,
				depth: frame.depth,
				candidates: frame.candidates.length,
			});
			leave(frame);
			result = { ok: false, step: { goal: frame.goal, type: "not-provable" } };
			if (stack.length === 0) return finish(result);
		} else if (frame.antecedentIndex >= rule.antecedents.length) {
			logger.log("BACKWARD_GOAL_PROVED", {
				goal: frame.goal,
				using: rule.antecedents,
			});
			leave(frame);
			result = {
				ok: true,
				step: {
					goal: frame.goal,
					type: "inferred",
					using: toRuleRecord(rule),
					subproof: frame.subproof,
				},
			};
			if (stack.length === 0) return finish(result);
		} else {
			if (frame.antecedentIndex === 0) {
				logger.log("BACKWARD_RULE_TRY", {
					goal: frame.goal,
					rule: frame.ruleIndex,
					antecedents: rule.antecedents,
				});
			}
			const subgoal = rule.antecedents[frame.antecedentIndex];
			result = resolveLeaf(subgoal, frame.depth + 1);
			if (!result) enter(subgoal, frame.depth + 1);
		}
	}
}
