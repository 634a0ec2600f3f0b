import { RuleSetError } from "./errors.js";
import type { Atom, Rule, RuleRecord } from "./types.js";

/**
 * Converts a rule into the record shape used by traces, proofs and rule dumps.
 */
export function toRuleRecord(rule: Rule): RuleRecord {
	return {
		antecedents: [...rule.antecedents],
		consequent: rule.consequent,
		description: rule.description ?? null,
	};
}

function freezeRule(rule: Rule, index: number): Rule {
	if (rule.consequent.trim() === "") {
		throw new RuleSetError(`Rule ${index} has an empty consequent`, index);
	}
	const blank = rule.antecedents.findIndex((a) => a.trim() === "");
	if (blank !== -1) {
		throw new RuleSetError(
			`Rule ${index} (${rule.consequent}) has a blank antecedent at position ${blank}`,
			index,
		);
	}
	const frozen: Rule =
		rule.description === undefined
			? {
					antecedents: Object.freeze([...rule.antecedents]),
					consequent: rule.consequent,
				}
			: {
					antecedents: Object.freeze([...rule.antecedents]),
					consequent: rule.consequent,
					description: rule.description,
				};
	return Object.freeze(frozen);
}

/**
 * An ordered, immutable collection of rules.
 *
 * Order is significant: forward chaining fires rules in list order within a
 * pass, and backward chaining tries the rules for a goal in list order.
 */
export class RuleSet {
	readonly rules: readonly Rule[];
	private readonly byConsequent: ReadonlyMap<Atom, readonly Rule[]>;

	private constructor(
		rules: readonly Rule[],
		readonly name: string,
	) {
		this.rules = Object.freeze(rules.map(freezeRule));

		const index = new Map<Atom, Rule[]>();
		for (const rule of this.rules) {
			const bucket = index.get(rule.consequent);
			if (bucket) {
				bucket.push(rule);
			} else {
				index.set(rule.consequent, [rule]);
			}
		}
		this.byConsequent = index;
		Object.freeze(this);
	}

	static of(rules: readonly Rule[], name = "rules"): RuleSet {
		return new RuleSet(rules, name);
	}

	get size(): number {
		return this.rules.length;
	}

	/**
	 * Rules concluding `atom`, in list order.
	 */
	rulesFor(atom: Atom): readonly Rule[] {
		return this.byConsequent.get(atom) ?? [];
	}

	/**
	 * Every atom mentioned by some rule, sorted.
	 */
	atoms(): Atom[] {
		const seen = new Set<Atom>();
		for (const rule of this.rules) {
			for (const a of rule.antecedents) seen.add(a);
			seen.add(rule.consequent);
		}
		return [...seen].sort();
	}

	toJSON(): RuleRecord[] {
		return this.rules.map(toRuleRecord);
	}
}
