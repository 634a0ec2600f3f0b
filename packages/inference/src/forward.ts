import { Observable, toArray } from "rxjs";
import { toRuleRecord, type RuleSet } from "./rule-set.js";
import { getDefaultLogger, type Logger } from "./shared/logger.js";
import type { Atom, FactSet, ForwardResult, TraceEntry } from "./types.js";

export interface ForwardOptions {
	logger?: Logger;
}

function saturate(
	facts: FactSet,
	rules: RuleSet,
	logger: Logger,
	/** Returns false to stop saturating. */
	onFire: (entry: TraceEntry) => boolean,
): void {
	const known = new Set(facts);
	let pass = 0;
	let applied = true;
	while (applied) {
		applied = false;
		pass++;
		let added = 0;
		for (const rule of rules.rules) {
			if (known.has(rule.consequent)) continue;
			if (!rule.antecedents.every((a) => known.has(a))) continue;

			known.add(rule.consequent);
			const entry = toRuleRecord(rule);
			logger.log("FORWARD_RULE_FIRED", () => ({
				ruleSet: rules.name,
				pass,
				consequent: entry.consequent,
				antecedents: entry.antecedents,
			}));
			added++;
			applied = true;
			if (!onFire(entry)) return;
		}
		logger.log("FORWARD_PASS_COMPLETE", { ruleSet: rules.name, pass, added });
	}
}

/**
 * Streams each rule firing of a forward-chaining run, in firing order.
 *
 * Emission is synchronous; the stream completes once a full pass over the
 * rules derives nothing new. Every subscription saturates afresh.
 */
export function forwardChain$(
	facts: FactSet,
	rules: RuleSet,
	options: ForwardOptions = {},
): Observable<TraceEntry> {
	const logger = options.logger ?? getDefaultLogger();
	return new Observable<TraceEntry>((subscriber) => {
		saturate(facts, rules, logger, (entry) => {
			subscriber.next(entry);
			return !subscriber.closed;
		});
		subscriber.complete();
	});
}

/**
 * Naive fixed-point forward chaining.
 *
 * Returns the least set containing `facts` that is closed under `rules`,
 * and the trace of rule firings that produced it.
 */
export function forwardChain(
	facts: FactSet,
	rules: RuleSet,
	options: ForwardOptions = {},
): ForwardResult {
	const trace: TraceEntry[] = [];
	forwardChain$(facts, rules, options)
		.pipe(toArray())
		.subscribe((entries) => {
			trace.push(...entries);
		});

	const known = new Set<Atom>(facts);
	for (const entry of trace) known.add(entry.consequent);
	return { known, trace };
}
