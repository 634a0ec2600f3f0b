import {
	type Atom,
	backwardChain,
	ConfigurationManager,
	type FactSet,
	forwardChain,
	getDefaultLogger,
	type InferenceConfig,
	Logger,
	type ProofStep,
	type RuleRecord,
	type RuleSet,
	type TraceEntry,
} from "@faultline/inference";
import _ from "lodash";
import {
	BACKWARD_RULES,
	FAULT_PREFIX,
	FORWARD_RULES,
} from "./knowledge-base.js";
import {
	normalizeFacts,
	normalizeGoal,
	parseBackwardRequest,
	parseForwardRequest,
} from "./request.js";

export interface DiagnosisContext {
	readonly forwardRules: RuleSet;
	readonly backwardRules: RuleSet;
	readonly faultPrefix: string;
	readonly logger?: Logger;
	readonly config?: InferenceConfig;
}

export const defaultContext: DiagnosisContext = {
	forwardRules: FORWARD_RULES,
	backwardRules: BACKWARD_RULES,
	faultPrefix: FAULT_PREFIX,
};

export interface ForwardDiagnosis {
	readonly inputFacts: Atom[];
	/** Derived atoms that were not part of the input. */
	readonly derivedFacts: Atom[];
	readonly trace: readonly TraceEntry[];
	readonly faults: Atom[];
}

export interface BackwardDiagnosis {
	readonly goal: Atom;
	readonly facts: Atom[];
	readonly provable: boolean;
	readonly proof: readonly ProofStep[];
}

export interface RuleCatalog {
	readonly forwardRules: RuleRecord[];
	readonly backwardRules: RuleRecord[];
	readonly faultPrefix: string;
}

/**
 * The context's own logger wins; otherwise one built from its logging config.
 */
function contextLogger(context: DiagnosisContext): Logger {
	if (context.logger) return context.logger;
	return context.config
		? new Logger(context.config.logging)
		: getDefaultLogger();
}

const sorted = (atoms: Iterable<Atom>): Atom[] => _.sortBy([...atoms]);

function runForward(facts: FactSet, context: DiagnosisContext): ForwardDiagnosis {
	const logger = contextLogger(context);
	const { known, trace } = forwardChain(facts, context.forwardRules, {
		logger,
	});
	const faults = [...known].filter((atom) =>
		atom.startsWith(context.faultPrefix),
	);

	logger.log("FORWARD_DIAGNOSIS", () => ({
		facts: facts.size,
		derived: trace.length,
		faults,
	}));

	return {
		inputFacts: sorted(facts),
		derivedFacts: sorted(_.difference([...known], [...facts])),
		trace,
		faults: sorted(faults),
	};
}

function runBackward(
	facts: FactSet,
	goal: Atom,
	context: DiagnosisContext,
): BackwardDiagnosis {
	const logger = contextLogger(context);
	const config = context.config ?? ConfigurationManager.createDefault();
	const { provable, proof, cycles } = backwardChain(
		goal,
		facts,
		context.backwardRules,
		{ logger, config: config.backward },
	);

	logger.log("BACKWARD_DIAGNOSIS", { goal, provable, cycles });

	return {
		goal,
		facts: sorted(facts),
		provable,
		proof,
	};
}

/**
 * Derives everything the facts support and reports the fault hypotheses
 * among them. Input faults count as faults too.
 */
export function forwardDiagnose(
	facts: readonly string[],
	context: DiagnosisContext = defaultContext,
): ForwardDiagnosis {
	return runForward(normalizeFacts(facts), context);
}

/**
 * Tries to prove `goal` from the facts with the stricter rule set.
 */
export function backwardDiagnose(
	facts: readonly string[],
	goal: string,
	context: DiagnosisContext = defaultContext,
): BackwardDiagnosis {
	return runBackward(normalizeFacts(facts), normalizeGoal(goal), context);
}

export function describeRules(
	context: DiagnosisContext = defaultContext,
): RuleCatalog {
	return {
		forwardRules: context.forwardRules.toJSON(),
		backwardRules: context.backwardRules.toJSON(),
		faultPrefix: context.faultPrefix,
	};
}

/**
 * Validates an untyped request body, then runs {@link forwardDiagnose}.
 */
export function diagnoseForwardRequest(
	input: unknown,
	context: DiagnosisContext = defaultContext,
): ForwardDiagnosis {
	const request = parseForwardRequest(input);
	return runForward(request.facts, context);
}

export function diagnoseBackwardRequest(
	input: unknown,
	context: DiagnosisContext = defaultContext,
): BackwardDiagnosis {
	const request = parseBackwardRequest(input);
	return runBackward(request.facts, request.goal, context);
}
