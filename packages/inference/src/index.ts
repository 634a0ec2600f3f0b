// Propositional Inference Export
// -----------------------------------------------------------------------------

export { backwardChain, type BackwardOptions } from "./backward.js";
export { RuleSetError } from "./errors.js";
export { forwardChain, forwardChain$, type ForwardOptions } from "./forward.js";
export { formatProof, proofDepth, proofLeaves, proofRules } from "./proof.js";
export { RuleSet, toRuleRecord } from "./rule-set.js";
export { ConfigurationManager } from "./shared/config.js";
export { getDefaultLogger, Logger } from "./shared/logger.js";
export type {
	BackwardConfig,
	InferenceConfig,
	InferenceConfigOverrides,
	LogConfig,
	LogPayload,
} from "./shared/types.js";
export type {
	Atom,
	BackwardResult,
	CycleStep,
	FactSet,
	ForwardResult,
	GivenStep,
	InferredStep,
	NotProvableStep,
	ProofStep,
	Rule,
	RuleRecord,
	TraceEntry,
} from "./types.js";
