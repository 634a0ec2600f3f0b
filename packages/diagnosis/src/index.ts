// Fault Diagnosis Export
// -----------------------------------------------------------------------------

export {
	backwardDiagnose,
	type BackwardDiagnosis,
	defaultContext,
	describeRules,
	type DiagnosisContext,
	diagnoseBackwardRequest,
	diagnoseForwardRequest,
	forwardDiagnose,
	type ForwardDiagnosis,
	type RuleCatalog,
} from "./diagnose.js";
export { DiagnosisInputError } from "./errors.js";
export {
	BACKWARD_RULES,
	FAULT_PREFIX,
	FORWARD_RULES,
} from "./knowledge-base.js";
export {
	type BackwardRequest,
	BackwardRequestSchema,
	type ForwardRequest,
	ForwardRequestSchema,
	type NormalizedBackwardRequest,
	type NormalizedForwardRequest,
	normalizeFacts,
	normalizeGoal,
	parseBackwardRequest,
	parseForwardRequest,
} from "./request.js";
