// Core Types for Propositional Inference
// -----------------------------------------------------------------------------

/**
 * An opaque, case-sensitive proposition name.
 */
export type Atom = string;

/**
 * A single Horn clause: when every antecedent holds, the consequent holds.
 */
export interface Rule {
	readonly antecedents: readonly Atom[];
	readonly consequent: Atom;
	readonly description?: string;
}

/**
 * The serialized shape of a rule, as it appears in traces and proofs.
 */
export interface RuleRecord {
	readonly antecedents: readonly Atom[];
	readonly consequent: Atom;
	readonly description: string | null;
}

/**
 * A set of ground truths.
 */
export type FactSet = ReadonlySet<Atom>;

/**
 * One rule firing during forward chaining.
 */
export type TraceEntry = RuleRecord;

export interface GivenStep {
	readonly goal: Atom;
	readonly type: "given";
}

export interface InferredStep {
	readonly goal: Atom;
	readonly type: "inferred";
	readonly using: RuleRecord;
	readonly subproof: readonly ProofStep[];
}

export interface CycleStep {
	readonly goal: Atom;
	readonly type: "cycle";
}

export interface NotProvableStep {
	readonly goal: Atom;
	readonly type: "not-provable";
}

/**
 * A node of a backward-chaining proof tree.
 */
export type ProofStep = GivenStep | InferredStep | CycleStep | NotProvableStep;

export interface ForwardResult {
	/** Input facts plus everything derived from them. */
	readonly known: FactSet;
	readonly trace: readonly TraceEntry[];
}

export interface BackwardResult {
	readonly provable: boolean;
	readonly proof: readonly ProofStep[];
	/**
	 * Goals cut off because they were already on the active path, in the order
	 * first seen. Failed candidates are dropped from `proof`, so this is where
	 * a dependency loop stays visible.
	 */
	readonly cycles: readonly Atom[];
}
