/**
 * Errors raised by the edit-distance layer. Each error carries a stable
 * {@link code} so the service and the CLI can surface consistent diagnostics
 * without inspecting messages.
 */

/** Invariants enforced on a cost model, in the order they are checked. */
export const COST_MODEL_INVARIANTS = {
  non_negative_costs: 1,
  final_tp_within_tp: 2,
  indel_within_double_transposition: 3,
  substitution_within_transposition: 4,
} as const;

export type CostModelInvariant = keyof typeof COST_MODEL_INVARIANTS;

/** Violation reported when a cost model breaks one of the invariants. */
export interface CostModelViolation {
  /** Identifier of the violated invariant. */
  invariant: CostModelInvariant;
  /** Position of the invariant in the checking order (1-4). */
  index: (typeof COST_MODEL_INVARIANTS)[CostModelInvariant];
  message: string;
  hint: string;
  /** Offending values, keyed by cost name. */
  values: Record<string, number | null>;
}

/** Error thrown by the validated entry point when the cost model is inconsistent. */
export class InvalidCostModelError extends Error {
  public readonly code = "E-COST-MODEL-INVALID";
  public readonly hint: string;
  public readonly details: CostModelViolation;

  constructor(readonly violation: CostModelViolation) {
    super(violation.message);
    this.name = "InvalidCostModelError";
    this.hint = violation.hint;
    this.details = violation;
  }

  get invariant(): CostModelInvariant {
    return this.violation.invariant;
  }
}

/** Error raised when cost arguments cannot be turned into a cost model. */
export class CostModelInputError extends Error {
  public readonly code = "E-COST-INPUT-INVALID";
  public readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = "CostModelInputError";
    this.details = details;
  }
}
