import type { CostModel } from "./costModel.js";
import {
  COST_MODEL_INVARIANTS,
  InvalidCostModelError,
  type CostModelInvariant,
  type CostModelViolation,
} from "./errors.js";

/** Summary returned when checking a cost model. */
export type CostModelReport = { ok: true } | { ok: false; violation: CostModelViolation };

const COST_KEYS = ["insCost", "delCost", "subCost", "tpCost", "finalTpCost", "specSubCost"] as const;

function violation(
  invariant: CostModelInvariant,
  message: string,
  hint: string,
  values: Record<string, number | null>,
): CostModelReport {
  return {
    ok: false,
    violation: { invariant, index: COST_MODEL_INVARIANTS[invariant], message, hint, values },
  };
}

/**
 * Cheapest enabled transposition cost. Disabled channels behave as an infinite
 * cost, so `null` is returned when neither channel is enabled.
 */
export function cheapestTranspositionCost(model: CostModel): number | null {
  const enabled = [model.tpCost, model.finalTpCost].filter((cost): cost is number => cost !== null);
  return enabled.length === 0 ? null : Math.min(...enabled);
}

/**
 * Checks invariant 1 alone: every enabled cost is a non-negative safe integer.
 * This is the domain of the recurrence, so the unvalidated entry point checks
 * it too.
 */
export function checkCostValues(model: CostModel): CostModelReport {
  for (const key of COST_KEYS) {
    const value = model[key];
    if (value === null) {
      continue;
    }
    if (!Number.isSafeInteger(value) || value < 0) {
      return violation(
        "non_negative_costs",
        `${key} must be a non-negative integer but received ${value}`,
        "use whole costs greater than or equal to zero",
        { [key]: value },
      );
    }
  }
  return { ok: true };
}

/**
 * Checks the four cost-model invariants in order and reports the first
 * violation. The invariants bound how cheap a transposition may be relative to
 * substitutions and to a deletion followed by an insertion, which keeps the
 * recurrence exact without extra bookkeeping.
 */
export function checkCostModel(model: CostModel): CostModelReport {
  const values = checkCostValues(model);
  if (!values.ok) {
    return values;
  }

  const { tpCost, finalTpCost } = model;
  if (tpCost !== null && finalTpCost !== null && finalTpCost > tpCost) {
    return violation(
      "final_tp_within_tp",
      `finalTpCost (${finalTpCost}) exceeds tpCost (${tpCost})`,
      "a sealed transposition may not cost more than a reusable one",
      { tpCost, finalTpCost },
    );
  }

  const transposition = cheapestTranspositionCost(model);
  if (transposition === null) {
    return { ok: true };
  }

  if (model.insCost + model.delCost > 2 * transposition) {
    return violation(
      "indel_within_double_transposition",
      `insCost + delCost (${model.insCost + model.delCost}) exceeds twice the transposition cost (${transposition})`,
      "raise the transposition cost or lower the insertion and deletion costs",
      { insCost: model.insCost, delCost: model.delCost, transpositionCost: transposition },
    );
  }

  const substitution = Math.max(model.subCost, model.specSubCost ?? 0);
  if (substitution > transposition) {
    return violation(
      "substitution_within_transposition",
      `substitution cost (${substitution}) exceeds the transposition cost (${transposition})`,
      "a transposition may not be cheaper than a single substitution",
      { subCost: model.subCost, specSubCost: model.specSubCost, transpositionCost: transposition },
    );
  }

  return { ok: true };
}

/** Throws {@link InvalidCostModelError} on the first violated invariant. */
export function validateCostModel(model: CostModel): void {
  const report = checkCostModel(model);
  if (!report.ok) {
    throw new InvalidCostModelError(report.violation);
  }
}
