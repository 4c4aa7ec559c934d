import { resolveCostModel, type CostModel, type CostModelInput, type SpecialSubstitution } from "./costModel.js";
import { CostModelInputError } from "./errors.js";
import { checkCostValues, validateCostModel } from "./validator.js";

/**
 * Builds the substitution lookup once per call. Earlier pairs shadow later
 * ones sharing the same source character.
 */
function buildSubstitutionLookup(pairs: ReadonlyArray<SpecialSubstitution>): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const pair of pairs) {
    if (!lookup.has(pair.from)) {
      lookup.set(pair.from, pair.to);
    }
  }
  return lookup;
}

function largestCost(model: CostModel): number {
  const enabled = [
    model.insCost,
    model.delCost,
    model.subCost,
    model.tpCost,
    model.finalTpCost,
    model.specSubCost,
  ].filter((cost): cost is number => cost !== null);
  return Math.max(0, ...enabled);
}

/**
 * Rejects inputs whose costs could sum past `Number.MAX_SAFE_INTEGER`. Every
 * value the recurrence builds, candidates included, stays within
 * `(2 * (m + n) + 1) * maxCost`.
 */
function assertExactRange(m: number, n: number, model: CostModel): void {
  const maxCost = largestCost(model);
  const limit = Math.floor(Number.MAX_SAFE_INTEGER / (2 * (m + n) + 1));
  if (maxCost > limit) {
    throw new CostModelInputError(
      `a cost of ${maxCost} over ${m + n} characters exceeds the exact integer range`,
      { maxCost, limit, characters: m + n },
    );
  }
}

function createGrid(rows: number, columns: number): number[][] {
  return Array.from({ length: rows }, () => new Array<number>(columns).fill(0));
}

/**
 * Weighted edit distance with insertions, deletions, substitutions and two
 * transposition channels.
 *
 * The final channel reads `D[i-2][j-2]` directly, so the two swapped
 * characters never take part in another operation. The non-final channel
 * follows the last-seen positions of the swapped characters and charges the
 * characters skipped in between as deletions (source) and insertions (target),
 * which lets the transposed pair be edited again.
 *
 * Any two strings and any non-negative integer costs produce a deterministic
 * result, which is only guaranteed to be the true minimum when the model
 * satisfies the validator invariants. Throws {@link CostModelInputError} when
 * the costs are too large to be summed exactly for inputs of this length.
 */
export function computeEditDistance(source: string, target: string, model: CostModel): number {
  const a = Array.from(source);
  const b = Array.from(target);
  const m = a.length;
  const n = b.length;
  assertExactRange(m, n, model);
  const { insCost, delCost, subCost, tpCost, finalTpCost, specSubCost } = model;
  const substitutions =
    specSubCost === null ? new Map<string, string>() : buildSubstitutionLookup(model.specialSubstitutions);

  const grid = createGrid(m + 1, n + 1);
  for (let i = 1; i <= m; i += 1) {
    grid[i][0] = i * delCost;
  }
  for (let j = 1; j <= n; j += 1) {
    grid[0][j] = j * insCost;
  }

  // Last row (1-based) at which each character was seen in the source.
  const lastRow = new Map<string, number>();

  for (let i = 1; i <= m; i += 1) {
    const current = a[i - 1];
    // Last column (1-based, before j) whose target character equals `current`.
    let lastMatchColumn = 0;

    for (let j = 1; j <= n; j += 1) {
      const expected = b[j - 1];
      const swapRow = lastRow.get(expected) ?? 0;
      const swapColumn = lastMatchColumn;

      let substitution: number;
      if (current === expected) {
        substitution = 0;
        lastMatchColumn = j;
      } else if (specSubCost !== null && substitutions.get(current) === expected) {
        substitution = specSubCost;
      } else {
        substitution = subCost;
      }

      let best = Math.min(
        grid[i - 1][j] + delCost,
        grid[i][j - 1] + insCost,
        grid[i - 1][j - 1] + substitution,
      );

      if (finalTpCost !== null && i >= 2 && j >= 2 && a[i - 2] === expected && current === b[j - 2]) {
        best = Math.min(best, grid[i - 2][j - 2] + finalTpCost);
      }

      if (tpCost !== null && swapRow > 0 && swapColumn > 0) {
        const skippedSource = i - swapRow - 1;
        const skippedTarget = j - swapColumn - 1;
        best = Math.min(
          best,
          grid[swapRow - 1][swapColumn - 1] + skippedSource * delCost + skippedTarget * insCost + tpCost,
        );
      }

      grid[i][j] = best;
    }

    lastRow.set(current, i);
  }

  return grid[m][n];
}

/**
 * Validated entry point: checks the cost model invariants before running the
 * recurrence and throws {@link InvalidCostModelError} on the first violation.
 */
export function editDistance(source: string, target: string, costs: CostModel | CostModelInput): number {
  const model = resolveCostModel(costs);
  validateCostModel(model);
  return computeEditDistance(source, target, model);
}

/**
 * Skips invariants 2 to 4. Callers are responsible for keeping the model
 * consistent; an inconsistent model still yields a deterministic non-negative
 * integer, which may differ from the true minimum-cost distance. Costs that are
 * not non-negative integers raise {@link CostModelInputError}.
 */
export function editDistanceUnsafe(source: string, target: string, costs: CostModel | CostModelInput): number {
  const model = resolveCostModel(costs);
  const values = checkCostValues(model);
  if (!values.ok) {
    throw new CostModelInputError(values.violation.message, values.violation);
  }
  return computeEditDistance(source, target, model);
}
