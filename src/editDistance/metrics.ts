import type { CostModel } from "./costModel.js";
import { computeEditDistance } from "./engine.js";

function unitCosts(tpCost: number | null, finalTpCost: number | null): CostModel {
  return Object.freeze({
    insCost: 1,
    delCost: 1,
    subCost: 1,
    tpCost,
    finalTpCost,
    specSubCost: null,
    specialSubstitutions: Object.freeze([]),
  });
}

/** Classic three-operation distance. */
export const LEVENSHTEIN_COSTS = unitCosts(null, null);

/** Unrestricted transpositions: swapped characters may be edited again. */
export const DAMERAU_LEVENSHTEIN_COSTS = unitCosts(1, null);

/** Restricted transpositions: each swapped pair is sealed afterwards. */
export const OPTIMAL_ALIGNMENT_COSTS = unitCosts(null, 1);

export const METRIC_NAMES = ["levenshtein", "damerau-levenshtein", "optimal-alignment"] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

export interface NamedMetric {
  readonly name: MetricName;
  readonly description: string;
  readonly costs: CostModel;
}

export const NAMED_METRICS: Readonly<Record<MetricName, NamedMetric>> = {
  levenshtein: {
    name: "levenshtein",
    description: "insertions, deletions and substitutions at unit cost",
    costs: LEVENSHTEIN_COSTS,
  },
  "damerau-levenshtein": {
    name: "damerau-levenshtein",
    description: "Levenshtein plus unrestricted adjacent transpositions",
    costs: DAMERAU_LEVENSHTEIN_COSTS,
  },
  "optimal-alignment": {
    name: "optimal-alignment",
    description: "Levenshtein plus transpositions of pairs that are never edited again",
    costs: OPTIMAL_ALIGNMENT_COSTS,
  },
};

export function levenshteinDistance(source: string, target: string): number {
  return computeEditDistance(source, target, LEVENSHTEIN_COSTS);
}

export function damerauLevenshteinDistance(source: string, target: string): number {
  return computeEditDistance(source, target, DAMERAU_LEVENSHTEIN_COSTS);
}

/** Alias matching the historical `demerau_levenshtein_distance` function name. */
export const demerauLevenshteinDistance = damerauLevenshteinDistance;

export function optimalAlignmentDistance(source: string, target: string): number {
  return computeEditDistance(source, target, OPTIMAL_ALIGNMENT_COSTS);
}

export function namedMetricDistance(name: MetricName, source: string, target: string): number {
  return computeEditDistance(source, target, NAMED_METRICS[name].costs);
}
