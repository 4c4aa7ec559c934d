import { z } from "zod";

import { CostModelInputError } from "./errors.js";

/** Directional pair substituted at the special cost instead of the generic one. */
export interface SpecialSubstitution {
  readonly from: string;
  readonly to: string;
}

/**
 * Immutable cost configuration consumed by the distance engine. `null` costs
 * disable the corresponding channel: the recurrence skips it entirely instead
 * of relying on a sentinel value.
 */
export interface CostModel {
  readonly insCost: number;
  readonly delCost: number;
  readonly subCost: number;
  /** Non-final transposition: transposed characters may be edited again. */
  readonly tpCost: number | null;
  /** Final transposition: transposed characters are sealed. */
  readonly finalTpCost: number | null;
  /** Cost applied to pairs listed in {@link specialSubstitutions}. */
  readonly specSubCost: number | null;
  /** Ordered table; the first pair wins when a `from` character repeats. */
  readonly specialSubstitutions: ReadonlyArray<SpecialSubstitution>;
}

const CostValueSchema = z.number().finite();
const OptionalCostValueSchema = CostValueSchema.nullable().optional();

/**
 * Shape of the cost arguments accepted by the public entry points. The schema
 * only checks types; the invariants binding the costs together are enforced by
 * the validator so the safe entry point can report which one failed.
 */
export const CostModelInputSchema = z
  .object({
    insCost: CostValueSchema,
    delCost: CostValueSchema,
    subCost: CostValueSchema,
    tpCost: OptionalCostValueSchema,
    finalTpCost: OptionalCostValueSchema,
    specSubCost: OptionalCostValueSchema,
    specSubFrom: z.string().optional(),
    specSubTo: z.string().optional(),
  })
  .strict()
  .superRefine((input, ctx) => {
    const hasFrom = input.specSubFrom !== undefined;
    const hasTo = input.specSubTo !== undefined;
    if (hasFrom !== hasTo) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [hasFrom ? "specSubTo" : "specSubFrom"],
        message: "specSubFrom and specSubTo must be provided together",
      });
      return;
    }
    if (hasFrom && hasTo && countCharacters(input.specSubFrom) !== countCharacters(input.specSubTo)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["specSubTo"],
        message: "specSubFrom and specSubTo must contain the same number of characters",
      });
    }
  });

export type CostModelInput = z.infer<typeof CostModelInputSchema>;

function countCharacters(value: string | undefined): number {
  return value === undefined ? 0 : Array.from(value).length;
}

/** Pairs the characters of the two parallel strings, preserving their order. */
export function buildSpecialSubstitutions(from: string, to: string): SpecialSubstitution[] {
  const sources = Array.from(from);
  const targets = Array.from(to);
  const length = Math.min(sources.length, targets.length);
  const pairs: SpecialSubstitution[] = [];
  for (let index = 0; index < length; index += 1) {
    pairs.push(Object.freeze({ from: sources[index], to: targets[index] }));
  }
  return pairs;
}

/** Validates the shape of {@link input} and returns a frozen {@link CostModel}. */
export function createCostModel(input: unknown): CostModel {
  const parsed = CostModelInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new CostModelInputError("cost model input is invalid", { issues: parsed.error.issues });
  }
  const data = parsed.data;
  const specialSubstitutions =
    data.specSubFrom !== undefined && data.specSubTo !== undefined
      ? buildSpecialSubstitutions(data.specSubFrom, data.specSubTo)
      : [];

  return Object.freeze({
    insCost: data.insCost,
    delCost: data.delCost,
    subCost: data.subCost,
    tpCost: data.tpCost ?? null,
    finalTpCost: data.finalTpCost ?? null,
    specSubCost: data.specSubCost ?? null,
    specialSubstitutions: Object.freeze(specialSubstitutions),
  });
}

/** Narrows the union accepted by the entry points. */
export function isCostModel(costs: CostModel | CostModelInput): costs is CostModel {
  return "specialSubstitutions" in costs;
}

/** Returns {@link costs} untouched when already built, otherwise builds it. */
export function resolveCostModel(costs: CostModel | CostModelInput): CostModel {
  return isCostModel(costs) ? costs : createCostModel(costs);
}

type PositionalCostKey = keyof CostModelInput;

const TEXT_ARGUMENT_KEYS: ReadonlySet<PositionalCostKey> = new Set<PositionalCostKey>(["specSubFrom", "specSubTo"]);

/**
 * Layout of the cost arguments following `source` and `target`, by count.
 * With seven arguments `final_tp_cost` is omitted so the special-substitution
 * table can follow a single transposition cost.
 */
const POSITIONAL_LAYOUTS: ReadonlyMap<number, ReadonlyArray<PositionalCostKey>> = new Map<
  number,
  ReadonlyArray<PositionalCostKey>
>([
  [3, ["insCost", "delCost", "subCost"]],
  [4, ["insCost", "delCost", "subCost", "tpCost"]],
  [5, ["insCost", "delCost", "subCost", "tpCost", "finalTpCost"]],
  [6, ["insCost", "delCost", "subCost", "tpCost", "finalTpCost", "specSubCost"]],
  [7, ["insCost", "delCost", "subCost", "tpCost", "specSubCost", "specSubFrom", "specSubTo"]],
  [8, ["insCost", "delCost", "subCost", "tpCost", "finalTpCost", "specSubCost", "specSubFrom", "specSubTo"]],
]);

const NumericArgumentSchema = z.union([
  z.number(),
  z
    .string()
    .trim()
    .regex(/^[-+]?\d+(\.\d+)?$/, "expected a numeric literal")
    .transform((value) => Number(value)),
]);

const TextArgumentSchema = z.string();

export type PositionalCostArgument = number | string;

/**
 * Maps the positional argument family onto a cost model:
 *
 * - `ins, del, sub`: no transposition;
 * - `ins, del, sub, tp`: non-final transpositions only;
 * - `ins, del, sub, tp, final_tp`;
 * - `ins, del, sub, tp, final_tp, spec_sub_cost`: special substitutions with an empty table;
 * - `ins, del, sub, tp, spec_sub_cost, spec_sub_from, spec_sub_to`: no final transpositions;
 * - `ins, del, sub, tp, final_tp, spec_sub_cost, spec_sub_from, spec_sub_to`.
 */
export function costModelFromArguments(args: ReadonlyArray<PositionalCostArgument>): CostModel {
  const layout = POSITIONAL_LAYOUTS.get(args.length);
  if (layout === undefined) {
    throw new CostModelInputError(`expected between 3 and 8 cost arguments but received ${args.length}`, {
      received: args.length,
    });
  }

  const input: Record<string, number | string> = {};
  layout.forEach((key, index) => {
    const schema = TEXT_ARGUMENT_KEYS.has(key) ? TextArgumentSchema : NumericArgumentSchema;
    const parsed = schema.safeParse(args[index]);
    if (!parsed.success) {
      throw new CostModelInputError(`argument ${key} is invalid`, {
        argument: key,
        issues: parsed.error.issues,
      });
    }
    input[key] = parsed.data;
  });

  return createCostModel(input);
}
