/**
 * Help text returned for each entry point, written in the call syntax of the
 * positional argument form.
 */

export const USAGE_TOPICS = [
  "edit_distance",
  "edit_distance_unsafe",
  "levenshtein_distance",
  "demerau_levenshtein_distance",
  "optimal_alignment_distance",
] as const;

export type UsageTopic = (typeof USAGE_TOPICS)[number];

/** Error raised when help is requested for an unknown entry point. */
export class UnknownUsageTopicError extends Error {
  public readonly code = "E-USAGE-UNKNOWN";
  public readonly hint = `known topics: ${USAGE_TOPICS.join(", ")}`;

  constructor(readonly topic: string) {
    super(`no usage documentation for '${topic}'`);
    this.name = "UnknownUsageTopicError";
  }
}

const COST_ARGUMENTS = [
  "  ins_cost        cost of inserting one character",
  "  del_cost        cost of deleting one character",
  "  sub_cost        cost of substituting one character for another",
  "  tp_cost         cost of a transposition whose characters may be edited again (optional)",
  "  final_tp_cost   cost of a transposition whose characters are never edited again (optional)",
  "  spec_sub_cost   cost of the special substitutions (optional)",
  "  spec_sub_from   source characters of the special substitutions (optional)",
  "  spec_sub_to     target characters, paired by position with spec_sub_from (optional)",
];

const ARGUMENT_FORMS = [
  "Accepted cost argument lists:",
  "  ins_cost, del_cost, sub_cost",
  "  ins_cost, del_cost, sub_cost, tp_cost",
  "  ins_cost, del_cost, sub_cost, tp_cost, final_tp_cost",
  "  ins_cost, del_cost, sub_cost, tp_cost, final_tp_cost, spec_sub_cost",
  "  ins_cost, del_cost, sub_cost, tp_cost, spec_sub_cost, spec_sub_from, spec_sub_to",
  "  ins_cost, del_cost, sub_cost, tp_cost, final_tp_cost, spec_sub_cost, spec_sub_from, spec_sub_to",
];

const CONSTRAINTS = [
  "Constraints checked before computing:",
  "  1. every cost is a non-negative integer",
  "  2. final_tp_cost <= tp_cost",
  "  3. ins_cost + del_cost <= 2 * final_tp_cost",
  "  4. max(sub_cost, spec_sub_cost) <= final_tp_cost",
  "Omitted transposition costs disable their channel; constraints 3 and 4 then",
  "use the cheapest enabled transposition, and hold trivially when none is enabled.",
];

function metricUsage(name: string, summary: string, example: string): string {
  return [
    `${name}(source, target) -> integer`,
    "",
    summary,
    "All operations cost 1. Inputs are compared character by character and case sensitively.",
    "",
    "Example:",
    `  ${example}`,
  ].join("\n");
}

const USAGE_TEXT: Readonly<Record<UsageTopic, string>> = {
  edit_distance: [
    "edit_distance(source, target, ins_cost, del_cost, sub_cost",
    "              [, tp_cost [, final_tp_cost] [, spec_sub_cost [, spec_sub_from, spec_sub_to]]]) -> integer",
    "",
    "Minimum total cost of the insertions, deletions, substitutions and adjacent",
    "transpositions turning source into target.",
    "",
    "Arguments:",
    ...COST_ARGUMENTS,
    "",
    ...ARGUMENT_FORMS,
    "",
    ...CONSTRAINTS,
    "",
    "Example:",
    "  edit_distance('demerau', 'levenshtein', 1, 1, 1, 1, 1, 1, '01OIIL', 'OI01LI') = 9",
  ].join("\n"),
  edit_distance_unsafe: [
    "edit_distance_unsafe(source, target, ins_cost, del_cost, sub_cost",
    "                     [, tp_cost [, final_tp_cost] [, spec_sub_cost [, spec_sub_from, spec_sub_to]]]) -> integer",
    "",
    "Same computation as edit_distance without checking the constraints. When the",
    "constraints do not hold the result is deterministic but may exceed the true",
    "minimum cost.",
    "",
    "Arguments:",
    ...COST_ARGUMENTS,
    "",
    ...ARGUMENT_FORMS,
    "",
    "Example:",
    "  edit_distance_unsafe('ab', 'ba', 2, 2, 2, 1, 1) = 1",
  ].join("\n"),
  levenshtein_distance: metricUsage(
    "levenshtein_distance",
    "Insertions, deletions and substitutions only.",
    "levenshtein_distance('demerau', 'levenshtein') = 9",
  ),
  demerau_levenshtein_distance: metricUsage(
    "demerau_levenshtein_distance",
    "Adds transpositions of adjacent characters, which may be edited again afterwards.",
    "demerau_levenshtein_distance('ca', 'abc') = 2",
  ),
  optimal_alignment_distance: metricUsage(
    "optimal_alignment_distance",
    "Adds transpositions of adjacent characters; a transposed pair is never edited again.",
    "optimal_alignment_distance('ca', 'abc') = 3",
  ),
};

function isUsageTopic(topic: string): topic is UsageTopic {
  return USAGE_TOPICS.some((name) => name === topic);
}

/**
 * Returns the help text of {@link topic}, or the list of documented entry
 * points when no topic is given.
 */
export function usage(topic?: string): string {
  if (topic === undefined || topic.trim().length === 0) {
    return [
      "Edit distance functions:",
      ...USAGE_TOPICS.map((name) => `  ${name}`),
      "",
      "Call usage('<function name>') for the arguments of a function.",
    ].join("\n");
  }
  const normalised = topic.trim().toLowerCase();
  if (!isUsageTopic(normalised)) {
    throw new UnknownUsageTopicError(topic);
  }
  return USAGE_TEXT[normalised];
}
