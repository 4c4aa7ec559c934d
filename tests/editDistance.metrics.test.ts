import { describe, it } from "mocha";
import { expect } from "chai";

import {
  NAMED_METRICS,
  damerauLevenshteinDistance,
  demerauLevenshteinDistance,
  levenshteinDistance,
  namedMetricDistance,
  optimalAlignmentDistance,
} from "../src/editDistance/metrics.js";
import { checkCostModel } from "../src/editDistance/validator.js";

describe("named metrics", () => {
  it("agree on the documented scenario", () => {
    expect(levenshteinDistance("demerau", "levenshtein")).to.equal(9);
    expect(demerauLevenshteinDistance("demerau", "levenshtein")).to.equal(9);
    expect(optimalAlignmentDistance("demerau", "levenshtein")).to.equal(9);
  });

  it("measure the empty string by unit insertions and deletions", () => {
    expect(levenshteinDistance("", "abc")).to.equal(3);
    expect(levenshteinDistance("abc", "")).to.equal(3);
    expect(damerauLevenshteinDistance("", "")).to.equal(0);
  });

  it("differ on transpositions", () => {
    expect(levenshteinDistance("ab", "ba")).to.equal(2);
    expect(damerauLevenshteinDistance("ab", "ba")).to.equal(1);
    expect(optimalAlignmentDistance("ab", "ba")).to.equal(1);

    expect(levenshteinDistance("abcd", "badc")).to.equal(3);
    expect(damerauLevenshteinDistance("abcd", "badc")).to.equal(2);
    expect(optimalAlignmentDistance("abcd", "badc")).to.equal(2);
  });

  it("only lets Damerau-Levenshtein edit a transposed pair again", () => {
    expect(levenshteinDistance("ca", "abc")).to.equal(3);
    expect(damerauLevenshteinDistance("ca", "abc")).to.equal(2);
    expect(optimalAlignmentDistance("ca", "abc")).to.equal(3);
  });

  it("match the classic textbook pairs", () => {
    expect(levenshteinDistance("kitten", "sitting")).to.equal(3);
    expect(levenshteinDistance("flaw", "lawn")).to.equal(2);
    expect(levenshteinDistance("a cat", "an act")).to.equal(3);
    expect(damerauLevenshteinDistance("a cat", "an act")).to.equal(2);
    expect(optimalAlignmentDistance("a cat", "an act")).to.equal(2);
  });

  it("resolve through the registry", () => {
    expect(namedMetricDistance("levenshtein", "ca", "abc")).to.equal(3);
    expect(namedMetricDistance("damerau-levenshtein", "ca", "abc")).to.equal(2);
    expect(namedMetricDistance("optimal-alignment", "ca", "abc")).to.equal(3);
  });

  it("use cost models accepted by the validator", () => {
    for (const metric of Object.values(NAMED_METRICS)) {
      expect(checkCostModel(metric.costs), metric.name).to.deep.equal({ ok: true });
    }
  });
});
