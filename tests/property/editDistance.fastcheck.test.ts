import { describe, it } from "mocha";
import { expect } from "chai";
import fc from "fast-check";

import type { CostModelInput } from "../../src/editDistance/costModel.js";
import { editDistance } from "../../src/editDistance/engine.js";
import {
  damerauLevenshteinDistance,
  levenshteinDistance,
  optimalAlignmentDistance,
} from "../../src/editDistance/metrics.js";

/**
 * Property-based coverage of the metric laws the recurrence must honour for
 * any cost model accepted by the validator.
 */
describe("edit distance laws (property-based)", () => {
  /** Short words over a three-letter alphabet so swaps and repeats are frequent. */
  const wordArb = fc.array(fc.constantFrom("a", "b", "c"), { maxLength: 6 }).map((chars) => chars.join(""));

  /**
   * Cost models satisfying every invariant: the sealed transposition cost
   * bounds the substitution costs and half the insertion plus deletion cost.
   */
  const validCostsArb: fc.Arbitrary<CostModelInput> = fc
    .integer({ min: 1, max: 6 })
    .chain((transposition) =>
      fc.record({
        insCost: fc.integer({ min: 0, max: transposition }),
        delCost: fc.integer({ min: 0, max: transposition }),
        subCost: fc.integer({ min: 0, max: transposition }),
        tpCost: fc.integer({ min: transposition, max: transposition + 3 }),
        finalTpCost: fc.constant(transposition),
        specSubCost: fc.integer({ min: 0, max: transposition }),
        specSubFrom: fc.constant("ab"),
        specSubTo: fc.constant("ca"),
      }),
    );

  /** Symmetric models: equal insertion and deletion, equal channels, mirrored table. */
  const symmetricCostsArb: fc.Arbitrary<CostModelInput> = fc
    .integer({ min: 1, max: 6 })
    .chain((transposition) =>
      fc.record({
        indel: fc.integer({ min: 0, max: transposition }),
        subCost: fc.integer({ min: 0, max: transposition }),
        specSubCost: fc.integer({ min: 0, max: transposition }),
      }).map(({ indel, subCost, specSubCost }) => ({
        insCost: indel,
        delCost: indel,
        subCost,
        tpCost: transposition,
        finalTpCost: transposition,
        specSubCost,
        specSubFrom: "ab",
        specSubTo: "ba",
      })),
    );

  it("returns zero between identical strings", () => {
    fc.assert(
      fc.property(wordArb, validCostsArb, (word, costs) => {
        expect(editDistance(word, word, costs)).to.equal(0);
      }),
    );
  });

  it("is symmetric under symmetric costs", () => {
    fc.assert(
      fc.property(wordArb, wordArb, symmetricCostsArb, (left, right, costs) => {
        expect(editDistance(left, right, costs)).to.equal(editDistance(right, left, costs));
      }),
    );
  });

  it("satisfies the triangle inequality for Levenshtein", () => {
    fc.assert(
      fc.property(wordArb, wordArb, wordArb, (a, b, c) => {
        expect(levenshteinDistance(a, c)).to.be.at.most(levenshteinDistance(a, b) + levenshteinDistance(b, c));
      }),
    );
  });

  it("scales linearly with the costs", () => {
    fc.assert(
      fc.property(wordArb, wordArb, validCostsArb, fc.integer({ min: 1, max: 5 }), (left, right, costs, factor) => {
        const scaled: CostModelInput = {
          ...costs,
          insCost: costs.insCost * factor,
          delCost: costs.delCost * factor,
          subCost: costs.subCost * factor,
          tpCost: (costs.tpCost ?? 0) * factor,
          finalTpCost: (costs.finalTpCost ?? 0) * factor,
          specSubCost: (costs.specSubCost ?? 0) * factor,
        };
        expect(editDistance(left, right, scaled)).to.equal(editDistance(left, right, costs) * factor);
      }),
    );
  });

  it("orders the named metrics from least to most restrictive", () => {
    fc.assert(
      fc.property(wordArb, wordArb, (left, right) => {
        const unrestricted = damerauLevenshteinDistance(left, right);
        const restricted = optimalAlignmentDistance(left, right);
        expect(unrestricted).to.be.at.most(restricted);
        expect(restricted).to.be.at.most(levenshteinDistance(left, right));
      }),
    );
  });
});
