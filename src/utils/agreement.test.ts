import { describe, expect, it } from "vitest";
import {
  balancedAccuracy,
  cohenKappa,
  levenshteinDistance,
  levenshteinRatio,
  matthewsCorrelation,
  sampleAccuracy,
  transitionCounts,
  transitionMatrix,
  transitionMatrixDistance,
} from "./agreement";
import { InputShapeError } from "./errors";

const gt = ["fixation", "fixation", "saccade", "saccade"];
const pred = ["fixation", "saccade", "saccade", "saccade"];

describe("sampleAccuracy", () => {
  it("returns the fraction of matching samples", () => {
    expect(sampleAccuracy(gt, pred)).toBe(0.75);
  });

  it("compares missing labels as equal", () => {
    expect(sampleAccuracy([null, "fixation"], [NaN, "fixation"])).toBe(1);
  });

  it("is NaN for empty rows", () => {
    expect(sampleAccuracy([], [])).toBeNaN();
  });

  it("rejects rows of different length", () => {
    expect(() => sampleAccuracy(["a"], ["a", "b"])).toThrow(InputShapeError);
  });
});

describe("cohenKappa", () => {
  it("corrects agreement for chance", () => {
    // po = 0.75, pe = 0.5*0.25 + 0.5*0.75 = 0.5
    expect(cohenKappa(gt, pred)).toBeCloseTo(0.5);
  });

  it("is 1 for identical single-class rows", () => {
    expect(cohenKappa(["blink", "blink"], ["blink", "blink"])).toBe(1);
  });

  it("is NaN for empty rows", () => {
    expect(cohenKappa([], [])).toBeNaN();
  });
});

describe("levenshteinDistance", () => {
  it("counts edits between label sequences", () => {
    const a = ["fixation", "saccade", "fixation"];
    const b = ["fixation", "fixation"];
    expect(levenshteinDistance(a, b, false)).toBe(1);
    expect(levenshteinDistance(a, b)).toBeCloseTo(1 / 3);
  });

  it("is 0 for two empty sequences", () => {
    expect(levenshteinDistance([], [])).toBe(0);
  });
});

describe("transitionCounts", () => {
  it("counts transitions between consecutive samples", () => {
    const counts = transitionCounts(["fixation", "fixation", "saccade", "fixation"]);
    expect(counts.get("fixation")?.get("fixation")).toBe(1);
    expect(counts.get("fixation")?.get("saccade")).toBe(1);
    expect(counts.get("saccade")?.get("fixation")).toBe(1);
    expect(counts.get("saccade")?.get("saccade")).toBeUndefined();
  });
});

describe("balancedAccuracy", () => {
  it("averages recall over the reference labels", () => {
    const ref = ["fixation", "fixation", "fixation", "saccade"];
    const allFixation = ["fixation", "fixation", "fixation", "fixation"];
    // fixation 재현율 1, saccade 재현율 0
    expect(balancedAccuracy(ref, allFixation)).toBe(0.5);
    expect(sampleAccuracy(ref, allFixation)).toBe(0.75);
  });

  it("ignores labels that only the prediction uses", () => {
    // fixation 1/2, saccade 2/2
    expect(balancedAccuracy(gt, pred)).toBe(0.75);
    expect(balancedAccuracy(["a", "a"], ["a", "b"])).toBe(0.5);
  });

  it("is NaN for empty rows", () => {
    expect(balancedAccuracy([], [])).toBeNaN();
  });

  it("rejects rows of different length", () => {
    expect(() => balancedAccuracy(["a"], [])).toThrow(InputShapeError);
  });
});

describe("matthewsCorrelation", () => {
  it("is 1 for identical rows", () => {
    expect(matthewsCorrelation(gt, gt)).toBe(1);
  });

  it("scores partial agreement", () => {
    // c=3, s=4, t={f:2,s:2}, p={f:1,s:3}: (12 - 8) / sqrt(6 * 8)
    expect(matthewsCorrelation(gt, pred)).toBeCloseTo(1 / Math.sqrt(3));
  });

  it("is 0 when one row holds a single label", () => {
    expect(matthewsCorrelation(gt, ["fixation", "fixation", "fixation", "fixation"])).toBe(0);
  });
});

describe("levenshteinRatio", () => {
  it("is 2·LCS over the summed length", () => {
    expect(levenshteinRatio(["a", "b", "c"], ["a", "c"])).toBeCloseTo(0.8);
  });

  it("is 1 for identical or empty rows", () => {
    expect(levenshteinRatio(gt, gt)).toBe(1);
    expect(levenshteinRatio([], [])).toBe(1);
  });

  it("is 0 when nothing is shared", () => {
    expect(levenshteinRatio(["a"], ["b", "b"])).toBe(0);
  });
});

describe("transitionMatrix", () => {
  it("normalizes transition counts per source label", () => {
    expect(transitionMatrix(["A", "A", "B", "B", "A", "A"], ["A", "B"])).toEqual([
      [2 / 3, 1 / 3],
      [0.5, 0.5],
    ]);
  });

  it("leaves rows without outgoing transitions at zero", () => {
    expect(transitionMatrix(["A", "B"], ["A", "B"])).toEqual([
      [0, 1],
      [0, 0],
    ]);
  });
});

describe("transitionMatrixDistance", () => {
  const alternating = ["A", "B", "A", "B", "A"];
  const paired = ["A", "A", "B", "B", "A", "A"];
  // |P1 - P2| = [[2/3, 2/3], [1/2, 1/2]]

  it("computes the Frobenius norm", () => {
    expect(transitionMatrixDistance(alternating, paired, "fro")).toBeCloseTo(Math.sqrt(25 / 18));
  });

  it("computes the max column sum for l1", () => {
    expect(transitionMatrixDistance(alternating, paired, "l1")).toBeCloseTo(7 / 6);
  });

  it("computes the max row sum for linf", () => {
    expect(transitionMatrixDistance(alternating, paired, "linf")).toBeCloseTo(4 / 3);
  });

  it("compares stationary distributions for kl", () => {
    // π1 = [0.5, 0.5], π2 = [0.6, 0.4]
    expect(transitionMatrixDistance(alternating, paired, "kl")).toBeCloseTo(0.5 * Math.log(25 / 24), 8);
  });

  it("is 0 for identical rows", () => {
    expect(transitionMatrixDistance(paired, paired, "fro")).toBe(0);
    expect(transitionMatrixDistance(paired, paired, "kl")).toBe(0);
  });
});
