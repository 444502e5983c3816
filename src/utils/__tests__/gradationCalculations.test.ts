import { describe, it, expect } from "vitest";
import {
  analyzeSieveInput,
  analyzeSieveSample,
  buildPassingCurve,
  classifyGradation,
  classifySoil,
  computeCharacteristicDiameters,
  computeCoefficients,
  computeGradationTable,
  interpolateDiameter,
} from "../gradationCalculations";
import { createSieveSpec, defaultSieveSet, getSieveSet } from "../../data/sieveSets";
import type { GradationAnalysis, GradationTable } from "../../types/gradation";

const SAMPLE_WEIGHTS = [0, 50, 100, 150, 150, 100, 50, 0];

function tableOf(weights: number[], spec = defaultSieveSet): GradationTable {
  const table = computeGradationTable(spec, weights);
  if ("kind" in table) throw new Error(table.message);
  return table;
}

function analysisOf(weights: number[], spec = defaultSieveSet): GradationAnalysis {
  const outcome = analyzeSieveSample({ sieveSpec: spec, weights });
  if (!outcome.ok) throw new Error(outcome.error.message);
  return outcome.analysis;
}

function retainedTotal(weights: number[]): number {
  return weights.reduce((sum, w) => sum + w, 0);
}

// Deterministic weights for property checks
function lcg(seed: number) {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

describe("computeGradationTable", () => {
  it("computes retained, cumulative and passing percentages", () => {
    const table = tableOf(SAMPLE_WEIGHTS);
    const passing = [100, 91.6667, 75, 50, 25, 8.3333, 0, 0];
    table.forEach((row, i) => {
      expect(row.percentPassing).toBeCloseTo(passing[i], 3);
    });
    expect(table[1].percentRetained).toBeCloseTo(8.3333, 3);
    expect(table[3].cumulativePercentRetained).toBeCloseTo(50, 9);
  });

  it("keeps the sieve order and flags the pan", () => {
    const table = tableOf(SAMPLE_WEIGHTS);
    expect(table.map(r => r.sieveSize)).toEqual([4.75, 2.36, 1.18, 0.6, 0.3, 0.15, 0.075, 0]);
    expect(table.map(r => r.isPan)).toEqual([false, false, false, false, false, false, false, true]);
  });

  it("snaps floating point residue at the bottom of the table to zero", () => {
    const table = tableOf(SAMPLE_WEIGHTS);
    expect(table[6].percentPassing).toBe(0);
    expect(table[7].percentPassing).toBe(0);
  });

  it("returns an error for zero total mass", () => {
    const result = computeGradationTable(defaultSieveSet, [0, 0, 0, 0, 0, 0, 0, 0]);
    expect(result).toEqual({
      kind: "DegenerateInputError",
      totalWeight: 0,
      message: "Total weight retained is zero; enter at least one weight above zero.",
    });
  });

  it("returns an error when the total mass overflows", () => {
    const result = computeGradationTable(defaultSieveSet, [1e308, 1e308, 0, 0, 0, 0, 0, 0]);
    expect(result).toEqual({
      kind: "DegenerateInputError",
      totalWeight: Infinity,
      message: "Total weight retained is too large to compute; enter the weights in smaller units.",
    });
  });

  it("throws when the weights do not match the sieve set", () => {
    expect(() => computeGradationTable(defaultSieveSet, [1, 2, 3])).toThrow(
      'Expected 8 weights for sieve set "standard", got 3'
    );
  });

  it("holds the table invariants for arbitrary samples", () => {
    const next = lcg(42);
    for (let n = 0; n < 50; n++) {
      const weights = defaultSieveSet.sizes.map(() => Math.round(next() * 500) / 10);
      weights[n % weights.length] += 1;
      const table = tableOf(weights);

      const retainedSum = table.reduce((sum, row) => sum + row.percentRetained, 0);
      expect(retainedSum).toBeCloseTo(100, 9);
      expect(table[table.length - 1].percentPassing).toBeCloseTo(0, 9);

      for (let i = 0; i < table.length; i++) {
        const row = table[i];
        expect(row.percentPassing + row.cumulativePercentRetained).toBeCloseTo(100, 9);
        expect((row.percentRetained * retainedTotal(weights)) / 100).toBeCloseTo(weights[i], 9);
        expect(row.percentPassing).toBeGreaterThanOrEqual(-1e-9);
        expect(row.percentPassing).toBeLessThanOrEqual(100 + 1e-9);
        if (i > 0) {
          expect(row.percentPassing).toBeLessThanOrEqual(table[i - 1].percentPassing + 1e-9);
        }
      }
    }
  });
});

describe("buildPassingCurve", () => {
  it("drops the pan and orders points by ascending % passing", () => {
    const curve = buildPassingCurve(tableOf(SAMPLE_WEIGHTS));
    expect(curve.map(p => p.sieveSize)).toEqual([0.075, 0.15, 0.3, 0.6, 1.18, 2.36, 4.75]);
    expect(curve[0].percentPassing).toBe(0);
    expect(curve[curve.length - 1].percentPassing).toBe(100);
  });
});

describe("interpolateDiameter", () => {
  const curve = buildPassingCurve(tableOf(SAMPLE_WEIGHTS));

  it("interpolates D10, D30 and D60 linearly", () => {
    const { d10, d30, d60 } = computeCharacteristicDiameters(curve);
    expect(d10.value).toBeCloseTo(0.165, 9);
    expect(d30.value).toBeCloseTo(0.36, 9);
    expect(d60.value).toBeCloseTo(0.832, 9);
    expect([d10.range, d30.range, d60.range]).toEqual(["within", "within", "within"]);
  });

  it("interpolates on log size when asked", () => {
    const d10 = interpolateDiameter(curve, 10, "log-linear");
    expect(d10.value).toBeCloseTo(0.15 * Math.pow(2, 0.1), 9);
    expect(d10.range).toBe("within");
  });

  it("returns the sieve size on an exact match", () => {
    const exact = buildPassingCurve(tableOf([0, 25, 25, 25, 25, 0, 0, 0]));
    expect(interpolateDiameter(exact, 50)).toEqual({ percent: 50, value: 1.18, range: "within" });
    expect(interpolateDiameter(curve, 100).value).toBe(4.75);
  });

  it("reads the coarser sieve where % passing is tied", () => {
    const tied = buildPassingCurve(tableOf([0, 0, 50, 0, 50, 0, 0, 0]));
    expect(interpolateDiameter(tied, 50).value).toBe(1.18);
    expect(interpolateDiameter(tied, 0).value).toBe(0.3);

    const { d10, d30, d60 } = computeCharacteristicDiameters(tied);
    expect(d10.value).toBeCloseTo(0.36, 9);
    expect(d30.value).toBeCloseTo(0.48, 9);
    expect(d60.value).toBeCloseTo(1.416, 9);
  });

  it("clamps to the coarsest sieve when too little passes", () => {
    const coarse = buildPassingCurve(tableOf([100, 0, 0, 0, 0, 0, 0, 0]));
    expect(interpolateDiameter(coarse, 10)).toEqual({ percent: 10, value: 4.75, range: "above" });
  });

  it("clamps to the finest sieve when too much passes", () => {
    const fine = buildPassingCurve(tableOf([0, 0, 0, 0, 0, 0, 0, 100]));
    expect(interpolateDiameter(fine, 60)).toEqual({ percent: 60, value: 0.075, range: "below" });
  });

  it("throws on an empty curve", () => {
    expect(() => interpolateDiameter([], 10)).toThrow(/Passing curve is empty/);
  });

  it("keeps D10 <= D30 <= D60 for arbitrary samples", () => {
    const next = lcg(7);
    const spec = getSieveSet("extended");
    for (let n = 0; n < 50; n++) {
      const weights = spec.sizes.map(() => Math.floor(next() * 200));
      weights[0] += 1;
      for (const method of ["linear", "log-linear"] as const) {
        const { d10, d30, d60 } = computeCharacteristicDiameters(buildPassingCurve(tableOf(weights, spec)), method);
        expect(d10.value).toBeLessThanOrEqual(d30.value + 1e-12);
        expect(d30.value).toBeLessThanOrEqual(d60.value + 1e-12);
        for (const d of [d10, d30, d60]) {
          expect(d.value).toBeGreaterThanOrEqual(0.075);
          expect(d.value).toBeLessThanOrEqual(19);
        }
      }
    }
  });
});

describe("computeCoefficients", () => {
  it("computes Cu and Cc", () => {
    const { cu, cc } = computeCoefficients(0.165, 0.36, 0.832);
    expect(cu).toBeCloseTo(5.0424, 4);
    expect(cc).toBeCloseTo(0.94406, 5);
  });

  it("yields Infinity for a zero divisor", () => {
    expect(computeCoefficients(0, 0.3, 0.6)).toEqual({ cu: Infinity, cc: Infinity });
    expect(computeCoefficients(0.1, 0.3, 0).cc).toBe(Infinity);
  });
});

describe("classifyGradation", () => {
  it("needs Cu above 4 and Cc strictly between 1 and 3", () => {
    expect(classifyGradation({ cu: 6, cc: 2 })).toBe("well-graded");
    expect(classifyGradation({ cu: 4, cc: 2 })).toBe("poorly-graded");
    expect(classifyGradation({ cu: 6, cc: 1 })).toBe("poorly-graded");
    expect(classifyGradation({ cu: 6, cc: 3 })).toBe("poorly-graded");
    expect(classifyGradation({ cu: 5.04, cc: 0.94 })).toBe("poorly-graded");
  });
});

describe("classifySoil", () => {
  it("splits at 0.075 mm and 2 mm", () => {
    expect(classifySoil(0.05)).toBe("fine");
    expect(classifySoil(0.075)).toBe("sand");
    expect(classifySoil(1.99)).toBe("sand");
    expect(classifySoil(2)).toBe("gravel");
  });

  it("puts a D10 clamped below a boundary opening in the finer class", () => {
    expect(classifySoil(0.075, "below")).toBe("fine");
    expect(classifySoil(2, "below")).toBe("sand");
  });
});

describe("analyzeSieveSample", () => {
  it("analyses a well spread sand", () => {
    const analysis = analysisOf(SAMPLE_WEIGHTS);
    expect(analysis.totalWeight).toBe(600);
    expect(analysis.metrics.cu).toBeCloseTo(5.0424, 4);
    expect(analysis.metrics.cc).toBeCloseTo(0.94406, 5);
    expect(analysis.classification).toEqual({
      soilType: "sand",
      gradation: "poorly-graded",
      soilLabel: "Sand",
      gradationLabel: "Poorly-graded",
    });
    expect(analysis.interpolation).toBe("linear");
  });

  it("classifies a sample retained entirely on the top sieve as gravel", () => {
    const analysis = analysisOf([100, 0, 0, 0, 0, 0, 0, 0]);
    expect(analysis.diameters.d10).toEqual({ percent: 10, value: 4.75, range: "above" });
    expect(analysis.metrics).toEqual({ cu: 1, cc: 1 });
    expect(analysis.classification.soilType).toBe("gravel");
    expect(analysis.classification.gradation).toBe("poorly-graded");
  });

  it("classifies a sample passing every sieve as fine", () => {
    const analysis = analysisOf([0, 0, 0, 0, 0, 0, 0, 100]);
    expect(analysis.diameters.d10.range).toBe("below");
    expect(analysis.classification.soilType).toBe("fine");
  });

  it("returns a degenerate input error for zero mass", () => {
    const outcome = analyzeSieveSample({ sieveSpec: defaultSieveSet, weights: [0, 0, 0, 0, 0, 0, 0, 0] });
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe("DegenerateInputError");
  });

  it("gives the same result on repeated calls", () => {
    expect(analysisOf(SAMPLE_WEIGHTS)).toEqual(analysisOf(SAMPLE_WEIGHTS));
  });

  it("works on a custom sieve set", () => {
    const spec = createSieveSpec("two", "Two sieves", [2, 1, 0]);
    const analysis = analysisOf([20, 60, 20], spec);
    // passing: 80 at 2 mm, 20 at 1 mm
    expect(analysis.diameters.d30.value).toBeCloseTo(1 + (10 / 60), 9);
    expect(analysis.diameters.d10).toEqual({ percent: 10, value: 1, range: "below" });
  });
});

describe("analyzeSieveInput", () => {
  it("parses and analyses typed weights", () => {
    const outcome = analyzeSieveInput("0, 50, 100, 150, 150, 100, 50, 0", defaultSieveSet, {
      includePan: true,
      interpolation: "linear",
    });
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.analysis.diameters.d10.value).toBeCloseTo(0.165, 9);
  });

  it("treats weights typed without the pan as a zero pan", () => {
    const outcome = analyzeSieveInput("0, 50, 100, 150, 150, 100, 50", defaultSieveSet, {
      includePan: false,
      interpolation: "linear",
    });
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.analysis.table[7].weightRetained).toBe(0);
    expect(outcome.analysis.totalWeight).toBe(600);
  });

  it("passes parse errors through", () => {
    const outcome = analyzeSieveInput("a,b", defaultSieveSet);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe("ParseError");
  });

  it("rejects finite weights whose sum overflows", () => {
    const outcome = analyzeSieveInput("1e308,1e308,0,0,0,0,0,0", defaultSieveSet);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe("DegenerateInputError");
  });

  it("passes zero mass through as an error", () => {
    const outcome = analyzeSieveInput("0,0,0,0,0,0,0,0", defaultSieveSet);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.message).toBe("Total weight retained is zero; enter at least one weight above zero.");
  });
});
