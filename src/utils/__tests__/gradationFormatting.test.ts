import { describe, it, expect } from "vitest";
import {
  buildChartPoints,
  buildInterpretationLines,
  buildRangeNotes,
  buildTableRows,
  formatCoefficient,
  formatDiameter,
  formatInterpretationLine,
  formatSieveSize,
  getChartTicks,
  getInterpolationLabel,
  reportFileName,
} from "../gradationFormatting";
import { analyzeSieveSample } from "../gradationCalculations";
import { defaultSieveSet } from "../../data/sieveSets";
import type { GradationAnalysis, InterpolationMethod } from "../../types/gradation";

function analysisOf(weights: number[], interpolation: InterpolationMethod = "linear"): GradationAnalysis {
  const outcome = analyzeSieveSample({ sieveSpec: defaultSieveSet, weights, interpolation });
  if (!outcome.ok) throw new Error(outcome.error.message);
  return outcome.analysis;
}

const sample = analysisOf([0, 50, 100, 150, 150, 100, 50, 0]);

describe("value formatting", () => {
  it("prints the pan by name", () => {
    expect(formatSieveSize(0)).toBe("Pan");
    expect(formatSieveSize(0.075)).toBe("0.075");
    expect(formatSieveSize(4.75)).toBe("4.750");
  });

  it("marks clamped diameters", () => {
    expect(formatDiameter({ percent: 10, value: 0.075, range: "below" })).toBe("<0.075");
    expect(formatDiameter({ percent: 60, value: 4.75, range: "above" })).toBe(">4.750");
    expect(formatDiameter({ percent: 30, value: 0.36, range: "within" })).toBe("0.360");
  });

  it("prints an infinite coefficient as a symbol", () => {
    expect(formatCoefficient(Infinity)).toBe("∞");
    expect(formatCoefficient(5.0424)).toBe("5.04");
  });
});

describe("buildTableRows", () => {
  it("formats each row to display precision", () => {
    const rows = buildTableRows(sample);
    expect(rows).toHaveLength(8);
    expect(rows[0]).toEqual({
      sieveSize: "4.750",
      weightRetained: "0.00",
      percentRetained: "0.00",
      cumulativePercentRetained: "0.00",
      percentPassing: "100.00",
    });
    expect(rows[1]).toEqual({
      sieveSize: "2.360",
      weightRetained: "50.00",
      percentRetained: "8.33",
      cumulativePercentRetained: "8.33",
      percentPassing: "91.67",
    });
    expect(rows[7]).toEqual({
      sieveSize: "Pan",
      weightRetained: "0.00",
      percentRetained: "0.00",
      cumulativePercentRetained: "100.00",
      percentPassing: "0.00",
    });
  });
});

describe("buildInterpretationLines", () => {
  it("lists diameters, coefficients and classification in report order", () => {
    expect(buildInterpretationLines(sample).map(formatInterpretationLine)).toEqual([
      "D10 = 0.165 mm",
      "D30 = 0.360 mm",
      "D60 = 0.832 mm",
      "Uniformity Coefficient (Cu) = 5.04",
      "Coefficient of Curvature (Cc) = 0.94",
      "Gradation = Poorly-graded",
      "Soil Classification = Sand",
    ]);
  });
});

describe("buildRangeNotes", () => {
  it("is empty when every diameter lies on the curve", () => {
    expect(buildRangeNotes(sample)).toEqual([]);
  });

  it("explains diameters clamped to the coarsest sieve", () => {
    const notes = buildRangeNotes(analysisOf([100, 0, 0, 0, 0, 0, 0, 0]));
    expect(notes).toHaveLength(3);
    expect(notes[0]).toBe("D10: less than 10% passes the coarsest sieve; value clamped to 4.750 mm.");
  });

  it("explains diameters clamped to the finest sieve", () => {
    const notes = buildRangeNotes(analysisOf([0, 0, 0, 0, 0, 0, 0, 100]));
    expect(notes[2]).toBe("D60: more than 60% passes the finest sieve; value clamped to 0.075 mm.");
  });
});

describe("chart helpers", () => {
  it("plots every sieve but the pan, coarsest first", () => {
    const points = buildChartPoints(sample);
    expect(points.map(p => p.size)).toEqual([4.75, 2.36, 1.18, 0.6, 0.3, 0.15, 0.075]);
    expect(points[0].passing).toBe(100);
    expect(points[6].passing).toBe(0);
  });

  it("uses the sieve openings as ticks, finest first", () => {
    expect(getChartTicks(defaultSieveSet)).toEqual([0.075, 0.15, 0.3, 0.6, 1.18, 2.36, 4.75]);
  });

  it("names the interpolation method", () => {
    expect(getInterpolationLabel(sample)).toBe("Linear interpolation on the passing curve");
    expect(getInterpolationLabel(analysisOf([0, 50, 100, 150, 150, 100, 50, 0], "log-linear"))).toBe(
      "Log-linear interpolation on the passing curve"
    );
  });
});

describe("reportFileName", () => {
  it("builds the file name from the sample id", () => {
    expect(reportFileName(" BH1 S2 ", "pdf")).toBe("Sieve_Analysis_BH1_S2.pdf");
    expect(reportFileName("a/b", "doc")).toBe("Sieve_Analysis_ab.doc");
  });

  it("falls back to a generic name", () => {
    expect(reportFileName(undefined, "pdf")).toBe("sieve_analysis_report.pdf");
    expect(reportFileName("  ", "doc")).toBe("sieve_analysis_report.doc");
  });
});
