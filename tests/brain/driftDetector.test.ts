import { describe, expect, it } from "vitest";
import { buildBaselineSet, computeBaseline } from "../../src/services/business/brain/baseline.js";
import {
  classify,
  classifyTimeline,
  levelForZ,
  selectHistoryWindow,
} from "../../src/services/business/brain/driftDetector.js";
import { makeEntry, makeSignature, sunday, testConfig, testLexicon } from "../helpers/fixtures.js";

const settings = testConfig.drift;

function graceHistory(values: number[]) {
  return values.map((value, i) => makeSignature(`h-${i}`, { axisScores: { grace_vs_effort: value } }));
}

describe("computeBaseline", () => {
  it("uses the sample standard deviation", () => {
    const baseline = computeBaseline(graceHistory([0.3, 0.3, 0.4, 0.5, 0.5]), "grace_vs_effort");

    expect(baseline.n).toBe(5);
    expect(baseline.mean).toBeCloseTo(0.4, 10);
    expect(baseline.stddev).toBeCloseTo(0.1, 10);
  });

  it("reports stddev 0 below two samples", () => {
    expect(computeBaseline(graceHistory([0.7]), "grace_vs_effort")).toEqual({
      name: "grace_vs_effort",
      mean: 0.7,
      stddev: 0,
      n: 1,
    });
    expect(computeBaseline([], "grace_vs_effort")).toEqual({ name: "grace_vs_effort", mean: 0, stddev: 0, n: 0 });
  });

  it("leaves out signatures that lack the axis", () => {
    const history = [
      makeSignature("old", { axisScores: {} }),
      ...graceHistory([0.2, 0.4]),
    ];
    expect(computeBaseline(history, "grace_vs_effort").n).toBe(2);
  });
});

describe("levelForZ", () => {
  it("maps |z| onto the configured bands", () => {
    expect(levelForZ(0.5, settings.thresholds)).toBe("stable");
    expect(levelForZ(-1, settings.thresholds)).toBe("moderate");
    expect(levelForZ(-2.5, settings.thresholds)).toBe("strong");
    expect(levelForZ(3, settings.thresholds)).toBe("anomaly");
  });
});

describe("classify", () => {
  it("flags a score five deviations above the mean as an anomaly", () => {
    const baselines = buildBaselineSet(graceHistory([0.3, 0.3, 0.4, 0.5, 0.5]), testLexicon);
    const target = makeSignature("t", { axisScores: { grace_vs_effort: 0.9, hope_vs_fear: 0, scripture_vs_story: 0 } });

    const drift = classify(target, baselines, settings);

    expect(drift.axes.grace_vs_effort.level).toBe("anomaly");
    expect(drift.axes.grace_vs_effort.z).toBeCloseTo(5, 6);
    // Flat history on the other axes gives no usable spread.
    expect(drift.axes.hope_vs_fear.level).toBe("insufficient_history");
    expect(drift.axes.hope_vs_fear.z).toBeNull();
    expect(drift.level).toBe("anomaly");
    expect(drift.magnitude).toBeCloseTo(5, 6);
  });

  it("classifies an empty history as insufficient, never stable", () => {
    const drift = classify(makeSignature("t"), buildBaselineSet([], testLexicon), settings);

    expect(drift.level).toBe("insufficient_history");
    expect(drift.magnitude).toBeNull();
    expect(Object.values(drift.axes).every((a) => a.level === "insufficient_history")).toBe(true);
  });

  it("needs the minimum sample size", () => {
    const baselines = buildBaselineSet(graceHistory([0.1, 0.9]), testLexicon);
    const drift = classify(makeSignature("t", { axisScores: { grace_vs_effort: 0.5 } }), baselines, settings);

    expect(drift.axes.grace_vs_effort.level).toBe("insufficient_history");
  });

  it("treats a spread at or below epsilon as insufficient", () => {
    const baselines = buildBaselineSet(graceHistory([0.4, 0.42, 0.41]), testLexicon);
    const drift = classify(makeSignature("t", { axisScores: { grace_vs_effort: 0.9 } }), baselines, settings);

    expect(drift.axes.grace_vs_effort.level).toBe("insufficient_history");
    expect(drift.level).toBe("insufficient_history");
  });

  it("ranks stable above insufficient_history in the aggregate", () => {
    const baselines = buildBaselineSet(graceHistory([0.3, 0.3, 0.4, 0.5, 0.5]), testLexicon);
    const drift = classify(
      makeSignature("t", { axisScores: { grace_vs_effort: 0.45, hope_vs_fear: 0, scripture_vs_story: 0 } }),
      baselines,
      settings
    );

    expect(drift.axes.grace_vs_effort.level).toBe("stable");
    expect(drift.level).toBe("stable");
  });

  it("does not mutate its inputs and gives the same answer twice", () => {
    const history = graceHistory([0.3, 0.3, 0.4, 0.5, 0.5]);
    const baselines = buildBaselineSet(history, testLexicon);
    const target = makeSignature("t", { axisScores: { grace_vs_effort: 0.9 } });
    const before = JSON.stringify({ baselines, target });

    const first = classify(target, baselines, settings);
    const second = classify(target, baselines, settings);

    expect(second).toEqual(first);
    expect(JSON.stringify({ baselines, target })).toBe(before);
  });

  it("reports category z-scores when the category baseline is usable", () => {
    const history = [10, 20, 30].map((density, i) =>
      makeSignature(`h-${i}`, { categoryDensity: { grace: density } })
    );
    const drift = classify(
      makeSignature("t", { categoryDensity: { grace: 40 } }),
      buildBaselineSet(history, testLexicon),
      settings
    );

    expect(drift.categoryZScores).toEqual({ grace: 2 });
  });
});

describe("selectHistoryWindow", () => {
  it("takes the newest earlier sermons of the same channel", () => {
    const pool = [
      makeEntry("a1", sunday(0)),
      makeEntry("a2", sunday(1)),
      makeEntry("a3", sunday(2)),
      makeEntry("b1", sunday(1), {}, "channel-b"),
      makeEntry("a5", sunday(4)),
    ];
    const target = makeEntry("a4", sunday(3));

    expect(selectHistoryWindow(pool, target, 2).map((s) => s.transcriptId)).toEqual(["a3", "a2"]);
  });
});

describe("classifyTimeline", () => {
  it("classifies each target against its own trailing window", () => {
    const scores = [0.3, 0.3, 0.4, 0.5, 0.5, 0.9];
    const pool = scores.map((value, i) =>
      makeEntry(`s${i}`, sunday(i), { axisScores: { grace_vs_effort: value, hope_vs_fear: 0, scripture_vs_story: 0 } })
    );

    const result = classifyTimeline(pool.slice(2), pool, testLexicon, settings);

    expect(result.map((r) => r.drift.level)).toEqual([
      "insufficient_history",
      "strong",
      "moderate",
      "anomaly",
    ]);
  });
});
