import { describe, expect, it } from "vitest";
import { aggregate, dominantCategory } from "../../src/services/business/brain/aggregator.js";
import type { AxisDrift, Evidence } from "../../src/services/business/brain/types.js";
import { classified, makeDrift, makeEntry, sunday } from "../helpers/fixtures.js";

function axisDrift(axis: string, z: number): AxisDrift {
  return { axis, score: 0, level: "anomaly", z, baseline: { name: axis, mean: 0, stddev: 0.1, n: 5 } };
}

function evidence(transcriptId: string, category: string, axis: string | null, position: number): Evidence {
  return { transcriptId, category, axis, keyword: category, snippet: `${category} snippet`, position };
}

describe("aggregate", () => {
  it("ranks the category with the largest total count first across 120 signatures", async () => {
    const items = Array.from({ length: 120 }, (_, i) =>
      classified(
        makeEntry(`t${i}`, sunday(i), {
          categoryCounts: { scripture_reference: 3, grace: i % 2, hope: 1 },
          categoryDensity: { scripture_reference: 3, grace: i % 2, hope: 1 },
        }),
        makeDrift(`t${i}`, "stable")
      )
    );

    const report = await aggregate(items, () => []);

    expect(report.signatureCount).toBe(120);
    expect(report.categories.map((c) => [c.category, c.totalCount])).toEqual([
      ["scripture_reference", 360],
      ["hope", 120],
      ["grace", 60],
    ]);
    expect(report.categories[0].averageDensity).toBe(3);
    expect(report.categories[2].signatureCount).toBe(60);
    expect(report.driftDistribution).toEqual({
      insufficient_history: 0,
      stable: 120,
      moderate: 0,
      strong: 0,
      anomaly: 0,
    });
  });

  it("breaks count ties by category name", async () => {
    const items = [
      classified(
        makeEntry("t1", sunday(0), { categoryCounts: { hope: 2, grace: 2 }, categoryDensity: { hope: 2, grace: 2 } }),
        makeDrift("t1", "stable")
      ),
    ];
    const report = await aggregate(items, () => []);
    expect(report.categories.map((c) => c.category)).toEqual(["grace", "hope"]);
  });

  it("lists strong and anomalous items by magnitude with evidence for the drifting axis", async () => {
    const a = makeDrift("a", "anomaly", 4);
    a.axes = { hope_vs_fear: axisDrift("hope_vs_fear", -4), grace_vs_effort: axisDrift("grace_vs_effort", 1) };
    const items = [
      classified(makeEntry("c", sunday(0)), makeDrift("c", "strong", 2.5)),
      classified(makeEntry("a", sunday(1)), a),
      classified(makeEntry("b", sunday(2)), makeDrift("b", "strong", 2.5)),
      classified(makeEntry("d", sunday(3)), makeDrift("d", "moderate", 1.5)),
    ];
    const stored: Record<string, Evidence[]> = {
      a: [evidence("a", "grace", "grace_vs_effort", 10), evidence("a", "fear", "hope_vs_fear", 40)],
    };

    const report = await aggregate(items, (id) => stored[id] ?? []);

    expect(report.outliers.map((o) => [o.transcriptId, o.magnitude])).toEqual([
      ["a", 4],
      ["b", 2.5],
      ["c", 2.5],
    ]);
    expect(report.outliers[0]).toMatchObject({ axis: "hope_vs_fear", z: -4, evidenceStatus: "ok", evidenceError: null });
    expect(report.outliers[0].evidence).toEqual([evidence("a", "fear", "hope_vs_fear", 40)]);
    expect(report.outliers[1].evidenceStatus).toBe("empty");
  });

  it("marks failed evidence lookups as unavailable without failing the report", async () => {
    const items = [
      classified(
        makeEntry("ok", sunday(0), { categoryCounts: { grace: 4 }, categoryDensity: { grace: 4 } }),
        makeDrift("ok", "stable")
      ),
      classified(
        makeEntry("broken", sunday(1), { categoryCounts: { hope: 5 }, categoryDensity: { hope: 5 } }),
        makeDrift("broken", "stable")
      ),
    ];
    let calls = 0;

    const report = await aggregate(items, async (id) => {
      calls++;
      if (id === "broken") throw new Error("evidence store offline");
      return [evidence(id, "grace", "grace_vs_effort", 0)];
    });

    expect(report.resonant.map((r) => [r.category, r.transcriptId, r.evidenceStatus])).toEqual([
      ["hope", "broken", "unavailable"],
      ["grace", "ok", "ok"],
    ]);
    expect(report.resonant[0].evidenceError).toBe("evidence store offline");
    expect(report.resonant[0].evidence).toEqual([]);
    expect(calls).toBe(2);
  });

  it("picks the densest signature per dominant category", async () => {
    const items = [
      classified(makeEntry("low", sunday(0), { categoryDensity: { grace: 3, hope: 1 } }), makeDrift("low", "stable")),
      classified(makeEntry("high", sunday(1), { categoryDensity: { grace: 7, hope: 2 } }), makeDrift("high", "stable")),
      classified(makeEntry("hopeful", sunday(2), { categoryDensity: { grace: 1, hope: 5 } }), makeDrift("hopeful", "stable")),
      classified(makeEntry("silent", sunday(3), { categoryDensity: {} }), makeDrift("silent", "stable")),
    ];

    const report = await aggregate(items, () => []);

    expect(report.resonant.map((r) => [r.category, r.transcriptId, r.density])).toEqual([
      ["grace", "high", 7],
      ["hope", "hopeful", 5],
    ]);
  });

  it("summarizes axis ranges over a corpus too large to spread into one call", async () => {
    const low = makeEntry("low", sunday(0), { axisScores: { grace_vs_effort: -0.5 } });
    const high = makeEntry("high", sunday(0), { axisScores: { grace_vs_effort: 0.5 } });
    const stable = makeDrift("t", "stable");
    const items = Array.from({ length: 200_000 }, (_, i) => classified(i % 2 === 0 ? low : high, stable));

    const report = await aggregate(items, () => []);

    expect(report.axes).toEqual([{ axis: "grace_vs_effort", mean: 0, min: -0.5, max: 0.5 }]);
  });

  it("summarizes axes and recurring scripture", async () => {
    const items = [
      classified(
        makeEntry("t1", sunday(0), { axisScores: { grace_vs_effort: 0.5 }, scriptureRefs: { romans: 2, john: 1 } }),
        makeDrift("t1", "stable")
      ),
      classified(
        makeEntry("t2", sunday(1), { axisScores: { grace_vs_effort: -0.1 }, scriptureRefs: { romans: 1 } }),
        makeDrift("t2", "insufficient_history")
      ),
    ];

    const report = await aggregate(items, () => []);

    expect(report.axes).toHaveLength(1);
    expect(report.axes[0].axis).toBe("grace_vs_effort");
    expect(report.axes[0].mean).toBeCloseTo(0.2, 10);
    expect(report.axes[0].min).toBe(-0.1);
    expect(report.axes[0].max).toBe(0.5);
    expect(report.scripture).toEqual([
      { book: "romans", totalCount: 3, signatureCount: 2 },
      { book: "john", totalCount: 1, signatureCount: 1 },
    ]);
    expect(report.lexiconVersions).toEqual(["1.0.0"]);
  });

  it("returns an empty report for no signatures", async () => {
    const report = await aggregate([], () => []);

    expect(report.signatureCount).toBe(0);
    expect(report.averageDensity).toBe(0);
    expect(report.categories).toEqual([]);
    expect(report.outliers).toEqual([]);
    expect(report.resonant).toEqual([]);
  });
});

describe("dominantCategory", () => {
  it("breaks density ties by name and ignores empty signatures", () => {
    const tied = classified(makeEntry("t", sunday(0), { categoryDensity: { hope: 2, grace: 2 } }), makeDrift("t", "stable"));
    const empty = classified(makeEntry("e", sunday(0)), makeDrift("e", "stable"));

    expect(dominantCategory(tied)).toEqual({ category: "grace", density: 2 });
    expect(dominantCategory(empty)).toBeNull();
  });
});
