import { describe, expect, it } from "vitest";
import { extractEvidence } from "../../src/services/business/brain/evidenceExtractor.js";
import { testConfig, testLexicon } from "../helpers/fixtures.js";

const { evidence: settings, boilerplate } = testConfig;

describe("extractEvidence", () => {
  it("builds a bounded snippet with an ellipsis where the window stops mid-sentence", () => {
    const text = "We sing. Grace is the free gift of God for all of us today.";

    expect(extractEvidence(text, testLexicon, settings, boilerplate)).toEqual([
      {
        category: "grace",
        axis: "grace_vs_effort",
        keyword: "grace",
        snippet: "We sing. Grace is the free…",
        position: 9,
      },
    ]);
  });

  it("keeps one match per character bucket and caps each category first-N by position", () => {
    const filler = "word ".repeat(12);
    const text = `hope ${filler}hope ${filler}hope end`;

    const evidence = extractEvidence(text, testLexicon, settings, boilerplate);

    expect(evidence.map((e) => e.position)).toEqual([0, 65]);
    expect(evidence[1].snippet).toBe("…word word word hope word word word…");
  });

  it("orders output by lexicon category, then position", () => {
    const evidence = extractEvidence("hope and grace", testLexicon, settings, boilerplate);

    expect(evidence.map((e) => [e.category, e.position])).toEqual([
      ["grace", 9],
      ["hope", 0],
    ]);
  });

  it("skips snippets that look like boilerplate", () => {
    expect(extractEvidence("Subscribe for grace.", testLexicon, settings, boilerplate)).toEqual([]);
    expect(extractEvidence("Visit example.com for grace.", testLexicon, settings, boilerplate)).toEqual([]);
  });

  it("cuts long snippets at a word boundary", () => {
    const text = "grace " + "abcdefgh ".repeat(10);
    const [snippet] = extractEvidence(text, testLexicon, { ...settings, windowWords: 28, maxChars: 40 });

    expect(snippet.snippet).toBe("grace abcdefgh abcdefgh abcdefgh…");
  });

  it("returns nothing when the cap is zero", () => {
    expect(extractEvidence("grace", testLexicon, { ...settings, perCategoryCap: 0 })).toEqual([]);
  });

  it("is deterministic", () => {
    const text = "Mercy! I remember a story of grace and a promise of hope. It is written.";
    expect(extractEvidence(text, testLexicon, settings, boilerplate)).toEqual(
      extractEvidence(text, testLexicon, settings, boilerplate)
    );
  });
});
