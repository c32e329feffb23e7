// Interview Coach Engine - Lexical Feature Extractor Unit Tests

import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG } from "./config.js";
import {
  countFillerWords,
  countPauseIndicators,
  countTechnicalVocabulary,
  countWords,
  detectExampleUsage,
  detectStarStructure,
  extractLexicalFeatures,
} from "./lexical-features.js";

describe("countWords", () => {
  it("splits on runs of whitespace", () => {
    expect(countWords("  hello   world \n")).toBe(2);
    expect(countWords("one\ttwo\nthree")).toBe(3);
  });

  it("returns 0 for blank text", () => {
    expect(countWords("")).toBe(0);
    expect(countWords("   \n ")).toBe(0);
  });
});

describe("countFillerWords", () => {
  it("counts default fillers case-insensitively, including phrases", () => {
    expect(countFillerWords("Um, I mean, it was basically fine.", DEFAULT_CONFIG.fillerWords)).toBe(3);
  });

  it("matches fillers inside longer words", () => {
    // "so" inside "also", plus "like"
    expect(countFillerWords("I also like it", DEFAULT_CONFIG.fillerWords)).toBe(2);
  });

  it("adds overlapping fillers together", () => {
    expect(countFillerWords("Umm, um", ["um", "umm"])).toBe(3);
  });

  it("ignores empty fillers", () => {
    expect(countFillerWords("anything at all", [""])).toBe(0);
  });

  it("returns 0 for an empty list", () => {
    expect(countFillerWords("um uh like", [])).toBe(0);
  });
});

describe("countPauseIndicators", () => {
  it("counts each default marker", () => {
    expect(countPauseIndicators("Well... I -- think…", DEFAULT_CONFIG.pauseIndicators)).toBe(3);
  });

  it("counts non-overlapping occurrences", () => {
    expect(countPauseIndicators("......", ["..."])).toBe(2);
  });

  it("is case-sensitive", () => {
    expect(countPauseIndicators("PAUSE pause", ["pause"])).toBe(1);
  });
});

describe("detectExampleUsage", () => {
  it("matches whole words case-insensitively", () => {
    expect(detectExampleUsage("For example, we shipped early", DEFAULT_CONFIG.exampleKeywords)).toBe(true);
    expect(detectExampleUsage("I LED the migration", DEFAULT_CONFIG.exampleKeywords)).toBe(true);
  });

  it("matches multi-word keywords", () => {
    expect(detectExampleUsage("I worked on payments", DEFAULT_CONFIG.exampleKeywords)).toBe(true);
  });

  it("does not match inside a longer word", () => {
    expect(detectExampleUsage("counterexample", DEFAULT_CONFIG.exampleKeywords)).toBe(false);
  });

  it("escapes regular-expression characters in keywords", () => {
    expect(detectExampleUsage("see c++ code", ["c++"])).toBe(false);
    expect(detectExampleUsage("a.b", ["a.b"])).toBe(true);
    expect(detectExampleUsage("axb", ["a.b"])).toBe(false);
  });

  it("never triggers for an empty list", () => {
    expect(detectExampleUsage("example project", [])).toBe(false);
  });
});

describe("detectStarStructure", () => {
  it("requires three distinct keywords", () => {
    expect(
      detectStarStructure(
        "The situation was hard, my task was clear, and the result was good.",
        DEFAULT_CONFIG.starMethodKeywords,
      ),
    ).toBe(true);
    expect(detectStarStructure("The situation and the task.", DEFAULT_CONFIG.starMethodKeywords)).toBe(false);
  });

  it("counts repeated keywords once", () => {
    expect(detectStarStructure("task task task", DEFAULT_CONFIG.starMethodKeywords)).toBe(false);
  });

  it("matches substrings", () => {
    expect(detectStarStructure("goaltender tasked resultant", DEFAULT_CONFIG.starMethodKeywords)).toBe(true);
  });
});

describe("countTechnicalVocabulary", () => {
  it("counts distinct terms present", () => {
    expect(
      countTechnicalVocabulary("The API calls the database; the api is cached.", DEFAULT_CONFIG.technicalKeywords),
    ).toBe(3);
  });

  it("returns 0 for an empty list", () => {
    expect(countTechnicalVocabulary("database api", [])).toBe(0);
  });
});

describe("extractLexicalFeatures", () => {
  it("combines every feature", () => {
    expect(extractLexicalFeatures("We built a database cache so it scales.", DEFAULT_CONFIG)).toEqual({
      wordCount: 8,
      fillerCount: 1,
      pauseCount: 0,
      usesExamples: true,
      followsStarStructure: false,
      technicalTermCount: 3,
    });
  });
});
