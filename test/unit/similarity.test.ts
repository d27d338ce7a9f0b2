import { describe, it, expect } from "vitest";
import {
  levenshtein,
  messagesMatch,
  normalizeForComparison,
  similarity,
} from "../../src/review/similarity.js";

describe("levenshtein", () => {
  it("counts single-character edits", () => {
    expect(levenshtein("kitten", "sitting")).toBe(3);
    expect(levenshtein("", "abc")).toBe(3);
    expect(levenshtein("same", "same")).toBe(0);
  });
});

describe("similarity", () => {
  it("scales distance by the longer string", () => {
    expect(similarity("abcd", "abce")).toBe(0.75);
    expect(similarity("", "")).toBe(1);
  });
});

describe("normalizeForComparison", () => {
  it("lower-cases and strips punctuation", () => {
    expect(normalizeForComparison("Unused  variable 'x'!")).toBe("unused variable x");
  });
});

describe("messagesMatch", () => {
  it("matches when one message contains the other", () => {
    expect(messagesMatch("unused var", "Unused variable x", 0.8)).toBe(true);
  });

  it("matches near-identical wording above the threshold", () => {
    expect(messagesMatch("variable x is unused", "variable y is unused", 0.8)).toBe(true);
  });

  it("rejects unrelated messages", () => {
    expect(messagesMatch("possible SQL injection", "line too long", 0.8)).toBe(false);
  });

  it("respects a stricter threshold", () => {
    // 1 edit over 20 characters is 0.95 similar.
    expect(messagesMatch("variable x is unused", "variable y is unused", 0.99)).toBe(false);
  });

  it("only matches an empty message against another empty one", () => {
    expect(messagesMatch("...", "!!", 0.8)).toBe(true);
    expect(messagesMatch("...", "x", 0.8)).toBe(false);
  });
});
