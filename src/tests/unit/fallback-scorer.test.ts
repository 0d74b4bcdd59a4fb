import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { feedbackForScore, performanceLabel, scoreFallback } from "../../interviews/fallback-scorer";

const EXCELLENT = "Excellent answer! You demonstrate strong technical knowledge.";
const GOOD = "Good answer! You show solid understanding of the concept.";
const FAIR = "Fair attempt. Consider providing more specific examples and technical details.";
const POOR = "Try to provide more detailed technical explanations with examples.";

describe("scoreFallback", () => {
  it("clamps a keyword-heavy Python answer to 10", () => {
    const result = scoreFallback(
      "How do you handle exceptions in Python?",
      "I use def and class with try/except to handle errors in a list comprehension",
    );
    assert.deepEqual(result, { score: 10, feedback: EXCELLENT });
  });

  it("starts from 5 when no domain matches", () => {
    assert.deepEqual(scoreFallback("Explain the CAP theorem.", "It is about tradeoffs."), {
      score: 5,
      feedback: FAIR,
    });
  });

  it("uses only the first matching domain", () => {
    // "python" wins over "react", so React keywords earn nothing.
    const result = scoreFallback("Python or React?", "component props hook");
    assert.equal(result.score, 5);
  });

  it("treats js in the question as JavaScript", () => {
    const result = scoreFallback("What does Node js do with a promise?", "await the promise");
    // await +2, promise +2
    assert.equal(result.score, 9);
    assert.equal(result.feedback, EXCELLENT);
  });

  it("matches React keywords regardless of case", () => {
    const result = scoreFallback("React hooks?", "useState");
    // state +2, usestate +2
    assert.deepEqual(result, { score: 9, feedback: EXCELLENT });
  });

  it("adds length bonuses past 100 and 200 characters", () => {
    assert.equal(scoreFallback("Describe Kafka.", "x".repeat(101)).score, 6);
    assert.equal(scoreFallback("Describe Kafka.", "x".repeat(201)).score, 7);
    assert.equal(scoreFallback("Describe Kafka.", "x".repeat(201)).feedback, GOOD);
  });

  it("rewards a code block or a definition", () => {
    assert.equal(scoreFallback("Describe Kafka.", "```\ncode\n```").score, 7);
    assert.equal(scoreFallback("Describe Kafka.", "function x() {}").score, 7);
  });

  it("stays within 0..10 for empty, long and saturated answers", () => {
    const saturated = "def class import try except list tuple dict decorator generator ```".repeat(50);
    for (const answer of ["", "a".repeat(10_000), saturated]) {
      const { score } = scoreFallback("Python internals", answer);
      assert.ok(score >= 0 && score <= 10, `score ${score} out of range`);
    }
    assert.equal(scoreFallback("Python internals", saturated).score, 10);
  });

  it("is deterministic", () => {
    const question = "What are Django signals?";
    const answer = "A model signal fires after a migration or a view saves data.";
    assert.deepEqual(scoreFallback(question, answer), scoreFallback(question, answer));
  });
});

describe("score tiers", () => {
  it("maps thresholds to feedback and labels", () => {
    assert.equal(feedbackForScore(8), EXCELLENT);
    assert.equal(feedbackForScore(7), GOOD);
    assert.equal(feedbackForScore(4), FAIR);
    assert.equal(feedbackForScore(3), POOR);
    assert.equal(performanceLabel(8), "Excellent");
    assert.equal(performanceLabel(6.5), "Good");
    assert.equal(performanceLabel(4), "Needs Improvement");
    assert.equal(performanceLabel(3.9), "Poor");
  });
});
