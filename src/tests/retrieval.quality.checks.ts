import assert from "assert/strict";
import { test } from "node:test";
import { DEFAULT_PIPELINE_CONFIG } from "../modules/config/pipeline.config";
import { RerankedResult } from "../modules/retrieval/types";
import { scoreRetrievalQuality } from "../modules/scoring/retrieval.quality";
import { approxEqual, reranked } from "./fixtures";

const options = {
  topK: 10,
  weights: DEFAULT_PIPELINE_CONFIG.retrieval.rqWeights,
  consistencyScale: 0.25,
};

test("RQ combines relevance, margin, coverage and consistency", () => {
  const results = [
    reranked("a", "d1", 0.9, 1),
    reranked("b", "d2", 0.6, 2),
    reranked("c", "d1", 0.6, 3),
  ];

  const report = scoreRetrievalQuality(results, 4, options);

  approxEqual(report.relevance, 0.9);
  approxEqual(report.margin, 0.3);
  approxEqual(report.coverage, 0.5);
  approxEqual(report.consistency, 1 - Math.sqrt(0.02) / 0.25);
  approxEqual(
    report.rq,
    0.4 * 0.9 + 0.2 * 0.3 + 0.2 * 0.5 + 0.2 * (1 - Math.sqrt(0.02) / 0.25)
  );
  assert.deepEqual(report.reasons, []);
});

test("a single result has no margin and full consistency", () => {
  const report = scoreRetrievalQuality([reranked("a", "d1", 0.8)], 0, options);

  approxEqual(report.margin, 0);
  approxEqual(report.coverage, 0);
  approxEqual(report.consistency, 1);
  approxEqual(report.rq, 0.4 * 0.8 + 0.2);
  assert.deepEqual(report.reasons, ["low_margin", "low_coverage"]);
});

test("coverage divides by the smaller of topK and corpus size", () => {
  const results = [reranked("a", "d1", 0.7, 1), reranked("b", "d2", 0.7, 2)];

  approxEqual(scoreRetrievalQuality(results, 2, options).coverage, 1);
  approxEqual(scoreRetrievalQuality(results, 100, options).coverage, 0.2);
});

test("empty results give zero RQ with no_results", () => {
  const report = scoreRetrievalQuality([], 10, options);

  assert.equal(report.rq, 0);
  assert.equal(report.relevance, 0);
  assert.equal(report.consistency, 0);
  assert.deepEqual(report.reasons, ["no_results"]);
});

test("a wide score spread drives consistency to 0", () => {
  const results = [reranked("a", "d1", 1, 1), reranked("b", "d2", 0, 2)];
  const report = scoreRetrievalQuality(results, 2, options);

  // std = 0.5, twice the scale
  assert.equal(report.consistency, 0);
  assert.ok(report.reasons.includes("low_consistency"));
});

test("RQ and every sub-signal stay within [0,1]", () => {
  let seed = 7;
  const next = () => {
    seed = (seed * 1103515245 + 12345) % 2147483648;
    return seed / 2147483648;
  };
  const oddScores = [Number.NaN, -0.3, 1.4, Number.POSITIVE_INFINITY];

  for (let round = 0; round < 200; round++) {
    const size = Math.floor(next() * 12);
    const results: RerankedResult[] = [];
    for (let i = 0; i < size; i++) {
      const score = round % 10 === 0 && i === 0 ? oddScores[round % 4] : next();
      results.push(reranked(`c${i}`, `d${Math.floor(next() * 5)}`, score, i + 1));
    }
    const report = scoreRetrievalQuality(results, Math.floor(next() * 20), options);

    for (const value of [
      report.rq,
      report.relevance,
      report.margin,
      report.coverage,
      report.consistency,
    ]) {
      assert.ok(value >= 0 && value <= 1, `value out of range: ${value}`);
    }
  }
});

test("scoring the same input twice gives identical reports", () => {
  const results = [reranked("a", "d1", 0.77, 1), reranked("b", "d2", 0.41, 2)];

  assert.deepEqual(
    scoreRetrievalQuality(results, 3, options),
    scoreRetrievalQuality(results, 3, options)
  );
});
