import { describe, it, expect } from 'vitest';
import { analyzeDecisionPatterns, enrichAnalysis } from '../analysis/pattern-analyzer.js';
import { DecisionEngine } from '../risk/decision-engine.js';
import { daysAgo, entity, record, task } from './fixtures.js';

const history = [
  record({ timestamp: daysAgo(1), decision: 'ESCALATE', confidenceScore: 0.8 }),
  record({ timestamp: daysAgo(3), decision: 'REVIEW_REQUIRED', confidenceScore: 0.7 }),
  record({ timestamp: daysAgo(2), decision: 'REVIEW_REQUIRED', confidenceScore: 0.6 }),
  record({ timestamp: daysAgo(4), decision: 'AUTONOMOUS', confidenceScore: null }),
  record({ timestamp: daysAgo(1), taskCategory: 'SECURITY_AUDIT', decision: 'ESCALATE' }),
  record({ timestamp: daysAgo(1), entityName: 'Globex', decision: 'ESCALATE' }),
];

describe('analyzeDecisionPatterns', () => {
  it('summarizes matching past decisions', () => {
    const result = analyzeDecisionPatterns(history, 'Acme', 'DATA_PRIVACY');

    expect(result.similarCases).toHaveLength(4);
    expect(result.statistics.totalCases).toBe(4);
    expect(result.statistics.escalatePct).toBe(25);
    expect(result.statistics.reviewPct).toBe(50);
    expect(result.statistics.autonomousPct).toBe(25);
    expect(result.statistics.avgConfidence).toBeCloseTo(0.525, 12);
    expect(result.patternAnalysis).toBe(
      'Based on 4 similar past cases for Acme: escalated 25% of the time. ' +
        'required review 50% of the time. handled autonomously 25% of the time.',
    );
  });

  it('keeps the newest cases up to the limit', () => {
    const result = analyzeDecisionPatterns(history, 'Acme', 'DATA_PRIVACY', 2);
    expect(result.similarCases.map((r) => r.timestamp)).toEqual([daysAgo(1), daysAgo(2)]);
    expect(result.statistics.totalCases).toBe(2);
  });

  it('uses the singular for one case', () => {
    const result = analyzeDecisionPatterns(history, 'Acme', 'SECURITY_AUDIT');
    expect(result.patternAnalysis).toBe('Based on 1 similar past case for Acme: escalated 100% of the time.');
  });

  it('reports empty history', () => {
    const result = analyzeDecisionPatterns(history, 'Initech', 'DATA_PRIVACY');
    expect(result.similarCases).toEqual([]);
    expect(result.statistics).toEqual({
      totalCases: 0,
      autonomousPct: 0,
      reviewPct: 0,
      escalatePct: 0,
      avgConfidence: 0,
    });
    expect(result.patternAnalysis).toBe('No similar past cases found for Initech (DATA_PRIVACY).');
  });
});

describe('enrichAnalysis', () => {
  it('returns a new analysis with history context', () => {
    const analysis = new DecisionEngine().analyzeAndDecide(entity(), task());
    const patterns = analyzeDecisionPatterns(history, 'Acme', 'DATA_PRIVACY');
    const enriched = enrichAnalysis(analysis, patterns);

    expect(enriched.similarCases).toHaveLength(4);
    expect(enriched.patternAnalysis).toBe(patterns.patternAnalysis);
    expect(enriched.suggestions).toEqual([]);
    expect(enriched.decision).toBe(analysis.decision);
    expect(analysis.similarCases).toBeUndefined();
    expect(analysis.patternAnalysis).toBeUndefined();
  });
});
