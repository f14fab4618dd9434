import { describe, it, expect } from 'vitest';
import { DecisionEngine } from '../risk/decision-engine.js';
import { WhatIfEngine } from '../risk/what-if-engine.js';
import { ValidationError } from '../utils/errors.js';
import type { DecisionAnalysis } from '../types/index.js';
import { entity, startupWithViolations, task } from './fixtures.js';

const decisionEngine = new DecisionEngine();
const whatIf = new WhatIfEngine(decisionEngine);

function lowRiskBaseline(): DecisionAnalysis {
  return decisionEngine.analyzeAndDecide(entity(), task());
}

describe('WhatIfEngine', () => {
  it('reports no change for an empty scenario', () => {
    const baseline = lowRiskBaseline();
    const result = whatIf.analyzeScenario(baseline, {});

    expect(result.scoreDelta).toBe(0);
    expect(result.newScore).toBe(result.baselineScore);
    expect(result.newLevel).toBe('LOW');
    expect(result.newDecision).toBe('AUTONOMOUS');
    expect(result.changedInput).toEqual(['No changes specified']);
    expect(result.decisionChange).toEqual({
      changed: false,
      levelChanged: false,
      baselineDecision: 'AUTONOMOUS',
      newDecision: 'AUTONOMOUS',
      baselineLevel: 'LOW',
      newLevel: 'LOW',
      impact: 'Decision unchanged',
      severity: 'none',
    });
    expect(result.explanation).toEqual([
      'Overall risk score remained essentially unchanged',
      'Risk level remained: LOW',
      'Decision remained: AUTONOMOUS',
      'Interpretation: Low risk scenario - suitable for autonomous action',
    ]);
  });

  it('moves the score by delta x weight for a single factor', () => {
    const analysis = lowRiskBaseline();
    const baseline: DecisionAnalysis = {
      ...analysis,
      riskFactors: { ...analysis.riskFactors, regulatoryRisk: 0.3 },
    };

    const result = whatIf.analyzeScenario(baseline, { regulatoryRisk: 0.95 });

    expect(result.scoreDelta).toBe((0.95 - 0.3) * 0.2);
    expect(result.scoreDelta).toBeCloseTo(0.13, 12);
    expect(result.baselineScore).toBeCloseTo(0.3425, 10);
    expect(result.newScore).toBeCloseTo(0.4725, 10);
    expect(result.newLevel).toBe('MEDIUM');
    expect(result.newDecision).toBe('REVIEW_REQUIRED');
    expect(result.decisionChange.severity).toBe('medium');
    expect(result.decisionChange.impact).toBe('Decision requires review (was autonomous)');
    expect(result.changedInput).toEqual(['Regulatory Oversight: 0.30 → 0.95 (Δ+0.65)']);

    expect(result.explanation[0]).toMatch(/^Overall risk score increased by 0\.130 \(/);
    expect(result.explanation.slice(1)).toEqual([
      'Risk level changed: LOW → MEDIUM',
      'Decision changed: AUTONOMOUS → REVIEW_REQUIRED',
      'This scenario requires human review before action',
      'Factor contributions to score change:',
      '↑ Regulatory Oversight (20%): +0.130 contribution to overall score',
      'Interpretation: Medium risk scenario - review recommended',
    ]);
  });

  it('adds factor contributions linearly', () => {
    const baseline = lowRiskBaseline();
    const result = whatIf.analyzeScenario(baseline, { taskRisk: 0.6, impactRisk: 0 });

    const expected = (0.6 - baseline.riskFactors.taskRisk) * 0.2 + (0 - baseline.riskFactors.impactRisk) * 0.1;
    expect(result.scoreDelta).toBeCloseTo(expected, 12);
    expect(result.newScore - result.baselineScore).toBeCloseTo(result.scoreDelta, 12);
    expect(result.factorDeltas.taskRisk.weightedDelta).toBeCloseTo(0.1, 12);
    expect(result.factorDeltas.impactRisk.delta).toBeCloseTo(-0.2, 12);
    expect(result.factorDeltas.entityRisk.delta).toBe(0);
    expect(result.modifiedFactors.taskRisk).toBe(0.6);
    expect(result.modifiedFactors.jurisdictionRisk).toBe(baseline.riskFactors.jurisdictionRisk);
    expect(result.explanation).toContain('↓ Impact Severity (10%): -0.020 contribution to overall score');
  });

  it('describes a decrease', () => {
    const analysis = lowRiskBaseline();
    const baseline: DecisionAnalysis = {
      ...analysis,
      riskFactors: { ...analysis.riskFactors, dataSensitivityRisk: 0.9 },
    };
    const result = whatIf.analyzeScenario(baseline, { dataSensitivityRisk: 0.4 });
    expect(result.scoreDelta).toBeCloseTo(-0.1, 12);
    expect(result.explanation[0]).toMatch(/^Overall risk score decreased by 0\.100 \(/);
  });

  it('leaves the baseline untouched', () => {
    const baseline = lowRiskBaseline();
    const before = JSON.stringify(baseline);
    whatIf.analyzeScenario(baseline, { entityRisk: 1, taskRisk: 1 });
    expect(JSON.stringify(baseline)).toBe(before);
  });

  it('lists only contributions that survive rounding', () => {
    const tiny = whatIf.analyzeScenario(lowRiskBaseline(), { taskRisk: 0.106 });
    expect(tiny.explanation).toEqual([
      'Overall risk score remained essentially unchanged',
      'Risk level remained: LOW',
      'Decision remained: AUTONOMOUS',
      'Interpretation: Low risk scenario - suitable for autonomous action',
    ]);

    const small = whatIf.analyzeScenario(lowRiskBaseline(), { taskRisk: 0.11 });
    expect(small.explanation).toContain('Factor contributions to score change:');
    expect(small.explanation).toContain('↑ Task Complexity (20%): +0.002 contribution to overall score');
  });

  it('rejects out-of-range factor changes', () => {
    expect(() => whatIf.analyzeScenario(lowRiskBaseline(), { taskRisk: 1.5 })).toThrow(ValidationError);
  });

  it('re-runs the full analysis for a replaced entity', () => {
    const result = whatIf.analyzeScenario(lowRiskBaseline(), { entity: startupWithViolations(3) });
    expect(result.newDecision).toBe('REVIEW_REQUIRED');
    expect(result.changedInput).toEqual(['Entity context changed: Cautious Startup (STARTUP)']);
    expect(result.decisionChange.changed).toBe(true);
    expect(result.decisionChange.levelChanged).toBe(false);
  });

  it('re-runs the full analysis for a replaced task', () => {
    const result = whatIf.analyzeScenario(lowRiskBaseline(), {
      task: task({ description: 'Contain credential leak', category: 'INCIDENT_RESPONSE' }),
    });
    expect(result.newDecision).toBe('ESCALATE');
    expect(result.decisionChange.severity).toBe('high');
    expect(result.decisionChange.impact).toBe('Decision escalated - requires expert involvement');
    expect(result.changedInput).toEqual(['Task context changed: INCIDENT_RESPONSE - Contain credential leak']);
  });

  it('compares several scenarios against one baseline', () => {
    const baseline = lowRiskBaseline();
    const comparison = whatIf.compareScenarios(baseline, [{}, { regulatoryRisk: 1 }]);

    expect(comparison.baseline.score).toBeCloseTo(0.3225, 10);
    expect(comparison.baseline.decision).toBe('AUTONOMOUS');
    expect(comparison.scenarios.map((s) => s.scenarioId)).toEqual([1, 2]);
    expect(comparison.scenarios[0]?.decisionChanged).toBe(false);
    expect(comparison.scenarios[1]?.scoreDelta).toBeCloseTo(0.16, 12);
    expect(comparison.scenarios[1]?.level).toBe('MEDIUM');
    expect(comparison.scenarios[1]?.decision).toBe('REVIEW_REQUIRED');
    expect(comparison.scenarios[1]?.decisionChanged).toBe(true);
  });
});
