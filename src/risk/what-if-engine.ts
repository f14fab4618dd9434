/**
 * What-If Engine
 *
 * Counterfactual exploration over a baseline decision: patch some risk
 * factors (or swap the entity/task), recompute the outcome and explain what
 * moved. The baseline record is never modified.
 */
import { RISK_FACTOR_LABELS, RISK_FACTOR_WEIGHTS } from '../config/constants.js';
import { DecisionEngine } from './decision-engine.js';
import { RiskFactorModel, formatWeight, mapFactors } from './risk-factors.js';
import { createModuleLogger } from '../utils/logger.js';
import { RISK_FACTOR_KEYS } from '../types/index.js';
import type {
  ActionDecision,
  ChangeSeverity,
  DecisionAnalysis,
  DecisionChange,
  FactorDelta,
  RiskFactorKey,
  RiskFactorScores,
  RiskLevel,
  ScenarioComparison,
  WhatIfChanges,
  WhatIfResult,
} from '../types/index.js';

const log = createModuleLogger('what-if');

const NEGLIGIBLE_SCORE_DELTA = 0.01;
const SIGNIFICANT_WEIGHTED_DELTA = 0.001;

const DECISION_NOTES: Record<ActionDecision, string> = {
  ESCALATE: 'This scenario requires escalation to a human expert',
  REVIEW_REQUIRED: 'This scenario requires human review before action',
  AUTONOMOUS: 'This scenario allows autonomous action',
};

// [baseline][new] → severity and impact of the decision change
const CHANGE_TABLE: Record<ActionDecision, Record<ActionDecision, { severity: ChangeSeverity; impact: string }>> = {
  AUTONOMOUS: {
    AUTONOMOUS: { severity: 'none', impact: 'Decision unchanged' },
    REVIEW_REQUIRED: { severity: 'medium', impact: 'Decision requires review (was autonomous)' },
    ESCALATE: { severity: 'high', impact: 'Decision escalated - requires expert involvement' },
  },
  REVIEW_REQUIRED: {
    AUTONOMOUS: { severity: 'low', impact: 'Decision allows autonomous action (was restricted)' },
    REVIEW_REQUIRED: { severity: 'none', impact: 'Decision unchanged' },
    ESCALATE: { severity: 'high', impact: 'Decision escalated - requires expert involvement' },
  },
  ESCALATE: {
    AUTONOMOUS: { severity: 'low', impact: 'Decision allows autonomous action (was restricted)' },
    REVIEW_REQUIRED: { severity: 'medium', impact: 'Decision changed to require review' },
    ESCALATE: { severity: 'none', impact: 'Decision unchanged' },
  },
};

function signed(value: number, digits: number): string {
  const text = Math.abs(value).toFixed(digits);
  return value < 0 ? `-${text}` : `+${text}`;
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function interpretScore(score: number): string {
  if (score < DecisionEngine.LOW_RISK_THRESHOLD) {
    return 'Low risk scenario - suitable for autonomous action';
  }
  if (score < DecisionEngine.MEDIUM_RISK_THRESHOLD) {
    return 'Medium risk scenario - review recommended';
  }
  return 'High risk scenario - expert involvement required';
}

export class WhatIfEngine {
  private readonly decisionEngine: DecisionEngine;

  constructor(decisionEngine: DecisionEngine = new DecisionEngine()) {
    this.decisionEngine = decisionEngine;
  }

  analyzeScenario(baseline: DecisionAnalysis, changes: WhatIfChanges): WhatIfResult {
    const baselineModel = new RiskFactorModel(baseline.riskFactors);
    const baselineFactors = baselineModel.factors;
    const baselineScore = baselineModel.overallScore();

    const modifiedModel = new RiskFactorModel(
      mapFactors((key) => changes[key] ?? baselineFactors[key]),
    );
    const modifiedFactors = modifiedModel.factors;
    const newScore = modifiedModel.overallScore();
    const newLevel = modifiedModel.classify();

    let newDecision: ActionDecision;
    if (changes.entity !== undefined || changes.task !== undefined) {
      const rerun = this.decisionEngine.analyzeAndDecide(
        changes.entity ?? baseline.entityContext,
        changes.task ?? baseline.taskContext,
      );
      newDecision = rerun.decision;
    } else {
      newDecision = this.decisionEngine.decide(
        newLevel,
        newScore,
        baseline.entityContext,
        baseline.taskContext,
      ).decision;
    }

    const factorDeltas = this.calculateFactorDeltas(baselineFactors, modifiedFactors);
    // Sum of weighted deltas, so a single-factor change moves the score by exactly delta x weight
    const scoreDelta = RISK_FACTOR_KEYS.reduce((sum, key) => sum + factorDeltas[key].weightedDelta, 0);

    const explanation = this.generateExplanation({
      factorDeltas,
      baselineScore,
      newScore,
      scoreDelta,
      baselineLevel: baseline.riskLevel,
      newLevel,
      baselineDecision: baseline.decision,
      newDecision,
    });

    const decisionChange = this.determineDecisionChange(
      baseline.decision,
      newDecision,
      baseline.riskLevel,
      newLevel,
    );

    log.debug('Scenario analyzed', {
      baselineScore: baselineScore.toFixed(3),
      newScore: newScore.toFixed(3),
      decision: `${baseline.decision} → ${newDecision}`,
      severity: decisionChange.severity,
    });

    return {
      changedInput: this.describeChanges(changes, baselineFactors, modifiedFactors),
      baselineScore,
      newScore,
      scoreDelta,
      baselineLevel: baseline.riskLevel,
      newLevel,
      baselineDecision: baseline.decision,
      newDecision,
      factorDeltas,
      modifiedFactors,
      explanation,
      decisionChange,
    };
  }

  compareScenarios(baseline: DecisionAnalysis, scenarios: WhatIfChanges[]): ScenarioComparison {
    const baselineModel = new RiskFactorModel(baseline.riskFactors);

    return {
      baseline: {
        score: baselineModel.overallScore(),
        level: baseline.riskLevel,
        decision: baseline.decision,
      },
      scenarios: scenarios.map((changes, index) => {
        const result = this.analyzeScenario(baseline, changes);
        return {
          scenarioId: index + 1,
          changes: result.changedInput,
          score: result.newScore,
          scoreDelta: result.scoreDelta,
          level: result.newLevel,
          decision: result.newDecision,
          decisionChanged: result.decisionChange.changed,
          explanation: result.explanation,
        };
      }),
    };
  }

  private calculateFactorDeltas(
    baseline: RiskFactorScores,
    modified: RiskFactorScores,
  ): Record<RiskFactorKey, FactorDelta> {
    return mapFactors((key) => {
      const delta = modified[key] - baseline[key];
      return {
        baseline: baseline[key],
        modified: modified[key],
        delta,
        weight: RISK_FACTOR_WEIGHTS[key],
        weightedDelta: delta * RISK_FACTOR_WEIGHTS[key],
      };
    });
  }

  private describeChanges(
    changes: WhatIfChanges,
    baseline: RiskFactorScores,
    modified: RiskFactorScores,
  ): string[] {
    const descriptions: string[] = [];

    for (const key of RISK_FACTOR_KEYS) {
      if (changes[key] === undefined) continue;
      const before = baseline[key];
      const after = modified[key];
      descriptions.push(
        `${RISK_FACTOR_LABELS[key]}: ${before.toFixed(2)} → ${after.toFixed(2)} (Δ${signed(after - before, 2)})`,
      );
    }

    if (changes.entity) {
      descriptions.push(`Entity context changed: ${changes.entity.name} (${changes.entity.entityType})`);
    }
    if (changes.task) {
      descriptions.push(
        `Task context changed: ${changes.task.category} - ${changes.task.description.slice(0, 50)}`,
      );
    }

    if (descriptions.length === 0) {
      descriptions.push('No changes specified');
    }

    return descriptions;
  }

  private generateExplanation(args: {
    factorDeltas: Record<RiskFactorKey, FactorDelta>;
    baselineScore: number;
    newScore: number;
    scoreDelta: number;
    baselineLevel: RiskLevel;
    newLevel: RiskLevel;
    baselineDecision: ActionDecision;
    newDecision: ActionDecision;
  }): string[] {
    const { baselineScore, newScore, scoreDelta } = args;
    const explanation: string[] = [];
    const transition = `(${baselineScore.toFixed(3)} → ${newScore.toFixed(3)})`;

    if (Math.abs(scoreDelta) < NEGLIGIBLE_SCORE_DELTA) {
      explanation.push('Overall risk score remained essentially unchanged');
    } else if (scoreDelta > 0) {
      explanation.push(`Overall risk score increased by ${scoreDelta.toFixed(3)} ${transition}`);
    } else {
      explanation.push(`Overall risk score decreased by ${Math.abs(scoreDelta).toFixed(3)} ${transition}`);
    }

    if (args.baselineLevel !== args.newLevel) {
      explanation.push(`Risk level changed: ${args.baselineLevel} → ${args.newLevel}`);
    } else {
      explanation.push(`Risk level remained: ${args.newLevel}`);
    }

    if (args.baselineDecision !== args.newDecision) {
      explanation.push(`Decision changed: ${args.baselineDecision} → ${args.newDecision}`);
      explanation.push(DECISION_NOTES[args.newDecision]);
    } else {
      explanation.push(`Decision remained: ${args.newDecision}`);
    }

    const contributions = RISK_FACTOR_KEYS
      .filter((key) => Math.abs(round3(args.factorDeltas[key].weightedDelta)) > SIGNIFICANT_WEIGHTED_DELTA)
      .map((key) => {
        const weighted = args.factorDeltas[key].weightedDelta;
        const direction = weighted > 0 ? '↑' : '↓';
        return `${direction} ${RISK_FACTOR_LABELS[key]} (${formatWeight(key)}): ${signed(weighted, 3)} contribution to overall score`;
      });
    if (contributions.length > 0) {
      explanation.push('Factor contributions to score change:', ...contributions);
    }

    explanation.push(`Interpretation: ${interpretScore(newScore)}`);
    return explanation;
  }

  private determineDecisionChange(
    baselineDecision: ActionDecision,
    newDecision: ActionDecision,
    baselineLevel: RiskLevel,
    newLevel: RiskLevel,
  ): DecisionChange {
    const { severity, impact } = CHANGE_TABLE[baselineDecision][newDecision];
    return {
      changed: baselineDecision !== newDecision,
      levelChanged: baselineLevel !== newLevel,
      baselineDecision,
      newDecision,
      baselineLevel,
      newLevel,
      impact,
      severity,
    };
  }
}
