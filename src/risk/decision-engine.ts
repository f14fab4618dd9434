/**
 * Decision Engine
 *
 * Derives the six risk factors from entity and task facts, combines them
 * through the risk factor model and decides how the task may proceed:
 * - LOW risk → AUTONOMOUS
 * - MEDIUM risk → REVIEW_REQUIRED
 * - HIGH risk → ESCALATE
 *
 * Categorical overrides run after the score-based decision:
 * - INCIDENT_RESPONSE always escalates
 * - A violation history (2+, or 1+ once risk is MEDIUM/HIGH) never runs autonomously
 */
import {
  CONFIDENCE,
  DATA_SENSITIVITY,
  IMPACT,
  MODERATE_IMPACT_KEYWORDS,
  REGULATORY,
  RISK_THRESHOLDS,
  SEVERE_IMPACT_KEYWORDS,
  STAKEHOLDER_STEPS,
  TASK_ADJUSTMENTS,
  TASK_CATEGORY_RISK,
  VIOLATION_OVERRIDE_ELEVATED_THRESHOLD,
  VIOLATION_OVERRIDE_THRESHOLD,
} from '../config/constants.js';
import { EntityAnalyzer } from './entity-analyzer.js';
import { JurisdictionAnalyzer } from './jurisdiction-analyzer.js';
import { RiskFactorModel, classifyScore } from './risk-factors.js';
import { assertKnownEnums } from '../schemas/context.schema.js';
import { ValidationError } from '../utils/errors.js';
import { createModuleLogger } from '../utils/logger.js';
import type {
  ActionDecision,
  DecisionAnalysis,
  DecisionOutcome,
  EntityContext,
  RiskFactorKey,
  RiskFactorScores,
  RiskLevel,
  ScoredReasoning,
  TaskContext,
} from '../types/index.js';

const log = createModuleLogger('decision-engine');

const DECISION_RANK: Record<ActionDecision, number> = {
  AUTONOMOUS: 0,
  REVIEW_REQUIRED: 1,
  ESCALATE: 2,
};

const LEVEL_DECISION: Record<RiskLevel, ActionDecision> = {
  LOW: 'AUTONOMOUS',
  MEDIUM: 'REVIEW_REQUIRED',
  HIGH: 'ESCALATE',
};

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function baseRiskLabel(risk: number): string {
  if (risk > 0.7) return 'HIGH';
  if (risk > 0.4) return 'MEDIUM';
  return 'LOW';
}

function containsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((word) => text.includes(word));
}

export function isSimpleTask(task: TaskContext): boolean {
  return (
    task.category === 'GENERAL_INQUIRY' &&
    !task.affectsPersonalData &&
    !task.affectsFinancialData
  );
}

export class DecisionEngine {
  static readonly LOW_RISK_THRESHOLD = RISK_THRESHOLDS.low;
  static readonly MEDIUM_RISK_THRESHOLD = RISK_THRESHOLDS.medium;

  private readonly jurisdictionAnalyzer: JurisdictionAnalyzer;
  private readonly entityAnalyzer: EntityAnalyzer;

  constructor(
    jurisdictionAnalyzer: JurisdictionAnalyzer = new JurisdictionAnalyzer(),
    entityAnalyzer: EntityAnalyzer = new EntityAnalyzer(),
  ) {
    this.jurisdictionAnalyzer = jurisdictionAnalyzer;
    this.entityAnalyzer = entityAnalyzer;
  }

  analyzeAndDecide(entity: EntityContext, task: TaskContext): DecisionAnalysis {
    if (task.description.trim().length === 0) {
      throw new ValidationError({
        message: 'Task description cannot be empty',
        field: 'description',
      });
    }
    assertKnownEnums(entity, task);

    const jurisdiction = this.jurisdictionAnalyzer.analyzeJurisdictionRisk(entity, task);
    const entityRisk = this.entityAnalyzer.analyzeEntityRisk(entity, task);
    const taskRisk = this.analyzeTaskRisk(task);
    const dataRisk = this.analyzeDataSensitivity(entity, task);
    const regulatoryRisk = this.analyzeRegulatoryRisk(entity, task);
    const impactRisk = this.analyzeImpactRisk(task);

    const factors: RiskFactorScores = {
      jurisdictionRisk: this.clampFactor('jurisdictionRisk', jurisdiction.score),
      entityRisk: this.clampFactor('entityRisk', entityRisk.score),
      taskRisk: this.clampFactor('taskRisk', taskRisk.score),
      dataSensitivityRisk: this.clampFactor('dataSensitivityRisk', dataRisk.score),
      regulatoryRisk: this.clampFactor('regulatoryRisk', regulatoryRisk.score),
      impactRisk: this.clampFactor('impactRisk', impactRisk.score),
    };

    const model = new RiskFactorModel(factors);
    const overallScore = model.overallScore();
    const riskLevel = model.classify();

    const outcome = this.decide(riskLevel, overallScore, entity, task);
    const capability = this.entityAnalyzer.assessCapability(entity);
    const confidence = this.calculateConfidence(riskLevel, overallScore, task);

    const reasoning = [
      'RISK ANALYSIS:',
      ...jurisdiction.reasoning,
      ...entityRisk.reasoning,
      ...taskRisk.reasoning,
      ...dataRisk.reasoning,
      ...regulatoryRisk.reasoning,
      ...impactRisk.reasoning,
      'RISK FACTORS:',
      ...model.rationale(),
      'DECISION LOGIC:',
      `Entity capability: ${capability.description}`,
      ...outcome.reasoning,
    ];

    const recommendations = this.generateRecommendations(outcome.decision, entity, task, factors);
    const escalationReason = outcome.decision === 'ESCALATE'
      ? this.generateEscalationReason(riskLevel, overallScore, factors, entity, task)
      : undefined;

    log.info('Decision made', {
      entity: entity.name,
      category: task.category,
      score: overallScore.toFixed(3),
      level: riskLevel,
      decision: outcome.decision,
      confidence,
    });

    return {
      entityContext: entity,
      taskContext: task,
      riskFactors: factors,
      overallScore,
      riskLevel,
      decision: outcome.decision,
      confidence,
      reasoning,
      recommendations,
      escalationReason,
      timestamp: new Date(),
    };
  }

  /**
   * Score-based decision followed by the categorical overrides. Every override
   * that matches adds a reasoning line, even when it does not change the result.
   */
  decide(
    riskLevel: RiskLevel,
    overallScore: number,
    entity: EntityContext,
    task: TaskContext,
  ): DecisionOutcome {
    const reasoning: string[] = [];
    let decision = LEVEL_DECISION[riskLevel];

    switch (riskLevel) {
      case 'LOW':
        reasoning.push(`LOW risk (${overallScore.toFixed(2)}) → AUTONOMOUS action approved`);
        break;
      case 'MEDIUM':
        reasoning.push(`MEDIUM risk (${overallScore.toFixed(2)}) → REVIEW_REQUIRED before taking action`);
        break;
      case 'HIGH':
        reasoning.push(`HIGH risk (${overallScore.toFixed(2)}) → ESCALATE to human expert`);
        break;
    }

    const violationOverride =
      entity.previousViolations >= VIOLATION_OVERRIDE_THRESHOLD ||
      (entity.previousViolations >= VIOLATION_OVERRIDE_ELEVATED_THRESHOLD && riskLevel !== 'LOW');
    if (violationOverride) {
      reasoning.push(
        `Override: ${entity.previousViolations} previous violation(s) require human oversight`,
      );
      if (DECISION_RANK[decision] < DECISION_RANK.REVIEW_REQUIRED) {
        decision = 'REVIEW_REQUIRED';
      }
    }

    if (task.category === 'INCIDENT_RESPONSE') {
      reasoning.push('Override: Incident response always requires immediate expert involvement');
      decision = 'ESCALATE';
    }

    return { decision, reasoning };
  }

  /**
   * Confidence is pinned at band endpoints and interpolated linearly by the
   * score's distance from the nearest decision boundary.
   */
  calculateConfidence(riskLevel: RiskLevel, overallScore: number, task: TaskContext): number {
    const low = DecisionEngine.LOW_RISK_THRESHOLD;
    const medium = DecisionEngine.MEDIUM_RISK_THRESHOLD;

    switch (riskLevel) {
      case 'LOW': {
        if (isSimpleTask(task)) return CONFIDENCE.simpleTask;
        const margin = (low - overallScore) / low;
        return round3(CONFIDENCE.lowFloor + (CONFIDENCE.lowCeiling - CONFIDENCE.lowFloor) * margin);
      }
      case 'MEDIUM': {
        const mid = (low + medium) / 2;
        const halfWidth = (medium - low) / 2;
        const offCentre = Math.min(Math.abs(overallScore - mid) / halfWidth, 1);
        return round3(CONFIDENCE.mediumCeiling - (CONFIDENCE.mediumCeiling - CONFIDENCE.mediumFloor) * offCentre);
      }
      case 'HIGH': {
        const margin = Math.min((overallScore - medium) / (1 - medium), 1);
        return round3(CONFIDENCE.highFloor + (CONFIDENCE.highCeiling - CONFIDENCE.highFloor) * margin);
      }
    }
  }

  private clampFactor(key: RiskFactorKey, value: number): number {
    if (!Number.isFinite(value)) {
      throw new ValidationError({
        message: `Derived ${key} is not a finite number`,
        field: key,
      });
    }
    if (value < 0 || value > 1) {
      const clamped = Math.min(Math.max(value, 0), 1);
      log.warn('Derived risk factor out of range, clamped', { factor: key, value, clamped });
      return clamped;
    }
    return value;
  }

  private analyzeTaskRisk(task: TaskContext): ScoredReasoning {
    const reasoning: string[] = [];
    const base = TASK_CATEGORY_RISK[task.category];
    let score = base;

    reasoning.push(`Task category: ${task.category} - Base risk level: ${baseRiskLabel(base)}`);

    if (task.regulatoryDeadline) {
      score += TASK_ADJUSTMENTS.deadline;
      reasoning.push(
        `Regulatory deadline ${task.regulatoryDeadline.toISOString()}: Time pressure may limit review options`,
      );
    }
    if (task.affectsPersonalData) {
      score += TASK_ADJUSTMENTS.personalData;
    }
    if (task.affectsFinancialData) {
      score += TASK_ADJUSTMENTS.financialData;
    }

    return { score: Math.min(score, 1), reasoning };
  }

  private analyzeDataSensitivity(entity: EntityContext, task: TaskContext): ScoredReasoning {
    const reasoning: string[] = [];
    let score = DATA_SENSITIVITY.base;

    if (entity.hasPersonalData) {
      score += DATA_SENSITIVITY.entityHoldsPersonalData;
    }
    if (task.affectsPersonalData) {
      score += DATA_SENSITIVITY.personalData;
      reasoning.push('Involves personal data: Privacy regulations apply, breach notification required');
    }
    if (task.affectsFinancialData) {
      score += DATA_SENSITIVITY.financialData;
      reasoning.push('Involves financial data: Additional security and compliance requirements');
    }
    if (task.affectsPersonalData && task.affectsFinancialData) {
      score += DATA_SENSITIVITY.combined;
      reasoning.push('Combines personal AND financial data: Highest protection standards required');
    }
    if (reasoning.length === 0) {
      reasoning.push('No sensitive data indicated: Standard data handling applies');
    }

    return { score: Math.min(score, 1), reasoning };
  }

  private analyzeRegulatoryRisk(entity: EntityContext, task: TaskContext): ScoredReasoning {
    const reasoning: string[] = [];
    let score = task.category === 'GENERAL_INQUIRY' ? REGULATORY.inquiryBase : REGULATORY.taskBase;

    const regulations = this.jurisdictionAnalyzer.identifyApplicableRegulations(entity, task);
    if (regulations.length > 0) {
      score += regulations.length * REGULATORY.perRegulation;
      const listed = regulations.slice(0, 3).join(', ');
      reasoning.push(
        `Applicable regulations (${regulations.length}): ${listed}${regulations.length > 3 ? '...' : ''}`,
      );
    }

    if (entity.jurisdictions.length > 1) {
      score += (entity.jurisdictions.length - 1) * REGULATORY.perExtraJurisdiction;
    }

    if (entity.isRegulated) {
      score += REGULATORY.regulatedEntity;
      reasoning.push('Directly regulated entity: Regular reporting and audit requirements');
    }

    if (task.category === 'REGULATORY_FILING') {
      score += REGULATORY.regulatoryFiling;
      reasoning.push('Regulatory filing task: Errors can result in penalties and legal consequences');
    }

    if (reasoning.length === 0 && task.category === 'GENERAL_INQUIRY') {
      reasoning.push('General inquiry: Minimal regulatory compliance risk');
    }

    return { score: Math.min(score, 1), reasoning };
  }

  private analyzeImpactRisk(task: TaskContext): ScoredReasoning {
    const reasoning: string[] = [];
    let score: number;

    if (task.potentialImpact) {
      const impact = task.potentialImpact.toLowerCase();
      if (containsAny(impact, SEVERE_IMPACT_KEYWORDS)) {
        score = IMPACT.severe;
        reasoning.push(`High-impact scenario: '${task.potentialImpact}' - Errors could have serious consequences`);
      } else if (containsAny(impact, MODERATE_IMPACT_KEYWORDS)) {
        score = IMPACT.moderate;
        reasoning.push(`Moderate impact: '${task.potentialImpact}'`);
      } else {
        score = IMPACT.standard;
        reasoning.push(`Standard impact: '${task.potentialImpact}'`);
      }
    } else if (task.category === 'GENERAL_INQUIRY') {
      score = IMPACT.unspecifiedInquiry;
      reasoning.push('General inquiry with no specified impact: Low risk');
    } else {
      score = IMPACT.unspecified;
      reasoning.push('Impact level not specified: Assuming low-moderate risk');
    }

    if (task.stakeholderCount !== undefined) {
      const count = task.stakeholderCount;
      const step = STAKEHOLDER_STEPS.find((s) => count >= s.min);
      if (step) {
        score += step.bonus;
        reasoning.push(`Stakeholder impact (${count.toLocaleString('en-US')} affected): Increased scrutiny required`);
      }
    }

    return { score: Math.min(score, 1), reasoning };
  }

  private generateRecommendations(
    decision: ActionDecision,
    entity: EntityContext,
    task: TaskContext,
    factors: RiskFactorScores,
  ): string[] {
    const recommendations: string[] = [];

    switch (decision) {
      case 'AUTONOMOUS':
        recommendations.push(
          'Proceed with recommended compliance actions',
          'Document all decisions and rationale',
          'Set up monitoring for ongoing compliance',
        );
        break;
      case 'REVIEW_REQUIRED':
        recommendations.push(
          'Submit analysis to compliance team for human review before acting',
          'Prepare detailed documentation of reasoning and approach',
          'Schedule review meeting within 2-3 business days',
        );
        if (factors.dataSensitivityRisk > 0.7) {
          recommendations.push('Have data protection officer review data handling procedures');
        }
        break;
      case 'ESCALATE':
        recommendations.push(
          'IMMEDIATE: Escalate to compliance specialist or legal counsel',
          'Prepare comprehensive briefing document with all context',
          'Do NOT proceed with any actions until expert approval received',
        );
        if (factors.regulatoryRisk > 0.8) {
          recommendations.push('Consider engaging external regulatory counsel');
        }
        if (task.regulatoryDeadline) {
          recommendations.push('Note regulatory deadline - prioritize expert review');
        }
        break;
    }

    if (entity.previousViolations > 0) {
      recommendations.push('Extra diligence required due to violation history - document thoroughly');
    }
    if (task.involvesCrossBorder) {
      recommendations.push('Cross-border implications - verify data transfer mechanisms');
    }

    return recommendations;
  }

  private generateEscalationReason(
    riskLevel: RiskLevel,
    overallScore: number,
    factors: RiskFactorScores,
    entity: EntityContext,
    task: TaskContext,
  ): string {
    const reasons: string[] = [];

    if (riskLevel === 'HIGH') {
      reasons.push(`High overall risk level (score: ${overallScore.toFixed(2)})`);
    }
    if (factors.regulatoryRisk > 0.8) {
      reasons.push('Significant regulatory compliance requirements');
    }
    if (factors.dataSensitivityRisk > 0.8) {
      reasons.push('Highly sensitive data involved');
    }
    if (factors.impactRisk > 0.8) {
      reasons.push('Potentially severe impact of errors');
    }
    if (entity.previousViolations > 0) {
      reasons.push(`Previous compliance violations (${entity.previousViolations})`);
    }
    if (task.category === 'INCIDENT_RESPONSE' || task.category === 'REGULATORY_FILING') {
      reasons.push(`High-stakes task category: ${task.category}`);
    }
    if (reasons.length === 0) {
      reasons.push(`Escalation required for ${classifyScore(overallScore)} risk compliance task`);
    }

    return reasons.join('; ');
  }
}
