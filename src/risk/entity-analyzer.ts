import {
  ENTITY_ADJUSTMENTS,
  ENTITY_TYPE_RISK,
  HIGH_REVENUE_USD,
  INDUSTRY_RISK,
  LARGE_WORKFORCE_EMPLOYEES,
  SMALL_WORKFORCE_EMPLOYEES,
} from '../config/constants.js';
import type { EntityContext, ScoredReasoning, TaskContext } from '../types/index.js';

export interface EntityCapability {
  description: string;
  autonomyConfidence: number;
}

function industryTier(risk: number): string {
  if (risk > 0.8) return 'High';
  if (risk > 0.6) return 'Moderate';
  return 'Standard';
}

export class EntityAnalyzer {
  /**
   * Entity risk starts from the mean of the entity-type and industry tables and
   * only ever adds: regulation, violation history, personal-data handling and
   * organization size can raise it, nothing lowers it.
   */
  analyzeEntityRisk(entity: EntityContext, task: TaskContext): ScoredReasoning {
    const reasoning: string[] = [];
    const typeRisk = ENTITY_TYPE_RISK[entity.entityType];
    const industryRisk = INDUSTRY_RISK[entity.industry];
    let score = (typeRisk + industryRisk) / 2;

    switch (entity.entityType) {
      case 'PUBLIC_COMPANY':
        reasoning.push('Public company: High regulatory scrutiny, SEC reporting requirements, shareholder accountability');
        break;
      case 'FINANCIAL_INSTITUTION':
        reasoning.push('Financial institution: Highest compliance standards, regular audits, strict regulatory oversight');
        break;
      case 'HEALTHCARE':
        reasoning.push('Healthcare entity: HIPAA compliance mandatory, sensitive patient data protection critical');
        break;
      default:
        break;
    }

    reasoning.push(`Industry: ${entity.industry} - ${industryTier(industryRisk)} regulatory requirements`);

    if (entity.isRegulated) {
      score += ENTITY_ADJUSTMENTS.regulated;
      reasoning.push('Regulated entity: Subject to direct regulatory oversight and periodic audits');
    }

    if (entity.previousViolations > 0) {
      score += Math.min(
        entity.previousViolations * ENTITY_ADJUSTMENTS.perViolation,
        ENTITY_ADJUSTMENTS.maxViolations,
      );
      reasoning.push(
        `${entity.previousViolations} previous violation(s): Increased regulatory scrutiny expected`,
      );
    }

    if (entity.hasPersonalData && task.affectsPersonalData) {
      score += ENTITY_ADJUSTMENTS.personalDataHandling;
      reasoning.push('Handles personal data: Privacy regulations and breach notification requirements apply');
    }

    if (entity.employeeCount !== undefined && entity.employeeCount > LARGE_WORKFORCE_EMPLOYEES) {
      score += ENTITY_ADJUSTMENTS.largeWorkforce;
      reasoning.push('Large organization (5000+ employees): More complex operations');
    }

    if (entity.annualRevenue !== undefined && entity.annualRevenue > HIGH_REVENUE_USD) {
      score += ENTITY_ADJUSTMENTS.highRevenue;
      reasoning.push('High revenue organization: Significant potential fines, greater reputational risk');
    }

    return { score: Math.min(score, 1), reasoning };
  }

  assessCapability(entity: EntityContext): EntityCapability {
    let autonomyConfidence = 0.5;
    let description = 'Moderate - Standard compliance capability';

    if (entity.entityType === 'PUBLIC_COMPANY' || entity.entityType === 'FINANCIAL_INSTITUTION') {
      autonomyConfidence = 0.8;
      description = 'High - Likely has dedicated compliance team';
    } else if (entity.employeeCount !== undefined && entity.employeeCount > 500) {
      autonomyConfidence = 0.7;
      description = 'Moderate-High - Should have compliance resources';
    } else if (entity.employeeCount !== undefined && entity.employeeCount < SMALL_WORKFORCE_EMPLOYEES) {
      autonomyConfidence = 0.4;
      description = 'Low - May need external guidance';
    }

    if (entity.previousViolations > 0) {
      autonomyConfidence *= 0.8;
      description += ` (${entity.previousViolations} previous violation(s))`;
    }

    return { description, autonomyConfidence };
  }
}
