import {
  CROSS_BORDER_RISK,
  INDUSTRY_JURISDICTION_RISK,
  JURISDICTION_COMPLEXITY,
  MULTI_JURISDICTION_RISK,
  NO_JURISDICTION_RISK,
} from '../config/constants.js';
import { createModuleLogger } from '../utils/logger.js';
import type {
  EntityContext,
  Jurisdiction,
  ScoredReasoning,
  TaskContext,
} from '../types/index.js';

const log = createModuleLogger('jurisdiction');

function jurisdictionNote(jurisdiction: Jurisdiction): string | null {
  switch (jurisdiction) {
    case 'EU':
      return 'EU jurisdiction: GDPR compliance mandatory (strict penalties)';
    case 'US_FEDERAL':
      return 'US Federal: Multiple agency oversight (SEC, FTC, etc.)';
    case 'MULTI_JURISDICTIONAL':
      return 'Multi-jurisdictional: Complex regulatory harmonization required';
    case 'US_STATE':
    case 'UK':
    case 'APAC':
    case 'CANADA':
    case 'UNKNOWN':
      return null;
    default: {
      const unhandled: never = jurisdiction;
      return unhandled;
    }
  }
}

function regulationsFor(
  jurisdiction: Jurisdiction,
  entity: EntityContext,
  task: TaskContext,
): string[] {
  const regulations: string[] = [];

  switch (jurisdiction) {
    case 'EU':
      regulations.push('GDPR (General Data Protection Regulation)');
      if (entity.industry === 'FINANCIAL_SERVICES') {
        regulations.push('MiFID II', 'PSD2');
      }
      if (task.category === 'DATA_PRIVACY') {
        regulations.push('ePrivacy Directive');
      }
      break;
    case 'US_FEDERAL':
      if (entity.industry === 'HEALTHCARE') {
        regulations.push('HIPAA (Health Insurance Portability and Accountability Act)');
      }
      if (entity.industry === 'FINANCIAL_SERVICES') {
        regulations.push('SOX (Sarbanes-Oxley)', 'GLBA', 'Dodd-Frank');
      }
      if (task.affectsPersonalData) {
        regulations.push('FTC Act (Consumer Privacy)');
      }
      break;
    case 'UK':
      regulations.push('UK GDPR');
      if (entity.industry === 'FINANCIAL_SERVICES') {
        regulations.push('FCA Handbook');
      }
      break;
    case 'CANADA':
      regulations.push('PIPEDA (Personal Information Protection)');
      if (entity.industry === 'HEALTHCARE') {
        regulations.push('Provincial Health Privacy Laws');
      }
      break;
    case 'US_STATE':
    case 'APAC':
    case 'MULTI_JURISDICTIONAL':
    case 'UNKNOWN':
      break;
    default: {
      const unhandled: never = jurisdiction;
      log.warn('Unhandled jurisdiction in regulation catalog', { jurisdiction: unhandled });
    }
  }

  return regulations;
}

export class JurisdictionAnalyzer {
  /**
   * Worst-case jurisdiction risk: every matching rule contributes a candidate
   * score and the highest candidate wins. Reasoning keeps emission order.
   */
  analyzeJurisdictionRisk(entity: EntityContext, task: TaskContext): ScoredReasoning {
    const reasoning: string[] = [];
    const candidates: number[] = [];

    if (entity.jurisdictions.length === 0) {
      reasoning.push('No jurisdiction specified - assuming moderate risk');
      return { score: NO_JURISDICTION_RISK, reasoning };
    }

    if (entity.jurisdictions.length > 1) {
      reasoning.push(
        `Multi-jurisdictional scope (${entity.jurisdictions.length} jurisdictions) increases regulatory complexity`,
      );
      candidates.push(MULTI_JURISDICTION_RISK);
    }

    const industryRisks = INDUSTRY_JURISDICTION_RISK[entity.industry];

    for (const jurisdiction of entity.jurisdictions) {
      candidates.push(JURISDICTION_COMPLEXITY[jurisdiction]);

      const note = jurisdictionNote(jurisdiction);
      if (note) reasoning.push(note);

      const industryRisk = industryRisks[jurisdiction];
      if (industryRisk !== undefined) {
        candidates.push(industryRisk);
        reasoning.push(`${entity.industry} in ${jurisdiction}: Heightened regulatory scrutiny`);
      }
    }

    if (task.involvesCrossBorder) {
      candidates.push(CROSS_BORDER_RISK);
      if (entity.jurisdictions.includes('EU')) {
        reasoning.push(
          'Cross-border data transfer with EU: Schrems II compliance and adequacy decisions required',
        );
      } else {
        reasoning.push('Cross-border data transfer: Additional compliance requirements');
      }
    }

    const score = Math.max(...candidates);

    log.debug('Jurisdiction risk analyzed', {
      jurisdictions: entity.jurisdictions,
      candidates: candidates.length,
      score,
    });

    return { score, reasoning };
  }

  /** Ordered catalog lookup; duplicates across jurisdictions are kept. */
  identifyApplicableRegulations(entity: EntityContext, task: TaskContext): string[] {
    return entity.jurisdictions.flatMap((jurisdiction) => regulationsFor(jurisdiction, entity, task));
  }
}
