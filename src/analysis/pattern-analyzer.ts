import { createModuleLogger } from '../utils/logger.js';
import type {
  DecisionAnalysis,
  DecisionRecord,
  PatternAnalysis,
  Suggestion,
  TaskCategory,
} from '../types/index.js';

const log = createModuleLogger('patterns');

function pct(count: number, total: number): number {
  return total > 0 ? (count / total) * 100 : 0;
}

/**
 * Summarize how the newest `limit` past decisions for this entity and task
 * category were resolved. Records may come from any source; they are filtered
 * and ordered here.
 */
export function analyzeDecisionPatterns(
  records: readonly DecisionRecord[],
  entityName: string,
  category: TaskCategory,
  limit = 5,
): PatternAnalysis {
  const similarCases = records
    .filter((r) => r.entityName === entityName && r.taskCategory === category)
    .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
    .slice(0, Math.max(limit, 0));

  const total = similarCases.length;
  if (total === 0) {
    return {
      similarCases: [],
      patternAnalysis: `No similar past cases found for ${entityName} (${category}).`,
      statistics: {
        totalCases: 0,
        autonomousPct: 0,
        reviewPct: 0,
        escalatePct: 0,
        avgConfidence: 0,
      },
    };
  }

  const autonomous = similarCases.filter((r) => r.decision === 'AUTONOMOUS').length;
  const review = similarCases.filter((r) => r.decision === 'REVIEW_REQUIRED').length;
  const escalate = similarCases.filter((r) => r.decision === 'ESCALATE').length;
  const avgConfidence = similarCases.reduce((sum, r) => sum + (r.confidenceScore ?? 0), 0) / total;

  const parts: string[] = [];
  if (escalate > 0) {
    parts.push(`escalated ${pct(escalate, total).toFixed(0)}% of the time`);
  }
  if (review > 0) {
    parts.push(`required review ${pct(review, total).toFixed(0)}% of the time`);
  }
  if (autonomous > 0) {
    parts.push(`handled autonomously ${pct(autonomous, total).toFixed(0)}% of the time`);
  }

  const noun = total === 1 ? 'case' : 'cases';
  const patternAnalysis = `Based on ${total} similar past ${noun} for ${entityName}: ${parts.join('. ')}.`;

  log.debug('Decision patterns analyzed', { entity: entityName, category, total });

  return {
    similarCases,
    patternAnalysis,
    statistics: {
      totalCases: total,
      autonomousPct: pct(autonomous, total),
      reviewPct: pct(review, total),
      escalatePct: pct(escalate, total),
      avgConfidence,
    },
  };
}

/** New analysis carrying history context; the input analysis is left as is. */
export function enrichAnalysis(
  analysis: DecisionAnalysis,
  patterns: PatternAnalysis,
  suggestions: Suggestion[] = [],
): DecisionAnalysis {
  return {
    ...analysis,
    similarCases: [...patterns.similarCases],
    patternAnalysis: patterns.patternAnalysis,
    suggestions: [...suggestions],
  };
}
