/**
 * Risk Factor Model
 *
 * Six independently scored [0,1] dimensions combined with fixed weights:
 * - Jurisdiction complexity: 15%
 * - Entity risk profile: 15%
 * - Task complexity: 20%
 * - Data sensitivity: 20%
 * - Regulatory oversight: 20%
 * - Impact severity: 10%
 *
 * The overall score is the exact weighted sum and maps to a risk level with
 * fixed cut-offs (LOW < 0.35 <= MEDIUM < 0.65 <= HIGH).
 */
import {
  FACTOR_TIER_THRESHOLDS,
  RISK_FACTOR_LABELS,
  RISK_FACTOR_WEIGHTS,
  RISK_THRESHOLDS,
} from '../config/constants.js';
import { ConfigurationError, ValidationError } from '../utils/errors.js';
import { RISK_FACTOR_KEYS } from '../types/index.js';
import type {
  FactorContribution,
  RiskAssessment,
  RiskFactorKey,
  RiskFactorScores,
  RiskLevel,
} from '../types/index.js';

const FACTOR_DESCRIPTIONS: Record<RiskFactorKey, Record<RiskLevel, string>> = {
  jurisdictionRisk: {
    HIGH: 'Multi-regulatory framework or complex jurisdiction requirements',
    MEDIUM: 'Moderate regulatory complexity',
    LOW: 'Standard jurisdiction requirements',
  },
  entityRisk: {
    HIGH: 'High-risk entity type, industry, or violation history',
    MEDIUM: 'Moderate entity risk factors',
    LOW: 'Low-risk entity profile',
  },
  taskRisk: {
    HIGH: 'Complex task category (e.g. regulatory filing, incident response)',
    MEDIUM: 'Moderate task complexity',
    LOW: 'Simple task category (e.g. general inquiry)',
  },
  dataSensitivityRisk: {
    HIGH: 'Involves personal data, financial data, or sensitive information',
    MEDIUM: 'Some sensitive data involved',
    LOW: 'No sensitive data indicated',
  },
  regulatoryRisk: {
    HIGH: 'Multiple regulations apply, directly regulated entity, or filing required',
    MEDIUM: 'Some regulatory requirements apply',
    LOW: 'Minimal regulatory compliance risk',
  },
  impactRisk: {
    HIGH: 'High stakeholder impact or severe consequences',
    MEDIUM: 'Moderate impact potential',
    LOW: 'Low impact scenario',
  },
};

export function assertModelConfiguration(
  weights: Readonly<Record<RiskFactorKey, number>> = RISK_FACTOR_WEIGHTS,
  thresholds: { low: number; medium: number } = RISK_THRESHOLDS,
): void {
  for (const key of RISK_FACTOR_KEYS) {
    const weight = weights[key];
    if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
      throw new ConfigurationError({
        message: `Weight for ${key} must be within [0, 1], got ${weight}`,
        setting: `weights.${key}`,
      });
    }
  }

  const total = RISK_FACTOR_KEYS.reduce((sum, key) => sum + weights[key], 0);
  if (Math.abs(total - 1) > 1e-9) {
    throw new ConfigurationError({
      message: `Risk factor weights must sum to 1.0, got ${total}`,
      setting: 'weights',
    });
  }

  for (const [name, value] of Object.entries(thresholds)) {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new ConfigurationError({
        message: `Threshold ${name} must be within [0, 1], got ${value}`,
        setting: `thresholds.${name}`,
      });
    }
  }

  if (thresholds.low >= thresholds.medium) {
    throw new ConfigurationError({
      message: `LOW threshold (${thresholds.low}) must be below MEDIUM threshold (${thresholds.medium})`,
      setting: 'thresholds',
    });
  }
}

// Fail fast on a bad constant table
assertModelConfiguration();

export function classifyScore(score: number): RiskLevel {
  if (score < RISK_THRESHOLDS.low) return 'LOW';
  if (score < RISK_THRESHOLDS.medium) return 'MEDIUM';
  return 'HIGH';
}

export function factorTier(score: number): RiskLevel {
  if (score >= FACTOR_TIER_THRESHOLDS.high) return 'HIGH';
  if (score >= FACTOR_TIER_THRESHOLDS.medium) return 'MEDIUM';
  return 'LOW';
}

export function mapFactors<T>(fn: (key: RiskFactorKey) => T): Record<RiskFactorKey, T> {
  return {
    jurisdictionRisk: fn('jurisdictionRisk'),
    entityRisk: fn('entityRisk'),
    taskRisk: fn('taskRisk'),
    dataSensitivityRisk: fn('dataSensitivityRisk'),
    regulatoryRisk: fn('regulatoryRisk'),
    impactRisk: fn('impactRisk'),
  };
}

export function formatWeight(key: RiskFactorKey): string {
  return `${Math.round(RISK_FACTOR_WEIGHTS[key] * 100)}%`;
}

export class RiskFactorModel {
  private readonly scores: RiskFactorScores;

  constructor(scores: RiskFactorScores) {
    for (const key of RISK_FACTOR_KEYS) {
      const value = scores[key];
      if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
        throw new ValidationError({
          message: `${key} must be a number within [0, 1], got ${String(value)}`,
          field: key,
        });
      }
    }
    this.scores = { ...scores };
  }

  get factors(): RiskFactorScores {
    return { ...this.scores };
  }

  overallScore(): number {
    return (
      this.scores.jurisdictionRisk * RISK_FACTOR_WEIGHTS.jurisdictionRisk +
      this.scores.entityRisk * RISK_FACTOR_WEIGHTS.entityRisk +
      this.scores.taskRisk * RISK_FACTOR_WEIGHTS.taskRisk +
      this.scores.dataSensitivityRisk * RISK_FACTOR_WEIGHTS.dataSensitivityRisk +
      this.scores.regulatoryRisk * RISK_FACTOR_WEIGHTS.regulatoryRisk +
      this.scores.impactRisk * RISK_FACTOR_WEIGHTS.impactRisk
    );
  }

  classify(): RiskLevel {
    return classifyScore(this.overallScore());
  }

  breakdown(): Record<RiskFactorKey, FactorContribution> {
    return mapFactors((key) => ({
      score: this.scores[key],
      weight: RISK_FACTOR_WEIGHTS[key],
      weightedContribution: this.scores[key] * RISK_FACTOR_WEIGHTS[key],
    }));
  }

  rationale(): string[] {
    const lines = RISK_FACTOR_KEYS.map((key) => {
      const value = this.scores[key];
      const tier = factorTier(value);
      const contribution = value * RISK_FACTOR_WEIGHTS[key];
      return (
        `${RISK_FACTOR_LABELS[key]} (${formatWeight(key)}): ${tier} (${value.toFixed(2)}, ` +
        `contributes ${contribution.toFixed(3)}) - ${FACTOR_DESCRIPTIONS[key][tier]}`
      );
    });

    const overall = this.overallScore();
    const expression = RISK_FACTOR_KEYS
      .map((key) => `(${this.scores[key].toFixed(2)} x ${RISK_FACTOR_WEIGHTS[key].toFixed(2)})`)
      .join(' + ');

    lines.push(`Overall risk score: ${overall.toFixed(3)} (${this.classify()})`);
    lines.push(`Weighted calculation: ${expression} = ${overall.toFixed(3)}`);
    return lines;
  }
}

export function assessRisk(scores: RiskFactorScores): RiskAssessment {
  const model = new RiskFactorModel(scores);
  return {
    score: model.overallScore(),
    classification: model.classify(),
    rationale: model.rationale(),
    factors: model.breakdown(),
  };
}
