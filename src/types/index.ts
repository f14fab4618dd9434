import type { EntityContext, TaskContext } from '../schemas/context.schema.js';

export type { EntityContext, TaskContext };

// ─── Closed enums ─────────────────────────────────────────────
export const JURISDICTIONS = [
  'US_FEDERAL',
  'US_STATE',
  'EU',
  'UK',
  'APAC',
  'CANADA',
  'MULTI_JURISDICTIONAL',
  'UNKNOWN',
] as const;
export type Jurisdiction = (typeof JURISDICTIONS)[number];

export const ENTITY_TYPES = [
  'PUBLIC_COMPANY',
  'PRIVATE_COMPANY',
  'STARTUP',
  'NONPROFIT',
  'GOVERNMENT',
  'HEALTHCARE',
  'FINANCIAL_INSTITUTION',
  'UNKNOWN',
] as const;
export type EntityType = (typeof ENTITY_TYPES)[number];

export const INDUSTRY_CATEGORIES = [
  'HEALTHCARE',
  'FINANCIAL_SERVICES',
  'TECHNOLOGY',
  'RETAIL',
  'MANUFACTURING',
  'EDUCATION',
  'GOVERNMENT',
  'OTHER',
] as const;
export type IndustryCategory = (typeof INDUSTRY_CATEGORIES)[number];

export const TASK_CATEGORIES = [
  'DATA_PRIVACY',
  'FINANCIAL_REPORTING',
  'SECURITY_AUDIT',
  'POLICY_REVIEW',
  'REGULATORY_FILING',
  'CONTRACT_REVIEW',
  'INCIDENT_RESPONSE',
  'RISK_ASSESSMENT',
  'GENERAL_INQUIRY',
] as const;
export type TaskCategory = (typeof TASK_CATEGORIES)[number];

export const RISK_LEVELS = ['LOW', 'MEDIUM', 'HIGH'] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export const ACTION_DECISIONS = ['AUTONOMOUS', 'REVIEW_REQUIRED', 'ESCALATE'] as const;
export type ActionDecision = (typeof ACTION_DECISIONS)[number];

// ─── Risk Factors ─────────────────────────────────────────────
export const RISK_FACTOR_KEYS = [
  'jurisdictionRisk',
  'entityRisk',
  'taskRisk',
  'dataSensitivityRisk',
  'regulatoryRisk',
  'impactRisk',
] as const;
export type RiskFactorKey = (typeof RISK_FACTOR_KEYS)[number];

export type RiskFactorScores = Record<RiskFactorKey, number>;

export interface FactorContribution {
  score: number;
  weight: number;
  weightedContribution: number;
}

export interface RiskAssessment {
  score: number;
  classification: RiskLevel;
  rationale: string[];
  factors: Record<RiskFactorKey, FactorContribution>;
}

/** A derived score together with the lines that explain it. */
export interface ScoredReasoning {
  score: number;
  reasoning: string[];
}

// ─── Decision Analysis ────────────────────────────────────────
export interface DecisionAnalysis {
  entityContext: EntityContext;
  taskContext: TaskContext;
  riskFactors: RiskFactorScores;
  overallScore: number;
  riskLevel: RiskLevel;
  decision: ActionDecision;
  confidence: number; // 0-1
  reasoning: string[];
  recommendations: string[];
  escalationReason?: string;
  similarCases?: DecisionRecord[];
  patternAnalysis?: string;
  suggestions?: Suggestion[];
  timestamp: Date;
}

export interface DecisionOutcome {
  decision: ActionDecision;
  reasoning: string[];
}

// ─── Historical Records ───────────────────────────────────────
export interface DecisionRecord {
  timestamp: Date;
  entityName: string;
  taskCategory: TaskCategory;
  decision: ActionDecision;
  riskLevel: RiskLevel;
  riskScore: number | null;
  confidenceScore: number | null;
  taskDescription: string;
  jurisdictions: string[];
  metadata: Record<string, unknown>;
}

/** Supplies the records of one entity; scoping is the provider's job. */
export interface DecisionRecordProvider {
  listRecords(entityName: string): readonly DecisionRecord[];
}

// ─── Proactive Suggestions ────────────────────────────────────
export type TriggerName =
  | 'deadlines'
  | 'risk_trends'
  | 'violations'
  | 'multiple_incidents'
  | 'regulatory_patterns';

export type SuggestionPriority = 'high' | 'medium' | 'low';

export interface Suggestion {
  trigger: TriggerName;
  triggerType: string;
  priority: SuggestionPriority;
  title: string;
  message: string;
  suggestion: string;
  action: string;
  actionLabel: string | null;
  metadata: Record<string, string | number | null>;
}

export interface TriggerOptions {
  taskCategory?: TaskCategory;
  now?: Date;
}

// ─── Pattern Analysis ─────────────────────────────────────────
export interface PatternStatistics {
  totalCases: number;
  autonomousPct: number;
  reviewPct: number;
  escalatePct: number;
  avgConfidence: number;
}

export interface PatternAnalysis {
  similarCases: DecisionRecord[];
  patternAnalysis: string;
  statistics: PatternStatistics;
}

// ─── What-If Analysis ─────────────────────────────────────────
export type WhatIfChanges = Partial<RiskFactorScores> & {
  entity?: EntityContext;
  task?: TaskContext;
};

export interface FactorDelta {
  baseline: number;
  modified: number;
  delta: number;
  weight: number;
  weightedDelta: number;
}

export type ChangeSeverity = 'none' | 'low' | 'medium' | 'high';

export interface DecisionChange {
  changed: boolean;
  levelChanged: boolean;
  baselineDecision: ActionDecision;
  newDecision: ActionDecision;
  baselineLevel: RiskLevel;
  newLevel: RiskLevel;
  impact: string;
  severity: ChangeSeverity;
}

export interface WhatIfResult {
  changedInput: string[];
  baselineScore: number;
  newScore: number;
  scoreDelta: number;
  baselineLevel: RiskLevel;
  newLevel: RiskLevel;
  baselineDecision: ActionDecision;
  newDecision: ActionDecision;
  factorDeltas: Record<RiskFactorKey, FactorDelta>;
  modifiedFactors: RiskFactorScores;
  explanation: string[];
  decisionChange: DecisionChange;
}

export interface ScenarioSummary {
  scenarioId: number;
  changes: string[];
  score: number;
  scoreDelta: number;
  level: RiskLevel;
  decision: ActionDecision;
  decisionChanged: boolean;
  explanation: string[];
}

export interface ScenarioComparison {
  baseline: {
    score: number;
    level: RiskLevel;
    decision: ActionDecision;
  };
  scenarios: ScenarioSummary[];
}
