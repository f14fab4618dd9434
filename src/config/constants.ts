import type {
  EntityType,
  IndustryCategory,
  Jurisdiction,
  RiskFactorKey,
  TaskCategory,
} from '../types/index.js';

// ─── Risk Model ──────────────────────────────────────────────
export const RISK_FACTOR_WEIGHTS: Readonly<Record<RiskFactorKey, number>> = {
  jurisdictionRisk: 0.15,
  entityRisk: 0.15,
  taskRisk: 0.20,
  dataSensitivityRisk: 0.20,
  regulatoryRisk: 0.20,
  impactRisk: 0.10,
};

export const RISK_FACTOR_LABELS: Readonly<Record<RiskFactorKey, string>> = {
  jurisdictionRisk: 'Jurisdiction Complexity',
  entityRisk: 'Entity Risk Profile',
  taskRisk: 'Task Complexity',
  dataSensitivityRisk: 'Data Sensitivity',
  regulatoryRisk: 'Regulatory Oversight',
  impactRisk: 'Impact Severity',
};

export const RISK_THRESHOLDS = {
  low: 0.35, // score below = LOW
  medium: 0.65, // score below = MEDIUM, at or above = HIGH
} as const;

// Per-factor label tiers used in rationale text only
export const FACTOR_TIER_THRESHOLDS = {
  high: 0.7,
  medium: 0.4,
} as const;

// ─── Jurisdiction Tables ─────────────────────────────────────
export const JURISDICTION_COMPLEXITY: Readonly<Record<Jurisdiction, number>> = {
  EU: 0.9, // GDPR, member-state variations
  MULTI_JURISDICTIONAL: 0.95,
  US_FEDERAL: 0.7,
  US_STATE: 0.6,
  UK: 0.75,
  CANADA: 0.65,
  APAC: 0.7,
  UNKNOWN: 0.5,
};

export const INDUSTRY_JURISDICTION_RISK: Readonly<
  Record<IndustryCategory, Partial<Record<Jurisdiction, number>>>
> = {
  FINANCIAL_SERVICES: { EU: 0.95, US_FEDERAL: 0.9, UK: 0.85 },
  HEALTHCARE: { US_FEDERAL: 0.95, EU: 0.9, CANADA: 0.85 },
  TECHNOLOGY: { EU: 0.85, MULTI_JURISDICTIONAL: 0.9 },
  RETAIL: {},
  MANUFACTURING: {},
  EDUCATION: {},
  GOVERNMENT: {},
  OTHER: {},
};

export const MULTI_JURISDICTION_RISK = 0.8;
export const CROSS_BORDER_RISK = 0.85;
export const NO_JURISDICTION_RISK = 0.5;

// ─── Entity Tables ───────────────────────────────────────────
export const ENTITY_TYPE_RISK: Readonly<Record<EntityType, number>> = {
  PUBLIC_COMPANY: 0.9,
  FINANCIAL_INSTITUTION: 0.95,
  HEALTHCARE: 0.9,
  GOVERNMENT: 0.85,
  PRIVATE_COMPANY: 0.6,
  NONPROFIT: 0.5,
  STARTUP: 0.4,
  UNKNOWN: 0.6,
};

export const INDUSTRY_RISK: Readonly<Record<IndustryCategory, number>> = {
  FINANCIAL_SERVICES: 0.95,
  HEALTHCARE: 0.9,
  GOVERNMENT: 0.85,
  TECHNOLOGY: 0.7,
  RETAIL: 0.6,
  EDUCATION: 0.65,
  MANUFACTURING: 0.5,
  OTHER: 0.5,
};

export const ENTITY_ADJUSTMENTS = {
  regulated: 0.10,
  perViolation: 0.10,
  maxViolations: 0.30,
  personalDataHandling: 0.05,
  largeWorkforce: 0.05,
  highRevenue: 0.05,
} as const;

export const LARGE_WORKFORCE_EMPLOYEES = 5_000;
export const SMALL_WORKFORCE_EMPLOYEES = 50;
export const HIGH_REVENUE_USD = 1_000_000_000;

// ─── Task Tables ─────────────────────────────────────────────
export const TASK_CATEGORY_RISK: Readonly<Record<TaskCategory, number>> = {
  GENERAL_INQUIRY: 0.1,
  POLICY_REVIEW: 0.4,
  RISK_ASSESSMENT: 0.5,
  DATA_PRIVACY: 0.7,
  CONTRACT_REVIEW: 0.7,
  SECURITY_AUDIT: 0.75,
  FINANCIAL_REPORTING: 0.85,
  REGULATORY_FILING: 0.9,
  INCIDENT_RESPONSE: 0.95,
};

export const TASK_ADJUSTMENTS = {
  deadline: 0.10,
  personalData: 0.05,
  financialData: 0.05,
} as const;

export const DATA_SENSITIVITY = {
  base: 0.2,
  entityHoldsPersonalData: 0.1,
  personalData: 0.3,
  financialData: 0.35,
  combined: 0.15,
} as const;

export const REGULATORY = {
  inquiryBase: 0.2,
  taskBase: 0.4,
  perRegulation: 0.05,
  perExtraJurisdiction: 0.05,
  regulatedEntity: 0.2,
  regulatoryFiling: 0.2,
} as const;

export const IMPACT = {
  severe: 0.9,
  moderate: 0.6,
  standard: 0.3,
  unspecifiedInquiry: 0.2,
  unspecified: 0.4,
} as const;

export const SEVERE_IMPACT_KEYWORDS = ['critical', 'severe', 'major', 'significant', 'high'] as const;
export const MODERATE_IMPACT_KEYWORDS = ['moderate', 'medium'] as const;

// Ordered largest first; the first matching step applies
export const STAKEHOLDER_STEPS: ReadonlyArray<{ min: number; bonus: number }> = [
  { min: 10_000, bonus: 0.2 },
  { min: 1_000, bonus: 0.1 },
  { min: 100, bonus: 0.05 },
];

// ─── Overrides & Confidence ──────────────────────────────────
export const VIOLATION_OVERRIDE_THRESHOLD = 2;
export const VIOLATION_OVERRIDE_ELEVATED_THRESHOLD = 1;

export const CONFIDENCE = {
  simpleTask: 0.90,
  lowFloor: 0.75,
  lowCeiling: 0.90,
  mediumFloor: 0.70,
  mediumCeiling: 0.85,
  highFloor: 0.85,
  highCeiling: 0.90,
} as const;

// ─── Proactive Triggers ──────────────────────────────────────
export const DEADLINE_TRIGGER = {
  lookbackDays: 90,
  criticalWithinDays: 7,
  upcomingFromDays: 8,
  upcomingWithinDays: 30,
  minUpcoming: 3,
} as const;

export const RISK_TREND_TRIGGER = {
  recentDays: 30,
  olderDays: 60,
  minPerWindow: 3,
  risingDelta: 0.15,
  minEscalationRate: 0.5,
  escalationRateGap: 0.2,
} as const;

export const VIOLATION_TRIGGER = {
  lookbackDays: 90,
  minIndicators: 2,
  minHighRiskEscalations: 3,
} as const;

export const INCIDENT_TRIGGER = {
  lookbackDays: 30,
  minIncidents: 2,
  minGroupSize: 2,
  minTotalIncidents: 3,
  descriptionKeyLength: 50,
} as const;

export const REGULATORY_TRIGGER = {
  lookbackDays: 90,
  minFilings: 3,
  minJurisdictionFilings: 3,
} as const;

export const DAY_MS = 24 * 60 * 60 * 1000;
