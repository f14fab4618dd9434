export * from './types/index.js';
export {
  EntityContextSchema,
  TaskContextSchema,
  parseEntityContext,
  parseTaskContext,
  assertKnownEnums,
} from './schemas/context.schema.js';
export type { EntityContextInput, TaskContextInput } from './schemas/context.schema.js';
export { ValidationError, ConfigurationError } from './utils/errors.js';
export { logger, createModuleLogger } from './utils/logger.js';
export { config } from './config/index.js';
export type { AppConfig, LogLevel } from './config/index.js';

export {
  RiskFactorModel,
  assessRisk,
  assertModelConfiguration,
  classifyScore,
} from './risk/risk-factors.js';
export { JurisdictionAnalyzer } from './risk/jurisdiction-analyzer.js';
export { EntityAnalyzer } from './risk/entity-analyzer.js';
export type { EntityCapability } from './risk/entity-analyzer.js';
export { DecisionEngine, isSimpleTask } from './risk/decision-engine.js';
export { WhatIfEngine } from './risk/what-if-engine.js';

export {
  ProactiveSuggestionService,
  formatSuggestionsForDisplay,
} from './analysis/proactive-suggestions.js';
export type { GenerateSuggestionsOptions } from './analysis/proactive-suggestions.js';
export { analyzeDecisionPatterns, enrichAnalysis } from './analysis/pattern-analyzer.js';
export {
  toDecisionRecord,
  withMergedMetadata,
  InMemoryDecisionRecordStore,
} from './analysis/decision-records.js';
