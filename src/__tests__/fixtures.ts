import { parseEntityContext, parseTaskContext } from '../schemas/context.schema.js';
import type { EntityContextInput, TaskContextInput } from '../schemas/context.schema.js';
import type { DecisionRecord, EntityContext, TaskContext } from '../types/index.js';

export const NOW = new Date('2026-06-15T12:00:00.000Z');
const DAY = 24 * 60 * 60 * 1000;

export function daysAgo(days: number): Date {
  return new Date(NOW.getTime() - days * DAY);
}

export function daysFromNow(days: number): Date {
  return new Date(NOW.getTime() + days * DAY);
}

export function entity(overrides: Partial<EntityContextInput> = {}): EntityContext {
  return parseEntityContext({
    name: 'Northwind Software',
    entityType: 'PRIVATE_COMPANY',
    industry: 'TECHNOLOGY',
    jurisdictions: ['US_FEDERAL'],
    hasPersonalData: false,
    ...overrides,
  });
}

export function task(overrides: Partial<TaskContextInput> = {}): TaskContext {
  return parseTaskContext({
    description: 'Answer a question about record retention',
    category: 'GENERAL_INQUIRY',
    ...overrides,
  });
}

export const highRiskEntity = (): EntityContext =>
  entity({
    name: 'Harbor Bank',
    entityType: 'FINANCIAL_INSTITUTION',
    industry: 'FINANCIAL_SERVICES',
    jurisdictions: ['US_FEDERAL', 'EU', 'UK'],
    hasPersonalData: true,
    isRegulated: true,
    previousViolations: 1,
  });

export const incidentTask = (): TaskContext =>
  task({
    description: 'Contain credential leak',
    category: 'INCIDENT_RESPONSE',
    affectsPersonalData: true,
    affectsFinancialData: true,
    potentialImpact: 'Critical',
  });

export const startupWithViolations = (previousViolations = 3): EntityContext =>
  entity({
    name: 'Cautious Startup',
    entityType: 'STARTUP',
    industry: 'OTHER',
    jurisdictions: ['US_STATE'],
    previousViolations,
  });

export function record(overrides: Partial<DecisionRecord> = {}): DecisionRecord {
  return {
    timestamp: daysAgo(1),
    entityName: 'Acme',
    taskCategory: 'DATA_PRIVACY',
    decision: 'REVIEW_REQUIRED',
    riskLevel: 'MEDIUM',
    riskScore: 0.5,
    confidenceScore: 0.8,
    taskDescription: 'Review privacy notice',
    jurisdictions: ['EU'],
    metadata: {},
    ...overrides,
  };
}
