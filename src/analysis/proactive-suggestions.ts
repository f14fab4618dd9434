/**
 * Proactive Suggestions
 *
 * Scans an entity's decision history for conditions worth raising before the
 * user asks. Five detectors run independently over the same record set:
 * - Deadlines: regulatory deadlines due soon
 * - Risk trends: rising risk scores or escalation rate
 * - Violations: clusters of high-risk escalations
 * - Multiple incidents: recurring incident-response work
 * - Regulatory patterns: filing-heavy jurisdictions and regulatory changes
 *
 * Detectors never fail for thin history; they simply stay quiet.
 */
import {
  DAY_MS,
  DEADLINE_TRIGGER,
  INCIDENT_TRIGGER,
  REGULATORY_TRIGGER,
  RISK_TREND_TRIGGER,
  VIOLATION_TRIGGER,
} from '../config/constants.js';
import { createModuleLogger } from '../utils/logger.js';
import type {
  DecisionRecord,
  DecisionRecordProvider,
  Suggestion,
  TaskCategory,
  TriggerOptions,
} from '../types/index.js';

const log = createModuleLogger('suggestions');

export interface GenerateSuggestionsOptions extends TriggerOptions {
  hasDeadline?: boolean;
}

// ─── Helpers ─────────────────────────────────────────────────
function since(now: Date, days: number): number {
  return now.getTime() - days * DAY_MS;
}

function average(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function parseDeadline(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'string') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  return null;
}

/** First key with the highest count; ties keep insertion order. */
function busiest<T>(groups: Map<string, T[]>): [string, T[]] | null {
  let best: [string, T[]] | null = null;
  for (const entry of groups) {
    if (best === null || entry[1].length > best[1].length) {
      best = entry;
    }
  }
  return best;
}

export class ProactiveSuggestionService {
  private readonly provider: DecisionRecordProvider;

  constructor(provider: DecisionRecordProvider) {
    this.provider = provider;
  }

  checkTriggers(entityName: string, options: TriggerOptions = {}): Suggestion[] {
    const now = options.now ?? new Date();
    const records = this.loadRecords(entityName);

    const suggestions = [
      ...this.checkDeadlines(records, now, options.taskCategory),
      ...this.checkRiskTrends(records, now, options.taskCategory),
      ...this.checkViolations(records, now),
      ...this.checkMultipleIncidents(records, now, options.taskCategory),
      ...this.checkRegulatoryPatterns(records, now, options.taskCategory),
    ];

    log.debug('Triggers checked', {
      entity: entityName,
      records: records.length,
      fired: suggestions.map((s) => s.triggerType),
    });

    return suggestions;
  }

  /** Trigger-based suggestions plus context from the task in hand. */
  generateSuggestions(entityName: string, options: GenerateSuggestionsOptions = {}): Suggestion[] {
    const suggestions = this.checkTriggers(entityName, options);

    if (options.hasDeadline && !suggestions.some((s) => s.trigger === 'deadlines')) {
      suggestions.push({
        trigger: 'deadlines',
        triggerType: 'deadline_present',
        priority: 'low',
        title: 'Deadline Present',
        message: 'This task has a regulatory deadline.',
        suggestion: 'Ensure adequate time is allocated for review and completion.',
        action: 'none',
        actionLabel: null,
        metadata: {},
      });
    }

    return suggestions;
  }

  // Newest first
  private loadRecords(entityName: string): DecisionRecord[] {
    return this.provider
      .listRecords(entityName)
      .filter((r) => r.entityName === entityName)
      .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  }

  private checkDeadlines(records: DecisionRecord[], now: Date, category?: TaskCategory): Suggestion[] {
    const cutoff = since(now, DEADLINE_TRIGGER.lookbackDays);
    let criticalCount = 0;
    let upcomingCount = 0;

    for (const record of records) {
      if (record.timestamp.getTime() < cutoff) continue;
      if (category && record.taskCategory !== category) continue;

      const raw = record.metadata.deadline || record.metadata.regulatory_deadline;
      if (!raw) continue;

      const deadline = parseDeadline(raw);
      if (!deadline) {
        log.debug('Skipping malformed deadline metadata', {
          entity: record.entityName,
          value: String(raw),
        });
        continue;
      }

      const daysUntil = Math.floor((deadline.getTime() - now.getTime()) / DAY_MS);
      if (daysUntil >= 0 && daysUntil <= DEADLINE_TRIGGER.criticalWithinDays) {
        criticalCount++;
      } else if (
        daysUntil >= DEADLINE_TRIGGER.upcomingFromDays &&
        daysUntil <= DEADLINE_TRIGGER.upcomingWithinDays
      ) {
        upcomingCount++;
      }
    }

    if (criticalCount > 0) {
      return [{
        trigger: 'deadlines',
        triggerType: 'critical_deadline',
        priority: 'high',
        title: 'Critical Deadline Approaching',
        message: `${criticalCount} regulatory deadline(s) due within ${DEADLINE_TRIGGER.criticalWithinDays} days.`,
        suggestion: 'Immediate action required. Review and prioritize these tasks to avoid compliance penalties.',
        action: 'view_deadlines',
        actionLabel: 'View Critical Deadlines →',
        metadata: {
          criticalCount,
          upcomingCount,
          timeframe: '7_days',
        },
      }];
    }

    if (upcomingCount >= DEADLINE_TRIGGER.minUpcoming) {
      return [{
        trigger: 'deadlines',
        triggerType: 'multiple_upcoming',
        priority: 'medium',
        title: 'Multiple Upcoming Deadlines',
        message: `${upcomingCount} deadline(s) approaching within ${DEADLINE_TRIGGER.upcomingWithinDays} days.`,
        suggestion: 'Plan ahead to ensure all deadlines are met. Consider scheduling compliance reviews.',
        action: 'view_calendar',
        actionLabel: 'View Compliance Calendar →',
        metadata: {
          upcomingCount,
          timeframe: '30_days',
        },
      }];
    }

    return [];
  }

  private checkRiskTrends(records: DecisionRecord[], now: Date, category?: TaskCategory): Suggestion[] {
    const recentCutoff = since(now, RISK_TREND_TRIGGER.recentDays);
    const olderCutoff = since(now, RISK_TREND_TRIGGER.olderDays);

    const scored = records.filter(
      (r) => r.riskScore !== null && (!category || r.taskCategory === category),
    );
    const recent = scored.filter((r) => r.timestamp.getTime() >= recentCutoff);
    const older = scored.filter((r) => {
      const t = r.timestamp.getTime();
      return t >= olderCutoff && t < recentCutoff;
    });

    if (recent.length < RISK_TREND_TRIGGER.minPerWindow || older.length < RISK_TREND_TRIGGER.minPerWindow) {
      return [];
    }

    const suggestions: Suggestion[] = [];
    const recentAvg = average(recent.map((r) => r.riskScore ?? 0));
    const olderAvg = average(older.map((r) => r.riskScore ?? 0));
    const riskIncrease = recentAvg - olderAvg;

    const recentEscalations = recent.filter((r) => r.decision === 'ESCALATE').length;
    const olderEscalations = older.filter((r) => r.decision === 'ESCALATE').length;
    const recentRate = recentEscalations / recent.length;
    const olderRate = olderEscalations / older.length;

    if (riskIncrease >= RISK_TREND_TRIGGER.risingDelta) {
      suggestions.push({
        trigger: 'risk_trends',
        triggerType: 'rising_risk',
        priority: 'high',
        title: 'Rising Risk Trend Detected',
        message:
          `Average risk score increased by ${riskIncrease.toFixed(2)} over the last ` +
          `${RISK_TREND_TRIGGER.recentDays} days (${olderAvg.toFixed(2)} → ${recentAvg.toFixed(2)}).`,
        suggestion:
          'Review recent decisions to identify patterns. Consider scheduling a compliance audit to address systemic issues.',
        action: 'view_risk_analysis',
        actionLabel: 'View Risk Analysis →',
        metadata: {
          recentAvgRisk: recentAvg,
          olderAvgRisk: olderAvg,
          riskIncrease,
          recentCount: recent.length,
          olderCount: older.length,
        },
      });
    }

    if (
      recentRate >= RISK_TREND_TRIGGER.minEscalationRate &&
      recentRate > olderRate + RISK_TREND_TRIGGER.escalationRateGap
    ) {
      suggestions.push({
        trigger: 'risk_trends',
        triggerType: 'escalation_trend',
        priority: 'medium',
        title: 'Increasing Escalation Rate',
        message:
          `Escalation rate increased to ${(recentRate * 100).toFixed(0)}% ` +
          `(from ${(olderRate * 100).toFixed(0)}%).`,
        suggestion:
          'More tasks are requiring expert review. Consider training or process improvements to reduce escalation needs.',
        action: 'view_escalation_trends',
        actionLabel: 'View Escalation Trends →',
        metadata: {
          recentEscalationRate: recentRate,
          olderEscalationRate: olderRate,
          recentEscalations,
          totalRecent: recent.length,
        },
      });
    }

    return suggestions;
  }

  // Entity-wide: the category filter does not apply
  private checkViolations(records: DecisionRecord[], now: Date): Suggestion[] {
    const cutoff = since(now, VIOLATION_TRIGGER.lookbackDays);
    const indicators = records.filter(
      (r) => r.timestamp.getTime() >= cutoff && r.riskLevel === 'HIGH' && r.decision === 'ESCALATE',
    );

    if (indicators.length < VIOLATION_TRIGGER.minIndicators) {
      return [];
    }

    const explicit = indicators.filter((r) => r.metadata.violation || r.metadata.compliance_issue);
    const mostRecent = explicit[0];

    if (mostRecent) {
      return [{
        trigger: 'violations',
        triggerType: 'recent_violations',
        priority: 'high',
        title: 'Compliance Violations Detected',
        message: `${explicit.length} compliance violation(s) identified in the last ${VIOLATION_TRIGGER.lookbackDays} days.`,
        suggestion:
          'Immediate action required. Review violation details and implement corrective measures. Consider engaging compliance specialist.',
        action: 'view_violations',
        actionLabel: 'View Violations →',
        metadata: {
          violationCount: explicit.length,
          timeframe: '90_days',
          mostRecent: mostRecent.timestamp.toISOString(),
        },
      }];
    }

    if (indicators.length >= VIOLATION_TRIGGER.minHighRiskEscalations) {
      return [{
        trigger: 'violations',
        triggerType: 'multiple_high_risk',
        priority: 'medium',
        title: 'Multiple High-Risk Escalations',
        message:
          `${indicators.length} high-risk escalations in the last ${VIOLATION_TRIGGER.lookbackDays} days ` +
          'may indicate compliance issues.',
        suggestion:
          'Review escalated cases for patterns. Consider proactive compliance measures to prevent future issues.',
        action: 'view_high_risk_cases',
        actionLabel: 'View High-Risk Cases →',
        metadata: {
          escalationCount: indicators.length,
          timeframe: '90_days',
        },
      }];
    }

    return [];
  }

  private checkMultipleIncidents(
    records: DecisionRecord[],
    now: Date,
    category?: TaskCategory,
  ): Suggestion[] {
    if (category && category !== 'INCIDENT_RESPONSE') {
      return [];
    }

    const cutoff = since(now, INCIDENT_TRIGGER.lookbackDays);
    const incidents = records.filter(
      (r) => r.timestamp.getTime() >= cutoff && r.taskCategory === 'INCIDENT_RESPONSE',
    );

    if (incidents.length < INCIDENT_TRIGGER.minIncidents) {
      return [];
    }

    // Keyed on the first 50 code points, so astral characters are never split
    const groups = new Map<string, DecisionRecord[]>();
    for (const incident of incidents) {
      const key = incident.taskDescription
        ? Array.from(incident.taskDescription).slice(0, INCIDENT_TRIGGER.descriptionKeyLength).join('')
        : 'Unknown';
      const group = groups.get(key) ?? [];
      group.push(incident);
      groups.set(key, group);
    }

    const largest = busiest(groups);
    if (largest && largest[1].length >= INCIDENT_TRIGGER.minGroupSize) {
      const [incidentType, group] = largest;
      return [{
        trigger: 'multiple_incidents',
        triggerType: 'recurring_incidents',
        priority: 'high',
        title: 'Recurring Incidents Detected',
        message:
          `${group.length} similar incident(s) occurred in the last ${INCIDENT_TRIGGER.lookbackDays} days: ` +
          `'${incidentType}...'`,
        suggestion:
          'Recurring incidents indicate systemic issues. Conduct root cause analysis and implement preventive measures.',
        action: 'view_incidents',
        actionLabel: 'View Incident History →',
        metadata: {
          incidentCount: group.length,
          incidentType,
          timeframe: '30_days',
          mostRecent: group[0]?.timestamp.toISOString() ?? null,
        },
      }];
    }

    if (incidents.length >= INCIDENT_TRIGGER.minTotalIncidents) {
      return [{
        trigger: 'multiple_incidents',
        triggerType: 'multiple_incidents',
        priority: 'medium',
        title: 'Multiple Incidents in Short Timeframe',
        message: `${incidents.length} incident response task(s) in the last ${INCIDENT_TRIGGER.lookbackDays} days.`,
        suggestion:
          'High incident frequency may indicate underlying issues. Review incident patterns and strengthen preventive controls.',
        action: 'view_incident_analysis',
        actionLabel: 'View Incident Analysis →',
        metadata: {
          incidentCount: incidents.length,
          timeframe: '30_days',
        },
      }];
    }

    return [];
  }

  private checkRegulatoryPatterns(
    records: DecisionRecord[],
    now: Date,
    category?: TaskCategory,
  ): Suggestion[] {
    if (category && category !== 'REGULATORY_FILING') {
      return [];
    }

    const cutoff = since(now, REGULATORY_TRIGGER.lookbackDays);
    const filings = records.filter(
      (r) => r.timestamp.getTime() >= cutoff && r.taskCategory === 'REGULATORY_FILING',
    );

    if (filings.length < REGULATORY_TRIGGER.minFilings) {
      return [];
    }

    const suggestions: Suggestion[] = [];

    const byJurisdiction = new Map<string, DecisionRecord[]>();
    for (const filing of filings) {
      for (const jurisdiction of filing.jurisdictions) {
        const group = byJurisdiction.get(jurisdiction) ?? [];
        group.push(filing);
        byJurisdiction.set(jurisdiction, group);
      }
    }

    const mostActive = busiest(byJurisdiction);
    if (mostActive && mostActive[1].length >= REGULATORY_TRIGGER.minJurisdictionFilings) {
      const [jurisdiction, group] = mostActive;
      suggestions.push({
        trigger: 'regulatory_patterns',
        triggerType: 'active_jurisdiction',
        priority: 'medium',
        title: 'Active Regulatory Jurisdiction',
        message:
          `${group.length} regulatory filing(s) in ${jurisdiction} in the last ` +
          `${REGULATORY_TRIGGER.lookbackDays} days.`,
        suggestion:
          'High regulatory activity in this jurisdiction. Ensure compliance team is up-to-date with latest requirements.',
        action: 'view_jurisdiction_activity',
        actionLabel: 'View Jurisdiction Activity →',
        metadata: {
          jurisdiction,
          filingCount: group.length,
          totalFilings: filings.length,
          timeframe: '90_days',
        },
      });
    }

    const changes = filings.filter((r) => r.metadata.regulatory_change || r.metadata.new_regulation);
    if (changes.length > 0) {
      suggestions.push({
        trigger: 'regulatory_patterns',
        triggerType: 'regulatory_changes',
        priority: 'high',
        title: 'Regulatory Changes Detected',
        message: `${changes.length} regulatory change(s) affecting your organization.`,
        suggestion:
          'New regulations may require policy updates or process changes. Review changes and update compliance procedures.',
        action: 'view_regulatory_changes',
        actionLabel: 'View Regulatory Changes →',
        metadata: {
          changeCount: changes.length,
          timeframe: '90_days',
        },
      });
    }

    return suggestions;
  }
}

export function formatSuggestionsForDisplay(suggestions: readonly Suggestion[]): string {
  return suggestions.map((s) => `**${s.title}**: ${s.message}`).join('\n\n');
}
