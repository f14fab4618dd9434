import type {
  DecisionAnalysis,
  DecisionRecord,
  DecisionRecordProvider,
} from '../types/index.js';

/**
 * Flatten an analysis into the history shape the suggestion detectors and the
 * pattern analyzer read. A task deadline is kept as `regulatory_deadline`.
 */
export function toDecisionRecord(
  analysis: DecisionAnalysis,
  metadata: Record<string, unknown> = {},
): DecisionRecord {
  const deadline = analysis.taskContext.regulatoryDeadline;

  return {
    timestamp: analysis.timestamp,
    entityName: analysis.entityContext.name,
    taskCategory: analysis.taskContext.category,
    decision: analysis.decision,
    riskLevel: analysis.riskLevel,
    riskScore: analysis.overallScore,
    confidenceScore: analysis.confidence,
    taskDescription: analysis.taskContext.description,
    jurisdictions: [...analysis.entityContext.jurisdictions],
    metadata: deadline
      ? { ...metadata, regulatory_deadline: deadline.toISOString() }
      : { ...metadata },
  };
}

export function withMergedMetadata(
  record: DecisionRecord,
  patch: Record<string, unknown>,
): DecisionRecord {
  return {
    ...record,
    jurisdictions: [...record.jurisdictions],
    metadata: { ...record.metadata, ...patch },
  };
}

/** Process-local history, keyed by entity name. */
export class InMemoryDecisionRecordStore implements DecisionRecordProvider {
  private readonly records = new Map<string, DecisionRecord[]>();

  add(record: DecisionRecord): void {
    const list = this.records.get(record.entityName) ?? [];
    list.push(record);
    this.records.set(record.entityName, list);
  }

  listRecords(entityName: string): readonly DecisionRecord[] {
    return [...(this.records.get(entityName) ?? [])];
  }
}
