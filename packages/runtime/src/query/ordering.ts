// Pure helpers over analysis records. No store access here.

import type { AgentAnalysisRecord, JsonObject } from '@carechain/protocol';
import { compareRecords } from '@carechain/repositories';

/**
 * Order records so every parent precedes its children (Kahn's algorithm).
 * Among records that are ready at the same time, earlier createdAt and then
 * lower analysisId go first. A parent outside the given set counts as absent.
 */
export function topologicalOrder(records: readonly AgentAnalysisRecord[]): AgentAnalysisRecord[] {
  const byId = new Map(records.map((record) => [record.analysisId, record]));
  const children = new Map<string, AgentAnalysisRecord[]>();
  const ready: AgentAnalysisRecord[] = [];

  for (const record of records) {
    const parentId = record.parentAnalysisId;
    if (parentId !== undefined && parentId !== record.analysisId && byId.has(parentId)) {
      const siblings = children.get(parentId) ?? [];
      siblings.push(record);
      children.set(parentId, siblings);
    } else {
      ready.push(record);
    }
  }

  const ordered: AgentAnalysisRecord[] = [];
  while (ready.length > 0) {
    ready.sort(compareRecords);
    const next = ready.shift();
    if (next === undefined) break;
    ordered.push(next);
    ready.push(...(children.get(next.analysisId) ?? []));
  }
  return ordered;
}

/** Mean of the values, null for none */
export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function averageConfidence(record: AgentAnalysisRecord): number | null {
  return mean(Object.values(record.confidenceScores));
}

const SUMMARY_FIELDS = [
  'primary_diagnosis',
  'risk_level',
  'confidence',
  'recommendation',
  'status',
  'grade',
];

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * One-line summary of an output snapshot for decision flows.
 */
export function summarizeOutput(output: JsonObject): string {
  const keys = Object.keys(output);
  if (keys.length === 0) return 'No output data';

  const field = SUMMARY_FIELDS.find((name) => name in output) ?? keys[0];
  return `${field}: ${formatValue(output[field])}`;
}
