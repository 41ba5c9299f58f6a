import { pgTable, text, timestamp, integer, json, index } from 'drizzle-orm/pg-core';
import type { AnalysisStatus, ConfidenceScores, JsonObject } from '@carechain/protocol';

/**
 * Agent analyses - the append-only decision ledger.
 *
 * Design notes:
 * - Keyed by token only; there is no identity-bearing column
 * - Snapshots use `json`, not `jsonb`, so stored text comes back unchanged
 * - Parent linkage is checked on write; there is no self-referencing FK
 */
export const agentAnalyses = pgTable(
  'agent_analyses',
  {
    analysisId: text('analysis_id').primaryKey(),
    token: text('token').notNull(),
    caseSession: text('case_session').notNull(),
    agentType: text('agent_type').notNull(),
    status: text('status').$type<AnalysisStatus>().notNull(),
    parentAnalysisId: text('parent_analysis_id'),
    inputSnapshot: json('input_snapshot').$type<JsonObject>().notNull(),
    outputSnapshot: json('output_snapshot').$type<JsonObject>().notNull(),
    confidenceScores: json('confidence_scores').$type<ConfidenceScores>().notNull(),
    evidenceReferences: json('evidence_references').$type<string[]>().notNull(),
    escalationTriggers: json('escalation_triggers').$type<string[]>().notNull(),
    processingTimeMs: integer('processing_time_ms').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
  },
  (table) => [
    index('agent_analyses_case_session_idx').on(table.caseSession, table.createdAt),
    index('agent_analyses_token_idx').on(table.token),
    index('agent_analyses_agent_type_created_idx').on(table.agentType, table.createdAt),
    index('agent_analyses_parent_idx').on(table.parentAnalysisId),
  ]
);
