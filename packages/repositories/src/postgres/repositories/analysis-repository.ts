import { and, asc, eq, gte, lte, sql } from 'drizzle-orm';
import type { Database } from '../db.js';
import { agentAnalyses } from '../schema/index.js';
import { withStoreErrors } from '../errors.js';
import { UniqueConstraintError } from '../../errors.js';
import { assertValidParent, isSameRecord } from '../../records.js';
import type { AnalysisRepository } from '../../interfaces/index.js';
import type { AgentAnalysisRecord, AnalysisFilter, Id, Token } from '@carechain/protocol';

const STORE = 'processing';

export class PgAnalysisRepository implements AnalysisRepository {
  constructor(private db: Database) {}

  async append(record: AgentAnalysisRecord): Promise<AgentAnalysisRecord> {
    return withStoreErrors(STORE, () =>
      this.db.transaction(async (tx) => {
        const [existing] = await tx
          .select()
          .from(agentAnalyses)
          .where(eq(agentAnalyses.analysisId, record.analysisId));

        if (existing) {
          const stored = this.rowToRecord(existing);
          if (isSameRecord(stored, record)) return stored;
          throw new UniqueConstraintError('agent_analyses_pkey');
        }

        let parent: AgentAnalysisRecord | null = null;
        if (record.parentAnalysisId !== undefined) {
          const [parentRow] = await tx
            .select()
            .from(agentAnalyses)
            .where(eq(agentAnalyses.analysisId, record.parentAnalysisId));
          parent = parentRow ? this.rowToRecord(parentRow) : null;
        }
        assertValidParent(record, parent);

        const [row] = await tx
          .insert(agentAnalyses)
          .values({
            analysisId: record.analysisId,
            token: record.token,
            caseSession: record.caseSession,
            agentType: record.agentType,
            status: record.status,
            parentAnalysisId: record.parentAnalysisId ?? null,
            inputSnapshot: record.inputSnapshot,
            outputSnapshot: record.outputSnapshot,
            confidenceScores: record.confidenceScores,
            evidenceReferences: record.evidenceReferences,
            escalationTriggers: record.escalationTriggers,
            processingTimeMs: record.processingTimeMs,
            createdAt: new Date(record.createdAt),
          })
          .returning();

        return this.rowToRecord(row);
      })
    );
  }

  async get(analysisId: Id): Promise<AgentAnalysisRecord | null> {
    const [row] = await withStoreErrors(STORE, async () =>
      this.db.select().from(agentAnalyses).where(eq(agentAnalyses.analysisId, analysisId))
    );

    return row ? this.rowToRecord(row) : null;
  }

  async getBySession(caseSession: string): Promise<AgentAnalysisRecord[]> {
    return this.query({ caseSession });
  }

  async query(filter: AnalysisFilter): Promise<AgentAnalysisRecord[]> {
    const conditions = [];

    if (filter.caseSession) {
      conditions.push(eq(agentAnalyses.caseSession, filter.caseSession));
    }
    if (filter.token) {
      conditions.push(eq(agentAnalyses.token, filter.token));
    }
    if (filter.agentType) {
      conditions.push(eq(agentAnalyses.agentType, filter.agentType));
    }
    if (filter.timeRange?.start) {
      conditions.push(gte(agentAnalyses.createdAt, new Date(filter.timeRange.start)));
    }
    if (filter.timeRange?.end) {
      conditions.push(lte(agentAnalyses.createdAt, new Date(filter.timeRange.end)));
    }

    let query = this.db
      .select()
      .from(agentAnalyses)
      .where(and(...conditions))
      .orderBy(asc(agentAnalyses.createdAt), asc(agentAnalyses.analysisId))
      .$dynamic();

    if (filter.limit) {
      query = query.limit(filter.limit);
    }
    if (filter.offset) {
      query = query.offset(filter.offset);
    }

    const rows = await withStoreErrors(STORE, async () => query);
    return rows.map((r) => this.rowToRecord(r));
  }

  async listSessionsForToken(token: Token): Promise<string[]> {
    const firstSeen = sql<Date>`min(${agentAnalyses.createdAt})`;

    const rows = await withStoreErrors(STORE, async () =>
      this.db
        .select({ caseSession: agentAnalyses.caseSession, firstSeen })
        .from(agentAnalyses)
        .where(eq(agentAnalyses.token, token))
        .groupBy(agentAnalyses.caseSession)
        .orderBy(firstSeen, asc(agentAnalyses.caseSession))
    );

    return rows.map((r) => r.caseSession);
  }

  private rowToRecord(row: typeof agentAnalyses.$inferSelect): AgentAnalysisRecord {
    return {
      analysisId: row.analysisId,
      agentType: row.agentType,
      token: row.token,
      caseSession: row.caseSession,
      status: row.status,
      inputSnapshot: row.inputSnapshot,
      outputSnapshot: row.outputSnapshot,
      confidenceScores: row.confidenceScores,
      evidenceReferences: row.evidenceReferences,
      escalationTriggers: row.escalationTriggers,
      parentAnalysisId: row.parentAnalysisId ?? undefined,
      processingTimeMs: row.processingTimeMs,
      createdAt: row.createdAt.toISOString(),
    };
  }
}
