import type { AgentAnalysisRecord, AnalysisFilter, Id, Token } from '@carechain/protocol';

/**
 * Repository interface for the processing store.
 *
 * Agent analysis records are an append-only ledger: written once,
 * never updated or deleted. The store admits no identity-bearing field.
 */
export interface AnalysisRepository {
  /**
   * Append a record.
   *
   * Idempotent by `analysisId`: appending a record that is already stored
   * returns the stored copy. A different record under an existing id is a
   * UniqueConstraintError.
   *
   * When `parentAnalysisId` is set the parent must exist, share the
   * record's `caseSession` and have a strictly earlier `createdAt`.
   *
   * @throws AcyclicityViolation when the parent link is invalid; nothing is written
   * @throws StoreUnavailableError on transient store failure
   */
  append(record: AgentAnalysisRecord): Promise<AgentAnalysisRecord>;

  /**
   * Get a record by id
   * @returns the record or null if not found
   */
  get(analysisId: Id): Promise<AgentAnalysisRecord | null>;

  /**
   * All records of a case session, ordered by createdAt then analysisId.
   */
  getBySession(caseSession: string): Promise<AgentAnalysisRecord[]>;

  /**
   * Records matching the filter, ordered by createdAt then analysisId.
   */
  query(filter: AnalysisFilter): Promise<AgentAnalysisRecord[]>;

  /**
   * Distinct case sessions recorded for a token, ordered by first appearance.
   */
  listSessionsForToken(token: Token): Promise<string[]>;
}
