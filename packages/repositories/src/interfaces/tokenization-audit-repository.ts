import type {
  Timestamp,
  Token,
  TokenizationAuditEntry,
  TokenizationOperation,
} from '@carechain/protocol';

/**
 * Filter for reading the tokenization audit log.
 */
export type TokenizationAuditFilter = {
  token?: Token;
  callerId?: string;
  operation?: TokenizationOperation;
  success?: boolean;
  since?: Timestamp;
  until?: Timestamp;
  limit?: number;
};

/**
 * Append-only audit log of tokenization service calls.
 */
export interface TokenizationAuditRepository {
  append(entry: TokenizationAuditEntry): Promise<void>;

  /**
   * Entries matching the filter, oldest first.
   */
  query(filter: TokenizationAuditFilter): Promise<TokenizationAuditEntry[]>;
}
