import { and, asc, eq, gte, lte } from 'drizzle-orm';
import type { Database } from '../db.js';
import { tokenizationAudit } from '../schema/index.js';
import { withStoreErrors } from '../errors.js';
import type {
  TokenizationAuditRepository,
  TokenizationAuditFilter,
} from '../../interfaces/index.js';
import type { TokenizationAuditEntry } from '@carechain/protocol';

const STORE = 'identity';

export class PgTokenizationAuditRepository implements TokenizationAuditRepository {
  constructor(private db: Database) {}

  async append(entry: TokenizationAuditEntry): Promise<void> {
    await withStoreErrors(STORE, () =>
      this.db.insert(tokenizationAudit).values({
        id: entry.id,
        timestamp: new Date(entry.timestamp),
        operation: entry.operation,
        callerId: entry.caller.callerId,
        callerDomain: entry.caller.domain,
        purpose: entry.caller.purpose,
        token: entry.token ?? null,
        success: entry.success,
        errorCode: entry.errorCode ?? null,
        details: entry.details,
      })
    );
  }

  async query(filter: TokenizationAuditFilter): Promise<TokenizationAuditEntry[]> {
    const conditions = [];

    if (filter.token) {
      conditions.push(eq(tokenizationAudit.token, filter.token));
    }
    if (filter.callerId) {
      conditions.push(eq(tokenizationAudit.callerId, filter.callerId));
    }
    if (filter.operation) {
      conditions.push(eq(tokenizationAudit.operation, filter.operation));
    }
    if (filter.success !== undefined) {
      conditions.push(eq(tokenizationAudit.success, filter.success));
    }
    if (filter.since) {
      conditions.push(gte(tokenizationAudit.timestamp, new Date(filter.since)));
    }
    if (filter.until) {
      conditions.push(lte(tokenizationAudit.timestamp, new Date(filter.until)));
    }

    let query = this.db
      .select()
      .from(tokenizationAudit)
      .where(and(...conditions))
      .orderBy(asc(tokenizationAudit.timestamp), asc(tokenizationAudit.id))
      .$dynamic();

    if (filter.limit) {
      query = query.limit(filter.limit);
    }

    const rows = await withStoreErrors(STORE, () => query);
    return rows.map((r) => this.rowToEntry(r));
  }

  private rowToEntry(row: typeof tokenizationAudit.$inferSelect): TokenizationAuditEntry {
    return {
      id: row.id,
      timestamp: row.timestamp.toISOString(),
      operation: row.operation,
      caller: {
        callerId: row.callerId,
        domain: row.callerDomain,
        purpose: row.purpose,
      },
      token: row.token ?? undefined,
      success: row.success,
      errorCode: row.errorCode ?? undefined,
      details: row.details,
    };
  }
}
