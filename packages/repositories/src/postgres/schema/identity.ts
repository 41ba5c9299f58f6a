import { pgTable, text, timestamp, boolean, jsonb, index } from 'drizzle-orm/pg-core';
import type { CallerDomain, TokenizationOperation } from '@carechain/protocol';

/**
 * Identity mappings - the only table holding (encrypted) real identity.
 *
 * Design notes:
 * - Never deleted; deactivation sets `active = false`
 * - `identity_blob` is the AES-256-GCM envelope, never plaintext
 */
export const identityMappings = pgTable('identity_mappings', {
  patientKeyHash: text('patient_key_hash').primaryKey(),
  token: text('token').notNull().unique('identity_mappings_token_unique'),
  identityBlob: text('identity_blob').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
  active: boolean('active').notNull().default(true),
  deactivatedAt: timestamp('deactivated_at', { withTimezone: true }),
});

/**
 * Every key hash derived for an identity, pointing at its token.
 * The primary key is the race guard for concurrent tokenization.
 */
export const identityKeys = pgTable(
  'identity_keys',
  {
    keyHash: text('key_hash').primaryKey(),
    token: text('token')
      .notNull()
      .references(() => identityMappings.token),
  },
  (table) => [index('identity_keys_token_idx').on(table.token)]
);

/**
 * Append-only audit log of tokenization calls.
 * Holds tokens at most; never attributes or key hashes.
 */
export const tokenizationAudit = pgTable(
  'tokenization_audit',
  {
    id: text('id').primaryKey(),
    timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
    operation: text('operation').$type<TokenizationOperation>().notNull(),
    callerId: text('caller_id').notNull(),
    callerDomain: text('caller_domain').$type<CallerDomain>().notNull(),
    purpose: text('purpose').notNull(),
    token: text('token'),
    success: boolean('success').notNull(),
    errorCode: text('error_code'),
    details: jsonb('details').$type<Record<string, unknown>>().notNull(),
  },
  (table) => [
    index('tokenization_audit_token_idx').on(table.token),
    index('tokenization_audit_timestamp_idx').on(table.timestamp),
    index('tokenization_audit_caller_idx').on(table.callerId),
  ]
);
