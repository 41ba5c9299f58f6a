import { and, asc, eq, inArray } from 'drizzle-orm';
import type { Database } from '../db.js';
import { identityKeys, identityMappings } from '../schema/index.js';
import { withStoreErrors } from '../errors.js';
import { UniqueConstraintError } from '../../errors.js';
import type {
  IdentityRepository,
  CreateIdentityMappingInput,
  AddIdentityKeysInput,
} from '../../interfaces/index.js';
import type { IdentityMapping, Timestamp, Token } from '@carechain/protocol';

const STORE = 'identity';

export class PgIdentityRepository implements IdentityRepository {
  constructor(private db: Database) {}

  async findTokensByKeyHashes(keyHashes: string[]): Promise<Token[]> {
    if (keyHashes.length === 0) return [];

    return withStoreErrors(STORE, async () => {
      const rows = await this.db
        .selectDistinct({ token: identityKeys.token })
        .from(identityKeys)
        .where(inArray(identityKeys.keyHash, keyHashes))
        .orderBy(asc(identityKeys.token));

      return rows.map((r) => r.token);
    });
  }

  async getKeyHashes(token: Token): Promise<string[]> {
    return withStoreErrors(STORE, async () => {
      const rows = await this.db
        .select({ keyHash: identityKeys.keyHash })
        .from(identityKeys)
        .where(eq(identityKeys.token, token))
        .orderBy(asc(identityKeys.keyHash));

      return rows.map((r) => r.keyHash);
    });
  }

  async getByToken(token: Token): Promise<IdentityMapping | null> {
    return withStoreErrors(STORE, async () => {
      const [row] = await this.db
        .select()
        .from(identityMappings)
        .where(eq(identityMappings.token, token));

      return row ? this.rowToMapping(row) : null;
    });
  }

  async create(input: CreateIdentityMappingInput): Promise<IdentityMapping> {
    const { mapping } = input;
    const keyHashes = Array.from(new Set([mapping.patientKeyHash, ...input.keyHashes]));

    return withStoreErrors(STORE, () =>
      this.db.transaction(async (tx) => {
        const [row] = await tx
          .insert(identityMappings)
          .values({
            patientKeyHash: mapping.patientKeyHash,
            token: mapping.token,
            identityBlob: mapping.identityBlob,
            createdAt: new Date(mapping.createdAt),
            active: mapping.active,
            deactivatedAt: mapping.deactivatedAt ? new Date(mapping.deactivatedAt) : null,
          })
          .returning();

        await tx
          .insert(identityKeys)
          .values(keyHashes.map((keyHash) => ({ keyHash, token: mapping.token })));

        return this.rowToMapping(row);
      })
    );
  }

  async addKeys(input: AddIdentityKeysInput): Promise<IdentityMapping | null> {
    const keyHashes = Array.from(new Set(input.keyHashes));

    return withStoreErrors(STORE, () =>
      this.db.transaction(async (tx) => {
        const [row] = await tx
          .update(identityMappings)
          .set({ identityBlob: input.identityBlob })
          .where(eq(identityMappings.token, input.token))
          .returning();
        if (!row) return null;

        if (keyHashes.length > 0) {
          await tx
            .insert(identityKeys)
            .values(keyHashes.map((keyHash) => ({ keyHash, token: input.token })))
            .onConflictDoNothing();

          const owners = await tx
            .select({ token: identityKeys.token })
            .from(identityKeys)
            .where(inArray(identityKeys.keyHash, keyHashes));
          if (owners.some((owner) => owner.token !== input.token)) {
            // Rolls the transaction back
            throw new UniqueConstraintError('identity_keys_pkey');
          }
        }

        return this.rowToMapping(row);
      })
    );
  }

  async deactivate(token: Token, at: Timestamp): Promise<IdentityMapping | null> {
    const [row] = await withStoreErrors(STORE, () =>
      this.db
        .update(identityMappings)
        .set({ active: false, deactivatedAt: new Date(at) })
        .where(and(eq(identityMappings.token, token), eq(identityMappings.active, true)))
        .returning()
    );

    // Already inactive or unknown
    return row ? this.rowToMapping(row) : this.getByToken(token);
  }

  private rowToMapping(row: typeof identityMappings.$inferSelect): IdentityMapping {
    return {
      patientKeyHash: row.patientKeyHash,
      token: row.token,
      identityBlob: row.identityBlob,
      createdAt: row.createdAt.toISOString(),
      active: row.active,
      deactivatedAt: row.deactivatedAt?.toISOString(),
    };
  }
}
