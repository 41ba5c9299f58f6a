import type { IdentityMapping, Timestamp, Token } from '@carechain/protocol';

/**
 * Input for registering a new identity mapping.
 */
export type CreateIdentityMappingInput = {
  mapping: IdentityMapping;

  /**
   * Every key hash derived from the identity attributes.
   * Must include `mapping.patientKeyHash`.
   */
  keyHashes: string[];
};

/**
 * Input for registering further key hashes against an existing mapping.
 */
export type AddIdentityKeysInput = {
  token: Token;
  keyHashes: string[];

  /** Re-encrypted identity, including the attributes the new keys were derived from */
  identityBlob: string;
};

/**
 * Repository interface for the identity-bearing store.
 *
 * Only the tokenization service holds an instance of this repository.
 * Mappings are never deleted; deactivation flips `active` instead.
 */
export interface IdentityRepository {
  /**
   * Distinct tokens registered against any of the given key hashes,
   * sorted ascending. More than one entry means the identity is ambiguous.
   */
  findTokensByKeyHashes(keyHashes: string[]): Promise<Token[]>;

  /**
   * Key hashes registered against a token, sorted ascending.
   */
  getKeyHashes(token: Token): Promise<string[]>;

  /**
   * Get a mapping by token
   * @returns IdentityMapping or null if not found
   */
  getByToken(token: Token): Promise<IdentityMapping | null>;

  /**
   * Persist a mapping together with its key hashes, atomically.
   *
   * @throws UniqueConstraintError when the token or any key hash is already registered
   */
  create(input: CreateIdentityMappingInput): Promise<IdentityMapping>;

  /**
   * Register more key hashes for a token and replace its identity blob,
   * atomically. Hashes already registered to the same token are skipped.
   *
   * @returns the updated mapping, or null if the token is unknown
   * @throws UniqueConstraintError when a key hash belongs to another token
   */
  addKeys(input: AddIdentityKeysInput): Promise<IdentityMapping | null>;

  /**
   * Mark a mapping inactive. Already-inactive mappings are returned unchanged.
   * @returns the mapping, or null if the token is unknown
   */
  deactivate(token: Token, at: Timestamp): Promise<IdentityMapping | null>;
}
