import type { Credential } from '../models/credential';

/**
 * Durable shadow of the live credential. `load` resolves `null` when nothing
 * usable is stored, including when the stored data is corrupt.
 */
export interface TokenStore {
  load(): Promise<Credential | null>;
  save(credential: Credential): Promise<void>;
  clear(): Promise<void>;
  describe(): string;
}
