// =============================================================================
// ContentStorePort — Token-addressed storage of extracted text
// =============================================================================

import type { NotFoundError, StorageError } from "../errors.js";
import type { Result } from "../result.js";
import type { StoredContent } from "../types.js";

export interface ContentStorePort {
  /** Connect and create the backing table if missing */
  initialize(): Promise<void>;

  /** Persist `text` under a freshly generated token and return the token */
  insert(text: string): Promise<Result<string, StorageError>>;

  /** Exact-match lookup */
  get(token: string): Promise<Result<StoredContent, NotFoundError | StorageError>>;

  /** Delete every entry created strictly before `cutoff`; returns how many went */
  purgeOlderThan(cutoff: Date): Promise<Result<number, StorageError>>;

  /** Release connections */
  close(): Promise<void>;
}
