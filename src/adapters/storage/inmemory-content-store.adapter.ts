// =============================================================================
// InMemoryContentStore — Process-local ContentStorePort for tests and dev
// =============================================================================

import { randomUUID } from "node:crypto";
import type { ContentStorePort } from "../../ports/content-store.port.js";
import { NotFoundError, type StorageError } from "../../errors.js";
import { fail, ok, type Result } from "../../result.js";
import type { StoredContent } from "../../types.js";

export interface InMemoryContentStoreOptions {
  /** Clock used for createdAt (default: wall clock) */
  now?: () => Date;
  /** Token generator (default: crypto.randomUUID) */
  generateToken?: () => string;
}

export class InMemoryContentStore implements ContentStorePort {
  private readonly entries = new Map<string, StoredContent>();
  private readonly now: () => Date;
  private readonly generateToken: () => string;

  constructor(options: InMemoryContentStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateToken = options.generateToken ?? randomUUID;
  }

  async initialize(): Promise<void> {}

  async insert(text: string): Promise<Result<string, StorageError>> {
    let token = this.generateToken();
    while (this.entries.has(token)) token = this.generateToken();
    this.entries.set(token, { token, text, createdAt: this.now() });
    return ok(token);
  }

  async get(token: string): Promise<Result<StoredContent, NotFoundError | StorageError>> {
    const entry = this.entries.get(token);
    if (!entry) return fail(new NotFoundError(token));
    return ok({ ...entry, createdAt: new Date(entry.createdAt) });
  }

  async purgeOlderThan(cutoff: Date): Promise<Result<number, StorageError>> {
    let deleted = 0;
    for (const [token, entry] of this.entries) {
      if (entry.createdAt.getTime() < cutoff.getTime()) {
        this.entries.delete(token);
        deleted++;
      }
    }
    return ok(deleted);
  }

  size(): number {
    return this.entries.size;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}
