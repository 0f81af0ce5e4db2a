/** Keys are namespaced per operation and per API credential. */
export interface IdempotencyScope {
  operation: string;
  credentialId: string;
}

/** The first response produced for a key, replayed verbatim on retries. */
export interface StoredResponse<TBody> {
  fingerprint: string;
  resourceId: string;
  statusCode: number;
  body: TBody;
  createdAt: string;
}

export type IdempotencyLookup<TBody> =
  | { outcome: "absent" }
  | { outcome: "replay"; response: StoredResponse<TBody> }
  | { outcome: "fingerprint_mismatch"; resourceId: string };

export interface IdempotencyStorePort<TBody> {
  /** Expired entries read as absent. */
  lookup(scope: IdempotencyScope, key: string, fingerprint: string): Promise<IdempotencyLookup<TBody>>;
  remember(scope: IdempotencyScope, key: string, response: StoredResponse<TBody>): Promise<void>;
  withKeyLock<TOutput>(scope: IdempotencyScope, key: string, operation: () => Promise<TOutput>): Promise<TOutput>;
  /** Returns how many entries were removed. */
  purgeExpired(): Promise<number>;
}

export function classifyStoredResponse<TBody>(
  stored: StoredResponse<TBody> | undefined,
  fingerprint: string,
): IdempotencyLookup<TBody> {
  if (!stored) {
    return { outcome: "absent" };
  }
  if (stored.fingerprint !== fingerprint) {
    return { outcome: "fingerprint_mismatch", resourceId: stored.resourceId };
  }
  return { outcome: "replay", response: stored };
}
