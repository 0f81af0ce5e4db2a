import type { Pool } from "pg";
import {
  classifyStoredResponse,
  type IdempotencyLookup,
  type IdempotencyScope,
  type IdempotencyStorePort,
  type StoredResponse,
} from "../../ports/idempotency-store.js";
import { SystemClock, type ClockPort } from "../../infra/clock.js";

interface StoredRow<TBody> {
  fingerprint: string;
  resource_id: string;
  status_code: number;
  response_body: TBody;
  created_at: Date | string;
}

/** Idempotency keys in `pie_idempotency_keys`; expiry follows the injected clock. */
export class PostgresIdempotencyStore<TBody> implements IdempotencyStorePort<TBody> {
  private readonly clock: ClockPort;
  private readonly ttlSeconds: number;

  constructor(
    private readonly pool: Pool,
    options: { ttlSeconds: number; clock?: ClockPort },
  ) {
    this.ttlSeconds = options.ttlSeconds;
    this.clock = options.clock ?? new SystemClock();
  }

  async lookup(scope: IdempotencyScope, key: string, fingerprint: string): Promise<IdempotencyLookup<TBody>> {
    const { rows } = await this.pool.query<StoredRow<TBody>>(
      `SELECT fingerprint, resource_id, status_code, response_body, created_at
         FROM pie_idempotency_keys
        WHERE operation = $1 AND credential_id = $2 AND idempotency_key = $3
          AND expires_at > $4::timestamptz`,
      [scope.operation, scope.credentialId, key, this.clock.nowIso()],
    );
    const row = rows[0];
    return classifyStoredResponse(
      row && {
        fingerprint: row.fingerprint,
        resourceId: row.resource_id,
        statusCode: row.status_code,
        body: row.response_body,
        createdAt: row.created_at instanceof Date ? row.created_at.toISOString() : row.created_at,
      },
      fingerprint,
    );
  }

  async remember(scope: IdempotencyScope, key: string, response: StoredResponse<TBody>): Promise<void> {
    // A lingering expired row is overwritten; a live one is left alone.
    await this.pool.query(
      `INSERT INTO pie_idempotency_keys AS k (
         operation, credential_id, idempotency_key, fingerprint, resource_id,
         status_code, response_body, created_at, expires_at
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8::timestamptz,
               $8::timestamptz + make_interval(secs => $9))
       ON CONFLICT (operation, credential_id, idempotency_key) DO UPDATE
         SET fingerprint = EXCLUDED.fingerprint,
             resource_id = EXCLUDED.resource_id,
             status_code = EXCLUDED.status_code,
             response_body = EXCLUDED.response_body,
             created_at = EXCLUDED.created_at,
             expires_at = EXCLUDED.expires_at
         WHERE k.expires_at <= EXCLUDED.created_at`,
      [
        scope.operation,
        scope.credentialId,
        key,
        response.fingerprint,
        response.resourceId,
        response.statusCode,
        JSON.stringify(response.body),
        response.createdAt,
        this.ttlSeconds,
      ],
    );
  }

  async withKeyLock<TOutput>(
    scope: IdempotencyScope,
    key: string,
    operation: () => Promise<TOutput>,
  ): Promise<TOutput> {
    const lockName = JSON.stringify([scope.operation, scope.credentialId, key]);
    // Session-level lock: the operation itself runs on other pool connections.
    const lockClient = await this.pool.connect();
    try {
      await lockClient.query("SELECT pg_advisory_lock(hashtextextended($1, 0))", [lockName]);
      try {
        return await operation();
      } finally {
        await lockClient.query("SELECT pg_advisory_unlock(hashtextextended($1, 0))", [lockName]);
      }
    } finally {
      lockClient.release();
    }
  }

  async purgeExpired(): Promise<number> {
    const result = await this.pool.query(
      "DELETE FROM pie_idempotency_keys WHERE expires_at <= $1::timestamptz",
      [this.clock.nowIso()],
    );
    return result.rowCount ?? 0;
  }
}
