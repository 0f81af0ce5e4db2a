import type { Pool, PoolClient } from "pg";
import type {
  ActionChallengeRecord,
  ActionChallengeStatus,
  BankReferenceDetails,
  CardDetails,
  ChallengeDescriptor,
  FailureReason,
  LifecycleEvent,
  PaymentIntentRecord,
  PaymentMethodRecord,
  PaymentMethodType,
  PaymentStatus,
  RiskAssessmentSnapshot,
  WalletDetails,
} from "../../domain/types.js";
import { AppError, ConflictError, ValidationError } from "../../infra/app-error.js";
import type {
  IntentCommit,
  OverdueIntentQuery,
  PaymentIntentListInput,
  PaymentRepositoryPort,
} from "../../ports/payment-repository.js";
import type { Page } from "../../ports/pagination.js";

interface PaymentIntentRow {
  id: string;
  amount: unknown;
  currency: string;
  status: PaymentStatus;
  payment_method_id: string | null;
  risk_assessment: RiskAssessmentSnapshot;
  idempotency_key: string | null;
  metadata: Record<string, string>;
  version: unknown;
  failure_reason: FailureReason | null;
  next_action: ChallengeDescriptor | null;
  settlement_reference: string | null;
  credential_id: string;
  created_at: unknown;
  updated_at: unknown;
  status_changed_at: unknown;
}

const PAYMENT_INTENT_COLUMNS = `
  id,
  amount,
  currency,
  status,
  payment_method_id,
  risk_assessment,
  idempotency_key,
  metadata,
  version,
  failure_reason,
  next_action,
  settlement_reference,
  credential_id,
  created_at,
  updated_at,
  status_changed_at
`;

function mapTimestamp(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

function toNumber(value: unknown, field: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new AppError(500, "persistence_mapping_error", `Unable to map numeric field '${field}'.`);
  }
  return parsed;
}

function mapPaymentIntent(row: PaymentIntentRow): PaymentIntentRecord {
  return {
    id: row.id,
    amount: toNumber(row.amount, "amount"),
    currency: row.currency,
    status: row.status,
    payment_method_id: row.payment_method_id,
    risk_assessment: row.risk_assessment,
    idempotency_key: row.idempotency_key,
    metadata: row.metadata,
    version: toNumber(row.version, "version"),
    failure_reason: row.failure_reason,
    next_action: row.next_action,
    settlement_reference: row.settlement_reference,
    credential_id: row.credential_id,
    created_at: mapTimestamp(row.created_at),
    updated_at: mapTimestamp(row.updated_at),
    status_changed_at: mapTimestamp(row.status_changed_at),
  };
}

function intentValues(intent: PaymentIntentRecord): unknown[] {
  return [
    intent.id,
    intent.amount,
    intent.currency,
    intent.status,
    intent.payment_method_id,
    JSON.stringify(intent.risk_assessment),
    intent.idempotency_key,
    JSON.stringify(intent.metadata),
    intent.version,
    intent.failure_reason,
    intent.next_action ? JSON.stringify(intent.next_action) : null,
    intent.settlement_reference,
    intent.credential_id,
    intent.created_at,
    intent.updated_at,
    intent.status_changed_at,
  ];
}

export class PostgresPaymentRepository implements PaymentRepositoryPort {
  constructor(private readonly pool: Pool) {}

  async savePaymentMethod(method: PaymentMethodRecord): Promise<void> {
    await this.pool.query(
      `
        INSERT INTO pie_payment_methods (
          id,
          type,
          token,
          fingerprint,
          card,
          bank_reference,
          wallet,
          created_at
        )
        VALUES ($1, $2, $3, $4, $5::jsonb, $6::jsonb, $7::jsonb, $8::timestamptz)
        ON CONFLICT (id) DO NOTHING
      `,
      [
        method.id,
        method.type,
        method.token,
        method.fingerprint,
        method.card ? JSON.stringify(method.card) : null,
        method.bank_reference ? JSON.stringify(method.bank_reference) : null,
        method.wallet ? JSON.stringify(method.wallet) : null,
        method.created_at,
      ],
    );
  }

  async getPaymentMethodById(id: string): Promise<PaymentMethodRecord | null> {
    const result = await this.pool.query<{
      id: string;
      type: PaymentMethodType;
      token: string;
      fingerprint: string;
      card: CardDetails | null;
      bank_reference: BankReferenceDetails | null;
      wallet: WalletDetails | null;
      created_at: unknown;
    }>(
      `
        SELECT id, type, token, fingerprint, card, bank_reference, wallet, created_at
        FROM pie_payment_methods
        WHERE id = $1
      `,
      [id],
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }

    return {
      id: row.id,
      type: row.type,
      token: row.token,
      fingerprint: row.fingerprint,
      card: row.card,
      bank_reference: row.bank_reference,
      wallet: row.wallet,
      created_at: mapTimestamp(row.created_at),
    };
  }

  async commitIntent(commit: IntentCommit): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      await this.writeIntent(client, commit);
      await this.appendEvent(client, commit.event);
      for (const challenge of commit.challenges ?? []) {
        await this.upsertChallenge(client, challenge);
      }
      await client.query("COMMIT");
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async getPaymentIntentById(id: string): Promise<PaymentIntentRecord | null> {
    const result = await this.pool.query<PaymentIntentRow>(
      `
        SELECT ${PAYMENT_INTENT_COLUMNS}
        FROM pie_payment_intents
        WHERE id = $1
      `,
      [id],
    );
    const row = result.rows[0];
    return row ? mapPaymentIntent(row) : null;
  }

  async listPaymentIntents(input: PaymentIntentListInput): Promise<Page<PaymentIntentRecord>> {
    const conditions: string[] = [];
    const values: unknown[] = [];
    let index = 1;

    if (input.status) {
      conditions.push(`status = $${index}`);
      values.push(input.status);
      index += 1;
    }
    if (input.currency) {
      conditions.push(`currency = $${index}`);
      values.push(input.currency);
      index += 1;
    }
    if (input.createdFrom) {
      conditions.push(`created_at >= $${index}::timestamptz`);
      values.push(input.createdFrom);
      index += 1;
    }
    if (input.createdTo) {
      conditions.push(`created_at <= $${index}::timestamptz`);
      values.push(input.createdTo);
      index += 1;
    }
    if (input.cursor) {
      const anchor = await this.pool.query(`SELECT 1 FROM pie_payment_intents WHERE id = $1`, [input.cursor]);
      if (anchor.rowCount === 0) {
        throw new ValidationError("invalid_cursor", "cursor not found for current collection.");
      }
      conditions.push(
        `(created_at, id) < (SELECT created_at, id FROM pie_payment_intents WHERE id = $${index})`,
      );
      values.push(input.cursor);
      index += 1;
    }

    const limit = Math.max(1, input.limit);
    values.push(limit + 1);
    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const result = await this.pool.query<PaymentIntentRow>(
      `
        SELECT ${PAYMENT_INTENT_COLUMNS}
        FROM pie_payment_intents
        ${whereClause}
        ORDER BY created_at DESC, id DESC
        LIMIT $${index}
      `,
      values,
    );

    const rows = result.rows.map(mapPaymentIntent);
    const data = rows.slice(0, limit);
    const hasMore = rows.length > limit;
    const lastItem = data.at(-1);
    return {
      data,
      hasMore,
      ...(hasMore && lastItem ? { nextCursor: lastItem.id } : {}),
    };
  }

  async listOverdueIntents(query: OverdueIntentQuery): Promise<PaymentIntentRecord[]> {
    const result = await this.pool.query<PaymentIntentRow>(
      `
        SELECT ${PAYMENT_INTENT_COLUMNS}
        FROM pie_payment_intents
        WHERE (status = 'processing' AND status_changed_at <= $1::timestamptz)
           OR (status = 'requires_action' AND action_expires_at <= $2::timestamptz)
        ORDER BY status_changed_at ASC
        LIMIT $3
      `,
      [query.processingStartedBefore, query.actionExpiresBefore, query.limit],
    );
    return result.rows.map(mapPaymentIntent);
  }

  async listIntentEvents(paymentIntentId: string): Promise<LifecycleEvent[]> {
    const result = await this.pool.query<{ payload: LifecycleEvent }>(
      `
        SELECT payload
        FROM pie_intent_events
        WHERE payment_intent_id = $1
        ORDER BY sequence ASC
      `,
      [paymentIntentId],
    );
    return result.rows.map((row) => row.payload);
  }

  async getActionChallenge(tokenHash: string): Promise<ActionChallengeRecord | null> {
    const result = await this.pool.query<{
      token_hash: string;
      payment_intent_id: string;
      status: ActionChallengeStatus;
      issued_at: unknown;
      expires_at: unknown;
      resolved_at: unknown;
    }>(
      `
        SELECT token_hash, payment_intent_id, status, issued_at, expires_at, resolved_at
        FROM pie_action_challenges
        WHERE token_hash = $1
      `,
      [tokenHash],
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }

    return {
      token_hash: row.token_hash,
      payment_intent_id: row.payment_intent_id,
      status: row.status,
      issued_at: mapTimestamp(row.issued_at),
      expires_at: mapTimestamp(row.expires_at),
      resolved_at: row.resolved_at === null ? null : mapTimestamp(row.resolved_at),
    };
  }

  private async writeIntent(client: PoolClient, commit: IntentCommit): Promise<void> {
    const { intent, expectedVersion } = commit;
    const actionExpiresAt = intent.next_action?.expires_at ?? null;

    if (expectedVersion === null) {
      const inserted = await client.query(
        `
          INSERT INTO pie_payment_intents (${PAYMENT_INTENT_COLUMNS}, action_expires_at)
          VALUES (
            $1, $2, $3, $4, $5, $6::jsonb, $7, $8::jsonb, $9, $10, $11::jsonb, $12, $13,
            $14::timestamptz, $15::timestamptz, $16::timestamptz, $17::timestamptz
          )
          ON CONFLICT (id) DO NOTHING
        `,
        [...intentValues(intent), actionExpiresAt],
      );
      if (inserted.rowCount === 0) {
        throw new ConflictError("payment_intent_exists", `Payment intent '${intent.id}' already exists.`);
      }
      return;
    }

    const updated = await client.query(
      `
        UPDATE pie_payment_intents
        SET amount = $2,
            currency = $3,
            status = $4,
            payment_method_id = $5,
            risk_assessment = $6::jsonb,
            idempotency_key = $7,
            metadata = $8::jsonb,
            version = $9,
            failure_reason = $10,
            next_action = $11::jsonb,
            settlement_reference = $12,
            credential_id = $13,
            created_at = $14::timestamptz,
            updated_at = $15::timestamptz,
            status_changed_at = $16::timestamptz,
            action_expires_at = $17::timestamptz
        WHERE id = $1
          AND version = $18
      `,
      [...intentValues(intent), actionExpiresAt, expectedVersion],
    );
    if (updated.rowCount === 0) {
      const current = await client.query<{ version: unknown }>(
        `SELECT version FROM pie_payment_intents WHERE id = $1`,
        [intent.id],
      );
      const currentRow = current.rows[0];
      throw new ConflictError("version_conflict", "Payment intent was modified concurrently.", {
        expected_version: expectedVersion,
        current_version: currentRow ? toNumber(currentRow.version, "version") : null,
      });
    }
  }

  private async appendEvent(client: PoolClient, event: LifecycleEvent): Promise<void> {
    const last = await client.query<{ sequence: unknown }>(
      `
        SELECT COALESCE(MAX(sequence), 0) AS sequence
        FROM pie_intent_events
        WHERE payment_intent_id = $1
      `,
      [event.payment_intent_id],
    );
    const lastSequence = toNumber(last.rows[0]?.sequence ?? 0, "sequence");
    if (event.sequence !== lastSequence + 1) {
      throw new ConflictError("event_sequence_conflict", "Lifecycle event sequence is out of order.", {
        expected_sequence: lastSequence + 1,
        sequence: event.sequence,
      });
    }

    await client.query(
      `
        INSERT INTO pie_intent_events (
          id,
          payment_intent_id,
          sequence,
          type,
          occurred_at,
          payload
        )
        VALUES ($1, $2, $3, $4, $5::timestamptz, $6::jsonb)
      `,
      [event.id, event.payment_intent_id, event.sequence, event.type, event.occurred_at, JSON.stringify(event)],
    );
  }

  private async upsertChallenge(client: PoolClient, challenge: ActionChallengeRecord): Promise<void> {
    await client.query(
      `
        INSERT INTO pie_action_challenges (
          token_hash,
          payment_intent_id,
          status,
          issued_at,
          expires_at,
          resolved_at
        )
        VALUES ($1, $2, $3, $4::timestamptz, $5::timestamptz, $6::timestamptz)
        ON CONFLICT (token_hash) DO UPDATE
        SET status = EXCLUDED.status,
            resolved_at = EXCLUDED.resolved_at
      `,
      [
        challenge.token_hash,
        challenge.payment_intent_id,
        challenge.status,
        challenge.issued_at,
        challenge.expires_at,
        challenge.resolved_at,
      ],
    );
  }
}
