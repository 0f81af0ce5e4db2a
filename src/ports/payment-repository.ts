import type {
  ActionChallengeRecord,
  LifecycleEvent,
  PaymentIntentRecord,
  PaymentMethodRecord,
  PaymentStatus,
} from "../domain/types.js";
import type { Page, PageRequest } from "./pagination.js";

export interface PaymentIntentListInput extends PageRequest {
  status?: PaymentStatus;
  currency?: string;
  createdFrom?: string;
  createdTo?: string;
}

export interface OverdueIntentQuery {
  processingStartedBefore: string;
  actionExpiresBefore: string;
  limit: number;
}

/**
 * One atomic unit of the state machine: the intent write, its lifecycle event
 * and any challenge bookkeeping succeed or fail together.
 */
export interface IntentCommit {
  intent: PaymentIntentRecord;
  /** null when the intent is being inserted. */
  expectedVersion: number | null;
  event: LifecycleEvent;
  challenges?: ActionChallengeRecord[];
}

export interface PaymentRepositoryPort {
  savePaymentMethod(method: PaymentMethodRecord): Promise<void>;
  getPaymentMethodById(id: string): Promise<PaymentMethodRecord | null>;
  /** Throws ConflictError when the stored version differs from `expectedVersion`. */
  commitIntent(commit: IntentCommit): Promise<void>;
  getPaymentIntentById(id: string): Promise<PaymentIntentRecord | null>;
  listPaymentIntents(input: PaymentIntentListInput): Promise<Page<PaymentIntentRecord>>;
  listOverdueIntents(query: OverdueIntentQuery): Promise<PaymentIntentRecord[]>;
  listIntentEvents(paymentIntentId: string): Promise<LifecycleEvent[]>;
  getActionChallenge(tokenHash: string): Promise<ActionChallengeRecord | null>;
}
