import type {
  ActionChallengeRecord,
  LifecycleEvent,
  PaymentIntentRecord,
  PaymentMethodRecord,
} from "../../domain/types.js";
import type {
  IntentCommit,
  OverdueIntentQuery,
  PaymentIntentListInput,
  PaymentRepositoryPort,
} from "../../ports/payment-repository.js";
import type { Page } from "../../ports/pagination.js";
import { ConflictError } from "../../infra/app-error.js";
import { isWithinRange, newestFirst, paginateById } from "./paginate.js";

export class InMemoryPaymentRepository implements PaymentRepositoryPort {
  private readonly paymentMethods = new Map<string, PaymentMethodRecord>();
  private readonly paymentIntents = new Map<string, PaymentIntentRecord>();
  private readonly eventsByIntent = new Map<string, LifecycleEvent[]>();
  private readonly challenges = new Map<string, ActionChallengeRecord>();

  async savePaymentMethod(method: PaymentMethodRecord): Promise<void> {
    this.paymentMethods.set(method.id, method);
  }

  async getPaymentMethodById(id: string): Promise<PaymentMethodRecord | null> {
    return this.paymentMethods.get(id) ?? null;
  }

  // Synchronous body: the check and the writes cannot interleave with another commit.
  async commitIntent(commit: IntentCommit): Promise<void> {
    const { intent, expectedVersion, event } = commit;
    const current = this.paymentIntents.get(intent.id);

    if (expectedVersion === null) {
      if (current) {
        throw new ConflictError("payment_intent_exists", `Payment intent '${intent.id}' already exists.`);
      }
    } else if (!current || current.version !== expectedVersion) {
      throw new ConflictError("version_conflict", "Payment intent was modified concurrently.", {
        expected_version: expectedVersion,
        current_version: current?.version ?? null,
      });
    }

    const events = this.eventsByIntent.get(intent.id) ?? [];
    const lastSequence = events.at(-1)?.sequence ?? 0;
    if (event.sequence !== lastSequence + 1) {
      throw new ConflictError("event_sequence_conflict", "Lifecycle event sequence is out of order.", {
        expected_sequence: lastSequence + 1,
        sequence: event.sequence,
      });
    }

    this.paymentIntents.set(intent.id, intent);
    this.eventsByIntent.set(intent.id, [...events, event]);
    for (const challenge of commit.challenges ?? []) {
      this.challenges.set(challenge.token_hash, challenge);
    }
  }

  async getPaymentIntentById(id: string): Promise<PaymentIntentRecord | null> {
    return this.paymentIntents.get(id) ?? null;
  }

  async listPaymentIntents(input: PaymentIntentListInput): Promise<Page<PaymentIntentRecord>> {
    const items = [...this.paymentIntents.values()]
      .filter((intent) => {
        if (input.status && intent.status !== input.status) {
          return false;
        }
        if (input.currency && intent.currency !== input.currency) {
          return false;
        }
        return isWithinRange(intent.created_at, input.createdFrom, input.createdTo);
      })
      .sort(newestFirst);
    return paginateById(items, input);
  }

  async listOverdueIntents(query: OverdueIntentQuery): Promise<PaymentIntentRecord[]> {
    const overdue: PaymentIntentRecord[] = [];
    for (const intent of this.paymentIntents.values()) {
      if (overdue.length >= query.limit) {
        break;
      }
      if (intent.status === "processing" && intent.status_changed_at <= query.processingStartedBefore) {
        overdue.push(intent);
      } else if (
        intent.status === "requires_action"
        && intent.next_action
        && intent.next_action.expires_at <= query.actionExpiresBefore
      ) {
        overdue.push(intent);
      }
    }
    return overdue;
  }

  async listIntentEvents(paymentIntentId: string): Promise<LifecycleEvent[]> {
    return [...(this.eventsByIntent.get(paymentIntentId) ?? [])];
  }

  async getActionChallenge(tokenHash: string): Promise<ActionChallengeRecord | null> {
    return this.challenges.get(tokenHash) ?? null;
  }
}
