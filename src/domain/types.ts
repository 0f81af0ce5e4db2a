export type PaymentMethodType = "card" | "bank_reference" | "wallet";

export type PaymentStatus =
  | "created"
  | "requires_action"
  | "processing"
  | "succeeded"
  | "failed"
  | "canceled";

export type FailureReason =
  | "risk_blocked"
  | "action_failed"
  | "action_timeout"
  | "processing_timeout"
  | "settlement_declined"
  | "settlement_timeout"
  | "settlement_unavailable";

export type RiskDecision = "allow" | "challenge" | "block";

/** Issuer's answer to "does this card take part in 3-D Secure". */
export type ThreeDSecureSupport = "required" | "optional" | "not_supported";

export interface CardDetails {
  brand: string;
  last4: string;
  exp_month: number;
  exp_year: number;
  country: string;
  three_d_secure: ThreeDSecureSupport;
}

export interface BankReferenceDetails {
  bank_name: string;
  last4: string;
  country: string;
}

export interface WalletDetails {
  provider: string;
  country: string;
}

export interface PaymentMethodRecord {
  id: string;
  type: PaymentMethodType;
  token: string;
  fingerprint: string;
  card: CardDetails | null;
  bank_reference: BankReferenceDetails | null;
  wallet: WalletDetails | null;
  created_at: string;
}

export interface RiskAssessmentSnapshot {
  score: number;
  decision: RiskDecision;
  triggered_rules: string[];
  assessed_at: string;
}

export interface ChallengeDescriptor {
  type: "three_d_secure_redirect";
  challenge_token: string;
  redirect_url: string;
  expires_at: string;
}

export type ActionChallengeStatus = "pending" | "consumed" | "superseded" | "expired";

export interface ActionChallengeRecord {
  token_hash: string;
  payment_intent_id: string;
  status: ActionChallengeStatus;
  issued_at: string;
  expires_at: string;
  resolved_at: string | null;
}

export interface PaymentIntentRecord {
  id: string;
  amount: number;
  currency: string;
  status: PaymentStatus;
  payment_method_id: string | null;
  risk_assessment: RiskAssessmentSnapshot;
  idempotency_key: string | null;
  metadata: Record<string, string>;
  version: number;
  failure_reason: FailureReason | null;
  next_action: ChallengeDescriptor | null;
  settlement_reference: string | null;
  credential_id: string;
  created_at: string;
  updated_at: string;
  status_changed_at: string;
}

export interface PaymentIntentResponse {
  id: string;
  object: "payment_intent";
  amount: number;
  currency: string;
  status: PaymentStatus;
  payment_method: string | null;
  risk_assessment: RiskAssessmentSnapshot;
  metadata: Record<string, string>;
  version: number;
  failure_reason: FailureReason | null;
  next_action: ChallengeDescriptor | null;
  settlement_reference: string | null;
  created_at: string;
  updated_at: string;
}

export interface PaymentMethodResponse {
  id: string;
  object: "payment_method";
  type: PaymentMethodType;
  fingerprint: string;
  card: CardDetails | null;
  bank_reference: BankReferenceDetails | null;
  wallet: WalletDetails | null;
  created_at: string;
}

export interface CreatePaymentMethodInput {
  type: PaymentMethodType;
  token: string;
  fingerprint?: string;
  card?: CardDetails;
  bank_reference?: BankReferenceDetails;
  wallet?: WalletDetails;
}

export interface CreatePaymentIntentInput {
  amount: number;
  currency: string;
  payment_method?: string;
  metadata?: Record<string, string>;
}

export interface ConfirmPaymentIntentInput {
  expected_version: number;
  payment_method?: string;
}

export interface CancelPaymentIntentInput {
  expected_version: number;
}

export interface ActionResultInput {
  challenge_token: string;
  outcome: "succeeded" | "failed";
}

/** Who is calling and from where; feeds per-credential thresholds and geo rules. */
export interface RequestContext {
  credentialId: string;
  ipCountry?: string;
}

export type LifecycleEventType = `payment_intent.${PaymentStatus}`;

export interface LifecycleEvent {
  id: string;
  type: LifecycleEventType;
  payment_intent_id: string;
  sequence: number;
  status: PaymentStatus;
  api_version: string;
  source: string;
  event_version: string;
  occurred_at: string;
  data: {
    object: PaymentIntentResponse;
    previous_status: PaymentStatus | null;
  };
}

export interface WebhookEndpointRecord {
  id: string;
  url: string;
  events: LifecycleEventType[];
  secret: string;
  enabled: boolean;
  created_at: string;
}

export type WebhookEndpointResponse = Omit<WebhookEndpointRecord, "secret">;

export type WebhookDeliveryStatus = "pending" | "attempting" | "delivered" | "exhausted";

export interface WebhookAttemptRecord {
  attempt: number;
  outcome: "delivered" | "failed";
  status_code: number | null;
  error_code: string | null;
  started_at: string;
  duration_ms: number;
}

export interface WebhookDeliveryRecord {
  id: string;
  event_id: string;
  event_type: LifecycleEventType;
  payment_intent_id: string;
  endpoint_id: string;
  endpoint_url: string;
  status: WebhookDeliveryStatus;
  attempt_count: number;
  max_attempts: number;
  next_attempt_at: string | null;
  last_attempt_at: string | null;
  last_response_status: number | null;
  last_error_code: string | null;
  delivered_at: string | null;
  exhausted_at: string | null;
  expires_at: string | null;
  created_at: string;
  updated_at: string;
  attempts: WebhookAttemptRecord[];
  event: LifecycleEvent;
}

export type WebhookDeliveryResponse = Omit<WebhookDeliveryRecord, "event">;

/** Score cut-offs: score >= block blocks, score >= challenge challenges, otherwise allow. */
export interface RiskThresholds {
  challenge: number;
  block: number;
}
