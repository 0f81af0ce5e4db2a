import type { PaymentStatus } from "./types.js";
import { ConflictError } from "../infra/app-error.js";

const ALLOWED_TRANSITIONS: Record<PaymentStatus, readonly PaymentStatus[]> = {
  created: ["requires_action", "processing", "failed", "canceled"],
  // requires_action -> requires_action re-issues the challenge on a repeated confirm.
  requires_action: ["requires_action", "processing", "failed", "canceled"],
  processing: ["succeeded", "failed"],
  succeeded: [],
  failed: [],
  canceled: [],
};

const TERMINAL_STATUSES: ReadonlySet<PaymentStatus> = new Set(["succeeded", "failed", "canceled"]);

export const CONFIRMABLE_STATUSES: ReadonlySet<PaymentStatus> = new Set(["created", "requires_action"]);

export function canTransition(current: PaymentStatus, next: PaymentStatus): boolean {
  return ALLOWED_TRANSITIONS[current].includes(next);
}

export function isTerminalStatus(status: PaymentStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function assertTransition(current: PaymentStatus, next: PaymentStatus): void {
  if (canTransition(current, next)) {
    return;
  }
  throw new ConflictError(
    "invalid_state_transition",
    `Transition from '${current}' to '${next}' is not allowed.`,
    { current_status: current, requested_status: next },
  );
}
