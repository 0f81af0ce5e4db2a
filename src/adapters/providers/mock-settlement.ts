import { randomUUID } from "node:crypto";
import type {
  SettlementGatewayPort,
  SettlementInput,
  SettlementResult,
} from "../../ports/settlement-gateway.js";
import { DownstreamUnavailableError } from "../../infra/app-error.js";

interface MockSettlementOptions {
  name?: string;
  delayMs?: number;
}

function waitFor(delayMs: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error("settlement aborted"));
      return;
    }
    const timer = setTimeout(resolve, delayMs);
    signal.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        reject(new Error("settlement aborted"));
      },
      { once: true },
    );
  });
}

/**
 * Sandbox settlement: the payment method token selects the outcome.
 *   tok_test_decline      declined by the issuer
 *   tok_test_unavailable  transport failure
 *   tok_test_hang         never answers (until aborted)
 * Anything else settles.
 */
export class MockSettlementGateway implements SettlementGatewayPort {
  readonly name: string;
  private readonly delayMs: number;

  constructor(options: MockSettlementOptions = {}) {
    this.name = options.name ?? "mock_settlement";
    this.delayMs = options.delayMs ?? 0;
  }

  async settle(input: SettlementInput, signal: AbortSignal): Promise<SettlementResult> {
    const token = input.paymentMethod.token;
    if (token.includes("tok_test_hang")) {
      await waitFor(2_147_483_647, signal);
    }
    if (this.delayMs > 0) {
      await waitFor(this.delayMs, signal);
    }
    if (token.includes("tok_test_unavailable")) {
      throw new DownstreamUnavailableError(this.name, "connection refused");
    }
    const reference = `${this.name}_${randomUUID()}`;
    if (token.includes("tok_test_decline")) {
      return { ok: false, reference, failureCode: "card_declined" };
    }
    return { ok: true, reference };
  }
}
