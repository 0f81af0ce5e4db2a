import { Agent, request } from "undici";
import type { WebhookSendInput, WebhookSendResult, WebhookSenderPort } from "../../ports/webhook-sender.js";

function errorCodeOf(error: unknown): string {
  if (error instanceof Error) {
    if (error.name === "TimeoutError" || error.name === "AbortError") {
      return "timeout";
    }
    if ("code" in error && typeof error.code === "string") {
      return error.code.toLowerCase();
    }
  }
  return "network_error";
}

/** POSTs webhook payloads through a shared undici connection pool. */
export class HttpWebhookSender implements WebhookSenderPort {
  private readonly agent: Agent;

  constructor(options: { connections?: number } = {}) {
    this.agent = new Agent({
      connections: options.connections ?? 64,
      keepAliveTimeout: 10_000,
    });
  }

  async send(input: WebhookSendInput): Promise<WebhookSendResult> {
    try {
      const response = await request(input.url, {
        method: "POST",
        headers: input.headers,
        body: input.body,
        dispatcher: this.agent,
        headersTimeout: input.timeoutMs,
        bodyTimeout: input.timeoutMs,
        signal: AbortSignal.timeout(input.timeoutMs),
      });
      // Subscribers' response bodies are ignored; drain so the socket is reused.
      await response.body.dump();
      const accepted = response.statusCode >= 200 && response.statusCode < 300;
      return { outcome: accepted ? "accepted" : "rejected", statusCode: response.statusCode };
    } catch (error) {
      return { outcome: "unreachable", errorCode: errorCodeOf(error) };
    }
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}
