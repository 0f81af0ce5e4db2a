import type { WebhookSendInput, WebhookSendResult, WebhookSenderPort } from "../../ports/webhook-sender.js";

type ScriptedResponse = WebhookSendResult | ((input: WebhookSendInput) => Promise<WebhookSendResult>);

/**
 * Records every request and answers from a per-URL script; once a script runs
 * out the fallback answer (200 by default) is used.
 */
export class InMemoryWebhookSender implements WebhookSenderPort {
  readonly requests: WebhookSendInput[] = [];
  private readonly scripts = new Map<string, ScriptedResponse[]>();

  constructor(private readonly fallback: WebhookSendResult = { outcome: "accepted", statusCode: 200 }) {}

  script(url: string, ...responses: ScriptedResponse[]): this {
    this.scripts.set(url, [...(this.scripts.get(url) ?? []), ...responses]);
    return this;
  }

  requestsFor(url: string): WebhookSendInput[] {
    return this.requests.filter((request) => request.url === url);
  }

  async send(input: WebhookSendInput): Promise<WebhookSendResult> {
    this.requests.push(input);
    const next = this.scripts.get(input.url)?.shift();
    if (next === undefined) {
      return this.fallback;
    }
    return typeof next === "function" ? next(input) : next;
  }
}
