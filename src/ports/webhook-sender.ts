/** One signed POST to a subscriber endpoint. */
export interface WebhookSendInput {
  url: string;
  headers: Record<string, string>;
  body: string;
  timeoutMs: number;
}

/**
 * `rejected` means the endpoint answered outside 2xx; `unreachable` means no
 * answer arrived at all (DNS, connect, TLS, timeout).
 */
export type WebhookSendResult =
  | { outcome: "accepted"; statusCode: number }
  | { outcome: "rejected"; statusCode: number }
  | { outcome: "unreachable"; errorCode: string };

/** Never throws for HTTP or network failures; the dispatcher decides on retries. */
export interface WebhookSenderPort {
  send(input: WebhookSendInput): Promise<WebhookSendResult>;
}
