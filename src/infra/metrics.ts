import type { FailureReason, LifecycleEventType, RiskDecision } from "../domain/types.js";

type Labels<TName extends string> = Readonly<Record<TName, string>>;
type LabelPairs = ReadonlyArray<readonly [string, string]>;

function renderLabels(pairs: LabelPairs): string {
  const rendered = pairs.map(
    ([name, value]) => `${name}="${value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"')}"`,
  );
  return rendered.length === 0 ? "" : `{${rendered.join(",")}}`;
}

/** Series are keyed by label values in declaration order. */
abstract class Metric<TName extends string, TState> {
  private readonly series = new Map<string, { labels: LabelPairs; state: TState }>();

  constructor(
    protected readonly name: string,
    private readonly help: string,
    private readonly type: "counter" | "histogram",
    private readonly labelNames: readonly TName[],
  ) {}

  protected seriesFor(labels: Labels<TName>, initial: () => TState): TState {
    const pairs = this.labelNames.map((name): readonly [string, string] => [name, labels[name]]);
    const key = JSON.stringify(pairs);
    let entry = this.series.get(key);
    if (!entry) {
      entry = { labels: pairs, state: initial() };
      this.series.set(key, entry);
    }
    return entry.state;
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} ${this.type}`];
    for (const { labels, state } of this.series.values()) {
      lines.push(...this.renderSeries(labels, state));
    }
    return lines;
  }

  protected abstract renderSeries(labels: LabelPairs, state: TState): string[];
}

class Counter<TName extends string = never> extends Metric<TName, { value: number }> {
  constructor(name: string, help: string, labelNames: readonly TName[] = []) {
    super(name, help, "counter", labelNames);
  }

  inc(labels: Labels<TName>, by = 1): void {
    this.seriesFor(labels, () => ({ value: 0 })).value += by;
  }

  protected renderSeries(labels: LabelPairs, state: { value: number }): string[] {
    return [`${this.name}${renderLabels(labels)} ${state.value}`];
  }
}

interface HistogramState {
  bucketCounts: number[];
  count: number;
  sum: number;
}

class Histogram<TName extends string> extends Metric<TName, HistogramState> {
  constructor(
    name: string,
    help: string,
    labelNames: readonly TName[],
    private readonly upperBounds: readonly number[],
  ) {
    super(name, help, "histogram", labelNames);
  }

  observe(labels: Labels<TName>, value: number): void {
    const state = this.seriesFor(labels, () => ({
      bucketCounts: this.upperBounds.map(() => 0),
      count: 0,
      sum: 0,
    }));
    state.count += 1;
    state.sum += value;
    this.upperBounds.forEach((bound, index) => {
      if (value <= bound) {
        state.bucketCounts[index] = (state.bucketCounts[index] ?? 0) + 1;
      }
    });
  }

  protected renderSeries(labels: LabelPairs, state: HistogramState): string[] {
    const buckets = this.upperBounds.map(
      (bound, index) => `${this.name}_bucket${renderLabels([...labels, ["le", String(bound)]])} ${state.bucketCounts[index] ?? 0}`,
    );
    return [
      ...buckets,
      `${this.name}_bucket${renderLabels([...labels, ["le", "+Inf"]])} ${state.count}`,
      `${this.name}_sum${renderLabels(labels)} ${state.sum}`,
      `${this.name}_count${renderLabels(labels)} ${state.count}`,
    ];
  }
}

const LATENCY_BUCKETS_SECONDS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

/** Process-local Prometheus registry rendered by GET /metrics. */
export class MetricsRegistry {
  private readonly httpRequests = new Counter(
    "pie_http_requests_total",
    "HTTP requests handled, by route, method and status code.",
    ["method", "route", "status_code"],
  );
  private readonly httpDuration = new Histogram(
    "pie_http_request_duration_seconds",
    "HTTP request duration in seconds, by route and method.",
    ["method", "route"],
    LATENCY_BUCKETS_SECONDS,
  );
  private readonly rateLimited = new Counter(
    "pie_http_rate_limited_total",
    "Requests rejected by the rate limiter.",
    ["scope"],
  );
  private readonly idempotencyReplays = new Counter(
    "pie_idempotency_replays_total",
    "Responses served from a stored idempotency key, by operation.",
    ["operation"],
  );
  private readonly lifecycleEvents = new Counter(
    "pie_lifecycle_events_total",
    "Published payment intent lifecycle events, by type.",
    ["event_type"],
  );
  private readonly riskDecisions = new Counter("pie_risk_decisions_total", "Risk assessments, by decision.", [
    "decision",
  ]);
  private readonly settlementDuration = new Histogram(
    "pie_settlement_duration_seconds",
    "Settlement gateway calls in seconds, by result.",
    ["result"],
    LATENCY_BUCKETS_SECONDS,
  );
  private readonly webhookAttempts = new Counter("pie_webhook_attempts_total", "Webhook delivery attempts, by outcome.", [
    "outcome",
  ]);
  private readonly webhookAttemptDuration = new Histogram(
    "pie_webhook_attempt_duration_seconds",
    "Webhook delivery attempt duration in seconds, by outcome.",
    ["outcome"],
    LATENCY_BUCKETS_SECONDS,
  );
  private readonly webhookExhausted = new Counter(
    "pie_webhook_exhausted_total",
    "Webhook deliveries that ran out of attempts.",
  );

  recordHttpRequest(method: string, route: string, statusCode: number, durationSeconds: number): void {
    const verb = method.toUpperCase();
    this.httpRequests.inc({ method: verb, route, status_code: String(statusCode) });
    this.httpDuration.observe({ method: verb, route }, durationSeconds);
  }

  recordRateLimitRejection(scope: "credential"): void {
    this.rateLimited.inc({ scope });
  }

  recordIdempotencyReplay(operation: string): void {
    this.idempotencyReplays.inc({ operation });
  }

  recordLifecycleEvent(eventType: LifecycleEventType): void {
    this.lifecycleEvents.inc({ event_type: eventType });
  }

  recordRiskDecision(decision: RiskDecision): void {
    this.riskDecisions.inc({ decision });
  }

  recordSettlement(result: "succeeded" | FailureReason, durationSeconds: number): void {
    this.settlementDuration.observe({ result }, durationSeconds);
  }

  recordWebhookAttempt(outcome: "delivered" | "failed", durationSeconds: number): void {
    this.webhookAttempts.inc({ outcome });
    this.webhookAttemptDuration.observe({ outcome }, durationSeconds);
  }

  recordWebhookExhausted(): void {
    this.webhookExhausted.inc({});
  }

  renderPrometheus(): string {
    const metrics = [
      this.httpRequests,
      this.httpDuration,
      this.rateLimited,
      this.idempotencyReplays,
      this.lifecycleEvents,
      this.riskDecisions,
      this.settlementDuration,
      this.webhookAttempts,
      this.webhookAttemptDuration,
      this.webhookExhausted,
    ];
    return `${metrics.flatMap((metric) => metric.render()).join("\n")}\n`;
  }
}
