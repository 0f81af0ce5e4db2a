import Fastify, { type FastifyInstance, type FastifyReply } from "fastify";
import { Redis } from "ioredis";
import { Pool } from "pg";
import { ActionResolver } from "./application/action-resolver.js";
import { IntentSweeper } from "./application/intent-sweeper.js";
import { PaymentOrchestrator } from "./application/payment-orchestrator.js";
import { DEFAULT_RISK_RULES, loadRiskRulesFile, type RiskRule } from "./application/risk-rules.js";
import { RiskScorer } from "./application/risk-scorer.js";
import { WebhookDispatcher } from "./application/webhook-dispatcher.js";
import { WebhookDeliveryScheduler } from "./application/webhook-scheduler.js";
import { WebhookService, toDeliveryResponse, toEndpointResponse } from "./application/webhook-service.js";
import { PgRedisDurableEventBus } from "./adapters/durable/pg-redis-event-bus.js";
import { HttpWebhookSender } from "./adapters/http/webhook-sender.js";
import { InMemoryEventBus } from "./adapters/inmemory/event-bus.js";
import { InMemoryIdempotencyStore } from "./adapters/inmemory/idempotency-store.js";
import { InMemoryPaymentRepository } from "./adapters/inmemory/payment-repository.js";
import { InMemoryRateLimiter } from "./adapters/inmemory/rate-limiter.js";
import { InMemoryVelocityStore } from "./adapters/inmemory/velocity-store.js";
import { InMemoryWebhookRepository } from "./adapters/inmemory/webhook-repository.js";
import { InMemoryWebhookSender } from "./adapters/inmemory/webhook-sender.js";
import { PostgresIdempotencyStore } from "./adapters/postgres/idempotency-store.js";
import { PostgresPaymentRepository } from "./adapters/postgres/payment-repository.js";
import { MockSettlementGateway } from "./adapters/providers/mock-settlement.js";
import { RedisRateLimiter } from "./adapters/redis/rate-limiter.js";
import { RedisVelocityStore } from "./adapters/redis/velocity-store.js";
import type { BucketPolicy } from "./domain/token-bucket.js";
import type { PaymentIntentResponse, RequestContext } from "./domain/types.js";
import { AppError, AuthenticationError, RateLimitedError, ValidationError } from "./infra/app-error.js";
import { SystemClock, type ClockPort } from "./infra/clock.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { credentialIdFromApiKey } from "./infra/fingerprint.js";
import { makeLogger, type Logger } from "./infra/logger.js";
import { MetricsRegistry } from "./infra/metrics.js";
import { PageCursorSigner } from "./infra/page-cursor.js";
import type { EventBusPort } from "./ports/event-bus.js";
import type { IdempotencyStorePort } from "./ports/idempotency-store.js";
import type { PaymentRepositoryPort } from "./ports/payment-repository.js";
import type { RateLimiterPort } from "./ports/rate-limiter.js";
import type { SettlementGatewayPort } from "./ports/settlement-gateway.js";
import type { VelocityStorePort } from "./ports/velocity-store.js";
import type { WebhookSenderPort } from "./ports/webhook-sender.js";
import {
  normalizeCurrencyCode,
  normalizeCursor,
  normalizeDeliveryStatus,
  normalizeEventType,
  normalizeIsoDateTime,
  normalizeLimit,
  normalizePaymentStatus,
  normalizeResourceId,
  parseActionResultInput,
  parseCancelPaymentIntentInput,
  parseConfirmPaymentIntentInput,
  parseCreatePaymentIntentInput,
  parseCreatePaymentMethodInput,
  parseCreateWebhookEndpointInput,
  parseRotateWebhookSecretInput,
  parseUpdateWebhookEndpointInput,
} from "./api/validators.js";

declare module "fastify" {
  interface FastifyRequest {
    credentialId: string;
  }
}

const IDEMPOTENCY_KEY_PATTERN = /^[A-Za-z0-9._:-]+$/;
const COUNTRY_PATTERN = /^[A-Za-z]{2}$/;

type IdParams = { Params: { id: string } };
type ListQuery = Record<string, string | undefined>;

/** Collaborators a caller may swap in, mostly for tests. */
export interface AppOverrides {
  clock?: ClockPort;
  logger?: Logger;
  webhookSender?: WebhookSenderPort;
  settlement?: SettlementGatewayPort;
  riskRules?: readonly RiskRule[];
  random?: () => number;
}

export interface AppRuntime {
  app: FastifyInstance;
  orchestrator: PaymentOrchestrator;
  webhookService: WebhookService;
  webhookDispatcher: WebhookDispatcher;
  webhookScheduler: WebhookDeliveryScheduler;
  intentSweeper: IntentSweeper;
  eventBus: EventBusPort;
  metrics: MetricsRegistry;
  /** Starts the webhook scheduler and the intent sweeper. */
  startBackgroundWork(): void;
}

function optionalIdempotencyKey(headers: Record<string, unknown>, maxLength: number): string | undefined {
  const keyHeader = headers["idempotency-key"];
  if (keyHeader === undefined) {
    return undefined;
  }
  if (typeof keyHeader !== "string" || keyHeader.trim().length === 0) {
    throw new ValidationError("invalid_idempotency_key", "Idempotency-Key header must not be empty.");
  }
  const key = keyHeader.trim();
  if (key.length > maxLength) {
    throw new ValidationError("invalid_idempotency_key", `Idempotency-Key length must be <= ${maxLength}.`);
  }
  if (!IDEMPOTENCY_KEY_PATTERN.test(key)) {
    throw new ValidationError("invalid_idempotency_key", "Idempotency-Key contains invalid characters.");
  }
  return key;
}

function requireBearerApiKey(headers: Record<string, unknown>, validApiKeys: ReadonlySet<string>): string {
  const authorization = headers.authorization;
  if (typeof authorization !== "string" || !authorization.startsWith("Bearer ")) {
    throw new AuthenticationError("missing_api_key", "Authorization header with Bearer API key is required.");
  }

  const token = authorization.slice("Bearer ".length).trim();
  if (!token || !validApiKeys.has(token)) {
    throw new AuthenticationError("invalid_api_key", "Invalid API key.");
  }

  return token;
}

function clientCountry(headers: Record<string, unknown>): string | undefined {
  const header = headers["x-client-country"];
  if (typeof header !== "string" || !COUNTRY_PATTERN.test(header.trim())) {
    return undefined;
  }
  return header.trim().toUpperCase();
}

function setRateLimitHeaders(
  reply: FastifyReply,
  options: { limit: number; remaining: number; resetSeconds: number },
): void {
  reply.header("RateLimit-Limit", String(options.limit));
  reply.header("RateLimit-Remaining", String(options.remaining));
  reply.header("RateLimit-Reset", String(options.resetSeconds));
}

function sendIntent(
  reply: FastifyReply,
  statusCode: number,
  body: PaymentIntentResponse,
): FastifyReply {
  return reply.status(statusCode).send(body);
}

export function buildApp(config: RuntimeConfig = loadRuntimeConfig(), overrides: AppOverrides = {}): AppRuntime {
  const app = Fastify({ logger: false });
  const logger = overrides.logger ?? makeLogger({ component: "api" });
  const metrics = new MetricsRegistry();
  const clock = overrides.clock ?? new SystemClock();
  const validApiKeys = new Set<string>(config.apiKeys);
  const closeActions: Array<() => Promise<void>> = [];

  const postgresPool =
    config.postgresUrl
    && (
      config.paymentBackend === "postgres"
      || config.idempotencyBackend === "postgres"
      || config.eventBusBackend === "durable"
    )
      ? new Pool({ connectionString: config.postgresUrl })
      : null;
  if (postgresPool) {
    closeActions.push(async () => {
      await postgresPool.end();
    });
  }

  const redisClient =
    config.redisUrl
    && (config.rateLimitBackend === "redis" || config.velocityBackend === "redis" || config.eventBusBackend === "durable")
      ? new Redis(config.redisUrl, {
        lazyConnect: false,
        maxRetriesPerRequest: 1,
      })
      : null;
  if (redisClient) {
    closeActions.push(async () => {
      await redisClient.quit();
    });
  }

  function requirePool(feature: string): Pool {
    if (!postgresPool) {
      throw new AppError(500, "invalid_runtime_config", `${feature} requested without PostgreSQL.`);
    }
    return postgresPool;
  }

  function requireRedis(feature: string): Redis {
    if (!redisClient) {
      throw new AppError(500, "invalid_runtime_config", `${feature} requested without Redis.`);
    }
    return redisClient;
  }

  const repository: PaymentRepositoryPort =
    config.paymentBackend === "postgres"
      ? new PostgresPaymentRepository(requirePool("Postgres payment backend"))
      : new InMemoryPaymentRepository();

  const idempotencyStore: IdempotencyStorePort<PaymentIntentResponse> =
    config.idempotencyBackend === "postgres"
      ? new PostgresIdempotencyStore<PaymentIntentResponse>(requirePool("Postgres idempotency"), {
        ttlSeconds: config.idempotencyTtlSeconds,
        clock,
      })
      : new InMemoryIdempotencyStore<PaymentIntentResponse>({ ttlSeconds: config.idempotencyTtlSeconds, clock });

  const rateLimitPolicy: BucketPolicy = {
    capacity: config.rateLimitCapacity,
    refillPerSecond: config.rateLimitRefillPerSecond,
  };
  const rateLimiter: RateLimiterPort =
    config.rateLimitBackend === "redis"
      ? new RedisRateLimiter(requireRedis("Redis rate limiting"), rateLimitPolicy, {
        keyPrefix: config.redisKeyPrefix,
        clock,
      })
      : new InMemoryRateLimiter(rateLimitPolicy, clock);

  const velocityStore: VelocityStorePort =
    config.velocityBackend === "redis"
      ? new RedisVelocityStore(requireRedis("Redis velocity counters"), config.redisKeyPrefix)
      : new InMemoryVelocityStore(16, clock);

  let eventBus: EventBusPort;
  if (config.eventBusBackend === "durable") {
    const durableEventBus = new PgRedisDurableEventBus(
      requirePool("Durable event bus"),
      requireRedis("Durable event bus"),
      logger.child({ component: "event-bus" }),
      {
        streamKey: config.eventStreamKey,
        consumerGroup: config.eventConsumerGroup,
        consumerName: config.eventConsumerName,
        blockMs: config.eventConsumerBlockMs,
        batchSize: config.eventConsumerBatchSize,
        claimIdleMs: config.eventClaimIdleMs,
      },
    );
    eventBus = durableEventBus;
    closeActions.push(async () => {
      await durableEventBus.close();
    });
  } else {
    eventBus = new InMemoryEventBus(logger.child({ component: "event-bus" }));
  }

  let webhookSender: WebhookSenderPort;
  if (overrides.webhookSender) {
    webhookSender = overrides.webhookSender;
  } else if (config.webhookSender === "http") {
    const httpSender = new HttpWebhookSender({ connections: config.webhookConcurrency });
    webhookSender = httpSender;
    closeActions.push(async () => {
      await httpSender.close();
    });
  } else {
    webhookSender = new InMemoryWebhookSender();
  }

  const riskRules =
    overrides.riskRules ?? (config.riskRulesPath ? loadRiskRulesFile(config.riskRulesPath) : DEFAULT_RISK_RULES);
  const riskScorer = new RiskScorer(
    riskRules,
    velocityStore,
    clock,
    logger.child({ component: "risk" }),
    { thresholds: config.riskThresholds, thresholdOverrides: config.riskThresholdOverrides },
    metrics,
  );
  const actionResolver = new ActionResolver(clock, {
    exemptionAmount: config.scaExemptionAmount,
    maxDwellSeconds: config.actionMaxDwellSeconds,
    redirectBaseUrl: config.actionRedirectBaseUrl,
  });
  const cursors = new PageCursorSigner(config.cursorSecret, config.cursorVerificationSecrets);

  const orchestrator = new PaymentOrchestrator(
    {
      repository,
      idempotencyStore,
      eventBus,
      riskEngine: riskScorer,
      actionResolver,
      settlement: overrides.settlement ?? new MockSettlementGateway(),
      clock,
      logger: logger.child({ component: "orchestrator" }),
      metrics,
    },
    {
      eventApiVersion: config.eventApiVersion,
      eventSource: config.eventSource,
      eventSchemaVersion: config.eventSchemaVersion,
      supportedCurrencies: config.supportedCurrencies,
      settlementTimeoutMs: config.settlementTimeoutMs,
      maxProcessingSeconds: config.maxProcessingSeconds,
    },
  );

  const webhookRepository = new InMemoryWebhookRepository();
  const webhookLogger = logger.child({ component: "webhooks" });
  const webhookDispatcher = new WebhookDispatcher(
    webhookRepository,
    webhookSender,
    clock,
    webhookLogger,
    {
      maxAttempts: config.webhookMaxAttempts,
      timeoutMs: config.webhookTimeoutMs,
      retentionSeconds: config.webhookRetentionSeconds,
      backoff: {
        baseDelayMs: config.webhookBaseDelayMs,
        maxDelayMs: config.webhookMaxDelayMs,
        jitterRatio: config.webhookJitterRatio,
      },
      ...(overrides.random ? { random: overrides.random } : {}),
    },
    metrics,
  );
  const webhookService = new WebhookService(webhookRepository, webhookDispatcher, clock, cursors, webhookLogger);
  const webhookScheduler = new WebhookDeliveryScheduler(webhookRepository, webhookDispatcher, clock, webhookLogger, {
    pollIntervalMs: config.webhookPollIntervalMs,
    concurrency: config.webhookConcurrency,
  });
  const intentSweeper = new IntentSweeper(
    orchestrator,
    logger.child({ component: "sweeper" }),
    config.sweeperIntervalMs,
    idempotencyStore,
  );
  closeActions.push(async () => {
    await webhookScheduler.stop();
    await intentSweeper.stop();
  });

  eventBus.subscribe(async (event) => {
    await webhookDispatcher.enqueue(event);
  });

  app.decorateRequest("credentialId", "");

  app.get("/health/live", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/health/ready", async (_, reply) => {
    try {
      if (postgresPool) {
        await postgresPool.query("SELECT 1");
      }
      if (redisClient) {
        await redisClient.ping();
      }
    } catch (error) {
      logger.warn({ err: error }, "readiness check failed");
      return reply.status(503).send({ status: "unavailable" });
    }
    return reply.status(200).send({ status: "ready" });
  });

  app.addHook("onRequest", async (request, reply) => {
    if (request.url.startsWith("/health/")) {
      return;
    }
    if (config.metricsEnabled && request.url === "/metrics") {
      return;
    }
    reply.header("X-Request-Id", request.id);
    const apiKey = requireBearerApiKey(request.headers, validApiKeys);
    request.credentialId = credentialIdFromApiKey(apiKey);
    if (!config.rateLimitEnabled) {
      return;
    }
    const decision = await rateLimiter.consume(request.credentialId);
    setRateLimitHeaders(reply, decision);
    if (!decision.allowed) {
      metrics.recordRateLimitRejection("credential");
      throw new RateLimitedError(decision.retryAfterSeconds);
    }
  });

  app.addHook("onResponse", async (request, reply) => {
    if (!config.metricsEnabled) {
      return;
    }
    const route = request.routeOptions.url ?? "unmatched";
    metrics.recordHttpRequest(request.method, route, reply.statusCode, reply.elapsedTime / 1000);
  });

  function requestContext(request: { credentialId: string; headers: Record<string, unknown> }): RequestContext {
    const ipCountry = clientCountry(request.headers);
    return {
      credentialId: request.credentialId,
      ...(ipCountry ? { ipCountry } : {}),
    };
  }

  app.post("/v1/payment-methods", async (request, reply) => {
    const input = parseCreatePaymentMethodInput(request.body);
    const method = await orchestrator.createPaymentMethod(input);
    return reply.status(201).send(method);
  });

  app.get<IdParams>("/v1/payment-methods/:id", async (request, reply) => {
    return reply.status(200).send(await orchestrator.getPaymentMethod(request.params.id));
  });

  app.post("/v1/payment-intents", async (request, reply) => {
    const idempotencyKey = optionalIdempotencyKey(request.headers, config.idempotencyKeyMaxLength);
    const input = parseCreatePaymentIntentInput(request.body);
    const result = await orchestrator.createPaymentIntent(input, requestContext(request), idempotencyKey);
    if (idempotencyKey) {
      reply.header("Idempotency-Key", idempotencyKey);
      reply.header("X-Idempotency-Replayed", result.idempotencyReplayed ? "true" : "false");
    }
    return sendIntent(reply, result.statusCode, result.body);
  });

  app.get<{ Querystring: ListQuery }>("/v1/payment-intents", async (request, reply) => {
    const query = request.query;
    const limit = normalizeLimit(query.limit, config.listDefaultLimit, config.listMaxLimit);
    const cursor = normalizeCursor(query.cursor);
    const status = normalizePaymentStatus(query.status);
    const currency = normalizeCurrencyCode(query.currency);
    const createdFrom = normalizeIsoDateTime(query.created_from, "created_from");
    const createdTo = normalizeIsoDateTime(query.created_to, "created_to");
    if (createdFrom && createdTo && Date.parse(createdFrom) > Date.parse(createdTo)) {
      throw new ValidationError("invalid_created_range", "created_from must be lower or equal to created_to.");
    }
    const internalCursor = cursor ? cursors.open("payment_intents", cursor) : undefined;
    const page = await orchestrator.listPaymentIntents({
      limit,
      ...(internalCursor ? { cursor: internalCursor } : {}),
      ...(status ? { status } : {}),
      ...(currency ? { currency } : {}),
      ...(createdFrom ? { createdFrom } : {}),
      ...(createdTo ? { createdTo } : {}),
    });
    return reply.status(200).send({
      data: page.data,
      pagination: {
        limit,
        has_more: page.hasMore,
        next_cursor: page.nextCursor ? cursors.seal("payment_intents", page.nextCursor) : null,
      },
    });
  });

  app.get<IdParams>("/v1/payment-intents/:id", async (request, reply) => {
    return sendIntent(reply, 200, await orchestrator.getPaymentIntent(request.params.id));
  });

  app.get<IdParams>("/v1/payment-intents/:id/events", async (request, reply) => {
    const events = await orchestrator.listIntentEvents(request.params.id);
    return reply.status(200).send({ data: events });
  });

  app.post<IdParams>("/v1/payment-intents/:id/confirm", async (request, reply) => {
    const input = parseConfirmPaymentIntentInput(request.body);
    const intent = await orchestrator.confirmPaymentIntent(request.params.id, input, requestContext(request));
    return sendIntent(reply, 200, intent);
  });

  app.post<IdParams>("/v1/payment-intents/:id/cancel", async (request, reply) => {
    const input = parseCancelPaymentIntentInput(request.body);
    return sendIntent(reply, 200, await orchestrator.cancelPaymentIntent(request.params.id, input));
  });

  app.post<IdParams>("/v1/payment-intents/:id/action-result", async (request, reply) => {
    const input = parseActionResultInput(request.body);
    return sendIntent(reply, 200, await orchestrator.resumeAfterAction(request.params.id, input));
  });

  app.get<{ Querystring: ListQuery }>("/v1/events", async (request, reply) => {
    const query = request.query;
    const limit = normalizeLimit(query.limit, config.listDefaultLimit, config.listMaxLimit);
    const cursor = normalizeCursor(query.cursor);
    const paymentIntentId = normalizeResourceId(query.payment_intent_id, "payment_intent_id");
    const eventType = normalizeEventType(query.type);
    const internalCursor = cursor ? cursors.open("events", cursor) : undefined;
    const page = await eventBus.listPublishedEvents({
      limit,
      ...(internalCursor ? { cursor: internalCursor } : {}),
      ...(paymentIntentId ? { paymentIntentId } : {}),
      ...(eventType ? { eventType } : {}),
    });
    return reply.status(200).send({
      data: page.data,
      pagination: {
        limit,
        has_more: page.hasMore,
        next_cursor: page.nextCursor ? cursors.seal("events", page.nextCursor) : null,
      },
    });
  });

  app.post("/v1/webhook-endpoints", async (request, reply) => {
    const input = parseCreateWebhookEndpointInput(request.body);
    // The only response, besides rotation, that reveals the signing secret.
    return reply.status(201).send(await webhookService.createEndpoint(input));
  });

  app.get<{ Querystring: ListQuery }>("/v1/webhook-endpoints", async (request, reply) => {
    const limit = normalizeLimit(request.query.limit, config.listDefaultLimit, config.listMaxLimit);
    const cursor = normalizeCursor(request.query.cursor);
    const page = await webhookService.listEndpoints({ limit, ...(cursor ? { cursor } : {}) });
    return reply.status(200).send({
      data: page.data.map(toEndpointResponse),
      pagination: {
        limit,
        has_more: page.hasMore,
        next_cursor: page.nextCursor ?? null,
      },
    });
  });

  app.get<IdParams>("/v1/webhook-endpoints/:id", async (request, reply) => {
    const endpoint = await webhookService.getEndpointById(request.params.id);
    return reply.status(200).send(toEndpointResponse(endpoint));
  });

  app.patch<IdParams>("/v1/webhook-endpoints/:id", async (request, reply) => {
    const input = parseUpdateWebhookEndpointInput(request.body);
    const endpoint = await webhookService.updateEndpoint(request.params.id, input);
    return reply.status(200).send(toEndpointResponse(endpoint));
  });

  app.post<IdParams>("/v1/webhook-endpoints/:id/rotate-secret", async (request, reply) => {
    const input = parseRotateWebhookSecretInput(request.body);
    return reply.status(200).send(await webhookService.rotateEndpointSecret(request.params.id, input.secret));
  });

  app.get<{ Querystring: ListQuery }>("/v1/webhook-deliveries", async (request, reply) => {
    const query = request.query;
    const limit = normalizeLimit(query.limit, config.listDefaultLimit, config.listMaxLimit);
    const cursor = normalizeCursor(query.cursor);
    const status = normalizeDeliveryStatus(query.status);
    const endpointId = normalizeResourceId(query.endpoint_id, "endpoint_id");
    const eventId = normalizeResourceId(query.event_id, "event_id");
    const page = await webhookService.listDeliveries({
      limit,
      ...(cursor ? { cursor } : {}),
      ...(status ? { status } : {}),
      ...(endpointId ? { endpointId } : {}),
      ...(eventId ? { eventId } : {}),
    });
    return reply.status(200).send({
      data: page.data.map(toDeliveryResponse),
      pagination: {
        limit,
        has_more: page.hasMore,
        next_cursor: page.nextCursor ?? null,
      },
    });
  });

  app.get<IdParams>("/v1/webhook-deliveries/:id", async (request, reply) => {
    const delivery = await webhookService.getDeliveryById(request.params.id);
    return reply.status(200).send(toDeliveryResponse(delivery));
  });

  app.post<IdParams>("/v1/webhook-deliveries/:id/retry", async (request, reply) => {
    const delivery = await webhookService.retryDelivery(request.params.id);
    return reply.status(200).send(toDeliveryResponse(delivery));
  });

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      return reply
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .status(200)
        .send(metrics.renderPrometheus());
    });
  }

  app.setNotFoundHandler(async (request, reply) => {
    return reply.status(404).send({
      error: {
        code: "resource_not_found",
        message: "Route not found.",
        request_id: request.id,
      },
    });
  });

  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof AppError) {
      if (error instanceof RateLimitedError) {
        reply.header("Retry-After", String(error.retryAfterSeconds));
      }
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          request_id: request.id,
          ...error.details,
        },
      });
    }
    // Framework-level rejections such as unparsable JSON.
    if (
      error instanceof Error
      && "statusCode" in error
      && typeof error.statusCode === "number"
      && error.statusCode >= 400
      && error.statusCode < 500
    ) {
      return reply.status(error.statusCode).send({
        error: {
          code: "invalid_request",
          message: error.message,
          request_id: request.id,
        },
      });
    }
    logger.error({ err: error, request_id: request.id, url: request.url }, "unhandled error");
    return reply.status(500).send({
      error: {
        code: "internal_server_error",
        message: "Unexpected error.",
        request_id: request.id,
      },
    });
  });

  app.addHook("onClose", async () => {
    for (const closeAction of [...closeActions].reverse()) {
      await closeAction();
    }
  });

  return {
    app,
    orchestrator,
    webhookService,
    webhookDispatcher,
    webhookScheduler,
    intentSweeper,
    eventBus,
    metrics,
    startBackgroundWork(): void {
      webhookScheduler.start();
      intentSweeper.start();
    },
  };
}
