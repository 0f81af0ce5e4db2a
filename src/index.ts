import { buildApp } from "./server.js";
import { loadRuntimeConfig } from "./infra/config.js";
import { makeLogger } from "./infra/logger.js";

const logger = makeLogger({ component: "main" });
const config = loadRuntimeConfig();
const runtime = buildApp(config, { logger });

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  logger.info({ signal }, "shutting down");
  try {
    await runtime.app.close();
    process.exit(0);
  } catch (error) {
    logger.error({ err: error }, "shutdown failed");
    process.exit(1);
  }
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, (received) => {
    void shutdown(received);
  });
}

runtime.app
  .listen({ port: config.port, host: config.host })
  .then(() => {
    runtime.startBackgroundWork();
    logger.info({ host: config.host, port: config.port }, "payment intent engine listening");
  })
  .catch((error: unknown) => {
    logger.error({ err: error }, "failed to start");
    process.exit(1);
  });
