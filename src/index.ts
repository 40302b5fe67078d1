/**
 * Matrix Amplifier Control - Application Entry Point
 *
 * Sets up:
 * - One amplifier with a zone per output
 * - Hono server on @hono/node-server with request ID tracing
 * - Periodic zone refresh (stream dialect only)
 * - Graceful shutdown
 */
import { serve } from "@hono/node-server";
import { Hono } from "hono";

import {
  createZoneRegistry,
  formatAmplifierError,
  setupAmplifier,
} from "./amplifier/index.js";
import { errorHandler } from "./api/errorHandler.js";
import { requestIdMiddleware } from "./api/middleware/requestId.js";
import { createRoutes } from "./api/routes.js";
import { config, getAmplifierSettings, getPollingConfig } from "./config.js";
import { createLogger } from "./logger.js";

const log = createLogger("api");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  MATRIX AMPLIFIER CONTROL");
console.log("========================================");
console.log("");

log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    ampHost: config.AMP_HOST,
    ampPort: config.AMP_PORT ?? "default",
    dialect: config.AMP_DIALECT,
    inputs: config.AMP_NUM_INPUTS,
    outputs: config.AMP_NUM_OUTPUTS,
  },
  "Configuration loaded",
);

// =============================================================================
// AMPLIFIER SETUP
// =============================================================================

const registry = createZoneRegistry();
const setup = setupAmplifier(getAmplifierSettings(), registry);

if (setup.isErr()) {
  log.fatal(
    { error: formatAmplifierError(setup.error) },
    "Amplifier setup failed",
  );
  process.exit(1);
}

const amplifier = setup.value;

// =============================================================================
// ZONE REFRESH POLLING
// =============================================================================

const polling = getPollingConfig();
let pollTimer: ReturnType<typeof setInterval> | null = null;
let pollInFlight = false;

const poll = async (): Promise<void> => {
  if (pollInFlight) {
    log.debug("Previous refresh still running, skipping");
    return;
  }
  pollInFlight = true;
  try {
    await amplifier.refreshAll();
  } finally {
    pollInFlight = false;
  }
};

if (polling && amplifier.config.dialect === "stream") {
  log.info({ intervalMs: polling.intervalMs }, "Zone refresh: ENABLED");
  pollTimer = setInterval(() => {
    poll().catch((error: unknown) => {
      log.error({ error }, "Zone refresh crashed");
    });
  }, polling.intervalMs);
} else {
  log.info(
    { dialect: amplifier.config.dialect },
    "Zone refresh: DISABLED (no read-back or turned off)",
  );
}

// =============================================================================
// HONO SERVER SETUP
// =============================================================================

const app = new Hono();

app.use("*", requestIdMiddleware);
app.onError(errorHandler);
app.route("/", createRoutes(amplifier));

const server = serve(
  {
    fetch: app.fetch,
    port: config.PORT,
    hostname: "0.0.0.0",
  },
  (info) => {
    log.info(
      { port: info.port, env: config.NODE_ENV, appName: config.APP_NAME },
      `🚀 ${config.APP_NAME} listening on port ${info.port}`,
    );
  },
);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = async (signal: string): Promise<void> => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  if (pollTimer) {
    clearInterval(pollTimer);
  }

  await new Promise<void>((resolve) => {
    server.close(() => resolve());
  });
  await amplifier.teardown();

  log.info("Shutdown complete");
  process.exit(0);
};

const onSignal = (signal: string) => () => {
  shutdown(signal).catch((error: unknown) => {
    log.error({ error }, "Shutdown failed");
    process.exit(1);
  });
};

process.on("SIGTERM", onSignal("SIGTERM"));
process.on("SIGINT", onSignal("SIGINT"));
