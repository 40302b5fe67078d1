/**
 * Driver Module - Factory
 *
 * Picks the dialect once, at construction.
 */
import { createLogger } from "../logger.js";
import {
  createDatagramTransport,
  createStreamTransport,
} from "../transport/index.js";
import { createDatagramDriver } from "./datagram.js";
import type { AmpDriver, DriverConfig, DriverDeps } from "./schema.js";
import { createStreamDriver } from "./stream.js";

const log = createLogger("driver");

export function createDriver(
  config: DriverConfig,
  deps: DriverDeps = {},
): AmpDriver {
  const endpoint = { host: config.host, port: config.port };
  const limits = {
    numInputs: config.numInputs,
    numOutputs: config.numOutputs,
  };

  log.info(
    { dialect: config.dialect, host: config.host, port: config.port },
    "Creating amplifier driver",
  );

  switch (config.dialect) {
    case "stream":
      return createStreamDriver(
        createStreamTransport({
          endpoint,
          connectTimeoutMs: config.connectTimeoutMs,
          commandTimeoutMs: config.commandTimeoutMs,
          ...(deps.connector ? { connector: deps.connector } : {}),
        }),
        limits,
      );
    case "datagram":
      return createDatagramDriver(
        createDatagramTransport({
          endpoint,
          replyTimeoutMs: config.replyTimeoutMs,
          ...(deps.socketFactory ? { socketFactory: deps.socketFactory } : {}),
        }),
        limits,
        deps.random,
      );
  }
}
