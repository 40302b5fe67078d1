/**
 * API routes for matrix amplifier zones.
 *
 * - /api/health, /api/version
 * - /api/zones, /api/zones/:output
 * - /api/zones/:output/{on,off,volume,source,refresh}
 */
import { type Context, Hono } from "hono";
import { type Result, err, ok } from "neverthrow";
import type { ZodType } from "zod";

import type { Amplifier } from "../amplifier/index.js";
import { config } from "../config.js";
import { createLogger } from "../logger.js";
import {
  type Zone,
  type ZoneError,
  type ZoneResult,
  formatZoneError,
} from "../zone/index.js";
import {
  OutputParamSchema,
  SourceRequestSchema,
  VolumeRequestSchema,
} from "./schema.js";

const log = createLogger("api");

export const APP_VERSION = "1.0.0";

type HttpFailure = Readonly<{ status: 400 | 404 | 502; message: string }>;

const zoneErrorStatus = (error: ZoneError): 400 | 502 =>
  error.type === "VALIDATION_FAILED" ? 400 : 502;

function fail(c: Context, failure: HttpFailure) {
  return c.json(
    {
      success: false,
      error: failure.message,
      requestId: c.get("requestId"),
    },
    failure.status,
  );
}

async function readBody<T>(
  c: Context,
  schema: ZodType<T>,
): Promise<Result<T, HttpFailure>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return err({ status: 400, message: "Request body must be JSON" });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return err({
      status: 400,
      message: issue ? issue.message : "Invalid request body",
    });
  }
  return ok(parsed.data);
}

export function createRoutes(amplifier: Amplifier): Hono {
  const routes = new Hono();

  const lookupZone = (c: Context): Result<Zone, HttpFailure> => {
    const output = OutputParamSchema.safeParse(c.req.param("output"));
    if (!output.success) {
      return err({ status: 400, message: "Output must be a positive integer" });
    }
    const zone = amplifier.getZone(output.data);
    return zone
      ? ok(zone)
      : err({ status: 404, message: `Zone ${output.data} not found` });
  };

  const respond = (c: Context, result: ZoneResult) => {
    if (result.isErr()) {
      log.warn(
        { requestId: c.get("requestId"), error: formatZoneError(result.error) },
        "Zone command failed",
      );
      return fail(c, {
        status: zoneErrorStatus(result.error),
        message: formatZoneError(result.error),
      });
    }
    return c.json({
      success: true,
      zone: result.value,
      requestId: c.get("requestId"),
    });
  };

  // ===========================================================================
  // Health Check
  // ===========================================================================

  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      requestId,
      version: APP_VERSION,
      app: config.APP_NAME,
      amplifier: {
        name: amplifier.config.name,
        host: amplifier.config.host,
        port: amplifier.config.port,
        dialect: amplifier.config.dialect,
        available: amplifier.isAvailable(),
        zones: amplifier.zones.length,
      },
      transport: amplifier.getStats(),
    });
  });

  routes.get("/api/version", (c) => c.json({ version: APP_VERSION }));

  // ===========================================================================
  // Zones
  // ===========================================================================

  routes.get("/api/zones", (c) =>
    c.json({
      zones: amplifier.zones.map((zone) => zone.getAttributes()),
      requestId: c.get("requestId"),
    }),
  );

  routes.get("/api/zones/:output", (c) => {
    const zone = lookupZone(c);
    if (zone.isErr()) {
      return fail(c, zone.error);
    }
    return c.json({
      zone: zone.value.getAttributes(),
      requestId: c.get("requestId"),
    });
  });

  routes.post("/api/zones/:output/on", async (c) => {
    const zone = lookupZone(c);
    if (zone.isErr()) {
      return fail(c, zone.error);
    }
    return respond(c, await zone.value.turnOn());
  });

  routes.post("/api/zones/:output/off", async (c) => {
    const zone = lookupZone(c);
    if (zone.isErr()) {
      return fail(c, zone.error);
    }
    return respond(c, await zone.value.turnOff());
  });

  routes.post("/api/zones/:output/volume", async (c) => {
    const zone = lookupZone(c);
    if (zone.isErr()) {
      return fail(c, zone.error);
    }
    const body = await readBody(c, VolumeRequestSchema);
    if (body.isErr()) {
      return fail(c, body.error);
    }
    return respond(c, await zone.value.setVolumeLevel(body.value.level));
  });

  routes.post("/api/zones/:output/source", async (c) => {
    const zone = lookupZone(c);
    if (zone.isErr()) {
      return fail(c, zone.error);
    }
    const body = await readBody(c, SourceRequestSchema);
    if (body.isErr()) {
      return fail(c, body.error);
    }
    const request = body.value;
    return respond(
      c,
      "source" in request
        ? await zone.value.selectSource(request.source)
        : await zone.value.selectSourceByNumber(request.input),
    );
  });

  routes.post("/api/zones/:output/refresh", async (c) => {
    const zone = lookupZone(c);
    if (zone.isErr()) {
      return fail(c, zone.error);
    }
    return respond(c, await zone.value.refresh());
  });

  return routes;
}
