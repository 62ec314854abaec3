import cors from "cors";
import express from "express";
import { ZodError, z } from "zod";

import { BridgeService } from "./bridgeService.js";
import { BridgeError, httpStatusFor } from "./errors.js";
import { CommandResult, PairingResult, commandSchema, deviceConfigSchema, pinSchema } from "./types.js";

const commandLogQuery = z.object({ limit: z.coerce.number().int().positive().optional() });

function statusFor(result: CommandResult | PairingResult): number {
  switch (result.status) {
    case "ok":
    case "trusted":
      return 200;
    case "queued":
      return 202;
    case "error":
      return httpStatusFor(result.kind);
  }
}

export function createApp(service: BridgeService): express.Express {
  const { registry, commandLog } = service;
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "256kb" }));

  const asyncHandler =
    (handler: express.RequestHandler): express.RequestHandler =>
    (req, res, next) => {
      Promise.resolve(handler(req, res, next)).catch(next);
    };

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok", devices: registry.list().length });
  });

  app.get("/api/devices", (_req, res) => {
    res.json({ devices: registry.list() });
  });

  app.get("/api/devices/:id", (req, res) => {
    const device = registry.get(req.params.id);
    if (!device) {
      throw new BridgeError("unknown_device", `unknown device ${req.params.id}`);
    }
    res.json({ device });
  });

  app.get("/api/profiles", (_req, res) => {
    res.json({ profiles: service.profileSummaries() });
  });

  app.get("/api/commandlog", (req, res) => {
    const limit = commandLogQuery.parse(req.query).limit;
    res.json({ entries: limit === undefined ? commandLog.all() : commandLog.recent(limit) });
  });

  app.post(
    "/api/devices",
    asyncHandler(async (req, res) => {
      const device = await service.addDevice(deviceConfigSchema.parse(req.body));
      res.status(201).json({ device });
    })
  );

  app.delete(
    "/api/devices/:id",
    asyncHandler(async (req, res) => {
      if (!(await service.removeDevice(req.params.id))) {
        throw new BridgeError("unknown_device", `unknown device ${req.params.id}`);
      }
      res.status(204).end();
    })
  );

  app.post(
    "/api/devices/:id/command",
    asyncHandler(async (req, res) => {
      const payload = commandSchema.parse(req.body);
      const result = await service.executeCommand(req.params.id, payload.command, payload.params);
      res.status(statusFor(result)).json(result);
    })
  );

  app.post(
    "/api/devices/:id/pairing",
    asyncHandler(async (req, res) => {
      await registry.startPairing(req.params.id);
      res.status(202).json({ status: "pairing" });
    })
  );

  app.post(
    "/api/devices/:id/pin",
    asyncHandler(async (req, res) => {
      const { pin } = pinSchema.parse(req.body);
      const result = await registry.submitPin(req.params.id, pin);
      res.status(statusFor(result)).json(result);
    })
  );

  app.post("/api/devices/:id/wake", (req, res) => {
    registry.wake(req.params.id);
    res.status(202).json({ status: "connecting" });
  });

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const message = err instanceof Error ? err.message : String(err);
    if (err instanceof BridgeError) {
      res.status(httpStatusFor(err.kind)).json({ error: message, kind: err.kind });
      return;
    }
    if (err instanceof ZodError) {
      res.status(400).json({ error: err.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ") });
      return;
    }
    const stack = err instanceof Error ? err.stack : undefined;
    console.error(stack ?? message);
    res.status(400).json({ error: message });
  });

  return app;
}
