import { Router } from "express";
import type { Request, Response } from "express";
import { DEVICE_PROFILES, getProfileByModel } from "../devices/definitions";
import { UnknownModelError } from "../devices/errors";
import type { DeviceMonitor } from "../services/deviceMonitor";

export function describeProfiles() {
  return DEVICE_PROFILES.map((p) => ({
    model: p.model,
    name: p.name,
    description: p.description ?? null,
    aliases: p.aliases,
    registers: p.registers,
    specs: p.specs,
  }));
}

export function createDevicesRouter(monitors: readonly DeviceMonitor[]) {
  const router = Router();
  const byId = new Map(monitors.map((m) => [m.device.id, m]));

  router.get("/profiles", (_request: Request, response: Response) => {
    response.json(describeProfiles());
  });

  // UnknownModelError is answered with 404 by the error handler
  router.get("/profiles/:model", (request: Request, response: Response) => {
    const requested = request.params.model ?? "";
    const profile = getProfileByModel(requested);
    if (!profile) {
      throw new UnknownModelError(requested);
    }
    response.json({ model: profile.model, specs: profile.specs });
  });

  router.get("/devices", (_request: Request, response: Response) => {
    response.json(monitors.map((m) => m.status()));
  });

  router.get("/devices/:id/readings", (request: Request, response: Response) => {
    const monitor = byId.get(request.params.id ?? "");
    if (!monitor) {
      response.status(404).json({ detail: "Unknown device" });
      return;
    }
    response.json({ device: monitor.status(), readings: monitor.readings });
  });

  return router;
}
