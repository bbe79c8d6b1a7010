/**
 * Admin API: simulation control under /admin/api, guarded by ADMIN_API_TOKEN.
 */

import { type NextFunction, type Request, type Response, Router } from "express";
import { requireAdminToken } from "../core/auth/authService.js";
import { toHttpError } from "../core/errors.js";
import { headersFromNodeRequest } from "../core/httpHeaders.js";
import { createChildLogger } from "../core/logger.js";
import { createSimulationsRouter, type SimulationsRouterDeps } from "./routes/simulations.js";

const log = createChildLogger("admin-api");

export interface AdminRouterDeps extends SimulationsRouterDeps {
  adminApiToken: string | undefined;
}

export function createAdminRouter(deps: AdminRouterDeps): Router {
  const router = Router();

  router.get("/api/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", service: "admin-api", active_simulations: deps.simulator.registry.size });
  });

  router.use("/api", (req: Request, _res: Response, next: NextFunction) => {
    requireAdminToken(headersFromNodeRequest(req), deps.adminApiToken);
    next();
  });

  router.use("/api", createSimulationsRouter(deps));

  router.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = toHttpError(err);
    if (status >= 500) log.error({ err, path: req.path }, "Admin request failed");
    res.status(status).json(body);
  });

  return router;
}
