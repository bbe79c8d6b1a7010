/**
 * Express app: health, metrics and the admin API. No listening here so
 * tests can mount it on an ephemeral port.
 */

import express from "express";
import rateLimit from "express-rate-limit";
import helmet from "helmet";
import { createAdminRouter, type AdminRouterDeps } from "./admin/api.js";
import { toHttpError } from "./core/errors.js";
import { registry } from "./core/metrics.js";

export function createApp(deps: AdminRouterDeps): express.Express {
  const app = express();

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'none'"],
          frameAncestors: ["'none'"],
        },
      },
    })
  );

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy", service: "delivery-simulator", uptime: process.uptime() });
  });
  app.get("/metrics", async (_req, res) => {
    res.set("Content-Type", registry.contentType);
    res.end(await registry.metrics());
  });

  // Only rejected tokens count toward the limit.
  const adminAuthLimiter = rateLimit({
    windowMs: 10 * 60 * 1000,
    max: 8,
    skipSuccessfulRequests: true,
    requestWasSuccessful: (_req, res) => res.statusCode !== 401,
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.use(express.json());
  app.use("/admin/api", adminAuthLimiter);
  app.use("/admin", createAdminRouter(deps));

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const { status, body } = toHttpError(err);
    res.status(status).json(body);
  });

  return app;
}
