import express, { type Express, type Request, type Response, type NextFunction } from "express";
import compression from "compression";
import helmet from "helmet";
import cors from "cors";
import path from "path";
import type { Env } from "./config/env";
import { registerRoutes, type RouteDependencies } from "./routes";
import { jsonError } from "./utils/response-helpers";
import { logRequest, createLogger } from "./logger";

const log = createLogger("server");

export type AppConfig = Pick<Env, "NODE_ENV" | "ALLOWED_ORIGINS" | "CLIENT_DIR">;

export function createApp(config: AppConfig, deps: RouteDependencies): Express {
  const app = express();
  const isProduction = config.NODE_ENV === "production";

  // Trust first proxy so express-rate-limit sees client IPs
  app.set("trust proxy", 1);

  app.use(
    helmet({
      contentSecurityPolicy: isProduction
        ? {
            directives: {
              defaultSrc: ["'self'"],
              imgSrc: ["'self'", "data:", "blob:"],
              objectSrc: ["'none'"],
              frameSrc: ["'none'"],
            },
          }
        : false,
      hsts: isProduction ? { maxAge: 31536000, includeSubDomains: true } : false,
      frameguard: { action: "deny" },
      noSniff: true,
    })
  );

  const allowedOrigins = config.ALLOWED_ORIGINS
    ? config.ALLOWED_ORIGINS.split(",").map((origin) => origin.trim()).filter(Boolean)
    : [];

  app.use(
    cors({
      origin: (origin, callback) => {
        // Same-origin and non-browser clients send no Origin header
        if (!origin) return callback(null, true);

        if (!isProduction) {
          return callback(null, true);
        }

        if (allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          log.warn("CORS blocked request from unauthorized origin", { origin, allowedOrigins });
          callback(new Error("Not allowed by CORS"));
        }
      },
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Accept"],
    })
  );

  // Request logging; before everything else for accurate timing
  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let outcome: Record<string, unknown> | undefined;

    const originalJson = res.json;
    res.json = function (body) {
      if (body && typeof body === "object" && "success" in body) {
        outcome = { success: body.success, message: "message" in body ? body.message : undefined };
      }
      return originalJson.call(res, body);
    };

    res.on("finish", () => {
      if (path.startsWith("/api")) {
        logRequest(req.method, path, res.statusCode, Date.now() - start, outcome);
      }
    });

    next();
  });

  app.use(express.json({ limit: "1mb" }));
  app.use(compression({ threshold: 1024, level: 6 }));

  registerRoutes(app, deps);

  app.use("/api", (_req: Request, res: Response) => {
    jsonError(res, "Not found", 404);
  });

  // Built playground client; every other path falls back to its index.html
  if (config.CLIENT_DIR) {
    const clientDir = path.resolve(config.CLIENT_DIR);
    app.use(express.static(clientDir));
    app.get("*", (_req: Request, res: Response) => {
      res.sendFile(path.join(clientDir, "index.html"));
    });
  }

  app.use((err: Error & { status?: number; statusCode?: number }, _req: Request, res: Response, _next: NextFunction) => {
    const status = err.status || err.statusCode || 500;
    if (status >= 500) {
      log.error("Unhandled error", { error: err.message, stack: err.stack });
    }
    if (res.headersSent) return;
    jsonError(res, status >= 500 ? "Internal Server Error" : err.message || "Request failed", status);
  });

  return app;
}
