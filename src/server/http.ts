import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import bodyParser from "body-parser";
import { AgentCore } from "../core/agent/agentCore";
import { ToolRegistry } from "../core/tool-engine";
import { ForemanLogger } from "../core/logger";
import { agentRoutes } from "./routes/agent";
import { toolsRoutes } from "./routes/tools";

export interface HttpServerDeps {
  agent: AgentCore;
  registry: ToolRegistry;
  logger?: ForemanLogger;
  allowedOrigins?: string[];
}

export function createHttpServer(deps: HttpServerDeps) {
  const app = express();

  const allowedOrigins = deps.allowedOrigins ?? ["http://localhost:3000"];
  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(new Error("Not allowed by CORS"));
        }
      },
      credentials: true,
    })
  );

  app.use(bodyParser.json({ limit: "1mb" }));

  // Request tracing
  if (deps.logger) {
    const logger = deps.logger;
    app.use((req, res, next) => {
      const start = Date.now();
      res.on("finish", () => {
        logger.traceRequest(req.method, req.originalUrl, res.statusCode, Date.now() - start);
      });
      next();
    });
  }

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.use("/agent", agentRoutes(deps.agent));
  app.use("/tools", toolsRoutes(deps.registry));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      ok: false,
      error: {
        code: "not_found",
        message: `Route ${req.method} ${req.path} not found`,
      },
      availableEndpoints: ["GET /health", "POST /agent/run", "GET /tools/list"],
    });
  });

  // Malformed JSON bodies and other middleware failures
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const err = error instanceof Error ? error : new Error(String(error));
    const status = "status" in err && typeof err.status === "number" ? err.status : 500;
    res.status(status).json({
      ok: false,
      error: {
        code: status === 400 ? "validation_error" : "internal_error",
        message: err.message,
      },
    });
  });

  return app;
}
