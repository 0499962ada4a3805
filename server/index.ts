import express, { type Request, type Response, type NextFunction } from "express";
import { createServer } from "http";
import { registerRoutes } from "./routes";
import { config } from "./config";
import { db, runStartupMigrations } from "./db";
import { DatabaseStorage } from "./storage";
import { createServices } from "./services";
import { errorMessage } from "./errors";

const app = express();
const httpServer = createServer(app);

app.use(express.json());
app.use(express.urlencoded({ extended: false }));

// Behind a load balancer in production
if (config.nodeEnv === "production") {
  app.set("trust proxy", 1);
}

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: unknown = undefined;

  const originalResJson = res.json;
  res.json = function (bodyJson) {
    capturedJsonResponse = bodyJson;
    return originalResJson.call(res, bodyJson);
  };

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
      }
      if (logLine.length > 200) {
        logLine = logLine.slice(0, 199) + "…";
      }

      log(logLine);
    }
  });

  next();
});

(async () => {
  // Run startup migrations to ensure database schema is up to date
  await runStartupMigrations();

  const services = createServices(new DatabaseStorage(db));
  await registerRoutes(httpServer, app, services);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = typeof err === "object" && err !== null && "statusCode" in err && typeof err.statusCode === "number"
      ? err.statusCode
      : 500;
    console.error("[express] Unhandled error:", errorMessage(err));
    res.status(status).json({ message: errorMessage(err) || "Internal Server Error" });
  });

  httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
    log(`serving on port ${config.port}`);

    if (config.autoSync.enabled) {
      services.autoSync.startAutoSync();
    } else {
      log("auto-sync disabled (AUTO_SYNC_ENABLED=false)", "sync");
    }
  });

  const shutdown = (signal: string) => {
    log(`${signal} received, shutting down`);
    services.autoSync.stopAutoSync();
    httpServer.close(() => process.exit(0));
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));
})().catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
